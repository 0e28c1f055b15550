import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import path from 'path';
import Database from 'better-sqlite3';
import { StoreSession } from '../store';
import { ErrorCodes, PipelineError } from '../utils/error';
import { makeTempDir, removeDir } from './fixtures';

type Seed = {
  sample_name: string;
  medical_specialty: string | null;
  description: string;
  transcription: string;
  keywords: string;
};

const seed = (databasePath: string, rows: Seed[], table = 'transcriptions') => {
  const db = new Database(databasePath);
  try {
    db.exec(`CREATE TABLE ${table} (
      sample_name TEXT,
      medical_specialty TEXT,
      description TEXT,
      transcription TEXT,
      keywords TEXT
    )`);
    const insert = db.prepare(
      `INSERT INTO ${table} VALUES (@sample_name, @medical_specialty, @description, @transcription, @keywords)`
    );
    rows.forEach(row => insert.run(row));
  } finally {
    db.close();
  }
};

const record = (sample_name: string, medical_specialty: string | null, transcription: string): Seed => ({
  sample_name,
  medical_specialty,
  description: `${sample_name} report`,
  transcription,
  keywords: ''
});

const specialtyRows = (): Seed[] => [
  record('a1', 'Allergy', 'Seasonal rhinitis.'),
  record('b1', 'Bariatrics', 'Sleeve gastrectomy follow-up.'),
  record('a2', 'Allergy', 'Peanut sensitivity.'),
  record('b2', 'Bariatrics', 'Weight loss consult.'),
  record('b3', 'Bariatrics', 'Band adjustment.'),
  record('b4', 'Bariatrics', 'Nutrition review.'),
  record('b5', 'Bariatrics', 'Gastric bypass evaluation.')
];

describe('StoreSession', () => {
  let dir: string;
  let databasePath: string;
  let session: StoreSession;

  beforeEach(() => {
    dir = makeTempDir();
    databasePath = path.join(dir, 'ehr.db');
    session = new StoreSession(databasePath);
  });

  afterEach(() => {
    session.close();
    removeDir(dir);
  });

  describe('with no tables', () => {
    it('reports a failed connect instead of throwing', () => {
      expect(session.connect()).toBe(false);
      expect(session.getPrimaryTable()).toBeNull();
    });

    it('returns empty results from every read operation', () => {
      expect(session.getSpecialtySummary()).toEqual([]);
      expect(session.search('cardio', 3)).toEqual([]);
      expect(session.filterByCategory('Cardiology', 3)).toEqual([]);
    });
  });

  describe('connect', () => {
    it('adopts the first table by name and caches its columns', () => {
      seed(databasePath, [], 'zz_uploads');
      seed(databasePath, [], 'clinic_notes');
      expect(session.connect()).toBe(true);
      expect(session.getPrimaryTable()).toBe('clinic_notes');
      expect(session.getColumns()).toEqual([
        'sample_name',
        'medical_specialty',
        'description',
        'transcription',
        'keywords'
      ]);
    });

    it('accepts sqlite URLs', () => {
      seed(databasePath, specialtyRows());
      expect(session.connect(`sqlite:///${databasePath}`)).toBe(true);
      expect(session.getPrimaryTable()).toBe('transcriptions');
    });

    it('rejects other store schemes', () => {
      let code: unknown;
      try {
        session.connect('postgres://localhost/ehr');
      } catch (err) {
        code = err instanceof PipelineError ? err.code : err;
      }
      expect(code).toBe(ErrorCodes.UNSUPPORTED_STORE);
    });

    it('keeps the cached columns until connect is called again', () => {
      seed(databasePath, specialtyRows());
      session.connect();

      const db = new Database(databasePath);
      db.exec('ALTER TABLE transcriptions ADD COLUMN extra TEXT');
      db.close();

      expect(session.getColumns()).not.toContain('extra');
      session.connect();
      expect(session.getColumns()).toContain('extra');
    });
  });

  describe('executeQuery', () => {
    beforeEach(() => {
      seed(databasePath, specialtyRows());
    });

    it('connects lazily and binds named parameters', () => {
      const rows = session.executeQuery(
        'SELECT sample_name FROM transcriptions WHERE medical_specialty = :specialty ORDER BY sample_name',
        { specialty: 'Allergy' }
      );
      expect(rows).toEqual([{ sample_name: 'a1' }, { sample_name: 'a2' }]);
    });

    it('keeps the column order of the result', () => {
      const [row] = session.executeQuery(
        "SELECT transcription, sample_name FROM transcriptions WHERE sample_name = 'a1'"
      );
      expect(Object.keys(row)).toEqual(['transcription', 'sample_name']);
    });

    it('runs statements that return no rows and yields an empty result', () => {
      expect(
        session.executeQuery(
          "INSERT INTO transcriptions (sample_name, medical_specialty) VALUES (:name, 'Allergy')",
          { name: 'a3' }
        )
      ).toEqual([]);
      expect(
        session.executeQuery(
          "SELECT COUNT(*) AS count FROM transcriptions WHERE medical_specialty = 'Allergy'"
        )
      ).toEqual([{ count: 3 }]);
    });

    it('returns an empty result for invalid SQL', () => {
      expect(session.executeQuery('SELECT * FROM no_such_table')).toEqual([]);
    });

    it('returns an empty result when the store cannot be opened', () => {
      const broken = new StoreSession('mysql://localhost/ehr');
      expect(broken.executeQuery('SELECT 1')).toEqual([]);
    });
  });

  describe('getSpecialtySummary', () => {
    it('orders categories by descending count', () => {
      seed(databasePath, specialtyRows());
      expect(session.getSpecialtySummary()).toEqual([
        { label: 'Bariatrics', count: 5 },
        { label: 'Allergy', count: 2 }
      ]);
    });

    it('returns nothing when the category column is missing', () => {
      const db = new Database(databasePath);
      db.exec('CREATE TABLE other (id INTEGER, note TEXT)');
      db.close();
      expect(session.getSpecialtySummary()).toEqual([]);
    });
  });

  describe('search', () => {
    beforeEach(() => {
      seed(databasePath, [
        record('c1', 'Cardiology', 'Referred for cardio evaluation.'),
        record('c2', 'Cardiology', 'Prior cardio workup negative.'),
        record('c3', 'Cardiology', 'Cardio rehab completed.'),
        record('c4', 'Cardiology', 'Seen in cardio clinic.'),
        record('c5', 'Cardiology', 'Cardiopulmonary exam normal.'),
        record('d1', 'Dermatology', 'Eczema on both forearms.'),
        { ...record('d2', 'Dermatology', 'Mole removal.'), description: 'Lesion 50% excised' },
        { ...record('o1', 'Orthopedic', 'Ankle sprain.'), keywords: 'ankle, sprain' }
      ]);
    });

    it('caps results at the limit and only returns matching rows', () => {
      const results = session.search('cardio', 3);
      expect(results).toHaveLength(3);
      for (const row of results) {
        const text = [row.transcription, row.description, row.keywords].map(String).join(' ');
        expect(text.toLowerCase()).toContain('cardio');
      }
    });

    it('matches case-insensitively', () => {
      expect(session.search('CARDIO', 10)).toHaveLength(5);
    });

    it('searches descriptions and keywords as well', () => {
      expect(session.search('sprain', 10).map(r => r.sample_name)).toEqual(['o1']);
      expect(session.search('d1 report', 10).map(r => r.sample_name)).toEqual(['d1']);
    });

    it('matches wildcard characters literally', () => {
      expect(session.search('%', 10).map(r => r.sample_name)).toEqual(['d2']);
    });

    it('binds the term instead of interpolating it', () => {
      expect(session.search("x' OR 1=1 --", 10)).toEqual([]);
    });
  });

  describe('filterByCategory', () => {
    it('matches the category as a substring', () => {
      seed(databasePath, [
        record('p1', 'Cardiovascular / Pulmonary', 'Chest pain.'),
        record('p2', 'Neurology', 'Headache.'),
        record('p3', 'Cardiovascular / Pulmonary', 'Dyspnea.')
      ]);
      expect(session.filterByCategory('Cardio', 10).map(r => r.sample_name)).toEqual(['p1', 'p3']);
      expect(session.filterByCategory('Cardio', 1)).toHaveLength(1);
    });
  });
});
