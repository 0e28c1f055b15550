import Database from 'better-sqlite3';
import { getConfig } from './config';
import { listTables, readColumnNames } from './ingest/db';
import { toError } from './utils/error';
import { getLogger } from './utils/logger';
import { containsPattern, quoteIdent, resolveStorePath } from './utils/sql';
import type {
  QueryParams,
  Row,
  SpecialtyCount,
  TranscriptionColumns
} from './types/schema';

const logger = getLogger('DataAccess');

export const DEFAULT_TRANSCRIPTION_COLUMNS: TranscriptionColumns = {
  category: 'medical_specialty',
  transcription: 'transcription',
  description: 'description',
  keywords: 'keywords'
};

const DEFAULT_LIMIT = 10;

/**
 * A caller-owned handle on the transcription store. The primary table is the
 * first table the store reports at `connect` time and stays fixed until the
 * next `connect`.
 */
export class StoreSession {
  private db: Database.Database | null = null;
  private primaryTable: string | null = null;
  private columns: string[] = [];
  private location: string;
  private readonly names: TranscriptionColumns;

  constructor(location?: string, columns: Partial<TranscriptionColumns> = {}) {
    this.location = location ?? getConfig().databaseUrl;
    this.names = { ...DEFAULT_TRANSCRIPTION_COLUMNS, ...columns };
  }

  public connect(location: string = this.location): boolean {
    logger.info(`Connecting to database: ${location}`);
    this.close();
    this.location = location;

    this.db = new Database(resolveStorePath(location));
    const tables = listTables(this.db);
    if (!tables.length) {
      logger.warn('No tables found in the database');
      return false;
    }

    this.primaryTable = tables[0];
    this.columns = readColumnNames(this.db, this.primaryTable);
    logger.info(`Connected to table: ${this.primaryTable} with ${this.columns.length} columns`);
    return true;
  }

  public close() {
    this.db?.close();
    this.db = null;
    this.primaryTable = null;
    this.columns = [];
  }

  public getPrimaryTable() {
    return this.primaryTable;
  }

  public getColumns() {
    return [...this.columns];
  }

  /**
   * Runs a statement with named (`:name`) parameters. Errors are logged and
   * produce an empty result.
   */
  public executeQuery(sql: string, params: QueryParams = {}): Row[] {
    try {
      if (!this.db) this.connect();
      if (!this.db) return [];

      const statement = this.db.prepare(sql);
      const args = Object.keys(params).length ? [params] : [];
      if (!statement.reader) {
        statement.run(...args);
        return [];
      }

      const names = statement.columns().map(c => c.name);
      return statement
        .raw(true)
        .all(...args)
        .map(values => {
          const row: Row = {};
          const cells = Array.isArray(values) ? values : [];
          names.forEach((name, index) => {
            row[name] = cells[index];
          });
          return row;
        });
    } catch (err) {
      logger.error(`Error executing query: ${toError(err).message}`);
      return [];
    }
  }

  public getSpecialtySummary(): SpecialtyCount[] {
    const target = this.resolveTarget();
    if (!target) return [];
    const category = this.column(this.names.category);
    if (!category) return [];

    const rows = this.executeQuery(`
      SELECT ${category} AS label, COUNT(*) AS count
      FROM ${target}
      GROUP BY ${category}
      ORDER BY count DESC
    `);
    return rows.map(row => ({
      label: row.label === null || row.label === undefined ? null : String(row.label),
      count: Number(row.count)
    }));
  }

  public search(term: string, limit: number = DEFAULT_LIMIT): Row[] {
    const target = this.resolveTarget();
    if (!target) return [];
    const searched = [this.names.transcription, this.names.description, this.names.keywords]
      .map(name => this.column(name));
    if (searched.some(col => col === null)) return [];

    const where = searched.map(col => `${col} LIKE :term ESCAPE '\\'`).join('\n        OR ');
    return this.executeQuery(
      `
      SELECT *
      FROM ${target}
      WHERE ${where}
      LIMIT :limit
    `,
      { term: containsPattern(term), limit }
    );
  }

  public filterByCategory(category: string, limit: number = DEFAULT_LIMIT): Row[] {
    const target = this.resolveTarget();
    if (!target) return [];
    const column = this.column(this.names.category);
    if (!column) return [];

    return this.executeQuery(
      `
      SELECT *
      FROM ${target}
      WHERE ${column} LIKE :category ESCAPE '\\'
      LIMIT :limit
    `,
      { category: containsPattern(category), limit }
    );
  }

  // Quoted primary table name, connecting first when none is known yet.
  private resolveTarget(): string | null {
    if (!this.primaryTable) {
      try {
        this.connect();
      } catch (err) {
        logger.error(`Error connecting to database: ${toError(err).message}`);
        return null;
      }
    }
    return this.primaryTable ? quoteIdent(this.primaryTable) : null;
  }

  // Only names discovered on the primary table are ever interpolated.
  private column(name: string): string | null {
    if (!this.columns.includes(name)) {
      logger.error(`Column '${name}' not found in table '${this.primaryTable}'`);
      return null;
    }
    return quoteIdent(name);
  }
}
