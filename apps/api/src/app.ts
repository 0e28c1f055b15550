import express, { type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { getConfig } from './config';
import { analyzeTabularBuffer } from './ingest/csv';
import { importFile } from './ingest/db';
import { InsightClient } from './insights';
import { StoreSession } from './store';
import { ErrorCodes, isPipelineError, toError } from './utils/error';
import { getLogger } from './utils/logger';
import { CONFLICT_POLICIES } from './types/schema';

const logger = getLogger('Api');

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

const statusFor = (code: ErrorCodes) => {
  switch (code) {
    case ErrorCodes.FILE_NOT_FOUND:
    case ErrorCodes.TABULAR_PARSE_ERROR:
    case ErrorCodes.EMPTY_TRANSCRIPTION:
    case ErrorCodes.MISSING_API_KEY:
      return 400;
    case ErrorCodes.TABLE_EXISTS:
      return 409;
    case ErrorCodes.INSIGHT_PARSE_ERROR:
    case ErrorCodes.MODEL_CALL_FAILED:
      return 502;
    default:
      return 500;
  }
};

const sendError = (res: Response, err: unknown, fallback: string) => {
  if (isPipelineError(err)) {
    res.status(statusFor(err.code)).json({ error: err.message, code: err.code });
    return;
  }
  logger.error(`${fallback}: ${toError(err).message}`);
  res.status(500).json({ error: toError(err).message || fallback });
};

const parseLimit = (value: unknown) => {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) return DEFAULT_LIMIT;
  return Math.min(limit, MAX_LIMIT);
};

const ImportBodySchema = z.object({
  tableName: z.string().trim().min(1).optional(),
  ifExists: z.enum(CONFLICT_POLICIES).optional(),
});

const RecordBodySchema = z.object({
  medical_specialty: z.string().nullish(),
  transcription: z.string(),
});

export const createApp = ({
  session = new StoreSession(),
  insights = new InsightClient(),
}: { session?: StoreSession; insights?: InsightClient } = {}) => {
  const app = express();
  const upload = multer();
  const uploadsDir = path.join(getConfig().dataDir, 'uploads');

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/ingest/analyze', upload.single('file'), (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: 'Tabular file required' });
      const analysis = analyzeTabularBuffer(file.buffer, file.originalname);
      res.json({ fileName: file.originalname, fileSizeBytes: file.size, ...analysis });
    } catch (err) {
      sendError(res, err, 'Analysis failed');
    }
  });

  app.post('/api/ingest/import', upload.single('file'), async (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: 'Tabular file required' });
      const body = ImportBodySchema.safeParse(req.body || {});
      if (!body.success) {
        return res
          .status(400)
          .json({ error: `tableName must be non-empty and ifExists one of ${CONFLICT_POLICIES.join(', ')}` });
      }

      await fs.mkdir(uploadsDir, { recursive: true });
      const safeName = file.originalname.replace(/[^a-zA-Z0-9._ -]/g, '_');
      const fileDir = await fs.mkdtemp(path.join(uploadsDir, `${Date.now()}-`));
      try {
        const filePath = path.join(fileDir, safeName);
        await fs.writeFile(filePath, file.buffer);
        const result = await importFile(filePath, body.data);
        res.json(result);
      } finally {
        await fs.rm(fileDir, { recursive: true, force: true });
      }
    } catch (err) {
      sendError(res, err, 'Import failed');
    }
  });

  app.post('/api/store/connect', (_req, res) => {
    try {
      const connected = session.connect();
      res.json({ connected, table: session.getPrimaryTable(), columns: session.getColumns() });
    } catch (err) {
      sendError(res, err, 'Connect failed');
    }
  });

  app.get('/api/specialties', (_req, res) => {
    res.json({ specialties: session.getSpecialtySummary() });
  });

  app.get('/api/transcriptions/search', (req, res) => {
    const term = typeof req.query.q === 'string' ? req.query.q : '';
    if (!term) return res.status(400).json({ error: 'q is required' });
    res.json({ results: session.search(term, parseLimit(req.query.limit)) });
  });

  app.get('/api/transcriptions', (req, res) => {
    const specialty = typeof req.query.specialty === 'string' ? req.query.specialty : '';
    if (!specialty) return res.status(400).json({ error: 'specialty is required' });
    res.json({ results: session.filterByCategory(specialty, parseLimit(req.query.limit)) });
  });

  app.post('/api/insights', async (req, res) => {
    try {
      const body = RecordBodySchema.safeParse(req.body || {});
      if (!body.success) return res.status(400).json({ error: 'transcription is required' });
      const insight = await insights.analyze(body.data);
      res.json(insight);
    } catch (err) {
      sendError(res, err, 'Analysis failed');
    }
  });

  return app;
};
