import path from 'path';

export interface IConfig {
  // storage
  dataDir: string;
  databaseUrl: string;

  // model
  geminiApiKey?: string;
  geminiModel: string;
  modelTemperature: number;

  // logging
  logLevel: string;
  logDir?: string;

  // server
  port: number;
}

const DEFAULT_MODEL = 'gemini-2.5-flash';

const parseNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const defaultDatabaseUrl = (dataDir: string) =>
  `sqlite:///${path.join(dataDir, 'processed', 'ehr_database.db')}`;

export function getConfig(): IConfig {
  const dataDir = process.env.DATA_DIR || path.join(process.cwd(), 'data');
  return {
    dataDir,
    databaseUrl: process.env.EHR_DATABASE_URL || defaultDatabaseUrl(dataDir),

    geminiApiKey: process.env.GEMINI_API_KEY || undefined,
    geminiModel: process.env.GEMINI_MODEL || DEFAULT_MODEL,
    modelTemperature: parseNumber(process.env.MODEL_TEMPERATURE, 0),

    logLevel: process.env.LOG_LEVEL || 'info',
    logDir: process.env.LOG_DIR || undefined,

    port: parseNumber(process.env.PORT, 8080)
  };
}
