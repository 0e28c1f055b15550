export type ColumnType = 'numeric' | 'text';

export type CellValue = string | null;

export type TabularRow = Record<string, CellValue>;

export type NumericStats = {
  min: number | null;
  max: number | null;
  mean: number | null;
};

export type TextStats = {
  mostCommon: Array<{ value: string; count: number }>;
};

type BaseColumnProfile = {
  name: string;
  nullCount: number;
  nullPercentage: number; // 0..100
  uniqueCount: number;
};

export type ColumnProfile =
  | (BaseColumnProfile & { type: 'numeric'; stats: NumericStats })
  | (BaseColumnProfile & { type: 'text'; stats: TextStats });

export type TabularData = {
  columns: string[];
  rows: TabularRow[];
  source: 'csv' | 'excel';
};

export type TabularAnalysis = {
  rowCount: number;
  columnCount: number;
  columns: ColumnProfile[];
};

export type FileAnalysis = TabularAnalysis & {
  filePath: string;
  fileSizeBytes: number;
};

export const CONFLICT_POLICIES = ['replace', 'append', 'fail'] as const;

export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export type ImportOptions = {
  databasePath?: string;
  tableName?: string;
  ifExists?: ConflictPolicy;
};

export type ImportResult = {
  status: 'success';
  tableName: string;
  rowsImported: number;
  columnCount: number;
  columns: string[];
  elapsedSeconds: number;
  databasePath: string;
};

export type SqlValue = string | number | bigint | Buffer | null;

export type QueryParams = Record<string, SqlValue>;

export type Row = Record<string, unknown>;

export type SpecialtyCount = {
  label: string | null;
  count: number;
};

export type TranscriptionColumns = {
  category: string;
  transcription: string;
  description: string;
  keywords: string;
};

export type TranscriptionRecord = {
  medical_specialty?: string | null;
  transcription: string;
};
