export enum ErrorCodes {
  // ingestion
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  TABULAR_PARSE_ERROR = 'TABULAR_PARSE_ERROR',
  TABLE_EXISTS = 'TABLE_EXISTS',
  IMPORT_FAILED = 'IMPORT_FAILED',

  // store
  UNSUPPORTED_STORE = 'UNSUPPORTED_STORE',

  // insight generation
  MISSING_API_KEY = 'MISSING_API_KEY',
  EMPTY_TRANSCRIPTION = 'EMPTY_TRANSCRIPTION',
  INSIGHT_PARSE_ERROR = 'INSIGHT_PARSE_ERROR',
  MODEL_CALL_FAILED = 'MODEL_CALL_FAILED',
}

export const errorMessages: Record<ErrorCodes, string> = {
  [ErrorCodes.FILE_NOT_FOUND]: 'File not found',
  [ErrorCodes.TABULAR_PARSE_ERROR]: 'File is not valid delimited tabular data',
  [ErrorCodes.TABLE_EXISTS]: 'Destination table already exists',
  [ErrorCodes.IMPORT_FAILED]: 'Import failed',
  [ErrorCodes.UNSUPPORTED_STORE]: 'Only SQLite store locations are supported',
  [ErrorCodes.MISSING_API_KEY]: 'GEMINI_API_KEY is required',
  [ErrorCodes.EMPTY_TRANSCRIPTION]: 'Transcription text is empty',
  [ErrorCodes.INSIGHT_PARSE_ERROR]:
    'Model response does not match the clinical insight schema',
  [ErrorCodes.MODEL_CALL_FAILED]: 'Model completion request failed',
};

export class PipelineError extends Error {
  readonly code: ErrorCodes;
  readonly originalError?: Error;

  constructor(code: ErrorCodes, message: string, originalError?: Error) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.originalError = originalError;
  }
}

export const create = (
  code: ErrorCodes,
  options?: {
    customMessage?: string;
    originalError?: Error;
  },
): PipelineError => {
  const { customMessage, originalError } = options || {};
  const message =
    customMessage || originalError?.message || errorMessages[code];
  return new PipelineError(code, message, originalError);
};

export const isPipelineError = (err: unknown): err is PipelineError =>
  err instanceof PipelineError;

export const toError = (err: unknown): Error =>
  err instanceof Error ? err : new Error(String(err));
