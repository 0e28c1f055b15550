import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { inferColumnProfile } from '../utils/profile';
import { create, ErrorCodes, isPipelineError, toError } from '../utils/error';
import { getLogger } from '../utils/logger';
import type {
  CellValue,
  FileAnalysis,
  TabularAnalysis,
  TabularData,
  TabularRow
} from '../types/schema';

const logger = getLogger('DataImport');

// Header-less single-column files and short rows are still usable tables.
const TOLERATED_PARSE_ERRORS = new Set(['UndetectableDelimiter', 'TooFewFields']);

const isExcel = (filename: string) => /\.(xlsx|xls)$/i.test(filename);

const headerName = (value: string, index: number) => value.trim() || `unnamed_${index}`;

const cellToString = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

export const isNodeError = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && 'code' in err;

export const tableNameFromPath = (filePath: string) =>
  path.parse(filePath).name.toLowerCase().replace(/ /g, '_');

const parseCsv = (buffer: Buffer): TabularData => {
  const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: headerName
  });

  const fatal = parsed.errors.find(e => !TOLERATED_PARSE_ERRORS.has(e.code));
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : '';
    throw create(ErrorCodes.TABULAR_PARSE_ERROR, {
      customMessage: `CSV parse error${where}: ${fatal.message}`
    });
  }

  const columns = parsed.meta.fields || [];
  if (!columns.length) {
    throw create(ErrorCodes.TABULAR_PARSE_ERROR, { customMessage: 'No columns to parse from file' });
  }

  const rows = parsed.data.map(record => {
    const row: TabularRow = {};
    columns.forEach(col => {
      row[col] = record[col] ?? null;
    });
    return row;
  });

  return { columns, rows, source: 'csv' };
};

const parseWorkbook = (buffer: Buffer): TabularData => {
  let matrix: unknown[][];
  try {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
      throw create(ErrorCodes.TABULAR_PARSE_ERROR, { customMessage: 'Workbook has no sheets' });
    }
    matrix = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
      header: 1,
      defval: null,
      blankrows: false
    });
  } catch (err) {
    if (isPipelineError(err)) throw err;
    throw create(ErrorCodes.TABULAR_PARSE_ERROR, { originalError: toError(err) });
  }

  const [header = [], ...body] = matrix;
  const columns = header.map((value, index) => headerName(cellToString(value) ?? '', index));
  if (!columns.length) {
    throw create(ErrorCodes.TABULAR_PARSE_ERROR, { customMessage: 'No columns to parse from file' });
  }

  const rows = body.map(cells => {
    const row: TabularRow = {};
    columns.forEach((col, index) => {
      row[col] = cellToString(cells[index]);
    });
    return row;
  });

  return { columns, rows, source: 'excel' };
};

export const parseTabular = (buffer: Buffer, filename: string): TabularData =>
  isExcel(filename) ? parseWorkbook(buffer) : parseCsv(buffer);

export const profileTabular = ({ columns, rows }: TabularData): TabularAnalysis => ({
  rowCount: rows.length,
  columnCount: columns.length,
  columns: columns.map(col => inferColumnProfile(col, rows.map(r => r[col])))
});

export const analyzeTabularBuffer = (buffer: Buffer, filename: string): TabularAnalysis =>
  profileTabular(parseTabular(buffer, filename));

export const readTabularFile = async (filePath: string) => {
  try {
    const stat = await fs.stat(filePath);
    const buffer = await fs.readFile(filePath);
    return { buffer, size: stat.size };
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw create(ErrorCodes.FILE_NOT_FOUND, {
        customMessage: `Tabular file not found: ${filePath}`,
        originalError: err
      });
    }
    throw err;
  }
};

export const analyzeFile = async (filePath: string): Promise<FileAnalysis> => {
  logger.info(`Analyzing tabular file: ${filePath}`);
  try {
    const { buffer, size } = await readTabularFile(filePath);
    const analysis = analyzeTabularBuffer(buffer, filePath);
    logger.info(`Analysis completed: ${analysis.rowCount} rows, ${analysis.columnCount} columns`);
    return { filePath, fileSizeBytes: size, ...analysis };
  } catch (err) {
    logger.error(`Error during analysis of ${filePath}: ${toError(err).message}`, err);
    throw err;
  }
};
