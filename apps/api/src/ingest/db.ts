import fs from 'fs/promises';
import path from 'path';
import Database from 'better-sqlite3';
import { getConfig } from '../config';
import { inferColumnProfile, isNullCell, toNumber } from '../utils/profile';
import { create, ErrorCodes, isPipelineError, toError } from '../utils/error';
import { getLogger } from '../utils/logger';
import { quoteIdent, resolveStorePath } from '../utils/sql';
import { parseTabular, readTabularFile, tableNameFromPath } from './csv';
import type {
  CellValue,
  ColumnType,
  ConflictPolicy,
  ImportOptions,
  ImportResult,
  TabularData
} from '../types/schema';

const logger = getLogger('DataImport');

export const listTables = (db: Database.Database): string[] =>
  db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .pluck()
    .all()
    .map(String);

export const readColumnNames = (db: Database.Database, tableName: string): string[] =>
  db.prepare('SELECT name FROM pragma_table_info(?)').pluck().all(tableName).map(String);

export const countRows = (db: Database.Database, tableName: string): number =>
  Number(db.prepare(`SELECT COUNT(*) FROM ${quoteIdent(tableName)}`).pluck().get());

const tableExists = (db: Database.Database, tableName: string) =>
  db
    .prepare("SELECT 1 FROM sqlite_master WHERE type='table' AND name = ?")
    .get(tableName) !== undefined;

type ColumnPlan = { name: string; type: ColumnType; sqlType: 'INTEGER' | 'REAL' | 'TEXT' };

const planColumns = ({ columns, rows }: TabularData): ColumnPlan[] =>
  columns.map(name => {
    const values = rows.map(r => r[name]);
    const profile = inferColumnProfile(name, values);
    if (profile.type === 'text') return { name, type: 'text', sqlType: 'TEXT' };
    const integral = values.every(v => isNullCell(v) || Number.isInteger(toNumber(v)));
    return { name, type: 'numeric', sqlType: integral ? 'INTEGER' : 'REAL' };
  });

const toSqlValue = (type: ColumnType, value: CellValue) => {
  if (isNullCell(value)) return null;
  return type === 'numeric' ? toNumber(value) : value;
};

const writeTable = (
  db: Database.Database,
  tableName: string,
  data: TabularData,
  ifExists: ConflictPolicy
) => {
  const table = quoteIdent(tableName);
  const plan = planColumns(data);
  const definitions = plan.map(c => `${quoteIdent(c.name)} ${c.sqlType}`).join(', ');
  const names = plan.map(c => quoteIdent(c.name)).join(', ');
  const placeholders = plan.map(() => '?').join(', ');

  const write = db.transaction(() => {
    if (ifExists === 'fail' && tableExists(db, tableName)) {
      throw create(ErrorCodes.TABLE_EXISTS, {
        customMessage: `Table '${tableName}' already exists`
      });
    }
    if (ifExists === 'replace') db.exec(`DROP TABLE IF EXISTS ${table}`);
    db.exec(`CREATE TABLE IF NOT EXISTS ${table} (${definitions})`);

    const insert = db.prepare(`INSERT INTO ${table} (${names}) VALUES (${placeholders})`);
    for (const row of data.rows) {
      insert.run(...plan.map(c => toSqlValue(c.type, row[c.name])));
    }
  });
  write();
};

/**
 * Bulk-loads a CSV or workbook into a single SQLite table and confirms the
 * write by reading the row count and column list back from the store.
 * Failures are logged and re-raised; the table may be left as it was.
 */
export const importFile = async (
  filePath: string,
  options: ImportOptions = {}
): Promise<ImportResult> => {
  const start = Date.now();
  const ifExists = options.ifExists ?? 'replace';
  logger.info(`Starting import of tabular file: ${filePath}`);

  let db: Database.Database | null = null;
  try {
    const { buffer } = await readTabularFile(filePath);

    const tableName = options.tableName || tableNameFromPath(filePath);
    if (!options.tableName) logger.info(`Using table name derived from file: ${tableName}`);

    const databasePath = resolveStorePath(options.databasePath ?? getConfig().databaseUrl);
    await fs.mkdir(path.dirname(databasePath), { recursive: true });

    const data = parseTabular(buffer, filePath);
    logger.info(`Read ${data.rows.length} rows and ${data.columns.length} columns`);

    logger.info(`Importing data to table '${tableName}' in ${databasePath} with ifExists='${ifExists}'`);
    db = new Database(databasePath);
    writeTable(db, tableName, data, ifExists);

    const rowsImported = countRows(db, tableName);
    const columns = readColumnNames(db, tableName);
    const elapsedSeconds = (Date.now() - start) / 1000;

    logger.info(`Import completed: ${rowsImported} rows in ${elapsedSeconds.toFixed(2)} seconds`);
    return {
      status: 'success',
      tableName,
      rowsImported,
      columnCount: columns.length,
      columns,
      elapsedSeconds,
      databasePath
    };
  } catch (err) {
    logger.error(`Error during import of ${filePath}: ${toError(err).message}`, err);
    if (isPipelineError(err)) throw err;
    throw create(ErrorCodes.IMPORT_FAILED, { originalError: toError(err) });
  } finally {
    db?.close();
  }
};
