import type { CellValue, ColumnProfile } from '../types/schema';

const MOST_COMMON_LIMIT = 3;

// Cell contents read as missing values, matched after trimming.
const NULL_TOKENS = new Set([
  '',
  '#N/A',
  '#NA',
  '-NaN',
  '-nan',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null'
]);

export const isNullCell = (value: CellValue | undefined): value is null | undefined =>
  value === null || value === undefined || NULL_TOKENS.has(value.trim());

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

/**
 * Parses a decimal literal. Hex, binary and octal forms stay text, and so do
 * integers too large to hold exactly, which keeps long record IDs distinct.
 */
export const toNumber = (value: string): number | null => {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const num = Number(trimmed);
  if (!Number.isFinite(num)) return null;
  if (INTEGER.test(trimmed) && !Number.isSafeInteger(num)) return null;
  return num;
};

const topValues = (values: string[]) => {
  const counts = new Map<string, number>();
  values.forEach(v => counts.set(v, (counts.get(v) || 0) + 1));
  // Array.sort is stable, so equal counts keep first-seen order.
  return Array.from(counts, ([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, MOST_COMMON_LIMIT);
};

export const inferColumnProfile = (name: string, values: CellValue[]): ColumnProfile => {
  const present = values
    .filter((v): v is string => !isNullCell(v))
    .map(v => v.trim());
  const nullCount = values.length - present.length;
  const base = {
    name,
    nullCount,
    nullPercentage: values.length ? (nullCount / values.length) * 100 : 0
  };

  const numbers = present.map(toNumber);
  const numeric = numbers.filter((n): n is number => n !== null);

  if (numeric.length === present.length) {
    return {
      ...base,
      type: 'numeric',
      uniqueCount: new Set(numeric).size,
      stats: numeric.length
        ? {
            min: numeric.reduce((a, b) => Math.min(a, b)),
            max: numeric.reduce((a, b) => Math.max(a, b)),
            mean: numeric.reduce((sum, n) => sum + n, 0) / numeric.length
          }
        : { min: null, max: null, mean: null }
    };
  }

  return {
    ...base,
    type: 'text',
    uniqueCount: new Set(present).size,
    stats: { mostCommon: topValues(present) }
  };
};
