import { describe, it, expect } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import { getLogger } from '../utils/logger';

describe('getLogger', () => {
  it('returns a category logger at the configured level', () => {
    const logger = getLogger('DataImport');
    expect(logger.category).toBe('DataImport');
    expect(String(logger.level)).toBe('OFF');
  });
});

describe('ROOT_ENV_FILE', () => {
  it('points at the repository root', async () => {
    const { ROOT_ENV_FILE } = await import('../utils/env');
    const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../..');
    expect(ROOT_ENV_FILE).toBe(path.join(root, '.env'));
  });
});
