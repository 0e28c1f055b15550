import { describe, it, expect } from 'vitest';
import { PassThrough, Readable } from 'stream';
import { askLine } from '../utils/prompt';

describe('askLine', () => {
  it('resolves with the trimmed answer', async () => {
    const output = new PassThrough();
    expect(await askLine('Term? ', Readable.from(['  knee \n']), output)).toBe('knee');
  });

  it('resolves empty when the input is already closed', async () => {
    const output = new PassThrough();
    expect(await askLine('Term? ', Readable.from([]), output)).toBe('');
  });
});
