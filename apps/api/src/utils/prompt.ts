import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';

/**
 * Asks one question and resolves with the trimmed answer, or with an empty
 * string once the input ends without one.
 */
export const askLine = async (
  question: string,
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<string> => {
  const rl = createInterface({ input, terminal: false });
  try {
    output.write(question);
    const answer = await new Promise<string>(resolve => {
      rl.once('line', resolve);
      rl.once('close', () => resolve(''));
    });
    return answer.trim();
  } finally {
    rl.close();
  }
};
