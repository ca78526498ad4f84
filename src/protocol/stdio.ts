import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { logger } from '../logger.js';
import type { RequestDispatcher } from './dispatcher.js';

/**
 * Newline-delimited JSON loop: one request per input line, one response per
 * output line. Each line is answered before the next is read; the promise
 * resolves when input ends.
 */
export async function runStdioLoop(
  dispatcher: RequestDispatcher,
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<void> {
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });

  for await (const rawLine of rl) {
    const line = rawLine.replace(/\0/g, '').trim();
    if (!line) continue;

    const response = dispatcher.handleLine(line);
    if (response) {
      output.write(JSON.stringify(response) + '\n');
    }
  }

  logger.info('Input closed, stopping');
}
