/* src/runner/console/io.ts
 * Line-oriented console port. Drivers never touch process.stdin/stdout
 * directly so they can be exercised with a scripted fake.
 */
import readline from 'node:readline';

import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_IO_STALE_LINE } from '@/runner/util/debug-scopes';

export type ReadLineOptions = {
  /** Abandon the pending read when aborted; the read resolves to null. */
  signal?: AbortSignal;
};

export interface ConsoleIO {
  /** Write text as-is (no trailing newline). */
  write(text: string): void;
  /** Write text followed by a newline. */
  writeLine(text?: string): void;
  /**
   * Print `prompt` and read one line.
   * Resolves null on end of input or when `signal` aborts the read.
   */
  readLine(prompt?: string, options?: ReadLineOptions): Promise<string | null>;
  /** Release the underlying input. */
  close(): void;
}

/** ConsoleIO over a single shared readline interface. */
export const createConsoleIO = (
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConsoleIO => {
  const rl = readline.createInterface({ input, output, terminal: false });
  let closed = false;
  const buffered: string[] = [];
  const waiters: Array<(line: string | null) => void> = [];
  // A line typed for a read that was given up on belongs to nobody.
  let abandoned = false;

  rl.on('line', (line) => {
    const next = waiters.shift();
    if (next) next(line);
    else if (abandoned) {
      abandoned = false;
      debugFallback(DBG_SCOPE_IO_STALE_LINE, 'dropped line for abandoned read');
    } else buffered.push(line);
  });
  rl.on('close', () => {
    closed = true;
    for (const w of waiters.splice(0)) w(null);
  });

  return {
    write(text) {
      output.write(text);
    },
    writeLine(text = '') {
      output.write(`${text}\n`);
    },
    readLine(prompt, options) {
      if (prompt) output.write(prompt);
      const early = buffered.shift();
      if (early !== undefined) return Promise.resolve(early);
      if (closed || options?.signal?.aborted) return Promise.resolve(null);
      return new Promise<string | null>((resolve) => {
        const signal = options?.signal;
        const onAbort = (): void => {
          const i = waiters.indexOf(settle);
          if (i >= 0) waiters.splice(i, 1);
          abandoned = true;
          resolve(null);
        };
        const settle = (line: string | null): void => {
          signal?.removeEventListener('abort', onAbort);
          resolve(line);
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        abandoned = false;
        waiters.push(settle);
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
};
