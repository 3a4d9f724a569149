/* src/runner/session/mode.ts
 * Mode selection: one line of operator input raced against a timer.
 */
import type { ConsoleIO } from '@/runner/console/io';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_MODE_TIMEOUT } from '@/runner/util/debug-scopes';

export type RunMode = 'interactive' | 'batch';

export const RUN_MODES: readonly RunMode[] = ['interactive', 'batch'];

export const DEFAULT_MODE_TIMEOUT_SECONDS = 15;

const menu = (inputFile: string): string[] => [
  '\nChoose an option:',
  '1. Ask your own questions',
  `2. Run batch from ${inputFile}`,
];

export type SelectModeOptions = {
  io: ConsoleIO;
  timeoutMs: number;
  inputFile?: string;
  /** Cancels the wait early; treated like the timer firing. */
  signal?: AbortSignal;
};

/** "1" within the window selects interactive mode; anything else is batch. */
export const selectMode = async (
  options: SelectModeOptions,
): Promise<RunMode> => {
  const { io, timeoutMs, inputFile = 'questions.xlsx', signal } = options;
  const seconds = Math.round(timeoutMs / 1000);
  for (const line of menu(inputFile)) io.writeLine(line);

  const timer = new AbortController();
  if (signal?.aborted) timer.abort();
  const onOuterAbort = (): void => {
    timer.abort();
  };
  signal?.addEventListener('abort', onOuterAbort, { once: true });
  const handle = setTimeout(() => {
    timer.abort();
  }, timeoutMs);

  let answer: string | null;
  try {
    answer = await io.readLine(
      `\nEnter your choice (defaulting to batch in ${String(seconds)} seconds): `,
      { signal: timer.signal },
    );
  } finally {
    clearTimeout(handle);
    signal?.removeEventListener('abort', onOuterAbort);
  }

  if (answer === null && timer.signal.aborted) {
    io.writeLine();
    debugFallback(
      DBG_SCOPE_MODE_TIMEOUT,
      `no choice after ${String(seconds)}s`,
    );
  }
  return answer?.trim() === '1' ? 'interactive' : 'batch';
};
