/* src/runner/session/run-session.ts
 * Session runner: pick a mode, drive the agent client, optionally wait for
 * Enter before returning.
 */
import { type BatchSummary, runBatch } from '@/runner/batch/run';
import type { AgentClient } from '@/runner/agent/types';
import type { ConsoleIO } from '@/runner/console/io';
import { runInteractive } from '@/runner/interactive/run';
import { alert, dim } from '@/runner/util/color';
import { turnTrace } from '@/runner/util/trace';

import { type RunMode, selectMode } from './mode';

export type SessionOptions = {
  client: AgentClient;
  io: ConsoleIO;
  /** Output file name for batch mode, computed once at startup. */
  outputFileName: string;
  /** Forced mode; when absent the operator is asked. */
  mode?: RunMode;
  timeoutMs: number;
  inputFile: string;
  sheetName: string;
  outputDir: string;
  /** Wait for Enter before returning. */
  pause: boolean;
  signal?: AbortSignal;
};

export type SessionResult =
  | { mode: 'interactive'; asked: number }
  | { mode: 'batch'; summary: BatchSummary | null };

export const runSession = async (
  options: SessionOptions,
): Promise<SessionResult> => {
  const { client, io, signal } = options;
  const mode =
    options.mode ??
    (await selectMode({
      io,
      timeoutMs: options.timeoutMs,
      inputFile: options.inputFile,
      signal,
    }));
  turnTrace.session.mode(mode);

  let result: SessionResult;
  if (mode === 'batch') {
    io.writeLine(alert('\nRunning batch mode...'));
    const summary = await runBatch({
      client,
      io,
      outputFileName: options.outputFileName,
      inputFile: options.inputFile,
      sheetName: options.sheetName,
      outputDir: options.outputDir,
      signal,
    });
    result = { mode, summary };
  } else {
    io.writeLine(alert('\nRunning interactive mode...'));
    const asked = await runInteractive({ client, io, signal });
    result = { mode, asked };
  }

  if (options.pause) {
    await io.readLine(dim('\nExecution completed. Press Enter to exit.'), {
      signal,
    });
  } else {
    io.writeLine(dim('\nExecution completed.'));
  }
  return result;
};
