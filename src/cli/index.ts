/* REQUIREMENTS (current):
 * - Export makeCli(): Command: root CLI factory for the "agent-console" tool.
 * - Flags override config defaults, which override built-ins.
 * - Avoid invoking process.exit during tests; Commander exits throw instead.
 * - The results file name is computed once, before the session starts.
 */

import { Command, InvalidArgumentError, Option } from 'commander';

import { loadCliConfig } from '@/cli/config/load';
import type { AgentClient } from '@/runner/agent/types';
import { connectCopilotStudio } from '@/runner/agent/connect';
import { resultsFileName } from '@/runner/batch/results';
import { type ConsoleIO, createConsoleIO } from '@/runner/console/io';
import { RUN_MODES } from '@/runner/session/mode';
import { runSession, type SessionResult } from '@/runner/session/run-session';
import { attachSessionSignals } from '@/runner/session/signals';

import { applyCliSafety, tagDefault } from './cli-utils';
import { applyOutputEnv, resolveRunSettings, type RootFlags } from './options';

/** Seams for tests; production uses the defaults. */
export type CliDeps = {
  connect?: (tokenEnv: string) => Promise<AgentClient>;
  createIO?: () => ConsoleIO;
  now?: () => Date;
  cwd?: () => string;
  /** Whether waiting for Enter at the end is possible. */
  stdinIsTTY?: () => boolean;
  /** Receives the session result (tests). */
  onResult?: (result: SessionResult) => void;
};

const parseSeconds = (v: string): number => {
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0)
    throw new InvalidArgumentError('timeout must be a positive integer.');
  return n;
};

/**
 * Build the root CLI (`agent-console`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (deps: CliDeps = {}): Command => {
  const {
    connect = connectCopilotStudio,
    createIO = () => createConsoleIO(),
    now = () => new Date(),
    cwd = () => process.cwd(),
    stdinIsTTY = () => Boolean(process.stdin.isTTY),
    onResult,
  } = deps;

  const cli = new Command();
  cli
    .name('agent-console')
    .description(
      'Chat with a Copilot Studio agent, or run a spreadsheet of questions against it and save the replies.',
    );

  cli
    .addOption(
      new Option(
        '-m, --mode <mode>',
        'run mode; skips the menu when given',
      ).choices(RUN_MODES),
    )
    .option(
      '-i, --input <file>',
      'questions workbook (default: questions.xlsx)',
    )
    .option('-s, --sheet <name>', 'questions worksheet (default: Questions)')
    .option(
      '-o, --output-dir <dir>',
      'directory for the results workbook (default: .)',
    )
    .option(
      '-t, --timeout <seconds>',
      'seconds to wait for a menu choice before running batch (default: 15)',
      parseSeconds,
    )
    .option(
      '-c, --config <file>',
      'config file (default: nearest agent-console.config.*)',
    );

  const optPause = new Option('-p, --pause', 'wait for Enter before exiting');
  tagDefault(optPause, true);
  cli
    .addOption(optPause)
    .addOption(new Option('-P, --no-pause', 'exit as soon as the run ends'));

  cli
    .addOption(new Option('-d, --debug', 'enable verbose debug logging'))
    .addOption(new Option('-D, --no-debug', 'disable verbose debug logging'));

  cli
    .addOption(
      new Option(
        '-b, --boring',
        'disable all color and styling (useful for tests/CI)',
      ),
    )
    .addOption(new Option('-B, --no-boring', 'do not disable color/styling'));

  applyCliSafety(cli);

  cli.action(async () => {
    const flags = cli.opts<RootFlags>();
    const config = await loadCliConfig(cwd(), flags.config);
    const settings = resolveRunSettings(flags, config);
    applyOutputEnv(settings);

    const outputFileName = resultsFileName(now());
    const client = await connect(settings.tokenEnv);
    const io = createIO();
    const controller = new AbortController();
    const detach = attachSessionSignals(controller);
    try {
      const result = await runSession({
        client,
        io,
        outputFileName,
        mode: settings.mode,
        timeoutMs: settings.timeoutMs,
        inputFile: settings.inputFile,
        sheetName: settings.sheetName,
        outputDir: settings.outputDir,
        pause: settings.pause && stdinIsTTY(),
        signal: controller.signal,
      });
      onResult?.(result);
    } finally {
      detach();
      io.close();
    }
  });

  return cli;
};
