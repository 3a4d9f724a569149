/* src/cli/options.ts
 * Effective run settings: CLI flag > config default > built-in.
 * Paths stay relative to the working directory.
 */
import type { LoadedCliConfig } from '@/cli/config/load';
import {
  DEFAULT_INPUT_FILE,
  DEFAULT_SHEET_NAME,
} from '@/runner/batch/questions';
import {
  DEFAULT_MODE_TIMEOUT_SECONDS,
  type RunMode,
} from '@/runner/session/mode';

export type RootFlags = {
  mode?: RunMode;
  input?: string;
  sheet?: string;
  outputDir?: string;
  timeout?: number;
  pause?: boolean;
  debug?: boolean;
  boring?: boolean;
  config?: string;
};

export type RunSettings = {
  mode?: RunMode;
  timeoutMs: number;
  inputFile: string;
  sheetName: string;
  outputDir: string;
  pause: boolean;
  debug: boolean;
  boring: boolean;
  tokenEnv: string;
};

export const resolveRunSettings = (
  flags: RootFlags,
  config: LoadedCliConfig,
): RunSettings => {
  const d = config.defaults;
  const seconds = flags.timeout ?? d.timeout ?? DEFAULT_MODE_TIMEOUT_SECONDS;
  return {
    mode: flags.mode ?? d.mode,
    timeoutMs: seconds * 1000,
    inputFile: flags.input ?? d.input ?? DEFAULT_INPUT_FILE,
    sheetName: flags.sheet ?? d.sheet ?? DEFAULT_SHEET_NAME,
    outputDir: flags.outputDir ?? d.outputDir ?? '.',
    pause: flags.pause ?? d.pause ?? true,
    debug: flags.debug ?? d.debug ?? process.env.AGENT_CONSOLE_DEBUG === '1',
    boring: flags.boring ?? d.boring ?? false,
    tokenEnv: config.tokenEnv,
  };
};

/** Mirror debug/boring into the environment read by the util helpers. */
export const applyOutputEnv = (
  settings: Pick<RunSettings, 'debug' | 'boring'>,
): void => {
  if (settings.debug) process.env.AGENT_CONSOLE_DEBUG = '1';
  else delete process.env.AGENT_CONSOLE_DEBUG;
  if (settings.boring) {
    process.env.AGENT_CONSOLE_BORING = '1';
    process.env.FORCE_COLOR = '0';
    process.env.NO_COLOR = '1';
  } else {
    delete process.env.AGENT_CONSOLE_BORING;
  }
};
