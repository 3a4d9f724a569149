/* src/cli/config/load.ts
 * Locate, parse and validate agent-console configuration.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { type CliDefaults, cliConfigSchema } from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { isRecord } from '@/common/guards';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_NAMESPACE = 'agent-console';

export const CONFIG_FILE_NAMES = [
  'agent-console.config.yml',
  'agent-console.config.yaml',
  'agent-console.config.json',
] as const;

export const DEFAULT_TOKEN_ENV = 'AGENT_CONSOLE_TOKEN';

export type LoadedCliConfig = {
  /** Absolute path of the file read; null when built-ins are in effect. */
  path: string | null;
  defaults: NonNullable<CliDefaults>;
  tokenEnv: string;
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** Nearest config file walking up from `cwd`; null when none exists. */
export const findConfigPathSync = (cwd: string): string | null => {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(dir, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
};

const builtIns = (): LoadedCliConfig => ({
  path: null,
  defaults: {},
  tokenEnv: DEFAULT_TOKEN_ENV,
});

/** Validate the parsed root object of a config file. */
export const parseCliConfig = (
  rootUnknown: unknown,
  cfgPath: string,
): LoadedCliConfig => {
  const root = isRecord(rootUnknown) ? rootUnknown : {};
  const node = root[CONFIG_NAMESPACE] ?? {};
  const parsed = cliConfigSchema.safeParse(node);
  if (!parsed.success) {
    const rel = cfgPath.replace(/\\/g, '/');
    throw new Error(
      `invalid config in ${rel}\n${formatZodError(parsed.error)}`,
    );
  }
  return {
    path: cfgPath,
    defaults: parsed.data.defaults ?? {},
    tokenEnv: parsed.data.tokenEnv ?? DEFAULT_TOKEN_ENV,
  };
};

/**
 * Load configuration from `explicitPath` or the nearest config file.
 * An explicit path that does not exist is an error; a missing implicit
 * config falls back to built-ins.
 */
export const loadCliConfig = async (
  cwd: string,
  explicitPath?: string,
): Promise<LoadedCliConfig> => {
  const cfgPath = explicitPath
    ? path.resolve(cwd, explicitPath)
    : findConfigPathSync(cwd);
  if (!cfgPath) {
    debugFallback(DBG_SCOPE_CONFIG_LOAD, `no config found from ${cwd}`);
    return builtIns();
  }
  if (explicitPath && !existsSync(cfgPath)) {
    throw new Error(`config file not found: ${cfgPath}`);
  }
  const text = await readFile(cfgPath, 'utf8');
  return parseCliConfig(parseText(cfgPath, text), cfgPath);
};
