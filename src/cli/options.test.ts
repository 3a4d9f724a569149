import { afterEach, describe, expect, it } from 'vitest';

import type { LoadedCliConfig } from './config/load';
import { applyOutputEnv, resolveRunSettings } from './options';

const config = (
  defaults: LoadedCliConfig['defaults'] = {},
): LoadedCliConfig => ({
  path: null,
  defaults,
  tokenEnv: 'AGENT_CONSOLE_TOKEN',
});

describe('resolveRunSettings', () => {
  it('uses built-ins when neither flags nor config are given', () => {
    expect(resolveRunSettings({}, config())).toEqual({
      mode: undefined,
      timeoutMs: 15000,
      inputFile: 'questions.xlsx',
      sheetName: 'Questions',
      outputDir: '.',
      pause: true,
      debug: false,
      boring: false,
      tokenEnv: 'AGENT_CONSOLE_TOKEN',
    });
  });

  it('prefers flags over config defaults', () => {
    const s = resolveRunSettings(
      { mode: 'interactive', timeout: 3, pause: true, input: 'cli.xlsx' },
      config({
        mode: 'batch',
        timeout: 30,
        pause: false,
        input: 'cfg.xlsx',
        sheet: 'S',
      }),
    );
    expect(s.mode).toBe('interactive');
    expect(s.timeoutMs).toBe(3000);
    expect(s.pause).toBe(true);
    expect(s.inputFile).toBe('cli.xlsx');
    expect(s.sheetName).toBe('S');
  });
});

describe('applyOutputEnv', () => {
  const envBackup = { ...process.env };
  afterEach(() => {
    process.env = { ...envBackup };
  });

  it('sets and clears the debug and boring variables', () => {
    applyOutputEnv({ debug: true, boring: true });
    expect(process.env.AGENT_CONSOLE_DEBUG).toBe('1');
    expect(process.env.AGENT_CONSOLE_BORING).toBe('1');
    expect(process.env.NO_COLOR).toBe('1');
    applyOutputEnv({ debug: false, boring: false });
    expect(process.env.AGENT_CONSOLE_DEBUG).toBeUndefined();
    expect(process.env.AGENT_CONSOLE_BORING).toBeUndefined();
  });
});
