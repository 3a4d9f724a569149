import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_TOKEN_ENV, findConfigPathSync, loadCliConfig } from './load';

describe('loadCliConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'agent-console-cfg-'));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to built-ins when no config exists', async () => {
    expect(await loadCliConfig(dir)).toEqual({
      path: null,
      defaults: {},
      tokenEnv: DEFAULT_TOKEN_ENV,
    });
  });

  it('reads YAML defaults and coerces boolean-ish values', async () => {
    const p = path.join(dir, 'agent-console.config.yml');
    await writeFile(
      p,
      [
        'agent-console:',
        '  defaults:',
        '    mode: batch',
        '    timeout: "30"',
        '    sheet: Sheet1',
        '    pause: 0',
        '    boring: "true"',
        '  tokenEnv: MY_AGENT_TOKEN',
        '',
      ].join('\n'),
      'utf8',
    );
    expect(await loadCliConfig(dir)).toEqual({
      path: p,
      defaults: {
        mode: 'batch',
        timeout: 30,
        sheet: 'Sheet1',
        pause: false,
        boring: true,
      },
      tokenEnv: 'MY_AGENT_TOKEN',
    });
  });

  it('finds the nearest config walking up and reads JSON by extension', async () => {
    const nested = path.join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });
    const p = path.join(dir, 'agent-console.config.json');
    await writeFile(
      p,
      JSON.stringify({ 'agent-console': { defaults: { input: 'q.xlsx' } } }),
      'utf8',
    );
    expect(findConfigPathSync(nested)).toBe(p);
    const cfg = await loadCliConfig(nested);
    expect(cfg.defaults).toEqual({ input: 'q.xlsx' });
  });

  it('lists every schema issue for an invalid config', async () => {
    const p = path.join(dir, 'agent-console.config.yml');
    await writeFile(
      p,
      'agent-console:\n  defaults:\n    mode: chat\n    colour: red\n',
      'utf8',
    );
    await expect(loadCliConfig(dir)).rejects.toThrow(
      /^invalid config in .*agent-console\.config\.yml\ndefaults\.mode: .*\ndefaults: Unrecognized key\(s\) in object: 'colour'$/,
    );
  });

  it('rejects an explicit config path that does not exist', async () => {
    await expect(loadCliConfig(dir, 'missing.yml')).rejects.toThrow(
      `config file not found: ${path.join(dir, 'missing.yml')}`,
    );
  });

  it('prefixes YAML syntax errors with the file path', async () => {
    const p = path.join(dir, 'agent-console.config.yml');
    await writeFile(p, 'agent-console: [unclosed\n', 'utf8');
    await expect(loadCliConfig(dir)).rejects.toThrow(
      `${p.replace(/\\/g, '/')}: `,
    );
  });
});
