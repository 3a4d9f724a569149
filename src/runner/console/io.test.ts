import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { createConsoleIO } from './io';

const setup = () => {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });
  const io = createConsoleIO(input, output);
  return { input, io, written: () => written };
};

describe('createConsoleIO', () => {
  it('prints the prompt and resolves with the next line', async () => {
    const { input, io, written } = setup();
    const pending = io.readLine('User> ');
    input.write('hello there\n');
    expect(await pending).toBe('hello there');
    io.writeLine('done');
    io.write('.');
    io.close();
    await new Promise((r) => setImmediate(r));
    expect(written()).toBe('User> done\n.');
  });

  it('keeps lines that arrive before they are asked for', async () => {
    const { input, io } = setup();
    input.write('first\nsecond\n');
    await new Promise((r) => setImmediate(r));
    expect(await io.readLine()).toBe('first');
    expect(await io.readLine()).toBe('second');
    io.close();
  });

  it('resolves null when the signal aborts the read', async () => {
    const { input, io } = setup();
    const controller = new AbortController();
    const pending = io.readLine('? ', { signal: controller.signal });
    controller.abort();
    expect(await pending).toBeNull();
    // the abandoned read does not swallow the next line
    const next = io.readLine();
    input.write('later\n');
    expect(await next).toBe('later');
    io.close();
  });

  it('drops a line typed for an abandoned read', async () => {
    const { input, io } = setup();
    const controller = new AbortController();
    const pending = io.readLine('? ', { signal: controller.signal });
    controller.abort();
    expect(await pending).toBeNull();
    input.write('1\n');
    await new Promise((r) => setImmediate(r));
    const next = io.readLine('Press Enter to exit.');
    input.write('\n');
    expect(await next).toBe('');
    io.close();
  });

  it('resolves null at end of input', async () => {
    const { input, io } = setup();
    const pending = io.readLine();
    input.end();
    expect(await pending).toBeNull();
    expect(await io.readLine()).toBeNull();
  });
});
