import { describe, expect, it } from 'vitest';

import { FakeConsole } from '@/test/fake-console';

import {
  CELL_CHARACTER_LIMIT,
  CopilotStudioAgentClient,
  type CopilotStudioSdk,
  makeCli,
  printTurns,
  truncateCell,
} from '.';

describe('package entry', () => {
  it('drives the SDK adapter through the reply printer', async () => {
    const sdk: CopilotStudioSdk = {
      startConversationAsync: () => Promise.resolve([]),
      askQuestionAsync: () =>
        Promise.resolve([
          { type: 'typing' },
          { type: 'message', text: 'Hi there' },
        ]),
    };
    const client = new CopilotStudioAgentClient(sdk);
    const io = new FakeConsole();
    await printTurns(client.askQuestion('Hello'), { client, io });
    expect(io.output).toBe('.Hi there\n');
  });

  it('exposes the cell limit and the CLI factory', () => {
    expect(CELL_CHARACTER_LIMIT).toBe(32767);
    expect(truncateCell('x'.repeat(32768))).toHaveLength(32767);
    expect(makeCli().name()).toBe('agent-console');
  });
});
