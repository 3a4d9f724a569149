/* src/runner/interactive/run.ts
 * Interactive mode: print the opening turns, then relay operator
 * questions until cancellation or end of input.
 */
import type { AgentClient } from '@/runner/agent/types';
import { requireTurn } from '@/runner/agent/types';
import type { ConsoleIO } from '@/runner/console/io';
import { printTurns } from '@/runner/printer/print';
import { agent } from '@/runner/util/color';
import { Stopwatch, turnTrace } from '@/runner/util/trace';

export type InteractiveOptions = {
  client: AgentClient;
  io: ConsoleIO;
  signal?: AbortSignal;
};

/** Returns the number of questions asked. */
export const runInteractive = async (
  options: InteractiveOptions,
): Promise<number> => {
  const { client, io, signal } = options;
  const sw = new Stopwatch();

  io.write('\nUser> ');
  for await (const turn of client.startConversation({
    emitStartConversationEvent: true,
    signal,
  })) {
    turnTrace.turn('interactive', sw.lap());
    const t = requireTurn(turn, 'conversation start');
    io.writeLine(`\n${agent('Agent>')} ${t.text ?? ''}`);
  }

  let asked = 0;
  while (!signal?.aborted) {
    const question = await io.readLine('\nUser> ', { signal });
    if (question === null) break;
    io.writeLine(`\n${agent('Agent>')}`);
    sw.restart();
    await printTurns(client.askQuestion(question, { signal }), {
      client,
      io,
      signal,
    });
    turnTrace.turn('interactive', sw.lap());
    asked += 1;
  }
  return asked;
};
