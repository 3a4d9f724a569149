/* src/runner/printer/print.ts
 * Print reply turns and resolve embedded Adaptive Cards.
 *
 * A card answered by the operator is sent back as a follow-up question,
 * and its reply stream is printed before the rest of the current stream.
 * Nesting is tracked on an explicit stack of frames instead of recursion.
 */
import {
  ADAPTIVE_CARD_CONTENT_TYPE,
  type AgentClient,
  type Attachment,
  requireTurn,
  type Turn,
  type TurnStream,
} from '@/runner/agent/types';
import { resolveAdaptiveCard } from '@/runner/cards/resolve';
import type { ConsoleIO } from '@/runner/console/io';
import { dim } from '@/runner/util/color';
import { Stopwatch, turnTrace } from '@/runner/util/trace';

export const SENDING_INPUTS = '\nSending your inputs to the agent...\n';

export type PrintContext = {
  client: AgentClient;
  io: ConsoleIO;
  signal?: AbortSignal;
};

type Frame =
  | { kind: 'stream'; it: AsyncIterator<Turn | null> }
  | { kind: 'cards'; pending: Attachment[] };

const isAdaptiveCard = (a: Attachment): boolean =>
  a.contentType === ADAPTIVE_CARD_CONTENT_TYPE;

/** Print one turn; returns the adaptive-card attachments it carries. */
export const printTurn = (turn: Turn, io: ConsoleIO): Attachment[] => {
  switch (turn.type) {
    case 'message': {
      io.writeLine(turn.text ?? '');
      const actions = turn.suggestedActions ?? [];
      if (actions.length > 0) {
        io.writeLine('Suggested actions:\n');
        for (const action of actions) io.writeLine(`\t${action.text ?? ''}`);
      }
      return (turn.attachments ?? []).filter(isAdaptiveCard);
    }
    case 'typing':
      io.write(dim('.'));
      return [];
    case 'event':
      io.write(dim('+'));
      return [];
    default:
      io.write(dim(`[${turn.type}]`));
      return [];
  }
};

const closeAll = async (stack: Frame[]): Promise<void> => {
  for (const frame of stack.reverse()) {
    if (frame.kind === 'stream') await frame.it.return?.();
  }
};

/** Drain `stream`, printing every turn and every follow-up stream. */
export const printTurns = async (
  stream: TurnStream,
  ctx: PrintContext,
): Promise<void> => {
  const { client, io, signal } = ctx;
  const stack: Frame[] = [
    { kind: 'stream', it: stream[Symbol.asyncIterator]() },
  ];
  const sw = new Stopwatch();

  try {
    while (stack.length > 0) {
      if (signal?.aborted) return;
      const top = stack[stack.length - 1];
      if (!top) break;

      if (top.kind === 'cards') {
        const card = top.pending.shift();
        if (!card) {
          stack.pop();
          continue;
        }
        const answers = await resolveAdaptiveCard(card.content, io);
        if (Object.keys(answers).length === 0) continue;
        io.writeLine(SENDING_INPUTS);
        const followUp = client.askQuestion(JSON.stringify(answers), {
          signal,
        });
        stack.push({ kind: 'stream', it: followUp[Symbol.asyncIterator]() });
        continue;
      }

      const next = await top.it.next();
      if (next.done) {
        stack.pop();
        continue;
      }
      turnTrace.turn('printer', sw.lap());
      const cards = printTurn(requireTurn(next.value, 'reply'), io);
      if (cards.length > 0) stack.push({ kind: 'cards', pending: cards });
    }
  } finally {
    await closeAll(stack);
  }
};
