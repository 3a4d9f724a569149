/* src/runner/agent/copilot-studio.ts
 * AgentClient over the Copilot Studio client SDK. The SDK resolves each
 * call to a batch of activities; they are surfaced one at a time.
 */
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_AGENT_SINGLE_REPLY } from '@/runner/util/debug-scopes';

import { normalizeActivity } from './normalize';
import type {
  AgentClient,
  AskQuestionOptions,
  StartConversationOptions,
  Turn,
  TurnStream,
} from './types';

/** The slice of `CopilotStudioClient` the adapter calls. */
export interface CopilotStudioSdk {
  startConversationAsync(
    emitStartConversationEvent?: boolean,
  ): Promise<unknown>;
  askQuestionAsync(
    question: string,
    conversationId?: string,
  ): Promise<unknown>;
}

const toList = (reply: unknown): unknown[] => {
  if (Array.isArray(reply)) return reply;
  debugFallback(DBG_SCOPE_AGENT_SINGLE_REPLY, 'wrapping single activity');
  return [reply];
};

async function* streamOf(
  call: () => Promise<unknown>,
  signal?: AbortSignal,
): AsyncGenerator<Turn | null> {
  if (signal?.aborted) return;
  const reply = await call();
  for (const raw of toList(reply)) {
    if (signal?.aborted) return;
    yield normalizeActivity(raw);
  }
}

export class CopilotStudioAgentClient implements AgentClient {
  constructor(private readonly sdk: CopilotStudioSdk) {}

  public startConversation(
    options: StartConversationOptions = {},
  ): TurnStream {
    const emit = options.emitStartConversationEvent ?? true;
    return streamOf(
      () => this.sdk.startConversationAsync(emit),
      options.signal,
    );
  }

  public askQuestion(
    question: string,
    options: AskQuestionOptions = {},
  ): TurnStream {
    const { conversationId, signal } = options;
    return streamOf(
      () =>
        conversationId === undefined
          ? this.sdk.askQuestionAsync(question)
          : this.sdk.askQuestionAsync(question, conversationId),
      signal,
    );
  }
}
