/* src/runner/agent/types.ts
 * Turn shapes read by the runner and the agent client boundary.
 */

export const ADAPTIVE_CARD_CONTENT_TYPE =
  'application/vnd.microsoft.card.adaptive';

export type TurnType = 'message' | 'typing' | 'event' | (string & {});

export type SuggestedAction = {
  text?: string;
  title?: string;
  value?: unknown;
};

export type Attachment = {
  contentType: string;
  content?: unknown;
  name?: string;
};

/** One activity as the runner sees it. `raw` is the activity as received. */
export type Turn = {
  type: TurnType;
  id?: string;
  text?: string;
  suggestedActions?: SuggestedAction[];
  attachments?: Attachment[];
  conversationId?: string;
  raw: unknown;
};

/** Lazy, forward-only turn sequence; the SDK may surface null entries. */
export type TurnStream = AsyncIterable<Turn | null>;

export type StartConversationOptions = {
  emitStartConversationEvent?: boolean;
  signal?: AbortSignal;
};

export type AskQuestionOptions = {
  /** Conversation to address; the client falls back to its current one. */
  conversationId?: string;
  signal?: AbortSignal;
};

/** The three capabilities the runner depends on. */
export interface AgentClient {
  startConversation(options?: StartConversationOptions): TurnStream;
  askQuestion(question: string, options?: AskQuestionOptions): TurnStream;
}

export class AgentProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentProtocolError';
  }
}

/** Null turns are an invariant violation; fail the run. */
export const requireTurn = (turn: Turn | null, where: string): Turn => {
  if (turn === null)
    throw new AgentProtocolError(`received a null activity during ${where}`);
  return turn;
};
