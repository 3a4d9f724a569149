/** In-process AgentClient stand-in with scripted replies. */
import { normalizeActivity } from '@/runner/agent/normalize';
import type {
  AgentClient,
  AskQuestionOptions,
  StartConversationOptions,
  Turn,
  TurnStream,
} from '@/runner/agent/types';

/** Raw activity literal, as the SDK would hand it over. */
export type RawActivity = Record<string, unknown> | null;

export const message = (
  text: string,
  extra: Record<string, unknown> = {},
): Record<string, unknown> => ({ type: 'message', text, ...extra });

async function* replay(raws: RawActivity[]): AsyncGenerator<Turn | null> {
  for (const raw of raws) yield normalizeActivity(raw);
}

export class FakeAgentClient implements AgentClient {
  public readonly questions: string[] = [];
  public startCalls = 0;
  /** Turns of the start stream the consumer actually pulled. */
  public startPulled = 0;

  constructor(
    private readonly start: RawActivity[],
    /** Reply per question text; falls back to `defaultReply`. */
    private readonly replies: Record<string, RawActivity[]> = {},
    private readonly defaultReply: RawActivity[] = [],
  ) {}

  public startConversation(_options?: StartConversationOptions): TurnStream {
    this.startCalls += 1;
    return this.pullStart();
  }

  private async *pullStart(): AsyncGenerator<Turn | null> {
    for (const raw of this.start) {
      this.startPulled += 1;
      yield normalizeActivity(raw);
    }
  }

  public askQuestion(
    question: string,
    _options?: AskQuestionOptions,
  ): TurnStream {
    this.questions.push(question);
    return replay(this.replies[question] ?? this.defaultReply);
  }
}
