/** Scripted ConsoleIO for driver tests.
 * Answers are consumed in order; once exhausted, reads resolve null (EOF)
 * unless `hangWhenEmpty` is set, in which case they wait for an abort.
 */
import type { ConsoleIO, ReadLineOptions } from '@/runner/console/io';

export class FakeConsole implements ConsoleIO {
  public output = '';
  public prompts: string[] = [];
  public closed = false;
  private readonly answers: string[];

  constructor(
    answers: string[] = [],
    private readonly hangWhenEmpty = false,
  ) {
    this.answers = [...answers];
  }

  public write(text: string): void {
    this.output += text;
  }

  public writeLine(text = ''): void {
    this.output += `${text}\n`;
  }

  public readLine(
    prompt?: string,
    options?: ReadLineOptions,
  ): Promise<string | null> {
    if (prompt) {
      this.prompts.push(prompt);
      this.output += prompt;
    }
    const next = this.answers.shift();
    if (next !== undefined) return Promise.resolve(next);
    const signal = options?.signal;
    if (!this.hangWhenEmpty || !signal || signal.aborted)
      return Promise.resolve(null);
    return new Promise((resolve) => {
      signal.addEventListener(
        'abort',
        () => {
          resolve(null);
        },
        { once: true },
      );
    });
  }

  public close(): void {
    this.closed = true;
  }

  /** Output split into lines. */
  public lines(): string[] {
    return this.output.split('\n');
  }
}
