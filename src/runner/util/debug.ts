/* src/runner/util/debug.ts
 * Centralized, opt-in debug logger for fallback paths.
 * Emits only when AGENT_CONSOLE_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugEnabled = (): boolean =>
  process.env.AGENT_CONSOLE_DEBUG === '1';

/** Log a concise fallback notice (scope: module:function; reason/message). */
export const debugFallback = (scope: string, reason: string): void => {
  if (!debugEnabled()) return;
  // stderr to keep separation from normal output
  console.error(`agent-console: debug: ${scope}: ${reason}`);
};
