/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugFallback notices.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** config loader (no config file found; built-ins in effect) */
export const DBG_SCOPE_CONFIG_LOAD = 'cli.config:load';

/** mode selector (timer won the race against operator input) */
export const DBG_SCOPE_MODE_TIMEOUT = 'session.mode:timeout';

/** adaptive card parser (content was a JSON string, not an object) */
export const DBG_SCOPE_CARD_STRING = 'cards.adaptive:string-content';

/** adaptive card resolver (input element without an id was skipped) */
export const DBG_SCOPE_CARD_NO_ID = 'cards.adaptive:missing-id';

/** batch driver (remaining start-conversation turns discarded) */
export const DBG_SCOPE_BATCH_START_DISCARD = 'batch.run:start-discard';

/** batch results (field truncated at the cell character limit) */
export const DBG_SCOPE_BATCH_TRUNCATE = 'batch.results:truncate';

/** agent adapter (SDK returned a non-array reply) */
export const DBG_SCOPE_AGENT_SINGLE_REPLY = 'agent.copilot:single-reply';

/** console port (line arrived after its read was abandoned) */
export const DBG_SCOPE_IO_STALE_LINE = 'console.io:stale-line';
