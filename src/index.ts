/** Library entry point. */
export * from './runner/agent/types';
export { CopilotStudioAgentClient } from './runner/agent/copilot-studio';
export type { CopilotStudioSdk } from './runner/agent/copilot-studio';
export { normalizeActivity } from './runner/agent/normalize';
export { parseAdaptiveCard } from './runner/cards/adaptive';
export type { CardChoice, CardInput } from './runner/cards/adaptive';
export { resolveAdaptiveCard } from './runner/cards/resolve';
export type { CardAnswers } from './runner/cards/resolve';
export { createConsoleIO } from './runner/console/io';
export type { ConsoleIO, ReadLineOptions } from './runner/console/io';
export { printTurns } from './runner/printer/print';
export { runInteractive } from './runner/interactive/run';
export { runBatch } from './runner/batch/run';
export type { BatchOptions, BatchSummary } from './runner/batch/run';
export { readQuestions } from './runner/batch/questions';
export {
  CELL_CHARACTER_LIMIT,
  ResultsWorkbook,
  resultsFileName,
  truncateCell,
} from './runner/batch/results';
export { selectMode } from './runner/session/mode';
export type { RunMode } from './runner/session/mode';
export { runSession } from './runner/session/run-session';
export type {
  SessionOptions,
  SessionResult,
} from './runner/session/run-session';
export { makeCli } from './cli';
