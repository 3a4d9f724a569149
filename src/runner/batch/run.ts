/* src/runner/batch/run.ts
 * Batch mode: ask every question from the input workbook and write one
 * result row per question to a new workbook.
 */
import path from 'node:path';

import { type AgentClient, requireTurn, type Turn } from '@/runner/agent/types';
import type { ConsoleIO } from '@/runner/console/io';
import { agent, error, ok, user } from '@/runner/util/color';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_BATCH_START_DISCARD } from '@/runner/util/debug-scopes';
import { Stopwatch, turnTrace } from '@/runner/util/trace';

import {
  DEFAULT_INPUT_FILE,
  DEFAULT_SHEET_NAME,
  readQuestions,
} from './questions';
import {
  type ResultRow,
  ResultsWorkbook,
  SYSTEM_START_QUESTION,
} from './results';

export const NO_QUESTIONS_MESSAGE = 'No questions found in the Excel file.';

export type BatchOptions = {
  client: AgentClient;
  io: ConsoleIO;
  /** Output file name, computed once at startup. */
  outputFileName: string;
  inputFile?: string;
  sheetName?: string;
  outputDir?: string;
  now?: () => Date;
  signal?: AbortSignal;
};

export type BatchSummary = {
  outputPath: string;
  questions: number;
  /** Data rows written (system start row included). */
  rows: number;
};

/** Pretty-printed raw activity, one per turn, each followed by a newline. */
const logEntry = (turn: Turn): string =>
  `${JSON.stringify(turn.raw, null, 2)}\n`;

/** First turn of the start stream; the remainder is discarded. */
const firstStartTurn = async (
  client: AgentClient,
  signal?: AbortSignal,
): Promise<Turn | undefined> => {
  for await (const turn of client.startConversation({
    emitStartConversationEvent: true,
    signal,
  })) {
    debugFallback(DBG_SCOPE_BATCH_START_DISCARD, 'keeping first turn only');
    return requireTurn(turn, 'conversation start');
  }
  return undefined;
};

const askOne = async (
  question: string,
  options: BatchOptions,
): Promise<Omit<ResultRow, 'timestamp'>> => {
  const { client, io, signal } = options;
  let response = '';
  let responseLog = '';
  const conversationIds: string[] = [];
  const sw = new Stopwatch();

  for await (const maybe of client.askQuestion(question, { signal })) {
    turnTrace.turn('batch', sw.lap());
    const turn = requireTurn(maybe, 'batch question');
    if (turn.text) {
      io.writeLine(`${agent('Agent>')} ${turn.text}`);
      response += `${turn.text}\n`;
    }
    responseLog += logEntry(turn);
    const id = turn.conversationId;
    if (id && !conversationIds.includes(id)) conversationIds.push(id);
  }
  return {
    question,
    response,
    responseLog,
    conversationId: conversationIds.join(','),
  };
};

/**
 * Run the batch. Returns null when there is nothing to do (missing input,
 * missing sheet, no questions); those cases are reported on the console.
 */
export const runBatch = async (
  options: BatchOptions,
): Promise<BatchSummary | null> => {
  const {
    client,
    io,
    outputFileName,
    inputFile = DEFAULT_INPUT_FILE,
    sheetName = DEFAULT_SHEET_NAME,
    outputDir = process.cwd(),
    now = () => new Date(),
    signal,
  } = options;

  const read = await readQuestions(inputFile, sheetName);
  if (!read.ok) {
    io.writeLine(error(read.message));
    return null;
  }
  const { questions } = read;
  if (questions.length === 0) {
    io.writeLine(error(NO_QUESTIONS_MESSAGE));
    return null;
  }

  const results = new ResultsWorkbook();

  const first = await firstStartTurn(client, signal);
  if (first) {
    io.writeLine(`${agent('Agent>')} ${first.text ?? ''}`);
    results.add({
      question: SYSTEM_START_QUESTION,
      response: first.text ?? '',
      conversationId: first.conversationId ?? '',
      timestamp: now(),
      responseLog: logEntry(first),
    });
  }

  let asked = 0;
  for (const [i, question] of questions.entries()) {
    if (signal?.aborted) break;
    io.writeLine(
      `\nAsking question ${String(i + 1)} of ${String(questions.length)}`,
    );
    io.writeLine(`${user('User>')} ${question}`);
    const row = await askOne(question, options);
    results.add({ ...row, timestamp: now() });
    asked += 1;
  }

  const outputPath = path.join(outputDir, outputFileName);
  await results.save(outputPath);
  io.writeLine(ok(`\nResults saved to ${outputPath}`));
  return { outputPath, questions: asked, rows: results.size };
};
