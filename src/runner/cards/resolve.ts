/* src/runner/cards/resolve.ts
 * Prompt the operator for each Adaptive Card input and collect answers.
 */
import type { ConsoleIO } from '@/runner/console/io';
import { warn } from '@/runner/util/color';

import { type CardInput, parseAdaptiveCard } from './adaptive';

/** Field id to answer; a chosen option without a value answers null. */
export type CardAnswers = Record<string, string | number | null>;

export const MALFORMED_CARD_WARNING =
  '[!] Adaptive Card body is missing or malformed.';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Strict 32-bit integer parse (surrounding whitespace allowed).
 * Undefined for anything else.
 */
export const parseInteger = (s: string | null): number | undefined => {
  if (s === null) return undefined;
  const t = s.trim();
  if (!/^[+-]?\d+$/.test(t)) return undefined;
  const n = Number(t);
  return n >= INT32_MIN && n <= INT32_MAX ? n : undefined;
};

export const isYes = (s: string | null): boolean => {
  const t = (s ?? '').trim().toLowerCase();
  return t === 'yes' || t === 'y';
};

const askOne = async (
  input: CardInput,
  io: ConsoleIO,
  answers: CardAnswers,
): Promise<void> => {
  const { id, label } = input;
  switch (input.type) {
    case 'Input.Text': {
      const v = await io.readLine(`${label}: `);
      if (v !== null) answers[id] = v;
      return;
    }
    case 'Input.Number': {
      const n = parseInteger(await io.readLine(`${label} (number): `));
      if (n !== undefined) answers[id] = n;
      return;
    }
    case 'Input.ChoiceSet': {
      const { choices } = input;
      if (choices.length === 0) return;
      io.writeLine(`${label}:`);
      choices.forEach((c, i) => {
        io.writeLine(`  ${String(i + 1)}. ${c.title ?? ''}`);
      });
      const n = parseInteger(await io.readLine('Select option number: '));
      if (n === undefined || n < 1 || n > choices.length) return;
      answers[id] = choices[n - 1]?.value ?? null;
      return;
    }
    case 'Input.Toggle': {
      const v = await io.readLine(`${label} (yes/no): `);
      answers[id] = isYes(v)
        ? (input.valueOn ?? 'true')
        : (input.valueOff ?? 'false');
      return;
    }
    case 'Input.Date': {
      const v = await io.readLine(`${label} (yyyy-MM-dd): `);
      if (v !== null) answers[id] = v;
      return;
    }
    case 'Input.Time': {
      const v = await io.readLine(`${label} (HH:mm): `);
      if (v !== null) answers[id] = v;
      return;
    }
  }
};

/**
 * Resolve a card into operator answers. A malformed card prints a warning
 * and yields an empty answer set.
 */
export const resolveAdaptiveCard = async (
  content: unknown,
  io: ConsoleIO,
): Promise<CardAnswers> => {
  const answers: CardAnswers = {};
  const inputs = parseAdaptiveCard(content);
  if (inputs === null) {
    io.writeLine(warn(MALFORMED_CARD_WARNING));
    return answers;
  }
  for (const input of inputs) await askOne(input, io, answers);
  return answers;
};
