/* src/runner/cards/adaptive.ts
 * Extract the input fields of an Adaptive Card in document order.
 */
import { z } from 'zod';

import { isRecord } from '@/common/guards';
import { debugFallback } from '@/runner/util/debug';
import {
  DBG_SCOPE_CARD_NO_ID,
  DBG_SCOPE_CARD_STRING,
} from '@/runner/util/debug-scopes';

export type CardChoice = { title?: string; value?: string };

type InputBase = { id: string; label: string };

export type CardInput =
  | (InputBase & { type: 'Input.Text' | 'Input.Date' | 'Input.Time' })
  | (InputBase & { type: 'Input.Number' })
  | (InputBase & { type: 'Input.ChoiceSet'; choices: CardChoice[] })
  | (InputBase & {
      type: 'Input.Toggle';
      valueOn?: string;
      valueOff?: string;
    });

/** Scalars are rendered the way a JSON node prints them. */
const text = z
  .unknown()
  .transform((v) =>
    typeof v === 'string'
      ? v
      : typeof v === 'number' || typeof v === 'boolean'
        ? String(v)
        : undefined,
  );

const elementSchema = z
  .object({
    type: text,
    id: text,
    label: text,
    placeholder: text,
    valueOn: text,
    valueOff: text,
    choices: z.unknown(),
    items: z.unknown(),
    columns: z.unknown(),
  })
  .partial()
  .passthrough();

const choiceSchema = z.object({ title: text, value: text }).partial();

const cardSchema = z.object({ body: z.array(z.unknown()) }).passthrough();

const INPUT_TYPES = new Set([
  'Input.Text',
  'Input.Number',
  'Input.ChoiceSet',
  'Input.Toggle',
  'Input.Date',
  'Input.Time',
]);

const readChoices = (node: unknown): CardChoice[] => {
  if (!Array.isArray(node)) return [];
  return node.map((c) => {
    const parsed = choiceSchema.safeParse(isRecord(c) ? c : {});
    return parsed.success ? parsed.data : {};
  });
};

const toInput = (
  el: z.infer<typeof elementSchema>,
  type: string,
  id: string,
): CardInput | null => {
  const label = el.label ?? el.placeholder ?? id;
  switch (type) {
    case 'Input.Text':
    case 'Input.Date':
    case 'Input.Time':
      return { type, id, label };
    case 'Input.Number':
      return { type, id, label };
    case 'Input.ChoiceSet':
      return { type, id, label, choices: readChoices(el.choices) };
    case 'Input.Toggle':
      return { type, id, label, valueOn: el.valueOn, valueOff: el.valueOff };
    default:
      return null;
  }
};

/** Depth-first walk of body elements, descending into layout containers. */
const collect = (elements: unknown[], out: CardInput[]): void => {
  for (const node of elements) {
    if (!isRecord(node)) continue;
    const parsed = elementSchema.safeParse(node);
    if (!parsed.success) continue;
    const el = parsed.data;
    const type = el.type ?? '';
    if (INPUT_TYPES.has(type)) {
      const id = el.id ?? '';
      if (id.trim().length === 0) {
        debugFallback(DBG_SCOPE_CARD_NO_ID, `skipping ${type} without id`);
        continue;
      }
      const input = toInput(el, type, id);
      if (input) out.push(input);
      continue;
    }
    if (Array.isArray(el.items)) collect(el.items, out);
    if (Array.isArray(el.columns)) collect(el.columns, out);
  }
};

/**
 * Parse attachment content (object or JSON text) into its input fields.
 * Returns null when the card or its `body` is missing or malformed.
 */
export const parseAdaptiveCard = (content: unknown): CardInput[] | null => {
  let node = content;
  if (typeof content === 'string') {
    debugFallback(DBG_SCOPE_CARD_STRING, 'parsing card from JSON text');
    try {
      node = JSON.parse(content);
    } catch {
      return null;
    }
  }
  const parsed = cardSchema.safeParse(node);
  if (!parsed.success) return null;
  const inputs: CardInput[] = [];
  collect(parsed.data.body, inputs);
  return inputs;
};
