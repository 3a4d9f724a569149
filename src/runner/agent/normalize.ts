/* src/runner/agent/normalize.ts
 * Read the fields the runner needs from an SDK activity without depending
 * on the SDK's classes. Unknown extra fields are kept in `raw` only.
 */
import { z } from 'zod';

import type { Turn } from './types';

const optionalString = z
  .union([z.string(), z.null()])
  .optional()
  .transform((v) => (typeof v === 'string' ? v : undefined));

const suggestedActionSchema = z
  .object({
    text: optionalString,
    title: optionalString,
    value: z.unknown().optional(),
  })
  .passthrough();

const attachmentSchema = z
  .object({
    contentType: z.string(),
    content: z.unknown().optional(),
    name: optionalString,
  })
  .passthrough();

const activitySchema = z
  .object({
    type: z.string().min(1),
    id: optionalString,
    text: optionalString,
    suggestedActions: z
      .object({
        actions: z.array(suggestedActionSchema).nullish(),
      })
      .passthrough()
      .nullish(),
    attachments: z.array(attachmentSchema).nullish(),
    conversation: z.object({ id: optionalString }).passthrough().nullish(),
  })
  .passthrough();

/**
 * Normalize one raw activity. Returns null for null/undefined input so the
 * caller decides how to treat it; throws when the shape has no `type`.
 */
export const normalizeActivity = (raw: unknown): Turn | null => {
  if (raw === null || raw === undefined) return null;
  const parsed = activitySchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`unrecognized activity shape (${detail})`);
  }
  const a = parsed.data;
  const turn: Turn = { type: a.type, raw };
  if (a.id !== undefined) turn.id = a.id;
  if (a.text !== undefined) turn.text = a.text;
  const actions = a.suggestedActions?.actions;
  if (actions && actions.length > 0)
    turn.suggestedActions = actions.map(({ text, title, value }) => ({
      text,
      title,
      value,
    }));
  if (a.attachments && a.attachments.length > 0)
    turn.attachments = a.attachments.map(({ contentType, content, name }) => ({
      contentType,
      content,
      name,
    }));
  const conversationId = a.conversation?.id;
  if (conversationId !== undefined) turn.conversationId = conversationId;
  return turn;
};
