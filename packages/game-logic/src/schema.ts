/**
 * Client frames are untrusted text. Everything that reaches the rules
 * engine passes through one of these schemas first.
 */

import { z } from 'zod';
import type { RawInput } from './types.js';

const HandSlotSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

const RotationSchema = z.union([z.literal(0), z.literal(90), z.literal(180), z.literal(270)]);

const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('pass') }),
  z.object({
    type: z.literal('place'),
    x: z.number().int(),
    y: z.number().int(),
    special: z.boolean(),
    rotation: RotationSchema,
  }),
]);

export const RawInputSchema = z.object({
  handSlot: HandSlotSchema,
  action: ActionSchema,
}) satisfies z.ZodType<RawInput>;

// Redraw and rematch answers are bare JSON booleans
export const ChoiceSchema = z.boolean();

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

/** Parses `text` as JSON and validates it against `schema`. Never throws. */
export function parseMessage<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string): ParseResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return { success: false, error: err instanceof Error ? err.message : String(err) };
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    return {
      success: false,
      error: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
    };
  }
  return { success: true, data: result.data };
}
