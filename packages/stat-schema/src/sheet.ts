import { z } from 'zod';

import { StatSheetSchemaError } from './errors.js';
import { relationDefinitionSchema } from './modules/relations.js';
import { statCollectionSchema } from './modules/stats.js';

export const statSheetSchema = z
  .object({
    stats: statCollectionSchema,
    relations: z.array(relationDefinitionSchema).default([]),
  })
  .strict();

export type StatSheet = z.infer<typeof statSheetSchema>;
export type StatSheetInput = z.input<typeof statSheetSchema>;

export type StatSheetValidationResult =
  | { readonly success: true; readonly sheet: StatSheet }
  | { readonly success: false; readonly issues: readonly z.ZodIssue[] };

export function validateStatSheet(input: unknown): StatSheetValidationResult {
  const result = statSheetSchema.safeParse(input);
  if (result.success) {
    return { success: true, sheet: result.data };
  }
  return { success: false, issues: result.error.issues };
}

/** Parses `input` into a stat sheet or throws {@link StatSheetSchemaError}. */
export function parseStatSheet(input: unknown): StatSheet {
  const result = validateStatSheet(input);
  if (!result.success) {
    throw new StatSheetSchemaError(result.issues);
  }
  return result.sheet;
}
