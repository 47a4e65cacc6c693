import { z } from 'zod';

/**
 * A stat amount, modifier amount or relation scale. Numeric strings are
 * coerced so hand-written sheets may quote amounts; the result must be
 * finite, since every value in the engine folds through arithmetic.
 */
export const statAmountSchema = z.coerce
  .number()
  .refine(Number.isFinite, { message: 'Stat amounts must be finite numbers.' });

/** Modifier priority groups are whole numbers; lower groups fold first. */
export const modifierPrioritySchema = z.coerce
  .number()
  .int({ message: 'Modifier priorities must be whole numbers.' });
