import { z } from 'zod';

import { valueRefSchema } from '../base/names.js';
import { statAmountSchema } from '../base/numbers.js';

const amountValueSchema = <TKind extends 'plain' | 'simple' | 'floating' | 'constant'>(
  kind: TKind,
) =>
  z
    .object({
      kind: z.literal(kind),
      amount: statAmountSchema.default(0),
    })
    .strict();

const newValueSchema = z.discriminatedUnion('kind', [
  amountValueSchema('plain'),
  amountValueSchema('simple'),
  amountValueSchema('floating'),
  amountValueSchema('constant'),
  z
    .object({
      kind: z.literal('elastic'),
      base: statAmountSchema,
    })
    .strict(),
]);

const valueRefDefinitionSchema = z
  .object({
    ref: valueRefSchema,
  })
  .strict();

/**
 * Either a new value (`{ kind, amount }`, `{ kind: 'elastic', base }`) or a
 * reference to a value declared by an earlier stat (`{ ref }`).
 */
export const valueDefinitionSchema = z.union([
  newValueSchema,
  valueRefDefinitionSchema,
]);

export type NewValueDefinition = z.infer<typeof newValueSchema>;
export type ValueRefDefinition = z.infer<typeof valueRefDefinitionSchema>;
export type ValueDefinition = z.infer<typeof valueDefinitionSchema>;
export type ValueDefinitionInput = z.input<typeof valueDefinitionSchema>;
export type ValueDefinitionKind = NewValueDefinition['kind'];

export const isValueRef = (
  definition: ValueDefinition,
): definition is ValueRefDefinition => 'ref' in definition;
