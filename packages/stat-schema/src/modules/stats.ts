import { z } from 'zod';

import { statNameSchema } from '../base/names.js';
import { valueDefinitionSchema, type ValueDefinition } from './values.js';

const CONSTANT_CURRENT_MESSAGE =
  'Bounded stats need a current value that accepts constraints (simple, floating, elastic or a reference).';

const constrainableValueSchema = valueDefinitionSchema.refine(
  (definition: ValueDefinition) =>
    'ref' in definition ||
    definition.kind === 'simple' ||
    definition.kind === 'floating' ||
    definition.kind === 'elastic',
  { message: CONSTANT_CURRENT_MESSAGE },
);

const singleStatSchema = z
  .object({
    kind: z.literal('single'),
    name: statNameSchema,
    value: valueDefinitionSchema,
  })
  .strict();

const floorStatSchema = z
  .object({
    kind: z.literal('floor'),
    name: statNameSchema,
    min: valueDefinitionSchema,
    current: constrainableValueSchema,
  })
  .strict();

const rangeStatSchema = z
  .object({
    kind: z.literal('range'),
    name: statNameSchema,
    min: valueDefinitionSchema,
    current: constrainableValueSchema,
    max: valueDefinitionSchema,
  })
  .strict();

export const statDefinitionSchema = z.discriminatedUnion('kind', [
  singleStatSchema,
  floorStatSchema,
  rangeStatSchema,
]);

export const statCollectionSchema = z
  .array(statDefinitionSchema)
  .min(1, { message: 'Stat sheets must declare at least one stat.' })
  .superRefine((stats, ctx) => {
    const seen = new Map<string, number>();
    stats.forEach((stat, index) => {
      const existingIndex = seen.get(stat.name);
      if (existingIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `Duplicate stat name "${stat.name}" also defined at index ${existingIndex}.`,
        });
      } else {
        seen.set(stat.name, index);
      }
    });
  });

export type StatDefinition = z.infer<typeof statDefinitionSchema>;
export type StatDefinitionInput = z.input<typeof statDefinitionSchema>;
export type StatDefinitionKind = StatDefinition['kind'];
