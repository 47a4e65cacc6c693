import { z } from 'zod';

import { valueRefSchema } from '../base/names.js';
import { modifierPrioritySchema, statAmountSchema } from '../base/numbers.js';

const modifierRelationSchema = z
  .object({
    kind: z.literal('modifier'),
    source: valueRefSchema,
    target: valueRefSchema,
    /** Multiplier applied to the source amount. */
    scale: statAmountSchema.default(1),
    priority: modifierPrioritySchema.default(0),
    final: z.enum(['add', 'multiply', 'percent'] as const).default('add'),
  })
  .strict()
  .refine((relation) => relation.source !== relation.target, {
    message: 'A relation cannot feed a value into itself.',
    path: ['target'],
  });

export const relationDefinitionSchema = modifierRelationSchema;

export type RelationDefinition = z.infer<typeof relationDefinitionSchema>;
export type RelationDefinitionInput = z.input<typeof relationDefinitionSchema>;
