import { z } from 'zod';

const STAT_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]{0,63}$/;
const VALUE_REF_PATTERN = /^([A-Za-z][A-Za-z0-9_-]{0,63})(?:\.(min|current|max))?$/;

export type ValueSlot = 'min' | 'current' | 'max';

export interface ParsedValueRef {
  readonly stat: string;
  /** Omitted slots point at the stat's primary value. */
  readonly slot?: ValueSlot;
}

export const statNameSchema = z
  .string()
  .trim()
  .regex(STAT_NAME_PATTERN, {
    message:
      'Stat names must start with a letter and may contain letters, digits, "_" or "-" (at most 64 characters).',
  });

export const valueRefSchema = z
  .string()
  .trim()
  .regex(VALUE_REF_PATTERN, {
    message: 'Value references must look like "stat" or "stat.min|current|max".',
  });

const isValueSlot = (value: string): value is ValueSlot =>
  value === 'min' || value === 'current' || value === 'max';

/**
 * Splits a value reference into stat name and slot. Returns `undefined` for
 * strings that {@link valueRefSchema} would reject.
 */
export function parseValueRef(ref: string): ParsedValueRef | undefined {
  const match = VALUE_REF_PATTERN.exec(ref.trim());
  if (!match) {
    return undefined;
  }
  const [, stat, slot] = match;
  if (stat === undefined) {
    return undefined;
  }
  return slot !== undefined && isValueSlot(slot) ? { stat, slot } : { stat };
}
