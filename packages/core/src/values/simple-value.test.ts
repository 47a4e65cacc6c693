import { describe, expect, it, vi } from 'vitest';

import type { Constraint } from '../constraints/constraint.js';
import { FloorConstraint } from '../constraints/floor-constraint.js';
import { PlainValue } from './plain-value.js';
import { SimpleValue } from './simple-value.js';

const clampTo = (limit: number): Constraint => ({
  apply: (amount) => Math.min(amount, limit),
  dispose: () => {},
});

const offsetBy = (delta: number): Constraint => ({
  apply: (amount) => amount + delta,
  dispose: () => {},
});

describe('SimpleValue', () => {
  it('folds writes through constraints in registration order', () => {
    const value = new SimpleValue(0);
    value.addConstraint(clampTo(10));
    value.addConstraint(offsetBy(5));

    value.setAmount(20);

    // min(20, 10) + 5
    expect(value.amount).toBe(15);
  });

  it('re-applies the chain when a constraint is added', () => {
    const value = new SimpleValue(40);
    const listener = vi.fn();
    value.subscribe(listener);

    value.addConstraint(clampTo(25));

    expect(value.amount).toBe(25);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('recalculates after removing a constraint and ignores unknown ones', () => {
    const value = new SimpleValue(10);
    const offset = offsetBy(1);
    value.addConstraint(offset);
    expect(value.amount).toBe(11);

    value.removeConstraint(offsetBy(1));
    expect(value.constraints).toEqual([offset]);
    expect(value.amount).toBe(11);

    value.removeConstraint(offset);
    // The chain is empty, so re-submitting 11 changes nothing.
    expect(value.constraints).toEqual([]);
    expect(value.amount).toBe(11);
  });

  it('picks up drift when recalculated after a dependency moved', () => {
    const min = new PlainValue(0);
    const value = new SimpleValue(5);
    value.addConstraint(new FloorConstraint(min, value));

    min.setAmount(8);
    expect(value.amount).toBe(8);

    min.setAmount(2);
    // The floor only lifts values; lowering it leaves the amount in place.
    expect(value.amount).toBe(8);
  });

  it('does not notify when recalculation leaves the amount unchanged', () => {
    const value = new SimpleValue(3);
    value.addConstraint(clampTo(10));
    const listener = vi.fn();
    value.subscribe(listener);

    value.recalculateAmount();

    expect(listener).not.toHaveBeenCalled();
  });

  it('commits the clamped amount only', () => {
    const value = new SimpleValue(5);
    value.addConstraint(clampTo(5));
    const listener = vi.fn();
    value.subscribe(listener);

    value.setAmount(9);

    expect(value.amount).toBe(5);
    expect(listener).not.toHaveBeenCalled();
  });
});
