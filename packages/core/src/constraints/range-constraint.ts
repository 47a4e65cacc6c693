import type { ConstrainedValue, StatValue } from '../values/stat-value.js';
import { FloorConstraint } from './floor-constraint.js';

/**
 * Keeps the protected value within `[min, max]`. When the bounds are
 * inverted (`min > max`) the result is `min`.
 */
export class RangeConstraint extends FloorConstraint {
  readonly max: StatValue;

  constructor(min: StatValue, current: ConstrainedValue, max: StatValue) {
    super(min, current);
    this.max = max;
    this.listenTo(max);
  }

  override apply(amount: number): number {
    const lower = this.min.amount;
    const upper = this.max.amount;
    if (lower > upper) {
      return lower;
    }
    return Math.min(Math.max(amount, lower), upper);
  }
}
