import { RangeConstraint } from '../constraints/range-constraint.js';
import type { StatSystem } from '../stat-system.js';
import type { ConstrainedValue, StatValue } from '../values/stat-value.js';
import { FloorStat, type FloorStatValues } from './floor-stat.js';

export interface RangeStatValues<TCurrent extends ConstrainedValue = ConstrainedValue>
  extends FloorStatValues<TCurrent> {
  readonly max: StatValue;
}

/** A stat whose current value stays between its minimum and maximum values. */
export class RangeStat<
  TCurrent extends ConstrainedValue = ConstrainedValue,
> extends FloorStat<TCurrent> {
  readonly max: StatValue;

  constructor(system: StatSystem, name: string, values: RangeStatValues<TCurrent>) {
    super(system, name, values);
    this.max = values.max;
    this.claim([values.max]);
  }

  override get values(): readonly StatValue[] {
    return [this.min, this.current, this.max];
  }

  protected override wireConstraints(): void {
    this.constraint = new RangeConstraint(this.min, this.current, this.max);
    this.current.addConstraint(this.constraint);
  }
}
