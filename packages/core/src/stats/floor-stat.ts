import { FloorConstraint } from '../constraints/floor-constraint.js';
import type { Constraint } from '../constraints/constraint.js';
import type { StatSystem } from '../stat-system.js';
import type { ConstrainedValue, StatValue } from '../values/stat-value.js';
import { Stat } from './stat.js';

export interface FloorStatValues<TCurrent extends ConstrainedValue = ConstrainedValue> {
  readonly min: StatValue;
  readonly current: TCurrent;
}

/** A stat whose current value never drops below its minimum value. */
export class FloorStat<
  TCurrent extends ConstrainedValue = ConstrainedValue,
> extends Stat {
  readonly min: StatValue;
  readonly current: TCurrent;

  protected constraint: Constraint | undefined;

  constructor(system: StatSystem, name: string, values: FloorStatValues<TCurrent>) {
    super(system, name);
    this.min = values.min;
    this.current = values.current;
    this.claim([values.min, values.current]);
  }

  get values(): readonly StatValue[] {
    return [this.min, this.current];
  }

  override dispose(): void {
    if (this.constraint === undefined) {
      return;
    }
    this.current.removeConstraint(this.constraint);
    this.constraint.dispose();
    this.constraint = undefined;
  }

  protected wireConstraints(): void {
    this.constraint = new FloorConstraint(this.min, this.current);
    this.current.addConstraint(this.constraint);
  }
}
