import type { StatSystem } from '../stat-system.js';
import type { StatValue } from '../values/stat-value.js';
import { Stat } from './stat.js';

/** A stat made of one unbounded value. */
export class SingleStat<TValue extends StatValue = StatValue> extends Stat {
  readonly value: TValue;

  constructor(system: StatSystem, name: string, value: TValue) {
    super(system, name);
    this.value = value;
    this.claim([value]);
  }

  get values(): readonly StatValue[] {
    return [this.value];
  }

  protected wireConstraints(): void {}
}
