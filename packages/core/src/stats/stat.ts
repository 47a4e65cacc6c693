import { telemetry } from '../telemetry.js';
import type { StatSystem } from '../stat-system.js';
import type { StatValue } from '../values/stat-value.js';

/**
 * A named group of values owned by a {@link StatSystem}. Subclasses wire the
 * constraints between their values in {@link Stat.wireConstraints}, which the
 * system runs once, after every participating value exists.
 */
export abstract class Stat {
  readonly name: string;
  readonly system: StatSystem;

  private constraintsInitialized = false;

  protected constructor(system: StatSystem, name: string) {
    this.name = name;
    this.system = system;
  }

  /** Every value the stat composes, owned or borrowed. */
  abstract get values(): readonly StatValue[];

  get initialized(): boolean {
    return this.constraintsInitialized;
  }

  /**
   * Attaches the stat's constraints. Runs once; later calls are reported and
   * ignored.
   */
  initConstraints(): void {
    if (this.constraintsInitialized) {
      telemetry.recordWarning('StatConstraintsAlreadyInitialized', {
        stat: this.name,
      });
      return;
    }
    this.constraintsInitialized = true;
    this.wireConstraints();
    telemetry.recordProgress('StatConstraintsInitialized', { stat: this.name });
  }

  /** Disposes constraints created by {@link wireConstraints}. */
  dispose(): void {}

  protected abstract wireConstraints(): void;

  /** Claims every value that no other stat owns yet. */
  protected claim(values: readonly StatValue[]): void {
    for (const value of values) {
      value.bindStat(this);
    }
  }
}
