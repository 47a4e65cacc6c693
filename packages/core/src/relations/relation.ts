import type { StatSystem } from '../stat-system.js';

/**
 * Cross-stat wiring owned by a {@link StatSystem}. The system attaches a
 * relation when it is added and detaches it when it is removed.
 */
export abstract class Relation {
  readonly system: StatSystem;

  protected constructor(system: StatSystem) {
    this.system = system;
  }

  abstract attach(): void;
  abstract detach(): void;
  /** Short label for diagnostics. */
  abstract describe(): string;
}
