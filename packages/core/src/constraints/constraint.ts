/**
 * A clamp rule attached to a constrained value. `apply` must be pure; a
 * constraint that depends on other values listens to them and asks its
 * protected value to recalculate when they change.
 */
export interface Constraint {
  apply(amount: number): number;
  /** Stops listening to dependencies. Safe to call more than once. */
  dispose(): void;
}
