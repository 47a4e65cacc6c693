import type { Constraint } from '../constraints/constraint.js';
import { StatValueBase } from './stat-value.js';

/**
 * Shared shape of the variants that fold writes through an ordered list of
 * constraints. Variants decide what `recalculateAmount` re-submits.
 */
export abstract class ConstraintChainValue extends StatValueBase {
  private readonly chain: Constraint[] = [];

  get constraints(): readonly Constraint[] {
    return this.chain;
  }

  /** Appends a constraint and immediately re-applies the chain. */
  addConstraint(constraint: Constraint): void {
    this.chain.push(constraint);
    this.recalculateAmount();
  }

  /** Removes the first identity match, then re-applies the chain. */
  removeConstraint(constraint: Constraint): void {
    const index = this.chain.indexOf(constraint);
    if (index === -1) {
      return;
    }
    this.chain.splice(index, 1);
    this.recalculateAmount();
  }

  abstract recalculateAmount(): void;

  protected applyConstraints(amount: number): number {
    let result = amount;
    for (const constraint of this.chain) {
      result = constraint.apply(result);
    }
    return result;
  }
}
