import { ConstraintChainValue } from './constraint-chain.js';

/** A cell whose writes are clamped by its constraints, in registration order. */
export class SimpleValue extends ConstraintChainValue {
  readonly kind = 'constrained' as const;

  constructor(amount: number) {
    super(amount);
  }

  setAmount(amount: number): void {
    this.commit(this, this.applyConstraints(amount));
  }

  /**
   * Re-submits the current amount through the constraint chain. Picks up
   * drift when a constraint's dependency changed since the last write.
   */
  recalculateAmount(): void {
    this.setAmount(this.amount);
  }
}
