import type {
  ConstrainedValue,
  StatValue,
  StatValueSubscription,
} from '../values/stat-value.js';
import type { Constraint } from './constraint.js';

/**
 * Keeps the protected value at or above `min`. Holds the protected value
 * weakly so a dependency's listener list never keeps it alive.
 */
export class FloorConstraint implements Constraint {
  readonly min: StatValue;

  private readonly current: WeakRef<ConstrainedValue>;
  private readonly subscriptions: StatValueSubscription[] = [];

  constructor(min: StatValue, current: ConstrainedValue) {
    this.min = min;
    this.current = new WeakRef(current);
    this.listenTo(min);
  }

  /** The protected value, or `undefined` once it has been collected. */
  get protectedValue(): ConstrainedValue | undefined {
    return this.current.deref();
  }

  apply(amount: number): number {
    return Math.max(this.min.amount, amount);
  }

  dispose(): void {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions.length = 0;
  }

  protected listenTo(dependency: StatValue): void {
    this.subscriptions.push(
      dependency.subscribe(() => {
        this.recalculateCurrentValue();
      }),
    );
  }

  protected recalculateCurrentValue(): void {
    const current = this.current.deref();
    if (current === undefined) {
      this.dispose();
      return;
    }
    current.recalculateAmount();
  }
}
