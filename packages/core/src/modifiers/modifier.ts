import { InvalidModifierError } from '../errors.js';
import type { ModifiableValue } from '../values/stat-value.js';
import {
  finalCombiners,
  stackCombiners,
  type FinalCombiner,
  type StackCombiner,
} from './combiners.js';

export interface ModifierOptions {
  /**
   * Order for stacking. The lower the priority, the earlier the modifier's
   * group is folded into the amount. Must be an integer.
   *
   * @defaultValue `0`
   */
  readonly priority?: number;
  readonly stack?: StackCombiner;
  readonly final?: FinalCombiner;
}

/**
 * An adjustment held by a modifiable value. Modifiers have identity
 * semantics: two modifiers with identical fields are still distinct.
 */
export class Modifier {
  readonly target: ModifiableValue;
  /** Where the modifier comes from. Compared by identity only. */
  readonly origin: unknown;
  readonly priority: number;

  private readonly modifierAmount: number;
  private readonly stack: StackCombiner;
  private readonly final: FinalCombiner;

  constructor(
    target: ModifiableValue,
    amount: number,
    origin: unknown,
    options: ModifierOptions = {},
  ) {
    const priority = options.priority ?? 0;
    if (!Number.isFinite(amount)) {
      throw new InvalidModifierError(
        `Modifier amount must be a finite number, received ${amount}.`,
      );
    }
    if (!Number.isInteger(priority)) {
      throw new InvalidModifierError(
        `Modifier priority must be an integer, received ${priority}.`,
      );
    }

    this.target = target;
    this.modifierAmount = amount;
    this.origin = origin;
    this.priority = priority;
    this.stack = options.stack ?? stackCombiners.sum;
    this.final = options.final ?? finalCombiners.add;
  }

  get amount(): number {
    return this.modifierAmount;
  }

  /** Lifecycle hook run when a value adds this modifier. */
  activate(): void {}

  /** Lifecycle hook run when a value removes this modifier. */
  deactivate(): void {}

  calculateStack(totalAmount: number, changeAmount: number): number {
    return this.stack(totalAmount, changeAmount);
  }

  /**
   * The stat amount and the change amount are passed separately so values
   * can reuse this for stacked totals and ticking modifiers for impulses.
   */
  calculateFinal(currentAmount: number, changeAmount: number): number {
    return this.final(currentAmount, changeAmount);
  }
}
