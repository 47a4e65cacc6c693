import type { FinalCombiner, StackCombiner } from '../modifiers/combiners.js';
import { Modifier } from '../modifiers/modifier.js';
import type { StatSystem } from '../stat-system.js';
import { telemetry } from '../telemetry.js';
import type {
  ModifiableValue,
  StatValue,
  StatValueSubscription,
} from '../values/stat-value.js';
import { Relation } from './relation.js';

export interface ModifierRelationOptions {
  readonly source: StatValue;
  readonly target: ModifiableValue;
  /**
   * Turns the source amount into the modifier amount.
   *
   * @defaultValue identity
   */
  readonly map?: (sourceAmount: number) => number;
  readonly priority?: number;
  readonly stack?: StackCombiner;
  readonly final?: FinalCombiner;
}

/**
 * Keeps one modifier on `target` whose amount follows `source`, e.g.
 * strength adding to maximum health. Each source change swaps the modifier
 * for a fresh one, since modifier amounts are fixed.
 */
export class ModifierRelation extends Relation {
  readonly source: StatValue;
  readonly target: ModifiableValue;

  private readonly options: ModifierRelationOptions;
  private subscription: StatValueSubscription | undefined;
  private current: Modifier | undefined;

  constructor(system: StatSystem, options: ModifierRelationOptions) {
    super(system);
    this.source = options.source;
    this.target = options.target;
    this.options = options;
  }

  /** The modifier currently applied to the target. */
  get modifier(): Modifier | undefined {
    return this.current;
  }

  attach(): void {
    if (this.subscription !== undefined) {
      return;
    }
    this.subscription = this.source.subscribe(() => {
      this.refresh();
    });
    this.refresh();
  }

  detach(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    if (this.current !== undefined) {
      this.target.removeModifier(this.current);
      this.current = undefined;
    }
  }

  describe(): string {
    const from = this.source.stat?.name ?? this.source.kind;
    const to = this.target.stat?.name ?? this.target.kind;
    return `${from} -> ${to}`;
  }

  /**
   * Swaps in a modifier for the current source amount. A mapped amount that
   * is not finite is reported and the previous modifier stays in place.
   */
  private refresh(): void {
    const map = this.options.map ?? ((amount: number) => amount);
    const amount = map(this.source.amount);
    if (!Number.isFinite(amount)) {
      telemetry.recordError('RelationAmountInvalid', {
        relation: this.describe(),
        sourceAmount: this.source.amount,
        amount,
      });
      return;
    }

    const next = new Modifier(this.target, amount, this, {
      priority: this.options.priority,
      stack: this.options.stack,
      final: this.options.final,
    });

    const previous = this.current;
    this.current = next;
    if (previous !== undefined) {
      this.target.removeModifier(previous);
    }
    this.target.addModifier(next);
  }
}
