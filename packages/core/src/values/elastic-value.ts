import { isDevelopmentMode } from '../config.js';
import { ImmutableWriteError, StatInvariantError } from '../errors.js';
import type { Modifier } from '../modifiers/modifier.js';
import { telemetry } from '../telemetry.js';
import { ConstraintChainValue } from './constraint-chain.js';
import { ModifierList } from './modifier-list.js';

/**
 * Returns the distinct priorities present in `modifiers`, ascending.
 */
export function collectPriorities(modifiers: readonly Modifier[]): number[] {
  return [...new Set(modifiers.map((modifier) => modifier.priority))].sort(
    (left, right) => left - right,
  );
}

/**
 * Folds `modifiers` into `baseAmount` one priority group at a time.
 *
 * Within a group the modifiers stack in list order starting from `0`; the
 * last modifier of the group then combines the stack with the running total
 * through its `calculateFinal`. Lower priorities are folded first.
 */
export function stackModifiers(
  baseAmount: number,
  modifiers: readonly Modifier[],
  priorities: readonly number[] = collectPriorities(modifiers),
): number {
  let result = baseAmount;

  for (const priority of priorities) {
    let stackTotal = 0;
    let last: Modifier | undefined;

    for (const modifier of modifiers) {
      if (modifier.priority !== priority) {
        continue;
      }
      stackTotal = modifier.calculateStack(stackTotal, modifier.amount);
      last = modifier;
    }

    if (last === undefined) {
      reportEmptyPriorityGroup(priority);
      continue;
    }

    result = last.calculateFinal(result, stackTotal);
  }

  return result;
}

function reportEmptyPriorityGroup(priority: number): void {
  const message = `Priority group ${priority} has no modifiers; priority bookkeeping is out of sync with the modifier list.`;
  if (isDevelopmentMode()) {
    throw new StatInvariantError(message);
  }
  telemetry.recordError('ElasticPriorityDesync', { priority });
}

/**
 * A value derived entirely from a fixed base amount and its modifiers.
 * Public writes are rejected; the amount only changes through
 * {@link ElasticValue.recalculateAmount}, which runs whenever the modifier
 * set changes or a constraint dependency moves.
 */
export class ElasticValue extends ConstraintChainValue {
  readonly kind = 'derived' as const;
  readonly baseAmount: number;

  private readonly modifierList = new ModifierList();
  private priorities: readonly number[] = [];

  constructor(baseAmount: number) {
    super(baseAmount);
    this.baseAmount = baseAmount;
  }

  get modifiers(): readonly Modifier[] {
    return this.modifierList.items;
  }

  /** Distinct modifier priorities, ascending. */
  get priorityGroups(): readonly number[] {
    return this.priorities;
  }

  setAmount(amount: number): never {
    throw new ImmutableWriteError(this.kind, amount, this.label);
  }

  recalculateAmount(): void {
    const derived = stackModifiers(
      this.baseAmount,
      this.modifierList.items,
      this.priorities,
    );
    this.commit(this, this.applyConstraints(derived));
  }

  addModifier(modifier: Modifier): void {
    this.modifierList.add(modifier);
    this.priorities = collectPriorities(this.modifierList.items);
    this.recalculateAmount();
  }

  removeModifier(modifier: Modifier): void {
    if (!this.modifierList.remove(modifier)) {
      return;
    }
    this.priorities = collectPriorities(this.modifierList.items);
    this.recalculateAmount();
  }

  hasModifier(modifier: Modifier): boolean {
    return this.modifierList.has(modifier);
  }
}
