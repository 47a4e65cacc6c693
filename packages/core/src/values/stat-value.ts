import { DEFAULT_STAT_ENGINE_CONFIG, type StatEngineConfig } from '../config.js';
import { telemetry } from '../telemetry.js';
import type { Stat } from '../stats/stat.js';
import type { ConstantValue } from './constant-value.js';
import type { ElasticValue } from './elastic-value.js';
import type { FloatingValue } from './floating-value.js';
import type { PlainValue } from './plain-value.js';
import type { SimpleValue } from './simple-value.js';

/**
 * Tags for the closed set of value variants. Each variant composes the
 * write path of the ones below it explicitly:
 *
 * - `plain`: commit
 * - `constrained`: constraint fold, commit
 * - `modifiable`: constraint fold, commit (plus a modifier list)
 * - `derived`: write lock; only recalculation commits
 * - `locked`: write lock after construction
 */
export type StatValueKind =
  | 'plain'
  | 'constrained'
  | 'modifiable'
  | 'derived'
  | 'locked';

export type StatValue =
  | PlainValue
  | SimpleValue
  | FloatingValue
  | ElasticValue
  | ConstantValue;

/** Values that carry a constraint chain and can be asked to recalculate. */
export type ConstrainedValue = SimpleValue | FloatingValue | ElasticValue;

/** Values that accept modifiers. */
export type ModifiableValue = FloatingValue | ElasticValue;

export type StatValueListener = (value: StatValue) => void;

export interface StatValueSubscription {
  readonly active: boolean;
  unsubscribe(): void;
}

interface ListenerRecord {
  readonly listener: StatValueListener;
  active: boolean;
}

export abstract class StatValueBase {
  abstract readonly kind: StatValueKind;

  private currentAmount: number;
  private owner: Stat | undefined;
  private readonly listeners: ListenerRecord[] = [];

  protected constructor(amount: number) {
    this.currentAmount = amount;
  }

  get amount(): number {
    return this.currentAmount;
  }

  /** The stat that owns this value, once one has claimed it. */
  get stat(): Stat | undefined {
    return this.owner;
  }

  get subscriberCount(): number {
    return this.listeners.length;
  }

  abstract setAmount(amount: number): void;

  /**
   * Records the owning stat. The first stat to claim a value owns it; later
   * claims (a range stat reusing another stat's value as its bound) are
   * ignored and return `false`.
   */
  bindStat(stat: Stat): boolean {
    if (this.owner === undefined) {
      this.owner = stat;
      return true;
    }
    return this.owner === stat;
  }

  subscribe(listener: StatValueListener): StatValueSubscription {
    const record: ListenerRecord = { listener, active: true };
    this.listeners.push(record);
    const listeners = this.listeners;

    return {
      get active() {
        return record.active;
      },
      unsubscribe() {
        if (!record.active) {
          return;
        }
        record.active = false;
        const index = listeners.indexOf(record);
        if (index !== -1) {
          listeners.splice(index, 1);
        }
      },
    };
  }

  protected get config(): StatEngineConfig {
    return this.owner?.system.config ?? DEFAULT_STAT_ENGINE_CONFIG;
  }

  protected get label(): string | undefined {
    return this.owner?.name;
  }

  /**
   * Stores `amount` and notifies subscribers, unless it equals the current
   * amount. Returns whether anything changed.
   */
  protected commit(source: StatValue, amount: number): boolean {
    const previous = this.currentAmount;
    // NaN never equals itself; repeated NaN writes are still no change.
    if (previous === amount || (Number.isNaN(previous) && Number.isNaN(amount))) {
      return false;
    }

    this.currentAmount = amount;

    if (this.config.diagnostics.traceAmountChanges) {
      telemetry.recordProgress('StatAmountChanged', {
        stat: this.label ?? null,
        kind: this.kind,
        amount,
        previous,
      });
    }

    // Listeners added during dispatch wait for the next change.
    for (const record of [...this.listeners]) {
      if (record.active) {
        record.listener(source);
      }
    }
    return true;
  }
}
