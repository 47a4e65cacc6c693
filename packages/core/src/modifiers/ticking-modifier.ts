import { InvalidDurationError } from '../errors.js';
import { telemetry, type TelemetryEventData } from '../telemetry.js';
import type { TimerHandle } from '../timers/timer-scheduler.js';
import type { FloatingValue } from '../values/floating-value.js';
import {
  TempModifier,
  UNBOUNDED_DURATION,
  type TempModifierOptions,
} from './temp-modifier.js';

/**
 * A timed modifier that applies its amount to the target's current amount
 * as an impulse every `interval`, starting on activation, and removes itself
 * after `duration / interval` impulses.
 */
export class TickingModifier extends TempModifier {
  declare readonly target: FloatingValue;
  readonly interval: number;

  private readonly impulseLimit: number;
  private impulses = 0;

  constructor(
    target: FloatingValue,
    amount: number,
    duration: number,
    interval: number,
    origin: unknown,
    options: TempModifierOptions = {},
  ) {
    super(target, amount, duration, origin, options);

    if (!Number.isFinite(interval) || interval <= 0) {
      throw new InvalidDurationError(
        `Tick interval must be positive and finite; received ${interval}.`,
        duration,
        interval,
      );
    }

    this.interval = interval;
    this.impulseLimit =
      duration === UNBOUNDED_DURATION
        ? Number.POSITIVE_INFINITY
        : countImpulses(duration, interval, this.config.precision.intervalTolerance);
  }

  /** Impulses applied since the last activation. */
  get impulseCount(): number {
    return this.impulses;
  }

  get elapsed(): number {
    return this.impulses * this.interval;
  }

  protected override schedule(): TimerHandle | undefined {
    this.impulses = 0;
    if (this.applyImpulse()) {
      return undefined;
    }
    return this.scheduler.scheduleRepeating(this.interval, () => {
      this.applyImpulse();
    });
  }

  protected override describe(): TelemetryEventData {
    return { ...super.describe(), interval: this.interval };
  }

  /** Returns `true` once the modifier has expired. */
  private applyImpulse(): boolean {
    this.target.setAmount(this.calculateFinal(this.target.amount, this.amount));
    this.impulses += 1;
    telemetry.recordProgress('ModifierTicked', {
      ...this.describe(),
      impulses: this.impulses,
      targetAmount: this.target.amount,
    });

    if (this.impulses >= this.impulseLimit) {
      this.expire();
      return true;
    }
    return false;
  }
}

function countImpulses(duration: number, interval: number, tolerance: number): number {
  const count = Math.round(duration / interval);
  if (count < 1 || Math.abs(duration - count * interval) > tolerance * interval) {
    throw new InvalidDurationError(
      `The duration must be divisible by the interval; received duration ${duration} and interval ${interval}.`,
      duration,
      interval,
    );
  }
  return count;
}
