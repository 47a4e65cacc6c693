import { DEFAULT_STAT_ENGINE_CONFIG, type StatEngineConfig } from '../config.js';
import { InvalidDurationError, SchedulerUnavailableError } from '../errors.js';
import { telemetry, type TelemetryEventData } from '../telemetry.js';
import type { TimerHandle, TimerScheduler } from '../timers/timer-scheduler.js';
import type { ModifiableValue } from '../values/stat-value.js';
import { Modifier, type ModifierOptions } from './modifier.js';

/** Duration sentinel: the modifier stays until it is removed explicitly. */
export const UNBOUNDED_DURATION = Number.POSITIVE_INFINITY;

export type TempModifierState = 'pending' | 'scheduled' | 'expired' | 'cancelled';

export interface TempModifierOptions extends ModifierOptions {
  /**
   * Scheduler that runs the expiry. Falls back to the scheduler of the stat
   * system that owns the target.
   */
  readonly scheduler?: TimerScheduler;
}

/**
 * A modifier that removes itself from its target once `duration` has
 * elapsed after activation. Removing it earlier cancels the pending expiry.
 */
export class TempModifier extends Modifier {
  readonly duration: number;

  protected readonly scheduler: TimerScheduler;
  protected readonly config: StatEngineConfig;

  private lifecycle: TempModifierState = 'pending';
  private handle: TimerHandle | undefined;

  constructor(
    target: ModifiableValue,
    amount: number,
    duration: number,
    origin: unknown,
    options: TempModifierOptions = {},
  ) {
    super(target, amount, origin, options);

    if (
      duration !== UNBOUNDED_DURATION &&
      !(Number.isFinite(duration) && duration > 0)
    ) {
      throw new InvalidDurationError(
        `Modifier duration must be positive and finite, or UNBOUNDED_DURATION; received ${duration}.`,
        duration,
      );
    }

    this.duration = duration;
    this.config = target.stat?.system.config ?? DEFAULT_STAT_ENGINE_CONFIG;
    this.scheduler = resolveScheduler(target, options.scheduler);
  }

  get state(): TempModifierState {
    return this.lifecycle;
  }

  override activate(): void {
    if (this.lifecycle === 'scheduled') {
      telemetry.recordWarning('ModifierDuplicateActivation', this.describe());
      return;
    }

    this.lifecycle = 'scheduled';
    telemetry.recordProgress('ModifierScheduled', this.describe());
    this.handle = this.schedule();
  }

  override deactivate(): void {
    switch (this.lifecycle) {
      case 'scheduled':
        this.releaseTimer();
        this.lifecycle = 'cancelled';
        telemetry.recordProgress('ModifierCancelled', this.describe());
        return;
      case 'expired':
        // The expiry itself removes the modifier from its target.
        return;
      default:
        telemetry.recordWarning('ModifierRedundantDeactivation', {
          ...this.describe(),
          state: this.lifecycle,
        });
    }
  }

  /**
   * Starts the lifetime timer. Returns `undefined` when there is nothing to
   * cancel later (unbounded duration, or already expired).
   */
  protected schedule(): TimerHandle | undefined {
    if (this.duration === UNBOUNDED_DURATION) {
      return undefined;
    }
    return this.scheduler.scheduleOnce(this.duration, () => {
      this.expire();
    });
  }

  protected expire(): void {
    if (this.lifecycle !== 'scheduled') {
      return;
    }

    this.releaseTimer();
    this.lifecycle = 'expired';
    telemetry.recordProgress('ModifierExpired', this.describe());
    this.target.removeModifier(this);
  }

  protected describe(): TelemetryEventData {
    return {
      stat: this.target.stat?.name ?? null,
      amount: this.amount,
      priority: this.priority,
      duration: this.duration,
    };
  }

  private releaseTimer(): void {
    if (this.handle !== undefined) {
      this.scheduler.cancel(this.handle);
      this.handle = undefined;
    }
  }
}

function resolveScheduler(
  target: ModifiableValue,
  explicit: TimerScheduler | undefined,
): TimerScheduler {
  const scheduler = explicit ?? target.stat?.system.scheduler;
  if (scheduler === undefined) {
    throw new SchedulerUnavailableError();
  }
  return scheduler;
}
