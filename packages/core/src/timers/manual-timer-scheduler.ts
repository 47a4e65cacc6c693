import { DEFAULT_STAT_ENGINE_CONFIG } from '../config.js';
import {
  assertDelay,
  assertInterval,
  type TimerCallback,
  type TimerHandle,
  type TimerScheduler,
} from './timer-scheduler.js';

export interface ManualTimerSchedulerOptions {
  /**
   * Clock reading before the first advance.
   *
   * @defaultValue `0`
   */
  readonly startTime?: number;
  /**
   * Maximum callbacks fired by a single {@link ManualTimerScheduler.advance}
   * call. Defaults to `timers.maxManualStepsPerAdvance`.
   */
  readonly maxStepsPerAdvance?: number;
}

interface ScheduledTimer {
  readonly sequence: number;
  readonly interval: number | undefined;
  readonly callback: TimerCallback;
  dueAt: number;
  active: boolean;
}

/**
 * Deterministic scheduler driven by explicit {@link advance} calls. Timers
 * fire in due-time order, ties broken by scheduling order; repeating timers
 * re-arm from their previous due time so long advances never drift.
 */
export class ManualTimerScheduler implements TimerScheduler {
  private currentTime: number;
  private sequence = 0;
  private readonly timers: ScheduledTimer[] = [];
  private readonly maxStepsPerAdvance: number;

  constructor(options: ManualTimerSchedulerOptions = {}) {
    this.currentTime = options.startTime ?? 0;
    this.maxStepsPerAdvance =
      options.maxStepsPerAdvance !== undefined && options.maxStepsPerAdvance > 0
        ? Math.floor(options.maxStepsPerAdvance)
        : DEFAULT_STAT_ENGINE_CONFIG.timers.maxManualStepsPerAdvance;
  }

  now(): number {
    return this.currentTime;
  }

  get pendingCount(): number {
    return this.timers.length;
  }

  scheduleOnce(delay: number, callback: TimerCallback): TimerHandle {
    assertDelay(delay, 'Delay');
    return this.enqueue(this.currentTime + delay, undefined, callback);
  }

  scheduleRepeating(interval: number, callback: TimerCallback): TimerHandle {
    assertInterval(interval);
    return this.enqueue(this.currentTime + interval, interval, callback);
  }

  cancel(handle: TimerHandle): void {
    handle.cancel();
  }

  /**
   * Moves the clock forward by `delta`, firing every timer that comes due on
   * the way. Returns the number of callbacks fired. Non-finite or
   * non-positive deltas are ignored.
   */
  advance(delta: number): number {
    if (!Number.isFinite(delta) || delta <= 0) {
      return 0;
    }

    const targetTime = this.currentTime + delta;
    let fired = 0;

    for (;;) {
      const next = this.nextDue(targetTime);
      if (next === undefined) {
        break;
      }
      if (fired >= this.maxStepsPerAdvance) {
        throw new Error(
          `ManualTimerScheduler fired ${fired} callbacks in one advance; aborting.`,
        );
      }

      this.currentTime = next.dueAt;
      if (next.interval === undefined) {
        this.release(next);
      } else {
        next.dueAt += next.interval;
      }

      fired += 1;
      next.callback();
    }

    this.currentTime = targetTime;
    return fired;
  }

  /** Cancels every pending timer. */
  clear(): void {
    for (const timer of this.timers) {
      timer.active = false;
    }
    this.timers.length = 0;
  }

  private enqueue(
    dueAt: number,
    interval: number | undefined,
    callback: TimerCallback,
  ): TimerHandle {
    const timer: ScheduledTimer = {
      sequence: this.sequence,
      interval,
      callback,
      dueAt,
      active: true,
    };
    this.sequence += 1;
    this.timers.push(timer);

    return {
      get active() {
        return timer.active;
      },
      cancel: () => {
        this.release(timer);
      },
    };
  }

  private release(timer: ScheduledTimer): void {
    if (!timer.active) {
      return;
    }
    timer.active = false;
    const index = this.timers.indexOf(timer);
    if (index !== -1) {
      this.timers.splice(index, 1);
    }
  }

  private nextDue(limit: number): ScheduledTimer | undefined {
    let next: ScheduledTimer | undefined;
    for (const timer of this.timers) {
      if (timer.dueAt > limit) {
        continue;
      }
      if (
        next === undefined ||
        timer.dueAt < next.dueAt ||
        (timer.dueAt === next.dueAt && timer.sequence < next.sequence)
      ) {
        next = timer;
      }
    }
    return next;
  }
}
