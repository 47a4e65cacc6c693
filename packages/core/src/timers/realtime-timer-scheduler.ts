import {
  assertDelay,
  assertInterval,
  type TimerCallback,
  type TimerHandle,
  type TimerScheduler,
} from './timer-scheduler.js';

const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface RealtimeTimerSchedulerOptions {
  /**
   * When `false`, pending timers do not keep the Node.js process alive.
   *
   * @defaultValue `true`
   */
  readonly keepAlive?: boolean;
}

/**
 * Wall-clock scheduler backed by the host's `setTimeout`/`setInterval`.
 * Delays and intervals are milliseconds.
 */
export class RealtimeTimerScheduler implements TimerScheduler {
  private readonly keepAlive: boolean;

  constructor(options: RealtimeTimerSchedulerOptions = {}) {
    this.keepAlive = options.keepAlive ?? true;
  }

  scheduleOnce(delay: number, callback: TimerCallback): TimerHandle {
    assertDelay(delay, 'Delay');
    assertWithinTimerRange(delay);

    let active = true;
    const timeout = setTimeout(() => {
      if (!active) {
        return;
      }
      active = false;
      callback();
    }, delay);
    if (!this.keepAlive) {
      timeout.unref();
    }

    return {
      get active() {
        return active;
      },
      cancel() {
        if (!active) {
          return;
        }
        active = false;
        clearTimeout(timeout);
      },
    };
  }

  scheduleRepeating(interval: number, callback: TimerCallback): TimerHandle {
    assertInterval(interval);
    assertWithinTimerRange(interval);

    let active = true;
    const timer = setInterval(() => {
      if (active) {
        callback();
      }
    }, interval);
    if (!this.keepAlive) {
      timer.unref();
    }

    return {
      get active() {
        return active;
      },
      cancel() {
        if (!active) {
          return;
        }
        active = false;
        clearInterval(timer);
      },
    };
  }

  cancel(handle: TimerHandle): void {
    handle.cancel();
  }
}

function assertWithinTimerRange(delay: number): void {
  if (delay > MAX_TIMER_DELAY_MS) {
    throw new RangeError(
      `Timer delays above ${MAX_TIMER_DELAY_MS}ms overflow the host timer; received ${delay}.`,
    );
  }
}
