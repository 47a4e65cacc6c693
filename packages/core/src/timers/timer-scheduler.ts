export type TimerCallback = () => void;

export interface TimerHandle {
  /** `false` once the timer fired (one-shot) or was cancelled. */
  readonly active: boolean;
  /** Idempotent. No callback runs after this returns. */
  cancel(): void;
}

/**
 * Host capability used by timed modifiers. Units are whatever the host
 * counts time in; the realtime scheduler uses milliseconds.
 */
export interface TimerScheduler {
  scheduleOnce(delay: number, callback: TimerCallback): TimerHandle;
  scheduleRepeating(interval: number, callback: TimerCallback): TimerHandle;
  cancel(handle: TimerHandle): void;
}

export function assertDelay(delay: number, label: string): void {
  if (!Number.isFinite(delay) || delay < 0) {
    throw new RangeError(`${label} must be a finite, non-negative number; received ${delay}.`);
  }
}

export function assertInterval(interval: number): void {
  if (!Number.isFinite(interval) || interval <= 0) {
    throw new RangeError(`Interval must be a finite, positive number; received ${interval}.`);
  }
}
