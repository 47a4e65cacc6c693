/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
}

export type TelemetryLevel = 'error' | 'warning' | 'progress' | 'counters';

export interface RecordedTelemetryEvent {
  readonly level: TelemetryLevel;
  readonly event: string;
  readonly data?: TelemetryEventData;
}

export interface RecordingTelemetry extends TelemetryFacade {
  readonly events: readonly RecordedTelemetryEvent[];
  named(event: string): readonly RecordedTelemetryEvent[];
  clear(): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[stats:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[stats:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[stats:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[stats:counters] ${group}`, counters);
  },
};

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default telemetry facade.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
};

/**
 * Creates a telemetry facade that logs all events to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@stat-engine/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

/**
 * Creates a facade that keeps every event in memory, in emission order.
 * Handy for tests and for tools that want to inspect modifier lifecycles.
 */
export function createRecordingTelemetry(): RecordingTelemetry {
  const events: RecordedTelemetryEvent[] = [];
  const push = (
    level: TelemetryLevel,
    event: string,
    data?: TelemetryEventData,
  ) => {
    events.push(data === undefined ? { level, event } : { level, event, data });
  };

  return {
    events,
    named(event) {
      return events.filter((entry) => entry.event === event);
    },
    clear() {
      events.length = 0;
    },
    recordError(event, data) {
      push('error', event, data);
    },
    recordWarning(event, data) {
      push('warning', event, data);
    },
    recordProgress(event, data) {
      push('progress', event, data);
    },
    recordCounters(group, counters) {
      push('counters', group, counters);
    },
  };
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[stats:telemetry] invocation failed', error);
  }
}
