export interface StatEngineConfig {
  readonly precision: {
    /**
     * Relative tolerance used when checking that a ticking modifier's
     * duration is a whole multiple of its interval. Scaled by the interval.
     *
     * @defaultValue `1e-9`
     */
    readonly intervalTolerance: number;
  };
  readonly diagnostics: {
    /**
     * Emit a `StatAmountChanged` progress event on every committed change.
     *
     * @defaultValue `true`
     */
    readonly traceAmountChanges: boolean;
  };
  readonly timers: {
    /**
     * Maximum number of callbacks a single `ManualTimerScheduler.advance`
     * call fires before it gives up. Guards against repeating timers whose
     * callbacks keep scheduling more work at the same instant.
     *
     * @defaultValue `10000`
     */
    readonly maxManualStepsPerAdvance: number;
  };
}

export type StatEngineConfigOverrides = Readonly<{
  readonly precision?: Partial<StatEngineConfig['precision']>;
  readonly diagnostics?: Partial<StatEngineConfig['diagnostics']>;
  readonly timers?: Partial<StatEngineConfig['timers']>;
}>;

export const DEFAULT_STAT_ENGINE_CONFIG: StatEngineConfig = Object.freeze({
  precision: Object.freeze({
    intervalTolerance: 1e-9,
  }),
  diagnostics: Object.freeze({
    traceAmountChanges: true,
  }),
  timers: Object.freeze({
    maxManualStepsPerAdvance: 10_000,
  }),
});

function toNonNegativeNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? value
    : undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(value));
}

function toBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

export function resolveStatEngineConfig(
  overrides?: StatEngineConfigOverrides,
): StatEngineConfig {
  const defaults = DEFAULT_STAT_ENGINE_CONFIG;
  const precision = overrides?.precision ?? {};
  const diagnostics = overrides?.diagnostics ?? {};
  const timers = overrides?.timers ?? {};

  return Object.freeze({
    precision: Object.freeze({
      intervalTolerance:
        toNonNegativeNumber(precision.intervalTolerance) ??
        defaults.precision.intervalTolerance,
    }),
    diagnostics: Object.freeze({
      traceAmountChanges:
        toBoolean(diagnostics.traceAmountChanges) ??
        defaults.diagnostics.traceAmountChanges,
    }),
    timers: Object.freeze({
      maxManualStepsPerAdvance:
        toPositiveInt(timers.maxManualStepsPerAdvance) ??
        defaults.timers.maxManualStepsPerAdvance,
    }),
  });
}

/**
 * Checks if running in development mode. Internal invariant violations throw
 * in development and degrade to telemetry errors in production.
 */
export function isDevelopmentMode(): boolean {
  return process.env.NODE_ENV !== 'production';
}
