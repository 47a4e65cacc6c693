export { PlainValue } from './values/plain-value.js';
export { SimpleValue } from './values/simple-value.js';
export { FloatingValue } from './values/floating-value.js';
export {
  ElasticValue,
  collectPriorities,
  stackModifiers,
} from './values/elastic-value.js';
export { ConstantValue } from './values/constant-value.js';
export { ConstraintChainValue } from './values/constraint-chain.js';
export {
  StatValueBase,
  type ConstrainedValue,
  type ModifiableValue,
  type StatValue,
  type StatValueKind,
  type StatValueListener,
  type StatValueSubscription,
} from './values/stat-value.js';

export type { Constraint } from './constraints/constraint.js';
export { FloorConstraint } from './constraints/floor-constraint.js';
export { RangeConstraint } from './constraints/range-constraint.js';

export { Modifier, type ModifierOptions } from './modifiers/modifier.js';
export {
  finalCombiners,
  stackCombiners,
  type FinalCombiner,
  type FinalCombinerName,
  type StackCombiner,
  type StackCombinerName,
} from './modifiers/combiners.js';
export {
  TempModifier,
  UNBOUNDED_DURATION,
  type TempModifierOptions,
  type TempModifierState,
} from './modifiers/temp-modifier.js';
export { TickingModifier } from './modifiers/ticking-modifier.js';

export type {
  TimerCallback,
  TimerHandle,
  TimerScheduler,
} from './timers/timer-scheduler.js';
export {
  ManualTimerScheduler,
  type ManualTimerSchedulerOptions,
} from './timers/manual-timer-scheduler.js';
export {
  RealtimeTimerScheduler,
  type RealtimeTimerSchedulerOptions,
} from './timers/realtime-timer-scheduler.js';

export { Stat } from './stats/stat.js';
export { SingleStat } from './stats/single-stat.js';
export { FloorStat, type FloorStatValues } from './stats/floor-stat.js';
export { RangeStat, type RangeStatValues } from './stats/range-stat.js';

export { StatSystem, type StatSystemOptions } from './stat-system.js';
export { Relation } from './relations/relation.js';
export {
  ModifierRelation,
  type ModifierRelationOptions,
} from './relations/modifier-relation.js';

export {
  createStatSystemFromSheet,
  resolveValueRef,
} from './stat-sheet-builder.js';
export {
  StatSheetSchemaError,
  type StatSheetInput,
} from '@stat-engine/stat-schema';

export {
  DEFAULT_STAT_ENGINE_CONFIG,
  isDevelopmentMode,
  resolveStatEngineConfig,
  type StatEngineConfig,
  type StatEngineConfigOverrides,
} from './config.js';

export {
  DuplicateStatError,
  ForeignRelationError,
  ForeignStatError,
  ImmutableWriteError,
  InvalidDurationError,
  InvalidModifierError,
  SchedulerUnavailableError,
  StatEngineError,
  StatInvariantError,
  StatSheetError,
  type StatEngineErrorCode,
  type StatSheetIssue,
} from './errors.js';

export {
  createConsoleTelemetry,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type RecordedTelemetryEvent,
  type RecordingTelemetry,
  type TelemetryEventData,
  type TelemetryFacade,
  type TelemetryLevel,
} from './telemetry.js';
