import type { StatValueKind } from './values/stat-value.js';

export type StatEngineErrorCode =
  | 'IMMUTABLE_WRITE'
  | 'INVALID_DURATION'
  | 'INVALID_MODIFIER'
  | 'SCHEDULER_UNAVAILABLE'
  | 'DUPLICATE_STAT'
  | 'UNKNOWN_STAT'
  | 'FOREIGN_STAT'
  | 'FOREIGN_RELATION'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_STAT_SHEET';

export class StatEngineError extends Error {
  readonly code: StatEngineErrorCode;

  constructor(code: StatEngineErrorCode, message: string) {
    super(message);
    this.name = 'StatEngineError';
    this.code = code;
  }
}

/**
 * Raised when a write reaches a value that only the engine may change:
 * a {@link ConstantValue} after construction, or any {@link ElasticValue}.
 * The value is left untouched.
 */
export class ImmutableWriteError extends StatEngineError {
  readonly kind: StatValueKind;
  readonly attemptedAmount: number;

  constructor(kind: StatValueKind, attemptedAmount: number, label?: string) {
    const subject = label ? `"${label}"` : `a ${kind} value`;
    super(
      'IMMUTABLE_WRITE',
      kind === 'derived'
        ? `Cannot set ${subject} directly; derived values are computed from their base amount and modifiers.`
        : `Cannot set ${subject}; constant values are locked after construction.`,
    );
    this.name = 'ImmutableWriteError';
    this.kind = kind;
    this.attemptedAmount = attemptedAmount;
  }
}

export class InvalidDurationError extends StatEngineError {
  readonly duration: number;
  readonly interval?: number;

  constructor(message: string, duration: number, interval?: number) {
    super('INVALID_DURATION', message);
    this.name = 'InvalidDurationError';
    this.duration = duration;
    this.interval = interval;
  }
}

export class InvalidModifierError extends StatEngineError {
  constructor(message: string) {
    super('INVALID_MODIFIER', message);
    this.name = 'InvalidModifierError';
  }
}

export class SchedulerUnavailableError extends StatEngineError {
  constructor() {
    super(
      'SCHEDULER_UNAVAILABLE',
      'Timed modifiers need a scheduler: pass one in the options or target a value owned by a stat system.',
    );
    this.name = 'SchedulerUnavailableError';
  }
}

export class DuplicateStatError extends StatEngineError {
  readonly statName: string;

  constructor(statName: string) {
    super('DUPLICATE_STAT', `A stat named "${statName}" is already registered.`);
    this.name = 'DuplicateStatError';
    this.statName = statName;
  }
}

export class UnknownStatError extends StatEngineError {
  readonly statName: string;

  constructor(statName: string) {
    super('UNKNOWN_STAT', `No stat named "${statName}" is registered.`);
    this.name = 'UnknownStatError';
    this.statName = statName;
  }
}

export class ForeignStatError extends StatEngineError {
  readonly statName: string;

  constructor(statName: string) {
    super(
      'FOREIGN_STAT',
      `Stat "${statName}" was created for a different stat system.`,
    );
    this.name = 'ForeignStatError';
    this.statName = statName;
  }
}

export class ForeignRelationError extends StatEngineError {
  readonly relation: string;

  constructor(relation: string) {
    super(
      'FOREIGN_RELATION',
      `Relation "${relation}" was created for a different stat system.`,
    );
    this.name = 'ForeignRelationError';
    this.relation = relation;
  }
}

export class StatInvariantError extends StatEngineError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'StatInvariantError';
  }
}

export interface StatSheetIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

export class StatSheetError extends StatEngineError {
  readonly issues: readonly StatSheetIssue[];

  constructor(message: string, issues: readonly StatSheetIssue[] = []) {
    super('INVALID_STAT_SHEET', message);
    this.name = 'StatSheetError';
    this.issues = issues;
  }
}
