import { afterEach, describe, expect, it, vi } from 'vitest';

import { ImmutableWriteError } from '../errors.js';
import { SingleStat } from '../stats/single-stat.js';
import { StatSystem } from '../stat-system.js';
import {
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from '../telemetry.js';
import { ConstantValue } from './constant-value.js';
import { PlainValue } from './plain-value.js';
import type { StatValue } from './stat-value.js';

describe('PlainValue', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('notifies subscribers in registration order with the value itself', () => {
    const value = new PlainValue(1);
    const calls: string[] = [];
    let received: StatValue | undefined;

    value.subscribe((changed) => {
      calls.push(`first:${changed.amount}`);
      received = changed;
    });
    value.subscribe((changed) => {
      calls.push(`second:${changed.amount}`);
    });

    value.setAmount(4);

    expect(calls).toEqual(['first:4', 'second:4']);
    expect(received).toBe(value);
  });

  it('does not notify when the written amount equals the current one', () => {
    const value = new PlainValue(3);
    const listener = vi.fn();
    value.subscribe(listener);

    value.setAmount(3);

    expect(listener).not.toHaveBeenCalled();
    expect(value.amount).toBe(3);
  });

  it('treats repeated NaN writes and signed zeros as unchanged', () => {
    const missing = new PlainValue(Number.NaN);
    const zero = new PlainValue(0);
    const listener = vi.fn();
    missing.subscribe(listener);
    zero.subscribe(listener);

    missing.setAmount(Number.NaN);
    missing.setAmount(Number.NaN);
    zero.setAmount(-0);

    expect(listener).not.toHaveBeenCalled();
    expect(missing.amount).toBeNaN();
  });

  it('stops notifying after unsubscribe, which is idempotent', () => {
    const value = new PlainValue(0);
    const listener = vi.fn();
    const subscription = value.subscribe(listener);

    value.setAmount(1);
    subscription.unsubscribe();
    subscription.unsubscribe();
    value.setAmount(2);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(subscription.active).toBe(false);
    expect(value.subscriberCount).toBe(0);
  });

  it('skips listeners unsubscribed during dispatch and defers listeners added during it', () => {
    const value = new PlainValue(0);
    const calls: string[] = [];
    const late = vi.fn();

    value.subscribe(() => {
      calls.push('first');
      second.unsubscribe();
      value.subscribe(late);
    });
    const second = value.subscribe(() => {
      calls.push('second');
    });

    value.setAmount(1);

    expect(calls).toEqual(['first']);
    expect(late).not.toHaveBeenCalled();

    value.setAmount(2);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('propagates listener errors after committing the amount', () => {
    const value = new PlainValue(0);
    value.subscribe(() => {
      throw new Error('listener failed');
    });

    expect(() => value.setAmount(5)).toThrowError('listener failed');
    expect(value.amount).toBe(5);
  });

  it('traces amount changes with the owning stat name', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const system = new StatSystem();
    const stat = system.addStat(new SingleStat(system, 'gold', new PlainValue(10)));

    stat.value.setAmount(12);

    expect(recording.named('StatAmountChanged')).toEqual([
      {
        level: 'progress',
        event: 'StatAmountChanged',
        data: { stat: 'gold', kind: 'plain', amount: 12, previous: 10 },
      },
    ]);
  });

  it('skips amount tracing when the system disables it', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const system = new StatSystem({
      config: { diagnostics: { traceAmountChanges: false } },
    });
    const stat = system.addStat(new SingleStat(system, 'gold', new PlainValue(10)));

    stat.value.setAmount(12);

    expect(recording.named('StatAmountChanged')).toEqual([]);
  });

  it('keeps the first stat that claims it', () => {
    const system = new StatSystem();
    const shared = new PlainValue(1);
    const owner = new SingleStat(system, 'owner', shared);
    const borrower = new SingleStat(system, 'borrower', shared);

    expect(shared.stat).toBe(owner);
    expect(shared.bindStat(borrower)).toBe(false);
    expect(shared.bindStat(owner)).toBe(true);
  });
});

describe('ConstantValue', () => {
  it('keeps its construction amount', () => {
    expect(new ConstantValue(7).amount).toBe(7);
  });

  it('rejects writes with ImmutableWriteError and stays unchanged', () => {
    const value = new ConstantValue(7);
    const listener = vi.fn();
    value.subscribe(listener);

    expect(() => value.setAmount(9)).toThrowError(ImmutableWriteError);
    expect(() => value.setAmount(7)).toThrowError(ImmutableWriteError);
    expect(value.amount).toBe(7);
    expect(listener).not.toHaveBeenCalled();
  });

  it('names the stat in the error message when owned', () => {
    const system = new StatSystem();
    const stat = new SingleStat(system, 'level-cap', new ConstantValue(50));

    try {
      stat.value.setAmount(60);
      expect.unreachable('constant writes must throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ImmutableWriteError);
      if (error instanceof ImmutableWriteError) {
        expect(error.kind).toBe('locked');
        expect(error.attemptedAmount).toBe(60);
        expect(error.code).toBe('IMMUTABLE_WRITE');
        expect(error.message).toBe(
          'Cannot set "level-cap"; constant values are locked after construction.',
        );
      }
    }
  });
});
