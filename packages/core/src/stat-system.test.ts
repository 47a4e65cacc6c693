import { afterEach, describe, expect, it } from 'vitest';

import {
  DuplicateStatError,
  ForeignRelationError,
  ForeignStatError,
  UnknownStatError,
} from './errors.js';
import { ModifierRelation } from './relations/modifier-relation.js';
import { StatSystem } from './stat-system.js';
import { FloorStat } from './stats/floor-stat.js';
import { SingleStat } from './stats/single-stat.js';
import {
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from './telemetry.js';
import { ManualTimerScheduler } from './timers/manual-timer-scheduler.js';
import { ElasticValue } from './values/elastic-value.js';
import { PlainValue } from './values/plain-value.js';
import { SimpleValue } from './values/simple-value.js';

describe('StatSystem', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('registers and looks up stats by name', () => {
    const system = new StatSystem();
    const strength = system.addStat(new SingleStat(system, 'strength', new PlainValue(5)));
    const agility = system.addStat(new SingleStat(system, 'agility', new PlainValue(7)));

    expect(system.stats).toEqual([strength, agility]);
    expect(system.hasStat('strength')).toBe(true);
    expect(system.getStat('agility')).toBe(agility);
    expect(system.findStat('luck')).toBeUndefined();
  });

  it('rejects unknown, duplicate and foreign stats', () => {
    const system = new StatSystem();
    const other = new StatSystem();
    system.addStat(new SingleStat(system, 'strength', new PlainValue(5)));

    expect(() => system.getStat('luck')).toThrowError(UnknownStatError);
    expect(() => system.getStat('luck')).toThrowError('No stat named "luck" is registered.');
    expect(() =>
      system.addStat(new SingleStat(system, 'strength', new PlainValue(1))),
    ).toThrowError(DuplicateStatError);
    expect(() =>
      system.addStat(new SingleStat(other, 'agility', new PlainValue(1))),
    ).toThrowError(ForeignStatError);
    expect(system.stats).toHaveLength(1);
  });

  it('exposes the scheduler and resolved configuration', () => {
    const scheduler = new ManualTimerScheduler();
    const system = new StatSystem({
      scheduler,
      config: {
        precision: { intervalTolerance: -1 },
        timers: { maxManualStepsPerAdvance: 50 },
      },
    });

    expect(system.scheduler).toBe(scheduler);
    expect(system.config.precision.intervalTolerance).toBe(1e-9);
    expect(system.config.timers.maxManualStepsPerAdvance).toBe(50);
  });

  it('lets owned values follow the system configuration', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const quiet = new StatSystem({ config: { diagnostics: { traceAmountChanges: false } } });
    const traced = new StatSystem();
    const a = quiet.addStat(new SingleStat(quiet, 'a', new PlainValue(0)));
    const b = traced.addStat(new SingleStat(traced, 'b', new PlainValue(0)));

    a.value.setAmount(1);
    b.value.setAmount(2);

    expect(recording.named('StatAmountChanged')).toEqual([
      {
        level: 'progress',
        event: 'StatAmountChanged',
        data: { stat: 'b', kind: 'plain', amount: 2, previous: 0 },
      },
    ]);
  });

  it('attaches and detaches relations', () => {
    const system = new StatSystem();
    const strength = system.addStat(new SingleStat(system, 'strength', new PlainValue(4)));
    const attack = system.addStat(new SingleStat(system, 'attack', new ElasticValue(10)));

    const relation = system.addRelation(
      new ModifierRelation(system, { source: strength.value, target: attack.value }),
    );
    expect(system.relations).toEqual([relation]);
    expect(attack.value.amount).toBe(14);

    expect(system.removeRelation(relation)).toBe(true);
    expect(system.removeRelation(relation)).toBe(false);
    expect(attack.value.amount).toBe(10);
  });

  it('refuses relations created for another system', () => {
    const system = new StatSystem();
    const other = new StatSystem();
    const relation = new ModifierRelation(other, {
      source: new PlainValue(1),
      target: new ElasticValue(1),
    });

    expect(() => system.addRelation(relation)).toThrowError(ForeignRelationError);
    expect(() => system.addRelation(relation)).toThrowError(
      'Relation "plain -> derived" was created for a different stat system.',
    );
    expect(system.relations).toEqual([]);
  });

  it('dispose tears down relations and constraints', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const system = new StatSystem();
    const strength = system.addStat(new SingleStat(system, 'strength', new PlainValue(4)));
    const attack = system.addStat(new SingleStat(system, 'attack', new ElasticValue(10)));
    const armor = system.addStat(
      new FloorStat(system, 'armor', { min: new PlainValue(0), current: new SimpleValue(3) }),
    );
    system.addRelation(
      new ModifierRelation(system, { source: strength.value, target: attack.value }),
    );

    system.dispose();

    expect(system.relations).toEqual([]);
    expect(attack.value.modifiers).toEqual([]);
    expect(strength.value.subscriberCount).toBe(0);
    expect(armor.current.constraints).toEqual([]);
    expect(recording.named('StatSystemDisposed')).toEqual([
      { level: 'counters', event: 'StatSystemDisposed', data: { stats: 3 } },
    ]);
  });
});
