import { afterEach, describe, expect, it } from 'vitest';

import { finalCombiners } from '../modifiers/combiners.js';
import { Modifier } from '../modifiers/modifier.js';
import { StatSystem } from '../stat-system.js';
import { SingleStat } from '../stats/single-stat.js';
import {
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from '../telemetry.js';
import { ElasticValue } from '../values/elastic-value.js';
import { FloatingValue } from '../values/floating-value.js';
import { PlainValue } from '../values/plain-value.js';
import { ModifierRelation } from './modifier-relation.js';

const createPair = () => {
  const system = new StatSystem();
  const strength = system.addStat(new SingleStat(system, 'strength', new PlainValue(10)));
  const attack = system.addStat(new SingleStat(system, 'attack', new ElasticValue(5)));
  return { system, strength, attack };
};

describe('ModifierRelation', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('keeps a modifier on the target that follows the source', () => {
    const { system, strength, attack } = createPair();
    const relation = system.addRelation(
      new ModifierRelation(system, {
        source: strength.value,
        target: attack.value,
        map: (amount) => amount * 2,
      }),
    );

    expect(attack.value.amount).toBe(25);

    strength.value.setAmount(12);
    expect(attack.value.amount).toBe(29);
    expect(attack.value.modifiers).toHaveLength(1);
    expect(relation.modifier?.amount).toBe(24);
    expect(relation.modifier?.origin).toBe(relation);
  });

  it('labels itself by the stats it connects', () => {
    const { system, strength, attack } = createPair();
    const relation = new ModifierRelation(system, {
      source: strength.value,
      target: attack.value,
    });

    expect(relation.describe()).toBe('strength -> attack');
    expect(
      new ModifierRelation(system, {
        source: new PlainValue(0),
        target: new ElasticValue(0),
      }).describe(),
    ).toBe('plain -> derived');
  });

  it('stops following the source once removed', () => {
    const { system, strength, attack } = createPair();
    const relation = system.addRelation(
      new ModifierRelation(system, { source: strength.value, target: attack.value }),
    );

    system.removeRelation(relation);
    strength.value.setAmount(50);

    expect(attack.value.amount).toBe(5);
    expect(attack.value.modifiers).toEqual([]);
    expect(strength.value.subscriberCount).toBe(0);
    expect(relation.modifier).toBeUndefined();
  });

  it('ignores repeated attach calls', () => {
    const { system, strength, attack } = createPair();
    const relation = system.addRelation(
      new ModifierRelation(system, { source: strength.value, target: attack.value }),
    );

    relation.attach();

    expect(attack.value.modifiers).toHaveLength(1);
    expect(strength.value.subscriberCount).toBe(1);
  });

  it('passes priority and combiners to its modifier', () => {
    const { system, strength, attack } = createPair();
    attack.value.addModifier(new Modifier(attack.value, 5, 'sword'));
    system.addRelation(
      new ModifierRelation(system, {
        source: strength.value,
        target: attack.value,
        map: (amount) => amount / 20,
        priority: 1,
        final: finalCombiners.percent,
      }),
    );

    expect(attack.value.amount).toBe(15);
    expect(attack.value.priorityGroups).toEqual([0, 1]);
  });

  it('holds a modifier on floating targets without moving them', () => {
    const system = new StatSystem();
    const source = new PlainValue(3);
    const target = new FloatingValue(7);
    const relation = system.addRelation(new ModifierRelation(system, { source, target }));

    source.setAmount(4);

    expect(target.amount).toBe(7);
    expect(target.modifiers).toEqual([relation.modifier]);
  });

  it('keeps the previous modifier when the mapped amount overflows', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const system = new StatSystem();
    const strength = system.addStat(new SingleStat(system, 'strength', new PlainValue(1)));
    const attack = system.addStat(new SingleStat(system, 'attack', new ElasticValue(5)));
    const relation = system.addRelation(
      new ModifierRelation(system, {
        source: strength.value,
        target: attack.value,
        map: (amount) => amount * 10,
      }),
    );
    expect(attack.value.amount).toBe(15);

    strength.value.setAmount(1e308);

    expect(strength.value.amount).toBe(1e308);
    expect(attack.value.amount).toBe(15);
    expect(relation.modifier?.amount).toBe(10);
    expect(recording.named('RelationAmountInvalid')).toEqual([
      {
        level: 'error',
        event: 'RelationAmountInvalid',
        data: {
          relation: 'strength -> attack',
          sourceAmount: 1e308,
          amount: Number.POSITIVE_INFINITY,
        },
      },
    ]);

    strength.value.setAmount(2);
    expect(attack.value.amount).toBe(25);
    expect(attack.value.modifiers).toHaveLength(1);
  });
});
