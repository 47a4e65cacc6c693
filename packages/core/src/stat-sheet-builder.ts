import {
  isValueRef,
  parseStatSheet,
  parseValueRef,
  type RelationDefinition,
  type StatDefinition,
  type StatSheet,
  type ValueDefinition,
} from '@stat-engine/stat-schema';

import { StatSheetError } from './errors.js';
import { finalCombiners } from './modifiers/combiners.js';
import { ModifierRelation } from './relations/modifier-relation.js';
import { StatSystem, type StatSystemOptions } from './stat-system.js';
import { FloorStat } from './stats/floor-stat.js';
import { RangeStat } from './stats/range-stat.js';
import { SingleStat } from './stats/single-stat.js';
import type { Stat } from './stats/stat.js';
import { ConstantValue } from './values/constant-value.js';
import { ElasticValue } from './values/elastic-value.js';
import { FloatingValue } from './values/floating-value.js';
import { PlainValue } from './values/plain-value.js';
import { SimpleValue } from './values/simple-value.js';
import type {
  ConstrainedValue,
  ModifiableValue,
  StatValue,
} from './values/stat-value.js';

type IssuePath = readonly (string | number)[];

/**
 * Builds a live {@link StatSystem} from a stat sheet. The input is validated
 * with the stat sheet schema first; references must point at stats declared
 * earlier in the sheet.
 */
export function createStatSystemFromSheet(
  input: unknown,
  options: StatSystemOptions = {},
): StatSystem {
  const sheet: StatSheet = parseStatSheet(input);
  const system = new StatSystem(options);

  sheet.stats.forEach((definition, index) => {
    system.addStat(buildStat(system, definition, ['stats', index]));
  });

  sheet.relations.forEach((definition, index) => {
    system.addRelation(buildRelation(system, definition, ['relations', index]));
  });

  return system;
}

/**
 * Resolves `stat` or `stat.slot` against the stats registered on `system`.
 * A bare stat name means the stat's primary value: the value of a single
 * stat, the current value of a bounded one.
 */
export function resolveValueRef(
  system: StatSystem,
  ref: string,
): StatValue | undefined {
  const parsed = parseValueRef(ref);
  if (parsed === undefined) {
    return undefined;
  }
  const stat = system.findStat(parsed.stat);
  if (stat === undefined) {
    return undefined;
  }
  return pickSlot(stat, parsed.slot);
}

function pickSlot(stat: Stat, slot: 'min' | 'current' | 'max' | undefined): StatValue | undefined {
  if (stat instanceof SingleStat) {
    return slot === undefined || slot === 'current' ? stat.value : undefined;
  }
  if (stat instanceof RangeStat && slot === 'max') {
    return stat.max;
  }
  if (stat instanceof FloorStat) {
    if (slot === 'min') {
      return stat.min;
    }
    if (slot === undefined || slot === 'current') {
      return stat.current;
    }
  }
  return undefined;
}

function buildStat(system: StatSystem, definition: StatDefinition, path: IssuePath): Stat {
  switch (definition.kind) {
    case 'single':
      return new SingleStat(
        system,
        definition.name,
        buildValue(system, definition.value, [...path, 'value']),
      );
    case 'floor':
      return new FloorStat(system, definition.name, {
        min: buildValue(system, definition.min, [...path, 'min']),
        current: requireConstrained(
          buildValue(system, definition.current, [...path, 'current']),
          [...path, 'current'],
        ),
      });
    case 'range':
      return new RangeStat(system, definition.name, {
        min: buildValue(system, definition.min, [...path, 'min']),
        current: requireConstrained(
          buildValue(system, definition.current, [...path, 'current']),
          [...path, 'current'],
        ),
        max: buildValue(system, definition.max, [...path, 'max']),
      });
  }
}

function buildValue(
  system: StatSystem,
  definition: ValueDefinition,
  path: IssuePath,
): StatValue {
  if (isValueRef(definition)) {
    return requireRef(system, definition.ref, path);
  }

  switch (definition.kind) {
    case 'plain':
      return new PlainValue(definition.amount);
    case 'simple':
      return new SimpleValue(definition.amount);
    case 'floating':
      return new FloatingValue(definition.amount);
    case 'constant':
      return new ConstantValue(definition.amount);
    case 'elastic':
      return new ElasticValue(definition.base);
  }
}

function buildRelation(
  system: StatSystem,
  definition: RelationDefinition,
  path: IssuePath,
): ModifierRelation {
  const source = requireRef(system, definition.source, [...path, 'source']);
  const target = requireModifiable(
    requireRef(system, definition.target, [...path, 'target']),
    [...path, 'target'],
  );
  if (target === source) {
    throw sheetError(
      `"${definition.source}" and "${definition.target}" name the same value; a relation cannot feed a value into itself.`,
      [...path, 'target'],
    );
  }
  const scale = definition.scale;

  return new ModifierRelation(system, {
    source,
    target,
    map: (amount) => amount * scale,
    priority: definition.priority,
    final: finalCombiners[definition.final],
  });
}

function requireRef(system: StatSystem, ref: string, path: IssuePath): StatValue {
  const value = resolveValueRef(system, ref);
  if (value === undefined) {
    throw sheetError(
      `Reference "${ref}" does not name a value of an earlier stat.`,
      path,
    );
  }
  return value;
}

function requireConstrained(value: StatValue, path: IssuePath): ConstrainedValue {
  switch (value.kind) {
    case 'constrained':
    case 'modifiable':
    case 'derived':
      return value;
    default:
      throw sheetError(
        `Bounded stats need a constrainable current value; "${value.kind}" values take no constraints.`,
        path,
      );
  }
}

function requireModifiable(value: StatValue, path: IssuePath): ModifiableValue {
  switch (value.kind) {
    case 'modifiable':
    case 'derived':
      return value;
    default:
      throw sheetError(
        `Relation targets must accept modifiers; "${value.kind}" values do not.`,
        path,
      );
  }
}

function sheetError(message: string, path: IssuePath): StatSheetError {
  return new StatSheetError(`${path.join('.')}: ${message}`, [{ path, message }]);
}
