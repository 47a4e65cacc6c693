import {
  resolveStatEngineConfig,
  type StatEngineConfig,
  type StatEngineConfigOverrides,
} from './config.js';
import {
  DuplicateStatError,
  ForeignRelationError,
  ForeignStatError,
  UnknownStatError,
} from './errors.js';
import type { Relation } from './relations/relation.js';
import type { Stat } from './stats/stat.js';
import { telemetry } from './telemetry.js';
import type { TimerScheduler } from './timers/timer-scheduler.js';

export interface StatSystemOptions {
  /** Runs expiry and ticks for timed modifiers targeting this system's values. */
  readonly scheduler?: TimerScheduler;
  readonly config?: StatEngineConfigOverrides;
}

/**
 * Owns a set of uniquely named stats and the relations wired between them,
 * and carries the scheduler and configuration their values rely on.
 */
export class StatSystem {
  readonly scheduler: TimerScheduler | undefined;
  readonly config: StatEngineConfig;

  private readonly statsByName = new Map<string, Stat>();
  private readonly relationList: Relation[] = [];

  constructor(options: StatSystemOptions = {}) {
    this.scheduler = options.scheduler;
    this.config = resolveStatEngineConfig(options.config);
  }

  get stats(): readonly Stat[] {
    return [...this.statsByName.values()];
  }

  get relations(): readonly Relation[] {
    return this.relationList;
  }

  /**
   * Registers `stat` and attaches its constraints. Register bound stats
   * before the stats that reference their values.
   */
  addStat<TStat extends Stat>(stat: TStat): TStat {
    if (stat.system !== this) {
      throw new ForeignStatError(stat.name);
    }
    if (this.statsByName.has(stat.name)) {
      throw new DuplicateStatError(stat.name);
    }

    this.statsByName.set(stat.name, stat);
    stat.initConstraints();
    return stat;
  }

  hasStat(name: string): boolean {
    return this.statsByName.has(name);
  }

  findStat(name: string): Stat | undefined {
    return this.statsByName.get(name);
  }

  getStat(name: string): Stat {
    const stat = this.statsByName.get(name);
    if (stat === undefined) {
      throw new UnknownStatError(name);
    }
    return stat;
  }

  addRelation<TRelation extends Relation>(relation: TRelation): TRelation {
    if (relation.system !== this) {
      throw new ForeignRelationError(relation.describe());
    }
    this.relationList.push(relation);
    relation.attach();
    telemetry.recordProgress('RelationAttached', { relation: relation.describe() });
    return relation;
  }

  removeRelation(relation: Relation): boolean {
    const index = this.relationList.indexOf(relation);
    if (index === -1) {
      return false;
    }
    this.relationList.splice(index, 1);
    relation.detach();
    telemetry.recordProgress('RelationDetached', { relation: relation.describe() });
    return true;
  }

  /** Detaches every relation and disposes stat constraints. */
  dispose(): void {
    for (const relation of [...this.relationList].reverse()) {
      this.removeRelation(relation);
    }
    for (const stat of this.statsByName.values()) {
      stat.dispose();
    }
    telemetry.recordCounters('StatSystemDisposed', {
      stats: this.statsByName.size,
    });
  }
}
