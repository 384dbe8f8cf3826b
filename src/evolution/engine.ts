/**
 * Evolution engine: pools of competing units that improve with use.
 *
 * Each pool (sense, act, feedback by default) holds interchangeable units.
 * A task composes one member per pool into a runnable unit, runs it and
 * scores the output. Scores feed per-member success rates and tension;
 * weak members get regenerated as `_vN` variants and chronic losers are
 * archived.
 *
 * Pool writes and the metrics file are guarded by one in-process mutex.
 */

import { EventEmitter } from 'events';
import type { Unit } from '../graph/unit.js';
import { UNIT_TYPES, type UnitType } from '../graph/types.js';
import type { PoolStore } from '../storage/pool-store.js';
import type { MetricsStore } from '../storage/metrics-store.js';
import type { UnitGenerator } from '../generation/unit-generator.js';
import type { Interpreter } from '../interpreter/interpreter.js';
import { AsyncMutex } from '../core/mutex.js';
import { EvolutionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { defaultConfig } from '../core/types.js';
import { composeMembers } from './composer.js';
import { evaluateResult } from './evaluator.js';
import { pickBest, scoreMember } from './selector.js';
import type {
  Composition,
  EvolutionConfig,
  EvolutionTask,
  EvolvedMember,
  LoopResult,
  PoolMember,
  RoundResult,
  Selections,
  StepResult,
} from './types.js';

const DEFAULT_CONFIG: EvolutionConfig = defaultConfig().evolution;

const DEFAULT_TASK_INTENT = 'Process input';
const MISSING_NAME_LENGTH = 20;

export interface EvolutionDeps {
  pools: PoolStore;
  metrics: MetricsStore;
  generator: UnitGenerator;
  interpreter: Interpreter;
}

function memberKey(pool: string, name: string): string {
  return `${pool}/${name}`;
}

function poolType(pool: string): UnitType {
  return UNIT_TYPES.find(type => type === pool) ?? 'composite';
}

/**
 * Blueprint used when regenerating a member of `pool` with this intent.
 */
export function evolveBlueprint(pool: string, intent: string): string {
  const lower = intent.toLowerCase();
  if (pool === 'sense') return lower.includes('memory') ? 'sense' : 'sense_passthrough';
  if (pool === 'act') return 'act';
  if (lower.includes('learn')) return 'feedback_learn';
  if (lower.includes('evaluat')) return 'feedback';
  return 'feedback_passthrough';
}

export function missingBlueprint(pool: string): string {
  if (pool === 'sense') return 'sense_passthrough';
  if (pool === 'act') return 'act';
  return 'feedback_passthrough';
}

export function nameFromIntent(intent: string): string {
  return intent.toLowerCase().replace(/ /g, '_').slice(0, MISSING_NAME_LENGTH);
}

export class EvolutionEngine extends EventEmitter {
  private config: EvolutionConfig;
  private mutex = new AsyncMutex();
  private logger = getLogger();

  constructor(
    private readonly deps: EvolutionDeps,
    config?: Partial<EvolutionConfig>,
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get pools(): readonly string[] {
    return this.config.pools;
  }

  // ═══════════════════════════════════════════════════════════════
  // SELECTION
  // ═══════════════════════════════════════════════════════════════

  /**
   * Best member of a pool for an intent. Null for an empty pool.
   */
  async select(pool: string, intent: string): Promise<string | null> {
    const names = await this.deps.pools.members(pool);
    const scored: Array<{ name: string; score: number }> = [];
    for (const name of names) {
      const rate = await this.deps.metrics.successRate(memberKey(pool, name));
      scored.push({ name, score: scoreMember(pool, name, intent, rate) });
    }
    return pickBest(scored);
  }

  async selectAll(intent: string): Promise<Selections> {
    const selections: Selections = {};
    for (const pool of this.config.pools) {
      selections[pool] = await this.select(pool, intent);
    }
    return selections;
  }

  /**
   * Select per pool and glue the chosen members into one composite unit.
   */
  async compose(intent: string): Promise<Composition> {
    const selections = await this.selectAll(intent);
    const members: PoolMember[] = [];

    for (const pool of this.config.pools) {
      const name = selections[pool];
      if (!name) continue;
      const unit = await this.deps.pools.load(pool, name);
      if (unit) members.push({ pool, name, unit });
    }

    if (members.length === 0) {
      throw new EvolutionError(`Every pool is empty; nothing to compose for: ${intent}`);
    }
    return { selections, unit: composeMembers(intent, members) };
  }

  // ═══════════════════════════════════════════════════════════════
  // TRACKING
  // ═══════════════════════════════════════════════════════════════

  /**
   * Fold one score into a member's success rate. Returns the new rate.
   */
  async track(unitId: string, success: number, task: string): Promise<number> {
    const metrics = await this.deps.metrics.record(unitId, success, task);
    return metrics.successRate;
  }

  async successRate(pool: string, name: string): Promise<number> {
    return this.deps.metrics.successRate(memberKey(pool, name));
  }

  /**
   * Success above 0.7 settles the member by 0.1 (floor 0.1); below 0.3 it
   * rises by 0.2 (cap 1). No-op for a missing member.
   */
  async updateTension(pool: string, name: string, success: number): Promise<number | null> {
    const unit = await this.deps.pools.load(pool, name);
    if (!unit) return null;

    if (success > 0.7) {
      unit.tension = Math.max(0.1, unit.tension - 0.1);
    } else if (success < 0.3) {
      unit.tension = Math.min(1, unit.tension + 0.2);
    }
    unit.touch();
    await this.deps.pools.save(pool, name, unit);
    return unit.tension;
  }

  // ═══════════════════════════════════════════════════════════════
  // EVOLUTION
  // ═══════════════════════════════════════════════════════════════

  async evolve(pool: string, name: string, failureReason?: string): Promise<EvolvedMember> {
    return this.mutex.withLock(() => this.evolveMember(pool, name, failureReason));
  }

  /**
   * A fresh member for a capability the pool lacks, named from the intent.
   */
  async generateMissing(pool: string, intent: string): Promise<EvolvedMember> {
    return this.mutex.withLock(async () => {
      const { unit } = await this.deps.generator.generate(intent, { blueprint: missingBlueprint(pool) });
      unit.type = poolType(pool);

      const name = nameFromIntent(intent);
      await this.deps.pools.save(pool, name, unit);
      this.logger.info({ pool, name }, 'Generated missing pool member');
      return { pool, name, unit };
    });
  }

  /**
   * Archive members with at least `minRuns` runs and a success rate below
   * `minSuccessRate`. Returns the archived names.
   */
  async prune(
    pool: string,
    minSuccessRate: number = this.config.pruneMinSuccessRate,
    minRuns: number = this.config.pruneMinRuns,
  ): Promise<string[]> {
    return this.mutex.withLock(async () => {
      const pruned: string[] = [];
      for (const name of await this.deps.pools.members(pool)) {
        const metrics = await this.deps.metrics.get(memberKey(pool, name));
        if (!metrics || metrics.runs < minRuns || metrics.successRate >= minSuccessRate) continue;

        if (await this.deps.pools.archive(pool, name)) {
          pruned.push(name);
          this.logger.info({ pool, name, successRate: metrics.successRate }, 'Pruned pool member');
        }
      }
      if (pruned.length > 0) {
        this.emit('evolution:pruned', { pool, names: pruned });
      }
      return pruned;
    });
  }

  evaluate(result: unknown, expected?: unknown): number {
    return evaluateResult(result, expected);
  }

  // ═══════════════════════════════════════════════════════════════
  // LOOP
  // ═══════════════════════════════════════════════════════════════

  /**
   * compose → run → evaluate → track → maybe evolve the weakest member.
   */
  async evolutionStep(task: EvolutionTask = {}): Promise<StepResult> {
    return this.mutex.withLock(async () => {
      const intent = task.intent ?? DEFAULT_TASK_INTENT;
      const { selections, unit } = await this.compose(intent);

      const run = await this.deps.interpreter.run(unit, { ...task.input });
      const output = run.result;
      const success = this.evaluate(output, task.expected);

      const chosen = this.chosen(selections);
      for (const [pool, name] of chosen) {
        await this.track(memberKey(pool, name), success, intent);
        await this.updateTension(pool, name, success);
      }

      let evolved = false;
      if (success < this.config.evolveBelow) {
        const weakest = await this.weakest(chosen);
        if (weakest) {
          await this.evolveMember(weakest[0], weakest[1], `Low success on: ${intent}`);
          evolved = true;
        }
      }

      const result: StepResult = { intent, selections, output, success, evolved };
      this.logger.info({ intent, success, evolved }, 'Evolution step');
      this.emit('evolution:step', { result });
      return result;
    });
  }

  async evolutionLoop(tasks: readonly EvolutionTask[], rounds: number = 1): Promise<LoopResult> {
    const results: RoundResult[] = [];

    for (let round = 1; round <= rounds; round++) {
      const roundResults: StepResult[] = [];
      for (const task of tasks) {
        roundResults.push(await this.evolutionStep(task));
      }
      const avgSuccess =
        roundResults.length > 0 ? roundResults.reduce((sum, r) => sum + r.success, 0) / roundResults.length : 0;
      results.push({ round, results: roundResults, avgSuccess });
      this.logger.info({ round, avgSuccess }, 'Evolution round complete');
    }

    const first = results[0];
    const last = results[results.length - 1];
    return {
      rounds: results,
      totalTasks: tasks.length * rounds,
      improvement: results.length > 1 && first && last ? last.avgSuccess - first.avgSuccess : 0,
    };
  }

  // ─── Internals (caller holds the lock) ───

  private chosen(selections: Selections): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    for (const pool of this.config.pools) {
      const name = selections[pool];
      if (name) pairs.push([pool, name]);
    }
    return pairs;
  }

  private async weakest(chosen: Array<[string, string]>): Promise<[string, string] | null> {
    let weakest: [string, string] | null = null;
    let lowest = Infinity;
    for (const [pool, name] of chosen) {
      const rate = await this.successRate(pool, name);
      if (rate < lowest) {
        lowest = rate;
        weakest = [pool, name];
      }
    }
    return weakest;
  }

  private async evolveMember(pool: string, name: string, failureReason?: string): Promise<EvolvedMember> {
    const current = await this.deps.pools.load(pool, name);
    if (!current) {
      throw new EvolutionError(`Pool member not found: ${pool}/${name}`, pool);
    }

    const notes = [
      `Improve this ${pool} unit so it handles more cases.`,
      `Current intent: ${current.intent}`,
      `Current structure: ${JSON.stringify(current.toRecord(), null, 2).slice(0, 500)}`,
      ...(failureReason ? [`Failure reason: ${failureReason}`] : []),
    ].join('\n');

    const { unit } = await this.deps.generator.generate(`Improved: ${current.intent}`, {
      blueprint: evolveBlueprint(pool, current.intent),
      notes,
    });
    this.markDescendant(unit, current, pool);

    const newName = this.nextVersionName(pool, name);
    await this.deps.pools.save(pool, newName, unit);

    this.logger.info({ pool, from: name, to: newName, reason: failureReason }, 'Evolved pool member');
    this.emit('evolution:evolved', { pool, from: name, to: newName, reason: failureReason });
    return { pool, name: newName, unit };
  }

  private markDescendant(unit: Unit, parent: Unit, pool: string): void {
    unit.type = poolType(pool);
    unit.metadata = { ...unit.metadata, parentId: parent.id, version: parent.metadata.version + 1 };
  }

  /**
   * `<name>_v<n>` for the smallest unused n ≥ 2.
   */
  private nextVersionName(pool: string, name: string): string {
    let version = 2;
    while (this.deps.pools.exists(pool, `${name}_v${version}`)) {
      version++;
    }
    return `${name}_v${version}`;
  }
}
