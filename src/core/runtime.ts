/**
 * Runtime: wires configuration, stores, the text generator, living memory,
 * the primitive registry, the interpreter and the evolution engine into
 * one object. Every collaborator is constructed here and injected; none is
 * a module-level singleton.
 */

import { resolve } from 'path';
import type { UnitloomConfig } from './types.js';
import { createLogger, getLogger, setLogger } from './logger.js';
import type { TextGenerator } from '../generation/types.js';
import { createTextGenerator } from '../generation/generators.js';
import { UnitGenerator } from '../generation/unit-generator.js';
import { BlueprintLibrary, DEFAULT_BLUEPRINTS_DIR } from '../blueprints/library.js';
import { UnitStore } from '../storage/unit-store.js';
import { PoolStore } from '../storage/pool-store.js';
import { MetricsStore } from '../storage/metrics-store.js';
import { MemoryStore } from '../storage/memory-store.js';
import { LivingMemory } from '../memory/living-memory.js';
import { PrimitiveRegistry } from '../primitives/registry.js';
import { Interpreter } from '../interpreter/interpreter.js';
import { MainLoop } from '../interpreter/main-loop.js';
import type { MainLoopOptions, MainLoopResult, RunResult } from '../interpreter/types.js';
import { EvolutionEngine } from '../evolution/engine.js';
import { TensionManager } from '../tension/manager.js';
import type { Unit } from '../graph/unit.js';

export interface RuntimeOptions {
  config: UnitloomConfig;
  /** Base for relative storage paths */
  projectDir: string;
  /** Skips provider discovery when given */
  generator?: TextGenerator;
  registry?: PrimitiveRegistry;
  /** Install a process logger built from `config.logging` */
  configureLogger?: boolean;
}

export class Runtime {
  readonly units: UnitStore;
  readonly pools: PoolStore;
  readonly metrics: MetricsStore;
  readonly blueprints: BlueprintLibrary;
  readonly memory: LivingMemory;
  readonly unitGenerator: UnitGenerator;
  readonly interpreter: Interpreter;
  readonly evolution: EvolutionEngine;
  readonly tensions: TensionManager;

  private constructor(
    readonly config: UnitloomConfig,
    readonly generator: TextGenerator,
    readonly registry: PrimitiveRegistry,
    projectDir: string,
  ) {
    const { storage } = config;
    const at = (path: string): string => resolve(projectDir, path);

    this.units = new UnitStore(at(storage.unitsDir));
    this.pools = new PoolStore(at(storage.poolsDir));
    this.metrics = new MetricsStore(at(storage.metricsFile));
    this.blueprints = new BlueprintLibrary(storage.blueprintsDir ? at(storage.blueprintsDir) : DEFAULT_BLUEPRINTS_DIR);
    this.memory = new LivingMemory(new MemoryStore(at(storage.memoryDir)), generator, config.memory);
    this.unitGenerator = new UnitGenerator(generator, this.blueprints, registry.names());
    this.tensions = new TensionManager(config.tension);

    this.interpreter = new Interpreter(
      registry,
      {
        generator,
        units: this.units,
        blueprints: this.blueprints,
        memory: this.memory,
        tension: config.tension,
        logger: getLogger(),
      },
      { loader: ref => this.units.load(ref), maxDepth: config.interpreter.maxDepth },
    );

    this.evolution = new EvolutionEngine(
      { pools: this.pools, metrics: this.metrics, generator: this.unitGenerator, interpreter: this.interpreter },
      config.evolution,
    );
  }

  static async create(options: RuntimeOptions): Promise<Runtime> {
    const { config } = options;
    if (options.configureLogger) {
      setLogger(createLogger('unitloom', config.logging.verbose, config.logging.level));
    }
    const generator = options.generator ?? (await createTextGenerator(config));
    const registry = options.registry ?? PrimitiveRegistry.createDefault();
    getLogger().debug({ generator: generator.name, primitives: registry.size }, 'Runtime ready');
    return new Runtime(config, generator, registry, options.projectDir);
  }

  async run(unit: Unit, context: Record<string, unknown> = {}): Promise<RunResult> {
    return this.interpreter.run(unit, context);
  }

  /**
   * Run a stored unit. Null when no such unit exists.
   */
  async runStored(id: string, context: Record<string, unknown> = {}): Promise<RunResult | null> {
    const unit = await this.units.load(id);
    return unit ? this.interpreter.run(unit, context) : null;
  }

  async loop(root: Unit, options: MainLoopOptions = {}): Promise<MainLoopResult> {
    return new MainLoop(root, this.interpreter).run(options);
  }
}
