import type { Unit } from '../graph/unit.js';
import { isRecord } from '../utils/guards.js';
import { getLogger } from '../core/logger.js';
import { ExecutionContext } from './context.js';
import type { Interpreter } from './interpreter.js';
import type { MainLoopOptions, MainLoopResult } from './types.js';

/**
 * Drives a root unit through sense → act → feedback until its tension
 * settles at the threshold or the iteration cap is hit.
 */
export class MainLoop {
  private logger = getLogger();

  constructor(
    private readonly root: Unit,
    private readonly interpreter: Interpreter,
  ) {}

  async run(options: MainLoopOptions = {}): Promise<MainLoopResult> {
    const threshold = options.threshold ?? 0.1;
    const maxIterations = options.maxIterations ?? 1000;
    const ctx = new ExecutionContext({ ...options.initialContext });

    let iterations = 0;
    while (this.root.tension > threshold && iterations < maxIterations) {
      iterations++;

      if (this.root.nodesByPhase('sense').length > 0) {
        await this.interpreter.runPhase(this.root, 'sense', ctx);
      }
      const actResult = await this.interpreter.runPhase(this.root, 'act', ctx);
      ctx.set('action_result', actResult);
      const feedback = await this.interpreter.runPhase(this.root, 'feedback', ctx);

      this.root.tension = nextTension(this.root.tension, feedback);
      this.logger.debug({ unit: this.root.id, iteration: iterations, tension: this.root.tension }, 'Loop iteration');
    }

    return {
      result: ctx.get('result'),
      iterations,
      finalTension: this.root.tension,
      context: ctx.variables,
    };
  }
}

/**
 * Object feedback settles the tension on success and raises it otherwise;
 * any other value decays it slightly.
 */
export function nextTension(tension: number, feedback: unknown): number {
  if (isRecord(feedback)) {
    return feedback.success ? tension * 0.5 : Math.min(1, tension * 1.1);
  }
  return tension * 0.9;
}
