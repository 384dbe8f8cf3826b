/**
 * Unit Interpreter
 *
 * Runs a unit's nodes one at a time in dependency order. A node either calls
 * a registered primitive or runs another unit by reference. Node failures
 * are recorded and the run continues with the next node.
 */

import type { Unit } from '../graph/unit.js';
import { PHASES, type Edge, type Phase, type UnitLoader, type UnitNode } from '../graph/types.js';
import type { PrimitiveRegistry } from '../primitives/registry.js';
import type { PrimitiveScope, PrimitiveServices } from '../primitives/types.js';
import { RecursionLimitError, UnitloomError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExecutionContext } from './context.js';
import type { InterpreterOptions, RunResult } from './types.js';

const DEFAULT_MAX_DEPTH = 16;

type NodeOutcome = { ok: true; value: unknown } | { ok: false };

/**
 * Kahn's algorithm with a FIFO ready queue seeded in list order. Edges that
 * leave the node subset are ignored. Null when a cycle leaves nodes unordered.
 */
export function topologicalOrder(nodes: readonly UnitNode[], edges: readonly Edge[]): UnitNode[] | null {
  const byId = new Map(nodes.map(node => [node.id, node]));
  const inDegree = new Map(nodes.map(node => [node.id, 0]));
  const next = new Map<string, string[]>(nodes.map(node => [node.id, []]));

  for (const edge of edges) {
    const targets = next.get(edge.from);
    const degree = inDegree.get(edge.to);
    if (targets === undefined || degree === undefined) continue;
    targets.push(edge.to);
    inDegree.set(edge.to, degree + 1);
  }

  const queue = nodes.filter(node => inDegree.get(node.id) === 0).map(node => node.id);
  const ordered: UnitNode[] = [];

  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    const node = byId.get(id);
    if (node) ordered.push(node);
    for (const target of next.get(id) ?? []) {
      const degree = (inDegree.get(target) ?? 0) - 1;
      inDegree.set(target, degree);
      if (degree === 0) queue.push(target);
    }
  }

  return ordered.length === nodes.length ? ordered : null;
}

/**
 * Stable sort into sense, act, feedback.
 */
export function orderByPhase(nodes: readonly UnitNode[]): UnitNode[] {
  const rank = (phase: Phase): number => PHASES.indexOf(phase);
  return [...nodes].sort((a, b) => rank(a.phase) - rank(b.phase));
}

export function executionOrder(nodes: readonly UnitNode[], edges: readonly Edge[]): UnitNode[] {
  return topologicalOrder(nodes, edges) ?? orderByPhase(nodes);
}

export class Interpreter {
  private readonly loader?: UnitLoader;
  private readonly maxDepth: number;
  private logger = getLogger();

  constructor(
    private readonly registry: PrimitiveRegistry,
    private readonly services: PrimitiveServices,
    options: InterpreterOptions = {},
  ) {
    this.loader = options.loader;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Run every node of a unit. `callStack` holds the ids of the units this
   * run is nested in, outermost first.
   */
  async run(
    unit: Unit,
    initialContext: Record<string, unknown> = {},
    callStack: readonly string[] = [],
  ): Promise<RunResult> {
    const ctx = new ExecutionContext({ ...initialContext });
    const stack = [...callStack, unit.id];

    let result: unknown;
    for (const node of executionOrder(unit.nodes, unit.edges)) {
      const outcome = await this.attempt(unit, node, ctx, stack);
      if (outcome.ok) result = outcome.value;
    }

    return {
      result,
      context: ctx.variables,
      history: ctx.history,
      errors: ctx.errors,
      success: ctx.errors.length === 0,
    };
  }

  /**
   * Run only one phase's nodes against a caller-owned context. Errors
   * propagate.
   */
  async runPhase(unit: Unit, phase: Phase, ctx: ExecutionContext, callStack: readonly string[] = []): Promise<unknown> {
    const stack = [...callStack, unit.id];
    let result: unknown;
    for (const node of executionOrder(unit.nodesByPhase(phase), unit.edges)) {
      try {
        result = await this.execute(unit, node, ctx, stack);
      } catch (err) {
        node.state = 'failed';
        throw err;
      }
      node.state = 'completed';
      ctx.log(node.id, 'completed', result);
    }
    return result;
  }

  private async attempt(unit: Unit, node: UnitNode, ctx: ExecutionContext, stack: string[]): Promise<NodeOutcome> {
    try {
      const value = await this.execute(unit, node, ctx, stack);
      node.state = 'completed';
      ctx.log(node.id, 'completed', value);
      return { ok: true, value };
    } catch (err) {
      const message = toError(err).message;
      node.state = 'failed';
      ctx.addError(`Node ${node.id} failed: ${message}`);
      ctx.log(node.id, 'failed', message);
      this.logger.warn({ unit: unit.id, node: node.id, error: message }, 'Node failed');
      return { ok: false };
    }
  }

  /**
   * Resolve the input, invoke, bind the output.
   */
  private async execute(unit: Unit, node: UnitNode, ctx: ExecutionContext, stack: string[]): Promise<unknown> {
    node.state = 'active';
    const input = ctx.resolve(node.input);
    this.logger.debug(
      { unit: unit.id, node: node.id, primitive: node.primitive, unitRef: node.unitRef },
      'Executing node',
    );

    let value: unknown;
    if (node.unitRef) {
      const sub = await this.runSubUnit(node.unitRef, input, ctx.variables, stack);
      // Child errors fail the run, not the node: its result still flows on.
      for (const error of sub.errors) {
        ctx.addError(`Node ${node.id}: ${error}`);
      }
      value = sub.result;
    } else if (node.primitive) {
      const primitive = this.registry.get(node.primitive);
      value = await primitive.invoke(input, node.args, this.scopeFor(ctx, stack));
    } else {
      value = input;
    }

    if (node.output) ctx.set(node.output, value);
    return value;
  }

  private scopeFor(ctx: ExecutionContext, stack: string[]): PrimitiveScope {
    return {
      variables: ctx.variables,
      services: this.services,
      runUnit: (ref, input) => this.runSubUnit(ref, input, ctx.variables, stack),
    };
  }

  /**
   * Nested run on a copy of the caller's variables with `input` bound.
   */
  private async runSubUnit(
    ref: string,
    input: unknown,
    variables: Record<string, unknown>,
    stack: string[],
  ): Promise<RunResult> {
    this.guard(ref, stack);

    const sub = this.loader ? await this.loader(ref) : null;
    if (!sub) {
      throw new UnitloomError(`Could not load sub-unit: ${ref}`, 'SUBUNIT_NOT_FOUND', { stage: 'run' });
    }
    if (sub.id !== ref) this.guard(sub.id, stack);

    return this.run(sub, { ...variables, input }, stack);
  }

  private guard(id: string, stack: string[]): void {
    if (stack.includes(id)) {
      throw new RecursionLimitError(`Recursive sub-unit call: ${[...stack, id].join(' -> ')}`, [...stack]);
    }
    if (stack.length > this.maxDepth) {
      throw new RecursionLimitError(`Sub-unit nesting deeper than ${this.maxDepth}`, [...stack]);
    }
  }
}
