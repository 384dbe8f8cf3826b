import { nanoid } from 'nanoid';
import { parseInputRef, stripVarPrefix } from './reference.js';
import { Unit } from './unit.js';
import type { UnitRecord } from './schema.js';
import type { Edge, NodeType, Phase, UnitNode, UnitType } from './types.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Fresh unit id: `unit_<yyyymmddHHMMSS>_<8 chars>`.
 */
export function generateUnitId(now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `unit_${stamp}_${nanoid(8)}`;
}

export interface NodeOptions {
  phase?: Phase;
  type?: NodeType;
  description?: string;
  /** Stored form: `"$name"`, an array, or a literal */
  input?: unknown;
  args?: Record<string, unknown>;
  /** Defaults to `<id>_output` */
  output?: string;
}

export function createNode(id: string, primitive: string, options: NodeOptions = {}): UnitNode {
  const node: UnitNode = {
    id,
    type: options.type ?? 'process',
    phase: options.phase ?? 'act',
    description: options.description ?? `${primitive} node`,
    primitive,
    args: options.args ?? {},
    output: stripVarPrefix(options.output ?? `${id}_output`),
    tension: 0.5,
    state: 'pending',
  };
  const input = parseInputRef(options.input);
  if (input) node.input = input;
  return node;
}

export interface UnitOptions {
  id?: string;
  type?: UnitType;
  tension?: number;
  importance?: number;
  phases?: Phase[];
}

export function createUnit(intent: string, nodes: UnitNode[], edges: Edge[] = [], options: UnitOptions = {}): Unit {
  return Unit.create({
    id: options.id ?? generateUnitId(),
    type: options.type ?? 'composite',
    intent,
    phases: options.phases,
    tension: options.tension ?? 0.5,
    importance: options.importance ?? 0.5,
    nodes,
    edges,
  });
}

export function createUnitRecord(
  intent: string,
  nodes: UnitNode[],
  edges: Edge[] = [],
  options: UnitOptions = {},
): UnitRecord {
  return createUnit(intent, nodes, edges, options).toRecord();
}

/**
 * get → call_llm → emit, optionally learning from the result.
 */
export function quickLlmUnit(
  intent: string,
  prompt: string,
  options: { inputKey?: string; learn?: boolean } = {},
): Unit {
  const nodes: UnitNode[] = [
    createNode('s1', 'get', {
      phase: 'sense',
      type: 'input',
      description: 'Get input',
      args: { key: options.inputKey ?? 'input' },
      output: 'input',
    }),
    createNode('a1', 'call_llm', {
      description: 'Process with LLM',
      input: '$input',
      args: { prompt },
      output: 'result',
    }),
  ];
  const edges: Edge[] = [{ from: 's1', to: 'a1' }];

  if (options.learn) {
    nodes.push(
      createNode('f1', 'learn_from_experience', {
        phase: 'feedback',
        description: 'Learn',
        input: '$result',
        args: { task: intent, success: true },
        output: 'memory',
      }),
      createNode('f2', 'emit', {
        phase: 'feedback',
        type: 'output',
        description: 'Return result',
        input: '$result',
        output: 'output',
      }),
    );
    edges.push({ from: 'a1', to: 'f1' }, { from: 'a1', to: 'f2' });
  } else {
    nodes.push(
      createNode('f1', 'emit', {
        phase: 'feedback',
        type: 'output',
        description: 'Return result',
        input: '$result',
        output: 'output',
      }),
    );
    edges.push({ from: 'a1', to: 'f1' });
  }

  return createUnit(intent, nodes, edges);
}

/**
 * Memory recall pipeline: load, sense against the context, activate the top k.
 */
export function quickMemoryUnit(intent: string = 'Sense relevant memories', topK: number = 3): Unit {
  const nodes: UnitNode[] = [
    createNode('s1', 'get', {
      phase: 'sense',
      type: 'input',
      description: 'Get context',
      args: { key: 'context' },
      output: 'context',
    }),
    createNode('s2', 'load_memories', { phase: 'sense', description: 'Load memories', output: 'memories' }),
    createNode('a1', 'sense_memories', {
      description: 'Sense relevance',
      input: '$context',
      output: 'sensed',
    }),
    createNode('a2', 'activate_memories', {
      description: 'Activate top memories',
      input: '$sensed',
      args: { top_k: topK },
      output: 'active',
    }),
    createNode('f1', 'emit', {
      phase: 'feedback',
      type: 'output',
      description: 'Return memories',
      input: '$active',
      output: 'output',
    }),
  ];
  const edges: Edge[] = [
    { from: 's1', to: 'a1' },
    { from: 's2', to: 'a1' },
    { from: 'a1', to: 'a2' },
    { from: 'a2', to: 'f1' },
  ];
  return createUnit(intent, nodes, edges);
}
