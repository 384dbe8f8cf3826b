/**
 * Blueprint Library
 *
 * Named, pre-validated skeleton units. A blueprint is found under any of
 * `<name>.json`, `<name>_blueprint.json` or `blueprint_<name>.json`, and is
 * instantiated as a fresh unit with a bounded set of customisations.
 */

import { fileURLToPath } from 'url';
import { Unit } from '../graph/unit.js';
import { generateUnitId } from '../graph/builder.js';
import type { NodeRecord, UnitRecord } from '../graph/schema.js';
import type { Phase, UnitType } from '../graph/types.js';
import { PersistenceError, toError } from '../core/errors.js';
import { jsonPath, listJsonNames, readJson } from '../utils/fs.js';

export const DEFAULT_BLUEPRINTS_DIR = fileURLToPath(new URL('../../blueprints/', import.meta.url));

const TASK_PREFIX = 'task_';

export type NodePatch = Partial<Omit<NodeRecord, 'id'>> & { id: string };

export interface BlueprintCustomization {
  /** Context key read by the first `get` node */
  inputKey?: string;
  /** Template of the first `call_llm` node */
  prompt?: string;
  /** One `call_llm` node per task, replacing trailing `task_*` nodes */
  parallelTasks?: string[];
  nodes?: NodePatch[];
  type?: UnitType;
  phases?: Phase[];
  tension?: number;
  importance?: number;
}

export interface InstantiateOptions {
  intent?: string;
  id?: string;
  customize?: BlueprintCustomization;
}

function candidateFiles(name: string): string[] {
  return [name, `${name}_blueprint`, `blueprint_${name}`];
}

function canonicalName(file: string): string {
  return file.replace(/_blueprint$/, '').replace(/^blueprint_/, '');
}

export class BlueprintLibrary {
  private cache: Map<string, UnitRecord> = new Map();

  constructor(private readonly dir: string = DEFAULT_BLUEPRINTS_DIR) {}

  get directory(): string {
    return this.dir;
  }

  /**
   * Blueprint names, without naming-variant decoration.
   */
  async list(): Promise<string[]> {
    const names = (await listJsonNames(this.dir)).map(canonicalName);
    return Array.from(new Set(names)).sort();
  }

  async has(name: string): Promise<boolean> {
    return (await this.load(name)) !== null;
  }

  /**
   * The blueprint's record, validated. Null when no variant exists.
   */
  async load(name: string): Promise<UnitRecord | null> {
    const cached = this.cache.get(name);
    if (cached) return structuredClone(cached);

    for (const file of candidateFiles(name)) {
      const path = jsonPath(this.dir, file);
      let raw: unknown;
      try {
        raw = await readJson(path);
      } catch (err) {
        throw new PersistenceError(`Blueprint ${name} is not valid JSON`, path, toError(err));
      }
      if (raw === null) continue;

      const record = Unit.fromRecord(raw).toRecord();
      this.cache.set(name, record);
      return structuredClone(record);
    }
    return null;
  }

  /**
   * A fresh unit from a blueprint. Returns null for an unknown blueprint;
   * customisations that break validity throw `ValidationError`.
   */
  async instantiate(name: string, options: InstantiateOptions = {}): Promise<Unit | null> {
    const record = await this.load(name);
    if (!record) return null;

    const now = new Date().toISOString();
    record.id = options.id ?? generateUnitId();
    if (options.intent) record.intent = options.intent;
    record.metadata = { created_at: now, updated_at: now, version: 1, parent_id: null };
    record.nodes.forEach(node => {
      node.state = 'pending';
    });

    if (options.customize) {
      applyCustomization(record, options.customize);
    }
    return Unit.fromRecord(record);
  }
}

function applyCustomization(record: UnitRecord, customize: BlueprintCustomization): void {
  if (customize.inputKey !== undefined) {
    const getNode = record.nodes.find(node => node.primitive === 'get');
    if (getNode) getNode.args = { ...getNode.args, key: customize.inputKey };
  }

  if (customize.prompt !== undefined) {
    const llmNode = record.nodes.find(node => node.primitive === 'call_llm');
    if (llmNode) llmNode.args = { ...llmNode.args, prompt: customize.prompt };
  }

  if (customize.parallelTasks) {
    replaceTaskNodes(record, customize.parallelTasks);
  }

  for (const patch of customize.nodes ?? []) {
    const node = record.nodes.find(n => n.id === patch.id);
    if (node) Object.assign(node, patch);
  }

  if (customize.type !== undefined) record.type = customize.type;
  if (customize.phases !== undefined) record.phases = [...customize.phases];
  if (customize.tension !== undefined) record.tension = customize.tension;
  if (customize.importance !== undefined) record.importance = customize.importance;
}

function replaceTaskNodes(record: UnitRecord, tasks: string[]): void {
  let cut = record.nodes.length;
  while (cut > 0 && record.nodes[cut - 1].id.startsWith(TASK_PREFIX)) {
    cut--;
  }

  const removed = new Set(record.nodes.slice(cut).map(node => node.id));
  record.nodes = record.nodes.slice(0, cut);
  record.edges = record.edges.filter(edge => !removed.has(edge.from) && !removed.has(edge.to));

  const source = record.nodes[record.nodes.length - 1];
  tasks.forEach((task, i) => {
    const id = `${TASK_PREFIX}${i + 1}`;
    record.nodes.push({
      id,
      type: 'process',
      phase: 'act',
      description: task,
      primitive: 'call_llm',
      unit_ref: null,
      input: source?.output ? `$${source.output.replace(/^\$/, '')}` : null,
      output: id,
      args: { prompt: `${task}: {input}` },
      tension: 0.5,
      state: 'pending',
    });
    if (source) record.edges.push({ from: source.id, to: id });
  });
}
