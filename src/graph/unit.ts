import { ValidationError } from '../core/errors.js';
import { parseInputRef, serializeInputRef, stripVarPrefix } from './reference.js';
import { UnitRecordSchema, formatIssues, type UnitRecord, type NodeRecord } from './schema.js';
import type {
  Edge,
  Phase,
  TensionProfile,
  UnitInit,
  UnitMetadata,
  UnitNode,
  UnitType,
} from './types.js';

const DEFAULT_PHASES: Phase[] = ['sense', 'act', 'feedback'];

/**
 * A graph-shaped program held entirely as data.
 *
 * Construction always validates; a Unit that exists satisfies every structural
 * invariant. The interpreter mutates node state and the evolution engine
 * mutates tension, both in place.
 */
export class Unit {
  readonly id: string;
  type: UnitType;
  intent: string;
  phases: Phase[];
  tension: number;
  importance: number;
  readonly nodes: UnitNode[];
  readonly edges: Edge[];
  tensionProfile: TensionProfile;
  metadata: UnitMetadata;

  private constructor(init: UnitInit) {
    const now = new Date().toISOString();
    this.id = init.id;
    this.type = init.type ?? 'composite';
    this.intent = init.intent;
    this.phases = [...(init.phases ?? DEFAULT_PHASES)];
    this.tension = init.tension;
    this.importance = init.importance;
    this.nodes = init.nodes.map(node => structuredClone(node));
    this.edges = init.edges.map(edge => ({ ...edge }));
    this.tensionProfile = {
      maxTension: init.tensionProfile?.maxTension ?? 1,
      nodeConflicts: [...(init.tensionProfile?.nodeConflicts ?? [])],
      barriers: [...(init.tensionProfile?.barriers ?? [])],
      unresolvedDesires: [...(init.tensionProfile?.unresolvedDesires ?? [])],
      blockedBy: [...(init.tensionProfile?.blockedBy ?? [])],
    };
    this.metadata = {
      createdAt: init.metadata?.createdAt ?? now,
      updatedAt: init.metadata?.updatedAt ?? now,
      version: init.metadata?.version ?? 1,
      parentId: init.metadata?.parentId ?? null,
      ...(init.metadata?.deadline !== undefined ? { deadline: init.metadata.deadline } : {}),
    };
  }

  /**
   * Build a unit, throwing `ValidationError` when any invariant is violated.
   */
  static create(init: UnitInit): Unit {
    const issues = checkUnit(init);
    if (issues.length > 0) {
      throw new ValidationError(`Invalid unit ${init.id || '<missing id>'}: ${issues.join('; ')}`, issues);
    }
    return new Unit(init);
  }

  /**
   * Build a unit from its stored record.
   */
  static fromRecord(raw: unknown): Unit {
    const parsed = UnitRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ValidationError(`Invalid unit record: ${issues.join('; ')}`, issues, parsed.error);
    }
    return Unit.create(recordToInit(parsed.data));
  }

  static fromJSON(json: string): Unit {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      throw new ValidationError('Unit record is not valid JSON', undefined, err instanceof Error ? err : undefined);
    }
    return Unit.fromRecord(raw);
  }

  toRecord(): UnitRecord {
    return {
      id: this.id,
      type: this.type,
      intent: this.intent,
      phases: [...this.phases],
      tension: this.tension,
      importance: this.importance,
      nodes: this.nodes.map(nodeToRecord),
      edges: this.edges.map(edge =>
        edge.condition !== undefined
          ? { from: edge.from, to: edge.to, condition: edge.condition }
          : { from: edge.from, to: edge.to },
      ),
      tension_profile: {
        max_tension: this.tensionProfile.maxTension,
        node_conflicts: [...this.tensionProfile.nodeConflicts],
        barriers: [...this.tensionProfile.barriers],
        unresolved_desires: [...this.tensionProfile.unresolvedDesires],
        blocked_by: [...this.tensionProfile.blockedBy],
      },
      metadata: {
        created_at: this.metadata.createdAt,
        updated_at: this.metadata.updatedAt,
        version: this.metadata.version,
        parent_id: this.metadata.parentId,
        ...(this.metadata.deadline !== undefined ? { deadline: this.metadata.deadline } : {}),
      },
    };
  }

  toJSON(): UnitRecord {
    return this.toRecord();
  }

  /**
   * Independent deep copy.
   */
  clone(): Unit {
    return Unit.fromRecord(this.toRecord());
  }

  /** Nodes tagged with a phase, in original list order */
  nodesByPhase(phase: Phase): UnitNode[] {
    return this.nodes.filter(node => node.phase === phase);
  }

  getNode(id: string): UnitNode | undefined {
    return this.nodes.find(node => node.id === id);
  }

  get nodeIds(): Set<string> {
    return new Set(this.nodes.map(node => node.id));
  }

  addNode(node: UnitNode): void {
    const issues = checkNode(node);
    if (this.getNode(node.id)) {
      issues.push(`duplicate node id: ${node.id}`);
    }
    if (issues.length > 0) {
      throw new ValidationError(`Cannot add node ${node.id}: ${issues.join('; ')}`, issues);
    }
    this.nodes.push(structuredClone(node));
    this.touch();
  }

  addEdge(edge: Edge): void {
    const issues = checkEdge(edge, this.nodeIds);
    if (issues.length > 0) {
      throw new ValidationError(`Cannot add edge ${edge.from} -> ${edge.to}: ${issues.join('; ')}`, issues);
    }
    this.edges.push({ ...edge });
    this.touch();
  }

  /**
   * Mark the unit resolved: tension drops to `tension`, every node completes.
   */
  resolve(tension: number = 0.1): void {
    this.tension = tension;
    for (const node of this.nodes) {
      node.state = 'completed';
    }
    this.touch();
  }

  touch(): void {
    this.metadata.updatedAt = new Date().toISOString();
  }
}

// ===== Invariants =====

function checkUnit(init: UnitInit): string[] {
  const issues: string[] = [];

  if (!init.id || !init.id.trim()) issues.push('id must be non-empty');
  if (!init.intent || !init.intent.trim()) issues.push('intent must be non-empty');
  if (!inUnitRange(init.tension)) issues.push(`tension out of range: ${init.tension}`);
  if (!inUnitRange(init.importance)) issues.push(`importance out of range: ${init.importance}`);
  if (init.nodes.length === 0) issues.push('at least one node is required');

  const seen = new Set<string>();
  for (const node of init.nodes) {
    issues.push(...checkNode(node));
    if (seen.has(node.id)) issues.push(`duplicate node id: ${node.id}`);
    seen.add(node.id);
  }

  for (const edge of init.edges) {
    issues.push(...checkEdge(edge, seen));
  }

  return issues;
}

function checkNode(node: UnitNode): string[] {
  const issues: string[] = [];
  if (!node.id) issues.push('node id must be non-empty');
  const hasPrimitive = Boolean(node.primitive);
  const hasUnitRef = Boolean(node.unitRef);
  if (hasPrimitive === hasUnitRef) {
    issues.push(`node ${node.id} must set exactly one of primitive or unitRef`);
  }
  if (!inUnitRange(node.tension)) issues.push(`node ${node.id} tension out of range: ${node.tension}`);
  return issues;
}

function checkEdge(edge: Edge, nodeIds: Set<string>): string[] {
  const issues: string[] = [];
  if (!nodeIds.has(edge.from)) issues.push(`edge references unknown node: ${edge.from}`);
  if (!nodeIds.has(edge.to)) issues.push(`edge references unknown node: ${edge.to}`);
  return issues;
}

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

// ===== Record conversion =====

function nodeToRecord(node: UnitNode): NodeRecord {
  return {
    id: node.id,
    type: node.type,
    phase: node.phase,
    description: node.description,
    primitive: node.primitive ?? null,
    unit_ref: node.unitRef ?? null,
    input: serializeInputRef(node.input),
    output: node.output ?? null,
    args: structuredClone(node.args),
    tension: node.tension,
    state: node.state,
  };
}

function recordToNode(record: NodeRecord): UnitNode {
  const node: UnitNode = {
    id: record.id,
    type: record.type,
    phase: record.phase,
    description: record.description,
    args: record.args,
    tension: record.tension,
    state: record.state,
  };
  if (record.primitive) node.primitive = record.primitive;
  if (record.unit_ref) node.unitRef = record.unit_ref;
  const input = parseInputRef(record.input);
  if (input) node.input = input;
  if (record.output) node.output = stripVarPrefix(record.output);
  return node;
}

function recordToInit(record: UnitRecord): UnitInit {
  const metadata: Partial<UnitMetadata> = {
    version: record.metadata.version,
    parentId: record.metadata.parent_id ?? null,
  };
  if (record.metadata.created_at) metadata.createdAt = record.metadata.created_at;
  if (record.metadata.updated_at) metadata.updatedAt = record.metadata.updated_at;
  if (record.metadata.deadline) metadata.deadline = record.metadata.deadline;

  return {
    id: record.id,
    type: record.type,
    intent: record.intent,
    phases: record.phases,
    tension: record.tension,
    importance: record.importance,
    nodes: record.nodes.map(recordToNode),
    edges: record.edges.map(edge =>
      edge.condition ? { from: edge.from, to: edge.to, condition: edge.condition } : { from: edge.from, to: edge.to },
    ),
    tensionProfile: {
      maxTension: record.tension_profile.max_tension,
      nodeConflicts: record.tension_profile.node_conflicts,
      barriers: record.tension_profile.barriers,
      unresolvedDesires: record.tension_profile.unresolved_desires,
      blockedBy: record.tension_profile.blocked_by,
    },
    metadata,
  };
}
