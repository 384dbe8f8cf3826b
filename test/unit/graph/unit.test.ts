import { describe, it, expect } from 'vitest';
import { Unit } from '../../../src/graph/unit.js';
import { createNode } from '../../../src/graph/builder.js';
import { varRef } from '../../../src/graph/reference.js';
import { ValidationError } from '../../../src/core/errors.js';
import type { UnitInit } from '../../../src/graph/types.js';

function baseInit(overrides: Partial<UnitInit> = {}): UnitInit {
  return {
    id: 'u1',
    intent: 'Echo input',
    tension: 0.5,
    importance: 0.5,
    nodes: [
      createNode('s1', 'get', { phase: 'sense', args: { key: 'input' }, output: 'input' }),
      createNode('f1', 'emit', { phase: 'feedback', input: '$input', output: 'output' }),
    ],
    edges: [{ from: 's1', to: 'f1' }],
    ...overrides,
  };
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  return [];
}

describe('Unit', () => {
  describe('create', () => {
    it('should fill defaults for type, phases, profile and metadata', () => {
      const unit = Unit.create(baseInit());
      expect(unit.type).toBe('composite');
      expect(unit.phases).toEqual(['sense', 'act', 'feedback']);
      expect(unit.tensionProfile.maxTension).toBe(1);
      expect(unit.tensionProfile.blockedBy).toEqual([]);
      expect(unit.metadata.version).toBe(1);
      expect(unit.metadata.parentId).toBeNull();
    });

    it('should reject an empty id and intent', () => {
      const issues = issuesOf(() => Unit.create(baseInit({ id: '', intent: '  ' })));
      expect(issues).toContain('id must be non-empty');
      expect(issues).toContain('intent must be non-empty');
    });

    it('should reject out-of-range tension and importance', () => {
      const issues = issuesOf(() => Unit.create(baseInit({ tension: 1.5, importance: -0.1 })));
      expect(issues).toContain('tension out of range: 1.5');
      expect(issues).toContain('importance out of range: -0.1');
    });

    it('should require at least one node', () => {
      const issues = issuesOf(() => Unit.create(baseInit({ nodes: [], edges: [] })));
      expect(issues).toEqual(['at least one node is required']);
    });

    it('should reject duplicate node ids', () => {
      const node = createNode('s1', 'get');
      const issues = issuesOf(() => Unit.create(baseInit({ nodes: [node, node], edges: [] })));
      expect(issues).toEqual(['duplicate node id: s1']);
    });

    it('should reject edges to unknown nodes', () => {
      const issues = issuesOf(() => Unit.create(baseInit({ edges: [{ from: 's1', to: 'zz' }] })));
      expect(issues).toEqual(['edge references unknown node: zz']);
    });

    it('should require exactly one of primitive and unitRef', () => {
      const both = { ...createNode('a1', 'get'), unitRef: 'other' };
      const issues = issuesOf(() => Unit.create(baseInit({ nodes: [both], edges: [] })));
      expect(issues).toEqual(['node a1 must set exactly one of primitive or unitRef']);
    });

    it('should throw ValidationError carrying every issue', () => {
      expect(() => Unit.create(baseInit({ id: '', tension: 2 }))).toThrow(ValidationError);
      expect(issuesOf(() => Unit.create(baseInit({ id: '', tension: 2 })))).toHaveLength(2);
    });
  });

  describe('records', () => {
    it('should round-trip id, intent, node count and edge count', () => {
      const unit = Unit.create(baseInit());
      const copy = Unit.fromRecord(JSON.parse(JSON.stringify(unit.toRecord())));
      expect(copy.id).toBe('u1');
      expect(copy.intent).toBe('Echo input');
      expect(copy.nodes).toHaveLength(2);
      expect(copy.edges).toHaveLength(1);
    });

    it('should store variable inputs with a $ prefix and read them back', () => {
      const record = Unit.create(baseInit()).toRecord();
      expect(record.nodes[1].input).toBe('$input');
      expect(record.nodes[0].input).toBeNull();
      expect(record.nodes[0].unit_ref).toBeNull();

      const unit = Unit.fromRecord(record);
      expect(unit.nodes[1].input).toEqual(varRef('input'));
      expect(unit.nodes[0].input).toBeUndefined();
    });

    it('should strip a leading $ from stored outputs', () => {
      const record = Unit.create(baseInit()).toRecord();
      record.nodes[0].output = '$input';
      expect(Unit.fromRecord(record).nodes[0].output).toBe('input');
    });

    it('should default optional record fields', () => {
      const unit = Unit.fromRecord({
        id: 'minimal',
        intent: 'Minimal',
        tension: 0.3,
        nodes: [{ id: 'n1', type: 'process', phase: 'act', primitive: 'emit' }],
      });
      expect(unit.type).toBe('composite');
      expect(unit.importance).toBe(0.5);
      expect(unit.edges).toEqual([]);
      expect(unit.nodes[0]).toMatchObject({ description: '', args: {}, tension: 0.5, state: 'pending' });
    });

    it('should reject a record failing the schema', () => {
      const issues = issuesOf(() => Unit.fromRecord({ id: 'bad', intent: 'x', tension: 0.5, nodes: [] }));
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^nodes:/);
    });

    it('should reject malformed JSON text', () => {
      expect(() => Unit.fromJSON('{not json')).toThrow('Unit record is not valid JSON');
    });

    it('should keep edge conditions', () => {
      const unit = Unit.create(baseInit({ edges: [{ from: 's1', to: 'f1', condition: 'ok' }] }));
      expect(unit.toRecord().edges).toEqual([{ from: 's1', to: 'f1', condition: 'ok' }]);
    });
  });

  describe('mutation', () => {
    it('should clone independently', () => {
      const unit = Unit.create(baseInit());
      const copy = unit.clone();
      copy.nodes[0].state = 'completed';
      expect(unit.nodes[0].state).toBe('pending');
    });

    it('should group nodes by phase in list order', () => {
      const unit = Unit.create(baseInit());
      expect(unit.nodesByPhase('sense').map(n => n.id)).toEqual(['s1']);
      expect(unit.nodesByPhase('act')).toEqual([]);
    });

    it('should add nodes and edges with validation', () => {
      const unit = Unit.create(baseInit());
      unit.addNode(createNode('a1', 'call_llm', { input: '$input' }));
      unit.addEdge({ from: 's1', to: 'a1' });
      expect(unit.nodeIds.has('a1')).toBe(true);
      expect(unit.edges).toHaveLength(2);
      expect(() => unit.addNode(createNode('a1', 'emit'))).toThrow(ValidationError);
      expect(() => unit.addEdge({ from: 'a1', to: 'missing' })).toThrow(ValidationError);
    });

    it('should resolve to low tension with every node completed', () => {
      const unit = Unit.create(baseInit({ tension: 0.9 }));
      unit.resolve();
      expect(unit.tension).toBe(0.1);
      expect(unit.nodes.every(n => n.state === 'completed')).toBe(true);
    });
  });
});
