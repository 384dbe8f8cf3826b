import { describe, it, expect } from 'vitest';
import { composeMembers } from '../../../src/evolution/composer.js';
import { createNode, createUnit } from '../../../src/graph/builder.js';
import { EvolutionError } from '../../../src/core/errors.js';
import type { PoolMember } from '../../../src/evolution/types.js';

function members(): PoolMember[] {
  const sense = createUnit(
    'Read',
    [
      createNode('s1', 'get', { phase: 'sense', args: { key: 'input' }, output: 'input' }),
      createNode('s2', 'emit', { phase: 'sense', input: '$input', output: 'seen' }),
    ],
    [{ from: 's1', to: 's2' }],
    { type: 'sense', tension: 0.3 },
  );
  const act = createUnit('Shout', [createNode('a1', 'emit', { input: '$seen', output: 'result' })], [], {
    type: 'act',
    tension: 0.9,
  });
  const feedback = createUnit('Return', [createNode('f1', 'emit', { phase: 'feedback', input: '$result' })], [], {
    type: 'feedback',
    tension: 0.4,
  });
  return [
    { pool: 'sense', name: 'reader', unit: sense },
    { pool: 'act', name: 'shouter', unit: act },
    { pool: 'feedback', name: 'returner', unit: feedback },
  ];
}

describe('composeMembers', () => {
  it('should prefix node ids by pool and chain the stages', () => {
    const unit = composeMembers('Do it', members(), 'comp_1');
    expect(unit.id).toBe('comp_1');
    expect(unit.type).toBe('composite');
    expect(unit.nodes.map(n => n.id)).toEqual(['sense.s1', 'sense.s2', 'act.a1', 'feedback.f1']);
    expect(unit.edges).toEqual([
      { from: 'sense.s1', to: 'sense.s2' },
      { from: 'sense.s2', to: 'act.a1' },
      { from: 'act.a1', to: 'feedback.f1' },
    ]);
  });

  it('should keep output names and reset node state', () => {
    const parts = members();
    parts[1].unit.nodes[0].state = 'completed';
    const unit = composeMembers('Do it', parts);
    expect(unit.getNode('act.a1')?.output).toBe('result');
    expect(unit.nodes.every(n => n.state === 'pending')).toBe(true);
  });

  it('should take the highest member tension', () => {
    expect(composeMembers('Do it', members()).tension).toBe(0.9);
  });

  it('should refuse an empty member list', () => {
    expect(() => composeMembers('Do it', [])).toThrow(EvolutionError);
  });
});
