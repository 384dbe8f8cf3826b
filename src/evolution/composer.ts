import { createUnit } from '../graph/builder.js';
import type { Unit } from '../graph/unit.js';
import type { Edge, UnitNode } from '../graph/types.js';
import { EvolutionError } from '../core/errors.js';
import type { PoolMember } from './types.js';

function sources(unit: Unit): string[] {
  const targets = new Set(unit.edges.map(edge => edge.to));
  return unit.nodes.filter(node => !targets.has(node.id)).map(node => node.id);
}

function sinks(unit: Unit): string[] {
  const origins = new Set(unit.edges.map(edge => edge.from));
  return unit.nodes.filter(node => !origins.has(node.id)).map(node => node.id);
}

/**
 * Glue pool members into one composite unit, in the order given.
 * Node ids are prefixed `<pool>.`; output variable names are kept so data
 * still flows by name. Each stage's sinks feed the next stage's sources.
 */
export function composeMembers(intent: string, members: readonly PoolMember[], id?: string): Unit {
  if (members.length === 0) {
    throw new EvolutionError(`No pool members available to compose: ${intent}`);
  }

  const nodes: UnitNode[] = [];
  const edges: Edge[] = [];
  const prefix = (pool: string, nodeId: string): string => `${pool}.${nodeId}`;

  members.forEach(({ pool, unit }, i) => {
    for (const node of unit.nodes) {
      nodes.push({ ...structuredClone(node), id: prefix(pool, node.id), state: 'pending' });
    }
    for (const edge of unit.edges) {
      edges.push({ ...edge, from: prefix(pool, edge.from), to: prefix(pool, edge.to) });
    }

    const previous = members[i - 1];
    if (!previous) return;
    for (const from of sinks(previous.unit)) {
      for (const to of sources(unit)) {
        edges.push({ from: prefix(previous.pool, from), to: prefix(pool, to) });
      }
    }
  });

  return createUnit(intent, nodes, edges, {
    id,
    type: 'composite',
    tension: Math.max(...members.map(m => m.unit.tension)),
  });
}
