/**
 * Tension Calculus
 *
 * Tension is the drive value of a unit: high means unresolved and urgent,
 * low means settled. Every function here is pure.
 */

import { defaultConfig, type TensionSettings } from '../core/types.js';
import { clamp01 } from '../utils/guards.js';
import type { Unit } from '../graph/unit.js';

export const DEFAULT_TENSION_SETTINGS: TensionSettings = defaultConfig().tension;

export interface TensionFactors {
  importance: number;
  urgency: number;
  unresolved: number;
  blocking: number;
}

const DEFAULT_FACTORS: TensionFactors = {
  importance: 0.5,
  urgency: 0.5,
  unresolved: 0.5,
  blocking: 0,
};

/**
 * Weighted sum of the four factors, clamped to [0, 1].
 */
export function calculateTension(
  factors: Partial<TensionFactors> = {},
  settings: TensionSettings = DEFAULT_TENSION_SETTINGS,
): number {
  const f = { ...DEFAULT_FACTORS, ...factors };
  const tension =
    f.importance * settings.importanceWeight +
    f.urgency * settings.urgencyWeight +
    f.unresolved * settings.unresolvedWeight +
    f.blocking * settings.blockingWeight;
  return clamp01(tension);
}

/**
 * Urgency from an ISO deadline: 1 when past due, 0 beyond the horizon,
 * linear in between. No deadline (or an unreadable one) is 0.5.
 */
export function calculateUrgency(
  deadline?: string | null,
  horizonMs: number = DEFAULT_TENSION_SETTINGS.urgencyHorizonMs,
  now: Date = new Date(),
): number {
  if (!deadline) return 0.5;

  const due = Date.parse(deadline);
  if (Number.isNaN(due)) return 0.5;

  const left = due - now.getTime();
  if (left <= 0) return 1;
  if (left >= horizonMs) return 0;
  return 1 - left / horizonMs;
}

/**
 * 1 minus the completed-or-resolved fraction. An empty collection is fully resolved.
 */
export function unresolvedRatio(items: ReadonlyArray<{ state?: string }>): number {
  if (items.length === 0) return 0;
  const resolved = items.filter(item => item.state === 'completed' || item.state === 'resolved').length;
  return 1 - resolved / items.length;
}

export function blockingFactor(
  blockedCount: number,
  perBlock: number = DEFAULT_TENSION_SETTINGS.blockWeight,
): number {
  return Math.min(1, blockedCount * perBlock);
}

/**
 * Tension of a single unit from its own importance, deadline, node states
 * and blockers.
 */
export function unitTension(
  unit: Unit,
  settings: TensionSettings = DEFAULT_TENSION_SETTINGS,
  now: Date = new Date(),
): number {
  return calculateTension(
    {
      importance: unit.importance,
      urgency: calculateUrgency(unit.metadata.deadline, settings.urgencyHorizonMs, now),
      unresolved: unresolvedRatio(unit.nodes),
      blocking: blockingFactor(unit.tensionProfile.blockedBy.length, settings.blockWeight),
    },
    settings,
  );
}

/**
 * Parent tension from its children: biased toward the most urgent child
 * without ignoring the rest. No children gives 0.5.
 */
export function propagateTensionUp(
  childTensions: readonly number[],
  settings: TensionSettings = DEFAULT_TENSION_SETTINGS,
): number {
  if (childTensions.length === 0) return 0.5;
  const max = Math.max(...childTensions);
  const avg = childTensions.reduce((sum, t) => sum + t, 0) / childTensions.length;
  return max * settings.maxWeight + avg * settings.avgWeight;
}

export function inheritImportance(
  parentImportance: number,
  explicit?: number,
  settings: TensionSettings = DEFAULT_TENSION_SETTINGS,
): number {
  return explicit ?? parentImportance * settings.importanceDecay;
}
