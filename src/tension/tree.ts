import type { TensionSettings } from '../core/types.js';
import type { Unit } from '../graph/unit.js';
import { clamp01 } from '../utils/guards.js';
import {
  DEFAULT_TENSION_SETTINGS,
  inheritImportance,
  propagateTensionUp,
  unitTension,
} from './calculus.js';

/**
 * A unit hierarchy for tension propagation.
 */
export interface TensionTree {
  unit: Unit;
  /** Overrides the importance inherited from the parent */
  explicitImportance?: number;
  children: TensionTree[];
}

/**
 * Recompute a whole tree in two passes: importance flows top-down, then
 * tension is computed bottom-up so every parent sees settled child values.
 * Returns the root's tension.
 */
export function updateAllTensions(
  root: TensionTree,
  settings: TensionSettings = DEFAULT_TENSION_SETTINGS,
  now: Date = new Date(),
): number {
  root.unit.importance = clamp01(root.explicitImportance ?? root.unit.importance);
  pushImportanceDown(root, settings);
  return pullTensionUp(root, settings, now);
}

function pushImportanceDown(tree: TensionTree, settings: TensionSettings): void {
  for (const child of tree.children) {
    child.unit.importance = clamp01(inheritImportance(tree.unit.importance, child.explicitImportance, settings));
    pushImportanceDown(child, settings);
  }
}

function pullTensionUp(tree: TensionTree, settings: TensionSettings, now: Date): number {
  const tension =
    tree.children.length === 0
      ? unitTension(tree.unit, settings, now)
      : propagateTensionUp(
          tree.children.map(child => pullTensionUp(child, settings, now)),
          settings,
        );
  tree.unit.tension = clamp01(tension);
  return tree.unit.tension;
}
