import type { TensionSettings } from '../core/types.js';
import type { Unit } from '../graph/unit.js';
import { DEFAULT_TENSION_SETTINGS, unitTension } from './calculus.js';

/**
 * Population-level tension registry, keyed by unit id.
 */
export class TensionManager {
  private units: Map<string, Unit> = new Map();

  constructor(private settings: TensionSettings = DEFAULT_TENSION_SETTINGS) {}

  register(unit: Unit): void {
    this.units.set(unit.id, unit);
  }

  unregister(id: string): boolean {
    return this.units.delete(id);
  }

  get(id: string): Unit | undefined {
    return this.units.get(id);
  }

  list(): Unit[] {
    return Array.from(this.units.values());
  }

  get size(): number {
    return this.units.size;
  }

  /**
   * Recompute one unit's tension. Unknown ids report 0.
   */
  updateTension(id: string, now: Date = new Date()): number {
    const unit = this.units.get(id);
    if (!unit) return 0;
    unit.tension = unitTension(unit, this.settings, now);
    return unit.tension;
  }

  updateAll(now: Date = new Date()): void {
    for (const unit of this.units.values()) {
      unit.tension = unitTension(unit, this.settings, now);
    }
  }

  /** First registered unit wins ties */
  getHighestTension(): Unit | null {
    let best: Unit | null = null;
    for (const unit of this.units.values()) {
      if (!best || unit.tension > best.tension) best = unit;
    }
    return best;
  }

  getAboveThreshold(threshold: number): Unit[] {
    return this.list().filter(unit => unit.tension >= threshold);
  }

  /**
   * Force a unit to a low, settled tension and complete every node.
   */
  resolve(id: string): boolean {
    const unit = this.units.get(id);
    if (!unit) return false;
    unit.resolve(this.settings.resolvedTension);
    return true;
  }
}
