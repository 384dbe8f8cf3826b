import { describe, it, expect, beforeEach } from 'vitest';
import { TensionManager } from '../../../src/tension/manager.js';
import { tensionUnit } from './helpers.js';

describe('TensionManager', () => {
  let manager: TensionManager;

  beforeEach(() => {
    manager = new TensionManager();
  });

  it('should register and unregister units', () => {
    manager.register(tensionUnit('a'));
    expect(manager.size).toBe(1);
    expect(manager.get('a')?.id).toBe('a');
    expect(manager.unregister('a')).toBe(true);
    expect(manager.unregister('a')).toBe(false);
  });

  it('should recompute a registered unit', () => {
    manager.register(tensionUnit('a', { tension: 0.9 }));
    expect(manager.updateTension('a')).toBeCloseTo(0.5);
    expect(manager.get('a')?.tension).toBeCloseTo(0.5);
  });

  it('should report 0 for an unknown unit', () => {
    expect(manager.updateTension('ghost')).toBe(0);
  });

  it('should find the most tense unit, first registered on ties', () => {
    expect(manager.getHighestTension()).toBeNull();
    manager.register(tensionUnit('a', { tension: 0.3 }));
    manager.register(tensionUnit('b', { tension: 0.7 }));
    manager.register(tensionUnit('c', { tension: 0.7 }));
    expect(manager.getHighestTension()?.id).toBe('b');
  });

  it('should list units at or above a threshold', () => {
    manager.register(tensionUnit('a', { tension: 0.3 }));
    manager.register(tensionUnit('b', { tension: 0.7 }));
    expect(manager.getAboveThreshold(0.7).map(u => u.id)).toEqual(['b']);
  });

  it('should resolve a unit to the settled tension', () => {
    const unit = tensionUnit('a', { tension: 0.9, states: ['pending', 'failed'] });
    manager.register(unit);
    expect(manager.resolve('a')).toBe(true);
    expect(unit.tension).toBe(0.1);
    expect(unit.nodes.map(n => n.state)).toEqual(['completed', 'completed']);
    expect(manager.resolve('ghost')).toBe(false);
  });

  it('should update every unit', () => {
    const a = tensionUnit('a', { tension: 0.1, importance: 1 });
    manager.register(a);
    manager.updateAll();
    // 0.3 + 0.15 + 0.2
    expect(a.tension).toBeCloseTo(0.65);
  });
});
