import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { MetricsStore, UNKNOWN_SUCCESS_RATE } from '../../../src/storage/metrics-store.js';
import { PersistenceError } from '../../../src/core/errors.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

describe('MetricsStore', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = makeTempDir('metrics');
    path = join(dir, 'data', 'metrics.json');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should start empty when no file exists', async () => {
    const store = new MetricsStore(path);
    expect(await store.load()).toEqual({ units: {}, history: [] });
    expect(await store.successRate('act/x')).toBe(UNKNOWN_SUCCESS_RATE);
  });

  it('should keep a cumulative success rate and a history', async () => {
    const store = new MetricsStore(path);
    const now = new Date('2024-05-01T10:00:00.000Z');

    expect(await store.record('act/x', 1, 'first', now)).toEqual({
      runs: 1,
      totalSuccess: 1,
      successRate: 1,
      lastUsed: '2024-05-01T10:00:00.000Z',
    });
    const second = await store.record('act/x', 0, 'second', now);
    expect(second.runs).toBe(2);
    expect(second.successRate).toBe(0.5);

    expect((await store.history()).map(h => [h.unitId, h.task, h.success])).toEqual([
      ['act/x', 'first', 1],
      ['act/x', 'second', 0],
    ]);
  });

  it('should persist across instances', async () => {
    await new MetricsStore(path).record('sense/y', 0.5, 'task');
    expect(await new MetricsStore(path).successRate('sense/y')).toBe(0.5);
  });

  it('should overwrite statistics', async () => {
    const store = new MetricsStore(path);
    await store.set('act/z', { runs: 8, totalSuccess: 0.8, successRate: 0.1, lastUsed: null });
    expect(await store.get('act/z')).toEqual({ runs: 8, totalSuccess: 0.8, successRate: 0.1, lastUsed: null });
  });

  it('should reject an unreadable file', async () => {
    writeFileSync(join(dir, 'bad.json'), '{');
    await expect(new MetricsStore(join(dir, 'bad.json')).load()).rejects.toThrow('Metrics file is not valid JSON');
  });

  it('should reject a malformed file', async () => {
    writeFileSync(join(dir, 'odd.json'), JSON.stringify({ units: 5 }));
    await expect(new MetricsStore(join(dir, 'odd.json')).load()).rejects.toBeInstanceOf(PersistenceError);
  });
});
