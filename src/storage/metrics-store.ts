import { z } from 'zod';
import { PersistenceError, toError } from '../core/errors.js';
import { readJson, writeJson } from '../utils/fs.js';

const UnitMetricsSchema = z.object({
  runs: z.number().int().min(0),
  totalSuccess: z.number().min(0),
  successRate: z.number().min(0).max(1),
  lastUsed: z.string().nullable(),
});

const HistoryEntrySchema = z.object({
  unitId: z.string(),
  task: z.string(),
  success: z.number(),
  timestamp: z.string(),
});

const MetricsFileSchema = z.object({
  units: z.record(UnitMetricsSchema).default({}),
  history: z.array(HistoryEntrySchema).default([]),
});

export type UnitMetrics = z.infer<typeof UnitMetricsSchema>;
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;
export type MetricsFile = z.infer<typeof MetricsFileSchema>;

/** Success rate reported for a unit that has never run */
export const UNKNOWN_SUCCESS_RATE = 0.5;

/**
 * Population statistics keyed by `pool/name`, kept apart from the units' own
 * files. Loaded once, then written back whole after every change.
 */
export class MetricsStore {
  private data: MetricsFile | null = null;

  constructor(private readonly path: string) {}

  get filePath(): string {
    return this.path;
  }

  async load(): Promise<MetricsFile> {
    if (this.data) return this.data;

    let raw: unknown;
    try {
      raw = await readJson(this.path);
    } catch (err) {
      throw new PersistenceError('Metrics file is not valid JSON', this.path, toError(err));
    }

    const parsed = MetricsFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new PersistenceError(`Metrics file is malformed: ${parsed.error.message}`, this.path, parsed.error);
    }
    this.data = parsed.data;
    return this.data;
  }

  async get(key: string): Promise<UnitMetrics | undefined> {
    const data = await this.load();
    return data.units[key];
  }

  async successRate(key: string): Promise<number> {
    return (await this.get(key))?.successRate ?? UNKNOWN_SUCCESS_RATE;
  }

  /**
   * Fold one run into the cumulative average and append to the history.
   */
  async record(key: string, success: number, task: string, now: Date = new Date()): Promise<UnitMetrics> {
    const data = await this.load();
    const timestamp = now.toISOString();
    const previous = data.units[key] ?? { runs: 0, totalSuccess: 0, successRate: 0, lastUsed: null };

    const runs = previous.runs + 1;
    const totalSuccess = previous.totalSuccess + success;
    const metrics: UnitMetrics = {
      runs,
      totalSuccess,
      successRate: totalSuccess / runs,
      lastUsed: timestamp,
    };

    data.units[key] = metrics;
    data.history.push({ unitId: key, task, success, timestamp });
    await this.flush();
    return metrics;
  }

  /**
   * Overwrite a unit's statistics.
   */
  async set(key: string, metrics: UnitMetrics): Promise<void> {
    const data = await this.load();
    data.units[key] = metrics;
    await this.flush();
  }

  async history(): Promise<HistoryEntry[]> {
    return [...(await this.load()).history];
  }

  private async flush(): Promise<void> {
    if (!this.data) return;
    try {
      await writeJson(this.path, this.data);
    } catch (err) {
      throw new PersistenceError('Failed to write metrics file', this.path, toError(err));
    }
  }
}
