import { nanoid } from 'nanoid';
import { clamp01 } from '../utils/guards.js';
import { MemoryRecordSchema, type MemoryRecord } from './types.js';

function stamp(now: Date): string {
  return now.toISOString().replace(/[-:TZ.]/g, '');
}

export function generateMemoryId(now: Date = new Date()): string {
  return `mem_${stamp(now)}_${nanoid(6)}`;
}

/**
 * A recall unit. `activation` is recomputed per query and never stored.
 */
export class MemoryUnit {
  readonly id: string;
  intent: string;
  content: unknown;
  triggers: string[];
  tension: number;
  successRate: number;
  timesUsed: number;
  readonly createdAt: string;
  lastActivated: string | null;
  activation = 0;

  constructor(record: MemoryRecord) {
    this.id = record.id;
    this.intent = record.intent;
    this.content = record.content;
    this.triggers = [...record.triggers];
    this.tension = record.tension;
    this.successRate = record.success_rate;
    this.timesUsed = record.times_used;
    this.createdAt = record.created_at ?? new Date().toISOString();
    this.lastActivated = record.last_activated ?? null;
  }

  static fromRecord(raw: unknown): MemoryUnit {
    return new MemoryUnit(MemoryRecordSchema.parse(raw));
  }

  /**
   * Fast-path relevance: a trigger found in the context.
   */
  matches(context: string): boolean {
    const haystack = context.toLowerCase();
    return this.triggers.some(trigger => trigger !== '' && haystack.includes(trigger.toLowerCase()));
  }

  /**
   * Mark as used and hand out the payload.
   */
  activate(now: Date = new Date()): unknown {
    this.timesUsed++;
    this.lastActivated = now.toISOString();
    return this.content;
  }

  feedback(success: boolean, rate: number = 0.2): void {
    this.successRate = this.successRate * (1 - rate) + (success ? 1 : 0) * rate;
    this.tension = success ? Math.max(0.05, this.tension * 0.9) : Math.min(1, this.tension * 1.15);
  }

  setActivationFromRelevance(relevance: number): void {
    this.activation = this.tension * clamp01(relevance);
  }

  toRecord(): MemoryRecord {
    return {
      id: this.id,
      intent: this.intent,
      content: this.content,
      triggers: [...this.triggers],
      tension: this.tension,
      success_rate: this.successRate,
      times_used: this.timesUsed,
      created_at: this.createdAt,
      last_activated: this.lastActivated,
    };
  }
}
