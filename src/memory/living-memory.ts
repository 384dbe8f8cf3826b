/**
 * Living memory: recall units that rate their own relevance.
 *
 * Each memory senses a context (trigger match, else a generator rating),
 * the strongest are activated, and feedback moves their tension and
 * success rate. Learning turns an experience into a new memory.
 */

import type { TextGenerator } from '../generation/types.js';
import { extractJsonRecord } from '../generation/json.js';
import { batchRelevancePrompt, learnPrompt, relevancePrompt } from '../generation/prompts.js';
import type { MemoryStore } from '../storage/memory-store.js';
import { toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { truncate } from '../utils/fs.js';
import { clamp01 } from '../utils/guards.js';
import { MemoryUnit, generateMemoryId } from './memory-unit.js';
import type { LessonContent, LivingMemoryOptions, MemoryStats } from './types.js';

const DEFAULT_OPTIONS: LivingMemoryOptions = {
  topK: 3,
  newMemoryTension: 0.8,
  learningRate: 0.2,
};

/** Relevance assumed when a rating cannot be read */
const DEFAULT_RELEVANCE = 0.1;
const TRIGGER_RELEVANCE = 0.9;

function readRelevance(value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value.trim()) : NaN;
  return Number.isFinite(n) ? n : DEFAULT_RELEVANCE;
}

function describe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value);
}

export class LivingMemory {
  private memories: MemoryUnit[] = [];
  private loaded = false;
  private options: LivingMemoryOptions;
  private logger = getLogger();

  constructor(
    private readonly store: MemoryStore,
    private readonly generator: TextGenerator,
    options: Partial<LivingMemoryOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * (Re)read every memory from the store. Returns how many loaded.
   */
  async load(): Promise<number> {
    this.memories = await this.store.loadAll();
    this.loaded = true;
    this.logger.debug({ count: this.memories.length }, 'Memories loaded');
    return this.memories.length;
  }

  async ensureLoaded(): Promise<void> {
    if (!this.loaded) await this.load();
  }

  async list(): Promise<MemoryUnit[]> {
    await this.ensureLoaded();
    return [...this.memories];
  }

  async size(): Promise<number> {
    await this.ensureLoaded();
    return this.memories.length;
  }

  /**
   * Compute every memory's activation for a context. Trigger matches take
   * the fast path; the rest are rated by the generator, in one batched call
   * when more than one remains.
   */
  async sense(context: string): Promise<MemoryUnit[]> {
    await this.ensureLoaded();

    const unmatched: MemoryUnit[] = [];
    for (const memory of this.memories) {
      if (memory.matches(context)) {
        memory.setActivationFromRelevance(TRIGGER_RELEVANCE);
      } else {
        unmatched.push(memory);
      }
    }

    if (unmatched.length > 1) {
      await this.rateBatch(context, unmatched);
    } else if (unmatched.length === 1) {
      await this.rateOne(context, unmatched[0]);
    }

    return [...this.memories];
  }

  /**
   * Activate the strongest memories above `threshold`, persist their usage,
   * and return them. Their `content` is the payload.
   */
  async activate(topK: number = this.options.topK, threshold: number = 0): Promise<MemoryUnit[]> {
    await this.ensureLoaded();

    const activated = this.memories
      .filter(memory => memory.activation > threshold)
      .sort((a, b) => b.activation - a.activation)
      .slice(0, topK);

    const now = new Date();
    for (const memory of activated) {
      memory.activate(now);
      await this.store.save(memory);
    }
    return activated;
  }

  async feedback(memories: readonly MemoryUnit[], success: boolean): Promise<void> {
    for (const memory of memories) {
      memory.feedback(success, this.options.learningRate);
      await this.store.save(memory);
    }
  }

  async create(
    intent: string,
    content: unknown,
    triggers: string[] = [],
    tension: number = this.options.newMemoryTension,
  ): Promise<MemoryUnit> {
    await this.ensureLoaded();

    const memory = new MemoryUnit({
      id: generateMemoryId(),
      intent,
      content,
      triggers,
      tension: clamp01(tension),
      success_rate: 0.5,
      times_used: 0,
      created_at: new Date().toISOString(),
      last_activated: null,
    });

    this.memories.push(memory);
    await this.store.save(memory);
    this.logger.debug({ id: memory.id, intent }, 'Memory created');
    return memory;
  }

  /**
   * Extract a lesson from an experience. Null when the generator fails or
   * its reply holds no JSON object.
   */
  async learn(task: string, result: unknown, success: boolean): Promise<MemoryUnit | null> {
    const resultText = describe(result);
    const response = await this.ask(learnPrompt(task, resultText, success));
    if (response === null) return null;

    const learning = extractJsonRecord(response);
    if (!learning) {
      this.logger.info({ task: truncate(task, 60) }, 'No lesson JSON in generator response');
      return null;
    }

    let intent = typeof learning.intent === 'string' ? learning.intent.trim() : '';
    let lesson = typeof learning.lesson === 'string' ? learning.lesson.trim() : '';
    if (!intent || intent.toLowerCase() === 'what to remember') {
      intent = `Lesson from: ${task.slice(0, 50)}`;
    }
    if (!lesson) {
      lesson = `Task ${success ? 'succeeded' : 'failed'}: ${resultText.slice(0, 100)}`;
    }

    const content: LessonContent = {
      lesson,
      sourceTask: task,
      sourceResult: resultText,
      wasSuccessful: success,
    };
    return this.create(intent, content, readPatterns(learning.patterns));
  }

  /**
   * Delete memories below both thresholds. Returns how many went.
   */
  async prune(minTension: number = 0.05, minSuccess: number = 0.2): Promise<number> {
    await this.ensureLoaded();

    const doomed = this.memories.filter(m => m.tension < minTension && m.successRate < minSuccess);
    for (const memory of doomed) {
      await this.store.remove(memory.id);
    }
    this.memories = this.memories.filter(m => !doomed.includes(m));

    if (doomed.length > 0) {
      this.logger.info({ pruned: doomed.length }, 'Memories pruned');
    }
    return doomed.length;
  }

  async getByTension(minTension: number = 0.5): Promise<MemoryUnit[]> {
    await this.ensureLoaded();
    return this.memories.filter(m => m.tension >= minTension);
  }

  async getByIntent(keyword: string): Promise<MemoryUnit[]> {
    await this.ensureLoaded();
    const needle = keyword.toLowerCase();
    return this.memories.filter(m => m.intent.toLowerCase().includes(needle));
  }

  async clear(): Promise<void> {
    await this.ensureLoaded();
    for (const memory of this.memories) {
      await this.store.remove(memory.id);
    }
    this.memories = [];
  }

  async stats(): Promise<MemoryStats> {
    await this.ensureLoaded();
    const n = this.memories.length;
    if (n === 0) {
      return { count: 0, avgTension: 0, maxTension: 0, minTension: 0, avgSuccessRate: 0, totalUses: 0 };
    }
    const tensions = this.memories.map(m => m.tension);
    return {
      count: n,
      avgTension: tensions.reduce((a, b) => a + b, 0) / n,
      maxTension: Math.max(...tensions),
      minTension: Math.min(...tensions),
      avgSuccessRate: this.memories.reduce((sum, m) => sum + m.successRate, 0) / n,
      totalUses: this.memories.reduce((sum, m) => sum + m.timesUsed, 0),
    };
  }

  // ─── Rating ───

  private async rateOne(context: string, memory: MemoryUnit): Promise<void> {
    const response = await this.ask(relevancePrompt(memory.intent, context));
    memory.setActivationFromRelevance(response === null ? DEFAULT_RELEVANCE : readRelevance(response));
  }

  private async rateBatch(context: string, memories: MemoryUnit[]): Promise<void> {
    const intents: Record<string, string> = {};
    memories.forEach((memory, i) => {
      intents[String(i)] = memory.intent;
    });

    const response = await this.ask(batchRelevancePrompt(context, intents));
    const ratings = response === null ? null : extractJsonRecord(response);

    memories.forEach((memory, i) => {
      memory.setActivationFromRelevance(ratings ? readRelevance(ratings[String(i)]) : DEFAULT_RELEVANCE);
    });
  }

  /**
   * A generator failure degrades to null.
   */
  private async ask(prompt: string): Promise<string | null> {
    try {
      return await this.generator.generate(prompt);
    } catch (err) {
      this.logger.warn({ generator: this.generator.name, error: toError(err).message }, 'Memory generator call failed');
      return null;
    }
  }
}

function readPatterns(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.split(',').map(p => p.trim()).filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((p): p is string => typeof p === 'string');
  }
  return [];
}
