import type { Primitive, PrimitiveArgs } from './types.js';
import { asNumber } from '../utils/guards.js';

const NO_MEMORY = { error: 'Living memory not configured' };

function contextText(input: unknown): string {
  if (typeof input === 'string') return input;
  if (input === undefined || input === null) return '';
  return JSON.stringify(input);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function boolArg(args: PrimitiveArgs, key: string, fallback: boolean): boolean {
  const value = args[key];
  return typeof value === 'boolean' ? value : fallback;
}

export const loadMemories: Primitive = {
  name: 'load_memories',
  description: 'Reload living memory and list its records',
  async invoke(_input, _args, { services }) {
    if (!services.memory) return NO_MEMORY;
    await services.memory.load();
    return (await services.memory.list()).map(memory => memory.toRecord());
  },
};

export const senseMemories: Primitive = {
  name: 'sense_memories',
  description: 'Rate every memory against the input context',
  async invoke(input, _args, { services }) {
    if (!services.memory) return NO_MEMORY;
    const sensed = await services.memory.sense(contextText(input));
    return sensed.map(memory => ({ id: memory.id, intent: memory.intent, activation: memory.activation }));
  },
};

/**
 * Must follow `sense_memories`; activations come from the last sense.
 */
export const activateMemories: Primitive = {
  name: 'activate_memories',
  description: 'Activate the strongest sensed memories and return their contents',
  async invoke(_input, args, { services }) {
    if (!services.memory) return NO_MEMORY;
    const topK = typeof args.top_k === 'number' ? args.top_k : undefined;
    const active = await services.memory.activate(topK, asNumber(args.threshold, 0));
    return active.map(memory => memory.content);
  },
};

export const createMemory: Primitive = {
  name: 'create_memory',
  description: 'Store the input as a new memory',
  async invoke(input, args, { services }) {
    if (!services.memory) return NO_MEMORY;
    const intent =
      (typeof args.intent === 'string' && args.intent) || (typeof input === 'string' && input) || 'Untitled memory';
    const tension = typeof args.tension === 'number' ? args.tension : undefined;
    const memory = await services.memory.create(intent, input, stringList(args.triggers), tension);
    return memory.toRecord();
  },
};

export const learnFromExperience: Primitive = {
  name: 'learn_from_experience',
  description: 'Extract a lesson from the input result and remember it',
  async invoke(input, args, { services }) {
    if (!services.memory) return NO_MEMORY;
    const task = typeof args.task === 'string' ? args.task : 'Completed task';
    const memory = await services.memory.learn(task, input, boolArg(args, 'success', true));
    return memory ? memory.toRecord() : null;
  },
};

export const MEMORY_PRIMITIVES: Primitive[] = [
  loadMemories,
  senseMemories,
  activateMemories,
  createMemory,
  learnFromExperience,
];
