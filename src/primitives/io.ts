import type { Primitive } from './types.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function toLevel(value: unknown): LogLevel {
  const level = typeof value === 'string' ? value.toLowerCase() : 'info';
  return LOG_LEVELS.find(l => l === level) ?? 'info';
}

export const emit: Primitive = {
  name: 'emit',
  description: 'Pass the input through as the unit output',
  invoke(input) {
    return input;
  },
};

export const log: Primitive = {
  name: 'log',
  description: 'Log the input and pass it through',
  invoke(input, args, { services }) {
    const message = typeof args.message === 'string' ? args.message : 'unit log';
    services.logger[toLevel(args.level)]({ value: input }, message);
    return input;
  },
};

/**
 * `source: context` reads a variable; anything else returns the input.
 */
export const readInput: Primitive = {
  name: 'read_input',
  description: 'Read external input from the run context',
  invoke(input, args, { variables }) {
    if (args.source === 'context') {
      return typeof args.key === 'string' ? variables[args.key] : undefined;
    }
    return input;
  },
};

export const IO_PRIMITIVES: Primitive[] = [emit, log, readInput];
