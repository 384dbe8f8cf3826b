/**
 * Shared builders for unit tests: temp dirs, in-memory loaders, services.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';
import type { Unit } from '../../src/graph/unit.js';
import type { UnitLoader } from '../../src/graph/types.js';
import type { PrimitiveScope, PrimitiveServices } from '../../src/primitives/types.js';
import { PrimitiveRegistry } from '../../src/primitives/registry.js';
import { Interpreter } from '../../src/interpreter/interpreter.js';
import { DEFAULT_TENSION_SETTINGS } from '../../src/tension/calculus.js';
import { MockGenerator } from './mock-generator.js';

export function makeTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `unitloom-${label}-`));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Loader over a fixed set of units, keyed by id.
 */
export function inMemoryLoader(units: Unit[]): UnitLoader {
  const byId = new Map(units.map(unit => [unit.id, unit]));
  return async ref => byId.get(ref) ?? null;
}

export function makeServices(overrides: Partial<PrimitiveServices> = {}): PrimitiveServices {
  return {
    generator: new MockGenerator(),
    tension: DEFAULT_TENSION_SETTINGS,
    logger: pino({ level: 'silent' }),
    ...overrides,
  };
}

export function makeInterpreter(
  options: { units?: Unit[]; services?: Partial<PrimitiveServices>; maxDepth?: number } = {},
): Interpreter {
  return new Interpreter(PrimitiveRegistry.createDefault(), makeServices(options.services), {
    loader: inMemoryLoader(options.units ?? []),
    maxDepth: options.maxDepth,
  });
}

/**
 * Scope for invoking a primitive directly. Nested runs fail unless given.
 */
export function makeScope(
  variables: Record<string, unknown> = {},
  services: Partial<PrimitiveServices> = {},
  runUnit?: PrimitiveScope['runUnit'],
): PrimitiveScope {
  return {
    variables,
    services: makeServices(services),
    runUnit:
      runUnit ??
      (async ref => {
        throw new Error(`No nested runs in this scope: ${ref}`);
      }),
  };
}
