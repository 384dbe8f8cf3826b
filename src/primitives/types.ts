import type { TextGenerator } from '../generation/types.js';
import type { UnitStore } from '../storage/unit-store.js';
import type { BlueprintLibrary } from '../blueprints/library.js';
import type { LivingMemory } from '../memory/living-memory.js';
import type { TensionSettings } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { RunResult } from '../interpreter/types.js';

/**
 * Collaborators a primitive may reach. Optional ones are absent when the
 * host did not configure them; primitives then return an `{ error }` value.
 */
export interface PrimitiveServices {
  generator: TextGenerator;
  units?: UnitStore;
  blueprints?: BlueprintLibrary;
  memory?: LivingMemory;
  tension: TensionSettings;
  logger: Logger;
}

export interface PrimitiveScope {
  /** The live run context; writes are visible to later nodes */
  variables: Record<string, unknown>;
  services: PrimitiveServices;
  /** Run a stored unit as a nested call, under the same recursion guard */
  runUnit(ref: string, input: unknown): Promise<RunResult>;
}

export type PrimitiveArgs = Readonly<Record<string, unknown>>;

export interface Primitive {
  name: string;
  description: string;
  invoke(input: unknown, args: PrimitiveArgs, scope: PrimitiveScope): unknown;
}
