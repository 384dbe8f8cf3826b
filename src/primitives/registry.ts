import type { Primitive } from './types.js';
import { UnknownPrimitiveError } from '../core/errors.js';
import { DATA_PRIMITIVES } from './data.js';
import { CONTROL_PRIMITIVES } from './control.js';
import { UNIT_PRIMITIVES } from './unit-ops.js';
import { LLM_PRIMITIVES } from './llm.js';
import { IO_PRIMITIVES } from './io.js';
import { TENSION_PRIMITIVES } from './tension.js';
import { MEMORY_PRIMITIVES } from './memory.js';

export class PrimitiveRegistry {
  private primitives = new Map<string, Primitive>();

  /**
   * Registering an existing name replaces it.
   */
  register(primitive: Primitive): void {
    this.primitives.set(primitive.name, primitive);
  }

  get(name: string): Primitive {
    const primitive = this.primitives.get(name);
    if (!primitive) {
      throw new UnknownPrimitiveError(name);
    }
    return primitive;
  }

  has(name: string): boolean {
    return this.primitives.has(name);
  }

  list(): Primitive[] {
    return Array.from(this.primitives.values());
  }

  names(): string[] {
    return Array.from(this.primitives.keys());
  }

  get size(): number {
    return this.primitives.size;
  }

  static createDefault(): PrimitiveRegistry {
    const registry = new PrimitiveRegistry();
    for (const primitive of [
      ...DATA_PRIMITIVES,
      ...CONTROL_PRIMITIVES,
      ...UNIT_PRIMITIVES,
      ...LLM_PRIMITIVES,
      ...IO_PRIMITIVES,
      ...TENSION_PRIMITIVES,
      ...MEMORY_PRIMITIVES,
    ]) {
      registry.register(primitive);
    }
    return registry;
  }
}
