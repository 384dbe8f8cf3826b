import type { TextGenerator } from './types.js';
import { extractJsonRecord } from './json.js';
import { generateUnitPrompt } from './prompts.js';
import { Unit } from '../graph/unit.js';
import { generateUnitId, quickLlmUnit } from '../graph/builder.js';
import { validateRecord } from '../graph/validate.js';
import type { BlueprintLibrary } from '../blueprints/library.js';
import { ValidationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export type GenerationSource = 'generated' | 'blueprint' | 'builder';

export interface GeneratedUnit {
  unit: Unit;
  source: GenerationSource;
}

export interface GenerateOptions {
  /** Blueprint offered to the model and used as fallback */
  blueprint?: string;
  /** Extra prompt text, e.g. a failure reason */
  notes?: string;
  id?: string;
}

/**
 * Asks the text generator for a whole unit. When the reply holds no valid
 * unit, the named blueprint is instantiated instead, and failing that a
 * minimal get → call_llm → emit unit is built.
 */
export class UnitGenerator {
  private logger = getLogger();

  constructor(
    private readonly generator: TextGenerator,
    private readonly blueprints: BlueprintLibrary,
    private readonly primitives: readonly string[] = [],
  ) {}

  async generate(intent: string, options: GenerateOptions = {}): Promise<GeneratedUnit> {
    const blueprint = options.blueprint ? await this.blueprints.load(options.blueprint) : null;
    const prompt = generateUnitPrompt(intent, this.primitives, blueprint, options.notes);
    const response = await this.generator.generate(prompt);

    const generated = this.parse(response, options.id);
    if (generated) {
      return { unit: generated, source: 'generated' };
    }

    if (options.blueprint) {
      const fromBlueprint = await this.blueprints.instantiate(options.blueprint, { intent, id: options.id });
      if (fromBlueprint) {
        return { unit: fromBlueprint, source: 'blueprint' };
      }
    }

    const built = quickLlmUnit(intent, `${intent}: {input}`);
    return { unit: options.id ? Unit.fromRecord({ ...built.toRecord(), id: options.id }) : built, source: 'builder' };
  }

  private parse(response: string, id?: string): Unit | null {
    const record = extractJsonRecord(response);
    if (!record) {
      this.logger.debug({ generator: this.generator.name }, 'No unit JSON in generator response');
      return null;
    }

    if (id || typeof record.id !== 'string' || !record.id) {
      record.id = id ?? generateUnitId();
    }

    const report = validateRecord(record);
    if (!report.valid) {
      this.logger.warn({ errors: report.errors }, 'Generated unit is invalid');
      return null;
    }

    try {
      return Unit.fromRecord(record);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.logger.warn({ issues: err.issues }, 'Generated unit rejected');
        return null;
      }
      throw err;
    }
  }
}
