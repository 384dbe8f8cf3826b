import type { TextGenerator } from './types.js';
import type { LLMProvider } from '../providers/types.js';
import type { UnitloomConfig } from '../core/types.js';
import { ProviderRegistry } from '../providers/registry.js';
import { toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

/**
 * Deterministic stand-in used when no provider is configured.
 */
export class PlaceholderGenerator implements TextGenerator {
  readonly name = 'placeholder';

  async generate(prompt: string): Promise<string> {
    return `[LLM Response to: ${prompt.slice(0, 100)}...]`;
  }
}

/**
 * Adapts an LLM provider to the one-call generator contract. Provider
 * failures come back as `[<provider> Error: <message>]`.
 */
export class ProviderTextGenerator implements TextGenerator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly maxTokens: number = 2048,
  ) {}

  get name(): string {
    return this.provider.name;
  }

  async generate(prompt: string): Promise<string> {
    try {
      return await this.provider.complete(prompt, { maxTokens: this.maxTokens });
    } catch (err) {
      const error = toError(err);
      getLogger().warn({ provider: this.provider.name, error: error.message }, 'Generation failed');
      return `[${displayName(this.provider.name)} Error: ${error.message}]`;
    }
  }
}

function displayName(provider: string): string {
  if (provider === 'openai') return 'OpenAI';
  return provider.charAt(0).toUpperCase() + provider.slice(1);
}

/**
 * Build the generator the configuration asks for: the default provider when
 * its key is present, otherwise the first discovered one, otherwise the
 * placeholder.
 */
export async function createTextGenerator(
  config: UnitloomConfig,
  registry: ProviderRegistry = new ProviderRegistry(),
): Promise<TextGenerator> {
  if (config.providers.default === 'none') {
    return new PlaceholderGenerator();
  }

  registry.discoverProviders(config);

  if (registry.has(config.providers.default)) {
    return new ProviderTextGenerator(registry.get(config.providers.default));
  }
  const [fallback] = registry.listAvailable();
  if (fallback) {
    return new ProviderTextGenerator(registry.get(fallback));
  }

  getLogger().info('No LLM provider configured, using placeholder generator');
  return new PlaceholderGenerator();
}
