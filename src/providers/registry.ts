import type { LLMProvider, ProviderConfig, ProviderName } from './types.js';
import type { UnitloomConfig } from '../core/types.js';
import type { BaseLLMProvider } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import { ProviderError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

const FACTORIES: Record<ProviderName, (config: ProviderConfig) => BaseLLMProvider> = {
  anthropic: config => new AnthropicProvider(config),
  openai: config => new OpenAIProvider(config),
};

/**
 * Providers by name. Discovery registers the SDK providers whose key is
 * configured or present in the environment, Anthropic first.
 */
export class ProviderRegistry {
  private providers = new Map<string, LLMProvider>();
  private logger = getLogger();

  register(name: string, provider: LLMProvider): void {
    this.providers.set(name, provider);
    this.logger.debug({ provider: name }, 'Provider registered');
  }

  get(name: string): LLMProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ProviderError(`Provider "${name}" not found. Available: ${this.listAvailable().join(', ')}`, name);
    }
    return provider;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  listAvailable(): string[] {
    return Array.from(this.providers.keys());
  }

  discoverProviders(config: UnitloomConfig): void {
    const { maxRetries, model, anthropicApiKey, openaiApiKey } = config.providers;
    const keys: Record<ProviderName, string | undefined> = { anthropic: anthropicApiKey, openai: openaiApiKey };

    for (const name of ['anthropic', 'openai'] as const) {
      const provider = FACTORIES[name]({ apiKey: keys[name], maxRetries, defaultModel: model });
      if (provider.hasApiKey) {
        this.register(name, provider);
      }
    }

    this.logger.info({ providers: this.listAvailable() }, 'Provider discovery complete');
  }
}
