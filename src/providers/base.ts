import type { CompletionOptions, LLMProvider, ProviderConfig } from './types.js';
import { getLogger } from '../core/logger.js';
import { retry } from '../utils/retry.js';

const TRANSIENT_ERRORS = ['rate_limit', 'overloaded', 'timeout', '529', '503', '429'];

/**
 * Shared model resolution, key lookup and retry for the SDK-backed providers.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;
  /** Environment variable consulted when no key is configured */
  protected abstract readonly envKey: string;

  protected logger = getLogger();

  constructor(protected readonly config: ProviderConfig = {}) {}

  get apiKey(): string | undefined {
    return this.config.apiKey || process.env[this.envKey] || undefined;
  }

  get hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const model = options.model || this.config.defaultModel || this.defaultModel;
    const maxTokens = options.maxTokens ?? 4096;
    this.logger.debug({ provider: this.name, model }, 'LLM request');

    return retry(() => this.send(prompt, model, maxTokens), {
      maxRetries: this.config.maxRetries ?? 3,
      baseDelay: 1000,
      retryableErrors: TRANSIENT_ERRORS,
      onRetry: (attempt, error) => {
        this.logger.warn({ provider: this.name, attempt, error: error.message }, 'Retrying LLM call');
      },
    });
  }

  protected abstract send(prompt: string, model: string, maxTokens: number): Promise<string>;
}
