/**
 * One completion call: a prompt in, text out. Units only ever send a
 * single user prompt, so there is no message history here.
 */
export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
}

export interface ProviderConfig {
  apiKey?: string;
  defaultModel?: string;
  maxRetries?: number;
}

export type ProviderName = 'anthropic' | 'openai';
