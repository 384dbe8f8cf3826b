import Anthropic from '@anthropic-ai/sdk';
import { BaseLLMProvider } from './base.js';

export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-sonnet-4-20250514';
  protected readonly envKey = 'ANTHROPIC_API_KEY';

  private client: Anthropic | null = null;

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  protected async send(prompt: string, model: string, maxTokens: number): Promise<string> {
    const response = await this.getClient().messages.create({
      model,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });

    // Text blocks only; tool-use blocks never occur for a bare prompt
    return response.content.map(block => (block.type === 'text' ? block.text : '')).join('');
  }
}
