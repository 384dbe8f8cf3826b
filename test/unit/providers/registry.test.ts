import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProviderRegistry } from '../../../src/providers/registry.js';
import { ProviderError } from '../../../src/core/errors.js';
import { defaultConfig, type UnitloomConfig } from '../../../src/core/types.js';
import { MockProvider } from '../../helpers/mock-provider.js';

function makeConfig(overrides: Partial<UnitloomConfig['providers']> = {}): UnitloomConfig {
  const config = defaultConfig();
  return { ...config, providers: { ...config.providers, ...overrides } };
}

describe('ProviderRegistry', () => {
  beforeEach(() => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('OPENAI_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should register and look up providers', () => {
    const registry = new ProviderRegistry();
    const mock = new MockProvider();
    registry.register('mock', mock);

    expect(registry.has('mock')).toBe(true);
    expect(registry.get('mock')).toBe(mock);
    expect(registry.listAvailable()).toEqual(['mock']);
  });

  it('should name the available providers when one is missing', () => {
    const registry = new ProviderRegistry();
    registry.register('mock', new MockProvider());

    expect(() => registry.get('other')).toThrow(ProviderError);
    expect(() => registry.get('other')).toThrow('Provider "other" not found. Available: mock');
  });

  it('should discover nothing without API keys', () => {
    const registry = new ProviderRegistry();
    registry.discoverProviders(makeConfig());
    expect(registry.listAvailable()).toEqual([]);
  });

  it('should discover providers from configured keys', () => {
    const registry = new ProviderRegistry();
    registry.discoverProviders(makeConfig({ anthropicApiKey: 'test-secret' }));
    expect(registry.listAvailable()).toEqual(['anthropic']);
  });

  it('should discover providers from the environment', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    const registry = new ProviderRegistry();
    registry.discoverProviders(makeConfig());
    expect(registry.listAvailable()).toEqual(['openai']);
    expect(registry.get('openai').defaultModel).toBe('gpt-4o');
  });
});
