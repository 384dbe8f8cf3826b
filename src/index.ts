/**
 * unitloom: programs as data. Units are small sense → act → feedback graphs
 * run by an interpreter over a fixed set of primitives, driven by tension
 * and improved by a pool-based evolution engine.
 *
 * @example
 * ```typescript
 * import { ConfigManager, Runtime, quickLlmUnit } from 'unitloom';
 *
 * const config = new ConfigManager().load();
 * const runtime = await Runtime.create({ config, projectDir: process.cwd() });
 * const run = await runtime.run(quickLlmUnit('Summarize', 'Summarize: {input}'), { input: 'long text' });
 * ```
 */

// Core
export { Runtime, type RuntimeOptions } from './core/runtime.js';
export { ConfigManager } from './core/config.js';
export { UnitloomConfigSchema, defaultConfig, type UnitloomConfig, type TensionSettings } from './core/types.js';
export { createLogger, getLogger, setLogger, type Logger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  UnitloomError,
  ValidationError,
  ConfigError,
  NodeExecutionError,
  UnknownPrimitiveError,
  RecursionLimitError,
  ProviderError,
  PersistenceError,
  EvolutionError,
  toError,
} from './core/errors.js';

// Graph model
export * from './graph/index.js';

// Execution
export * from './interpreter/index.js';
export * from './primitives/index.js';

// Tension
export * from './tension/index.js';

// Generation
export * from './generation/index.js';
export { BlueprintLibrary, DEFAULT_BLUEPRINTS_DIR, type BlueprintCustomization, type InstantiateOptions, type NodePatch } from './blueprints/library.js';

// Persistence
export * from './storage/index.js';

// Memory
export * from './memory/index.js';

// Evolution
export * from './evolution/index.js';

// Providers
export { ProviderRegistry } from './providers/registry.js';
export { AnthropicProvider } from './providers/anthropic.js';
export { OpenAIProvider } from './providers/openai.js';
export { BaseLLMProvider } from './providers/base.js';
export type { LLMProvider, CompletionOptions, ProviderConfig, ProviderName } from './providers/types.js';
