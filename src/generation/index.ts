export type { TextGenerator } from './types.js';
export { fillTemplate } from './template.js';
export { extractJsonObject, extractJsonRecord, type JsonExtraction } from './json.js';
export { PlaceholderGenerator, ProviderTextGenerator, createTextGenerator } from './generators.js';
export { generateUnitPrompt, relevancePrompt, batchRelevancePrompt, learnPrompt } from './prompts.js';
export { UnitGenerator, type GeneratedUnit, type GenerateOptions, type GenerationSource } from './unit-generator.js';
