import { z } from 'zod';

// ===== Configuration =====

export const UnitloomConfigSchema = z.object({
  providers: z.object({
    default: z.enum(['anthropic', 'openai', 'none']).default('anthropic'),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    model: z.string().optional(),
    maxRetries: z.number().int().min(0).max(10).default(3),
  }).default({}),
  storage: z.object({
    unitsDir: z.string().default('./units'),
    poolsDir: z.string().default('./pools'),
    memoryDir: z.string().default('./memory'),
    metricsFile: z.string().default('./data/evolution_metrics.json'),
    /** Unset means the blueprints shipped with the package */
    blueprintsDir: z.string().optional(),
  }).default({}),
  interpreter: z.object({
    maxDepth: z.number().int().min(1).max(256).default(16),
  }).default({}),
  tension: z.object({
    importanceWeight: z.number().min(0).max(1).default(0.3),
    urgencyWeight: z.number().min(0).max(1).default(0.3),
    unresolvedWeight: z.number().min(0).max(1).default(0.2),
    blockingWeight: z.number().min(0).max(1).default(0.2),
    maxWeight: z.number().min(0).max(1).default(0.7),
    avgWeight: z.number().min(0).max(1).default(0.3),
    importanceDecay: z.number().min(0).max(1).default(0.9),
    urgencyHorizonMs: z.number().positive().default(24 * 60 * 60 * 1000),
    blockWeight: z.number().min(0).max(1).default(0.2),
    resolvedTension: z.number().min(0).max(1).default(0.1),
  }).default({}),
  evolution: z.object({
    pools: z.array(z.string().min(1)).min(1).default(['sense', 'act', 'feedback']),
    evolveBelow: z.number().min(0).max(1).default(0.4),
    pruneMinSuccessRate: z.number().min(0).max(1).default(0.2),
    pruneMinRuns: z.number().int().min(0).default(5),
  }).default({}),
  memory: z.object({
    topK: z.number().int().min(1).default(3),
    newMemoryTension: z.number().min(0).max(1).default(0.8),
    learningRate: z.number().min(0).max(1).default(0.2),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type UnitloomConfig = z.infer<typeof UnitloomConfigSchema>;

export type TensionSettings = UnitloomConfig['tension'];

/** Fully-defaulted configuration, as parsed from an empty source */
export function defaultConfig(): UnitloomConfig {
  return UnitloomConfigSchema.parse({});
}
