import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { UnitloomConfigSchema, type UnitloomConfig } from './types.js';
import { ConfigError, toError } from './errors.js';
import { isRecord } from '../utils/guards.js';

export class ConfigManager {
  private config: UnitloomConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.unitloom');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: Record<string, unknown>): UnitloomConfig {
    let raw: Record<string, unknown> = {};

    raw = this.mergeFile(raw, join(this.globalDir, 'config.yaml'), 'global');
    raw = this.mergeFile(raw, join(this.projectDir, '.unitloom.yaml'), 'project');

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = UnitloomConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): UnitloomConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): void {
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# unitloom global configuration
# API keys (or set via environment variables)
providers:
  default: anthropic
  # anthropicApiKey: ...
  # openaiApiKey: ...

interpreter:
  maxDepth: 16

evolution:
  evolveBelow: 0.4
  pruneMinSuccessRate: 0.2
  pruneMinRuns: 5
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
  }

  private mergeFile(
    raw: Record<string, unknown>,
    path: string,
    label: string,
  ): Record<string, unknown> {
    if (!existsSync(path)) return raw;
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      if (isRecord(parsed)) {
        return this.deepMerge(raw, parsed);
      }
      return raw;
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const providers = isRecord(raw.providers) ? { ...raw.providers } : {};

    if (process.env.ANTHROPIC_API_KEY) {
      providers.anthropicApiKey = process.env.ANTHROPIC_API_KEY;
    }
    if (process.env.OPENAI_API_KEY) {
      providers.openaiApiKey = process.env.OPENAI_API_KEY;
    }
    if (process.env.UNITLOOM_PROVIDER) {
      providers.default = process.env.UNITLOOM_PROVIDER;
    }
    if (process.env.UNITLOOM_MODEL) {
      providers.model = process.env.UNITLOOM_MODEL;
    }
    raw.providers = providers;

    const dataDir = process.env.UNITLOOM_DATA_DIR;
    if (dataDir) {
      const storage = isRecord(raw.storage) ? { ...raw.storage } : {};
      storage.unitsDir = join(dataDir, 'units');
      storage.poolsDir = join(dataDir, 'pools');
      storage.memoryDir = join(dataDir, 'memory');
      storage.metricsFile = join(dataDir, 'evolution_metrics.json');
      raw.storage = storage;
    }

    if (process.env.UNITLOOM_LOG_LEVEL) {
      const logging = isRecord(raw.logging) ? { ...raw.logging } : {};
      logging.level = process.env.UNITLOOM_LOG_LEVEL;
      raw.logging = logging;
    }

    return raw;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}
