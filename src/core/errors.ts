export interface ErrorOptions {
  stage?: string;
  cause?: Error;
}

export class UnitloomError extends Error {
  public readonly stage?: string;

  constructor(
    message: string,
    public readonly code: string,
    options: ErrorOptions = {},
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'UnitloomError';
    this.stage = options.stage;
  }
}

export class ValidationError extends UnitloomError {
  constructor(message: string, public readonly issues: string[] = [message], cause?: Error) {
    super(message, 'VALIDATION_ERROR', { stage: 'construct', cause });
    this.name = 'ValidationError';
  }
}

export class ConfigError extends UnitloomError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', { stage: 'config', cause });
    this.name = 'ConfigError';
  }
}

export class NodeExecutionError extends UnitloomError {
  constructor(message: string, public readonly nodeId: string, cause?: Error) {
    super(message, 'NODE_EXECUTION_ERROR', { stage: 'run', cause });
    this.name = 'NodeExecutionError';
  }
}

export class UnknownPrimitiveError extends UnitloomError {
  constructor(public readonly primitive: string) {
    super(`Unknown primitive: ${primitive}`, 'UNKNOWN_PRIMITIVE', { stage: 'run' });
    this.name = 'UnknownPrimitiveError';
  }
}

export class RecursionLimitError extends UnitloomError {
  constructor(message: string, public readonly callStack: string[]) {
    super(message, 'RECURSION_LIMIT', { stage: 'run' });
    this.name = 'RecursionLimitError';
  }
}

export class ProviderError extends UnitloomError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'PROVIDER_ERROR', { stage: 'generate', cause });
    this.name = 'ProviderError';
  }
}

export class PersistenceError extends UnitloomError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', { stage: 'store', cause });
    this.name = 'PersistenceError';
  }
}

export class EvolutionError extends UnitloomError {
  constructor(message: string, public readonly pool?: string) {
    super(message, 'EVOLUTION_ERROR', { stage: 'evolve' });
    this.name = 'EvolutionError';
  }
}

/**
 * Normalise anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
