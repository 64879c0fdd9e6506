export class StoreUnavailableError extends Error {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }

  declare cause: unknown;
}

export class SessionBusyError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} already has a turn in flight`);
    this.name = 'SessionBusyError';
  }
}

export class DuplicateToolNameError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolNameError';
  }
}

export class RegistrySealedError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool registry is sealed; cannot register ${toolName}`);
    this.name = 'RegistrySealedError';
  }
}

export class MissingTransactionKeyError extends Error {
  constructor(public readonly toolName: string) {
    super(`Write-once tool ${toolName} must declare a transaction key`);
    this.name = 'MissingTransactionKeyError';
  }
}

/**
 * Failure reported by an upstream service a tool depends on. `outcome` says
 * whether the side effect is known not to have happened (`failed`) or may have
 * happened (`unknown`, e.g. the request was sent but the connection dropped).
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly options: {
      service: string;
      outcome: 'failed' | 'unknown';
      retryable: boolean;
      statusCode?: number;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'UpstreamError';
    this.cause = options.cause;
  }

  declare cause: unknown;

  get outcome(): 'failed' | 'unknown' {
    return this.options.outcome;
  }

  get retryable(): boolean {
    return this.options.retryable;
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(`${message}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class ToolNotFoundError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool not registered: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Raised by a tool body when the request is well-formed but cannot be served:
 * an unknown plan code, a checkout the provider has never heard of.
 */
export class ToolRejectedError extends Error {
  constructor(
    message: string,
    public readonly kind: 'InvalidInput' | 'NotFound',
  ) {
    super(message);
    this.name = 'ToolRejectedError';
  }
}

export class ToolTimeoutError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}
