import type { LlmErrorCode, LlmProviderId } from './types';

const RETRYABLE_CODES: ReadonlySet<LlmErrorCode> = new Set(['timeout', 'rate_limit', 'server_error', 'network_error']);

/** One provider tried (or skipped) while routing a request. */
export interface LlmAttempt {
  provider: LlmProviderId;
  code: LlmErrorCode;
  message: string;
  statusCode?: number;
}

export class LlmProviderError extends Error {
  constructor(
    message: string,
    public readonly options: {
      code: LlmErrorCode;
      provider: LlmProviderId;
      statusCode?: number;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'LlmProviderError';
    this.cause = options.cause;
  }

  declare cause: unknown;

  get code(): LlmErrorCode {
    return this.options.code;
  }

  get provider(): LlmProviderId {
    return this.options.provider;
  }

  get retryable(): boolean {
    return this.options.retryable ?? RETRYABLE_CODES.has(this.options.code);
  }

  toAttempt(): LlmAttempt {
    return {
      provider: this.provider,
      code: this.code,
      message: this.message,
      ...(this.options.statusCode === undefined ? {} : { statusCode: this.options.statusCode }),
    };
  }
}

export class LlmRoutingExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: LlmAttempt[],
  ) {
    super(message);
    this.name = 'LlmRoutingExhaustedError';
  }

  /** Error code of the last provider that was actually called, if any. */
  get lastFailureCode(): LlmErrorCode | undefined {
    const called = this.attempts.filter((attempt) => attempt.code !== 'provider_not_enabled' && attempt.code !== 'key_not_found');
    return called[called.length - 1]?.code;
  }
}

export function classifyHttpStatus(provider: LlmProviderId, statusCode: number, message: string): LlmProviderError {
  if (statusCode === 401 || statusCode === 403) {
    return new LlmProviderError(message, { provider, code: 'auth_error', statusCode, retryable: false });
  }
  if (statusCode === 408) {
    return new LlmProviderError(message, { provider, code: 'timeout', statusCode, retryable: true });
  }
  // 529: Anthropic's "overloaded", which behaves like a rate limit.
  if (statusCode === 429 || statusCode === 529) {
    return new LlmProviderError(message, { provider, code: 'rate_limit', statusCode, retryable: true });
  }
  if (statusCode >= 500) {
    return new LlmProviderError(message, { provider, code: 'server_error', statusCode, retryable: true });
  }
  if (statusCode >= 400) {
    return new LlmProviderError(message, { provider, code: 'bad_request', statusCode, retryable: false });
  }
  return new LlmProviderError(message, { provider, code: 'unknown', statusCode });
}
