import { UpstreamError } from '../errors';

export interface HttpResponseLike {
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetcher = (input: {
  url: string;
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}) => Promise<HttpResponseLike>;

/** Default fetcher over the global `fetch`, with the timeout applied as an abort signal. */
export function createFetchHttpFetcher(): HttpFetcher {
  return async (input) => {
    const signals: AbortSignal[] = [];
    if (input.timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(input.timeoutMs));
    }
    if (input.signal) {
      signals.push(input.signal);
    }

    const response = await fetch(input.url, {
      method: input.method,
      headers: input.headers,
      body: input.body,
      signal: signals.length === 0 ? undefined : AbortSignal.any(signals),
    });

    return {
      status: response.status,
      json: () => response.json(),
      text: () => response.text(),
    };
  };
}

const REFUSED_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN']);

function errorCode(error: unknown): string | undefined {
  const source = error instanceof Error && error.cause !== undefined ? error.cause : error;
  if (typeof source === 'object' && source !== null && 'code' in source && typeof source.code === 'string') {
    return source.code;
  }
  return undefined;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export interface JsonRequest {
  service: string;
  url: string;
  method: 'GET' | 'POST';
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Sends a JSON request and returns the decoded body. Failures become
 * UpstreamError: `failed` when the service provably did not act on the
 * request (refused connection, 4xx, 502/503), `unknown` when it may have
 * (timeout, dropped connection, 500, 504).
 */
export async function requestJson(fetcher: HttpFetcher, request: JsonRequest): Promise<unknown> {
  let response: HttpResponseLike;
  try {
    response = await fetcher({
      url: request.url,
      method: request.method,
      headers: {
        accept: 'application/json',
        ...(request.body === undefined ? {} : { 'content-type': 'application/json' }),
        ...(request.headers ?? {}),
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      timeoutMs: request.timeoutMs,
      signal: request.signal,
    });
  } catch (error) {
    const code = errorCode(error);
    const refused = code !== undefined && REFUSED_CODES.has(code);
    const message = error instanceof Error ? error.message : String(error);
    throw new UpstreamError(`${request.service} request failed: ${message}`, {
      service: request.service,
      outcome: refused ? 'failed' : 'unknown',
      retryable: true,
      cause: error,
    });
  }

  if (response.status < 200 || response.status >= 300) {
    const text = await response.text().catch(() => '');
    const statusCode = response.status;
    const definitelyUnprocessed = statusCode < 500 || statusCode === 502 || statusCode === 503;
    throw new UpstreamError(`${request.service} returned HTTP ${statusCode}${text ? `: ${text}` : ''}`, {
      service: request.service,
      outcome: definitelyUnprocessed ? 'failed' : 'unknown',
      retryable: statusCode === 408 || statusCode === 429 || statusCode >= 500,
      statusCode,
    });
  }

  try {
    return await response.json();
  } catch (error) {
    throw new UpstreamError(`${request.service} returned a body that is not JSON`, {
      service: request.service,
      outcome: 'unknown',
      retryable: false,
      statusCode: response.status,
      cause: error,
    });
  }
}
