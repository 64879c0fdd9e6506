import { createFetchHttpFetcher, isAbortError, type HttpFetcher } from '../../adapters/http';
import { LlmProviderError, classifyHttpStatus } from '../errors';
import type {
  LlmGenerateRequest,
  LlmGenerateResponse,
  LlmMessage,
  LlmProvider,
  LlmProviderGenerateContext,
  LlmProviderId,
} from '../types';

export interface ProviderBaseOptions {
  id: LlmProviderId;
  model: string;
  endpoint: string;
  fetcher?: HttpFetcher;
}

/**
 * Collapses runs of same-role messages into one message. Replayed tool
 * results and corrective notes can produce such runs; providers that insist
 * on strict user/assistant alternation reject them.
 */
export function mergeConsecutiveMessages(messages: LlmMessage[]): LlmMessage[] {
  const merged: LlmMessage[] = [];
  for (const message of messages) {
    const previous = merged[merged.length - 1];
    if (previous && previous.role === message.role) {
      merged[merged.length - 1] = { role: message.role, content: `${previous.content}\n\n${message.content}` };
      continue;
    }
    merged.push({ ...message });
  }
  return merged;
}

export abstract class BaseHttpLlmProvider implements LlmProvider {
  readonly id: LlmProviderId;
  readonly model: string;
  private readonly endpoint: string;
  private readonly fetcher: HttpFetcher;

  protected constructor(options: ProviderBaseOptions) {
    this.id = options.id;
    this.model = options.model;
    this.endpoint = options.endpoint;
    this.fetcher = options.fetcher ?? createFetchHttpFetcher();
  }

  async generate(request: LlmGenerateRequest, context: LlmProviderGenerateContext): Promise<LlmGenerateResponse> {
    if (!context.resolvedKey.key) {
      throw new LlmProviderError('API key is missing for provider request.', {
        provider: this.id,
        code: 'key_not_found',
        retryable: false,
      });
    }

    const payload = this.buildRequestBody(request);

    try {
      const response = await this.fetcher({
        url: this.endpoint,
        method: 'POST',
        headers: this.buildHeaders(context.resolvedKey.key),
        body: JSON.stringify(payload),
        timeoutMs: context.timeoutMs,
        signal: context.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        const text = await response.text();
        throw classifyHttpStatus(this.id, response.status, `${this.id} request failed with HTTP ${response.status}: ${text}`);
      }

      const data = await response.json();
      context.logger.debug('llm.provider.response', { status: response.status });
      return this.parseResponse(data);
    } catch (error) {
      if (error instanceof LlmProviderError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new LlmProviderError(`${this.id} network request failed: ${message}`, {
        provider: this.id,
        code: isAbortError(error) ? 'timeout' : 'network_error',
        retryable: true,
        cause: error,
      });
    }
  }

  protected invalidResponse(detail: string): LlmProviderError {
    return new LlmProviderError(`${this.id} returned an unexpected payload: ${detail}`, {
      provider: this.id,
      code: 'invalid_response',
      retryable: false,
    });
  }

  protected abstract buildRequestBody(request: LlmGenerateRequest): unknown;
  protected abstract buildHeaders(apiKey: string): Record<string, string>;
  protected abstract parseResponse(raw: unknown): LlmGenerateResponse;
}
