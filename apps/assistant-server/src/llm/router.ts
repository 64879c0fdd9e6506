import type { Logger } from '../logging';
import { LoggerLlmAuditSink } from './audit';
import { LlmProviderError, LlmRoutingExhaustedError, type LlmAttempt } from './errors';
import type {
  KeyResolutionService,
  LlmAuditEvent,
  LlmAuditSink,
  LlmGenerateResponse,
  LlmProvider,
  LlmProviderId,
  LlmRouteRequest,
  LlmRoutingPolicy,
} from './types';

export interface LlmRouterOptions {
  providers: LlmProvider[];
  keyResolution: KeyResolutionService;
  logger: Logger;
  auditSink?: LlmAuditSink;
}

const EXHAUSTED_MESSAGE = 'No LLM provider could fulfill the request.';

function routeOrder(routing: LlmRoutingPolicy): LlmProviderId[] {
  return [routing.primary, ...routing.fallbackOrder.filter((id) => id !== routing.primary)];
}

function asProviderError(providerId: LlmProviderId, error: unknown): LlmProviderError {
  if (error instanceof LlmProviderError) {
    return error;
  }
  return new LlmProviderError(error instanceof Error ? error.message : String(error), {
    provider: providerId,
    code: 'unknown',
    retryable: false,
    cause: error,
  });
}

/**
 * Sends a generation request to the primary provider and, on retryable
 * failures only, to each fallback in turn. Providers without a resolvable
 * key are skipped. Every step is reported to the audit sink.
 */
export class LlmRouter {
  private readonly providerMap = new Map<LlmProviderId, LlmProvider>();
  private readonly auditSink: LlmAuditSink;

  constructor(private readonly options: LlmRouterOptions) {
    for (const provider of options.providers) {
      this.providerMap.set(provider.id, provider);
    }
    this.auditSink = options.auditSink ?? new LoggerLlmAuditSink(options.logger.child({ subsystem: 'llm' }));
  }

  /** Providers in routing order that are configured and have a resolvable key. */
  async readyProviders(routing: LlmRoutingPolicy, keyContext?: LlmRouteRequest['keyContext']): Promise<LlmProviderId[]> {
    const ready: LlmProviderId[] = [];
    for (const providerId of routeOrder(routing)) {
      if (!this.providerMap.has(providerId)) {
        continue;
      }
      const key = await this.options.keyResolution.resolveKey({
        provider: providerId,
        scopes: routing.keyScopes,
        partnerId: keyContext?.partnerId,
      });
      if (key) {
        ready.push(providerId);
      }
    }
    return ready;
  }

  async generate(routeRequest: LlmRouteRequest): Promise<LlmGenerateResponse> {
    const { requestId, routing, signal } = routeRequest;
    const order = routeOrder(routing);
    const attempts: LlmAttempt[] = [];
    const emit = (event: LlmAuditEvent['event'], fields: Omit<LlmAuditEvent, 'ts' | 'event' | 'requestId'> = {}) =>
      this.auditSink.emit({ ts: new Date().toISOString(), event, requestId, ...fields });
    const exhausted = (): LlmRoutingExhaustedError => {
      emit('llm.route.exhausted', { metadata: { attempts } });
      return new LlmRoutingExhaustedError(EXHAUSTED_MESSAGE, attempts);
    };

    emit('llm.route.start', { metadata: { order, keyScopes: routing.keyScopes } });

    for (const [index, providerId] of order.entries()) {
      if (signal?.aborted) {
        attempts.push({ provider: providerId, code: 'timeout', message: 'Request was cancelled before the provider was called' });
        throw exhausted();
      }

      const provider = this.providerMap.get(providerId);
      if (!provider) {
        emit('llm.route.provider.skipped', { provider: providerId, metadata: { reason: 'provider_not_enabled' } });
        attempts.push({ provider: providerId, code: 'provider_not_enabled', message: 'Provider not configured' });
        continue;
      }

      const resolvedKey = await this.options.keyResolution.resolveKey({
        provider: providerId,
        scopes: routing.keyScopes,
        partnerId: routeRequest.keyContext?.partnerId,
      });
      if (!resolvedKey) {
        emit('llm.route.provider.skipped', { provider: providerId, metadata: { reason: 'key_not_found' } });
        attempts.push({ provider: providerId, code: 'key_not_found', message: 'No key resolved for provider' });
        continue;
      }

      const target = { provider: providerId, model: provider.model };
      emit('llm.route.provider.attempt', {
        ...target,
        metadata: { scope: resolvedKey.scope, source: resolvedKey.source, keyId: resolvedKey.keyId, attemptIndex: index },
      });

      try {
        const response = await provider.generate(routeRequest.request, {
          resolvedKey,
          timeoutMs: routing.timeoutMs,
          signal,
          logger: this.options.logger.child({ requestId, provider: providerId }),
          requestId,
        });
        emit('llm.route.provider.success', { ...target, metadata: { scope: resolvedKey.scope, source: resolvedKey.source } });
        return response;
      } catch (error) {
        const providerError = asProviderError(providerId, error);
        attempts.push(providerError.toAttempt());
        emit('llm.route.provider.failure', {
          ...target,
          metadata: {
            code: providerError.code,
            retryable: providerError.retryable,
            statusCode: providerError.options.statusCode,
          },
        });

        const nextProvider = order[index + 1];
        if (nextProvider === undefined || !providerError.retryable) {
          throw exhausted();
        }
        emit('llm.route.provider.fallback', { ...target, metadata: { reason: providerError.code, nextProvider } });
      }
    }

    throw exhausted();
  }
}
