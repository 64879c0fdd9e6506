import type { Logger } from '../logging';
import { LlmProviderError, LlmRoutingExhaustedError, type LlmRouter, type LlmRoutingPolicy } from '../llm';
import type { ProfileBag } from '../session/profile';
import type { ToolDescriptor } from '../tools/registry';
import type { Turn } from '../types';
import { buildSystemPrompt, renderHistory } from './prompt';
import { parseReasoningOutput, type ReasoningOutcome } from './protocol';

export interface ReasoningRequest {
  requestId: string;
  sessionId: string;
  /** Full history including the inbound user turn. */
  turns: readonly Turn[];
  tools: ToolDescriptor[];
  profile: ProfileBag;
  channel?: string;
  correction?: string;
  partnerId?: string;
}

export interface ReasoningReadiness {
  ok: boolean;
  detail: string;
}

export interface ReasoningClient {
  converse(request: ReasoningRequest): Promise<ReasoningOutcome>;
  readiness(): Promise<ReasoningReadiness>;
}

/** Used when no provider is enabled: every call reports `unavailable`. */
export class UnconfiguredReasoningClient implements ReasoningClient {
  async converse(): Promise<ReasoningOutcome> {
    return { kind: 'unavailable', detail: 'No reasoning provider is configured.' };
  }

  async readiness(): Promise<ReasoningReadiness> {
    return { ok: false, detail: 'llm router disabled' };
  }
}

export interface LlmReasoningClientOptions {
  router: LlmRouter;
  logger: Logger;
  routing: LlmRoutingPolicy;
  temperature?: number;
  maxOutputTokens?: number;
}

export class LlmReasoningClient implements ReasoningClient {
  constructor(private readonly options: LlmReasoningClientOptions) {}

  async converse(request: ReasoningRequest): Promise<ReasoningOutcome> {
    const logger = this.options.logger.child({ requestId: request.requestId, sessionId: request.sessionId });
    const systemPrompt = buildSystemPrompt({
      tools: request.tools,
      profile: request.profile,
      channel: request.channel,
      correction: request.correction,
    });

    let content: string;
    try {
      const response = await this.options.router.generate({
        requestId: request.requestId,
        request: {
          systemPrompt,
          messages: renderHistory(request.turns),
          temperature: this.options.temperature ?? 0.2,
          maxOutputTokens: this.options.maxOutputTokens ?? 800,
          jsonMode: true,
          metadata: { user_id: request.sessionId },
        },
        routing: this.options.routing,
        keyContext: { partnerId: request.partnerId },
      });
      content = response.content;
      logger.debug('reasoning.response', { provider: response.provider, model: response.model, usage: response.usage });
    } catch (error) {
      if (error instanceof LlmRoutingExhaustedError) {
        logger.warn('reasoning.unavailable', { attempts: error.attempts.length, lastFailure: error.lastFailureCode });
        return { kind: 'unavailable', detail: error.message };
      }
      if (error instanceof LlmProviderError) {
        logger.warn('reasoning.unavailable', { provider: error.provider, code: error.code });
        return { kind: 'unavailable', detail: error.message };
      }
      logger.error('reasoning.failed', { error });
      return { kind: 'unavailable', detail: error instanceof Error ? error.message : String(error) };
    }

    const outcome = parseReasoningOutput(content);
    if (outcome.kind === 'malformed_output') {
      logger.warn('reasoning.malformed_output', { detail: outcome.detail, length: content.length });
    }
    return outcome;
  }

  async readiness(): Promise<ReasoningReadiness> {
    const ready = await this.options.router.readyProviders(this.options.routing);
    return ready.length > 0
      ? { ok: true, detail: `providers ready: ${ready.join(', ')}` }
      : { ok: false, detail: 'no provider has a resolvable API key' };
  }
}
