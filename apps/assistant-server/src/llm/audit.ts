import type { Logger } from '../logging';
import type { LlmAuditEvent, LlmAuditSink } from './types';

// Credentials, plus traveller contact and identity fields that can surface in attempt messages.
const REDACTED_KEY = /key|secret|token|authorization|passport|email|phone/i;

const WARN_EVENTS = new Set<LlmAuditEvent['event']>(['llm.route.provider.failure', 'llm.route.exhausted']);

export function redactAuditMetadata(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => redactAuditMetadata(entry));
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }

  const next: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    next[key] = REDACTED_KEY.test(key) ? '[REDACTED]' : redactAuditMetadata(entry);
  }
  return next;
}

/** Writes audit events to the structured log; failures go out at warn level. */
export class LoggerLlmAuditSink implements LlmAuditSink {
  constructor(private readonly logger: Logger) {}

  emit(event: LlmAuditEvent): void {
    const data = {
      requestId: event.requestId,
      provider: event.provider,
      model: event.model,
      ...(event.metadata ? { metadata: redactAuditMetadata(event.metadata) } : {}),
    };
    if (WARN_EVENTS.has(event.event)) {
      this.logger.warn(event.event, data);
      return;
    }
    this.logger.info(event.event, data);
  }
}

export class InMemoryLlmAuditSink implements LlmAuditSink {
  readonly events: LlmAuditEvent[] = [];

  emit(event: LlmAuditEvent): void {
    this.events.push(event);
  }

  names(): Array<LlmAuditEvent['event']> {
    return this.events.map((event) => event.event);
  }
}
