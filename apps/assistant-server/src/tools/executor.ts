import { StoreUnavailableError, ToolRejectedError, ToolTimeoutError, UpstreamError } from '../errors';
import type { Logger } from '../logging';
import type { ToolErrorKind, ToolResultEnvelope, ToolResultError } from '../types';
import { ledgerKey, type LedgerRecord, type LedgerState } from './ledger';
import { formatIssues } from './schema';
import type { ToolCall, ToolOutput, ToolServices, ToolSpec } from './types';

export interface ToolExecutorOptions {
  services: ToolServices;
  logger: Logger;
  defaultTimeoutMs: number;
  /** Extra attempts for read and write-idempotent tools after a transient failure. */
  transientRetries: number;
}

interface ClassifiedFailure {
  envelope: ToolResultError;
  retryable: boolean;
}

type Claim =
  | { kind: 'claimed'; record: LedgerRecord }
  | { kind: 'cached'; envelope: ToolResultEnvelope }
  | { kind: 'blocked'; state: LedgerState | null };

function errorEnvelope(kind: ToolErrorKind, message: string, retryable: boolean): ToolResultError {
  return { status: 'error', kind, message, retryable };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a tool call end to end and always answers with a result envelope:
 * input validation, the write-once ledger, the time budget and retries all
 * happen here.
 */
export class ToolExecutor {
  constructor(private readonly options: ToolExecutorOptions) {}

  async execute(spec: ToolSpec, rawInput: unknown, call: ToolCall): Promise<ToolResultEnvelope> {
    const logger = this.options.logger.child({ requestId: call.requestId, sessionId: call.sessionId, tool: spec.name });

    const parsed = spec.input.safeParse(rawInput);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      logger.warn('tool.run.invalid_input', { issues });
      return errorEnvelope('InvalidInput', `Invalid input for ${spec.name}: ${issues}`, false);
    }

    if (spec.sideEffect === 'write-once' && spec.transactionKey) {
      return this.executeOnce(spec, parsed.data, spec.transactionKey(parsed.data), call, logger);
    }
    return this.executeWithRetries(spec, parsed.data, call, logger);
  }

  private async executeWithRetries(
    spec: ToolSpec,
    input: unknown,
    call: ToolCall,
    logger: Logger,
  ): Promise<ToolResultEnvelope> {
    const maxAttempts = spec.sideEffect === 'write-once' ? 1 : 1 + this.options.transientRetries;

    for (let attempt = 1; ; attempt += 1) {
      const result = await this.runOnce(spec, input, call, logger);
      if (result.status === 'ok') {
        return result.envelope;
      }
      if (!result.failure.retryable || attempt >= maxAttempts) {
        return result.failure.envelope;
      }
      logger.warn('tool.run.retry', { attempt, kind: result.failure.envelope.kind });
    }
  }

  private async executeOnce(
    spec: ToolSpec,
    input: unknown,
    transactionKey: string,
    call: ToolCall,
    logger: Logger,
  ): Promise<ToolResultEnvelope> {
    const key = ledgerKey(call.sessionId, spec.name, transactionKey);

    let claim: Claim;
    try {
      claim = await this.claim(key, spec.name, transactionKey, call.sessionId);
    } catch (error) {
      logger.error('tool.ledger.unavailable', { key, error });
      return errorEnvelope('Upstream', 'The transaction ledger is unavailable; nothing was executed.', true);
    }

    if (claim.kind === 'cached') {
      logger.info('tool.run.cached', { transactionKey });
      return claim.envelope;
    }
    if (claim.kind === 'blocked') {
      logger.warn('tool.run.blocked', { transactionKey, state: claim.state });
      return errorEnvelope(
        'AmbiguousOutcome',
        `A previous ${spec.name} attempt for ${transactionKey} has an unknown outcome; check its status before trying again.`,
        false,
      );
    }

    const result = await this.runOnce(spec, input, call, logger);
    const envelope = result.status === 'ok' ? result.envelope : result.failure.envelope;
    const state: LedgerState =
      result.status === 'ok' ? 'completed' : envelope.status === 'error' && envelope.kind === 'AmbiguousOutcome' ? 'ambiguous' : 'failed';

    try {
      const stored = await this.options.services.ledger.compareAndSet(key, claim.record.version, {
        sessionId: call.sessionId,
        tool: spec.name,
        transactionKey,
        state,
        envelope,
      });
      if (!stored) {
        logger.warn('tool.ledger.conflict', { key, state });
      }
    } catch (error) {
      // The record stays in_flight, so the next attempt is reported as ambiguous.
      logger.error('tool.ledger.write_failed', { key, state, error });
    }

    return envelope;
  }

  private async claim(key: string, tool: string, transactionKey: string, sessionId: string): Promise<Claim> {
    const ledger = this.options.services.ledger;
    for (let attempt = 0; attempt < 2; attempt += 1) {
      const current = await ledger.get(key);
      if (current?.state === 'completed' && current.envelope) {
        return { kind: 'cached', envelope: { ...current.envelope, cached: true } };
      }
      if (current && current.state !== 'failed') {
        return { kind: 'blocked', state: current.state };
      }
      const claimed = await ledger.compareAndSet(key, current?.version ?? null, {
        sessionId,
        tool,
        transactionKey,
        state: 'in_flight',
      });
      if (claimed) {
        return { kind: 'claimed', record: claimed };
      }
    }
    return { kind: 'blocked', state: null };
  }

  private async runOnce(
    spec: ToolSpec,
    input: unknown,
    call: ToolCall,
    logger: Logger,
  ): Promise<{ status: 'ok'; envelope: ToolResultEnvelope } | { status: 'error'; failure: ClassifiedFailure }> {
    const started = Date.now();
    logger.info('tool.run.start', { input });

    try {
      const output = await this.runWithTimeout(spec, input, call, logger);
      logger.info('tool.run.success', { durationMs: Date.now() - started });
      return {
        status: 'ok',
        envelope: {
          status: 'ok',
          payload: output.payload,
          ...(output.citation ? { citation: output.citation } : {}),
        },
      };
    } catch (error) {
      logger.error('tool.run.error', { durationMs: Date.now() - started, error });
      return { status: 'error', failure: classifyFailure(spec, error) };
    }
  }

  private async runWithTimeout(spec: ToolSpec, input: unknown, call: ToolCall, logger: Logger): Promise<ToolOutput> {
    const timeoutMs = spec.timeoutMs ?? this.options.defaultTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new ToolTimeoutError(spec.name, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      const work = Promise.resolve().then(() =>
        spec.execute(input, {
          ...call,
          logger,
          signal: controller.signal,
          services: this.options.services,
        }),
      );
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function classifyFailure(spec: ToolSpec, error: unknown): ClassifiedFailure {
  if (error instanceof ToolRejectedError) {
    return { envelope: errorEnvelope(error.kind, error.message, false), retryable: false };
  }

  let retryable: boolean;
  let outcomeUnknown: boolean;
  if (error instanceof ToolTimeoutError) {
    retryable = true;
    outcomeUnknown = true;
  } else if (error instanceof UpstreamError) {
    retryable = error.retryable;
    outcomeUnknown = error.outcome === 'unknown';
  } else if (error instanceof StoreUnavailableError) {
    retryable = true;
    outcomeUnknown = false;
  } else {
    retryable = false;
    outcomeUnknown = true;
  }

  if (spec.sideEffect === 'write-once' && outcomeUnknown) {
    return {
      envelope: errorEnvelope(
        'AmbiguousOutcome',
        `${spec.name} may or may not have completed (${errorMessage(error)}); check its status before trying again.`,
        false,
      ),
      retryable: false,
    };
  }

  return { envelope: errorEnvelope('Upstream', errorMessage(error), retryable), retryable };
}
