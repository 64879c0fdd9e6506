import { randomUUID } from 'node:crypto';
import type { OrchestrationPolicy } from '../config';
import type { Logger } from '../logging';
import type { ReasoningClient } from '../reasoning/client';
import type { ToolCallDirective } from '../reasoning/protocol';
import type { SessionGate } from '../session/gate';
import {
  composeGuardReply,
  confirmVerificationPatch,
  evaluatePaymentReadiness,
  requestVerificationPatch,
  type ProfileBag,
} from '../session/profile';
import type { SessionStore } from '../session/store';
import type { ToolExecutor } from '../tools/executor';
import type { ToolRegistry } from '../tools/registry';
import type {
  InboundMessage,
  Session,
  StallReason,
  ToolResultEnvelope,
  ToolRunRecord,
  ToolTurn,
  Turn,
  TurnResult,
  UserTurn,
} from '../types';

export const STALL_REPLIES: Record<StallReason, string> = {
  tool_budget:
    "I looked up quite a lot for this request but couldn't finish it in one go. Could you tell me which part matters most so I can focus on it?",
  malformed_output: "Sorry, I couldn't put together a proper answer just now. Could you rephrase your question?",
  reasoning_unavailable: "I'm having trouble reaching the assistant right now. Please try again shortly.",
  conversation_limit:
    'This conversation has reached its length limit. A member of our team will follow up with you, and you can start a new conversation at any time.',
};

export interface OrchestratorOptions {
  sessions: SessionStore;
  registry: ToolRegistry;
  executor: ToolExecutor;
  reasoning: ReasoningClient;
  gate: SessionGate;
  policy: OrchestrationPolicy;
  logger: Logger;
  clock?: () => Date;
  requestIds?: () => string;
}

/** Turns of the cycle in progress; written to the session store only when the cycle ends. */
interface TurnCycle {
  requestId: string;
  session: Session;
  profile: ProfileBag;
  pending: Turn[];
  toolRuns: ToolRunRecord[];
  logger: Logger;
  channel?: string;
  partnerId?: string;
}

type DirectiveResult = { kind: 'continue' } | { kind: 'guarded'; reply: string } | { kind: 'budget_exhausted' };

function toolRun(name: string, input: unknown, envelope: ToolResultEnvelope): ToolRunRecord {
  return {
    name,
    input,
    resultStatus: envelope.status,
    ...(envelope.status === 'error' ? { errorKind: envelope.kind } : {}),
    ...(envelope.cached ? { cached: true } : {}),
  };
}

/**
 * The conversation control loop. For one inbound message it alternates
 * between the reasoning step and tool execution until the model replies in
 * plain text or a budget runs out.
 *
 * States: AwaitingModel -> ToolRequested -> AwaitingModel ... -> Replying | Stalled.
 */
export class Orchestrator {
  private readonly clock: () => Date;
  private readonly requestIds: () => string;

  constructor(private readonly options: OrchestratorOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.requestIds = options.requestIds ?? randomUUID;
  }

  /** Throws SessionBusyError (reject policy) and StoreUnavailableError; every other failure becomes a reply. */
  async handleMessage(message: InboundMessage): Promise<TurnResult> {
    return this.options.gate.run(message.sessionId, () => this.runTurn(message));
  }

  private async runTurn(message: InboundMessage): Promise<TurnResult> {
    const { sessions, policy } = this.options;
    const requestId = this.requestIds();
    const logger = this.options.logger.child({ requestId, sessionId: message.sessionId });

    if (message.profilePatch && Object.keys(message.profilePatch).length > 0) {
      await sessions.mergeProfile(message.sessionId, message.profilePatch);
    }

    const session = await sessions.load(message.sessionId);
    logger.info('orchestrator.turn.start', {
      channel: message.channel,
      turnCounter: session.turnCounter,
      historyLength: session.turns.length,
    });

    if (session.turnCounter >= policy.maxConversationTurns) {
      logger.warn('orchestrator.turn.conversation_limit', { turnCounter: session.turnCounter });
      return this.stalled(requestId, message.sessionId, 'conversation_limit', [], logger);
    }

    let profile = session.profile;
    const confirmation = confirmVerificationPatch(profile, message.text, this.clock());
    if (confirmation) {
      profile = await sessions.mergeProfile(message.sessionId, confirmation);
      logger.info('orchestrator.profile.confirmed');
    }

    const userTurn: UserTurn = {
      role: 'user',
      content: message.text,
      ...(message.channel ? { channel: message.channel } : {}),
      createdAt: this.clock().toISOString(),
    };

    const cycle: TurnCycle = {
      requestId,
      session,
      profile,
      pending: [userTurn],
      toolRuns: [],
      logger,
      channel: message.channel,
      partnerId: message.partnerId,
    };
    return this.loop(cycle);
  }

  private async loop(cycle: TurnCycle): Promise<TurnResult> {
    const { policy, registry, reasoning } = this.options;
    let unavailableStreak = 0;
    let malformedStreak = 0;
    let correction: string | undefined;

    for (;;) {
      // AwaitingModel
      const outcome = await reasoning.converse({
        requestId: cycle.requestId,
        sessionId: cycle.session.id,
        turns: [...cycle.session.turns, ...cycle.pending],
        tools: registry.describe(),
        profile: cycle.profile,
        channel: cycle.channel,
        correction,
        partnerId: cycle.partnerId,
      });

      switch (outcome.kind) {
        case 'unavailable':
          unavailableStreak += 1;
          cycle.logger.warn('orchestrator.reasoning.unavailable', { attempt: unavailableStreak, detail: outcome.detail });
          if (unavailableStreak >= policy.reasoningAttempts) {
            return this.stall(cycle, 'reasoning_unavailable');
          }
          continue;

        case 'malformed_output':
          malformedStreak += 1;
          unavailableStreak = 0;
          cycle.logger.warn('orchestrator.reasoning.malformed', { attempt: malformedStreak, detail: outcome.detail });
          if (malformedStreak > policy.malformedRetries) {
            return this.stall(cycle, 'malformed_output');
          }
          correction =
            `Your previous response could not be used (${outcome.detail}). ` +
            'Respond with a single JSON object {"output": "...", "actions": [...]} and nothing else.';
          continue;

        case 'plain_reply':
          return this.reply(cycle, outcome.text);

        case 'tool_call': {
          unavailableStreak = 0;
          malformedStreak = 0;
          correction = undefined;
          // ToolRequested
          for (const directive of outcome.directives) {
            const result = await this.runDirective(cycle, directive);
            if (result.kind === 'guarded') {
              return this.reply(cycle, result.reply);
            }
            if (result.kind === 'budget_exhausted') {
              return this.stall(cycle, 'tool_budget');
            }
          }
          continue;
        }
      }
    }
  }

  private async runDirective(cycle: TurnCycle, directive: ToolCallDirective): Promise<DirectiveResult> {
    const { registry, executor, policy, sessions } = this.options;

    if (cycle.toolRuns.length >= policy.toolCallBudget) {
      cycle.logger.warn('orchestrator.tool.budget_exhausted', { budget: policy.toolCallBudget, requested: directive.name });
      return { kind: 'budget_exhausted' };
    }

    const spec = registry.lookup(directive.name);
    if (!spec) {
      cycle.logger.warn('orchestrator.tool.unknown', { tool: directive.name });
      const available = registry.list().map((tool) => tool.name);
      this.recordTool(cycle, directive, {
        status: 'error',
        kind: 'NotFound',
        message: `Tool ${directive.name} does not exist. Available tools: ${available.join(', ')}.`,
        retryable: false,
      });
      return { kind: 'continue' };
    }

    if (spec.requiresConfirmedProfile) {
      const readiness = evaluatePaymentReadiness(cycle.profile);
      if (readiness.status !== 'ready') {
        cycle.logger.info('orchestrator.tool.guarded', { tool: spec.name, readiness: readiness.status });
        if (readiness.status === 'unverified') {
          cycle.profile = await sessions.mergeProfile(
            cycle.session.id,
            requestVerificationPatch(readiness.fields, this.clock()),
          );
        }
        return { kind: 'guarded', reply: composeGuardReply(readiness) };
      }
    }

    const envelope = await executor.execute(spec, directive.input, {
      requestId: cycle.requestId,
      sessionId: cycle.session.id,
    });
    this.recordTool(cycle, directive, envelope);

    // Tools may have written traveller facts or payment state.
    cycle.profile = await sessions.getProfile(cycle.session.id);
    return { kind: 'continue' };
  }

  private recordTool(cycle: TurnCycle, directive: ToolCallDirective, envelope: ToolResultEnvelope): void {
    const turn: ToolTurn = {
      role: 'tool',
      toolName: directive.name,
      input: directive.input,
      result: envelope,
      createdAt: this.clock().toISOString(),
    };
    cycle.pending.push(turn);
    cycle.toolRuns.push(toolRun(directive.name, directive.input, envelope));
  }

  private async reply(cycle: TurnCycle, text: string): Promise<TurnResult> {
    cycle.pending.push({ role: 'assistant', content: text, createdAt: this.clock().toISOString() });
    await this.persist(cycle);
    cycle.logger.info('orchestrator.turn.reply', { toolRuns: cycle.toolRuns.length });
    return {
      requestId: cycle.requestId,
      sessionId: cycle.session.id,
      replyText: text,
      outcome: 'replied',
      toolRuns: cycle.toolRuns,
    };
  }

  /**
   * Ends the cycle without a model reply. Tool turns already executed are kept
   * together with the user turn that caused them; a cycle that ran no tool
   * leaves the session untouched.
   */
  private async stall(cycle: TurnCycle, reason: StallReason): Promise<TurnResult> {
    if (cycle.toolRuns.length > 0) {
      await this.persist(cycle);
    }
    return this.stalled(cycle.requestId, cycle.session.id, reason, cycle.toolRuns, cycle.logger);
  }

  private stalled(
    requestId: string,
    sessionId: string,
    reason: StallReason,
    toolRuns: ToolRunRecord[],
    logger: Logger = this.options.logger,
  ): TurnResult {
    logger.warn('orchestrator.turn.stalled', { reason, toolRuns: toolRuns.length });
    return {
      requestId,
      sessionId,
      replyText: STALL_REPLIES[reason],
      outcome: 'stalled',
      stallReason: reason,
      toolRuns,
    };
  }

  private async persist(cycle: TurnCycle): Promise<void> {
    for (const turn of cycle.pending) {
      await this.options.sessions.append(cycle.session.id, turn);
    }
  }
}
