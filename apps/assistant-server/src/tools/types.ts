import type { ClaimRecord, PlansFile } from '@tripguard/plan-catalog';
import type { ZodType, ZodTypeDef } from 'zod';
import type { DocumentTextExtractor } from '../adapters/documents';
import type { PaymentGateway } from '../adapters/payments';
import type { PolicyClauseIndex } from '../adapters/policyIndex';
import type { PolicyIssuer } from '../adapters/policyIssuer';
import type { Logger } from '../logging';
import type { SessionStore } from '../session/store';
import type { SideEffectClass } from '../types';
import type { IdempotencyStore } from './ledger';
import type { ToolInputSchema } from './schema';

export interface ToolServices {
  catalog: PlansFile;
  claims: ClaimRecord[];
  policyIndex: PolicyClauseIndex;
  payments: PaymentGateway;
  issuer: PolicyIssuer;
  documents: DocumentTextExtractor;
  sessions: SessionStore;
  ledger: IdempotencyStore;
  currency: string;
  clock: () => Date;
}

export interface ToolCall {
  requestId: string;
  sessionId: string;
}

export interface ToolExecutionContext extends ToolCall {
  logger: Logger;
  /** Aborted when the tool's time budget runs out. */
  signal: AbortSignal;
  services: ToolServices;
}

export interface ToolOutput {
  payload: unknown;
  citation?: string;
}

export interface ToolSpec<TInput = unknown> {
  name: string;
  description: string;
  sideEffect: SideEffectClass;
  inputSchema: ToolInputSchema;
  input: ZodType<TInput, ZodTypeDef, unknown>;
  /** Only payment and purchase tools: the orchestrator checks the profile first. */
  requiresConfirmedProfile?: boolean;
  timeoutMs?: number;
  /** Logical transaction identity for write-once tools. */
  transactionKey?(input: TInput): string;
  execute(input: TInput, context: ToolExecutionContext): Promise<ToolOutput>;
}

/** Erases the input type so heterogeneous specs share one registry. */
export function defineTool<TInput>(spec: ToolSpec<TInput>): ToolSpec {
  return spec;
}
