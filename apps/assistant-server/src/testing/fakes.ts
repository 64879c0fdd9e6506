import path from 'node:path';
import { loadClaims, loadPlanCatalog } from '@tripguard/plan-catalog';
import type { DocumentTextExtractor, ExtractedDocument } from '../adapters/documents';
import type { CheckoutRequest, CheckoutSession, CheckoutStatus, PaymentGateway } from '../adapters/payments';
import { PolicyClauseIndex } from '../adapters/policyIndex';
import type { ReasoningClient, ReasoningReadiness, ReasoningRequest } from '../reasoning/client';
import type { ReasoningOutcome } from '../reasoning/protocol';
import type { IssuedPolicy, PolicyIssuer, PurchaseRequest } from '../adapters/policyIssuer';
import { ToolRejectedError } from '../errors';
import { InMemorySessionStore } from '../session/store';
import { InMemoryIdempotencyStore } from '../tools/ledger';
import type { ToolServices } from '../tools/types';

export const repoRoot = path.resolve(__dirname, '../../../..');

export const fixedClock = (): Date => new Date('2026-03-01T10:00:00.000Z');

export class FakePaymentGateway implements PaymentGateway {
  readonly created: CheckoutRequest[] = [];
  readonly statuses = new Map<string, CheckoutStatus>();
  nextFailure: Error | null = null;
  /** Thrown, in order, by the next status reads. */
  readonly statusFailures: Error[] = [];

  async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
    if (this.nextFailure) {
      const failure = this.nextFailure;
      this.nextFailure = null;
      throw failure;
    }
    this.created.push(request);
    const checkoutRef = `chk_${this.created.length}`;
    this.statuses.set(checkoutRef, { checkoutRef, status: 'open', paymentStatus: 'unpaid' });
    return { checkoutRef, checkoutUrl: `https://pay.example.test/${checkoutRef}`, provider: 'stripe' };
  }

  async fetchStatus(checkoutRef: string): Promise<CheckoutStatus> {
    const failure = this.statusFailures.shift();
    if (failure) {
      throw failure;
    }
    const status = this.statuses.get(checkoutRef);
    if (!status) {
      throw new ToolRejectedError(`Payment session ${checkoutRef} not found`, 'NotFound');
    }
    return status;
  }

  markPaid(checkoutRef: string): void {
    this.statuses.set(checkoutRef, { checkoutRef, status: 'complete', paymentStatus: 'paid' });
  }

  markExpired(checkoutRef: string): void {
    this.statuses.set(checkoutRef, { checkoutRef, status: 'expired', paymentStatus: 'unpaid' });
  }
}

/**
 * Issues `POL-<n>` policies. `nextFailure` makes the next purchase throw,
 * either before anything is issued or after the policy was issued.
 */
export class FakePolicyIssuer implements PolicyIssuer {
  readonly purchases: PurchaseRequest[] = [];
  readonly issued = new Map<string, IssuedPolicy>();
  nextFailure: { error: Error; afterIssuing: boolean } | null = null;

  async purchase(request: PurchaseRequest): Promise<IssuedPolicy> {
    const failure = this.nextFailure;
    this.nextFailure = null;
    if (failure && !failure.afterIssuing) {
      throw failure.error;
    }

    this.purchases.push(request);
    const policy: IssuedPolicy = { policyRef: `POL-${this.purchases.length}`, status: 'issued' };
    this.issued.set(request.idempotencyKey, policy);
    if (failure) {
      throw failure.error;
    }
    return policy;
  }

  async findIssued(idempotencyKey: string): Promise<IssuedPolicy | null> {
    return this.issued.get(idempotencyKey) ?? null;
  }
}

export class InMemoryDocumentExtractor implements DocumentTextExtractor {
  constructor(private readonly documents: Record<string, string>) {}

  async extractText(filePath: string): Promise<ExtractedDocument> {
    const text = this.documents[filePath];
    if (text === undefined) {
      throw new ToolRejectedError(`File not found: ${filePath}`, 'NotFound');
    }
    return { fileName: path.basename(filePath), text };
  }
}

export interface TestServices extends ToolServices {
  payments: FakePaymentGateway;
  issuer: FakePolicyIssuer;
  sessions: InMemorySessionStore;
  ledger: InMemoryIdempotencyStore;
}

export function createTestServices(documents: Record<string, string> = {}): TestServices {
  const catalog = loadPlanCatalog({ rootDir: repoRoot });
  return {
    catalog,
    claims: loadClaims({ rootDir: repoRoot }).claims,
    policyIndex: new PolicyClauseIndex(() => catalog),
    payments: new FakePaymentGateway(),
    issuer: new FakePolicyIssuer(),
    documents: new InMemoryDocumentExtractor(documents),
    sessions: new InMemorySessionStore(fixedClock),
    ledger: new InMemoryIdempotencyStore(fixedClock),
    currency: 'sgd',
    clock: fixedClock,
  };
}

type ScriptStep = ReasoningOutcome | ((request: ReasoningRequest) => ReasoningOutcome | Promise<ReasoningOutcome>);

/**
 * Reasoning client that answers from a script, one step per call, and keeps
 * every request it received. The last step repeats once the script runs out.
 */
export class ScriptedReasoningClient implements ReasoningClient {
  readonly requests: ReasoningRequest[] = [];
  ready: ReasoningReadiness = { ok: true, detail: 'scripted' };

  constructor(private readonly steps: ScriptStep[]) {}

  async converse(request: ReasoningRequest): Promise<ReasoningOutcome> {
    this.requests.push(request);
    const step = this.steps[Math.min(this.requests.length - 1, this.steps.length - 1)];
    if (step === undefined) {
      return { kind: 'unavailable', detail: 'script is empty' };
    }
    return typeof step === 'function' ? step(request) : step;
  }

  async readiness(): Promise<ReasoningReadiness> {
    return this.ready;
  }
}

export function reply(text: string): ReasoningOutcome {
  return { kind: 'plain_reply', text };
}

export function callTool(name: string, input: unknown): ReasoningOutcome {
  return { kind: 'tool_call', directives: [{ name, input }] };
}
