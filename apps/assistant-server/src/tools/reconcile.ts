import type { PolicyIssuer } from '../adapters/policyIssuer';
import type { ProfileBag } from '../session/profile';
import type { SessionStore } from '../session/store';
import type { ToolResultEnvelope } from '../types';
import { ledgerKey, type IdempotencyStore, type LedgerRecord, type LedgerState } from './ledger';

export const CHECKOUT_TOOL = 'payment_checkout';
export const PURCHASE_TOOL = 'purchase_finalize';

/** Checkout states that can no longer be paid; a new checkout may replace them. */
const DEAD_CHECKOUT_STATUSES = new Set(['expired', 'canceled', 'cancelled', 'failed']);

export interface CheckoutUpdate {
  sessionId: string;
  transactionKey: string;
  checkoutRef: string;
  checkoutUrl?: string;
  status: string;
  paymentStatus?: string;
}

function payloadObject(envelope: ToolResultEnvelope | undefined): Record<string, unknown> {
  if (envelope?.status === 'ok' && typeof envelope.payload === 'object' && envelope.payload !== null) {
    return { ...envelope.payload };
  }
  return {};
}

export function checkoutRefOf(record: LedgerRecord): string | undefined {
  const ref = payloadObject(record.envelope).checkout_ref;
  return typeof ref === 'string' ? ref : undefined;
}

export function policyRefOf(record: LedgerRecord): string | undefined {
  const ref = payloadObject(record.envelope).policy_ref;
  return typeof ref === 'string' ? ref : undefined;
}

function checkoutLedgerState(update: CheckoutUpdate): LedgerState {
  return DEAD_CHECKOUT_STATUSES.has(update.status) && update.paymentStatus !== 'paid' ? 'failed' : 'completed';
}

/**
 * Folds an externally observed checkout state (webhook, status poll) into the
 * checkout's ledger record. A known checkout reference settles the record as
 * completed, unless the checkout expired unpaid: that record becomes failed so
 * the same plan and amount can be checked out again.
 */
export async function reconcileCheckout(
  ledger: IdempotencyStore,
  update: CheckoutUpdate,
  maxAttempts = 3,
): Promise<LedgerRecord | null> {
  const key = ledgerKey(update.sessionId, CHECKOUT_TOOL, update.transactionKey);

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const current = await ledger.get(key);
    const payload: Record<string, unknown> = {
      ...payloadObject(current?.envelope),
      checkout_ref: update.checkoutRef,
      status: update.status,
    };
    if (update.checkoutUrl !== undefined) {
      payload.checkout_url = update.checkoutUrl;
    }
    if (update.paymentStatus !== undefined) {
      payload.payment_status = update.paymentStatus;
    }

    const stored = await ledger.compareAndSet(key, current?.version ?? null, {
      sessionId: update.sessionId,
      tool: CHECKOUT_TOOL,
      transactionKey: update.transactionKey,
      state: checkoutLedgerState(update),
      envelope: { status: 'ok', payload },
    });
    if (stored) {
      return stored;
    }
  }
  return null;
}

/**
 * Settles an ambiguous `purchase_finalize` record by asking the issuer whether
 * a policy exists for its idempotency key: found means completed, not found
 * means failed, which lets the purchase run again. Returns the record as it
 * stands afterwards, or null when the session has no purchase for the checkout.
 */
export async function reconcilePurchase(
  ledger: IdempotencyStore,
  issuer: PolicyIssuer,
  sessionId: string,
  checkoutRef: string,
  signal?: AbortSignal,
): Promise<LedgerRecord | null> {
  const key = ledgerKey(sessionId, PURCHASE_TOOL, checkoutRef);
  const current = await ledger.get(key);
  if (!current || current.state !== 'ambiguous') {
    return current;
  }

  const issued = await issuer.findIssued(key, signal);
  const envelope: ToolResultEnvelope = issued
    ? {
        status: 'ok',
        payload: { checkout_ref: checkoutRef, policy_ref: issued.policyRef, status: issued.status },
        citation: issued.policyRef,
      }
    : {
        status: 'error',
        kind: 'Upstream',
        message: `No policy was issued for ${checkoutRef}; the purchase can be tried again.`,
        retryable: true,
      };

  const settled = await ledger.compareAndSet(key, current.version, {
    sessionId,
    tool: PURCHASE_TOOL,
    transactionKey: checkoutRef,
    state: issued ? 'completed' : 'failed',
    envelope,
  });
  return settled ?? ledger.get(key);
}

export async function findCheckoutRecord(
  ledger: IdempotencyStore,
  sessionId: string,
  checkoutRef: string,
): Promise<LedgerRecord | undefined> {
  const records = await ledger.listForSession(sessionId, CHECKOUT_TOOL);
  return records.find((record) => checkoutRefOf(record) === checkoutRef);
}

export interface PaymentObservation {
  checkoutRef: string;
  status: string;
  paymentStatus?: string;
  policyRef?: string;
}

/**
 * Writes the latest payment state into the session profile. A policy reference
 * already recorded for the same checkout is kept when the observation has none.
 */
export async function mergePaymentIntoProfile(
  sessions: SessionStore,
  sessionId: string,
  observation: PaymentObservation,
  now: Date,
): Promise<ProfileBag> {
  const current = (await sessions.getProfile(sessionId)).payment;
  const policyRef =
    observation.policyRef ?? (current?.checkoutRef === observation.checkoutRef ? current.policyRef : undefined);
  return sessions.mergeProfile(
    sessionId,
    paymentProfilePatch(observation.checkoutRef, observation.status, observation.paymentStatus, now, policyRef),
  );
}

export function paymentProfilePatch(
  checkoutRef: string,
  status: string,
  paymentStatus: string | undefined,
  now: Date,
  policyRef?: string,
): ProfileBag {
  return {
    payment: {
      checkoutRef,
      status,
      ...(paymentStatus === undefined ? {} : { paymentStatus }),
      ...(policyRef === undefined ? {} : { policyRef }),
      updatedAt: now.toISOString(),
    },
  };
}
