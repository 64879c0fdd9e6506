import { z } from 'zod';
import { ToolRejectedError, UpstreamError } from '../errors';
import { requestJson, type HttpFetcher } from './http';

export interface CheckoutRequest {
  planCode: string;
  amountMinor: number;
  currency: string;
  successUrl: string;
  cancelUrl: string;
  customerEmail?: string;
  /** Forwarded so the payments service can collapse duplicate submissions too. */
  idempotencyKey: string;
  metadata?: Record<string, string>;
}

export interface CheckoutSession {
  checkoutRef: string;
  checkoutUrl: string;
  provider: string;
}

export type CheckoutState = 'open' | 'complete' | 'expired';
export type PaymentState = 'paid' | 'unpaid';

export interface CheckoutStatus {
  checkoutRef: string;
  status: CheckoutState;
  paymentStatus: PaymentState;
}

export interface PaymentGateway {
  createCheckout(request: CheckoutRequest, signal?: AbortSignal): Promise<CheckoutSession>;
  fetchStatus(checkoutRef: string, signal?: AbortSignal): Promise<CheckoutStatus>;
}

const sessionResponseSchema = z.object({
  session_id: z.string().min(1),
  checkout_url: z.string().min(1),
  provider: z.string().min(1).default('stripe'),
});

const statusResponseSchema = z.object({
  session_id: z.string().min(1),
  status: z.enum(['open', 'complete', 'expired']),
  payment_status: z.enum(['paid', 'unpaid', 'no_payment_required']).transform((value) => (value === 'unpaid' ? 'unpaid' : 'paid')),
});

export interface HttpPaymentGatewayOptions {
  baseUrl: string;
  fetcher: HttpFetcher;
  timeoutMs?: number;
}

/** Client of the payments service: `POST /payments/session`, `GET /payments/session/{ref}`. */
export class HttpPaymentGateway implements PaymentGateway {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpPaymentGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async createCheckout(request: CheckoutRequest, signal?: AbortSignal): Promise<CheckoutSession> {
    const raw = await requestJson(this.options.fetcher, {
      service: 'payments',
      url: `${this.baseUrl}/payments/session`,
      method: 'POST',
      headers: { 'idempotency-key': request.idempotencyKey },
      body: {
        plan_code: request.planCode,
        amount: request.amountMinor,
        currency: request.currency,
        success_url: request.successUrl,
        cancel_url: request.cancelUrl,
        customer_email: request.customerEmail ?? null,
        metadata: request.metadata ?? {},
      },
      timeoutMs: this.options.timeoutMs,
      signal,
    });

    const parsed = sessionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      // The session may exist even though the reply is unusable.
      throw new UpstreamError('payments returned an unexpected checkout session payload', {
        service: 'payments',
        outcome: 'unknown',
        retryable: false,
      });
    }

    return {
      checkoutRef: parsed.data.session_id,
      checkoutUrl: parsed.data.checkout_url,
      provider: parsed.data.provider,
    };
  }

  async fetchStatus(checkoutRef: string, signal?: AbortSignal): Promise<CheckoutStatus> {
    let raw: unknown;
    try {
      raw = await requestJson(this.options.fetcher, {
        service: 'payments',
        url: `${this.baseUrl}/payments/session/${encodeURIComponent(checkoutRef)}`,
        method: 'GET',
        timeoutMs: this.options.timeoutMs,
        signal,
      });
    } catch (error) {
      if (error instanceof UpstreamError && error.options.statusCode === 404) {
        throw new ToolRejectedError(`Payment session ${checkoutRef} not found`, 'NotFound');
      }
      throw error;
    }

    const parsed = statusResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError('payments returned an unexpected status payload', {
        service: 'payments',
        outcome: 'failed',
        retryable: false,
      });
    }

    return {
      checkoutRef: parsed.data.session_id,
      status: parsed.data.status,
      paymentStatus: parsed.data.payment_status,
    };
  }
}
