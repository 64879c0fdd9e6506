import { z } from 'zod';
import { UpstreamError } from '../errors';
import { requestJson, type HttpFetcher } from './http';

export interface PurchaseRequest {
  checkoutRef: string;
  planCode?: string;
  traveller: {
    name: string;
    email: string;
    phone?: string;
    dateOfBirth?: string;
    passportNumber?: string;
  };
  trip?: {
    destination?: string;
    startDate?: string;
    endDate?: string;
  };
  idempotencyKey: string;
}

export interface IssuedPolicy {
  policyRef: string;
  status: string;
}

export interface PolicyIssuer {
  purchase(request: PurchaseRequest, signal?: AbortSignal): Promise<IssuedPolicy>;
  /** Policy issued under `idempotencyKey`, or null when the issuer has none. */
  findIssued(idempotencyKey: string, signal?: AbortSignal): Promise<IssuedPolicy | null>;
}

const purchaseResponseSchema = z.object({
  policy_ref: z.string().min(1),
  status: z.string().min(1).default('issued'),
});

export interface HttpPolicyIssuerOptions {
  baseUrl: string;
  fetcher: HttpFetcher;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Issues the policy once payment is complete: `POST {baseUrl}/purchase`.
 * Earlier purchases are looked up by idempotency key: `GET {baseUrl}/purchase/{key}`.
 */
export class HttpPolicyIssuer implements PolicyIssuer {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpPolicyIssuerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async purchase(request: PurchaseRequest, signal?: AbortSignal): Promise<IssuedPolicy> {
    const raw = await requestJson(this.options.fetcher, {
      service: 'policy-issuer',
      url: `${this.baseUrl}/purchase`,
      method: 'POST',
      headers: {
        'idempotency-key': request.idempotencyKey,
        ...(this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {}),
      },
      body: {
        checkoutRef: request.checkoutRef,
        planCode: request.planCode,
        mainContact: request.traveller,
        trip: request.trip ?? {},
      },
      timeoutMs: this.options.timeoutMs,
      signal,
    });

    const parsed = purchaseResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError('policy-issuer returned an unexpected purchase payload', {
        service: 'policy-issuer',
        outcome: 'unknown',
        retryable: false,
      });
    }

    return { policyRef: parsed.data.policy_ref, status: parsed.data.status };
  }

  async findIssued(idempotencyKey: string, signal?: AbortSignal): Promise<IssuedPolicy | null> {
    let raw: unknown;
    try {
      raw = await requestJson(this.options.fetcher, {
        service: 'policy-issuer',
        url: `${this.baseUrl}/purchase/${encodeURIComponent(idempotencyKey)}`,
        method: 'GET',
        headers: this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {},
        timeoutMs: this.options.timeoutMs,
        signal,
      });
    } catch (error) {
      if (error instanceof UpstreamError && error.options.statusCode === 404) {
        return null;
      }
      throw error;
    }

    const parsed = purchaseResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError('policy-issuer returned an unexpected lookup payload', {
        service: 'policy-issuer',
        outcome: 'failed',
        retryable: false,
      });
    }
    return { policyRef: parsed.data.policy_ref, status: parsed.data.status };
  }
}
