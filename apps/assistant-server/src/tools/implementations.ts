import { recommendPlan } from '@tripguard/claims-insights';
import { findPlan, quotePremiumMinor, tripDays, type Plan } from '@tripguard/plan-catalog';
import { z } from 'zod';
import { extractTripFacts } from '../adapters/documents';
import type { CheckoutStatus } from '../adapters/payments';
import { ToolRejectedError, UpstreamError } from '../errors';
import type { TravellerProfile, TripProfile } from '../session/profile';
import { ledgerKey } from './ledger';
import {
  findCheckoutRecord,
  mergePaymentIntoProfile,
  policyRefOf,
  reconcileCheckout,
  reconcilePurchase,
  type PaymentObservation,
} from './reconcile';
import { objectSchema } from './schema';
import { defineTool, type ToolExecutionContext, type ToolSpec } from './types';

const planCodeSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toUpperCase());

const policyLookupInput = z.object({
  query: z.string().trim().min(1),
  plan_code: planCodeSchema.optional(),
  top_k: z.number().int().min(1).max(8).default(4),
});

const claimsRecommendationInput = z.object({
  destination: z.string().trim().min(1).optional(),
  activity: z.string().trim().min(1).optional(),
  trip_cost: z.number().nonnegative().optional(),
});

const documentIngestInput = z.object({
  file_path: z.string().trim().min(1),
});

const paymentCheckoutInput = z.object({
  plan_code: planCodeSchema,
  amount_minor: z.number().int().positive(),
  currency: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/)
    .transform((value) => value.toLowerCase())
    .optional(),
  success_url: z.string().url(),
  cancel_url: z.string().url(),
  customer_email: z.string().trim().email().optional(),
  quote_id: z.string().trim().min(1).optional(),
});

type PaymentCheckoutInput = z.infer<typeof paymentCheckoutInput>;

const paymentStatusInput = z.object({
  checkout_ref: z.string().trim().min(1),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const planQuoteInput = z.object({
  plan_code: planCodeSchema,
  start_date: isoDate.optional(),
  end_date: isoDate.optional(),
  trip_days: z.number().int().positive().optional(),
});

const purchaseFinalizeInput = z.object({
  checkout_ref: z.string().trim().min(1),
  plan_code: planCodeSchema.optional(),
  traveller: z
    .object({
      name: z.string().trim().min(1),
      email: z.string().trim().email(),
      phone: z.string().trim().min(3).optional(),
      date_of_birth: z.string().trim().min(1).optional(),
      passport_number: z.string().trim().min(3).optional(),
    })
    .optional(),
});

export function checkoutTransactionKey(input: PaymentCheckoutInput): string {
  return input.quote_id ?? `${input.plan_code}:${input.amount_minor}:${input.currency ?? 'default'}`;
}

function premiumFor(plan: Plan, days: number): number {
  const premium = quotePremiumMinor(plan, days);
  if (premium === null) {
    throw new ToolRejectedError(
      `${plan.planCode} covers trips of 1 to ${plan.maxTripDays} days; this trip is ${days} days.`,
      'InvalidInput',
    );
  }
  return premium;
}

async function profileTripDays(context: ToolExecutionContext): Promise<number | null> {
  const trip = (await context.services.sessions.getProfile(context.sessionId)).trip;
  if (!trip?.startDate || !trip.endDate) {
    return null;
  }
  return tripDays(trip.startDate, trip.endDate);
}

async function recordPayment(context: ToolExecutionContext, observation: PaymentObservation): Promise<void> {
  const { sessions, clock } = context.services;
  try {
    await mergePaymentIntoProfile(sessions, context.sessionId, observation, clock());
  } catch (error) {
    // The upstream side effect already happened; the ledger is the source of truth.
    context.logger.warn('tool.payment.profile_update_failed', { checkoutRef: observation.checkoutRef, error });
  }
}

/** Status read that precedes issuing; the issuer has not been called when it fails. */
async function paymentBeforeIssuing(context: ToolExecutionContext, checkoutRef: string): Promise<CheckoutStatus> {
  try {
    return await context.services.payments.fetchStatus(checkoutRef, context.signal);
  } catch (error) {
    if (error instanceof UpstreamError && error.outcome === 'unknown') {
      throw new UpstreamError(error.message, { ...error.options, outcome: 'failed', cause: error });
    }
    throw error;
  }
}

export function createToolImplementations(): ToolSpec[] {
  return [
    defineTool({
      name: 'policy_lookup',
      description:
        'Search the policy wording of the plan catalog and return the best matching clauses with their clause ids for citation.',
      sideEffect: 'read',
      inputSchema: objectSchema(
        {
          query: { type: 'string', description: 'Coverage question in plain words' },
          plan_code: { type: 'string', description: 'Restrict to one plan (BASIC, PLUS, PREMIER)' },
          top_k: { type: 'integer', minimum: 1, maximum: 8, default: 4 },
        },
        ['query'],
      ),
      input: policyLookupInput,
      async execute(input, context) {
        if (input.plan_code && !findPlan(context.services.catalog, input.plan_code)) {
          throw new ToolRejectedError(`Unknown plan code: ${input.plan_code}`, 'NotFound');
        }

        const matches = context.services.policyIndex.search(input.query, {
          planCode: input.plan_code,
          topK: input.top_k,
        });

        return {
          payload: {
            query: input.query,
            matches: matches.map((match) => ({
              clause_id: match.clauseId,
              plan_code: match.planCode,
              section: match.section,
              text: match.text,
              score: match.score,
            })),
          },
          citation: matches.length > 0 ? matches.map((match) => match.clauseId).join(', ') : undefined,
        };
      },
    }),

    defineTool({
      name: 'claims_recommendation',
      description:
        'Analyse historical claims for a destination and activity and recommend a plan tier, with claim statistics and seasonality.',
      sideEffect: 'read',
      inputSchema: objectSchema(
        {
          destination: { type: 'string' },
          activity: { type: 'string', description: 'Main activity, e.g. skiing, diving, sightseeing' },
          trip_cost: { type: 'number', description: 'Total non-refundable trip cost' },
        },
        [],
      ),
      input: claimsRecommendationInput,
      async execute(input, context) {
        const result = recommendPlan(context.services.claims, context.services.catalog, {
          destination: input.destination,
          activity: input.activity,
          tripCost: input.trip_cost,
        });

        return {
          payload: {
            filters: result.filters,
            summary: result.summary,
            seasonality: result.seasonality,
            recommendation: result.recommendation,
            plan_code: result.planCode,
            reason: result.reason,
          },
        };
      },
    }),

    defineTool({
      name: 'document_ingest',
      description:
        'Read an uploaded itinerary or booking confirmation and extract travel dates, destinations, passengers and trip cost into the traveller profile.',
      sideEffect: 'write-idempotent',
      inputSchema: objectSchema({ file_path: { type: 'string', description: 'Path of the uploaded document' } }, [
        'file_path',
      ]),
      input: documentIngestInput,
      async execute(input, context) {
        const document = await context.services.documents.extractText(input.file_path);
        const facts = extractTripFacts(document.text);

        const extracted: TripProfile = {};
        const [firstDate] = facts.dates;
        const lastDate = facts.dates[facts.dates.length - 1];
        if (firstDate) {
          extracted.startDate = firstDate;
        }
        if (lastDate && facts.dates.length > 1) {
          extracted.endDate = lastDate;
        }
        if (facts.estimatedTripCost !== null) {
          extracted.tripCost = facts.estimatedTripCost;
        }

        let trip: TripProfile = extracted;
        if (Object.keys(extracted).length > 0) {
          const profile = await context.services.sessions.getProfile(context.sessionId);
          trip = { ...(profile.trip ?? {}), ...extracted };
          await context.services.sessions.mergeProfile(context.sessionId, { trip });
        }

        context.logger.info('tool.document.parsed', {
          file: document.fileName,
          dates: facts.dates.length,
          destinations: facts.destinations.length,
          passengers: facts.passengers.length,
        });

        return {
          payload: {
            file: document.fileName,
            dates: facts.dates,
            destinations: facts.destinations,
            passengers: facts.passengers,
            estimated_trip_cost: facts.estimatedTripCost,
            trip,
            raw_preview: document.text.slice(0, 500),
          },
          citation: document.fileName,
        };
      },
    }),

    defineTool({
      name: 'payment_checkout',
      description:
        'Create a payment checkout for a plan. Amount is in minor units (cents) and must equal the plan_quote premium for the trip. Only call after the traveller has confirmed their details.',
      sideEffect: 'write-once',
      requiresConfirmedProfile: true,
      inputSchema: objectSchema(
        {
          plan_code: { type: 'string', enum: ['BASIC', 'PLUS', 'PREMIER'] },
          amount_minor: { type: 'integer', minimum: 1 },
          currency: { type: 'string', description: 'ISO 4217 code, defaults to the configured currency' },
          success_url: { type: 'string' },
          cancel_url: { type: 'string' },
          customer_email: { type: 'string' },
          quote_id: { type: 'string', description: 'Quote identifier; repeated calls with the same quote reuse the checkout' },
        },
        ['plan_code', 'amount_minor', 'success_url', 'cancel_url'],
      ),
      input: paymentCheckoutInput,
      transactionKey: checkoutTransactionKey,
      async execute(input, context) {
        const plan = findPlan(context.services.catalog, input.plan_code);
        if (!plan) {
          throw new ToolRejectedError(`Unknown plan code: ${input.plan_code}`, 'InvalidInput');
        }

        const days = await profileTripDays(context);
        if (days !== null) {
          const premium = premiumFor(plan, days);
          if (premium !== input.amount_minor) {
            throw new ToolRejectedError(
              `Amount ${input.amount_minor} does not match the ${plan.planCode} premium of ${premium} for a ${days}-day trip; use plan_quote.`,
              'InvalidInput',
            );
          }
        }

        const currency = input.currency ?? context.services.currency;
        const checkout = await context.services.payments.createCheckout(
          {
            planCode: plan.planCode,
            amountMinor: input.amount_minor,
            currency,
            successUrl: input.success_url,
            cancelUrl: input.cancel_url,
            customerEmail: input.customer_email,
            idempotencyKey: ledgerKey(context.sessionId, 'payment_checkout', checkoutTransactionKey(input)),
            metadata: { session_id: context.sessionId, request_id: context.requestId },
          },
          context.signal,
        );

        await recordPayment(context, { checkoutRef: checkout.checkoutRef, status: 'open' });

        return {
          payload: {
            checkout_ref: checkout.checkoutRef,
            checkout_url: checkout.checkoutUrl,
            provider: checkout.provider,
            plan_code: plan.planCode,
            amount_minor: input.amount_minor,
            currency,
          },
        };
      },
    }),

    defineTool({
      name: 'payment_status',
      description:
        'Check whether a checkout has been paid. Returns the checkout status (open, complete, expired), the payment status and, once issued, the policy reference.',
      sideEffect: 'read',
      inputSchema: objectSchema({ checkout_ref: { type: 'string' } }, ['checkout_ref']),
      input: paymentStatusInput,
      async execute(input, context) {
        const status = await context.services.payments.fetchStatus(input.checkout_ref, context.signal);

        const record = await findCheckoutRecord(context.services.ledger, context.sessionId, status.checkoutRef);
        if (record) {
          const reconciled = await reconcileCheckout(context.services.ledger, {
            sessionId: context.sessionId,
            transactionKey: record.transactionKey,
            checkoutRef: status.checkoutRef,
            status: status.status,
            paymentStatus: status.paymentStatus,
          });
          if (!reconciled) {
            context.logger.warn('tool.payment.reconcile_conflict', { checkoutRef: status.checkoutRef });
          }
        }

        const purchase = await reconcilePurchase(
          context.services.ledger,
          context.services.issuer,
          context.sessionId,
          status.checkoutRef,
          context.signal,
        );
        const policyRef = purchase?.state === 'completed' ? policyRefOf(purchase) : undefined;

        await recordPayment(context, {
          checkoutRef: status.checkoutRef,
          status: status.status,
          paymentStatus: status.paymentStatus,
          policyRef,
        });

        return {
          payload: {
            checkout_ref: status.checkoutRef,
            status: status.status,
            payment_status: status.paymentStatus,
            ...(policyRef === undefined ? {} : { policy_ref: policyRef }),
          },
        };
      },
    }),

    defineTool({
      name: 'purchase_finalize',
      description:
        'Issue the policy once the checkout is paid. Traveller details default to the confirmed profile. Returns the policy reference.',
      sideEffect: 'write-once',
      requiresConfirmedProfile: true,
      inputSchema: objectSchema(
        {
          checkout_ref: { type: 'string' },
          plan_code: { type: 'string' },
          traveller: objectSchema(
            {
              name: { type: 'string' },
              email: { type: 'string' },
              phone: { type: 'string' },
              date_of_birth: { type: 'string' },
              passport_number: { type: 'string' },
            },
            ['name', 'email'],
          ),
        },
        ['checkout_ref'],
      ),
      input: purchaseFinalizeInput,
      transactionKey: (input) => input.checkout_ref,
      async execute(input, context) {
        const payment = await paymentBeforeIssuing(context, input.checkout_ref);
        if (payment.paymentStatus !== 'paid') {
          throw new ToolRejectedError(
            `Payment for ${input.checkout_ref} is not complete yet (status ${payment.status}, ${payment.paymentStatus}).`,
            'InvalidInput',
          );
        }

        const profile = await context.services.sessions.getProfile(context.sessionId);
        const known: TravellerProfile = profile.traveller ?? {};
        const traveller = input.traveller
          ? {
              name: input.traveller.name,
              email: input.traveller.email,
              phone: input.traveller.phone,
              dateOfBirth: input.traveller.date_of_birth,
              passportNumber: input.traveller.passport_number,
            }
          : known.name && known.email
            ? {
                name: known.name,
                email: known.email,
                phone: known.phone,
                dateOfBirth: known.dateOfBirth,
                passportNumber: known.passportNumber,
              }
            : null;
        if (!traveller) {
          throw new ToolRejectedError('Traveller name and email are required to issue the policy.', 'InvalidInput');
        }

        const issued = await context.services.issuer.purchase(
          {
            checkoutRef: input.checkout_ref,
            planCode: input.plan_code,
            traveller,
            trip: profile.trip
              ? { destination: profile.trip.destination, startDate: profile.trip.startDate, endDate: profile.trip.endDate }
              : undefined,
            idempotencyKey: ledgerKey(context.sessionId, 'purchase_finalize', input.checkout_ref),
          },
          context.signal,
        );

        await recordPayment(context, {
          checkoutRef: input.checkout_ref,
          status: payment.status,
          paymentStatus: payment.paymentStatus,
          policyRef: issued.policyRef,
        });

        return {
          payload: {
            checkout_ref: input.checkout_ref,
            policy_ref: issued.policyRef,
            status: issued.status,
          },
          citation: issued.policyRef,
        };
      },
    }),

    defineTool({
      name: 'plan_quote',
      description:
        'Quote the premium of a plan for a trip, in minor units. Trip length comes from trip_days, the given dates, or the traveller profile.',
      sideEffect: 'read',
      inputSchema: objectSchema(
        {
          plan_code: { type: 'string', enum: ['BASIC', 'PLUS', 'PREMIER'] },
          start_date: { type: 'string', description: 'YYYY-MM-DD' },
          end_date: { type: 'string', description: 'YYYY-MM-DD' },
          trip_days: { type: 'integer', minimum: 1 },
        },
        ['plan_code'],
      ),
      input: planQuoteInput,
      async execute(input, context) {
        const plan = findPlan(context.services.catalog, input.plan_code);
        if (!plan) {
          throw new ToolRejectedError(`Unknown plan code: ${input.plan_code}`, 'NotFound');
        }

        let days: number | null;
        if (input.trip_days !== undefined) {
          days = input.trip_days;
        } else if (input.start_date && input.end_date) {
          days = tripDays(input.start_date, input.end_date);
          if (days === null) {
            throw new ToolRejectedError('end_date must not be before start_date.', 'InvalidInput');
          }
        } else {
          days = await profileTripDays(context);
        }
        if (days === null) {
          throw new ToolRejectedError('Trip dates or trip_days are needed to quote a premium.', 'InvalidInput');
        }

        return {
          payload: {
            plan_code: plan.planCode,
            plan_name: plan.name,
            trip_days: days,
            premium_minor: premiumFor(plan, days),
            currency: context.services.currency,
          },
        };
      },
    }),
  ];
}
