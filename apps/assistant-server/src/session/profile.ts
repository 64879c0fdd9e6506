import { tripTypeSchema } from '@tripguard/plan-catalog';
import { z } from 'zod';

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const travellerSchema = z
  .object({
    name: z.string().trim().min(1),
    email: z.string().trim().toLowerCase().email(),
    phone: z.string().trim().min(3),
    dateOfBirth: isoDateSchema,
    residence: z.string().trim().min(1),
    passportNumber: z.string().trim().min(3),
  })
  .partial();

export type TravellerProfile = z.infer<typeof travellerSchema>;

export const tripSchema = z
  .object({
    destination: z.string().trim().min(1),
    startDate: isoDateSchema,
    endDate: isoDateSchema,
    tripType: tripTypeSchema,
    tripCost: z.number().nonnegative(),
    activity: z.string().trim().min(1),
  })
  .partial();

export type TripProfile = z.infer<typeof tripSchema>;

export const verificationSchema = z.object({
  status: z.enum(['unknown', 'pending', 'confirmed']).default('unknown'),
  fields: z.record(z.string()).default({}),
  requestedAt: z.string().optional(),
  confirmedAt: z.string().optional(),
});

export type VerificationRecord = z.infer<typeof verificationSchema>;

export const paymentStateSchema = z.object({
  checkoutRef: z.string().min(1),
  status: z.string().min(1),
  paymentStatus: z.string().optional(),
  policyRef: z.string().optional(),
  updatedAt: z.string(),
});

export type PaymentState = z.infer<typeof paymentStateSchema>;

export const profileBagSchema = z
  .object({
    traveller: travellerSchema.optional(),
    trip: tripSchema.optional(),
    verification: verificationSchema.optional(),
    payment: paymentStateSchema.optional(),
  })
  .passthrough();

export type ProfileBag = z.infer<typeof profileBagSchema>;

/** Shallow merge: top-level keys of `patch` replace those of `current`. */
export function mergeProfileBags(current: ProfileBag, patch: ProfileBag): ProfileBag {
  return { ...current, ...patch };
}

const REQUIRED_TRAVELLER_FIELDS: Array<[keyof TravellerProfile, string]> = [
  ['name', 'Name'],
  ['email', 'Email address'],
  ['phone', 'Phone number'],
  ['dateOfBirth', 'Date of birth'],
  ['residence', 'Place of residence'],
  ['passportNumber', 'Passport number'],
];

const REQUIRED_TRIP_FIELDS: Array<[keyof TripProfile, string]> = [
  ['destination', 'Trip destination'],
  ['startDate', 'Trip start date'],
  ['endDate', 'Trip end date'],
  ['tripType', 'Trip type'],
  ['tripCost', 'Trip cost'],
];

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function missingProfileFields(profile: ProfileBag): string[] {
  const traveller: TravellerProfile = profile.traveller ?? {};
  const missing = REQUIRED_TRAVELLER_FIELDS.filter(([key]) => isBlank(traveller[key])).map(([, label]) => label);

  if (!profile.trip) {
    missing.push('Trip details');
    return missing;
  }

  const trip = profile.trip;
  missing.push(...REQUIRED_TRIP_FIELDS.filter(([key]) => isBlank(trip[key])).map(([, label]) => label));
  return missing;
}

export function buildVerificationFields(profile: ProfileBag): Record<string, string> {
  const traveller: TravellerProfile = profile.traveller ?? {};
  const trip: TripProfile = profile.trip ?? {};
  const fields: Record<string, string | undefined> = {
    name: traveller.name,
    email_address: traveller.email,
    passport_number: traveller.passportNumber,
    phone_number: traveller.phone,
    destination: trip.destination,
    trip_type: trip.tripType,
    trip_cost: trip.tripCost === undefined ? undefined : String(trip.tripCost),
    travel_dates: formatTripDates(trip),
  };

  const compact: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && !isBlank(value)) {
      compact[key] = value;
    }
  }
  return compact;
}

function formatTripDates(trip: TripProfile): string | undefined {
  if (trip.startDate && trip.endDate) {
    return `${trip.startDate} -> ${trip.endDate}`;
  }
  return trip.startDate ?? trip.endDate;
}

export type PaymentReadiness =
  | { status: 'missing_profile' }
  | { status: 'missing_fields'; missing: string[] }
  | { status: 'unverified'; fields: Record<string, string> }
  | { status: 'ready' };

export function evaluatePaymentReadiness(profile: ProfileBag): PaymentReadiness {
  if (!profile.traveller && !profile.trip) {
    return { status: 'missing_profile' };
  }

  const missing = missingProfileFields(profile);
  if (missing.length > 0) {
    return { status: 'missing_fields', missing };
  }

  if (profile.verification?.status !== 'confirmed') {
    const pendingFields = profile.verification?.fields ?? {};
    return {
      status: 'unverified',
      fields: Object.keys(pendingFields).length > 0 ? pendingFields : buildVerificationFields(profile),
    };
  }

  return { status: 'ready' };
}

const CONFIRMATION_PHRASES = ['confirm', 'confirmed', 'looks good', 'correct', 'go ahead', 'approve', 'proceed', 'verified'];
const CONFIRMATION_STARTS = new Set(['yes', 'yup', 'yeah', 'sure', 'ok', 'okay']);
const NEGATIONS = new Set(['no', 'not', 'nope', 'never', 'incorrect', 'wrong', 'cancel', 'stop', 'wait', 'change']);

/** True for a plain agreement. Questions and anything carrying a negation never confirm. */
export function isConfirmationMessage(message: string): boolean {
  const text = message.trim().toLowerCase().replace(/\u2019/g, "'");
  if (!text || text.includes('?')) {
    return false;
  }
  const words = text.split(/[^a-z']+/).filter((word) => word.length > 0);
  if (words.some((word) => NEGATIONS.has(word) || word.endsWith("n't") || word === 'dont')) {
    return false;
  }
  if (CONFIRMATION_PHRASES.some((phrase) => text.includes(phrase))) {
    return true;
  }
  const firstToken = text.split(/\s+/)[0]?.replace(/[^a-z]/g, '') ?? '';
  return CONFIRMATION_STARTS.has(firstToken);
}

export function requestVerificationPatch(fields: Record<string, string>, now: Date): ProfileBag {
  return {
    verification: {
      status: 'pending',
      fields,
      requestedAt: now.toISOString(),
    },
  };
}

/** Returns the patch confirming a pending verification, or null when nothing is pending. */
export function confirmVerificationPatch(profile: ProfileBag, message: string, now: Date): ProfileBag | null {
  const verification = profile.verification;
  if (verification?.status !== 'pending' || !isConfirmationMessage(message)) {
    return null;
  }
  return {
    verification: {
      ...verification,
      status: 'confirmed',
      confirmedAt: now.toISOString(),
    },
  };
}

function joinLabels(labels: string[]): string {
  if (labels.length === 0) {
    return 'some required fields';
  }
  if (labels.length === 1) {
    return labels[0] ?? '';
  }
  return `${labels.slice(0, -1).join(', ')} and ${labels[labels.length - 1]}`;
}

const VERIFICATION_LABELS: Array<[string, string]> = [
  ['name', 'Name'],
  ['destination', 'Destination'],
  ['trip_type', 'Trip type'],
  ['trip_cost', 'Trip cost'],
  ['travel_dates', 'Travel dates'],
  ['email_address', 'Email'],
  ['phone_number', 'Phone'],
  ['passport_number', 'Passport number'],
];

export function composeGuardReply(readiness: Exclude<PaymentReadiness, { status: 'ready' }>): string {
  switch (readiness.status) {
    case 'missing_profile':
      return (
        "Before we can secure a policy, I need the traveller's profile - name, contacts, passport and trip itinerary. " +
        'Please share those details, or pass them through the integration payload.'
      );
    case 'missing_fields':
      return (
        `I still need a few details before the payment step: ${joinLabels(readiness.missing)}. ` +
        'Once you share them, I can prepare checkout.'
      );
    case 'unverified': {
      const lines = VERIFICATION_LABELS.filter(([key]) => readiness.fields[key]).map(
        ([key, label]) => `- ${label}: ${readiness.fields[key]}`,
      );
      const summary = lines.length > 0 ? lines.join('\n') : '- Traveller details on file';
      return (
        "Let's double-check the traveller info before payment:\n" +
        `${summary}\n` +
        "Please confirm everything is correct (a simple 'Confirmed' works) so I can continue."
      );
    }
  }
}

export type ProfileStatus = 'rich' | 'partial' | 'sparse';

/**
 * Context block describing the traveller profile for the reasoning step, or
 * null when nothing is known yet.
 */
export function composeProfileGuidance(profile: ProfileBag): string | null {
  if (!profile.traveller && !profile.trip) {
    return null;
  }

  const missing = missingProfileFields(profile);
  const knownFields = Object.keys(profile.traveller ?? {}).length + Object.keys(profile.trip ?? {}).length;
  const status: ProfileStatus = missing.length === 0 ? 'rich' : knownFields > 0 ? 'partial' : 'sparse';

  const workflow = [
    'Surface the integration data, confirm accuracy with the traveller, and note any missing items.',
    'Always keep responses concise, empathetic, and cite policy sources in answers.',
    'Never initiate payment until all required fields are present and the traveller has explicitly confirmed the profile.',
  ];
  workflow.unshift(
    status === 'rich'
      ? 'Profile is complete. After confirmation, run `claims_recommendation` and follow up with `policy_lookup` to produce tailored options.'
      : 'Profile is incomplete. Ask targeted questions to capture the missing information before running recommendation tools.',
  );

  const payload: Record<string, unknown> = {
    status,
    traveller: profile.traveller ?? {},
    trip: profile.trip ?? {},
    verification: profile.verification?.status ?? 'unknown',
    workflow,
  };
  if (missing.length > 0) {
    payload.missing_fields = missing;
  }
  if (profile.payment) {
    payload.payment = profile.payment;
  }
  if (status === 'rich' && profile.trip) {
    payload.tool_inputs = {
      claims_recommendation: {
        destination: profile.trip.destination,
        activity: profile.trip.activity,
        trip_cost: profile.trip.tripCost,
      },
    };
  }

  return `[Traveller Profile]\n${JSON.stringify(payload, null, 2)}`;
}
