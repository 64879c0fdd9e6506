import assert from 'node:assert/strict';
import test from 'node:test';
import { z } from 'zod';
import {
  composeGuardReply,
  composeProfileGuidance,
  confirmVerificationPatch,
  evaluatePaymentReadiness,
  isConfirmationMessage,
  missingProfileFields,
  profileBagSchema,
  requestVerificationPatch,
  type ProfileBag,
} from './profile';

const completeProfile: ProfileBag = {
  traveller: {
    name: 'Ana Silva',
    email: 'ana@example.com',
    phone: '+65 5550 1234',
    dateOfBirth: '1990-04-02',
    residence: 'Singapore',
    passportNumber: 'X1234567',
  },
  trip: {
    destination: 'Japan',
    startDate: '2026-12-01',
    endDate: '2026-12-10',
    tripType: 'round',
    tripCost: 3200,
  },
};

const guidancePayload = z.object({
  status: z.string(),
  missing_fields: z.array(z.string()).optional(),
  tool_inputs: z.object({ claims_recommendation: z.record(z.unknown()) }).optional(),
});

test('lists missing traveller and trip fields', () => {
  assert.deepEqual(missingProfileFields({ traveller: { name: 'Ana' } }), [
    'Email address',
    'Phone number',
    'Date of birth',
    'Place of residence',
    'Passport number',
    'Trip details',
  ]);
  assert.deepEqual(missingProfileFields({ ...completeProfile, trip: { destination: 'Japan' } }), [
    'Trip start date',
    'Trip end date',
    'Trip type',
    'Trip cost',
  ]);
  assert.deepEqual(missingProfileFields(completeProfile), []);
});

test('evaluates payment readiness in order', () => {
  assert.deepEqual(evaluatePaymentReadiness({}), { status: 'missing_profile' });
  assert.deepEqual(evaluatePaymentReadiness({ trip: completeProfile.trip }), {
    status: 'missing_fields',
    missing: ['Name', 'Email address', 'Phone number', 'Date of birth', 'Place of residence', 'Passport number'],
  });
  assert.deepEqual(evaluatePaymentReadiness(completeProfile), {
    status: 'unverified',
    fields: {
      name: 'Ana Silva',
      email_address: 'ana@example.com',
      passport_number: 'X1234567',
      phone_number: '+65 5550 1234',
      destination: 'Japan',
      trip_type: 'round',
      trip_cost: '3200',
      travel_dates: '2026-12-01 -> 2026-12-10',
    },
  });
  assert.deepEqual(
    evaluatePaymentReadiness({ ...completeProfile, verification: { status: 'confirmed', fields: {} } }),
    { status: 'ready' },
  );
});

test('recognizes confirmation messages', () => {
  assert.equal(isConfirmationMessage('Confirmed'), true);
  assert.equal(isConfirmationMessage('yes, all good'), true);
  assert.equal(isConfirmationMessage('Looks good to me'), true);
  assert.equal(isConfirmationMessage('is that correct?'), false);
  assert.equal(isConfirmationMessage('no, the passport is wrong'), false);
  assert.equal(isConfirmationMessage('That is not correct, my passport is K1234567'), false);
  assert.equal(isConfirmationMessage("No, don't proceed"), false);
  assert.equal(isConfirmationMessage('incorrect email'), false);
  assert.equal(isConfirmationMessage('Please don\u2019t go ahead yet'), false);
  assert.equal(isConfirmationMessage('Correct, go ahead'), true);
  assert.equal(isConfirmationMessage('   '), false);
});

test('confirms only pending verification', () => {
  const now = new Date('2026-03-01T10:00:00.000Z');
  const pending = { ...completeProfile, ...requestVerificationPatch({ name: 'Ana Silva' }, now) };

  assert.deepEqual(confirmVerificationPatch(pending, 'Confirmed', now), {
    verification: {
      status: 'confirmed',
      fields: { name: 'Ana Silva' },
      requestedAt: '2026-03-01T10:00:00.000Z',
      confirmedAt: '2026-03-01T10:00:00.000Z',
    },
  });
  assert.equal(confirmVerificationPatch(pending, 'what does it cover?', now), null);
  assert.equal(confirmVerificationPatch(completeProfile, 'Confirmed', now), null);
});

test('composes guard replies', () => {
  assert.equal(
    composeGuardReply({ status: 'missing_fields', missing: ['Trip cost', 'Passport number', 'Name'] }),
    'I still need a few details before the payment step: Trip cost, Passport number and Name. Once you share them, I can prepare checkout.',
  );
  assert.equal(
    composeGuardReply({ status: 'unverified', fields: { name: 'Ana Silva', destination: 'Japan' } }),
    "Let's double-check the traveller info before payment:\n- Name: Ana Silva\n- Destination: Japan\n" +
      "Please confirm everything is correct (a simple 'Confirmed' works) so I can continue.",
  );
});

test('composes profile guidance with tool hints for complete profiles', () => {
  assert.equal(composeProfileGuidance({}), null);

  const guidance = composeProfileGuidance({ ...completeProfile, trip: { ...completeProfile.trip, activity: 'skiing' } });
  assert.ok(guidance);
  assert.ok(guidance.startsWith('[Traveller Profile]\n'));
  const payload = guidancePayload.parse(JSON.parse(guidance.slice('[Traveller Profile]\n'.length)));
  assert.equal(payload.status, 'rich');
  assert.equal(payload.missing_fields, undefined);
  assert.deepEqual(payload.tool_inputs?.claims_recommendation, {
    destination: 'Japan',
    activity: 'skiing',
    trip_cost: 3200,
  });
});

test('marks partially known profiles', () => {
  const guidance = composeProfileGuidance({ trip: { destination: 'Japan' } });
  assert.ok(guidance);
  const payload = guidancePayload.parse(JSON.parse(guidance.slice('[Traveller Profile]\n'.length)));
  assert.equal(payload.status, 'partial');
  assert.equal(payload.missing_fields?.includes('Trip cost'), true);
});

test('validates profile patches', () => {
  assert.equal(profileBagSchema.safeParse({ trip: { tripType: 'one-way' } }).success, false);
  assert.equal(profileBagSchema.safeParse({ traveller: { email: 'not-an-email' } }).success, false);

  const parsed = profileBagSchema.parse({ traveller: { email: ' Ana@Example.COM ' }, channelHints: { locale: 'en' } });
  assert.deepEqual(parsed, { traveller: { email: 'ana@example.com' }, channelHints: { locale: 'en' } });
});
