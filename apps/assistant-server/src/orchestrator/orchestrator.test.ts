import assert from 'node:assert/strict';
import test from 'node:test';
import type { OrchestrationPolicy } from '../config';
import { SessionBusyError } from '../errors';
import { createSilentLogger } from '../logging';
import { renderHistory } from '../reasoning/prompt';
import type { ReasoningOutcome } from '../reasoning/protocol';
import { SessionGate, type BusyPolicy } from '../session/gate';
import type { ProfileBag } from '../session/profile';
import { callTool, createTestServices, fixedClock, reply, ScriptedReasoningClient } from '../testing/fakes';
import { ToolExecutor } from '../tools/executor';
import { createToolImplementations } from '../tools/implementations';
import { ToolRegistry } from '../tools/registry';
import { Orchestrator, STALL_REPLIES } from './orchestrator';

const at = '2026-03-01T10:00:00.000Z';

const basePolicy: OrchestrationPolicy = {
  toolCallBudget: 6,
  reasoningAttempts: 2,
  malformedRetries: 1,
  readToolRetries: 1,
  maxConversationTurns: 200,
  reasoningTimeoutMs: 1_000,
  toolTimeoutMs: 1_000,
  busyPolicy: 'queue',
};

type Step = ConstructorParameters<typeof ScriptedReasoningClient>[0][number];

function setup(steps: Step[], policy: Partial<OrchestrationPolicy> = {}, busyPolicy: BusyPolicy = 'queue') {
  const services = createTestServices();
  const logger = createSilentLogger();
  const registry = new ToolRegistry(createToolImplementations()).seal();
  const reasoning = new ScriptedReasoningClient(steps);
  let issued = 0;
  const orchestrator = new Orchestrator({
    sessions: services.sessions,
    registry,
    executor: new ToolExecutor({ services, logger, defaultTimeoutMs: 1_000, transientRetries: 1 }),
    reasoning,
    gate: new SessionGate(busyPolicy),
    policy: { ...basePolicy, ...policy },
    logger,
    clock: fixedClock,
    requestIds: () => {
      issued += 1;
      return `req-${issued}`;
    },
  });
  return { orchestrator, reasoning, services };
}

const unavailable: ReasoningOutcome = { kind: 'unavailable', detail: 'openai network request failed: timeout' };
const malformed: ReasoningOutcome = { kind: 'malformed_output', detail: 'response is not JSON', raw: 'Sure thing!' };

const checkout = {
  plan_code: 'BASIC',
  amount_minor: 4500,
  success_url: 'https://shop.example.test/ok',
  cancel_url: 'https://shop.example.test/cancel',
};

const traveller = {
  name: 'Ana Silva',
  email: 'ana@example.com',
  phone: '+65 8123 4567',
  dateOfBirth: '1990-04-02',
  residence: 'Singapore',
  passportNumber: 'X1234567',
};

const trip = {
  destination: 'Japan',
  startDate: '2026-03-12',
  endDate: '2026-03-21',
  tripType: 'round' as const,
  tripCost: 3200,
};

const confirmedProfile: ProfileBag = {
  traveller,
  trip,
  verification: { status: 'confirmed', fields: {} },
};

test('answers a first message without tools and stores both turns', async () => {
  const { orchestrator, reasoning, services } = setup([reply('PLUS covers medical costs abroad up to SGD 500,000.')]);

  const result = await orchestrator.handleMessage({ sessionId: 's1', text: 'How much coverage for a 10-day Japan trip?' });

  assert.deepEqual(result, {
    requestId: 'req-1',
    sessionId: 's1',
    replyText: 'PLUS covers medical costs abroad up to SGD 500,000.',
    outcome: 'replied',
    toolRuns: [],
  });
  assert.equal(reasoning.requests.length, 1);
  assert.deepEqual(reasoning.requests[0]?.turns, [
    { role: 'user', content: 'How much coverage for a 10-day Japan trip?', createdAt: at },
  ]);

  const session = await services.sessions.load('s1');
  assert.deepEqual(session.turns, [
    { role: 'user', content: 'How much coverage for a 10-day Japan trip?', createdAt: at },
    { role: 'assistant', content: 'PLUS covers medical costs abroad up to SGD 500,000.', createdAt: at },
  ]);
  assert.equal(session.turnCounter, 1);
});

test('runs a checkout, feeds the result back, and replays it for the same key', async () => {
  const { orchestrator, reasoning, services } = setup([
    callTool('payment_checkout', checkout),
    reply('Here is your checkout link: https://pay.example.test/chk_1'),
    callTool('payment_checkout', checkout),
    reply('Your checkout link is still https://pay.example.test/chk_1'),
  ]);

  const first = await orchestrator.handleMessage({
    sessionId: 's1',
    text: 'Please buy BASIC for me.',
    profilePatch: confirmedProfile,
  });

  assert.equal(first.replyText, 'Here is your checkout link: https://pay.example.test/chk_1');
  assert.deepEqual(first.toolRuns, [{ name: 'payment_checkout', input: checkout, resultStatus: 'ok' }]);
  const fedBack = reasoning.requests[1]?.turns.at(-1);
  assert.equal(fedBack?.role, 'tool');
  if (fedBack?.role === 'tool') {
    assert.deepEqual(fedBack.result, {
      status: 'ok',
      payload: {
        checkout_ref: 'chk_1',
        checkout_url: 'https://pay.example.test/chk_1',
        provider: 'stripe',
        plan_code: 'BASIC',
        amount_minor: 4500,
        currency: 'sgd',
      },
    });
  }
  assert.equal(reasoning.requests[1]?.profile.payment?.checkoutRef, 'chk_1');

  const second = await orchestrator.handleMessage({ sessionId: 's1', text: 'I lost the link, send it again.' });

  assert.deepEqual(second.toolRuns, [{ name: 'payment_checkout', input: checkout, resultStatus: 'ok', cached: true }]);
  assert.equal(services.payments.created.length, 1);
});

test('stalls without touching the session when reasoning is unavailable twice', async () => {
  const { orchestrator, reasoning, services } = setup([reply('Hello! Where are you travelling?'), unavailable]);
  await orchestrator.handleMessage({ sessionId: 's2', text: 'Hi' });
  const before = await services.sessions.load('s2');

  const result = await orchestrator.handleMessage({ sessionId: 's2', text: 'Japan in March' });

  assert.deepEqual(result, {
    requestId: 'req-2',
    sessionId: 's2',
    replyText: STALL_REPLIES.reasoning_unavailable,
    outcome: 'stalled',
    stallReason: 'reasoning_unavailable',
    toolRuns: [],
  });
  assert.equal(reasoning.requests.length, 3);
  assert.deepEqual(await services.sessions.load('s2'), before);
});

test('recovers when a single reasoning attempt fails', async () => {
  const { orchestrator, reasoning } = setup([unavailable, reply('Japan trips are covered on every plan.')]);

  const result = await orchestrator.handleMessage({ sessionId: 's3', text: 'Is Japan covered?' });

  assert.equal(result.outcome, 'replied');
  assert.equal(reasoning.requests.length, 2);
});

test('answers an unknown tool with a corrective turn and never executes it', async () => {
  const { orchestrator, reasoning, services } = setup([
    callTool('refund_everything', { amount: 10 }),
    reply('I cannot issue refunds, but I can help with a claim.'),
  ]);

  const result = await orchestrator.handleMessage({ sessionId: 's1', text: 'Refund me' });

  assert.deepEqual(result.toolRuns, [
    { name: 'refund_everything', input: { amount: 10 }, resultStatus: 'error', errorKind: 'NotFound' },
  ]);
  const corrective = reasoning.requests[1]?.turns.at(-1);
  assert.deepEqual(corrective, {
    role: 'tool',
    toolName: 'refund_everything',
    input: { amount: 10 },
    result: {
      status: 'error',
      kind: 'NotFound',
      message:
        'Tool refund_everything does not exist. Available tools: policy_lookup, claims_recommendation, document_ingest, payment_checkout, payment_status, purchase_finalize, plan_quote.',
      retryable: false,
    },
    createdAt: at,
  });
  assert.equal(services.payments.created.length, 0);
  assert.equal((await services.sessions.load('s1')).turns.length, 3);
});

test('feeds invalid tool input back to the model as a turn', async () => {
  const { orchestrator, reasoning } = setup([
    callTool('policy_lookup', { query: '' }),
    reply('Could you tell me what you would like to know about the policy?'),
  ]);

  const result = await orchestrator.handleMessage({ sessionId: 's1', text: 'Policy?' });

  assert.deepEqual(result.toolRuns, [
    { name: 'policy_lookup', input: { query: '' }, resultStatus: 'error', errorKind: 'InvalidInput' },
  ]);
  assert.equal(reasoning.requests.length, 2);
});

test('stalls on the tool budget and keeps the tool turns already run', async () => {
  const { orchestrator, reasoning, services } = setup([callTool('policy_lookup', { query: 'skiing' })], {
    toolCallBudget: 2,
  });

  const result = await orchestrator.handleMessage({ sessionId: 's4', text: 'Tell me everything about skiing' });

  assert.equal(result.outcome, 'stalled');
  assert.equal(result.stallReason, 'tool_budget');
  assert.equal(result.replyText, STALL_REPLIES.tool_budget);
  assert.equal(result.toolRuns.length, 2);
  assert.equal(reasoning.requests.length, 3);

  const session = await services.sessions.load('s4');
  assert.deepEqual(
    session.turns.map((turn) => turn.role),
    ['user', 'tool', 'tool'],
  );
  assert.equal(session.turnCounter, 1);
});

test('re-asks once on malformed output, then falls back', async () => {
  const { orchestrator, reasoning, services } = setup([malformed]);

  const result = await orchestrator.handleMessage({ sessionId: 's5', text: 'Hello?' });

  assert.equal(result.outcome, 'stalled');
  assert.equal(result.stallReason, 'malformed_output');
  assert.equal(result.replyText, STALL_REPLIES.malformed_output);
  assert.equal(reasoning.requests.length, 2);
  assert.equal(reasoning.requests[0]?.correction, undefined);
  assert.equal(
    reasoning.requests[1]?.correction,
    'Your previous response could not be used (response is not JSON). Respond with a single JSON object {"output": "...", "actions": [...]} and nothing else.',
  );
  assert.deepEqual((await services.sessions.load('s5')).turns, []);
});

test('a corrected answer after one malformed response is a normal reply', async () => {
  const { orchestrator, services } = setup([malformed, reply('Hello! How can I help with your trip?')]);

  const result = await orchestrator.handleMessage({ sessionId: 's5', text: 'Hello?' });

  assert.equal(result.outcome, 'replied');
  assert.equal((await services.sessions.load('s5')).turns.length, 2);
});

test('replaying stored turns reproduces the last reasoning context', async () => {
  const { orchestrator, reasoning, services } = setup([
    { kind: 'tool_call', directives: [{ name: 'policy_lookup', input: { query: 'skiing' } }, { name: 'claims_recommendation', input: { destination: 'Japan' } }] },
    reply('Skiing is covered on PLUS and PREMIER.'),
    callTool('policy_lookup', { query: 'lost baggage', plan_code: 'PLUS' }),
    reply('PLUS pays for lost baggage.'),
  ]);

  await orchestrator.handleMessage({ sessionId: 's6', text: 'Skiing in Japan?' });
  await orchestrator.handleMessage({ sessionId: 's6', text: 'And lost bags?' });

  const session = await services.sessions.load('s6');
  const lastContext = reasoning.requests.at(-1)?.turns ?? [];
  assert.equal(session.turns.length, lastContext.length + 1);
  assert.deepEqual(renderHistory(session.turns.slice(0, -1)), renderHistory(lastContext));
});

test('guards checkout until the profile is complete', async () => {
  const { orchestrator, services } = setup([callTool('payment_checkout', checkout)]);

  const result = await orchestrator.handleMessage({
    sessionId: 's7',
    text: 'Buy BASIC now',
    profilePatch: { traveller: { name: 'Ana Silva' } },
  });

  assert.equal(
    result.replyText,
    'I still need a few details before the payment step: Email address, Phone number, Date of birth, Place of residence, Passport number and Trip details. Once you share them, I can prepare checkout.',
  );
  assert.equal(result.outcome, 'replied');
  assert.deepEqual(result.toolRuns, []);
  assert.equal(services.payments.created.length, 0);
  assert.deepEqual(
    (await services.sessions.load('s7')).turns.map((turn) => turn.role),
    ['user', 'assistant'],
  );
});

test('asks for confirmation of a complete profile, then proceeds once confirmed', async () => {
  const { orchestrator, services } = setup([
    callTool('payment_checkout', checkout),
    callTool('payment_checkout', checkout),
    reply('Checkout is ready: https://pay.example.test/chk_1'),
  ]);

  const guarded = await orchestrator.handleMessage({
    sessionId: 's8',
    text: 'Buy BASIC',
    profilePatch: { traveller, trip },
  });

  assert.equal(
    guarded.replyText,
    [
      "Let's double-check the traveller info before payment:",
      '- Name: Ana Silva',
      '- Destination: Japan',
      '- Trip type: round',
      '- Trip cost: 3200',
      '- Travel dates: 2026-03-12 -> 2026-03-21',
      '- Email: ana@example.com',
      '- Phone: +65 8123 4567',
      '- Passport number: X1234567',
      "Please confirm everything is correct (a simple 'Confirmed' works) so I can continue.",
    ].join('\n'),
  );
  assert.equal((await services.sessions.getProfile('s8')).verification?.status, 'pending');
  assert.equal(services.payments.created.length, 0);

  const confirmed = await orchestrator.handleMessage({ sessionId: 's8', text: 'Confirmed' });

  assert.equal(confirmed.replyText, 'Checkout is ready: https://pay.example.test/chk_1');
  assert.deepEqual(confirmed.toolRuns, [{ name: 'payment_checkout', input: checkout, resultStatus: 'ok' }]);
  const verification = (await services.sessions.getProfile('s8')).verification;
  assert.equal(verification?.status, 'confirmed');
  assert.equal(verification?.confirmedAt, at);
  assert.equal(services.payments.created.length, 1);
});

test('a refusal keeps the verification pending and the payment guard closed', async () => {
  const { orchestrator, services } = setup([callTool('payment_checkout', checkout)]);
  await orchestrator.handleMessage({ sessionId: 's12', text: 'Buy BASIC', profilePatch: { traveller, trip } });

  const refused = await orchestrator.handleMessage({
    sessionId: 's12',
    text: 'That is not correct, my passport is K1234567',
  });

  assert.ok(refused.replyText.startsWith("Let's double-check the traveller info before payment:"));
  assert.deepEqual(refused.toolRuns, []);
  assert.equal((await services.sessions.getProfile('s12')).verification?.status, 'pending');
  assert.equal(services.payments.created.length, 0);
});

test('merges the inbound profile patch before reasoning', async () => {
  const { orchestrator, reasoning } = setup([reply('Noted.')]);

  await orchestrator.handleMessage({
    sessionId: 's9',
    text: 'Here are my details',
    channel: 'whatsapp',
    partnerId: 'partner-7',
    profilePatch: { trip: { destination: 'Nepal', activity: 'trekking' } },
  });

  assert.deepEqual(reasoning.requests[0]?.profile.trip, { destination: 'Nepal', activity: 'trekking' });
  assert.equal(reasoning.requests[0]?.channel, 'whatsapp');
  assert.equal(reasoning.requests[0]?.partnerId, 'partner-7');
});

test('hands off once the conversation reaches its turn ceiling', async () => {
  const { orchestrator, reasoning } = setup([reply('Hi there!')], { maxConversationTurns: 1 });
  await orchestrator.handleMessage({ sessionId: 's10', text: 'Hi' });

  const result = await orchestrator.handleMessage({ sessionId: 's10', text: 'Hello again' });

  assert.equal(result.outcome, 'stalled');
  assert.equal(result.stallReason, 'conversation_limit');
  assert.equal(result.replyText, STALL_REPLIES.conversation_limit);
  assert.equal(reasoning.requests.length, 1);
});

test('rejects a concurrent message for a busy session under the reject policy', async () => {
  let release: () => void = () => undefined;
  const gateOpen = new Promise<void>((resolve) => {
    release = resolve;
  });
  const { orchestrator } = setup(
    [
      async () => {
        await gateOpen;
        return reply('Done.');
      },
    ],
    {},
    'reject',
  );

  const first = orchestrator.handleMessage({ sessionId: 's11', text: 'First' });
  await assert.rejects(orchestrator.handleMessage({ sessionId: 's11', text: 'Second' }), SessionBusyError);

  release();
  assert.equal((await first).replyText, 'Done.');
});
