import assert from 'node:assert/strict';
import test from 'node:test';
import { createSilentLogger } from '../logging';
import { InMemoryLlmAuditSink, redactAuditMetadata } from './audit';
import { classifyHttpStatus, LlmProviderError, LlmRoutingExhaustedError } from './errors';
import { CompositeKeyResolutionService, EnvironmentKeyResolutionService, InMemoryKeyResolutionService } from './keyResolution';
import { LlmRouter } from './router';
import type {
  LlmErrorCode,
  LlmGenerateRequest,
  LlmGenerateResponse,
  LlmProvider,
  LlmProviderGenerateContext,
} from './types';

class FakeProvider implements LlmProvider {
  calls = 0;

  constructor(
    public readonly id: 'openai' | 'claude',
    public readonly model: string,
    private readonly behavior: (request: LlmGenerateRequest, context: LlmProviderGenerateContext) => Promise<LlmGenerateResponse>,
  ) {}

  generate(request: LlmGenerateRequest, context: LlmProviderGenerateContext): Promise<LlmGenerateResponse> {
    this.calls += 1;
    return this.behavior(request, context);
  }
}

const request: LlmGenerateRequest = {
  systemPrompt: 'You are a travel insurance assistant.',
  messages: [{ role: 'user', content: 'hello' }],
};

function makeRouterWithPrimaryFailure(code: LlmErrorCode) {
  const audit = new InMemoryLlmAuditSink();
  const primary = new FakeProvider('openai', 'gpt-test', async () => {
    throw new LlmProviderError(`primary failed: ${code}`, {
      provider: 'openai',
      code,
      retryable: code === 'timeout' || code === 'rate_limit' || code === 'server_error',
      statusCode: code === 'server_error' ? 503 : code === 'rate_limit' ? 429 : undefined,
    });
  });
  const fallback = new FakeProvider('claude', 'claude-test', async () => ({
    provider: 'claude',
    model: 'claude-test',
    content: 'fallback-ok',
  }));

  const router = new LlmRouter({
    logger: createSilentLogger(),
    auditSink: audit,
    keyResolution: new InMemoryKeyResolutionService([
      { provider: 'openai', scope: 'partner', scopeId: 'partner-1', key: 'test-openai-key' },
      { provider: 'claude', scope: 'partner', scopeId: 'partner-1', key: 'test-claude-key' },
    ]),
    providers: [primary, fallback],
  });

  return { router, primary, fallback, audit };
}

for (const code of ['timeout', 'rate_limit', 'server_error'] as const) {
  test(`fallback policy routes to secondary provider on ${code}`, async () => {
    const { router, primary, fallback, audit } = makeRouterWithPrimaryFailure(code);

    const result = await router.generate({
      requestId: `req-${code}`,
      request,
      routing: {
        primary: 'openai',
        fallbackOrder: ['claude'],
        timeoutMs: 5000,
        keyScopes: ['partner', 'deployment'],
      },
      keyContext: { partnerId: 'partner-1' },
    });

    assert.equal(result.provider, 'claude');
    assert.equal(result.content, 'fallback-ok');
    assert.equal(primary.calls, 1);
    assert.equal(fallback.calls, 1);

    const fallbackEvent = audit.events.find((event) => event.event === 'llm.route.provider.fallback');
    assert.ok(fallbackEvent);
    assert.equal(fallbackEvent?.provider, 'openai');
    assert.equal(fallbackEvent?.metadata?.reason, code);

    const attemptEvent = audit.events.find(
      (event) => event.event === 'llm.route.provider.attempt' && event.provider === 'openai',
    );
    assert.ok(attemptEvent);
    assert.notEqual(attemptEvent?.metadata?.key, 'test-openai-key');
  });
}

test('fallback policy does not fallback on auth_error', async () => {
  const audit = new InMemoryLlmAuditSink();
  const primary = new FakeProvider('openai', 'gpt-test', async () => {
    throw new LlmProviderError('unauthorized', {
      provider: 'openai',
      code: 'auth_error',
      retryable: false,
      statusCode: 401,
    });
  });
  const fallback = new FakeProvider('claude', 'claude-test', async () => ({
    provider: 'claude',
    model: 'claude-test',
    content: 'should-not-run',
  }));

  const router = new LlmRouter({
    logger: createSilentLogger(),
    auditSink: audit,
    keyResolution: new EnvironmentKeyResolutionService({
      TRIPGUARD_OPENAI_API_KEY: 'test-openai-key',
      TRIPGUARD_ANTHROPIC_API_KEY: 'test-claude-key',
    }),
    providers: [primary, fallback],
  });

  await assert.rejects(
    () =>
      router.generate({
        requestId: 'req-auth',
        request,
        routing: {
          primary: 'openai',
          fallbackOrder: ['claude'],
          keyScopes: ['deployment'],
        },
      }),
    (error: unknown) => {
      assert.ok(error instanceof LlmRoutingExhaustedError);
      assert.equal(error.attempts.length, 1);
      assert.equal(error.attempts[0]?.provider, 'openai');
      assert.equal(error.attempts[0]?.code, 'auth_error');
      assert.equal(error.lastFailureCode, 'auth_error');
      return true;
    },
  );

  assert.equal(primary.calls, 1);
  assert.equal(fallback.calls, 0);
  assert.deepEqual(audit.names(), [
    'llm.route.start',
    'llm.route.provider.attempt',
    'llm.route.provider.failure',
    'llm.route.exhausted',
  ]);
});

test('skips providers without a resolvable key', async () => {
  const audit = new InMemoryLlmAuditSink();
  const primary = new FakeProvider('openai', 'gpt-test', async () => ({ provider: 'openai', model: 'gpt-test', content: 'never' }));
  const fallback = new FakeProvider('claude', 'claude-test', async (_request, context) => ({
    provider: 'claude',
    model: 'claude-test',
    content: `${context.resolvedKey.scope}:${context.resolvedKey.source}`,
  }));

  const router = new LlmRouter({
    logger: createSilentLogger(),
    auditSink: audit,
    keyResolution: new CompositeKeyResolutionService([
      new InMemoryKeyResolutionService([{ provider: 'openai', scope: 'partner', scopeId: 'partner-2', key: 'test-key' }]),
      new EnvironmentKeyResolutionService({ TRIPGUARD_ANTHROPIC_API_KEY: 'test-claude-key' }),
    ]),
    providers: [primary, fallback],
  });

  const result = await router.generate({
    request,
    routing: { primary: 'openai', fallbackOrder: ['claude'], keyScopes: ['partner', 'deployment'] },
    keyContext: { partnerId: 'partner-1' },
  });

  assert.equal(result.content, 'deployment:env');
  assert.equal(primary.calls, 0);
  const skipped = audit.events.find((event) => event.event === 'llm.route.provider.skipped');
  assert.equal(skipped?.provider, 'openai');
  assert.equal(skipped?.metadata?.reason, 'key_not_found');
});

test('audit metadata hides credentials and traveller contact fields', () => {
  assert.deepEqual(
    redactAuditMetadata({
      keyId: 'tripguard_openai_api_key:present',
      attempts: [{ provider: 'openai', code: 'bad_request', email: 'ana@example.com' }],
      order: ['openai', 'claude'],
    }),
    {
      keyId: '[REDACTED]',
      attempts: [{ provider: 'openai', code: 'bad_request', email: '[REDACTED]' }],
      order: ['openai', 'claude'],
    },
  );
});

test('an overloaded provider is treated as rate limited', () => {
  const error = classifyHttpStatus('claude', 529, 'claude request failed with HTTP 529: overloaded');
  assert.equal(error.code, 'rate_limit');
  assert.equal(error.retryable, true);
  assert.deepEqual(error.toAttempt(), {
    provider: 'claude',
    code: 'rate_limit',
    message: 'claude request failed with HTTP 529: overloaded',
    statusCode: 529,
  });
});

test('a cancelled request never reaches a provider', async () => {
  const audit = new InMemoryLlmAuditSink();
  const primary = new FakeProvider('openai', 'gpt-test', async () => ({ provider: 'openai', model: 'gpt-test', content: 'never' }));
  const router = new LlmRouter({
    logger: createSilentLogger(),
    auditSink: audit,
    keyResolution: new EnvironmentKeyResolutionService({ TRIPGUARD_OPENAI_API_KEY: 'test-openai-key' }),
    providers: [primary],
  });

  await assert.rejects(
    router.generate({
      request,
      signal: AbortSignal.abort(),
      routing: { primary: 'openai', fallbackOrder: [], keyScopes: ['deployment'] },
    }),
    (error: unknown) => {
      assert.ok(error instanceof LlmRoutingExhaustedError);
      assert.equal(error.attempts[0]?.code, 'timeout');
      assert.equal(error.lastFailureCode, 'timeout');
      return true;
    },
  );
  assert.equal(primary.calls, 0);
  assert.deepEqual(audit.names(), ['llm.route.start', 'llm.route.exhausted']);
});
