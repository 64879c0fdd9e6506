import assert from 'node:assert/strict';
import test from 'node:test';
import { createSilentLogger } from '../logging';
import {
  InMemoryKeyResolutionService,
  InMemoryLlmAuditSink,
  LlmProviderError,
  LlmRouter,
  type LlmGenerateRequest,
  type LlmGenerateResponse,
  type LlmProvider,
} from '../llm';
import type { Turn } from '../types';
import { LlmReasoningClient, UnconfiguredReasoningClient } from './client';

class ScriptedProvider implements LlmProvider {
  readonly requests: LlmGenerateRequest[] = [];

  constructor(
    public readonly id: 'openai' | 'claude',
    private readonly reply: () => Promise<string>,
  ) {}

  readonly model = 'test-model';

  async generate(request: LlmGenerateRequest): Promise<LlmGenerateResponse> {
    this.requests.push(request);
    return { provider: this.id, model: this.model, content: await this.reply() };
  }
}

function makeClient(provider: ScriptedProvider, keys = true) {
  const router = new LlmRouter({
    logger: createSilentLogger(),
    auditSink: new InMemoryLlmAuditSink(),
    keyResolution: new InMemoryKeyResolutionService(keys ? [{ provider: provider.id, scope: 'deployment', key: 'test-secret' }] : []),
    providers: [provider],
  });
  return new LlmReasoningClient({
    router,
    logger: createSilentLogger(),
    routing: { primary: 'openai', fallbackOrder: ['claude'], timeoutMs: 1_000, keyScopes: ['deployment'] },
  });
}

const turns: Turn[] = [{ role: 'user', content: 'How much coverage for a 10-day Japan trip?', createdAt: '2026-03-01T10:00:00.000Z' }];

const request = {
  requestId: 'req-1',
  sessionId: 's1',
  turns,
  tools: [],
  profile: {},
};

test('sends the rendered history in JSON mode and parses the reply', async () => {
  const provider = new ScriptedProvider('openai', async () => '{"output": "PLUS covers medical costs up to SGD 500,000.", "actions": []}');
  const client = makeClient(provider);

  const outcome = await client.converse(request);

  assert.deepEqual(outcome, { kind: 'plain_reply', text: 'PLUS covers medical costs up to SGD 500,000.' });
  assert.deepEqual(provider.requests[0]?.messages, [{ role: 'user', content: 'How much coverage for a 10-day Japan trip?' }]);
  assert.equal(provider.requests[0]?.jsonMode, true);
  assert.equal(provider.requests[0]?.metadata?.user_id, 's1');
});

test('reports malformed output', async () => {
  const client = makeClient(new ScriptedProvider('openai', async () => 'Sorry, I am not sure.'));

  const outcome = await client.converse(request);

  assert.equal(outcome.kind, 'malformed_output');
});

test('maps routing exhaustion to unavailable', async () => {
  const client = makeClient(
    new ScriptedProvider('openai', async () => {
      throw new LlmProviderError('openai network request failed: timeout', { provider: 'openai', code: 'timeout' });
    }),
  );

  const outcome = await client.converse(request);

  assert.deepEqual(outcome, { kind: 'unavailable', detail: 'No LLM provider could fulfill the request.' });
});

test('readiness reflects whether any provider has a key', async () => {
  const ready = makeClient(new ScriptedProvider('openai', async () => ''));
  const missing = makeClient(new ScriptedProvider('openai', async () => ''), false);

  assert.deepEqual(await ready.readiness(), { ok: true, detail: 'providers ready: openai' });
  assert.deepEqual(await missing.readiness(), { ok: false, detail: 'no provider has a resolvable API key' });
  assert.deepEqual(await new UnconfiguredReasoningClient().converse(), {
    kind: 'unavailable',
    detail: 'No reasoning provider is configured.',
  });
});
