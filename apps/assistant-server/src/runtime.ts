import path from 'node:path';
import { loadClaims, loadPlanCatalog } from '@tripguard/plan-catalog';
import { createDefaultLlmRouter, defaultRoutingPolicy } from './adapters/llm';
import { Utf8DocumentTextExtractor } from './adapters/documents';
import { createFetchHttpFetcher, type HttpFetcher } from './adapters/http';
import { HttpPaymentGateway } from './adapters/payments';
import { PolicyClauseIndex } from './adapters/policyIndex';
import { HttpPolicyIssuer } from './adapters/policyIssuer';
import type { AssistantConfig } from './config';
import type { Logger } from './logging';
import { Orchestrator } from './orchestrator/orchestrator';
import { LlmReasoningClient, UnconfiguredReasoningClient, type ReasoningClient } from './reasoning/client';
import { SessionGate } from './session/gate';
import { FileSessionStore, InMemorySessionStore } from './session/store';
import { ToolExecutor } from './tools/executor';
import { createToolImplementations } from './tools/implementations';
import { FileIdempotencyStore, InMemoryIdempotencyStore } from './tools/ledger';
import { ToolRegistry } from './tools/registry';
import type { ToolServices } from './tools/types';

export interface AssistantRuntime {
  config: AssistantConfig;
  services: ToolServices;
  registry: ToolRegistry;
  reasoning: ReasoningClient;
  orchestrator: Orchestrator;
  logger: Logger;
}

export interface RuntimeOverrides {
  fetcher?: HttpFetcher;
  reasoning?: ReasoningClient;
  services?: Partial<ToolServices>;
  clock?: () => Date;
}

function createReasoningClient(config: AssistantConfig, logger: Logger, fetcher: HttpFetcher): ReasoningClient {
  if (!config.llm.enabled) {
    return new UnconfiguredReasoningClient();
  }

  try {
    const router = createDefaultLlmRouter(logger.child({ component: 'llm.router' }), {
      openaiModel: config.llm.openaiModel,
      claudeModel: config.llm.claudeModel,
      partnerKeys: config.llm.partnerKeys,
      fetcher,
    });
    if (config.llm.missingPartnerKeyEnv.length > 0) {
      logger.warn('assistant.runtime.llm.partner_keys_missing', { keyEnv: config.llm.missingPartnerKeyEnv });
    }
    return new LlmReasoningClient({
      router,
      logger: logger.child({ component: 'reasoning' }),
      routing: defaultRoutingPolicy(config.llm.primary, config.policy.reasoningTimeoutMs),
    });
  } catch (error) {
    logger.warn('assistant.runtime.llm.fallback_to_noop', { error });
    return new UnconfiguredReasoningClient();
  }
}

/** Wires the conversational core from configuration. */
export function createAssistantRuntime(
  config: AssistantConfig,
  logger: Logger,
  overrides: RuntimeOverrides = {},
): AssistantRuntime {
  const clock = overrides.clock ?? (() => new Date());
  const fetcher = overrides.fetcher ?? createFetchHttpFetcher();
  const catalogRoot = { rootDir: config.dataDir };
  const catalog = loadPlanCatalog(catalogRoot);

  const services: ToolServices = {
    catalog,
    claims: loadClaims(catalogRoot).claims,
    // Rebuilds re-read the catalog so edited clauses are picked up.
    policyIndex: new PolicyClauseIndex(() => loadPlanCatalog(catalogRoot)),
    payments: new HttpPaymentGateway({ baseUrl: config.payments.baseUrl, fetcher }),
    issuer: new HttpPolicyIssuer({ baseUrl: config.issuer.baseUrl, apiKey: config.issuer.apiKey, fetcher }),
    documents: new Utf8DocumentTextExtractor(config.uploadDir),
    sessions: config.sessionDir
      ? new FileSessionStore(path.join(config.sessionDir, 'sessions'), clock)
      : new InMemorySessionStore(clock),
    ledger: config.sessionDir
      ? new FileIdempotencyStore(path.join(config.sessionDir, 'ledger'), clock)
      : new InMemoryIdempotencyStore(clock),
    currency: config.currency,
    clock,
    ...overrides.services,
  };

  const registry = new ToolRegistry(createToolImplementations()).seal();
  const reasoning = overrides.reasoning ?? createReasoningClient(config, logger, fetcher);
  const executor = new ToolExecutor({
    services,
    logger: logger.child({ component: 'tools' }),
    defaultTimeoutMs: config.policy.toolTimeoutMs,
    transientRetries: config.policy.readToolRetries,
  });

  const orchestrator = new Orchestrator({
    sessions: services.sessions,
    registry,
    executor,
    reasoning,
    gate: new SessionGate(config.policy.busyPolicy),
    policy: config.policy,
    logger: logger.child({ component: 'orchestrator' }),
    clock,
  });

  logger.info('assistant.runtime.ready', {
    tools: registry.list().map((tool) => tool.name),
    sessionStore: config.sessionDir ? 'file' : 'memory',
    llmEnabled: config.llm.enabled,
  });

  return { config, services, registry, reasoning, orchestrator, logger };
}
