import type { Logger } from '../logging';
import {
  ClaudeLlmProvider,
  CompositeKeyResolutionService,
  EnvironmentKeyResolutionService,
  InMemoryKeyResolutionService,
  LlmRouter,
  OpenAiLlmProvider,
  type KeyResolutionService,
  type LlmProviderId,
  type LlmRoutingPolicy,
  type ScopedKeyRecord,
} from '../llm';
import type { HttpFetcher } from './http';

export interface DefaultLlmRouterOptions {
  openaiModel?: string;
  claudeModel?: string;
  keyResolution?: KeyResolutionService;
  /** Partner-scoped keys, consulted before the deployment keys from the environment. */
  partnerKeys?: ScopedKeyRecord[];
  env?: NodeJS.ProcessEnv;
  fetcher?: HttpFetcher;
}

export function createDefaultLlmRouter(logger: Logger, options: DefaultLlmRouterOptions = {}): LlmRouter {
  const resolver =
    options.keyResolution ??
    new CompositeKeyResolutionService([
      new InMemoryKeyResolutionService(options.partnerKeys ?? []),
      new EnvironmentKeyResolutionService(options.env),
    ]);

  return new LlmRouter({
    logger,
    keyResolution: resolver,
    providers: [
      new OpenAiLlmProvider({ model: options.openaiModel, fetcher: options.fetcher }),
      new ClaudeLlmProvider({ model: options.claudeModel, fetcher: options.fetcher }),
    ],
  });
}

export function defaultRoutingPolicy(primary: LlmProviderId, timeoutMs: number): LlmRoutingPolicy {
  const fallback: LlmProviderId = primary === 'openai' ? 'claude' : 'openai';
  return {
    primary,
    fallbackOrder: [fallback],
    timeoutMs,
    keyScopes: ['partner', 'deployment'],
  };
}
