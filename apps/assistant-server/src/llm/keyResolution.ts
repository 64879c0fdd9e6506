import type {
  KeyResolutionRequest,
  KeyResolutionService,
  LlmKeyScope,
  LlmProviderId,
  ResolvedApiKey,
} from './types';

export interface ScopedKeyRecord {
  provider: LlmProviderId;
  scope: LlmKeyScope;
  /** Partner id for `partner` keys. */
  scopeId?: string;
  key: string;
  keyId?: string;
}

const ENV_KEYS: Record<LlmProviderId, string> = {
  openai: 'TRIPGUARD_OPENAI_API_KEY',
  claude: 'TRIPGUARD_ANTHROPIC_API_KEY',
};

function requestScopeId(request: KeyResolutionRequest, scope: LlmKeyScope): string | undefined {
  return scope === 'partner' ? request.partnerId : undefined;
}

export class CompositeKeyResolutionService implements KeyResolutionService {
  constructor(private readonly delegates: KeyResolutionService[]) {}

  async resolveKey(request: KeyResolutionRequest): Promise<ResolvedApiKey | null> {
    for (const delegate of this.delegates) {
      const resolved = await delegate.resolveKey(request);
      if (resolved) {
        return resolved;
      }
    }
    return null;
  }
}

export class InMemoryKeyResolutionService implements KeyResolutionService {
  constructor(private readonly records: ScopedKeyRecord[]) {}

  async resolveKey(request: KeyResolutionRequest): Promise<ResolvedApiKey | null> {
    for (const scope of request.scopes) {
      const scopeId = requestScopeId(request, scope);
      if (scope === 'partner' && scopeId === undefined) {
        continue;
      }
      const record = this.records.find(
        (candidate) => candidate.provider === request.provider && candidate.scope === scope && candidate.scopeId === scopeId,
      );

      if (record) {
        return {
          provider: record.provider,
          scope: record.scope,
          key: record.key,
          keyId: record.keyId,
          source: 'memory',
        };
      }
    }

    return null;
  }
}

/** Deployment-wide keys from `TRIPGUARD_OPENAI_API_KEY` / `TRIPGUARD_ANTHROPIC_API_KEY`. */
export class EnvironmentKeyResolutionService implements KeyResolutionService {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolveKey(request: KeyResolutionRequest): Promise<ResolvedApiKey | null> {
    if (!request.scopes.includes('deployment')) {
      return null;
    }

    const envKey = ENV_KEYS[request.provider];
    const key = this.env[envKey];
    if (!key) {
      return null;
    }

    return {
      provider: request.provider,
      scope: 'deployment',
      key,
      source: 'env',
      keyId: `${envKey.toLowerCase()}:present`,
    };
  }
}
