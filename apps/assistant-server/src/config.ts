import { readFileSync } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { ConfigError } from './errors';
import type { ScopedKeyRecord } from './llm';
import type { LogLevel } from './logging';
import { isNotFound } from './session/store';

export const orchestrationPolicySchema = z
  .object({
    toolCallBudget: z.number().int().min(1).max(20).default(6),
    reasoningAttempts: z.number().int().min(1).max(5).default(2),
    malformedRetries: z.number().int().min(0).max(3).default(1),
    readToolRetries: z.number().int().min(0).max(3).default(1),
    maxConversationTurns: z.number().int().min(1).default(200),
    reasoningTimeoutMs: z.number().int().positive().default(20_000),
    toolTimeoutMs: z.number().int().positive().default(15_000),
    busyPolicy: z.enum(['queue', 'reject']).default('queue'),
  })
  .strict();

export type OrchestrationPolicy = z.infer<typeof orchestrationPolicySchema>;

/**
 * Partner-scoped LLM keys. The file names the environment variable holding
 * each key; the key itself never lives in the file.
 */
const partnerKeysFileSchema = z
  .object({
    partners: z
      .array(
        z
          .object({
            partnerId: z.string().trim().min(1),
            provider: z.enum(['openai', 'claude']),
            keyEnv: z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'expected an environment variable name'),
            keyId: z.string().trim().min(1).optional(),
          })
          .strict(),
      )
      .default([]),
  })
  .strict();

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8787),
  TRIPGUARD_LOG_LEVEL: logLevelSchema.default('info'),
  TRIPGUARD_DATA_DIR: z.string().min(1).optional(),
  TRIPGUARD_SESSION_DIR: z.string().min(1).optional(),
  TRIPGUARD_UPLOAD_DIR: z.string().min(1).optional(),
  TRIPGUARD_ENABLE_LLM_ROUTER: z.enum(['0', '1']).default('0'),
  TRIPGUARD_LLM_PRIMARY: z.enum(['openai', 'claude']).default('openai'),
  TRIPGUARD_OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  TRIPGUARD_CLAUDE_MODEL: z.string().min(1).default('claude-3-5-sonnet-latest'),
  TRIPGUARD_PAYMENTS_BASE_URL: z.string().url().default('http://localhost:8086'),
  TRIPGUARD_POLICY_ISSUER_URL: z.string().url().default('http://localhost:8087'),
  TRIPGUARD_POLICY_ISSUER_API_KEY: z.string().min(1).optional(),
  TRIPGUARD_CURRENCY: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'expected a three-letter currency code')
    .transform((value) => value.toLowerCase())
    .default('sgd'),
  TRIPGUARD_TOOL_CALL_BUDGET: z.coerce.number().int().optional(),
  TRIPGUARD_BUSY_POLICY: z.enum(['queue', 'reject']).optional(),
});

export interface AssistantConfig {
  port: number;
  logLevel: LogLevel;
  /** Root holding `catalog/plans.yaml` and `catalog/claims.yaml`. */
  dataDir: string;
  /** File-backed session and ledger storage; in-memory when absent. */
  sessionDir?: string;
  uploadDir: string;
  currency: string;
  policy: OrchestrationPolicy;
  llm: {
    enabled: boolean;
    primary: 'openai' | 'claude';
    openaiModel: string;
    claudeModel: string;
    partnerKeys: ScopedKeyRecord[];
    /** Key variables named in the partner keys file but unset in the environment. */
    missingPartnerKeyEnv: string[];
  };
  payments: { baseUrl: string };
  issuer: { baseUrl: string; apiKey?: string };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  rootDir?: string;
  /** Defaults to `config/assistant.yaml` under `rootDir`. */
  policyFile?: string;
  /** Defaults to `config/partner-keys.yaml` under `rootDir`. */
  partnerKeysFile?: string;
}

function issueList(error: ZodError, prefix: string): string[] {
  return error.issues.map((issue) => `${[prefix, ...issue.path].join('.')}: ${issue.message}`);
}

function readYamlFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read ${filePath}`, [error instanceof Error ? error.message : String(error)]);
  }

  try {
    return YAML.parse(raw) ?? {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}`, [error instanceof Error ? error.message : String(error)]);
  }
}

export function loadConfig(options: LoadConfigOptions = {}): AssistantConfig {
  const env = options.env ?? process.env;
  const rootDir = path.resolve(options.rootDir ?? process.cwd());
  const policyFile = options.policyFile ?? path.join(rootDir, 'config', 'assistant.yaml');
  const partnerKeysFile = options.partnerKeysFile ?? path.join(rootDir, 'config', 'partner-keys.yaml');

  const parsedEnv = envSchema.safeParse(env);
  const rawPolicy = readYamlFile(policyFile);
  const policyFromFile = orchestrationPolicySchema.safeParse(rawPolicy);
  const partnerKeysFromFile = partnerKeysFileSchema.safeParse(readYamlFile(partnerKeysFile));

  const issues = [
    ...(parsedEnv.success ? [] : issueList(parsedEnv.error, 'env')),
    ...(policyFromFile.success ? [] : issueList(policyFromFile.error, path.basename(policyFile))),
    ...(partnerKeysFromFile.success ? [] : issueList(partnerKeysFromFile.error, path.basename(partnerKeysFile))),
  ];
  if (!parsedEnv.success || !policyFromFile.success || !partnerKeysFromFile.success) {
    throw new ConfigError('Invalid assistant configuration', issues);
  }

  const values = parsedEnv.data;
  const merged = orchestrationPolicySchema.safeParse({
    ...policyFromFile.data,
    ...(values.TRIPGUARD_TOOL_CALL_BUDGET === undefined ? {} : { toolCallBudget: values.TRIPGUARD_TOOL_CALL_BUDGET }),
    ...(values.TRIPGUARD_BUSY_POLICY === undefined ? {} : { busyPolicy: values.TRIPGUARD_BUSY_POLICY }),
  });
  if (!merged.success) {
    throw new ConfigError('Invalid assistant configuration', issueList(merged.error, 'env'));
  }

  const partnerKeys: ScopedKeyRecord[] = [];
  const missingPartnerKeyEnv: string[] = [];
  for (const entry of partnerKeysFromFile.data.partners) {
    const key = env[entry.keyEnv];
    if (!key) {
      missingPartnerKeyEnv.push(entry.keyEnv);
      continue;
    }
    partnerKeys.push({
      provider: entry.provider,
      scope: 'partner',
      scopeId: entry.partnerId,
      key,
      keyId: entry.keyId ?? `${entry.partnerId}:${entry.provider}`,
    });
  }

  return {
    port: values.PORT,
    logLevel: values.TRIPGUARD_LOG_LEVEL,
    dataDir: path.resolve(rootDir, values.TRIPGUARD_DATA_DIR ?? '.'),
    sessionDir: values.TRIPGUARD_SESSION_DIR ? path.resolve(rootDir, values.TRIPGUARD_SESSION_DIR) : undefined,
    uploadDir: path.resolve(rootDir, values.TRIPGUARD_UPLOAD_DIR ?? 'uploads'),
    currency: values.TRIPGUARD_CURRENCY,
    policy: merged.data,
    llm: {
      enabled: values.TRIPGUARD_ENABLE_LLM_ROUTER === '1',
      primary: values.TRIPGUARD_LLM_PRIMARY,
      openaiModel: values.TRIPGUARD_OPENAI_MODEL,
      claudeModel: values.TRIPGUARD_CLAUDE_MODEL,
      partnerKeys,
      missingPartnerKeyEnv,
    },
    payments: { baseUrl: values.TRIPGUARD_PAYMENTS_BASE_URL },
    issuer: { baseUrl: values.TRIPGUARD_POLICY_ISSUER_URL, apiKey: values.TRIPGUARD_POLICY_ISSUER_API_KEY },
  };
}
