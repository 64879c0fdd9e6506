import { readFileSync } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

export const tierSchema = z.enum(['silver', 'gold', 'platinum']);
export type PlanTier = z.infer<typeof tierSchema>;

export const tripTypeSchema = z.enum(['single', 'round']);
export type TripType = z.infer<typeof tripTypeSchema>;

export const policyClauseSchema = z.object({
  clauseId: z.string().min(1),
  section: z.string().min(1),
  text: z.string().min(1),
  tags: z.array(z.string().min(1)).default([]),
});

export type PolicyClause = z.infer<typeof policyClauseSchema>;

export const planSchema = z.object({
  planCode: z.string().regex(/^[A-Z0-9_]+$/),
  tier: tierSchema,
  name: z.string().min(1),
  dailyPremiumMinor: z.number().int().positive(),
  maxTripDays: z.number().int().positive().default(180),
  coverage: z.object({
    medicalMinor: z.number().int().nonnegative(),
    cancellationMinor: z.number().int().nonnegative(),
    baggageMinor: z.number().int().nonnegative(),
  }),
  clauses: z.array(policyClauseSchema).default([]),
});

export type Plan = z.infer<typeof planSchema>;

export const plansFileSchema = z.object({
  version: z.number().int().positive().default(1),
  currency: z.string().regex(/^[a-z]{3}$/).default('sgd'),
  plans: z.array(planSchema).min(1),
});

export type PlansFile = z.infer<typeof plansFileSchema>;

export const seasonSchema = z.enum(['spring', 'summer', 'autumn', 'winter']);
export type Season = z.infer<typeof seasonSchema>;

export const claimRecordSchema = z.object({
  destination: z.string().min(1),
  activity: z.string().min(1),
  season: seasonSchema,
  claimAmount: z.number().nonnegative(),
  plan: tierSchema,
  ageBand: z.string().min(1),
});

export type ClaimRecord = z.infer<typeof claimRecordSchema>;

export const claimsFileSchema = z.object({
  version: z.number().int().positive().default(1),
  claims: z.array(claimRecordSchema),
});

export type ClaimsFile = z.infer<typeof claimsFileSchema>;

export interface LoadCatalogOptions {
  rootDir?: string;
}

export class CatalogSchemaError extends Error {
  constructor(public readonly filePath: string, message: string) {
    super(`Invalid catalog schema in ${filePath}: ${message}`);
    this.name = 'CatalogSchemaError';
  }
}

export class CatalogIoError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to read catalog file ${filePath}`);
    this.name = 'CatalogIoError';
    this.cause = cause;
  }

  declare cause: unknown;
}

export function catalogFile(rootDir: string, fileName: string): string {
  return path.join(rootDir, 'catalog', fileName);
}

export function parsePlansYaml(rawYaml: string, filePath = 'catalog/plans.yaml'): PlansFile {
  const parsed: unknown = YAML.parse(rawYaml);
  const result = plansFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogSchemaError(filePath, result.error.message);
  }

  const seen = new Set<string>();
  for (const plan of result.data.plans) {
    if (seen.has(plan.planCode)) {
      throw new CatalogSchemaError(filePath, `duplicate planCode ${plan.planCode}`);
    }
    seen.add(plan.planCode);
  }

  return result.data;
}

export function parseClaimsYaml(rawYaml: string, filePath = 'catalog/claims.yaml'): ClaimsFile {
  const parsed: unknown = YAML.parse(rawYaml);
  const result = claimsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogSchemaError(filePath, result.error.message);
  }
  return result.data;
}

function readCatalogFile(rootDir: string, fileName: string): { filePath: string; rawYaml: string } {
  const filePath = catalogFile(rootDir, fileName);
  try {
    return { filePath, rawYaml: readFileSync(filePath, 'utf8') };
  } catch (error) {
    throw new CatalogIoError(filePath, error);
  }
}

export function loadPlanCatalog(options: LoadCatalogOptions = {}): PlansFile {
  const { filePath, rawYaml } = readCatalogFile(options.rootDir ?? process.cwd(), 'plans.yaml');
  return parsePlansYaml(rawYaml, filePath);
}

export function loadClaims(options: LoadCatalogOptions = {}): ClaimsFile {
  const { filePath, rawYaml } = readCatalogFile(options.rootDir ?? process.cwd(), 'claims.yaml');
  return parseClaimsYaml(rawYaml, filePath);
}

export function findPlan(catalog: PlansFile, planCode: string): Plan | undefined {
  const normalized = planCode.trim().toUpperCase();
  return catalog.plans.find((plan) => plan.planCode === normalized);
}

export function planForTier(catalog: PlansFile, tier: PlanTier): Plan | undefined {
  return catalog.plans.find((plan) => plan.tier === tier);
}

/**
 * Premium for a trip of `days` days in minor currency units. Trips longer than
 * the plan's `maxTripDays` are not quotable and return `null`.
 */
export function quotePremiumMinor(plan: Plan, days: number): number | null {
  if (!Number.isInteger(days) || days < 1 || days > plan.maxTripDays) {
    return null;
  }
  return plan.dailyPremiumMinor * days;
}

const DAY_MS = 86_400_000;

/** Days covered by a trip, counting both the departure and the return day. */
export function tripDays(startDate: string, endDate: string): number | null {
  const start = Date.parse(`${startDate}T00:00:00Z`);
  const end = Date.parse(`${endDate}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end) || end < start) {
    return null;
  }
  return Math.round((end - start) / DAY_MS) + 1;
}

export interface CatalogClause extends PolicyClause {
  planCode: string;
  planName: string;
}

export function listClauses(catalog: PlansFile): CatalogClause[] {
  return catalog.plans.flatMap((plan) =>
    plan.clauses.map((clause) => ({ ...clause, planCode: plan.planCode, planName: plan.name })),
  );
}
