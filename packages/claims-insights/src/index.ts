import {
  planForTier,
  type ClaimRecord,
  type PlanTier,
  type PlansFile,
  type Season,
} from '@tripguard/plan-catalog';

export interface ClaimFilters {
  destination?: string;
  activity?: string;
}

export interface ClaimSummary {
  claimCount: number;
  averageClaim: number;
  p90Claim: number;
  maxClaim: number;
}

export interface SeasonalityEntry {
  season: Season;
  count: number;
  mean: number;
}

export type RiskSummary =
  | {
      filters: ClaimFilters;
      summary: ClaimSummary;
      seasonality: SeasonalityEntry[];
      topActivities: Record<string, number>;
    }
  | {
      filters: ClaimFilters;
      summary: null;
      message: string;
    };

export interface PlanRecommendationInput extends ClaimFilters {
  tripCost?: number;
}

export interface PlanRecommendation {
  filters: ClaimFilters;
  summary: ClaimSummary | null;
  seasonality: SeasonalityEntry[];
  recommendation: PlanTier;
  planCode: string | null;
  reason: string;
}

const PLATINUM_P90_THRESHOLD = 50_000;
const GOLD_AVERAGE_THRESHOLD = 20_000;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Linear-interpolated quantile over an unsorted sample; `q` in [0, 1]. */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

function matches(field: string, needle: string | undefined): boolean {
  if (!needle) {
    return true;
  }
  return field.toLowerCase().includes(needle.trim().toLowerCase());
}

function activeFilters(filters: ClaimFilters): ClaimFilters {
  const active: ClaimFilters = {};
  if (filters.destination) {
    active.destination = filters.destination;
  }
  if (filters.activity) {
    active.activity = filters.activity;
  }
  return active;
}

export function filterClaims(claims: ClaimRecord[], filters: ClaimFilters): ClaimRecord[] {
  return claims.filter(
    (claim) => matches(claim.destination, filters.destination) && matches(claim.activity, filters.activity),
  );
}

export function summarizeClaimRisk(claims: ClaimRecord[], filters: ClaimFilters = {}): RiskSummary {
  const subset = filterClaims(claims, filters);
  const appliedFilters = activeFilters(filters);

  if (subset.length === 0) {
    return {
      filters: appliedFilters,
      summary: null,
      message: 'No claims data available for the specified filters.',
    };
  }

  const amounts = subset.map((claim) => claim.claimAmount);

  const bySeason = new Map<Season, number[]>();
  const byActivity = new Map<string, number[]>();
  for (const claim of subset) {
    bySeason.set(claim.season, [...(bySeason.get(claim.season) ?? []), claim.claimAmount]);
    byActivity.set(claim.activity, [...(byActivity.get(claim.activity) ?? []), claim.claimAmount]);
  }

  const seasonality = [...bySeason.entries()]
    .map(([season, values]) => ({ season, count: values.length, mean: round2(mean(values)) }))
    .sort((a, b) => b.count - a.count || a.season.localeCompare(b.season))
    .slice(0, 3);

  const topActivities = Object.fromEntries(
    [...byActivity.entries()]
      .map(([activity, values]) => [activity, round2(mean(values))] as const)
      .sort((a, b) => b[1] - a[1])
      .slice(0, 5),
  );

  return {
    filters: appliedFilters,
    summary: {
      claimCount: subset.length,
      averageClaim: round2(mean(amounts)),
      p90Claim: round2(quantile(amounts, 0.9)),
      maxClaim: round2(Math.max(...amounts)),
    },
    seasonality,
    topActivities,
  };
}

export function recommendPlan(
  claims: ClaimRecord[],
  catalog: PlansFile,
  input: PlanRecommendationInput = {},
): PlanRecommendation {
  const risk = summarizeClaimRisk(claims, input);

  if (risk.summary === null) {
    return {
      filters: risk.filters,
      summary: null,
      seasonality: [],
      recommendation: 'silver',
      planCode: planForTier(catalog, 'silver')?.planCode ?? null,
      reason: 'Default recommendation due to limited data.',
    };
  }

  const { averageClaim, p90Claim } = risk.summary;
  let tier: PlanTier;
  let reason: string;

  if (p90Claim > PLATINUM_P90_THRESHOLD) {
    tier = 'platinum';
    reason = 'High 90th percentile claim amount; recommend premium medical coverage';
  } else if (averageClaim > GOLD_AVERAGE_THRESHOLD) {
    tier = 'gold';
    reason = 'Elevated average claim cost; gold tier balances value and protection';
  } else {
    tier = 'silver';
    reason = 'Moderate claim history; silver tier suffices for most travellers';
  }

  if (input.tripCost !== undefined && input.tripCost > p90Claim) {
    reason += ' and upgrade trip cancellation coverage to match trip cost.';
  }

  return {
    filters: risk.filters,
    summary: risk.summary,
    seasonality: risk.seasonality,
    recommendation: tier,
    planCode: planForTier(catalog, tier)?.planCode ?? null,
    reason,
  };
}
