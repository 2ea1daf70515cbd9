import { RankingIntent, type Candidate, type CostSummary } from "../types.js";

type Comparator = (a: Candidate, b: Candidate) => number;

// Missing values sort after present ones in both directions.
function ascNullsLast(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

function descNullsLast(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const byCost: Comparator = (a, b) => ascNullsLast(a.averageCost, b.averageCost);
const byDistance: Comparator = (a, b) => a.distanceKm - b.distanceKm;
const byRating: Comparator = (a, b) => descNullsLast(a.rating, b.rating);
const byProvider: Comparator = (a, b) => byText(a.providerId, b.providerId);
const byProcedure: Comparator = (a, b) => byText(a.procedureText, b.procedureText);

function chain(...comparators: Comparator[]): Comparator {
  return (a, b) => {
    for (const cmp of comparators) {
      const d = cmp(a, b);
      if (d !== 0) return d;
    }
    return 0;
  };
}

const ORDERINGS: Record<RankingIntent, Comparator> = {
  [RankingIntent.CHEAPEST]: chain(byCost, byDistance, byProvider, byProcedure),
  [RankingIntent.BEST_RATED]: chain(byRating, byCost, byDistance, byProvider, byProcedure),
  [RankingIntent.TOP_N]: chain(byDistance, byCost, byProvider, byProcedure),
  [RankingIntent.DEFAULT]: chain(byDistance, byCost, byProvider, byProcedure),
};

/**
 * Ranking stage: total order per intent, then one row per provider (its
 * best-ranked offering), then the limit. The limit never applies before sorting.
 */
export function rank(candidates: readonly Candidate[], intent: RankingIntent, limit: number): Candidate[] {
  const sorted = [...candidates].sort(ORDERINGS[intent]);
  const seen = new Set<string>();
  const ranked: Candidate[] = [];
  for (const c of sorted) {
    if (seen.has(c.providerId)) continue;
    seen.add(c.providerId);
    ranked.push(c);
    if (ranked.length >= limit) break;
  }
  return ranked;
}

/** Average covered charges over every in-radius candidate that has one. */
export function summarize(candidates: readonly Candidate[]): CostSummary {
  const costs = candidates.flatMap((c) => (c.averageCost === null ? [] : [c.averageCost]));
  if (costs.length === 0) return { count: 0, averageCost: null };
  const total = costs.reduce((sum, v) => sum + v, 0);
  return { count: costs.length, averageCost: total / costs.length };
}
