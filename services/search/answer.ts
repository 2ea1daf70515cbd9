import { roundKm } from "../geo/distance.js";
import { RankingIntent, type SearchResult } from "./types.js";

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export const NO_RESULTS_ANSWER = "No matching hospitals found within the radius.";

/** One-sentence summary of a natural-language search. */
export function buildAnswer({ spec, ranked, summary }: SearchResult): string {
  if (spec.statistic === "average_cost") {
    if (summary.averageCost === null) return "No matching hospitals found to compute an average.";
    return `Average covered charges: ${usd.format(summary.averageCost)} across ${summary.count} hospitals.`;
  }

  const best = ranked[0];
  if (!best) return NO_RESULTS_ANSWER;

  switch (spec.rankingIntent) {
    case RankingIntent.CHEAPEST:
      return best.averageCost === null
        ? `Based on data, ${best.name} is the closest match; no cost is on file.`
        : `Based on data, ${best.name} at ${usd.format(best.averageCost)} average covered charges.`;
    case RankingIntent.BEST_RATED:
      return ranked.map((c) => `${c.name} (rating: ${c.rating ?? "N/A"})`).join("; ");
    case RankingIntent.TOP_N:
    case RankingIntent.DEFAULT:
      return ranked.map((c) => `${c.name} (${roundKm(c.distanceKm).toFixed(1)} km)`).join("; ");
  }
}
