import { candidate, type CandidateStageOptions } from "./stages/candidate.stage.js";
import { distance } from "./stages/distance.stage.js";
import type { Candidate, CandidateSource, QuerySpec } from "./types.js";

/**
 * Search planner: coarse index filter (procedure ∩ bounding box) followed by
 * the exact haversine filter. Every returned candidate lies within
 * spec.radiusKm, whatever the coarse filter let through.
 */
export async function planSearch(
  spec: QuerySpec,
  source: CandidateSource,
  options: CandidateStageOptions
): Promise<Candidate[]> {
  const rows = await candidate(spec, source, options);
  return distance(spec, rows);
}
