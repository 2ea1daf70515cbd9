import { haversineKm } from "../../geo/distance.js";
import type { Candidate, CandidateRow, QuerySpec } from "../types.js";

/** Distance stage: exact haversine check; drops rows outside the radius and attaches distanceKm. */
export function distance(spec: QuerySpec, rows: CandidateRow[]): Candidate[] {
  return rows.flatMap((row) => {
    const distanceKm = haversineKm(spec.origin, row);
    return distanceKm <= spec.radiusKm ? [{ ...row, distanceKm }] : [];
  });
}
