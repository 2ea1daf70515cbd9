import { StorageUnavailableError } from "../../errors.js";
import { boundingBox } from "../../geo/distance.js";
import { AbortedError, withTimeout } from "../../shared/timeout.js";
import type { CandidateRow, CandidateSource, CoarseFilter, QuerySpec } from "../types.js";

export interface CandidateStageOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Coarse filter for a spec: procedure match within the bounding box and radius, ranked by intent. */
export function coarseFilter(spec: QuerySpec): CoarseFilter {
  return {
    procedure: spec.procedure,
    origin: { lat: spec.origin.lat, lon: spec.origin.lon },
    box: boundingBox(spec.origin, spec.radiusKm),
    radiusKm: spec.radiusKm,
    rankingIntent: spec.rankingIntent,
  };
}

/**
 * Candidate stage: one storage call, bounded by timeoutMs and the request
 * signal. The source's own signal aborts on either, so the query is
 * abandoned, not just ignored. Any failure becomes StorageUnavailableError;
 * no retry here.
 */
export async function candidate(
  spec: QuerySpec,
  source: CandidateSource,
  options: CandidateStageOptions
): Promise<CandidateRow[]> {
  const { timeoutMs, signal } = options;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    if (signal?.aborted) throw new AbortedError("candidate query");
    return await withTimeout(source.findCandidates(coarseFilter(spec), controller.signal), timeoutMs, "candidate query", {
      signal,
      onTimeout: () => controller.abort(),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StorageUnavailableError(`Provider search is unavailable: ${reason}`, { cause: err });
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
}
