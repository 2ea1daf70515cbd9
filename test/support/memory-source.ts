import { haversineKm } from "../../services/geo/distance.js";
import { rank } from "../../services/search/stages/ranking.stage.js";
import type { CandidateRow, CandidateSource, CoarseFilter } from "../../services/search/types.js";

/**
 * In-process stand-in for the storage collaborator: same contract
 * (procedure ∩ box ∩ radius, one row per provider in ranking order, capped),
 * plain array scan instead of SQL.
 */
export class MemoryCandidateSource implements CandidateSource {
  readonly calls: CoarseFilter[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  failWith: Error | null = null;
  /** Never resolves when true; for timeout tests. */
  hang = false;

  constructor(
    private readonly rows: CandidateRow[],
    private readonly hardLimit = 1_000
  ) {}

  async findCandidates(filter: CoarseFilter, signal?: AbortSignal): Promise<CandidateRow[]> {
    this.calls.push(filter);
    this.signals.push(signal);
    if (this.failWith) throw this.failWith;
    if (this.hang) return new Promise<CandidateRow[]>(() => {});

    const { procedure, box, origin, radiusKm, rankingIntent } = filter;
    const matched = this.rows.flatMap((r) => {
      if (r.lat < box.minLat || r.lat > box.maxLat) return [];
      if (box.minLon !== null && r.lon < box.minLon) return [];
      if (box.maxLon !== null && r.lon > box.maxLon) return [];
      const hit =
        procedure.kind === "code"
          ? r.procedureText.split(" ")[0] === procedure.code
          : r.procedureText.toLowerCase().includes(procedure.text.toLowerCase());
      const distanceKm = haversineKm(origin, r);
      return hit && distanceKm <= radiusKm ? [{ ...r, distanceKm }] : [];
    });
    return rank(matched, rankingIntent, this.hardLimit).map(({ distanceKm: _, ...row }) => row);
  }
}
