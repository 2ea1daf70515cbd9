// ─── Vocabulary ──────────────────────────────────────────────────────────────

export const RankingIntent = {
  CHEAPEST: "cheapest",
  BEST_RATED: "best-rated",
  TOP_N: "top-n",
  DEFAULT: "default",
} as const;

export type RankingIntent = (typeof RankingIntent)[keyof typeof RankingIntent];

export const RANKING_INTENTS: readonly RankingIntent[] = Object.values(RankingIntent);

/** Aggregate the caller asked for on top of the ranked list. */
export type Statistic = "average_cost";

// ─── Geo ─────────────────────────────────────────────────────────────────────

export interface GeoPoint {
  lat: number;
  lon: number;
}

/** A geocoded postal code; the search center of a QuerySpec. */
export interface Origin extends GeoPoint {
  postalCode: string;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  /** Null when the box wraps a pole or the antimeridian: no longitude filter. */
  minLon: number | null;
  maxLon: number | null;
}

// ─── Procedure match ─────────────────────────────────────────────────────────
/**
 * Either an exact DRG code (three digits, zero padded) or a text fragment
 * matched approximately against procedure definitions.
 */
export type ProcedureMatch =
  | { kind: "code"; code: string }
  | { kind: "text"; text: string };

// ─── QuerySpecDraft ──────────────────────────────────────────────────────────
/**
 * Output of extraction and validation. Every field is optional; whatever is
 * present has already passed its own check. `domainSignal` says whether the
 * request is about hospital price or quality at all.
 */
export interface QuerySpecDraft {
  procedure?: ProcedureMatch;
  postalCode?: string;
  radiusKm?: number;
  rankingIntent?: RankingIntent;
  limit?: number;
  statistic?: Statistic;
  domainSignal: boolean;
}

// ─── QuerySpec ───────────────────────────────────────────────────────────────
/**
 * Validated query, frozen once built and used by the planner and ranker.
 * - radiusKm: clamped to [MIN_RADIUS_KM, MAX_RADIUS_KM]
 * - limit: clamped to [MIN_LIMIT, MAX_LIMIT]
 */
export interface QuerySpec {
  readonly procedure: ProcedureMatch;
  readonly origin: Readonly<Origin>;
  readonly radiusKm: number;
  readonly rankingIntent: RankingIntent;
  readonly limit: number;
  readonly statistic: Statistic | null;
}

// ─── Candidates ──────────────────────────────────────────────────────────────
/** One provider × procedure offering returned by the coarse filter. */
export interface CandidateRow {
  providerId: string;
  name: string;
  city: string | null;
  state: string | null;
  postalCode: string | null;
  lat: number;
  lon: number;
  procedureText: string;
  totalDischarges: number | null;
  averageCost: number | null;
  averageTotalPayments: number | null;
  averageMedicarePayments: number | null;
  rating: number | null;
}

/** Candidate that survived the exact radius check. distanceKm is unrounded. */
export interface Candidate extends CandidateRow {
  distanceKm: number;
}

/** Everything the storage collaborator needs for the coarse filter. */
export interface CoarseFilter {
  procedure: ProcedureMatch;
  origin: GeoPoint;
  box: BoundingBox;
  radiusKm: number;
  /** Order rows the way the ranker will, so a row cap keeps the best ones. */
  rankingIntent: RankingIntent;
}

/**
 * Read-only storage collaborator.
 *
 * Returns rows matching the procedure inside the box and radius, at most one
 * per provider (its best offering under `rankingIntent`), best first.
 * Implementations must pass every filter value as a bound parameter and
 * abandon the query once `signal` aborts.
 */
export interface CandidateSource {
  findCandidates(filter: CoarseFilter, signal?: AbortSignal): Promise<CandidateRow[]>;
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface CostSummary {
  count: number;
  averageCost: number | null;
}

export interface SearchResult {
  spec: QuerySpec;
  ranked: Candidate[];
  summary: CostSummary;
}

export type AskResult =
  | { inScope: true; result: SearchResult; answer: string }
  | { inScope: false; message: string };
