/**
 * Candidate query: coarse filter against the providers/procedures/ratings read models.
 *
 * Applies:
 * - Procedure match: DRG code equality on the definition's leading token, or
 *   for text an escaped ILIKE substring OR pg_trgm word_similarity >= threshold
 * - Bounding box on latitude/longitude (longitude skipped when the box wraps),
 *   then the haversine radius
 * - One row per provider (DISTINCT ON), its best offering under the ranking intent
 * - Hard limit, applied after ordering by the same intent keys as the ranker
 *
 * Every value goes through Kysely as a bound parameter; only column
 * references and fixed SQL appear in the statement text.
 *
 * Indexes assumed:
 *   CREATE EXTENSION pg_trgm;
 *   CREATE INDEX idx_procedures_drg_trgm ON procedures USING GIN (ms_drg_definition gin_trgm_ops);
 *   CREATE INDEX idx_providers_lat_lon ON providers (latitude, longitude);
 */

import { performance } from "node:perf_hooks";
import { sql, type Expression, type Kysely, type RawBuilder } from "kysely";
import type { BaseLogger } from "pino";
import type { Database } from "../../src/config/db.js";
import { EARTH_RADIUS_KM } from "../geo/distance.js";
import { AbortedError } from "../shared/timeout.js";
import { RankingIntent, type CandidateRow, type CandidateSource, type CoarseFilter, type GeoPoint } from "../search/types.js";

// ─── Hard limits ────────────────────────────────────────────────────────────

/** Maximum candidate rows returned per search. Prevents unbounded result sets. */
export const CANDIDATE_HARD_LIMIT = 1_000;

/** Ceiling for a configured override. */
export const CANDIDATE_HARD_LIMIT_MAX = 5_000;

export const DEFAULT_FUZZY_THRESHOLD = 0.4;

export function resolveCandidateLimit(requested?: number): number {
  if (typeof requested === "number" && Number.isFinite(requested) && requested > 0) {
    return Math.min(Math.floor(requested), CANDIDATE_HARD_LIMIT_MAX);
  }
  return CANDIDATE_HARD_LIMIT;
}

export interface CandidateQueryOptions {
  hardLimit: number;
  fuzzyThreshold: number;
}

// ─── Query builder ──────────────────────────────────────────────────────────

/** Escape LIKE wildcards so the fragment matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Great-circle distance from `origin` to the provider row, in km. */
function distanceKmSql(origin: GeoPoint): RawBuilder<number> {
  const lat = sql.ref("p.latitude");
  const lon = sql.ref("p.longitude");
  return sql<number>`${sql.lit(2 * EARTH_RADIUS_KM)} * asin(sqrt(
    power(sin(radians(${lat} - ${origin.lat}) / 2), 2)
    + cos(radians(${origin.lat})) * cos(radians(${lat})) * power(sin(radians(${lon} - ${origin.lon}) / 2), 2)
  ))`;
}

interface OrderKeys {
  cost: Expression<unknown>;
  rating: Expression<unknown>;
  distance: Expression<unknown>;
}

/** Same leading keys as the ranking stage, missing values last. */
function intentOrder(intent: RankingIntent, k: OrderKeys): RawBuilder<unknown>[] {
  const cost = sql`${k.cost} asc nulls last`;
  const distance = sql`${k.distance} asc`;
  switch (intent) {
    case RankingIntent.CHEAPEST:
      return [cost, distance];
    case RankingIntent.BEST_RATED:
      return [sql`${k.rating} desc nulls last`, cost, distance];
    case RankingIntent.TOP_N:
    case RankingIntent.DEFAULT:
      return [distance, cost];
  }
}

export function buildCandidateQuery(
  db: Kysely<Database>,
  filter: CoarseFilter,
  options: CandidateQueryOptions
) {
  const { procedure, origin, box, radiusKm, rankingIntent } = filter;
  const distanceKm = distanceKmSql(origin);

  let inner = db
    .selectFrom("providers as p")
    .innerJoin("procedures as pr", "pr.provider_id", "p.provider_id")
    .leftJoin("ratings as r", "r.provider_id", "p.provider_id")
    .distinctOn("p.provider_id")
    .select([
      "p.provider_id",
      "p.name",
      "p.city",
      "p.state",
      "p.zip_code",
      "p.latitude",
      "p.longitude",
      "pr.ms_drg_definition",
      "pr.total_discharges",
      "pr.average_covered_charges",
      "pr.average_total_payments",
      "pr.average_medicare_payments",
      "r.rating",
    ])
    .select(distanceKm.as("distance_km"))
    .where("p.latitude", "is not", null)
    .where("p.longitude", "is not", null)
    .where("p.latitude", ">=", box.minLat)
    .where("p.latitude", "<=", box.maxLat);

  // --- Longitude (open when the box wraps) ---
  if (box.minLon !== null && box.maxLon !== null) {
    inner = inner.where("p.longitude", ">=", box.minLon).where("p.longitude", "<=", box.maxLon);
  }

  // --- Procedure ---
  if (procedure.kind === "code") {
    inner = inner.where(
      sql<string>`split_part(${sql.ref("pr.ms_drg_definition")}, ' ', 1)`,
      "=",
      procedure.code
    );
  } else {
    const text = procedure.text;
    inner = inner.where((eb) =>
      eb.or([
        eb("pr.ms_drg_definition", "ilike", `%${escapeLike(text)}%`),
        eb(sql<number>`word_similarity(${text}, ${sql.ref("pr.ms_drg_definition")})`, ">=", options.fuzzyThreshold),
      ])
    );
  }

  // --- Radius ---
  inner = inner.where(distanceKm, "<=", radiusKm);

  // --- One row per provider: its best offering under the intent ---
  inner = inner.orderBy("p.provider_id");
  for (const key of intentOrder(rankingIntent, {
    cost: sql.ref("pr.average_covered_charges"),
    rating: sql.ref("r.rating"),
    distance: distanceKm,
  })) {
    inner = inner.orderBy(key);
  }
  inner = inner.orderBy("pr.ms_drg_definition");

  // --- Rank order, then the cap ---
  let outer = db.selectFrom(inner.as("c")).selectAll();
  for (const key of intentOrder(rankingIntent, {
    cost: sql.ref("c.average_covered_charges"),
    rating: sql.ref("c.rating"),
    distance: sql.ref("c.distance_km"),
  })) {
    outer = outer.orderBy(key);
  }
  return outer.orderBy("c.provider_id").orderBy("c.ms_drg_definition").limit(options.hardLimit);
}

// ─── Row mapping ─────────────────────────────────────────────────────────────

interface CandidateDbRow {
  provider_id: string;
  name: string;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  latitude: number | null;
  longitude: number | null;
  ms_drg_definition: string;
  total_discharges: number | null;
  average_covered_charges: string | null;
  average_total_payments: string | null;
  average_medicare_payments: string | null;
  rating: number | null;
}

function toNumber(value: string | number | null): number | null {
  if (value === null) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function mapRowToCandidate(r: CandidateDbRow): CandidateRow[] {
  if (r.latitude === null || r.longitude === null) return [];
  return [
    {
      providerId: String(r.provider_id),
      name: r.name,
      city: r.city,
      state: r.state,
      postalCode: r.zip_code,
      lat: r.latitude,
      lon: r.longitude,
      procedureText: r.ms_drg_definition,
      totalDischarges: r.total_discharges,
      averageCost: toNumber(r.average_covered_charges),
      averageTotalPayments: toNumber(r.average_total_payments),
      averageMedicarePayments: toNumber(r.average_medicare_payments),
      rating: r.rating,
    },
  ];
}

// ─── Public API ─────────────────────────────────────────────────────────────

async function backendPid(db: Kysely<Database>): Promise<number | null> {
  const { rows } = await sql<{ pid: number }>`select pg_backend_pid() as pid`.execute(db);
  return rows[0]?.pid ?? null;
}

/** Storage collaborator backed by PostgreSQL through Kysely. */
export class PostgresCandidateSource implements CandidateSource {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly options: CandidateQueryOptions,
    private readonly log: BaseLogger
  ) {}

  async findCandidates(filter: CoarseFilter, signal?: AbortSignal): Promise<CandidateRow[]> {
    if (signal?.aborted) throw new AbortedError("candidate query");

    const t0 = performance.now();
    const rows = signal
      ? await this.executeCancellable(filter, signal)
      : await buildCandidateQuery(this.db, filter, this.options).execute();
    this.log.debug(
      { rows: rows.length, ms: Math.round(performance.now() - t0), procedure: filter.procedure.kind },
      "candidate query"
    );
    if (rows.length >= this.options.hardLimit) {
      this.log.warn(
        { hardLimit: this.options.hardLimit, intent: filter.rankingIntent },
        "candidate cap reached; lower-ranked providers left out"
      );
    }
    return rows.flatMap(mapRowToCandidate);
  }

  /**
   * Run on a reserved connection so an abort can cancel the statement on the
   * server (pg_cancel_backend from another pooled connection).
   */
  private executeCancellable(filter: CoarseFilter, signal: AbortSignal) {
    return this.db.connection().execute(async (conn) => {
      const pid = await backendPid(conn);
      const onAbort = () => this.cancel(pid);
      signal.addEventListener("abort", onAbort, { once: true });
      try {
        if (signal.aborted) throw new AbortedError("candidate query");
        return await buildCandidateQuery(conn, filter, this.options).execute();
      } finally {
        signal.removeEventListener("abort", onAbort);
      }
    });
  }

  private cancel(pid: number | null): void {
    if (pid === null) return;
    void sql`select pg_cancel_backend(${pid})`.execute(this.db).then(
      () => this.log.debug({ pid }, "candidate query cancelled"),
      (err: unknown) => this.log.warn({ err, pid }, "candidate query cancel failed")
    );
  }
}
