import type { Geocoder } from "../geo/geocoder.js";
import { InvalidInputCode, InvalidInputError, UnknownLocationError } from "../errors.js";
import { RankingIntent, type ProcedureMatch, type QuerySpec, type QuerySpecDraft } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_RADIUS_KM = 40;
export const MIN_RADIUS_KM = 1;
export const MAX_RADIUS_KM = 500;
export const DEFAULT_LIMIT = 10;
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 50;

// ─── Helpers ───────────────────────────────────────────────────────────────

/** Clamp into [min, max]; default when missing or not finite. */
function clampNumber(value: number | undefined, defaultVal: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return defaultVal;
  return Math.min(max, Math.max(min, value));
}

function freezeProcedure(match: ProcedureMatch): ProcedureMatch {
  return Object.freeze({ ...match });
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Promote a draft to an immutable QuerySpec.
 * - radius: default 40 km, clamped to [1, 500] (0 or negative become 1)
 * - limit: default 10, floored and clamped to [1, 50]
 * - ranking: cheapest unless the request named one
 * - origin: geocoded postal code; unknown codes throw UnknownLocationError
 */
export function buildQuerySpec(draft: QuerySpecDraft, geocoder: Geocoder): QuerySpec {
  if (!draft.procedure) {
    throw new InvalidInputError(
      InvalidInputCode.MISSING_PROCEDURE,
      "Name a procedure (DRG code or description) to search for"
    );
  }
  if (!draft.postalCode) {
    throw new InvalidInputError(
      InvalidInputCode.MISSING_POSTAL_CODE,
      "Please include a 5-digit ZIP code"
    );
  }

  const point = geocoder.resolve(draft.postalCode);
  if (!point) {
    throw new UnknownLocationError(draft.postalCode);
  }

  const spec: QuerySpec = {
    procedure: freezeProcedure(draft.procedure),
    origin: Object.freeze({ postalCode: draft.postalCode, lat: point.lat, lon: point.lon }),
    radiusKm: clampNumber(draft.radiusKm, DEFAULT_RADIUS_KM, MIN_RADIUS_KM, MAX_RADIUS_KM),
    rankingIntent: draft.rankingIntent ?? RankingIntent.CHEAPEST,
    limit: Math.floor(clampNumber(draft.limit, DEFAULT_LIMIT, MIN_LIMIT, MAX_LIMIT)),
    statistic: draft.statistic ?? null,
  };

  return Object.freeze(spec);
}
