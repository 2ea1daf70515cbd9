/**
 * Revalidation pass shared by every extraction strategy.
 *
 * Each raw field is checked on its own; a field that fails is dropped and
 * recorded in `dropped`, never repaired from free text. The only free text
 * that survives is a procedure fragment restricted to a closed character set,
 * and it only ever reaches storage as a bound parameter.
 */

import { z } from "zod";
import { RankingIntent, type QuerySpecDraft, type Statistic } from "../search/types.js";

export const KM_PER_MILE = 1.609344;

const PROCEDURE_TEXT_MAX = 120;

const INTENT_ALIASES: Record<string, RankingIntent> = {
  cheapest: RankingIntent.CHEAPEST,
  "lowest-cost": RankingIntent.CHEAPEST,
  "best-rated": RankingIntent.BEST_RATED,
  best: RankingIntent.BEST_RATED,
  "highest-rated": RankingIntent.BEST_RATED,
  "top-rated": RankingIntent.BEST_RATED,
  "top-n": RankingIntent.TOP_N,
  top: RankingIntent.TOP_N,
  nearest: RankingIntent.TOP_N,
  closest: RankingIntent.TOP_N,
  default: RankingIntent.DEFAULT,
};

const UNIT_ALIASES: Record<string, "km" | "mi"> = {
  km: "km",
  kms: "km",
  kilometer: "km",
  kilometers: "km",
  kilometre: "km",
  kilometres: "km",
  mi: "mi",
  mile: "mi",
  miles: "mi",
};

// ─── Field schemas ──────────────────────────────────────────────────────────

const slug = z
  .string()
  .trim()
  .toLowerCase()
  .transform((s) => s.replace(/[\s_]+/g, "-"));

const numeric = z
  .union([z.number(), z.string().trim().regex(/^\d+(?:\.\d+)?$/).transform(Number)])
  .pipe(z.number().finite());

export const ProcedureCodeField = z
  .union([z.number().int().nonnegative().transform(String), z.string()])
  .transform((s) => s.trim())
  .pipe(z.string().regex(/^(?:(?:ms-?)?drg\s*)?(\d{1,3})$/i))
  .transform((s) => s.replace(/\D/g, "").padStart(3, "0"));

export const ProcedureTextField = z
  .string()
  .transform((s) => s.replace(/\s+/g, " ").trim())
  .pipe(
    z
      .string()
      .min(2)
      .max(PROCEDURE_TEXT_MAX)
      .regex(/^[a-z0-9][a-z0-9 ,&\/()'.+-]*$/i)
      .refine((s) => /[a-z]/i.test(s), "procedure text needs a letter")
  );

const PostalCodeField = z
  .union([
    z.number().int().min(1).max(99_999).transform((n) => String(n).padStart(5, "0")),
    z.string().trim(),
  ])
  .pipe(z.string().regex(/^\d{5}(?:-\d{4})?$/))
  .transform((s) => s.slice(0, 5));

const IntentField = slug.pipe(z.string().refine((s) => s in INTENT_ALIASES || s === "average-cost"));
const UnitField = slug.pipe(z.string().refine((s) => s in UNIT_ALIASES));
const StatisticField = slug.pipe(z.enum(["average-cost", "average"]));

// ─── Public API ─────────────────────────────────────────────────────────────

export interface Revalidated {
  draft: Omit<QuerySpecDraft, "domainSignal">;
  dropped: string[];
}

/** Re-check every raw field against the same constraints, whichever strategy produced it. */
export function revalidateDraft(fields: Record<string, unknown>): Revalidated {
  const draft: Omit<QuerySpecDraft, "domainSignal"> = {};
  const dropped: string[] = [];

  const check = <T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined => {
    const value = fields[key];
    if (value === undefined || value === null) return undefined;
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      dropped.push(key);
      return undefined;
    }
    return parsed.data;
  };

  const code = check("procedure_code", ProcedureCodeField);
  const text = check("procedure_text", ProcedureTextField);
  if (code) draft.procedure = { kind: "code", code };
  else if (text) draft.procedure = { kind: "text", text };

  const postalCode = check("postal_code", PostalCodeField);
  if (postalCode) draft.postalCode = postalCode;

  const radius = check("radius", numeric);
  const unitKey = check("unit", UnitField);
  // A unit that was given but not understood makes the radius unusable.
  const unit = unitKey ? UNIT_ALIASES[unitKey] : fields.unit == null ? "km" : undefined;
  if (radius !== undefined && unit) {
    draft.radiusKm = unit === "mi" ? radius * KM_PER_MILE : radius;
  } else if (radius !== undefined) {
    dropped.push("radius");
  }

  let statistic: Statistic | undefined =
    check("statistic", StatisticField) !== undefined ? "average_cost" : undefined;

  const intentKey = check("intent", IntentField);
  if (intentKey === "average-cost") statistic = "average_cost";
  else if (intentKey) draft.rankingIntent = INTENT_ALIASES[intentKey];

  if (statistic) draft.statistic = statistic;

  const limit = check("limit", numeric);
  if (limit !== undefined) draft.limit = limit;

  return { draft, dropped };
}
