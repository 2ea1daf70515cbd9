import { z } from "zod";
import { InvalidInputCode, InvalidInputError } from "../../services/errors.js";
import { ProcedureCodeField, ProcedureTextField } from "../../services/extract/revalidate.js";
import { RANKING_INTENTS, type ProcedureMatch, type QuerySpecDraft, type RankingIntent } from "../../services/search/types.js";

const QUESTION_MAX_LENGTH = 500;

/** `?radius_km=` with no value counts as absent, not as 0. */
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

/**
 * Procedure parameter: a DRG code ("470", "drg 470") or a description
 * fragment. Same field rules as the extraction revalidation pass.
 */
const procedureSchema = z
  .string()
  .trim()
  .min(1)
  .max(120)
  .transform((value, ctx): ProcedureMatch => {
    const code = ProcedureCodeField.safeParse(value);
    if (code.success) return { kind: "code", code: code.data };
    const text = ProcedureTextField.safeParse(value);
    if (text.success) return { kind: "text", text: text.data };
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be a DRG code or a procedure description of letters, digits and basic punctuation",
    });
    return z.NEVER;
  });

const rankingSchema = z
  .string()
  .refine((v): v is RankingIntent => RANKING_INTENTS.some((r) => r === v), {
    message: `must be one of ${RANKING_INTENTS.join(", ")}`,
  });

export const ProviderQuerySchema = z.object({
  procedure: procedureSchema,
  postal_code: z.string().trim().regex(/^\d{5}(?:-\d{4})?$/, "must be a 5-digit ZIP code"),
  radius_km: z.preprocess(blankToUndefined, z.coerce.number().finite().optional()),
  ranking: z.preprocess(blankToUndefined, rankingSchema.optional()),
  limit: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
});

export const AskBodySchema = z.object({
  question: z.string().trim().min(3).max(QUESTION_MAX_LENGTH),
});

export type ProviderQuery = z.infer<typeof ProviderQuerySchema>;

// ─── Error mapping ──────────────────────────────────────────────────────────

const FIELD_CODES: Record<string, InvalidInputCode> = {
  procedure: InvalidInputCode.INVALID_PROCEDURE,
  postal_code: InvalidInputCode.INVALID_POSTAL_CODE,
  radius_km: InvalidInputCode.INVALID_RADIUS,
  ranking: InvalidInputCode.INVALID_RANKING,
  limit: InvalidInputCode.INVALID_LIMIT,
  question: InvalidInputCode.INVALID_QUESTION,
};

function toInvalidInput(error: z.ZodError, label: string, fallback: InvalidInputCode): InvalidInputError {
  const first = error.issues[0]?.path[0];
  const code = (typeof first === "string" && FIELD_CODES[first]) || fallback;
  const errorMessages = error.issues
    .map((e) => {
      const path = e.path.length ? e.path.join(".") : "value";
      return `${path}: ${e.message}`;
    })
    .join("; ");
  return new InvalidInputError(code, `Invalid ${label}: ${errorMessages}`);
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Validate GET /providers query parameters into a draft; throws InvalidInputError. */
export function parseProviderQuery(raw: unknown): QuerySpecDraft {
  const query = ProviderQuerySchema.safeParse(raw ?? {});
  if (!query.success) {
    throw toInvalidInput(query.error, "query parameters", InvalidInputCode.INVALID_PROCEDURE);
  }
  const { procedure, postal_code, radius_km, ranking, limit } = query.data;
  return {
    procedure,
    postalCode: postal_code.slice(0, 5),
    radiusKm: radius_km,
    rankingIntent: ranking,
    limit,
    domainSignal: true,
  };
}

/** Validate the POST /ask body; throws InvalidInputError. */
export function parseAskBody(raw: unknown): string {
  const body = AskBodySchema.safeParse(raw ?? {});
  if (!body.success) {
    throw toInvalidInput(body.error, "request body", InvalidInputCode.INVALID_QUESTION);
  }
  return body.data.question;
}
