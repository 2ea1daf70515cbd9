import type { Geocoder } from "../geo/geocoder.js";
import { buildQuerySpec } from "./query-spec.js";
import type { QuerySpec, QuerySpecDraft } from "./types.js";

export const OUT_OF_SCOPE_MESSAGE =
  "I can only help with hospital pricing and quality information. " +
  "Please ask about medical procedures, costs, or hospital ratings near a ZIP code.";

export type Classification =
  | { inScope: true; spec: QuerySpec }
  | { inScope: false; message: string };

/**
 * Decide whether a draft is a hospital price/quality question at all.
 *
 * A draft with both a procedure and a postal code is in scope whatever its
 * wording. With neither it is out of scope. With only one of the two it needs
 * a DRG code or domain wording to count; buildQuerySpec then throws for the
 * missing half (or for an unknown postal code).
 */
export function classify(draft: QuerySpecDraft, geocoder: Geocoder): Classification {
  const anchored = draft.procedure !== undefined && draft.postalCode !== undefined;
  if (!anchored) {
    const hasCode = draft.procedure?.kind === "code";
    if ((!draft.procedure && !draft.postalCode) || (!hasCode && !draft.domainSignal)) {
      return { inScope: false, message: OUT_OF_SCOPE_MESSAGE };
    }
  }
  return { inScope: true, spec: buildQuerySpec(draft, geocoder) };
}
