import type { QuerySpecDraft } from "../search/types.js";

export type ExtractionOrigin = "pattern" | "inference";

/**
 * Untrusted extraction output. Keys follow the inference reply format
 * (intent, procedure_code, procedure_text, postal_code, radius, unit, limit,
 * statistic); values are whatever the strategy produced.
 */
export interface RawExtraction {
  fields: Record<string, unknown>;
  origin: ExtractionOrigin;
  /** Diagnostics only; never used for ranking. */
  confidence: number;
}

/** Strategy interface: one entry point, implementations chosen at start-up. */
export interface ParameterExtractor {
  extract(question: string, signal?: AbortSignal): Promise<RawExtraction>;
}

/** Revalidated result handed to the intent guard. */
export interface Extraction {
  draft: QuerySpecDraft;
  origin: ExtractionOrigin;
  confidence: number;
  /** Raw keys that failed revalidation and were dropped. */
  dropped: string[];
}
