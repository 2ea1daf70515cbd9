/**
 * Parameter extraction: strategy selection and the shared revalidation step.
 */

import type { BaseLogger } from "pino";
import type { InferenceClient } from "../llm/openai.client.js";
import { hasDomainSignal } from "./domain-signal.js";
import { FallbackExtractor } from "./fallback.extractor.js";
import { InferenceExtractor } from "./inference.extractor.js";
import { PatternExtractor } from "./pattern.extractor.js";
import { revalidateDraft } from "./revalidate.js";
import type { Extraction, ParameterExtractor } from "./types.js";

export type { Extraction, ParameterExtractor, RawExtraction } from "./types.js";

export interface ExtractorOptions {
  /** Inference collaborator; absent means deterministic extraction only. */
  inference?: InferenceClient;
  inferenceTimeoutMs: number;
  log: BaseLogger;
}

/** Pick the strategy once, at start-up. */
export function createExtractor(options: ExtractorOptions): ParameterExtractor {
  const pattern = new PatternExtractor();
  if (!options.inference) return pattern;
  return new FallbackExtractor(
    new InferenceExtractor(options.inference, options.inferenceTimeoutMs),
    pattern,
    options.log
  );
}

/** Run the configured strategy, then revalidate its output. */
export async function extractDraft(
  extractor: ParameterExtractor,
  question: string,
  signal?: AbortSignal
): Promise<Extraction> {
  const raw = await extractor.extract(question, signal);
  const { draft, dropped } = revalidateDraft(raw.fields);
  return {
    draft: { ...draft, domainSignal: hasDomainSignal(question) },
    origin: raw.origin,
    confidence: raw.confidence,
    dropped,
  };
}
