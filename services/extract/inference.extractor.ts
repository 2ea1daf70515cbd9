import { CollaboratorUnavailableError } from "../errors.js";
import type { InferenceClient } from "../llm/openai.client.js";
import { withTimeout } from "../shared/timeout.js";
import type { ParameterExtractor, RawExtraction } from "./types.js";

const DEFAULT_CONFIDENCE = 0.8;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Strip an optional ```json fence and parse; the reply must be one JSON object. */
export function parseReply(text: string): Record<string, unknown> {
  const raw = text.trim();
  const fence = /^```(?:json)?\s*([\s\S]*?)```$/i.exec(raw);
  const body = fence?.[1]?.trim() ?? raw;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new CollaboratorUnavailableError("Inference reply is not valid JSON", { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new CollaboratorUnavailableError("Inference reply is not a JSON object");
  }
  return parsed;
}

/**
 * Delegates extraction to the inference collaborator. Any failure surfaces as
 * CollaboratorUnavailableError; the reply itself is returned unvalidated.
 */
export class InferenceExtractor implements ParameterExtractor {
  constructor(
    private readonly client: InferenceClient,
    private readonly timeoutMs: number
  ) {}

  async extract(question: string, signal?: AbortSignal): Promise<RawExtraction> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const reply = await withTimeout(
        this.client.complete(question, controller.signal),
        this.timeoutMs,
        "inference",
        { signal, onTimeout: () => controller.abort() }
      );
      const fields = parseReply(reply);
      const confidence =
        typeof fields.confidence === "number" && fields.confidence >= 0 && fields.confidence <= 1
          ? fields.confidence
          : DEFAULT_CONFIDENCE;
      return { fields, origin: "inference", confidence };
    } catch (err) {
      if (err instanceof CollaboratorUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new CollaboratorUnavailableError(`Inference call failed: ${reason}`, { cause: err });
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
