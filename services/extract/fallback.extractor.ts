import type { BaseLogger } from "pino";
import type { ParameterExtractor, RawExtraction } from "./types.js";

/**
 * Tries `primary`, and on any failure answers with `fallback` instead.
 * The caller never sees the primary's error; it is logged at warn.
 */
export class FallbackExtractor implements ParameterExtractor {
  constructor(
    private readonly primary: ParameterExtractor,
    private readonly fallback: ParameterExtractor,
    private readonly log: BaseLogger
  ) {}

  async extract(question: string, signal?: AbortSignal): Promise<RawExtraction> {
    try {
      return await this.primary.extract(question, signal);
    } catch (err) {
      this.log.warn(
        { err: err instanceof Error ? { name: err.name, message: err.message } : String(err) },
        "primary extractor failed; using fallback"
      );
      return this.fallback.extract(question, signal);
    }
  }
}
