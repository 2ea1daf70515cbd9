/**
 * Search Service — Table of contents
 *
 * Structured search:  draft → QuerySpec → plan (coarse + exact) → rank
 * Natural language:   question → extract → revalidate → intent guard
 *                     → plan → rank → answer
 *
 * Each call runs under its own deadline signal, combined with the caller's
 * signal (client disconnect). Nothing is shared between requests except the
 * read-only dependencies.
 */

import type { BaseLogger } from "pino";
import { extractDraft, type ParameterExtractor } from "../extract/index.js";
import type { Geocoder } from "../geo/geocoder.js";
import { deadlineSignal } from "../shared/timeout.js";
import { buildAnswer } from "./answer.js";
import { classify } from "./intent.guard.js";
import { buildQuerySpec } from "./query-spec.js";
import { planSearch } from "./search.plan.js";
import type { AskResult, CandidateSource, QuerySpec, QuerySpecDraft, SearchResult } from "./types.js";

// ─── Stages (table of contents) ─────────────────────────────────────────────

import { rank, summarize } from "./stages/ranking.stage.js";

// ─── Dependencies ───────────────────────────────────────────────────────────

export interface SearchDeps {
  geocoder: Geocoder;
  source: CandidateSource;
  extractor: ParameterExtractor;
  log: BaseLogger;
  timeouts: {
    /** Whole-request budget. */
    requestMs: number;
    /** Single storage query. */
    storageMs: number;
  };
}

export interface SearchService {
  searchProviders(draft: QuerySpecDraft, signal?: AbortSignal): Promise<SearchResult>;
  ask(question: string, signal?: AbortSignal): Promise<AskResult>;
}

// ─── Public API ─────────────────────────────────────────────────────────────

export function createSearchService(deps: SearchDeps): SearchService {
  const { geocoder, source, extractor, log, timeouts } = deps;

  async function run(spec: QuerySpec, signal: AbortSignal): Promise<SearchResult> {
    // 1. Plan: coarse filter, then exact distance
    const candidates = await planSearch(spec, source, { timeoutMs: timeouts.storageMs, signal });

    // 2. Ranking: full candidate set first, limit last
    const ranked = rank(candidates, spec.rankingIntent, spec.limit);

    log.info(
      {
        procedure: spec.procedure.kind,
        radiusKm: spec.radiusKm,
        intent: spec.rankingIntent,
        candidates: candidates.length,
        returned: ranked.length,
      },
      "search complete"
    );
    return { spec, ranked, summary: summarize(candidates) };
  }

  return {
    async searchProviders(draft, signal) {
      const spec = buildQuerySpec(draft, geocoder);
      return run(spec, deadlineSignal(timeouts.requestMs, signal));
    },

    async ask(question, signal) {
      const requestSignal = deadlineSignal(timeouts.requestMs, signal);

      // 1. Extract: inference or grammar, always revalidated
      const extraction = await extractDraft(extractor, question, requestSignal);
      log.info(
        { origin: extraction.origin, confidence: extraction.confidence, dropped: extraction.dropped },
        "question extracted"
      );

      // 2. Intent guard
      const classification = classify(extraction.draft, geocoder);
      if (!classification.inScope) {
        return { inScope: false, message: classification.message };
      }

      // 3. Plan + rank
      const result = await run(classification.spec, requestSignal);
      return { inScope: true, result, answer: buildAnswer(result) };
    },
  };
}
