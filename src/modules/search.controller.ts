import type { FastifyReply, FastifyRequest } from "fastify";
import { roundKm } from "../../services/geo/distance.js";
import type { SearchService } from "../../services/search/search.service.js";
import type { Candidate, QuerySpec, SearchResult } from "../../services/search/types.js";
import type { AskResponse, ProviderResult, ResolvedQuery } from "./search.types.js";
import { parseAskBody, parseProviderQuery } from "./search.validator.js";

// ─── Mapping ────────────────────────────────────────────────────────────────

export function toProviderResult(c: Candidate): ProviderResult {
  return {
    provider_id: c.providerId,
    name: c.name,
    city: c.city,
    state: c.state,
    postal_code: c.postalCode,
    procedure_text: c.procedureText,
    average_cost: c.averageCost,
    average_total_payments: c.averageTotalPayments,
    average_medicare_payments: c.averageMedicarePayments,
    total_discharges: c.totalDischarges,
    rating: c.rating,
    distance_km: roundKm(c.distanceKm),
  };
}

function toResolvedQuery(spec: QuerySpec): ResolvedQuery {
  return {
    procedure_code: spec.procedure.kind === "code" ? spec.procedure.code : null,
    procedure_text: spec.procedure.kind === "text" ? spec.procedure.text : null,
    postal_code: spec.origin.postalCode,
    radius_km: roundKm(spec.radiusKm),
    ranking: spec.rankingIntent,
    limit: spec.limit,
    statistic: spec.statistic,
  };
}

function toAskResults(result: SearchResult, answer: string): AskResponse {
  return {
    in_scope: true,
    answer,
    query: toResolvedQuery(result.spec),
    results: result.ranked.map(toProviderResult),
    summary: { count: result.summary.count, average_cost: result.summary.averageCost },
  };
}

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

// ─── Handlers ───────────────────────────────────────────────────────────────

export function createSearchController(service: SearchService) {
  return {
    async providers(request: FastifyRequest, reply: FastifyReply): Promise<ProviderResult[]> {
      const draft = parseProviderQuery(request.query);
      const result = await service.searchProviders(draft, disconnectSignal(reply));
      return result.ranked.map(toProviderResult);
    },

    async ask(request: FastifyRequest, reply: FastifyReply): Promise<AskResponse> {
      const question = parseAskBody(request.body);
      const outcome = await service.ask(question, disconnectSignal(reply));
      if (!outcome.inScope) {
        return { in_scope: false, message: outcome.message };
      }
      return toAskResults(outcome.result, outcome.answer);
    },
  };
}
