import type { RankingIntent, Statistic } from "../../services/search/types.js";

export interface ProviderResult {
  provider_id: string;
  name: string;
  city: string | null;
  state: string | null;
  postal_code: string | null;
  procedure_text: string;
  average_cost: number | null;
  average_total_payments: number | null;
  average_medicare_payments: number | null;
  total_discharges: number | null;
  rating: number | null;
  /** Rounded to one decimal place. */
  distance_km: number;
}

/** Normalized query echoed back with natural-language answers. */
export interface ResolvedQuery {
  procedure_code: string | null;
  procedure_text: string | null;
  postal_code: string;
  radius_km: number;
  ranking: RankingIntent;
  limit: number;
  statistic: Statistic | null;
}

export interface CostSummaryResult {
  count: number;
  average_cost: number | null;
}

export type AskResponse =
  | {
      in_scope: true;
      answer: string;
      query: ResolvedQuery;
      results: ProviderResult[];
      summary: CostSummaryResult;
    }
  | { in_scope: false; message: string };

export interface ErrorResponse {
  error: {
    kind: "invalid_input" | "unknown_location" | "storage_unavailable" | "bad_request" | "internal";
    code?: string;
    message: string;
    retryable?: boolean;
  };
}
