/**
 * Deterministic extractor.
 *
 * Grammar (case-insensitive, first match wins):
 * - code:      "drg 470", "ms-drg 470", "drg #470", "drg470", "procedure 470", "code 470"
 * - radius:    "<n> km|kms|kilometer(s)|kilometre(s)|mi|mile(s)"
 * - zip:       first standalone 5-digit number (optionally ZIP+4) not followed by a unit
 * - text:      "for <phrase> (within|near|around|close to|in|at)"
 *              "<superlative> <phrase> (within|near|around|close to|in|at)"
 *              "(get|need|have) <phrase> (within|near|around|close to|in|at)"
 * - ranking:   cheapest words > best-rated words > "top N" / nearest / closest
 * - limit:     "top N", "N cheapest|best|closest|nearest|hospitals|providers|options|results"
 * - statistic: "average", "avg", "mean"
 *
 * No I/O; always terminates.
 */

import type { ParameterExtractor, RawExtraction } from "./types.js";

// ─── Grammar ────────────────────────────────────────────────────────────────

const CODE_RE = /\b(?:ms[-\s]?)?drg\s*#?\s*(\d{1,3})\b|\b(?:procedure|code)\s+#?(\d{1,3})\b/i;
const RADIUS_RE = /\b(\d{1,4}(?:\.\d+)?)\s*(km|kms|kilomet(?:er|re)s?|mi|miles?)\b/i;
const ZIP_RE = /\b(\d{5})(?:-\d{4})?\b(?!\s*(?:km|kms|kilomet|mi\b|miles?\b))/gi;

const ANCHOR = String.raw`\s+(?:within|near|around|close\s+to|in|at)\b`;
const SUPERLATIVE = String.raw`(?:cheapest|least\s+expensive|lowest[-\s](?:cost|priced?)|most\s+affordable|best[-\s]rated|highest[-\s]rated|top[-\s]rated|best|closest|nearest)`;
const TEXT_PATTERNS = [
  new RegExp(String.raw`\bfor\s+(.+?)${ANCHOR}`, "i"),
  new RegExp(String.raw`\b${SUPERLATIVE}\s+(.+?)${ANCHOR}`, "i"),
  new RegExp(String.raw`\b(?:get|need|have)\s+(.+?)${ANCHOR}`, "i"),
];
const GENERIC_WORDS =
  /\b(?:hospitals?|providers?|procedures?|places?|options?|facilit(?:y|ies)|a|an|the|my|me|for|to|of|price[sd]?|costs?|cheapest|best|rated)\b/gi;
const TEXT_CHARSET = /^[a-z0-9][a-z0-9 ,&\/()'.+-]*$/i;

const CHEAPEST_RE =
  /\b(?:cheapest|cheaper|cheap|least\s+expensive|lowest[-\s](?:cost|priced?)|most\s+affordable|best\s+(?:price|deal|value))\b/i;
const BEST_RATED_RE = /\b(?:best[-\s]rated|highest[-\s]rated|top[-\s]rated|highest\s+rating|best)\b/i;
const TOP_N_RE = /\btop\s+(\d{1,2})\b/i;
const NEAREST_RE = /\b(?:nearest|closest)\b/i;
const LIMIT_RE = /\b(\d{1,2})\s+(?:cheapest|best|closest|nearest|hospitals|providers|options|results)\b/i;
const AVERAGE_RE = /\b(?:average|avg|mean)\b/i;

// ─── Helpers ────────────────────────────────────────────────────────────────

function findCode(q: string): string | undefined {
  const m = CODE_RE.exec(q);
  return m?.[1] ?? m?.[2];
}

function findZip(q: string): string | undefined {
  for (const m of q.matchAll(ZIP_RE)) {
    if (m[1]) return m[1];
  }
  return undefined;
}

function cleanPhrase(phrase: string): string | undefined {
  const cleaned = phrase.replace(GENERIC_WORDS, " ").replace(/\s+/g, " ").trim().toLowerCase();
  if (cleaned.length < 2 || /^\d+$/.test(cleaned) || !TEXT_CHARSET.test(cleaned)) return undefined;
  return cleaned;
}

function findText(q: string): string | undefined {
  for (const re of TEXT_PATTERNS) {
    const m = re.exec(q);
    const phrase = m?.[1] ? cleanPhrase(m[1]) : undefined;
    if (phrase) return phrase;
  }
  return undefined;
}

function findIntent(q: string): string | undefined {
  if (CHEAPEST_RE.test(q)) return "cheapest";
  if (BEST_RATED_RE.test(q)) return "best-rated";
  if (TOP_N_RE.test(q) || NEAREST_RE.test(q)) return "top-n";
  return undefined;
}

function findLimit(q: string): number | undefined {
  const m = TOP_N_RE.exec(q) ?? LIMIT_RE.exec(q);
  return m?.[1] ? Number(m[1]) : undefined;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Parse a question with the fixed grammar; absent parts are left out of `fields`. */
export function parseQuestion(question: string): Record<string, unknown> {
  const q = question.trim();
  const fields: Record<string, unknown> = {};

  const code = findCode(q);
  if (code) fields.procedure_code = code;
  else {
    const text = findText(q);
    if (text) fields.procedure_text = text;
  }

  const zip = findZip(q);
  if (zip) fields.postal_code = zip;

  const radius = RADIUS_RE.exec(q);
  if (radius?.[1] && radius[2]) {
    fields.radius = Number(radius[1]);
    fields.unit = radius[2].toLowerCase();
  }

  const intent = findIntent(q);
  if (intent) fields.intent = intent;

  const limit = findLimit(q);
  if (limit !== undefined) fields.limit = limit;

  if (AVERAGE_RE.test(q)) fields.statistic = "average_cost";

  return fields;
}

export class PatternExtractor implements ParameterExtractor {
  async extract(question: string): Promise<RawExtraction> {
    const fields = parseQuestion(question);
    const anchors = ["procedure_code", "procedure_text", "postal_code"].filter((k) => k in fields);
    const found = Math.min(anchors.length, 2);
    return { fields, origin: "pattern", confidence: found / 2 };
  }
}
