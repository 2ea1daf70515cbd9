import OpenAI from "openai";

/** NL inference collaborator: question in, raw model text out. */
export interface InferenceClient {
  complete(question: string, signal: AbortSignal): Promise<string>;
}

export const EXTRACTION_PROMPT = [
  "You extract search parameters from questions about hospital prices and ratings.",
  "Reply with exactly one JSON object with these keys:",
  'intent: one of "cheapest", "best_rated", "top_n", "default";',
  "procedure_code: the MS-DRG code digits as a string, or null;",
  "procedure_text: a short procedure description when no code is given, or null;",
  "postal_code: a 5-digit US ZIP code as a string, or null;",
  "radius: a number, or null;",
  'unit: "km" or "mi" for the radius, or null;',
  "limit: how many hospitals were asked for, or null;",
  'statistic: "average_cost" when the question asks for an average, otherwise null.',
  "Use null for anything the question does not state. Never invent a ZIP code.",
].join("\n");

export interface OpenAiInferenceOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAiInferenceClient implements InferenceClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiInferenceOptions) {
    // Retries are left to the fallback path; one attempt within the timeout.
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
    this.model = options.model;
  }

  async complete(question: string, signal: AbortSignal): Promise<string> {
    const resp = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: EXTRACTION_PROMPT },
          { role: "user", content: `Question: ${question}` },
        ],
      },
      { signal }
    );
    return resp.choices[0]?.message.content ?? "";
  }
}
