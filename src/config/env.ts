import "dotenv/config";
import { z } from "zod";

/** Blank values in .env count as unset. */
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());

const millis = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z
  .object({
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65_535).default(3000)),
    HOST: z.preprocess(blankToUndefined, z.string().default("0.0.0.0")),
    LOG_LEVEL: z.preprocess(
      blankToUndefined,
      z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
    ),
    DATABASE_URL: z.string().url(),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
    INFERENCE_TIMEOUT_MS: millis(2_500),
    REQUEST_TIMEOUT_MS: millis(8_000),
    STORAGE_TIMEOUT_MS: millis(5_000),
    GEOCODER_DATA_PATH: optionalString,
    CANDIDATE_HARD_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(5_000).default(1_000)),
    FUZZY_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().gt(0).max(1).default(0.4)),
  })
  .refine((e) => e.INFERENCE_TIMEOUT_MS < e.REQUEST_TIMEOUT_MS, {
    message: "must be lower than REQUEST_TIMEOUT_MS",
    path: ["INFERENCE_TIMEOUT_MS"],
  });

export interface AppConfig {
  port: number;
  host: string;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  databaseUrl: string;
  openai: { apiKey?: string; model: string };
  timeouts: { inferenceMs: number; requestMs: number; storageMs: number };
  /** Custom ZIP table; the bundled US dataset when unset. */
  geocoderDataPath?: string;
  candidateHardLimit: number;
  fuzzyThreshold: number;
}

/** Read and validate configuration; throws listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const errorMessages = parsed.error.issues
      .map((e) => `${e.path.length ? e.path.join(".") : "value"}: ${e.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${errorMessages}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL,
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    timeouts: {
      inferenceMs: e.INFERENCE_TIMEOUT_MS,
      requestMs: e.REQUEST_TIMEOUT_MS,
      storageMs: e.STORAGE_TIMEOUT_MS,
    },
    geocoderDataPath: e.GEOCODER_DATA_PATH,
    candidateHardLimit: e.CANDIDATE_HARD_LIMIT,
    fuzzyThreshold: e.FUZZY_THRESHOLD,
  };
}
