import Fastify, { type FastifyError } from "fastify";
import { createPool } from "../database/index.js";
import { InvalidInputError, StorageUnavailableError, UnknownLocationError } from "../services/errors.js";
import { createExtractor } from "../services/extract/index.js";
import { createGeocoder, type Geocoder } from "../services/geo/geocoder.js";
import { OpenAiInferenceClient, type InferenceClient } from "../services/llm/openai.client.js";
import { PostgresCandidateSource, resolveCandidateLimit } from "../services/queries/candidate.query.js";
import { createSearchService } from "../services/search/search.service.js";
import type { CandidateSource } from "../services/search/types.js";
import { createDb } from "./config/db.js";
import type { AppConfig } from "./config/env.js";
import { createSearchController } from "./modules/search.controller.js";
import type { ErrorResponse } from "./modules/search.types.js";
import { dbPlugin } from "./plugins/db.plugin.js";

export interface BuildAppOptions {
  config: AppConfig;
  /** Collaborator overrides; anything left out is built from config. */
  overrides?: {
    source?: CandidateSource;
    geocoder?: Geocoder;
    /** null disables inference even when an API key is configured. */
    inference?: InferenceClient | null;
  };
}

function errorBody(kind: ErrorResponse["error"]["kind"], message: string, code?: string): ErrorResponse {
  return { error: { kind, code, message } };
}

export async function buildApp({ config, overrides = {} }: BuildAppOptions) {
  const app = Fastify({
    logger: { level: config.logLevel },
  });

  // ─── Collaborators ─────────────────────────────────────────────────────────

  const geocoder = overrides.geocoder ?? createGeocoder(config.geocoderDataPath);

  let source = overrides.source;
  if (!source) {
    const db = createDb(
      createPool({ connectionString: config.databaseUrl, statementTimeoutMs: config.timeouts.storageMs })
    );
    await app.register(dbPlugin, { db });
    source = new PostgresCandidateSource(
      db,
      { hardLimit: resolveCandidateLimit(config.candidateHardLimit), fuzzyThreshold: config.fuzzyThreshold },
      app.log.child({ module: "candidate-query" })
    );
  }

  const inference =
    overrides.inference !== undefined
      ? overrides.inference ?? undefined
      : config.openai.apiKey
        ? new OpenAiInferenceClient({
            apiKey: config.openai.apiKey,
            model: config.openai.model,
            timeoutMs: config.timeouts.inferenceMs,
          })
        : undefined;

  const extractor = createExtractor({
    inference,
    inferenceTimeoutMs: config.timeouts.inferenceMs,
    log: app.log.child({ module: "extract" }),
  });

  const service = createSearchService({
    geocoder,
    source,
    extractor,
    log: app.log.child({ module: "search" }),
    timeouts: { requestMs: config.timeouts.requestMs, storageMs: config.timeouts.storageMs },
  });
  const controller = createSearchController(service);

  // ─── Errors ────────────────────────────────────────────────────────────────

  app.setErrorHandler(function (err: FastifyError, request, reply) {
    if (err instanceof InvalidInputError) {
      return reply.status(400).send(errorBody("invalid_input", err.message, err.code));
    }
    if (err instanceof UnknownLocationError) {
      return reply.status(422).send(errorBody("unknown_location", err.message, err.code));
    }
    if (err instanceof StorageUnavailableError) {
      request.log.error({ err }, "storage unavailable");
      const body = errorBody("storage_unavailable", "Provider search is temporarily unavailable", err.code);
      return reply.status(503).send({ error: { ...body.error, retryable: err.retryable } });
    }
    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send(errorBody("bad_request", err.message, err.code));
    }
    request.log.error({ err }, "unhandled error");
    return reply.status(500).send(errorBody("internal", "Internal Server Error"));
  });

  // ─── Routes ────────────────────────────────────────────────────────────────

  app.get("/health", function (_, reply) {
    reply.send({ status: "ok" });
  });

  app.get("/providers", controller.providers);
  app.post("/ask", controller.ask);

  return app;
}

export type App = Awaited<ReturnType<typeof buildApp>>;
