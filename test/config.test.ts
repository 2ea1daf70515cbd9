import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../src/config/env.js";

const DATABASE_URL = "postgres://localhost:5432/test";

describe("loadConfig", () => {
  it("applies defaults", () => {
    assert.deepEqual(loadConfig({ DATABASE_URL }), {
      port: 3000,
      host: "0.0.0.0",
      logLevel: "info",
      databaseUrl: DATABASE_URL,
      openai: { apiKey: undefined, model: "gpt-4o-mini" },
      timeouts: { inferenceMs: 2500, requestMs: 8000, storageMs: 5000 },
      geocoderDataPath: undefined,
      candidateHardLimit: 1000,
      fuzzyThreshold: 0.4,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      DATABASE_URL,
      PORT: "8080",
      REQUEST_TIMEOUT_MS: "3000",
      INFERENCE_TIMEOUT_MS: "1000",
      FUZZY_THRESHOLD: "0.25",
    });
    assert.equal(config.port, 8080);
    assert.deepEqual(config.timeouts, { inferenceMs: 1000, requestMs: 3000, storageMs: 5000 });
    assert.equal(config.fuzzyThreshold, 0.25);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ DATABASE_URL, OPENAI_API_KEY: "", LOG_LEVEL: " " });
    assert.equal(config.openai.apiKey, undefined);
    assert.equal(config.logLevel, "info");
  });

  it("keeps an API key", () => {
    assert.equal(loadConfig({ DATABASE_URL, OPENAI_API_KEY: "test-secret" }).openai.apiKey, "test-secret");
  });

  it("requires a database URL", () => {
    assert.throws(() => loadConfig({}), { message: "Invalid configuration: DATABASE_URL: Required" });
  });

  it("requires the inference timeout to fit inside the request timeout", () => {
    assert.throws(() => loadConfig({ DATABASE_URL, INFERENCE_TIMEOUT_MS: "9000" }), {
      message: "Invalid configuration: INFERENCE_TIMEOUT_MS: must be lower than REQUEST_TIMEOUT_MS",
    });
  });

  it("rejects an out-of-range candidate limit", () => {
    assert.throws(() => loadConfig({ DATABASE_URL, CANDIDATE_HARD_LIMIT: "10000" }), /CANDIDATE_HARD_LIMIT/);
  });
});
