/**
 * Run one search against the configured database. Run with: npm run check:search
 *
 * 1. Builds the Postgres-backed candidate source from .env
 * 2. Runs a structured search (DRG 470 near 10001, 40 km) and logs the top rows
 * 3. Closes the pool on exit
 */

import { pino } from "pino";
import { createPool } from "../database/index.js";
import { PatternExtractor } from "../services/extract/pattern.extractor.js";
import { createGeocoder } from "../services/geo/geocoder.js";
import { PostgresCandidateSource, resolveCandidateLimit } from "../services/queries/candidate.query.js";
import { createSearchService } from "../services/search/search.service.js";
import { createDb } from "../src/config/db.js";
import { loadConfig } from "../src/config/env.js";

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

async function main() {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });
  const db = createDb(createPool({ connectionString: config.databaseUrl, statementTimeoutMs: config.timeouts.storageMs }));

  const service = createSearchService({
    geocoder: createGeocoder(config.geocoderDataPath),
    source: new PostgresCandidateSource(
      db,
      { hardLimit: resolveCandidateLimit(config.candidateHardLimit), fuzzyThreshold: config.fuzzyThreshold },
      log
    ),
    extractor: new PatternExtractor(),
    log,
    timeouts: { requestMs: config.timeouts.requestMs, storageMs: config.timeouts.storageMs },
  });

  const t0 = performance.now();
  try {
    const result = await service.searchProviders({
      procedure: { kind: "code", code: "470" },
      postalCode: "10001",
      radiusKm: 40,
      domainSignal: true,
    });
    console.log(`✓ ${result.ranked.length} providers (${elapsed(performance.now() - t0)})`);
    const sample = result.ranked.slice(0, 3).map((c) => ({
      id: c.providerId,
      name: c.name,
      cost: c.averageCost,
      distanceKm: c.distanceKm.toFixed(1),
    }));
    console.log("  Sample:", JSON.stringify(sample, null, 2));
  } finally {
    await db.destroy();
  }
}

main().then(() => process.exit(0)).catch((e) => {
  console.error(e);
  process.exit(1);
});
