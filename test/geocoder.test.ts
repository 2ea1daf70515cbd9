import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BundledZipGeocoder, createGeocoder, normalizeZip, ZipGeocoder } from "../services/geo/geocoder.js";
import type { GeoPoint } from "../services/search/types.js";

function writeTable(entries: unknown): string {
  const path = join(mkdtempSync(join(tmpdir(), "geocoder-")), "zips.json");
  writeFileSync(path, JSON.stringify(entries));
  return path;
}

function assertNear(actual: GeoPoint | null, lat: number, lon: number) {
  assert.ok(actual, "expected a centroid");
  assert.ok(Math.abs(actual.lat - lat) < 0.1, `lat ${actual.lat} not near ${lat}`);
  assert.ok(Math.abs(actual.lon - lon) < 0.1, `lon ${actual.lon} not near ${lon}`);
}

describe("normalizeZip", () => {
  it("keeps a 5-digit code", () => {
    assert.equal(normalizeZip("10001"), "10001");
  });

  it("reduces ZIP+4 to its first five digits", () => {
    assert.equal(normalizeZip(" 10001-1234 "), "10001");
  });

  it("rejects malformed codes", () => {
    assert.equal(normalizeZip("1000"), null);
    assert.equal(normalizeZip("100011"), null);
    assert.equal(normalizeZip("abcde"), null);
  });
});

describe("BundledZipGeocoder", () => {
  const geocoder = new BundledZipGeocoder();

  it("resolves ZIPs across the country", () => {
    assertNear(geocoder.resolve("10001"), 40.75, -73.99);
    assertNear(geocoder.resolve("90210"), 34.09, -118.41);
    assertNear(geocoder.resolve("60601"), 41.89, -87.62);
    assertNear(geocoder.resolve("75201"), 32.79, -96.8);
  });

  it("resolves ZIP+4 through the 5-digit key", () => {
    assertNear(geocoder.resolve("90210-1234"), 34.09, -118.41);
  });

  it("returns null for an unknown or malformed ZIP", () => {
    assert.equal(geocoder.resolve("00000"), null);
    assert.equal(geocoder.resolve("1OOO1"), null);
  });
});

describe("ZipGeocoder", () => {
  const path = writeTable([
    { zip: "10001", lat: 40.7506, lon: -73.9972, city: "New York", state: "NY" },
    { zip: "11201", lat: 40.6947, lon: -73.9904 },
  ]);
  const geocoder = ZipGeocoder.fromFile(path);

  it("loads a custom table", () => {
    assert.equal(geocoder.size, 2);
  });

  it("resolves a known ZIP to its centroid", () => {
    assert.deepEqual(geocoder.resolve("10001"), { lat: 40.7506, lon: -73.9972 });
  });

  it("resolves ZIP+4 through the 5-digit key", () => {
    assert.deepEqual(geocoder.resolve("11201-0001"), { lat: 40.6947, lon: -73.9904 });
  });

  it("returns null for a ZIP outside the table", () => {
    assert.equal(geocoder.resolve("90210"), null);
  });

  it("returns null for a malformed ZIP", () => {
    assert.equal(geocoder.resolve("1OOO1"), null);
  });

  it("rejects a malformed table file", () => {
    const bad = writeTable([{ zip: "123", lat: 10, lon: 20 }]);
    assert.throws(() => ZipGeocoder.fromFile(bad), {
      message: `Invalid geocoder table at ${bad}: 0.zip: zip must be 5 digits`,
    });
  });
});

describe("createGeocoder", () => {
  it("uses the bundled dataset without a custom table", () => {
    assert.ok(createGeocoder() instanceof BundledZipGeocoder);
  });

  it("uses the custom table when one is configured", () => {
    const geocoder = createGeocoder(writeTable([{ zip: "10001", lat: 1, lon: 2 }]));
    assert.deepEqual(geocoder.resolve("10001"), { lat: 1, lon: 2 });
  });
});
