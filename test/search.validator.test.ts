import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { InvalidInputError } from "../services/errors.js";
import { parseAskBody, parseProviderQuery } from "../src/modules/search.validator.js";

const BASE = { procedure: "470", postal_code: "10001" };

function invalidCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err.code;
    throw err;
  }
  return assert.fail("expected InvalidInputError");
}

describe("parseProviderQuery", () => {
  it("reads every parameter", () => {
    assert.deepEqual(
      parseProviderQuery({ ...BASE, postal_code: "10001-1234", radius_km: "25.5", ranking: "best-rated", limit: "5" }),
      {
        procedure: { kind: "code", code: "470" },
        postalCode: "10001",
        radiusKm: 25.5,
        rankingIntent: "best-rated",
        limit: 5,
        domainSignal: true,
      }
    );
  });

  it("treats blank optional parameters as absent", () => {
    const draft = parseProviderQuery({ ...BASE, radius_km: "", ranking: " ", limit: "" });
    assert.equal(draft.radiusKm, undefined);
    assert.equal(draft.rankingIntent, undefined);
    assert.equal(draft.limit, undefined);
  });

  it("keeps an explicit zero radius for clamping", () => {
    assert.equal(parseProviderQuery({ ...BASE, radius_km: "0" }).radiusKm, 0);
  });

  it("rejects a non-numeric radius", () => {
    assert.equal(
      invalidCode(() => parseProviderQuery({ ...BASE, radius_km: "abc" })),
      "INVALID_RADIUS"
    );
  });

  it("rejects a fractional limit", () => {
    assert.equal(
      invalidCode(() => parseProviderQuery({ ...BASE, limit: "2.5" })),
      "INVALID_LIMIT"
    );
  });

  it("reads a description as procedure text", () => {
    assert.deepEqual(parseProviderQuery({ ...BASE, procedure: "heart failure" }).procedure, {
      kind: "text",
      text: "heart failure",
    });
  });
});

describe("parseAskBody", () => {
  it("returns the trimmed question", () => {
    assert.equal(parseAskBody({ question: "  cheapest DRG 470 near 10001 " }), "cheapest DRG 470 near 10001");
  });

  it("rejects a missing question", () => {
    assert.equal(
      invalidCode(() => parseAskBody(undefined)),
      "INVALID_QUESTION"
    );
  });
});
