import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { KM_PER_MILE, revalidateDraft } from "../services/extract/revalidate.js";

describe("revalidateDraft", () => {
  it("keeps well-formed fields and converts miles", () => {
    const { draft, dropped } = revalidateDraft({
      procedure_code: "470",
      postal_code: "10001",
      radius: 25,
      unit: "miles",
      intent: "cheapest",
    });
    assert.deepEqual(dropped, []);
    assert.deepEqual(draft.procedure, { kind: "code", code: "470" });
    assert.equal(draft.postalCode, "10001");
    assert.equal(draft.radiusKm, 25 * KM_PER_MILE);
    assert.equal(draft.rankingIntent, "cheapest");
  });

  it("pads and normalizes procedure codes", () => {
    assert.deepEqual(revalidateDraft({ procedure_code: "39" }).draft.procedure, { kind: "code", code: "039" });
    assert.deepEqual(revalidateDraft({ procedure_code: 470 }).draft.procedure, { kind: "code", code: "470" });
    assert.deepEqual(revalidateDraft({ procedure_code: "MS-DRG 470" }).draft.procedure, {
      kind: "code",
      code: "470",
    });
  });

  it("prefers the code when both procedure fields are valid", () => {
    const { draft } = revalidateDraft({ procedure_code: "470", procedure_text: "knee" });
    assert.deepEqual(draft.procedure, { kind: "code", code: "470" });
  });

  it("falls back to the description when the code is invalid", () => {
    const { draft, dropped } = revalidateDraft({ procedure_code: "4700", procedure_text: "  knee   replacement " });
    assert.deepEqual(draft.procedure, { kind: "text", text: "knee replacement" });
    assert.deepEqual(dropped, ["procedure_code"]);
  });

  it("drops descriptions outside the allowed characters", () => {
    const { draft, dropped } = revalidateDraft({ procedure_text: "knee'; DROP TABLE providers; --" });
    assert.equal(draft.procedure, undefined);
    assert.deepEqual(dropped, ["procedure_text"]);
  });

  it("drops descriptions without a letter", () => {
    assert.deepEqual(revalidateDraft({ procedure_text: "1234" }).dropped, ["procedure_text"]);
  });

  it("normalizes postal codes", () => {
    assert.equal(revalidateDraft({ postal_code: 2139 }).draft.postalCode, "02139");
    assert.equal(revalidateDraft({ postal_code: "10001-1234" }).draft.postalCode, "10001");
    assert.deepEqual(revalidateDraft({ postal_code: "1000" }).dropped, ["postal_code"]);
  });

  it("reads a radius without a unit as kilometers", () => {
    assert.equal(revalidateDraft({ radius: "15" }).draft.radiusKm, 15);
    assert.equal(revalidateDraft({ radius: 15, unit: "KM" }).draft.radiusKm, 15);
  });

  it("drops a non-numeric radius", () => {
    const { draft, dropped } = revalidateDraft({ radius: "abc" });
    assert.equal(draft.radiusKm, undefined);
    assert.deepEqual(dropped, ["radius"]);
  });

  it("drops the radius when its unit is not understood", () => {
    const { draft, dropped } = revalidateDraft({ radius: 10, unit: "furlongs" });
    assert.equal(draft.radiusKm, undefined);
    assert.deepEqual(dropped, ["unit", "radius"]);
  });

  it("maps intent spellings", () => {
    assert.equal(revalidateDraft({ intent: "best_rated" }).draft.rankingIntent, "best-rated");
    assert.equal(revalidateDraft({ intent: "Top N" }).draft.rankingIntent, "top-n");
    assert.equal(revalidateDraft({ intent: "nearest" }).draft.rankingIntent, "top-n");
  });

  it("reads an average-cost intent as the statistic", () => {
    const { draft } = revalidateDraft({ intent: "average_cost" });
    assert.equal(draft.statistic, "average_cost");
    assert.equal(draft.rankingIntent, undefined);
  });

  it("drops an unknown intent", () => {
    assert.deepEqual(revalidateDraft({ intent: "loudest" }).dropped, ["intent"]);
  });

  it("reads the statistic field", () => {
    assert.equal(revalidateDraft({ statistic: "average_cost" }).draft.statistic, "average_cost");
    assert.deepEqual(revalidateDraft({ statistic: "median" }).dropped, ["statistic"]);
  });

  it("reads numeric limits and drops others", () => {
    assert.equal(revalidateDraft({ limit: "5" }).draft.limit, 5);
    assert.deepEqual(revalidateDraft({ limit: "five" }).dropped, ["limit"]);
  });

  it("ignores null fields", () => {
    assert.deepEqual(revalidateDraft({ postal_code: null, radius: null, unit: null, intent: null }), {
      draft: {},
      dropped: [],
    });
  });
});
