import test from "node:test";
import assert from "node:assert/strict";
import { parseExtractionEnvelope } from "../src/schemas.js";

const RULE = {
  activity: "reiten",
  place: "wege",
  permission: "verboten",
  conditions: [{ type: "datumspanne", from: "03-01", to: "07-15" }],
  citations: ["§ 4", "§ 2", "§ 4"],
  confidence: 0.9,
};

test("parseExtractionEnvelope converts rules into facts", () => {
  const parsed = parseExtractionEnvelope({ rules: [RULE] });
  assert.equal(parsed.ok, true);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.payload, {
    facts: [
      {
        activity: "reiten",
        place: "wege",
        permission: "verboten",
        conditions: [{ type: "datumspanne", from: "03-01", to: "07-15" }],
        citations: ["§ 2", "§ 4"],
        confidence: 0.9,
        normalizationReason: "",
      },
    ],
    candidates: {},
  });
  assert.deepEqual(parsed.dropped, []);
});

test("parseExtractionEnvelope keeps a zone name only when present", () => {
  const parsed = parseExtractionEnvelope({
    rules: [
      { ...RULE, zone: { zone_typ: "uferzone", zone_name: null } },
      { ...RULE, zone: { zone_typ: "kernzone", zone_name: "Moor Nord" } },
    ],
  });
  assert.ok(parsed.ok);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.payload.facts[0].zone, { type: "uferzone" });
  assert.deepEqual(parsed.payload.facts[1].zone, { type: "kernzone", name: "Moor Nord" });
});

test("parseExtractionEnvelope drops invalid rules and conditions individually", () => {
  const parsed = parseExtractionEnvelope({
    rules: [
      { ...RULE, conditions: [{ type: "" }, { type: "tageszeit", from: "08:00", to: "18:00", unit: null }] },
      { ...RULE, confidence: 1.5 },
      "not a rule",
    ],
  });
  assert.ok(parsed.ok);
  if (!parsed.ok) return;
  assert.equal(parsed.payload.facts.length, 1);
  assert.deepEqual(parsed.payload.facts[0].conditions, [{ type: "tageszeit", from: "08:00", to: "18:00" }]);
  assert.deepEqual(
    parsed.dropped.map((d) => d.path),
    ["rules[0].conditions[0]", "rules[1]", "rules[2]"],
  );
  assert.ok(parsed.dropped[0].reason.startsWith("type: "));
  assert.ok(parsed.dropped[1].reason.startsWith("confidence: "));
});

test("parseExtractionEnvelope derives candidate keys", () => {
  const parsed = parseExtractionEnvelope({
    rules: [],
    new_candidates: {
      activities: [
        { original: "Drohnen steigen lassen", quote: "Drohnen dürfen nicht steigen", confidence: 0.7 },
        { key_snake: "Drohnen-Flug", original: "Drohnenflug", confidence: 0.6, why_new: "kein Eintrag", decision: "ADD_NEW" },
      ],
      zone_terms: [{ original: "!!!", confidence: 0.5 }],
    },
  });
  assert.ok(parsed.ok);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.payload.candidates, {
    activities: [
      {
        normalizedKey: "drohnen_steigen_lassen",
        originalText: "Drohnen steigen lassen",
        quote: "Drohnen dürfen nicht steigen",
        confidence: 0.7,
      },
      {
        normalizedKey: "drohnen_flug",
        originalText: "Drohnenflug",
        quote: "",
        confidence: 0.6,
        supportingReason: "kein Eintrag",
        decision: "ADD_NEW",
      },
    ],
  });
  assert.deepEqual(parsed.dropped, [{ path: "new_candidates.zone_terms[0]", reason: "candidate has no usable key" }]);
});

test("parseExtractionEnvelope rejects a reply without a rules array", () => {
  const parsed = parseExtractionEnvelope({ facts: [] });
  assert.equal(parsed.ok, false);
  if (parsed.ok) return;
  assert.equal(parsed.reason, "rules: Required");
  assert.equal(parseExtractionEnvelope([]).ok, false);
});
