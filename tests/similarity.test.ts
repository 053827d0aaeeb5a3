import test from "node:test";
import assert from "node:assert/strict";
import { normalizeTerm, partialSimilarityRatio, similarityRatio, toSnakeCase } from "../src/similarity.js";

test("normalizeTerm lowercases, transliterates and drops stop words", () => {
  assert.equal(normalizeTerm("Reiten im Winter"), "reiten im winter");
  assert.equal(normalizeTerm("Fahren mit dem Boot"), "fahren dem boot");
  assert.equal(normalizeTerm("Über-Flug"), "flug");
  assert.equal(normalizeTerm("drohnen_flugmodelle"), "drohnen flugmodelle");
});

test("toSnakeCase builds keys from free text", () => {
  assert.equal(toSnakeCase("Drohnen steigen lassen"), "drohnen_steigen_lassen");
  assert.equal(toSnakeCase("  Grüne Öl-Straße! "), "gruene_oel_strasse");
  assert.equal(toSnakeCase("Café"), "cafe");
  assert.equal(toSnakeCase("!!!"), "");
});

test("similarityRatio scores identical and empty strings", () => {
  assert.equal(similarityRatio("abc", "abc"), 100);
  assert.equal(similarityRatio("", ""), 100);
  assert.equal(similarityRatio("abc", ""), 0);
  assert.equal(similarityRatio("abc", "xyz"), 0);
});

test("similarityRatio uses the longest common subsequence", () => {
  const score = similarityRatio("drohnen_steigen_lassen", "drohnen_aufsteigen_lassen");
  assert.ok(Math.abs(score - 4400 / 47) < 1e-9);
  assert.equal(similarityRatio("ab", "ba"), 50);
});

test("similarityRatio is symmetric", () => {
  assert.equal(similarityRatio("reiten", "ausreiten"), similarityRatio("ausreiten", "reiten"));
});

test("partialSimilarityRatio finds the best window", () => {
  assert.equal(partialSimilarityRatio("reiten", "reiten im winter"), 100);
  assert.equal(partialSimilarityRatio("winter", "reiten im winter"), 100);
  assert.equal(partialSimilarityRatio("abc", ""), 0);
});
