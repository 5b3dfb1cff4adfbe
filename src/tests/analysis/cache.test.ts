import { afterEach, beforeEach, expect, test } from "vitest";
import { SqliteAnalysisCache, analysisCacheKey, type CacheKeyInput } from "../../analysis/cache.js";
import type { AnalysisResult } from "../../analysis/types.js";

const SETTINGS: CacheKeyInput = {
  mode: "discovered",
  model: "test-model",
  sizeUnit: "minutes",
  wordsPerMinute: 155,
  maxTopics: 10,
  chunkMaxWords: 180,
  maxTranscriptChars: 60000,
};

const RESULT: AnalysisResult = [
  { topic: "Revenue", sentiment: 0.6, sizeMetric: 3.2, rationale: "Record quarter." },
  { topic: "Debt", sentiment: -0.3, sizeMetric: 1.1, rationale: "Refinancing risk." },
];

let cache: SqliteAnalysisCache;

beforeEach(() => {
  cache = new SqliteAnalysisCache(":memory:");
});

afterEach(() => {
  cache.close();
});

test("cache key changes with the transcript and with any setting", () => {
  const base = analysisCacheKey("transcript", SETTINGS);

  expect(base).toMatch(/^[0-9a-f]{64}$/);
  expect(analysisCacheKey("transcript", SETTINGS)).toBe(base);
  expect(analysisCacheKey("transcript!", SETTINGS)).not.toBe(base);
  expect(analysisCacheKey("transcript", { ...SETTINGS, model: "other-model" })).not.toBe(base);
  expect(analysisCacheKey("transcript", { ...SETTINGS, topics: ["Revenue"] })).not.toBe(base);
});

test("put then get returns the stored result", () => {
  cache.put("k1", RESULT);
  expect(cache.get("k1")).toEqual(RESULT);
  expect(cache.get("missing")).toBeNull();
});

test("delete and clear remove rows", () => {
  cache.put("k1", RESULT);
  cache.put("k2", RESULT);

  expect(cache.delete("k1")).toBe(true);
  expect(cache.delete("k1")).toBe(false);
  expect(cache.get("k1")).toBeNull();

  expect(cache.clear()).toBe(1);
  expect(cache.get("k2")).toBeNull();
});

test("put overwrites an existing key", () => {
  cache.put("k1", RESULT);
  cache.put("k1", RESULT.slice(1));
  expect(cache.get("k1")?.map((r) => r.topic)).toEqual(["Debt"]);
});

test("put drops the fallback marker", () => {
  cache.put("k1", [{ topic: "A", sentiment: 0, sizeMetric: 1, rationale: "r", fallback: "parse_failure" }]);
  expect(cache.get("k1")).toEqual([{ topic: "A", sentiment: 0, sizeMetric: 1, rationale: "r" }]);
});
