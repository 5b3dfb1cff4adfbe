import { afterEach, expect, test } from "vitest";
import { SqliteAnalysisCache } from "../../analysis/cache.js";
import { loadConfig } from "../../config/env.js";
import { EmptyResultError, NoContentError } from "../../errors.js";
import type { LlmCallInput } from "../../llm/client.js";
import { createOracleClient } from "../../oracle/oracleClient.js";
import { pipelineSettingsFromConfig, runPipeline, type PipelineSettings } from "../../pipeline/runPipeline.js";
import { selectColorScale } from "../../report/colorScale.js";

const TRANSCRIPT = "very positive quarter\n\nchallenging headwinds";

const CHUNKED_WORDS: PipelineSettings = {
  source: { kind: "chunked" },
  model: "test-model",
  sizeUnit: "words",
  wordsPerMinute: 155,
  maxTopics: 10,
  chunkMaxWords: 180,
  maxTranscriptChars: 60000,
  sizeDeviationTolerance: 0.25,
};

function stubOracle(reply: (input: LlmCallInput) => string) {
  const calls: LlmCallInput[] = [];
  const oracle = createOracleClient(
    { model: "test-model", sizeUnit: "words", maxTranscriptChars: 60000 },
    {
      callLlm: async (input) => {
        calls.push(input);
        return reply(input);
      },
    },
  );
  return { calls, oracle };
}

function growthOrRisk(input: LlmCallInput): string {
  return input.userPrompt.includes("very positive quarter")
    ? '{"topic":"Growth","sentiment":0.8,"rationale":"Upbeat."}'
    : '{"topic":"Risk","sentiment":-0.6,"rationale":"Headwinds."}';
}

let cache: SqliteAnalysisCache | null = null;

afterEach(() => {
  cache?.close();
  cache = null;
});

test("chunked mode sizes each topic by its chunk's words", async () => {
  const { calls, oracle } = stubOracle(growthOrRisk);

  const output = await runPipeline({ text: TRANSCRIPT, settings: CHUNKED_WORDS }, { oracle });

  expect(calls).toHaveLength(2);
  expect(output.result).toEqual([
    { topic: "Growth", sentiment: 0.8, sizeMetric: 3, rationale: "Upbeat." },
    { topic: "Risk", sentiment: -0.6, sizeMetric: 2, rationale: "Headwinds." },
  ]);
  expect(output.sizeUnit).toBe("words");
  expect(output.chunkCount).toBe(2);
  expect(output.fallbackCount).toBe(0);
  expect(output.cacheHit).toBe(false);
  expect(output.sizeCheck).toEqual({ expected: 5, actual: 5, deviation: 0, flagged: false });
  expect(selectColorScale(output.result).kind).toBe("diverging");
});

test("an empty transcript fails before any oracle call", async () => {
  const { calls, oracle } = stubOracle(growthOrRisk);

  await expect(runPipeline({ text: " \n\n\t ", settings: CHUNKED_WORDS }, { oracle })).rejects.toThrow(NoContentError);
  expect(calls).toHaveLength(0);
});

test("oracle failures surface as counted fallback records", async () => {
  const { oracle } = stubOracle((input) => (input.userPrompt.includes("challenging") ? "not json" : growthOrRisk(input)));

  const output = await runPipeline({ text: TRANSCRIPT, settings: CHUNKED_WORDS }, { oracle });

  expect(output.fallbackCount).toBe(1);
  expect(output.result.map((r) => r.topic)).toEqual(["Growth", "Uncategorized"]);
  expect(output.result[1]?.fallback).toBe("parse_failure");
});

test("a second identical run is served from the cache", async () => {
  cache = new SqliteAnalysisCache(":memory:");
  const { calls, oracle } = stubOracle(growthOrRisk);

  const first = await runPipeline({ text: TRANSCRIPT, settings: CHUNKED_WORDS }, { oracle, cache });
  const second = await runPipeline({ text: TRANSCRIPT, settings: CHUNKED_WORDS }, { oracle, cache });

  expect(calls).toHaveLength(2);
  expect(second.cacheHit).toBe(true);
  expect(second.sizeCheck).toBeNull();
  expect(second.result).toEqual(first.result);

  await runPipeline({ text: TRANSCRIPT, settings: { ...CHUNKED_WORDS, maxTopics: 1 } }, { oracle, cache });
  expect(calls).toHaveLength(4);
});

test("results with fallbacks are not cached", async () => {
  cache = new SqliteAnalysisCache(":memory:");
  const { calls, oracle } = stubOracle(() => "not json");

  await runPipeline({ text: TRANSCRIPT, settings: CHUNKED_WORDS }, { oracle, cache });
  const again = await runPipeline({ text: TRANSCRIPT, settings: CHUNKED_WORDS }, { oracle, cache });

  expect(again.cacheHit).toBe(false);
  expect(calls).toHaveLength(4);
});

test("discovered mode flags sizes that do not add up", async () => {
  const { calls, oracle } = stubOracle(() => '{"topics":[{"topic":"Growth","sentiment":0.5,"words":1}]}');

  const output = await runPipeline(
    { text: TRANSCRIPT, settings: { ...CHUNKED_WORDS, source: { kind: "discovered" } } },
    { oracle },
  );

  expect(calls).toHaveLength(1);
  expect(output.sizeCheck).toEqual({ expected: 5, actual: 1, deviation: 0.8, flagged: true });
  expect(output.result).toEqual([{ topic: "Growth", sentiment: 0.5, sizeMetric: 1, rationale: "" }]);
});

test("a topic source that yields nothing is an empty result", async () => {
  const { oracle } = stubOracle(growthOrRisk);

  await expect(
    runPipeline({ text: TRANSCRIPT, settings: { ...CHUNKED_WORDS, source: { kind: "custom", topics: [" "] } } }, { oracle }),
  ).rejects.toThrow(EmptyResultError);
});

test("settings derive from config", () => {
  const settings = pipelineSettingsFromConfig(loadConfig({ ANALYSIS_MODE: "fixed", SIZE_UNIT: "words" }));

  expect(settings.source.kind).toBe("fixed");
  expect(settings.sizeUnit).toBe("words");
  expect(settings.model).toBe("gpt-4o-mini");
  expect(settings.maxTopics).toBe(10);
});
