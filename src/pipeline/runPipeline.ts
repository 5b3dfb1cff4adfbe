import { aggregate, checkSizeConsistency, expectedTotalSize } from "../analysis/aggregate.js";
import { analysisCacheKey, type AnalysisCache } from "../analysis/cache.js";
import type { AnalysisResult, SizeCheck, SizeUnit } from "../analysis/types.js";
import type { Config } from "../config/types.js";
import { EmptyResultError, NoContentError } from "../errors.js";
import type { OracleClient } from "../oracle/oracleClient.js";
import { countWords, segment } from "../transcript/segmenter.js";
import { log } from "../utils/logger.js";
import {
  collectTopicRecords,
  describeTopicSource,
  resolveTopicSource,
  type TopicSource,
} from "./topicSource.js";

const pipelineLog = log.withScope("pipeline");

export type PipelineSettings = {
  source: TopicSource;
  model: string;
  sizeUnit: SizeUnit;
  wordsPerMinute: number;
  maxTopics: number;
  chunkMaxWords: number;
  maxTranscriptChars: number;
  sizeDeviationTolerance: number;
};

export type PipelineOutput = {
  result: AnalysisResult;
  sizeUnit: SizeUnit;
  /** null when the result came from the cache and was not re-checked. */
  sizeCheck: SizeCheck | null;
  chunkCount: number;
  fallbackCount: number;
  cacheHit: boolean;
};

export function pipelineSettingsFromConfig(cfg: Config): PipelineSettings {
  return {
    source: resolveTopicSource(cfg.analysis.mode, cfg.analysis.customTopics),
    model: cfg.llm.model,
    sizeUnit: cfg.analysis.sizeUnit,
    wordsPerMinute: cfg.analysis.wordsPerMinute,
    maxTopics: cfg.analysis.maxTopics,
    chunkMaxWords: cfg.analysis.chunkMaxWords,
    maxTranscriptChars: cfg.analysis.maxTranscriptChars,
    sizeDeviationTolerance: cfg.analysis.sizeDeviationTolerance,
  };
}

function cacheKeyFor(text: string, settings: PipelineSettings): string {
  return analysisCacheKey(text, {
    mode: settings.source.kind,
    topics: settings.source.kind === "custom" || settings.source.kind === "fixed" ? settings.source.topics : undefined,
    model: settings.model,
    sizeUnit: settings.sizeUnit,
    wordsPerMinute: settings.wordsPerMinute,
    maxTopics: settings.maxTopics,
    chunkMaxWords: settings.chunkMaxWords,
    maxTranscriptChars: settings.maxTranscriptChars,
  });
}

/**
 * Segment → oracle (via the configured topic source) → aggregate.
 *
 * Throws NoContentError before any oracle call when the transcript has no words, and
 * EmptyResultError when aggregation yields nothing. Oracle failures never throw; they
 * arrive as fallback records and are counted in `fallbackCount`.
 */
export async function runPipeline(
  input: { text: string; settings: PipelineSettings },
  deps: { oracle: OracleClient; cache?: AnalysisCache | null },
): Promise<PipelineOutput> {
  const { text, settings } = input;

  const chunks = segment(text, settings.chunkMaxWords);
  if (chunks.length === 0) {
    throw new NoContentError();
  }

  const cacheKey = deps.cache ? cacheKeyFor(text, settings) : null;
  if (deps.cache && cacheKey) {
    const cached = deps.cache.get(cacheKey);
    if (cached && cached.length > 0) {
      pipelineLog.info("using cached analysis", { topics: cached.length });
      return {
        result: cached,
        sizeUnit: settings.sizeUnit,
        sizeCheck: null,
        chunkCount: chunks.length,
        fallbackCount: 0,
        cacheHit: true,
      };
    }
  }

  pipelineLog.info(`analyzing with ${describeTopicSource(settings.source)}`, {
    chunks: chunks.length,
    model: settings.model,
    sizeUnit: settings.sizeUnit,
  });

  const records = await collectTopicRecords(
    settings.source,
    {
      text,
      chunks,
      sizeUnit: settings.sizeUnit,
      wordsPerMinute: settings.wordsPerMinute,
    },
    deps.oracle,
  );

  const expected = expectedTotalSize(countWords(text), settings.sizeUnit, settings.wordsPerMinute);
  const sizeCheck = checkSizeConsistency(records, expected, settings.sizeDeviationTolerance);
  if (sizeCheck.flagged) {
    pipelineLog.warn("topic sizes do not add up to the transcript size", {
      expected: Number(sizeCheck.expected.toFixed(2)),
      actual: Number(sizeCheck.actual.toFixed(2)),
      deviation: Number.isFinite(sizeCheck.deviation) ? Number(sizeCheck.deviation.toFixed(3)) : "inf",
    });
  }

  const result = aggregate(records, settings.maxTopics);
  if (result.length === 0) {
    throw new EmptyResultError();
  }

  const fallbackCount = records.filter((record) => record.fallback).length;
  if (deps.cache && cacheKey && fallbackCount === 0) {
    deps.cache.put(cacheKey, result);
  }

  pipelineLog.info("analysis complete", { topics: result.length, fallbacks: fallbackCount });

  return {
    result,
    sizeUnit: settings.sizeUnit,
    sizeCheck,
    chunkCount: chunks.length,
    fallbackCount,
    cacheHit: false,
  };
}
