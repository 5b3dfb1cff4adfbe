import { log } from "../utils/logger.js";
import type { AnalysisResult, FallbackReason, SizeCheck, SizeUnit, TopicRecord } from "./types.js";

const aggregateLog = log.withScope("aggregate");

type TopicGroup = {
  topic: string;
  sentimentSum: number;
  count: number;
  size: number;
  rationales: string[];
  fallback?: FallbackReason;
};

export function clipSentiment(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(-1, value));
}

export function expectedTotalSize(wordCount: number, unit: SizeUnit, wordsPerMinute: number): number {
  if (unit === "words") return wordCount;
  return wordCount / Math.max(wordsPerMinute, 1);
}

/**
 * Merges records sharing an exact topic label (mean sentiment, summed size), clips
 * sentiment, sorts by size descending with first-seen order breaking ties, and keeps
 * the `maxTopics` largest.
 */
export function aggregate(records: readonly TopicRecord[], maxTopics: number): AnalysisResult {
  const groups = new Map<string, TopicGroup>();

  for (const record of records) {
    const existing = groups.get(record.topic);
    const rationale = record.rationale.trim();

    if (!existing) {
      groups.set(record.topic, {
        topic: record.topic,
        sentimentSum: record.sentiment,
        count: 1,
        size: Math.max(0, record.sizeMetric),
        rationales: rationale ? [rationale] : [],
        fallback: record.fallback,
      });
      continue;
    }

    existing.sentimentSum += record.sentiment;
    existing.count += 1;
    existing.size += Math.max(0, record.sizeMetric);
    if (rationale && !existing.rationales.includes(rationale)) existing.rationales.push(rationale);
    existing.fallback ??= record.fallback;
  }

  const merged: TopicRecord[] = [...groups.values()].map((group) => ({
    topic: group.topic,
    sentiment: clipSentiment(group.sentimentSum / group.count),
    sizeMetric: group.size,
    rationale: group.rationales.join(" "),
    ...(group.fallback ? { fallback: group.fallback } : {}),
  }));

  // Array.prototype.sort is stable, so equal sizes keep first-seen order.
  merged.sort((a, b) => b.sizeMetric - a.sizeMetric);

  const cap = Math.max(0, Math.floor(maxTopics));
  const kept = merged.slice(0, cap);

  if (merged.length > kept.length) {
    aggregateLog.debug("truncated topic list", {
      kept: kept.length,
      dropped: merged.slice(cap).map((record) => record.topic),
    });
  }

  return Object.freeze(kept.map((record) => Object.freeze(record)));
}

export function checkSizeConsistency(
  records: readonly TopicRecord[],
  expected: number,
  tolerance: number,
): SizeCheck {
  const actual = records.reduce((sum, record) => sum + Math.max(0, record.sizeMetric), 0);

  let deviation: number;
  if (expected > 0) deviation = Math.abs(actual - expected) / expected;
  else deviation = actual === 0 ? 0 : Number.POSITIVE_INFINITY;

  return {
    expected,
    actual,
    deviation,
    flagged: deviation > tolerance,
  };
}
