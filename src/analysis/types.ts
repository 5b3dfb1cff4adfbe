import type { SizeUnit } from "../config/types.js";

export type { SizeUnit };

export type TranscriptChunk = {
  readonly index: number;
  readonly text: string;
  readonly wordCount: number;
};

export type FallbackReason = "parse_failure" | "transport_failure";

export type TopicRecord = {
  readonly topic: string;
  readonly sentiment: number;
  /** Minutes or words, per the run's SizeUnit. Drives treemap area. */
  readonly sizeMetric: number;
  readonly rationale: string;
  /** Set only on records synthesized locally because the oracle reply was unusable. */
  readonly fallback?: FallbackReason;
};

/** Ordered by descending size; order drives treemap read order and truncation. */
export type AnalysisResult = readonly TopicRecord[];

export type ChunkAnalysis = {
  readonly chunk: TranscriptChunk;
  readonly topic: string;
  readonly sentiment: number;
  readonly rationale: string;
  readonly fallback?: FallbackReason;
};

export type SizeCheck = {
  expected: number;
  actual: number;
  /** |actual - expected| / expected; 0 when both are 0. */
  deviation: number;
  flagged: boolean;
};

export type PersistedTopic = {
  topic: string;
  sentiment: number;
  word_count?: number;
  minutes?: number;
  reasoning: string;
};
