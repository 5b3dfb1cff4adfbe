import { expectedTotalSize } from "../analysis/aggregate.js";
import type { SizeUnit, TopicRecord, TranscriptChunk } from "../analysis/types.js";
import type { AnalysisMode } from "../config/types.js";
import { ConfigurationError } from "../errors.js";
import type { OracleClient } from "../oracle/oracleClient.js";

/** Financial topics used when the run asks for the fixed preset. */
export const FIXED_TOPICS: readonly string[] = Object.freeze([
  "Operating Costs",
  "Technology",
  "EBITDA",
  "Net Income",
  "Guidance",
  "Capital",
  "Revenue",
  "Products",
  "Debt",
  "Sales",
  "Customers",
  "Govt.",
  "Margins",
  "Market Share",
]);

export type TopicSource =
  | { kind: "chunked" }
  | { kind: "discovered" }
  | { kind: "custom"; topics: readonly string[] }
  | { kind: "fixed"; topics: readonly string[] };

/** An explicit topic list always wins over the configured mode. */
export function resolveTopicSource(mode: AnalysisMode, customTopics?: readonly string[]): TopicSource {
  if (customTopics && customTopics.length > 0) {
    return { kind: "custom", topics: customTopics };
  }

  switch (mode) {
    case "chunked":
      return { kind: "chunked" };
    case "discovered":
      return { kind: "discovered" };
    case "fixed":
      return { kind: "fixed", topics: FIXED_TOPICS };
    case "custom":
      throw new ConfigurationError("Custom analysis mode needs at least one topic.");
  }
}

export function describeTopicSource(source: TopicSource): string {
  switch (source.kind) {
    case "chunked":
      return "per-chunk topics";
    case "discovered":
      return "model-discovered topics";
    case "custom":
      return `custom topics (${source.topics.length})`;
    case "fixed":
      return `fixed topic preset (${source.topics.length})`;
  }
}

export async function collectTopicRecords(
  source: TopicSource,
  input: {
    text: string;
    chunks: readonly TranscriptChunk[];
    sizeUnit: SizeUnit;
    wordsPerMinute: number;
  },
  oracle: OracleClient,
): Promise<TopicRecord[]> {
  switch (source.kind) {
    case "chunked": {
      const analyses = await oracle.analyzeChunks(input.chunks);
      return analyses.map((analysis) => ({
        topic: analysis.topic,
        sentiment: analysis.sentiment,
        sizeMetric: expectedTotalSize(analysis.chunk.wordCount, input.sizeUnit, input.wordsPerMinute),
        rationale: analysis.rationale,
        ...(analysis.fallback ? { fallback: analysis.fallback } : {}),
      }));
    }
    case "discovered":
      return [...(await oracle.analyzeFullTranscript(input.text, input.wordsPerMinute))];
    case "custom":
    case "fixed":
      return [...(await oracle.analyzeWithCustomTopics(input.text, source.topics, input.wordsPerMinute))];
  }
}
