import { expectedTotalSize } from "../analysis/aggregate.js";
import type {
  AnalysisResult,
  ChunkAnalysis,
  FallbackReason,
  SizeUnit,
  TopicRecord,
  TranscriptChunk,
} from "../analysis/types.js";
import { describeError } from "../errors.js";
import type { LlmCall } from "../llm/client.js";
import { parseJsonFromLlm } from "../llm/parseJsonFromLlm.js";
import { countWords } from "../transcript/segmenter.js";
import { log } from "../utils/logger.js";
import {
  buildChunkPrompt,
  buildCustomTopicsPrompt,
  buildDiscoveredTopicsPrompt,
  type PromptBundle,
} from "./prompts.js";
import {
  ChunkResponseSchema,
  formatZodIssues,
  topicsResponseSchema,
  type ChunkVerdict,
  type TopicEstimate,
} from "./schemas.js";

const oracleLog = log.withScope("oracle");

export const FALLBACK_TOPIC = "Uncategorized";
export const TOPIC_MAX_CHARS = 60;
const RAW_EXCERPT_CHARS = 200;

export type OracleResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "fallback"; reason: FallbackReason; detail: string };

export type OracleSettings = {
  model: string;
  sizeUnit: SizeUnit;
  maxTranscriptChars: number;
};

export interface OracleClient {
  analyzeChunks(chunks: readonly TranscriptChunk[]): Promise<ChunkAnalysis[]>;
  analyzeFullTranscript(text: string, wordsPerMinute: number): Promise<AnalysisResult>;
  analyzeWithCustomTopics(
    text: string,
    topics: readonly string[],
    wordsPerMinute: number,
  ): Promise<AnalysisResult>;
}

export function capTopicLabel(label: string): string {
  return label.trim().slice(0, TOPIC_MAX_CHARS).trim();
}

function parseFailure(detail: string): { kind: "fallback"; reason: FallbackReason; detail: string } {
  return { kind: "fallback", reason: "parse_failure", detail };
}

function extractJson(raw: string): OracleResult<unknown> {
  try {
    return { kind: "ok", value: parseJsonFromLlm(raw) };
  } catch (err) {
    return parseFailure(describeError(err));
  }
}

export function parseChunkReply(raw: string): OracleResult<ChunkVerdict> {
  const json = extractJson(raw);
  if (json.kind === "fallback") return json;

  const parsed = ChunkResponseSchema.safeParse(json.value);
  if (!parsed.success) {
    return parseFailure(`Unexpected response shape: ${formatZodIssues(parsed.error)}`);
  }
  return { kind: "ok", value: parsed.data };
}

export function parseTopicsReply(raw: string, unit: SizeUnit): OracleResult<TopicEstimate[]> {
  const json = extractJson(raw);
  if (json.kind === "fallback") return json;

  const parsed = topicsResponseSchema(unit).safeParse(json.value);
  if (!parsed.success) {
    return parseFailure(`Unexpected response shape: ${formatZodIssues(parsed.error)}`);
  }
  return { kind: "ok", value: parsed.data };
}

export function describeFallback(reason: FallbackReason, detail: string, raw?: string): string {
  if (reason === "transport_failure") {
    return `Oracle request failed: ${detail.replace(/\.+$/, "")}.`;
  }
  const excerpt = raw ? ` Raw: ${raw.trim().slice(0, RAW_EXCERPT_CHARS)}` : "";
  return `Parse failure: ${detail.replace(/\.+$/, "")}.${excerpt}`;
}

function truncateTranscript(text: string, maxChars: number): { text: string; truncated: boolean } {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return { text: trimmed, truncated: false };
  return { text: trimmed.slice(0, maxChars), truncated: true };
}

/**
 * Matches reply items to the requested labels: exact spelling first, then
 * case-insensitively when only one requested label folds to that key (requested
 * spelling wins). Unknown labels are dropped; requested labels the reply skipped get zeros.
 */
function alignToRequestedTopics(
  estimates: TopicEstimate[],
  topics: readonly string[],
): OracleResult<TopicRecord[]> {
  const exact = new Set(topics);
  // Case-insensitive lookup only for keys that a single requested label owns.
  const byKey = new Map<string, string | null>();
  for (const topic of topics) {
    const key = topic.toLowerCase();
    byKey.set(key, byKey.has(key) ? null : topic);
  }

  const matched: TopicEstimate[] = [];
  const dropped: string[] = [];

  for (const estimate of estimates) {
    const requested = exact.has(estimate.topic) ? estimate.topic : byKey.get(estimate.topic.toLowerCase());
    if (requested) matched.push({ ...estimate, topic: requested });
    else dropped.push(estimate.topic);
  }

  if (dropped.length > 0) {
    oracleLog.warn("dropped topics outside the requested set", { dropped });
  }
  if (matched.length === 0) {
    return parseFailure("No reply item matched a requested topic");
  }

  const records: TopicRecord[] = [];
  for (const topic of topics) {
    const hits = matched.filter((estimate) => estimate.topic === topic);
    if (hits.length === 0) {
      records.push({ topic: capTopicLabel(topic), sentiment: 0, sizeMetric: 0, rationale: "Not discussed in the transcript." });
      continue;
    }
    for (const hit of hits) {
      records.push({
        topic: capTopicLabel(topic),
        sentiment: hit.sentiment,
        sizeMetric: hit.size,
        rationale: hit.rationale,
      });
    }
  }

  return { kind: "ok", value: records };
}

export function createOracleClient(settings: OracleSettings, deps: { callLlm: LlmCall }): OracleClient {
  async function send(prompt: PromptBundle): Promise<OracleResult<string>> {
    try {
      const raw = await deps.callLlm({
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        model: settings.model,
      });
      return { kind: "ok", value: raw };
    } catch (err) {
      return { kind: "fallback", reason: "transport_failure", detail: describeError(err) };
    }
  }

  async function analyzeChunks(chunks: readonly TranscriptChunk[]): Promise<ChunkAnalysis[]> {
    const analyses: ChunkAnalysis[] = [];

    // Sequential on purpose: one request in flight at a time.
    for (const chunk of chunks) {
      const reply = await send(buildChunkPrompt(chunk.text));
      const verdict = reply.kind === "ok" ? parseChunkReply(reply.value) : reply;

      if (verdict.kind === "ok") {
        analyses.push({
          chunk,
          topic: capTopicLabel(verdict.value.topic),
          sentiment: verdict.value.sentiment,
          rationale: verdict.value.rationale,
        });
        continue;
      }

      oracleLog.warn(`chunk ${chunk.index} fell back`, { reason: verdict.reason, detail: verdict.detail });
      analyses.push({
        chunk,
        topic: FALLBACK_TOPIC,
        sentiment: 0,
        rationale: describeFallback(verdict.reason, verdict.detail, reply.kind === "ok" ? reply.value : undefined),
        fallback: verdict.reason,
      });
    }

    return analyses;
  }

  async function analyzeFullTranscript(text: string, wordsPerMinute: number): Promise<AnalysisResult> {
    const totalSize = expectedTotalSize(countWords(text), settings.sizeUnit, wordsPerMinute);
    const sent = truncateTranscript(text, settings.maxTranscriptChars);
    if (sent.truncated) {
      oracleLog.info("transcript truncated for oracle request", { maxChars: settings.maxTranscriptChars });
    }

    const reply = await send(
      buildDiscoveredTopicsPrompt({
        transcript: sent.text,
        unit: settings.sizeUnit,
        totalSize,
        truncated: sent.truncated,
      }),
    );
    const parsed = reply.kind === "ok" ? parseTopicsReply(reply.value, settings.sizeUnit) : reply;

    if (parsed.kind === "ok") {
      return parsed.value.map((estimate) => ({
        topic: capTopicLabel(estimate.topic),
        sentiment: estimate.sentiment,
        sizeMetric: estimate.size,
        rationale: estimate.rationale,
      }));
    }

    oracleLog.warn("topic discovery fell back", { reason: parsed.reason, detail: parsed.detail });
    return [
      {
        topic: FALLBACK_TOPIC,
        sentiment: 0,
        sizeMetric: totalSize,
        rationale: describeFallback(parsed.reason, parsed.detail, reply.kind === "ok" ? reply.value : undefined),
        fallback: parsed.reason,
      },
    ];
  }

  async function analyzeWithCustomTopics(
    text: string,
    topics: readonly string[],
    wordsPerMinute: number,
  ): Promise<AnalysisResult> {
    const requested = [...new Set(topics.map((topic) => topic.trim()).filter(Boolean))];
    if (requested.length === 0) return [];

    const totalSize = expectedTotalSize(countWords(text), settings.sizeUnit, wordsPerMinute);
    const sent = truncateTranscript(text, settings.maxTranscriptChars);

    const reply = await send(
      buildCustomTopicsPrompt({
        transcript: sent.text,
        topics: requested,
        unit: settings.sizeUnit,
        totalSize,
        truncated: sent.truncated,
      }),
    );
    const parsed = reply.kind === "ok" ? parseTopicsReply(reply.value, settings.sizeUnit) : reply;
    const aligned = parsed.kind === "ok" ? alignToRequestedTopics(parsed.value, requested) : parsed;

    if (aligned.kind === "ok") {
      return aligned.value;
    }

    oracleLog.warn("custom topic analysis fell back", { reason: aligned.reason, detail: aligned.detail });
    // TODO: weight the fallback split by keyword hits per topic instead of dividing evenly.
    const share = totalSize / requested.length;
    const rationale = `${describeFallback(aligned.reason, aligned.detail, reply.kind === "ok" ? reply.value : undefined)} Size divided evenly across requested topics.`;
    return requested.map((topic) => ({
      topic: capTopicLabel(topic),
      sentiment: 0,
      sizeMetric: share,
      rationale,
      fallback: aligned.reason,
    }));
  }

  return {
    analyzeChunks,
    analyzeFullTranscript,
    analyzeWithCustomTopics,
  };
}
