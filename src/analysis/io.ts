import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { NoContentError } from "../errors.js";
import { formatZodIssues } from "../oracle/schemas.js";
import { slugify } from "../utils/slugify.js";
import type { AnalysisResult, PersistedTopic, SizeUnit, TopicRecord } from "./types.js";

export function analysisJsonFilename(slug: string): string {
  return `${slug}_analysis_results.json`;
}

export function reportFilename(slug: string): string {
  return `${slug}_report.html`;
}

export function slugFromTranscriptPath(transcriptPath: string): string {
  return slugify(path.basename(transcriptPath, path.extname(transcriptPath)));
}

export function readTranscript(transcriptPath: string): string {
  const resolved = path.resolve(transcriptPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new NoContentError(
      `Transcript not readable: ${resolved} (${err instanceof Error ? err.message : String(err)})`,
    );
  }
  if (!text.trim()) {
    throw new NoContentError(`Transcript is empty: ${resolved}`);
  }
  return text;
}

/** The array shape the browsing dashboard reads. Field order is part of the contract. */
export function toPersistedRecords(result: AnalysisResult, unit: SizeUnit): PersistedTopic[] {
  return result.map((record) =>
    unit === "words"
      ? { topic: record.topic, sentiment: record.sentiment, word_count: record.sizeMetric, reasoning: record.rationale }
      : { topic: record.topic, sentiment: record.sentiment, minutes: record.sizeMetric, reasoning: record.rationale },
  );
}

export function writeAnalysisJson(outputPath: string, result: AnalysisResult, unit: SizeUnit): string {
  const resolved = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, JSON.stringify(toPersistedRecords(result, unit), null, 2), "utf-8");
  return resolved;
}

const PersistedTopicSchema = z.object({
  topic: z.string().trim().min(1),
  sentiment: z.number().finite(),
  word_count: z.number().finite().nonnegative().optional(),
  minutes: z.number().finite().nonnegative().optional(),
  reasoning: z.string().optional(),
  rationale: z.string().optional(),
});

const PersistedFileSchema = z.array(PersistedTopicSchema);

/**
 * Reads a results file written by a previous run. Sentiment is passed through as
 * stored; run the records through aggregate() to clip and order them.
 */
export function readAnalysisJson(inputPath: string): { records: TopicRecord[]; sizeUnit: SizeUnit } {
  const resolved = path.resolve(inputPath);
  const parsed = PersistedFileSchema.safeParse(JSON.parse(fs.readFileSync(resolved, "utf-8")));
  if (!parsed.success) {
    throw new Error(`Invalid analysis file ${resolved}: ${formatZodIssues(parsed.error)}`);
  }

  const items = parsed.data;
  const sizeUnit: SizeUnit = items.every((item) => item.word_count !== undefined) ? "words" : "minutes";
  if (sizeUnit === "minutes" && !items.every((item) => item.minutes !== undefined)) {
    throw new Error(`Invalid analysis file ${resolved}: every topic needs "word_count" or every topic needs "minutes"`);
  }

  const records = items.map((item) => ({
    topic: item.topic,
    sentiment: item.sentiment,
    sizeMetric: (sizeUnit === "words" ? item.word_count : item.minutes) ?? 0,
    rationale: item.reasoning ?? item.rationale ?? "",
  }));

  return { records, sizeUnit };
}
