import { z } from "zod";
import type { SizeUnit } from "../config/types.js";

// Strings and out-of-range numbers are rejected outright; clipping happens only in the
// aggregator, and only for values that were valid numbers to begin with.
const SentimentSchema = z.number().finite().min(-1).max(1);

const TopicLabelSchema = z.string().trim().min(1);

const SizeSchema = z.number().finite().nonnegative();

const ChunkVerdictSchema = z
  .object({
    topic: TopicLabelSchema,
    sentiment: SentimentSchema,
    rationale: z.string().optional(),
    reasoning: z.string().optional(),
  })
  .transform((v) => ({
    topic: v.topic,
    sentiment: v.sentiment,
    rationale: (v.rationale ?? v.reasoning ?? "").trim(),
  }));

export type ChunkVerdict = z.output<typeof ChunkVerdictSchema>;

/** A single verdict object, or a list of them of which the first is used. */
export const ChunkResponseSchema = z.union([
  ChunkVerdictSchema,
  z
    .array(ChunkVerdictSchema)
    .min(1)
    .transform((items) => items[0]),
]);

const TopicItemSchema = z.object({
  topic: TopicLabelSchema,
  sentiment: SentimentSchema,
  minutes: SizeSchema.optional(),
  words: SizeSchema.optional(),
  word_count: SizeSchema.optional(),
  rationale: z.string().optional(),
  reasoning: z.string().optional(),
});

export type TopicEstimate = {
  topic: string;
  sentiment: number;
  size: number;
  rationale: string;
};

/** `{ topics: [...] }` or a bare list, each item carrying the size field for `unit`. */
export function topicsResponseSchema(unit: SizeUnit) {
  const item = TopicItemSchema.transform((v, ctx): TopicEstimate => {
    const size = unit === "minutes" ? v.minutes : v.words ?? v.word_count;
    if (size === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `missing "${unit}" for topic "${v.topic}"`,
      });
      return z.NEVER;
    }
    return {
      topic: v.topic,
      sentiment: v.sentiment,
      size,
      rationale: (v.rationale ?? v.reasoning ?? "").trim(),
    };
  });

  return z.union([
    z.object({ topics: z.array(item).min(1) }).transform((v) => v.topics),
    z.array(item).min(1),
  ]);
}

function flattenIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
  return issues.flatMap((issue) =>
    issue.code === z.ZodIssueCode.invalid_union
      ? flattenIssues(issue.unionErrors.flatMap((unionError) => unionError.issues))
      : [issue],
  );
}

export function formatZodIssues(error: z.ZodError): string {
  const lines = flattenIssues(error.issues).map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
  return [...new Set(lines)].join("; ");
}
