import type { SizeUnit } from "../config/types.js";

export type PromptBundle = {
  systemPrompt: string;
  userPrompt: string;
};

export function buildChunkPrompt(chunkText: string): PromptBundle {
  const systemPrompt = `You analyze earnings call transcript chunks.

For each chunk, return a concise topic label summarizing the main theme and a sentiment score in [-1, 1].

Rules:
- The score reflects positive vs negative tone regarding company performance, outlook, risks and opportunities.
- Avoid lexical heuristics; base your judgment on the described outcomes and tone.
- Keep the topic label to a few words.
- Keep the rationale to one short sentence.`;

  const userPrompt = [
    "Transcript chunk:",
    "",
    chunkText.trim(),
    "",
    'Return strict JSON with keys: "topic" (string), "sentiment" (number between -1.0 and 1.0), "rationale" (string).',
  ].join("\n");

  return { systemPrompt, userPrompt };
}

function sizeInstruction(unit: SizeUnit, total: number): string {
  if (unit === "minutes") {
    return `Estimate the speaking time in minutes spent on each topic. The minutes across all topics must sum to ${total.toFixed(1)}, the estimated length of the whole call.`;
  }
  return `Count the words spent on each topic. The word counts across all topics must sum to ${Math.round(total)}, the word count of the whole call.`;
}

function itemShape(unit: SizeUnit): string {
  const sizeField = unit === "minutes" ? '"minutes": 4.5' : '"words": 700';
  return `{ "topics": [ { "topic": "Topic Name", "sentiment": 0.7, ${sizeField}, "rationale": "Brief explanation of the score" } ] }`;
}

const SHARED_GUIDELINES = [
  "- Sentiment runs from -1.0 (very negative) to 1.0 (very positive); never exceed that range.",
  "- Consider financial performance, strategic initiatives and market positioning.",
  "- Provide one or two sentences of rationale per topic.",
];

export function buildDiscoveredTopicsPrompt(args: {
  transcript: string;
  unit: SizeUnit;
  totalSize: number;
  truncated: boolean;
}): PromptBundle {
  const systemPrompt = [
    "You analyze earnings call transcripts. Identify the key business topics discussed and score the sentiment of each.",
    "",
    "Guidelines:",
    "- Identify 8-15 topics that are actually discussed in the transcript.",
    "- Keep each topic name to two words at most (e.g. \"Operating Costs\", \"Net Income\", \"Market Share\").",
    "- Do not include generic topics like \"Introduction\" or \"Conclusion\".",
    `- ${sizeInstruction(args.unit, args.totalSize)}`,
    ...SHARED_GUIDELINES,
    "",
    `Return JSON with exactly this shape: ${itemShape(args.unit)}`,
  ].join("\n");

  const userPrompt = [
    args.truncated ? "Transcript (truncated):" : "Transcript:",
    "",
    args.transcript,
  ].join("\n");

  return { systemPrompt, userPrompt };
}

export function buildCustomTopicsPrompt(args: {
  transcript: string;
  topics: readonly string[];
  unit: SizeUnit;
  totalSize: number;
  truncated: boolean;
}): PromptBundle {
  const zeroField = args.unit === "minutes" ? "minutes" : "words";
  const systemPrompt = [
    "You analyze earnings call transcripts. Classify the discussion into a fixed set of topics and score the sentiment of each.",
    "",
    "Guidelines:",
    "- Use exactly the topic names provided; do not rename, merge or add topics.",
    "- Return one entry for every provided topic.",
    `- If a topic is not discussed, set its sentiment to 0 and its ${zeroField} to 0.`,
    `- ${sizeInstruction(args.unit, args.totalSize)}`,
    ...SHARED_GUIDELINES,
    "",
    `Return JSON with exactly this shape: ${itemShape(args.unit)}`,
  ].join("\n");

  const userPrompt = [
    `Topics to analyze: ${args.topics.join(", ")}`,
    "",
    args.truncated ? "Transcript (truncated):" : "Transcript:",
    "",
    args.transcript,
  ].join("\n");

  return { systemPrompt, userPrompt };
}
