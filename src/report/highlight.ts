import { escapeHtml } from "./html.js";

export type SentenceTone = "positive" | "negative" | "neutral";

// Display-only heuristic; the oracle's scores are what the report measures.
const POSITIVE_WORDS = [
  "positive",
  "growth",
  "increase",
  "strong",
  "improve",
  "success",
  "profit",
  "revenue",
  "gain",
  "up",
  "higher",
  "better",
];

const NEGATIVE_WORDS = [
  "negative",
  "decline",
  "decrease",
  "weak",
  "worse",
  "loss",
  "risk",
  "challenge",
  "down",
  "lower",
  "concern",
  "problem",
];

// Keywords of four letters or more also match as a prefix ("risks", "improved");
// shorter ones ("up") only as a whole word.
function matchesKeyword(token: string, keyword: string): boolean {
  if (token === keyword) return true;
  return keyword.length >= 4 && token.startsWith(keyword);
}

function containsAny(tokens: readonly string[], keywords: readonly string[]): boolean {
  return tokens.some((token) => keywords.some((keyword) => matchesKeyword(token, keyword)));
}

export function classifySentence(sentence: string): SentenceTone {
  const tokens = sentence.toLowerCase().split(/[^a-z]+/).filter(Boolean);
  const positive = containsAny(tokens, POSITIVE_WORDS);
  const negative = containsAny(tokens, NEGATIVE_WORDS);

  if (positive && !negative) return "positive";
  if (negative && !positive) return "negative";
  return "neutral";
}

/** Naive split on ". "; every sentence gets its terminal punctuation back. */
export function splitSentences(text: string): string[] {
  return text
    .split(". ")
    .map((sentence) => sentence.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .map((sentence) => (/[.!?]$/.test(sentence) ? sentence : `${sentence}.`));
}

export function highlightTranscript(text: string | undefined): string {
  if (!text || !text.trim()) {
    return '<p class="no-transcript">Transcript text not available for highlighting.</p>';
  }

  return splitSentences(text)
    .map((sentence) => `<span class="${classifySentence(sentence)}-sentence">${escapeHtml(sentence)}</span>`)
    .join(" ");
}
