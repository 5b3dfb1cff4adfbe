import type { TranscriptChunk } from "../analysis/types.js";

export const DEFAULT_CHUNK_MAX_WORDS = 180;

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

/**
 * Paragraphs first, then fixed word-count windows inside any paragraph longer than
 * maxWords. Chunk text is the paragraph's words re-joined by single spaces.
 */
export function segment(text: string, maxWords: number = DEFAULT_CHUNK_MAX_WORDS): TranscriptChunk[] {
  const safeMaxWords = Math.max(1, Math.floor(maxWords));
  const chunks: TranscriptChunk[] = [];

  const paragraphs = text.split(/\r?\n[ \t]*\r?\n/);

  for (const paragraph of paragraphs) {
    const words = splitWords(paragraph);
    for (let start = 0; start < words.length; start += safeMaxWords) {
      const slice = words.slice(start, start + safeMaxWords);
      chunks.push(
        Object.freeze({
          index: chunks.length,
          text: slice.join(" "),
          wordCount: slice.length,
        }),
      );
    }
  }

  return chunks;
}
