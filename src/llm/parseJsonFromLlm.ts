export class JsonExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonExtractionError";
  }
}

/**
 * Locates the JSON payload in a model reply that may be wrapped in prose, code fences
 * or trailing commentary.
 */
export function parseJsonFromLlm(raw: string): unknown {
  const trimmed = raw.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) return direct.value;

  const fenced = extractFencedContent(trimmed);
  if (fenced) {
    const parsed = tryParse(fenced);
    if (parsed.ok) return parsed.value;
  }

  // Whichever bracket opens first is the outer container.
  const arrayStart = trimmed.indexOf("[");
  const objectStart = trimmed.indexOf("{");
  const starts =
    arrayStart >= 0 && (objectStart < 0 || arrayStart < objectStart)
      ? [arrayStart, objectStart]
      : [objectStart, arrayStart];

  for (const start of starts) {
    const slice = extractBalancedSlice(trimmed, start);
    if (!slice) continue;
    const parsed = tryParse(slice);
    if (parsed.ok) return parsed.value;
  }

  throw new JsonExtractionError("Model response did not contain parseable JSON.");
}

function tryParse(value: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(value) };
  } catch {
    return { ok: false };
  }
}

function extractFencedContent(value: string): string | null {
  const match = value.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  return match?.[1]?.trim() ?? null;
}

/** Slice from `start` to its matching close bracket, skipping brackets inside strings. */
function extractBalancedSlice(value: string, start: number): string | null {
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < value.length; i++) {
    const ch = value[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return value.slice(start, i + 1);
    }
  }
  return null;
}
