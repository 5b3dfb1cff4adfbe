/**
 * Produce a filesystem-safe slug from a display name (e.g. a transcript file name).
 * - lower-case
 * - spaces → -
 * - strip non [a-z0-9-]
 * - collapse repeated -
 * - max length cap (48)
 */

const MAX_LENGTH = 48;

export function slugify(name: string): string {
  let s = name
    .toLowerCase()
    .trim()
    .replace(/[\s_]+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
  if (s.length > MAX_LENGTH) {
    s = s.slice(0, MAX_LENGTH).replace(/-$/, "");
  }
  return s || "transcript";
}
