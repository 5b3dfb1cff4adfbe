import type { SizeUnit } from "../analysis/types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatSentiment(value: number): string {
  return value.toFixed(3);
}

export function formatSize(value: number, unit: SizeUnit): string {
  if (unit === "minutes") return `${value.toFixed(1)} min`;
  return `${Math.round(value).toLocaleString("en-US")} words`;
}

export function sizeColumnTitle(unit: SizeUnit): string {
  return unit === "minutes" ? "Time (min)" : "Word Count";
}
