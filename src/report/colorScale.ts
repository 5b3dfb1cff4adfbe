import type { AnalysisResult } from "../analysis/types.js";

/** Position within the scale (0..1) and the hex color at that position. */
export type ColorStop = readonly [position: number, color: string];

export type ColorScale = {
  kind: "sequential" | "diverging";
  domain: readonly [min: number, max: number];
  stops: readonly ColorStop[];
  ticks: ReadonlyArray<{ value: number; label: string }>;
};

export const SEQUENTIAL_SCALE: ColorScale = {
  kind: "sequential",
  domain: [0, 1],
  stops: [
    [0, "#ffffcc"],
    [0.5, "#78c679"],
    [1, "#006837"],
  ],
  ticks: [
    { value: 0, label: "Neutral" },
    { value: 0.5, label: "Moderately Positive" },
    { value: 1, label: "Very Positive" },
  ],
};

export const DIVERGING_SCALE: ColorScale = {
  kind: "diverging",
  domain: [-1, 1],
  stops: [
    [0, "#d73027"],
    [0.25, "#fc8d59"],
    [0.5, "#f7f7f7"],
    [0.75, "#91cf60"],
    [1, "#1a9850"],
  ],
  ticks: [
    { value: -1, label: "Very Negative" },
    { value: 0, label: "Neutral" },
    { value: 1, label: "Very Positive" },
  ],
};

/**
 * Sequential 0..1 when nothing is negative, so the positive values spread over the
 * whole ramp; diverging -1..1 as soon as one topic is below zero.
 */
export function selectColorScale(result: AnalysisResult): ColorScale {
  const minSentiment = result.reduce((min, record) => Math.min(min, record.sentiment), Number.POSITIVE_INFINITY);
  return minSentiment >= 0 ? SEQUENTIAL_SCALE : DIVERGING_SCALE;
}

function parseHex(hex: string): [number, number, number] {
  const value = hex.replace(/^#/, "");
  return [
    Number.parseInt(value.slice(0, 2), 16),
    Number.parseInt(value.slice(2, 4), 16),
    Number.parseInt(value.slice(4, 6), 16),
  ];
}

function toHex(channels: readonly number[]): string {
  return `#${channels.map((c) => Math.round(c).toString(16).padStart(2, "0")).join("")}`;
}

/** Scale position (0..1) of a value, clamped to the domain. */
export function scalePosition(scale: ColorScale, value: number): number {
  const [min, max] = scale.domain;
  const clamped = Math.min(max, Math.max(min, value));
  return (clamped - min) / (max - min);
}

export function sampleColor(scale: ColorScale, value: number): string {
  const t = scalePosition(scale, value);
  const stops = scale.stops;

  for (let i = 1; i < stops.length; i++) {
    const [endPos, endColor] = stops[i];
    if (t > endPos) continue;

    const [startPos, startColor] = stops[i - 1];
    const local = endPos === startPos ? 0 : (t - startPos) / (endPos - startPos);
    const from = parseHex(startColor);
    const to = parseHex(endColor);
    return toHex(from.map((channel, idx) => channel + (to[idx] - channel) * local));
  }

  return stops[stops.length - 1][1];
}

/** Black on light fills, white on dark ones. */
export function textColorFor(hex: string): string {
  const [r, g, b] = parseHex(hex);
  const brightness = (r * 0.299 + g * 0.587 + b * 0.114) / 255;
  return brightness > 0.5 ? "#000000" : "#ffffff";
}
