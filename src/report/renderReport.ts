import fs from "node:fs";
import path from "node:path";
import type { AnalysisResult, SizeCheck, SizeUnit, TopicRecord } from "../analysis/types.js";
import { RenderError } from "../errors.js";
import { log } from "../utils/logger.js";
import { sampleColor, scalePosition, selectColorScale, textColorFor, type ColorScale } from "./colorScale.js";
import { highlightTranscript } from "./highlight.js";
import { escapeHtml, formatSentiment, formatSize, sizeColumnTitle } from "./html.js";
import { squarify, type Rect } from "./treemap.js";

const reportLog = log.withScope("report");

const CHART_WIDTH = 1000;
const CHART_HEIGHT = 600;
const NODE_GAP = 3;
const LEGEND_WIDTH = 420;

export type RenderOptions = {
  sizeUnit: SizeUnit;
  title?: string;
  /** Omit to render the transcript section as a "not available" note. */
  transcriptText?: string;
  sizeCheck?: SizeCheck | null;
  fallbackCount?: number;
  generatedAt?: Date;
};

export const DEFAULT_REPORT_TITLE = "Earnings Call Sentiment by Topic";

function sentimentClass(sentiment: number): string {
  if (sentiment > 0.1) return "sentiment-positive";
  if (sentiment < -0.1) return "sentiment-negative";
  return "sentiment-neutral";
}

function renderNode(record: TopicRecord, rect: Rect, scale: ColorScale, unit: SizeUnit): string {
  const fill = sampleColor(scale, record.sentiment);
  const ink = textColorFor(fill);
  const x = rect.x + NODE_GAP / 2;
  const y = rect.y + NODE_GAP / 2;
  const width = Math.max(0, rect.width - NODE_GAP);
  const height = Math.max(0, rect.height - NODE_GAP);

  const tooltip = [
    record.topic,
    `Sentiment: ${formatSentiment(record.sentiment)}`,
    `Size: ${formatSize(record.sizeMetric, unit)}`,
    record.rationale,
  ]
    .filter(Boolean)
    .join("\n");

  const labels: string[] = [];
  if (width > 60 && height > 24) {
    const maxChars = Math.max(4, Math.floor(width / 8));
    const label = record.topic.length > maxChars ? `${record.topic.slice(0, maxChars - 1)}…` : record.topic;
    labels.push(
      `<text x="${(x + 8).toFixed(1)}" y="${(y + 20).toFixed(1)}" fill="${ink}" font-weight="bold" font-size="14">${escapeHtml(label)}</text>`,
    );
    if (height > 44) {
      labels.push(
        `<text x="${(x + 8).toFixed(1)}" y="${(y + 38).toFixed(1)}" fill="${ink}" font-size="12">${formatSentiment(record.sentiment)} · ${escapeHtml(formatSize(record.sizeMetric, unit))}</text>`,
      );
    }
  }

  return [
    `<g class="node">`,
    `<rect x="${x.toFixed(1)}" y="${y.toFixed(1)}" width="${width.toFixed(1)}" height="${height.toFixed(1)}" fill="${fill}" rx="2"><title>${escapeHtml(tooltip)}</title></rect>`,
    ...labels,
    `</g>`,
  ].join("");
}

function renderTreemap(result: AnalysisResult, scale: ColorScale, unit: SizeUnit): string {
  // Zero-size topics stay in the table but take no area.
  const plotted = result.filter((record) => record.sizeMetric > 0);
  const rects = squarify(
    plotted.map((record) => record.sizeMetric),
    { x: 0, y: 0, width: CHART_WIDTH, height: CHART_HEIGHT },
  );

  const nodes = plotted.map((record, i) => renderNode(record, rects[i], scale, unit)).join("\n");

  return [
    `<svg class="treemap" viewBox="0 0 ${CHART_WIDTH} ${CHART_HEIGHT}" role="img" aria-label="Topic treemap">`,
    `<rect x="0" y="0" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" fill="#eeeeee"/>`,
    nodes,
    `</svg>`,
  ].join("\n");
}

function renderLegend(scale: ColorScale): string {
  const gradientStops = scale.stops
    .map(([position, color]) => `<stop offset="${(position * 100).toFixed(0)}%" stop-color="${color}"/>`)
    .join("");

  const ticks = scale.ticks
    .map((tick) => {
      const x = 10 + scalePosition(scale, tick.value) * LEGEND_WIDTH;
      return `<text x="${x.toFixed(1)}" y="40" font-size="11" text-anchor="middle">${escapeHtml(tick.label)}</text>`;
    })
    .join("");

  return [
    `<svg class="legend" data-scale="${scale.kind}" viewBox="0 0 ${LEGEND_WIDTH + 20} 46" width="${LEGEND_WIDTH + 20}" height="46">`,
    `<defs><linearGradient id="sentiment-gradient" x1="0" x2="1" y1="0" y2="0">${gradientStops}</linearGradient></defs>`,
    `<rect x="10" y="6" width="${LEGEND_WIDTH}" height="16" fill="url(#sentiment-gradient)"/>`,
    ticks,
    `</svg>`,
  ].join("\n");
}

function renderTable(result: AnalysisResult, unit: SizeUnit): string {
  const total = result.reduce((sum, record) => sum + record.sizeMetric, 0);

  const rows = result.map((record) => {
    const share = total > 0 ? `${((record.sizeMetric / total) * 100).toFixed(1)}%` : "0.0%";
    const badge = record.fallback ? ' <span class="badge">fallback</span>' : "";
    return [
      `<tr${record.fallback ? ' class="fallback-row"' : ""}>`,
      `<td><strong>${escapeHtml(record.topic)}</strong>${badge}</td>`,
      `<td class="${sentimentClass(record.sentiment)}">${formatSentiment(record.sentiment)}</td>`,
      `<td class="size-info">${escapeHtml(formatSize(record.sizeMetric, unit))}</td>`,
      `<td class="size-info">${share}</td>`,
      `<td class="rationale">${escapeHtml(record.rationale)}</td>`,
      `</tr>`,
    ].join("");
  });

  return [
    "<table>",
    "<thead><tr>",
    '<th class="topic-column">Topic</th>',
    '<th class="sentiment-column">Sentiment Score</th>',
    `<th class="size-column">${sizeColumnTitle(unit)}</th>`,
    '<th class="share-column">Share</th>',
    '<th class="rationale-column">Rationale</th>',
    "</tr></thead>",
    "<tbody>",
    ...rows,
    "</tbody>",
    "</table>",
  ].join("\n");
}

function renderWarnings(options: RenderOptions): string {
  const warnings: string[] = [];
  const check = options.sizeCheck;

  if (check?.flagged) {
    const off = Number.isFinite(check.deviation) ? `${(check.deviation * 100).toFixed(0)}% off` : "no expected size";
    warnings.push(
      `Topic sizes sum to ${escapeHtml(formatSize(check.actual, options.sizeUnit))} but the transcript measures ${escapeHtml(formatSize(check.expected, options.sizeUnit))} (${off}). The oracle's size estimates may be unreliable.`,
    );
  }

  const fallbacks = options.fallbackCount ?? 0;
  if (fallbacks > 0) {
    warnings.push(
      `${fallbacks} oracle response${fallbacks === 1 ? "" : "s"} could not be used; affected topics carry a fallback rationale.`,
    );
  }

  return warnings.map((warning) => `<div class="warning">${warning}</div>`).join("\n");
}

const STYLES = `
body { font-family: Arial, sans-serif; margin: 20px; color: #333; }
.container { max-width: 1200px; margin: 0 auto; }
.treemap-container { margin-bottom: 40px; }
.treemap { width: 100%; height: auto; display: block; }
.treemap .node rect { stroke: #ffffff; stroke-width: 1; }
.treemap .node:hover rect { stroke: #333333; stroke-width: 2; }
.legend { display: block; margin-top: 8px; }
.warning { background: #fff3cd; color: #856404; border: 1px solid #ffeeba; padding: 10px 14px; border-radius: 5px; margin: 10px 0; }
.table-container { margin-top: 30px; overflow-x: auto; border-radius: 8px; box-shadow: 0 2px 8px rgba(0,0,0,0.1); }
table { width: 100%; border-collapse: collapse; background: white; font-size: 14px; }
th, td { padding: 12px 15px; text-align: left; border-bottom: 1px solid #ddd; vertical-align: top; }
th { background-color: #f8f9fa; font-weight: 600; color: #495057; position: sticky; top: 0; }
.topic-column { width: 20%; }
.sentiment-column, .size-column, .share-column { width: 11%; }
.rationale-column { width: 47%; }
.sentiment-positive { color: #28a745; font-weight: bold; }
.sentiment-negative { color: #dc3545; font-weight: bold; }
.sentiment-neutral { color: #6c757d; font-weight: bold; }
.size-info { color: #666; font-size: 0.9em; }
.rationale { font-style: italic; color: #555; }
.fallback-row { background: #fdf6e3; }
.badge { font-size: 0.75em; background: #856404; color: #fff; border-radius: 3px; padding: 1px 5px; margin-left: 4px; }
.transcript-container { margin-top: 40px; }
.transcript-text { background-color: #f9f9f9; padding: 20px; border-radius: 5px; line-height: 1.6; max-height: 600px; overflow-y: auto; }
.positive-sentence { background-color: #d4edda; color: #155724; padding: 2px 4px; border-radius: 3px; }
.negative-sentence { background-color: #f8d7da; color: #721c24; padding: 2px 4px; border-radius: 3px; }
.neutral-sentence { padding: 2px 4px; }
.no-transcript { color: #666; font-style: italic; }
footer { margin-top: 30px; color: #999; font-size: 12px; }
`;

/**
 * Builds the self-contained HTML report: treemap (area = size metric, color =
 * sentiment), legend, detail table and the keyword-highlighted transcript.
 */
export function renderReport(result: AnalysisResult, options: RenderOptions): string {
  if (result.length === 0 || !result.some((record) => record.sizeMetric > 0)) {
    throw new RenderError("No data to plot.");
  }

  const scale = selectColorScale(result);
  const title = options.title ?? DEFAULT_REPORT_TITLE;
  const sizeLabel = options.sizeUnit === "minutes" ? "time" : "word count";
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();

  reportLog.debug("rendering report", { topics: result.length, scale: scale.kind });

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLES}</style>
</head>
<body>
<div class="container">
<h1>${escapeHtml(title)}</h1>
${renderWarnings(options)}
<div class="treemap-container">
<h2>Sentiment Treemap</h2>
<p>Topic size represents ${sizeLabel}, color represents sentiment.</p>
${renderTreemap(result, scale, options.sizeUnit)}
${renderLegend(scale)}
</div>
<div class="table-container">
<h2>Topic Analysis Details</h2>
${renderTable(result, options.sizeUnit)}
</div>
<div class="transcript-container">
<h2>Original Transcript</h2>
<p>Sentences are highlighted by keyword tone:</p>
<div class="transcript-text">
${highlightTranscript(options.transcriptText)}
</div>
</div>
<footer>Generated ${generatedAt}</footer>
</div>
</body>
</html>
`;
}

export function writeReport(outputPath: string, html: string): string {
  const resolved = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, html, "utf-8");
  return resolved;
}
