import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import type { AnalysisResult } from "../../analysis/types.js";
import { RenderError } from "../../errors.js";
import { DIVERGING_SCALE, sampleColor } from "../../report/colorScale.js";
import { DEFAULT_REPORT_TITLE, renderReport, writeReport } from "../../report/renderReport.js";

const MIXED: AnalysisResult = [
  { topic: "Growth", sentiment: 0.8, sizeMetric: 3, rationale: "Very positive quarter." },
  { topic: "Risk", sentiment: -0.6, sizeMetric: 2, rationale: "Challenging headwinds." },
];

function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

test("empty results cannot be plotted", () => {
  expect(() => renderReport([], { sizeUnit: "words" })).toThrow(RenderError);
  expect(() => renderReport([], { sizeUnit: "words" })).toThrow("No data to plot.");
  expect(() =>
    renderReport([{ topic: "A", sentiment: 0, sizeMetric: 0, rationale: "" }], { sizeUnit: "words" }),
  ).toThrow(RenderError);
});

test("detail table has one row per topic with classed sentiment cells", () => {
  const html = renderReport(MIXED, { sizeUnit: "words" });

  expect(html).toContain('<th class="size-column">Word Count</th>');
  expect(html).toContain(
    '<tr><td><strong>Growth</strong></td><td class="sentiment-positive">0.800</td><td class="size-info">3 words</td><td class="size-info">60.0%</td><td class="rationale">Very positive quarter.</td></tr>',
  );
  expect(html).toContain('<td class="sentiment-negative">-0.600</td>');
  expect(countOf(html, "<tr><td>")).toBe(2);
});

test("treemap nodes are filled from the selected scale", () => {
  const html = renderReport(MIXED, { sizeUnit: "words" });

  expect(html).toContain('data-scale="diverging"');
  expect(html).toContain(`fill="${sampleColor(DIVERGING_SCALE, 0.8)}"`);
  expect(html).toContain(`fill="${sampleColor(DIVERGING_SCALE, -0.6)}"`);
  expect(countOf(html, '<g class="node">')).toBe(2);
});

test("positive-only results use the sequential legend", () => {
  const html = renderReport([{ topic: "Growth", sentiment: 0.4, sizeMetric: 2.5, rationale: "" }], {
    sizeUnit: "minutes",
  });

  expect(html).toContain('data-scale="sequential"');
  expect(html).toContain("Moderately Positive");
  expect(html).toContain('<th class="size-column">Time (min)</th>');
  expect(html).toContain('<td class="size-info">2.5 min</td>');
});

test("zero-size topics stay in the table but not in the chart", () => {
  const html = renderReport([...MIXED, { topic: "Debt", sentiment: 0, sizeMetric: 0, rationale: "Not discussed in the transcript." }], {
    sizeUnit: "words",
  });

  expect(countOf(html, '<g class="node">')).toBe(2);
  expect(html).toContain("<strong>Debt</strong>");
  expect(html).toContain('<td class="sentiment-neutral">0.000</td>');
});

test("user-supplied text is escaped", () => {
  const html = renderReport(
    [{ topic: "R&D <Spend>", sentiment: 0.2, sizeMetric: 1, rationale: 'Said "more" & meant it' }],
    { sizeUnit: "words", title: "Q3 <Call>" },
  );

  expect(html).toContain("<title>Q3 &lt;Call&gt;</title>");
  expect(html).toContain("<strong>R&amp;D &lt;Spend&gt;</strong>");
  expect(html).toContain('<td class="rationale">Said &quot;more&quot; &amp; meant it</td>');
  expect(html).not.toContain("<Spend>");
});

test("warnings for size deviation and fallbacks", () => {
  const html = renderReport(MIXED, {
    sizeUnit: "words",
    sizeCheck: { expected: 10, actual: 5, deviation: 0.5, flagged: true },
    fallbackCount: 2,
  });

  expect(html).toContain("Topic sizes sum to 5 words but the transcript measures 10 words (50% off).");
  expect(html).toContain("2 oracle responses could not be used");
});

test("no warnings when nothing is off", () => {
  const html = renderReport(MIXED, {
    sizeUnit: "words",
    sizeCheck: { expected: 5, actual: 5, deviation: 0, flagged: false },
    fallbackCount: 0,
  });
  expect(html).not.toContain('<div class="warning">');
});

test("report includes title, highlighted transcript and timestamp", () => {
  const html = renderReport(MIXED, {
    sizeUnit: "words",
    transcriptText: "Revenue growth was strong. Headwinds remain a concern",
    generatedAt: new Date("2024-05-01T12:00:00.000Z"),
  });

  expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
  expect(html).toContain(`<h1>${DEFAULT_REPORT_TITLE}</h1>`);
  expect(html).toContain('<span class="positive-sentence">Revenue growth was strong.</span>');
  expect(html).toContain('<span class="negative-sentence">Headwinds remain a concern.</span>');
  expect(html).toContain("<footer>Generated 2024-05-01T12:00:00.000Z</footer>");
});

test("writeReport creates parent directories", () => {
  const target = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "sentiment-report-")), "a", "b", "report.html");
  const written = writeReport(target, "<html></html>");

  expect(written).toBe(path.resolve(target));
  expect(fs.readFileSync(written, "utf-8")).toBe("<html></html>");
});
