#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { aggregate } from "../analysis/aggregate.js";
import { SqliteAnalysisCache } from "../analysis/cache.js";
import {
  analysisJsonFilename,
  readAnalysisJson,
  readTranscript,
  reportFilename,
  slugFromTranscriptPath,
  writeAnalysisJson,
} from "../analysis/io.js";
import { loadConfig, printConfigSnapshot, type EnvSource } from "../config/env.js";
import type { Config } from "../config/types.js";
import { ConfigurationError, EmptyResultError } from "../errors.js";
import { createLlmCall } from "../llm/client.js";
import { createOracleClient } from "../oracle/oracleClient.js";
import { runPipeline, pipelineSettingsFromConfig, type PipelineOutput } from "../pipeline/runPipeline.js";
import { renderReport, writeReport } from "../report/renderReport.js";
import { log } from "../utils/logger.js";
import { slugify } from "../utils/slugify.js";
import { outcomeForError } from "./cliOutcome.js";

const cliLog = log.withScope("cli");

type Args = {
  inputPath: string | null;
  outputPath: string | null;
  jsonPath: string | null;
  fromJsonPath: string | null;
  title: string | null;
  clearCache: boolean;
  /** Flag values layered over the environment before loadConfig validates them. */
  env: EnvSource;
};

const USAGE = `Usage: analyze-transcript --input <transcript.txt> [options]

  --input <path>           transcript text file
  --output <path>          report HTML path (default: <REPORTS_DIR>/<slug>_report.html)
  --json <path>            results JSON path (default: <OUTPUT_DIR>/<slug>_analysis_results.json)
  --mode <mode>            chunked | discovered | custom | fixed
  --custom-topics <list>   comma separated topic labels (implies custom mode)
  --size-unit <unit>       minutes | words
  --wpm <n>                speaking rate for minute estimates
  --max-topics <n>         keep the N largest topics
  --model <name>           chat model
  --title <text>           report title
  --no-cache               skip the analysis cache
  --clear-cache            empty the analysis cache
  --from-json <path>       re-render a saved results file without calling the model`;

function parseArgs(): Args {
  const argv = process.argv.slice(2);

  const args: Args = {
    inputPath: null,
    outputPath: null,
    jsonPath: null,
    fromJsonPath: null,
    title: null,
    clearCache: false,
    env: {},
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    const hasValue = next !== undefined && !next.startsWith("--");

    if (arg === "--help" || arg === "-h") {
      console.log(USAGE);
      process.exit(0);
    } else if (arg === "--no-cache") {
      args.env.CACHE_ENABLED = "false";
    } else if (arg === "--clear-cache") {
      args.clearCache = true;
    } else if (!hasValue) {
      throw new ConfigurationError(`Missing value for ${arg} (see --help)`);
    } else {
      i++;
      switch (arg) {
        case "--input":
          args.inputPath = next;
          break;
        case "--output":
          args.outputPath = next;
          break;
        case "--json":
          args.jsonPath = next;
          break;
        case "--from-json":
          args.fromJsonPath = next;
          break;
        case "--title":
          args.title = next;
          break;
        case "--mode":
          args.env.ANALYSIS_MODE = next;
          break;
        case "--custom-topics":
          args.env.CUSTOM_TOPICS = next;
          break;
        case "--size-unit":
          args.env.SIZE_UNIT = next;
          break;
        case "--wpm":
          args.env.WORDS_PER_MINUTE = next;
          break;
        case "--max-topics":
          args.env.MAX_TOPICS = next;
          break;
        case "--model":
          args.env.LLM_MODEL = next;
          break;
        default:
          throw new ConfigurationError(`Unknown argument: ${arg} (see --help)`);
      }
    }
  }

  return args;
}

function clearCache(cfg: Config): void {
  const cache = new SqliteAnalysisCache(cfg.cache.dbPath);
  try {
    const removed = cache.clear();
    console.log(`✅ Cleared ${removed} cached analys${removed === 1 ? "is" : "es"} from ${path.resolve(cfg.cache.dbPath)}`);
  } finally {
    cache.close();
  }
}

function rerenderFromJson(cfg: Config, args: Args, fromJsonPath: string): void {
  const { records, sizeUnit } = readAnalysisJson(fromJsonPath);
  const result = aggregate(records, cfg.analysis.maxTopics);
  if (result.length === 0) {
    throw new EmptyResultError();
  }

  const slug = slugify(path.basename(fromJsonPath, ".json").replace(/_analysis_results$/, ""));
  const transcriptText = args.inputPath ? readTranscript(args.inputPath) : undefined;

  const html = renderReport(result, {
    sizeUnit,
    title: args.title ?? undefined,
    transcriptText,
  });
  const reportPath = writeReport(args.outputPath ?? path.join(cfg.paths.reportsDir, reportFilename(slug)), html);

  console.log(`✅ Report re-rendered from ${path.resolve(fromJsonPath)}: ${reportPath}`);
}

async function analyze(cfg: Config, args: Args, inputPath: string): Promise<void> {
  const text = readTranscript(inputPath);
  const slug = slugFromTranscriptPath(inputPath);
  const settings = pipelineSettingsFromConfig(cfg);

  const oracle = createOracleClient(
    {
      model: settings.model,
      sizeUnit: settings.sizeUnit,
      maxTranscriptChars: settings.maxTranscriptChars,
    },
    { callLlm: createLlmCall(cfg) },
  );

  const cache = cfg.cache.enabled ? new SqliteAnalysisCache(cfg.cache.dbPath) : null;
  let output: PipelineOutput;
  try {
    output = await runPipeline({ text, settings }, { oracle, cache });
  } finally {
    cache?.close();
  }

  const jsonPath = writeAnalysisJson(
    args.jsonPath ?? path.join(cfg.paths.outputDir, analysisJsonFilename(slug)),
    output.result,
    output.sizeUnit,
  );

  const html = renderReport(output.result, {
    sizeUnit: output.sizeUnit,
    title: args.title ?? undefined,
    transcriptText: text,
    sizeCheck: output.sizeCheck,
    fallbackCount: output.fallbackCount,
  });
  const reportPath = writeReport(args.outputPath ?? path.join(cfg.paths.reportsDir, reportFilename(slug)), html);

  if (output.cacheHit) {
    console.log("ℹ️  Served from analysis cache (use --no-cache to re-run the model)");
  }
  if (output.fallbackCount > 0) {
    console.log(`⚠️  ${output.fallbackCount} oracle response(s) fell back; see the report's rationale column`);
  }
  console.log(`✅ Results written: ${jsonPath}`);
  console.log(`✅ Report written: ${reportPath}`);
}

async function main(): Promise<void> {
  const args = parseArgs();
  const cfg = loadConfig({ ...process.env, ...args.env });

  log.configure(cfg.logging);
  printConfigSnapshot(cfg);

  if (args.clearCache) {
    clearCache(cfg);
    if (!args.inputPath && !args.fromJsonPath) return;
  }

  if (args.fromJsonPath) {
    rerenderFromJson(cfg, args, args.fromJsonPath);
    return;
  }

  if (!args.inputPath) {
    throw new ConfigurationError(`Missing required argument: --input <transcript.txt> (see --help)`);
  }

  cliLog.debug("starting analysis", { input: path.resolve(args.inputPath), mode: cfg.analysis.mode });
  await analyze(cfg, args, args.inputPath);
}

main().catch((err) => {
  const outcome = outcomeForError(err);
  if (outcome.stream === "stdout") console.log(outcome.message);
  else console.error(outcome.message);
  process.exit(outcome.exitCode);
});
