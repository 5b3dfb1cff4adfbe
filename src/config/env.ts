import { ConfigurationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { AnalysisMode, Config, LogFormat, LogLevel, SizeUnit } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

export type EnvSource = Record<string, string | undefined>;

function opt(env: EnvSource, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(env: EnvSource, name: string, def: number, min = 0): number {
  const v = opt(env, name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigurationError(`Invalid integer for ${name}: ${v} (expected >= ${min})`);
  }
  return n;
}

function optFloat(env: EnvSource, name: string, def: number): number {
  const v = opt(env, name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new ConfigurationError(`Invalid number for ${name}: ${v}`);
  return n;
}

function optBool(env: EnvSource, name: string, def: boolean): boolean {
  const v = opt(env, name);
  if (!v) return def;
  if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
  throw new ConfigurationError(`Invalid boolean for ${name}: ${v}`);
}

function enumOf<T extends string>(env: EnvSource, name: string, allowed: readonly T[], def: T): T {
  const v = opt(env, name);
  if (!v) return def;
  const match = allowed.find((candidate) => candidate === v);
  if (match) return match;
  throw new ConfigurationError(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function parseTopicList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const topics = value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return topics.length > 0 ? [...new Set(topics)] : undefined;
}

export function loadConfig(env: EnvSource): Config {
  const customTopics = parseTopicList(opt(env, "CUSTOM_TOPICS"));
  const mode = enumOf<AnalysisMode>(
    env,
    "ANALYSIS_MODE",
    ["chunked", "discovered", "custom", "fixed"] as const,
    customTopics ? "custom" : "discovered",
  );

  if (mode === "custom" && !customTopics) {
    throw new ConfigurationError("ANALYSIS_MODE=custom requires CUSTOM_TOPICS (comma separated).");
  }

  const tolerance = optFloat(env, "SIZE_DEVIATION_TOLERANCE", 0.25);
  if (tolerance < 0) {
    throw new ConfigurationError(`Invalid value for SIZE_DEVIATION_TOLERANCE: ${tolerance}`);
  }

  return {
    openai: {
      apiKey: opt(env, "OPENAI_API_KEY"),
    },

    llm: {
      model: opt(env, "LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat(env, "LLM_TEMPERATURE", 0.2),
      maxTokens: optInt(env, "LLM_MAX_TOKENS", 1500, 1),
      jsonMode: optBool(env, "LLM_JSON_MODE", true),
    },

    analysis: {
      mode,
      customTopics,
      wordsPerMinute: optInt(env, "WORDS_PER_MINUTE", 155, 1),
      maxTopics: optInt(env, "MAX_TOPICS", 10, 1),
      chunkMaxWords: optInt(env, "CHUNK_MAX_WORDS", 180, 1),
      sizeUnit: enumOf<SizeUnit>(env, "SIZE_UNIT", ["minutes", "words"] as const, "minutes"),
      maxTranscriptChars: optInt(env, "MAX_TRANSCRIPT_CHARS", 60000, 1),
      sizeDeviationTolerance: tolerance,
    },

    paths: {
      outputDir: opt(env, "OUTPUT_DIR") ?? "output",
      reportsDir: opt(env, "REPORTS_DIR") ?? "reports",
    },

    cache: {
      enabled: optBool(env, "CACHE_ENABLED", true),
      dbPath: opt(env, "CACHE_DB_PATH") ?? "data/analysis-cache.sqlite",
    },

    logging: {
      level: enumOf<LogLevel>(env, "LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt(env, "LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>(env, "LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

export function requireApiKey(cfg: Config): string {
  if (!cfg.openai.apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not set. Add it to your environment or .env file.");
  }
  return cfg.openai.apiKey;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    OPENAI_API_KEY: cfg.openai.apiKey,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    LLM_JSON_MODE: cfg.llm.jsonMode,
    ANALYSIS_MODE: cfg.analysis.mode,
    CUSTOM_TOPICS: cfg.analysis.customTopics?.join(",") ?? "",
    WORDS_PER_MINUTE: cfg.analysis.wordsPerMinute,
    MAX_TOPICS: cfg.analysis.maxTopics,
    CHUNK_MAX_WORDS: cfg.analysis.chunkMaxWords,
    SIZE_UNIT: cfg.analysis.sizeUnit,
    MAX_TRANSCRIPT_CHARS: cfg.analysis.maxTranscriptChars,
    SIZE_DEVIATION_TOLERANCE: cfg.analysis.sizeDeviationTolerance,
    OUTPUT_DIR: cfg.paths.outputDir,
    REPORTS_DIR: cfg.paths.reportsDir,
    CACHE_ENABLED: cfg.cache.enabled,
    CACHE_DB_PATH: cfg.cache.dbPath,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  log.debug("config snapshot", "config", snap);
}
