import type { LogFormat, LogLevel } from "../utils/logger.js";

export type { LogFormat, LogLevel };

export type AnalysisMode = "chunked" | "discovered" | "custom" | "fixed";
export type SizeUnit = "minutes" | "words";

export interface Config {
  openai: {
    apiKey?: string;
  };

  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
    jsonMode: boolean;
  };

  analysis: {
    mode: AnalysisMode;
    customTopics?: string[];
    wordsPerMinute: number;
    maxTopics: number;
    chunkMaxWords: number;
    sizeUnit: SizeUnit;
    maxTranscriptChars: number;
    sizeDeviationTolerance: number;
  };

  paths: {
    outputDir: string;
    reportsDir: string;
  };

  cache: {
    enabled: boolean;
    dbPath: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
