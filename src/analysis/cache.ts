import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { log } from "../utils/logger.js";
import type { AnalysisResult } from "./types.js";

const cacheLog = log.withScope("cache");

const CACHE_FORMAT_VERSION = 1;

/**
 * Stores finished analysis results keyed by transcript content plus every setting that
 * shapes the result. Invalidation is explicit: delete(key) or clear().
 */
export interface AnalysisCache {
  get(key: string): AnalysisResult | null;
  put(key: string, value: AnalysisResult): void;
  delete(key: string): boolean;
  clear(): number;
  close(): void;
}

export type CacheKeyInput = {
  mode: string;
  topics?: readonly string[];
  model: string;
  sizeUnit: string;
  wordsPerMinute: number;
  maxTopics: number;
  chunkMaxWords: number;
  maxTranscriptChars: number;
};

export function analysisCacheKey(text: string, settings: CacheKeyInput): string {
  return createHash("sha256")
    .update(
      JSON.stringify({
        v: CACHE_FORMAT_VERSION,
        text,
        mode: settings.mode,
        topics: settings.topics ?? null,
        model: settings.model,
        sizeUnit: settings.sizeUnit,
        wordsPerMinute: settings.wordsPerMinute,
        maxTopics: settings.maxTopics,
        chunkMaxWords: settings.chunkMaxWords,
        maxTranscriptChars: settings.maxTranscriptChars,
      }),
    )
    .digest("hex");
}

const CACHE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS analysis_cache (
  cache_key TEXT PRIMARY KEY,
  payload TEXT NOT NULL,
  created_at_ms INTEGER NOT NULL
);`;

const CachedRecordsSchema = z.array(
  z.object({
    topic: z.string().min(1),
    sentiment: z.number().finite().min(-1).max(1),
    sizeMetric: z.number().finite().nonnegative(),
    rationale: z.string(),
  }),
);

export class SqliteAnalysisCache implements AnalysisCache {
  private readonly db: Database.Database;

  /** Pass ":memory:" for a throwaway cache. */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(CACHE_SCHEMA_SQL);
  }

  get(key: string): AnalysisResult | null {
    const row = this.db
      .prepare<[string], { payload: string }>(`SELECT payload FROM analysis_cache WHERE cache_key = ?`)
      .get(key);

    if (!row) {
      cacheLog.debug("MISS", { key: key.slice(0, 12) });
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload);
    } catch (err) {
      cacheLog.warn("corrupt cache row treated as miss", {
        key: key.slice(0, 12),
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    const parsed = CachedRecordsSchema.safeParse(payload);
    if (!parsed.success) {
      cacheLog.warn("cache row failed validation, treated as miss", { key: key.slice(0, 12) });
      return null;
    }

    cacheLog.debug("HIT", { key: key.slice(0, 12), topics: parsed.data.length });
    return Object.freeze(parsed.data.map((record) => Object.freeze(record)));
  }

  put(key: string, value: AnalysisResult): void {
    const payload = value.map((record) => ({
      topic: record.topic,
      sentiment: record.sentiment,
      sizeMetric: record.sizeMetric,
      rationale: record.rationale,
    }));

    this.db
      .prepare<[string, string, number]>(
        `INSERT OR REPLACE INTO analysis_cache (cache_key, payload, created_at_ms) VALUES (?, ?, ?)`,
      )
      .run(key, JSON.stringify(payload), Date.now());
  }

  delete(key: string): boolean {
    const info = this.db.prepare<[string]>(`DELETE FROM analysis_cache WHERE cache_key = ?`).run(key);
    return info.changes > 0;
  }

  clear(): number {
    return this.db.prepare(`DELETE FROM analysis_cache`).run().changes;
  }

  close(): void {
    this.db.close();
  }
}
