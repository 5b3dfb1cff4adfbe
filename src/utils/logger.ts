/**
 * Centralized logging for the analysis pipeline.
 *
 * Configured once from `Config.logging` (see config/env.ts):
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=oracle,llm,aggregate,cache,pipeline,report,cli,config
 *      (optional, default: all scopes allowed)
 *   LOG_FORMAT=pretty|json  (default: pretty)
 *
 * Example Usage:
 *   LOG_LEVEL=debug LOG_SCOPES=oracle,llm  npm run analyze -- --input call.txt
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";
export type LogScope =
  | "config"
  | "oracle"
  | "llm"
  | "aggregate"
  | "cache"
  | "pipeline"
  | "report"
  | "cli"
  | string;

export interface LoggerOptions {
  level: LogLevel;
  scopes?: string[];
  format: LogFormat;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_ABBR: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
};

class Logger {
  private level: number = LOG_LEVELS.info;
  private scopes: Set<string> = new Set();
  private format: LogFormat = "pretty";

  configure(opts: LoggerOptions): void {
    this.level = LOG_LEVELS[opts.level];
    this.scopes = new Set((opts.scopes ?? []).map((s) => s.trim()).filter((s) => s));
    this.format = opts.format;
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    if (LOG_LEVELS[level] < this.level) return false;

    // Empty scope set means everything passes
    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) {
      return false;
    }

    return true;
  }

  private formatOutput(entry: LogEntry): string {
    if (this.format === "json") {
      return JSON.stringify(entry);
    }

    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
    const dataStr = entry.data !== undefined ? ` │ ${JSON.stringify(entry.data)}` : "";

    return `${time} [${LEVEL_ABBR[entry.level]}]${scopeStr} ${entry.message}${dataStr}`;
  }

  private emit(entry: LogEntry): void {
    const output = this.formatOutput(entry);

    switch (entry.level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "info":
      case "debug":
        console.log(output);
        break;
      case "trace":
        console.debug(output);
        break;
    }
  }

  private write(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.shouldLog(level, scope)) return;
    this.emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.write("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.write("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.write("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.write("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.write("error", message, scope, data);
  }

  /**
   * Create a scoped logger that automatically includes a scope in all messages.
   * Usage: const oracleLog = log.withScope("oracle");
   *        oracleLog.debug("message") -> logs with scope="oracle"
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

/**
 * A logger bound to a specific scope.
 */
export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

export const log = new Logger();
export default log;
