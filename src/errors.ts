export class AnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** A required setting is missing or malformed. Raised before any oracle call. */
export class ConfigurationError extends AnalysisError {}

/** The transcript is empty, whitespace-only or unreadable. */
export class NoContentError extends AnalysisError {
  constructor(message = "Transcript contains no analyzable text.") {
    super(message);
  }
}

export class EmptyResultError extends AnalysisError {
  constructor(message = "No data produced from transcript.") {
    super(message);
  }
}

export class RenderError extends AnalysisError {
  constructor(message = "No data to plot.") {
    super(message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return JSON.stringify(err) ?? String(err);
}
