export type AnalysisErrorCode =
  | "PARSE_ERROR"
  | "SERVICE_ERROR"
  | "TIMEOUT_ERROR"
  | "CONFIGURATION_ERROR";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(
    code: AnalysisErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Generation output could not be mapped to the indicator schema.
 */
export class ParseError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_ERROR", message, options);
  }
}

/**
 * An external capability (retrieval, embedding, generation) failed.
 */
export class ServiceError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SERVICE_ERROR", message, options);
  }
}

export class TimeoutError extends AnalysisError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super("TIMEOUT_ERROR", message);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Malformed rubric data or settings. Fatal at startup.
 */
export class ConfigurationError extends AnalysisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      "CONFIGURATION_ERROR",
      issues.length > 0 ? `${message}: ${issues.join("; ")}` : message
    );
    this.issues = issues;
  }
}

export function isTransientError(err: unknown): boolean {
  return err instanceof ServiceError || err instanceof TimeoutError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
