/**
 * Error taxonomy for trial setup, oracle calls, persistence and aggregation.
 */

export type ExperimentErrorCode =
  | "invalid_task"
  | "malformed_response"
  | "strategy_choice_mismatch"
  | "result_log_write"
  | "aggregation_key"
  | "oracle_unavailable"
  | "protocol_sequence"
  | "config";

export class ExperimentError extends Error {
  readonly code: ExperimentErrorCode;

  constructor(code: ExperimentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed payoff/threshold configuration. Fatal before any oracle call. */
export class InvalidTaskError extends ExperimentError {
  constructor(message: string) {
    super("invalid_task", `Invalid task: ${message}`);
  }
}

export class MalformedResponseError extends ExperimentError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super("malformed_response", `Malformed oracle response: ${message}`);
    this.raw = raw;
  }
}

export class StrategyChoiceMismatchError extends ExperimentError {
  constructor(
    readonly choice: string,
    readonly strategy: string,
    readonly expected: string,
  ) {
    super(
      "strategy_choice_mismatch",
      `Choice "${choice}" implies ${expected} strategy, got "${strategy}"`,
    );
  }
}

export class ResultLogWriteError extends ExperimentError {
  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("result_log_write", `Failed to append to ${path}: ${detail}`, { cause });
  }
}

export class AggregationKeyError extends ExperimentError {
  constructor(message: string) {
    super("aggregation_key", message);
  }
}

/** Gateway returned nothing usable after all retries; the trial is abandoned. */
export class OracleUnavailableError extends ExperimentError {
  constructor(step: string) {
    super("oracle_unavailable", `Oracle unavailable during ${step}`);
  }
}

export class ProtocolSequenceError extends ExperimentError {
  constructor(expected: string, actual: string) {
    super("protocol_sequence", `Protocol out of order: expected ${expected}, got ${actual}`);
  }
}

export class ConfigError extends ExperimentError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid experiment config: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
