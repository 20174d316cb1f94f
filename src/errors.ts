/**
 * Error taxonomy for devscore.
 *
 * Data source failures surface as FetchError, an empty repository list as
 * PreconditionError. analyze() wraps either into AnalysisError, which is
 * the only kind callers need to catch.
 */

export class DevscoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface FetchErrorDetails {
  endpoint: string;
  status?: number;
  cause?: unknown;
}

export class FetchError extends DevscoreError {
  readonly endpoint: string;
  readonly status?: number;

  constructor(message: string, details: FetchErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.endpoint = details.endpoint;
    this.status = details.status;
  }
}

export class PreconditionError extends DevscoreError {}

export class TimestampError extends DevscoreError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`Malformed timestamp in ${field}: ${JSON.stringify(value)}`);
    this.field = field;
    this.value = value;
  }
}

export class ConfigError extends DevscoreError {}

export class AnalysisError extends DevscoreError {
  constructor(cause: Error) {
    super(`Analysis failed: ${cause.message}`, { cause });
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
