/**
 * Error taxonomy of the redaction core.
 * Messages must never contain analyzed text: they end up in logs.
 */

export type ErrorCode =
  | "recognizer_failure"
  | "model_unavailable"
  | "resolution_failure"
  | "replacement_failure"
  | "input_validation_failure"
  | "config_error";

export abstract class RedactionError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One detection method threw or timed out. Absorbed by the chain. */
export class RecognizerFailure extends RedactionError {
  readonly code = "recognizer_failure";

  constructor(
    readonly recognizer: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${recognizer}: ${message}`, options);
  }
}

/** The NER capability could not be initialized. Absorbed into DEGRADED mode. */
export class ModelUnavailable extends RedactionError {
  readonly code = "model_unavailable";
}

export class ResolutionFailure extends RedactionError {
  readonly code = "resolution_failure";
}

export class ReplacementFailure extends RedactionError {
  readonly code = "replacement_failure";
}

/** Request rejected at the HTTP or CLI boundary; `fields` names the offending keys only. */
export class InputValidationFailure extends RedactionError {
  readonly code = "input_validation_failure";

  constructor(readonly fields: string[]) {
    super(`invalid request: ${fields.join(", ") || "body"}`);
  }
}

export class ConfigError extends RedactionError {
  readonly code = "config_error";
}

/** Log-safe description of anything thrown: name and code, never the message of foreign errors. */
export function describeError(err: unknown): { name: string; code?: string; message?: string } {
  if (err instanceof RedactionError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { name: err.name };
  }
  return { name: typeof err };
}
