import type { Difficulty } from "./types";

/**
 * A provider could not be reached, answered with a non-2xx status, was
 * rate-limited, or returned a body we could not make sense of.
 */
export class TransportError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(
    provider: string,
    message: string,
    options?: { status?: number | null; cause?: unknown },
  ) {
    super(`${provider}: ${message}`, { cause: options?.cause });
    this.name = "TransportError";
    this.provider = provider;
    this.status = options?.status ?? null;
  }
}

/** The generated text did not contain decodable JSON. */
export class MalformedResponseError extends Error {
  constructor(message = "No valid JSON found in response") {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export type SchemaViolationReason =
  | "wrong_shape"
  | "missing_field"
  | "empty_field"
  | "wrong_option_count"
  | "duplicate_options"
  | "answer_not_in_options"
  | "duplicate_question";

/**
 * Decoded JSON that does not match the question-set schema.
 * `tier` and `index` point at the offending question where there is one.
 */
export class SchemaViolationError extends Error {
  readonly reason: SchemaViolationReason;
  readonly tier: Difficulty | null;
  readonly index: number | null;
  readonly field: string | null;

  constructor(
    reason: SchemaViolationReason,
    message: string,
    location?: { tier?: Difficulty; index?: number; field?: string },
  ) {
    const where =
      location?.tier !== undefined
        ? ` at ${location.tier}[${location.index ?? "?"}]${location.field ? `.${location.field}` : ""}`
        : "";
    super(`${reason}${where}: ${message}`);
    this.name = "SchemaViolationError";
    this.reason = reason;
    this.tier = location?.tier ?? null;
    this.index = location?.index ?? null;
    this.field = location?.field ?? null;
  }
}

export type ValidationError = MalformedResponseError | SchemaViolationError;

export type AttemptError = TransportError | ValidationError;

/** Terminal: every generation attempt for an album failed. */
export class ExhaustedRetriesError extends Error {
  readonly attempts: number;
  readonly lastError: AttemptError;

  constructor(attempts: number, lastError: AttemptError) {
    super(
      `Giving up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`,
    );
    this.name = "ExhaustedRetriesError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for a Node system error with the given `code` (ENOENT, EXDEV, ...). */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
