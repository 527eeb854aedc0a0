/**
 * Error taxonomy for the research workflow.
 *
 * Every error raised by the store, the stage adapters or the coordinator
 * extends PipelineError and carries:
 *
 *   - code       a stable string for programmatic handling
 *   - retryable  whether a retry with the same input may succeed
 *
 * Only TransientError (and its StageTimeoutError subclass) is retryable.
 * Validation, lookup, duplicate and storage failures are final for the
 * operation that raised them.
 */

import type { ZodIssue } from "zod";

export type PipelineErrorCode =
  | "VALIDATION"
  | "TRANSIENT"
  | "TIMEOUT"
  | "NOT_FOUND"
  | "DUPLICATE"
  | "STORAGE"
  | "CANCELLED";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Individual validation issue.
 */
export interface ValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "custom" for hand-written checks */
  code: string;
}

/**
 * Bad caller input. Never retried.
 */
export class ValidationError extends PipelineError {
  readonly code = "VALIDATION";
  readonly retryable = false;
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: readonly ZodIssue[]): ValidationIssue[] {
  return zodIssues.map((issue) => ({
    // Symbols never appear in JSON-shaped input
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Build a ValidationError from a failed zod parse.
 */
export function validationErrorFromZod(
  subject: string,
  zodIssues: readonly ZodIssue[]
): ValidationError {
  const issues = formatZodIssues(zodIssues);
  const summary = issues
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
  return new ValidationError(`Invalid ${subject}: ${summary}`, issues);
}

// ---------------------------------------------------------------------------
// Transient failures
// ---------------------------------------------------------------------------

/**
 * Timeouts and transport failures. Retried up to the configured limit.
 */
export class TransientError extends PipelineError {
  readonly code: PipelineErrorCode = "TRANSIENT";
  readonly retryable = true;
}

export class StageTimeoutError extends TransientError {
  override readonly code: PipelineErrorCode = "TIMEOUT";

  constructor(
    public readonly stage: string,
    public readonly timeoutMs: number
  ) {
    super(`Stage "${stage}" timed out after ${timeoutMs}ms`);
  }
}

// ---------------------------------------------------------------------------
// Lookup / conflict / storage
// ---------------------------------------------------------------------------

export type EntityKind = "source" | "collection" | "run";

export class NotFoundError extends PipelineError {
  readonly code = "NOT_FOUND";
  readonly retryable = false;

  constructor(
    public readonly entity: EntityKind,
    public readonly id: string
  ) {
    super(`${entity[0].toUpperCase()}${entity.slice(1)} not found: ${id}`);
  }
}

export type DuplicateReason = "url" | "content" | "id";

/**
 * Raised only by strict inserts. Batch ingest reports duplicates instead.
 */
export class DuplicateError extends PipelineError {
  readonly code = "DUPLICATE";
  readonly retryable = false;

  constructor(
    public readonly subject: string,
    public readonly duplicateOf: string,
    public readonly reason: DuplicateReason
  ) {
    super(`Duplicate ${reason} for ${subject} (existing: ${duplicateOf})`);
  }
}

/**
 * Underlying persistence failure. Not retried automatically.
 */
export class StorageError extends PipelineError {
  readonly code = "STORAGE";
  readonly retryable = false;

  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Storage failure during ${operation}: ${describeError(cause)}`, { cause });
  }
}

/**
 * Work abandoned because its owner shut down.
 */
export class CancelledError extends PipelineError {
  readonly code = "CANCELLED";
  readonly retryable = false;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function isRetryableError(err: unknown): boolean {
  return isPipelineError(err) && err.retryable;
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
