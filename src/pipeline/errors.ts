/**
 * Error taxonomy for short builds.
 *
 * Component boundaries return a {@link Result} carrying one of these instead of
 * throwing, so a batch can move on to the next video. Anything that is not a
 * ShortsError is a programming error and is allowed to propagate.
 */

export type ShortsErrorCode =
  | 'missing_input'
  | 'external_tool_failure'
  | 'constraint_violation'
  | 'persistence_failure';

/**
 * Base class for all build errors
 */
export class ShortsError extends Error {
  readonly code: ShortsErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: ShortsErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ShortsError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name}: ${this.message} (code: ${this.code})`;
  }
}

/**
 * A required upstream artifact is absent: transcript, narration audio or
 * background footage after the whole fallback chain. Not retried in the same run.
 */
export class MissingInputError extends ShortsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'missing_input', details);
    this.name = 'MissingInputError';
  }
}

export interface ToolFailureInfo {
  tool: string;
  stage: string;
  exitCode: number | null;
  timedOut: boolean;
  stderr: string;
}

/**
 * The media toolkit exited non-zero or timed out
 */
export class ExternalToolFailure extends ShortsError {
  readonly tool: string;
  readonly stage: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;
  readonly stderr: string;

  constructor(message: string, info: ToolFailureInfo) {
    super(message, 'external_tool_failure', { ...info });
    this.name = 'ExternalToolFailure';
    this.tool = info.tool;
    this.stage = info.stage;
    this.exitCode = info.exitCode;
    this.timedOut = info.timedOut;
    this.stderr = info.stderr;
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`, `(stage: ${this.stage})`];
    if (this.timedOut) parts.push('(timed out)');
    else if (this.exitCode !== null) parts.push(`(exit: ${this.exitCode})`);
    return parts.join(' ');
  }
}

/**
 * Normalization cannot fit the clip inside the platform bounds
 */
export class ConstraintViolation extends ShortsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'constraint_violation', details);
    this.name = 'ConstraintViolation';
  }
}

/**
 * The store write failed after the media build succeeded: the file exists on
 * disk but is not recorded.
 */
export class PersistenceFailure extends ShortsError {
  readonly outputPath: string;

  constructor(message: string, outputPath: string, details?: Record<string, unknown>) {
    super(message, 'persistence_failure', { outputPath, ...details });
    this.name = 'PersistenceFailure';
    this.outputPath = outputPath;
  }
}

export type Result<T, E extends ShortsError = ShortsError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends ShortsError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
