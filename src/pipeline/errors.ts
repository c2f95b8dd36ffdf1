/**
 * Error classes for the track splitter
 */

/**
 * Base class for all splitter errors
 */
export class SplitError extends Error {
  code?: string;
  details?: Record<string, unknown>;

  constructor(message: string, code?: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SplitError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.code) {
      parts.push(`(code: ${this.code})`);
    }
    return parts.join(' ');
  }
}

/**
 * The WAV file is too short or not 16-bit single-chunk PCM
 */
export class FormatError extends SplitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'format', details);
    this.name = 'FormatError';
  }
}

/**
 * No "Playing" event exists at or after the recording start hint
 */
export class AlignmentAmbiguityError extends SplitError {
  hint: number;

  constructor(message: string, hint: number) {
    super(message, 'alignment', { hint });
    this.name = 'AlignmentAmbiguityError';
    this.hint = hint;
  }
}

export interface MissingBoundary {
  /** Event time relative to the corrected recording start, in seconds */
  at: number;
  title: string;
}

/**
 * At least one track change had no silent window within the look-back range
 */
export class SilenceNotFoundError extends SplitError {
  missing: MissingBoundary[];

  constructor(message: string, missing: MissingBoundary[]) {
    super(message, 'silence', { missing });
    this.name = 'SilenceNotFoundError';
    this.missing = missing;
  }
}

/**
 * The external encoder failed to start or exited non-zero
 */
export class EncodeError extends SplitError {
  exitCode?: number;
  stderr?: string;

  constructor(message: string, exitCode?: number, stderr?: string) {
    super(message, 'encode', { exitCode, stderr });
    this.name = 'EncodeError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class CancelledError extends SplitError {
  constructor(message = 'Run cancelled') {
    super(message, 'cancelled');
    this.name = 'CancelledError';
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export function describeError(e: unknown): string {
  if (e instanceof SplitError) return e.toString();
  return e instanceof Error ? e.message : String(e);
}
