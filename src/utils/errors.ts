/**
 * Error taxonomy.
 *
 * Fatal errors abort the whole run with exit status 1. Everything else is
 * caught per item by the publish pipeline, logged, and the item is skipped.
 */

export class TapecastError extends Error {
  readonly fatal: boolean = false;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'TapecastError';
  }
}

// ── Fatal ─────────────────────────────────────────────────────────────────────

export class ConfigError extends TapecastError {
  override readonly fatal = true;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export class StateFileError extends TapecastError {
  override readonly fatal = true;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'StateFileError';
  }
}

/** A run precondition is not met: missing --only file, missing secrets, empty image pool. */
export class PreconditionError extends TapecastError {
  override readonly fatal = true;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'PreconditionError';
  }
}

export class EncoderMissingError extends TapecastError {
  override readonly fatal = true;

  constructor(binary: string, cause?: unknown) {
    super(`Encoder binary not found: ${binary}`, cause);
    this.name = 'EncoderMissingError';
  }
}

export class AuthError extends TapecastError {
  override readonly fatal = true;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'AuthError';
  }
}

// ── Per item ──────────────────────────────────────────────────────────────────

export class RenderError extends TapecastError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string,
  ) {
    super(message);
    this.name = 'RenderError';
  }
}

export class YouTubeApiError extends TapecastError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function isFatal(err: unknown): boolean {
  return err instanceof TapecastError && err.fatal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
