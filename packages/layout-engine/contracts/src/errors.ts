/** Error codes used by {@link LayoutError}. */
export type LayoutErrorCode =
  | 'INVALID_GEOMETRY'
  | 'INVALID_LAYOUT_KEY'
  | 'PARSE_FAILED'
  | 'EMPTY_FORMATTING'
  | 'CACHE_WRITE_FAILED';

/**
 * Structured error raised by the layout core.
 *
 * Nearly every failure inside the core degrades locally; the one that reaches
 * callers is `INVALID_GEOMETRY` (non-positive or non-finite width/height).
 * Consumers should prefer checking `error.code` over `instanceof`.
 */
export class LayoutError extends Error {
  readonly code: LayoutErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LayoutErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LayoutError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, LayoutError.prototype);
  }
}

/** Raised by chapter parsers on malformed markup. */
export class ParseError extends LayoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_FAILED', message, details);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

export function isLayoutError(error: unknown): error is LayoutError {
  return error instanceof LayoutError;
}

export function toLayoutError(error: unknown, fallback: LayoutErrorCode = 'PARSE_FAILED'): LayoutError {
  if (error instanceof LayoutError) return error;

  if (error instanceof Error) {
    return new LayoutError(fallback, error.message, { name: error.name });
  }

  return new LayoutError(fallback, 'Unknown error', { error });
}
