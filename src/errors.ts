export type CodecErrorKind =
  | 'InsufficientData'
  | 'Overflow'
  | 'NonCanonicalEncoding'
  | 'SizeLimitExceeded'
  | 'TypeMismatch';

export type CodecErrorContext = Readonly<Record<string, string | number | boolean>>;

/**
 * Raised by every encode/decode failure. A codec error always aborts the
 * value being processed; the library never retries or recovers from one.
 */
export class CodecError extends Error {
  readonly kind: CodecErrorKind;
  readonly context: CodecErrorContext;

  constructor(kind: CodecErrorKind, message: string, context: CodecErrorContext = {}) {
    super(message);
    this.name = 'CodecError';
    this.kind = kind;
    this.context = Object.freeze({ ...context });

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CodecError);
    }
  }
}

/** Type guard: checks if a value is a CodecError, optionally of a given kind. */
export function isCodecError(value: unknown, kind?: CodecErrorKind): value is CodecError {
  return value instanceof CodecError && (kind === undefined || value.kind === kind);
}
