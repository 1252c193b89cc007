/**
 * Error taxonomy
 *
 * - Recoverable per span: TokenRestoreError, TranslationError (caller keeps the original text)
 * - Recoverable per file: UnsupportedFormatError, ReinjectionError VerificationFailed / GrowthUnsupported
 * - Fatal per file: ReinjectionError OffsetOutOfBounds (file is left untouched)
 */

/**
 * Translated text lost or duplicated one of the protected-token sentinels
 */
export class TokenRestoreError extends Error {
  constructor(
    public readonly expected: number,
    public readonly found: number,
    message?: string
  ) {
    super(message ?? `Expected ${expected} protected tokens in translation, found ${found}`);
    this.name = 'TokenRestoreError';
  }
}

export type TranslationErrorKind = 'Exhausted' | 'Permanent';

/**
 * Translation could not be obtained; callers skip the span
 */
export class TranslationError extends Error {
  constructor(
    public readonly kind: TranslationErrorKind,
    message: string,
    public readonly attempts: number
  ) {
    super(message);
    this.name = 'TranslationError';
  }
}

/**
 * Failure reported by a translation service client
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

/**
 * No parser path could produce spans for a file
 */
export class UnsupportedFormatError extends Error {
  constructor(public readonly filePath: string, reason: string) {
    super(`Unsupported format for ${filePath || '<buffer>'}: ${reason}`);
    this.name = 'UnsupportedFormatError';
  }
}

export type ReinjectionErrorKind =
  | 'OffsetOutOfBounds'
  | 'EncodingBoundaryViolation'
  | 'VerificationFailed'
  | 'GrowthUnsupported';

export class ReinjectionError extends Error {
  constructor(
    public readonly kind: ReinjectionErrorKind,
    public readonly detail: string
  ) {
    super(`${kind}: ${detail}`);
    this.name = 'ReinjectionError';
  }

  /** OffsetOutOfBounds leaves the file untouched and is not retried with another strategy */
  get fatal(): boolean {
    return this.kind === 'OffsetOutOfBounds';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
