/**
 * Text encodings a game asset may store its strings in
 */
export type TextEncodingName = 'utf8' | 'latin1' | 'shift_jis';

/**
 * Byte range [start, end) relative to the start of a span or a string
 */
export type ByteRange = [start: number, end: number];

/**
 * Either a value or an error, never both
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * A contiguous byte range within a file holding one extractable string
 */
export interface TextSpan {
  /** Ordinal of the span within its file */
  index: number;
  /** Absolute byte offset in the file */
  offset: number;
  byteLength: number;
  rawBytes: Buffer;
  decodedText: string;
  /** Protected token ranges, as byte offsets relative to `offset` */
  protectedRanges: ByteRange[];
  /** Indicator score, only set by the heuristic scanner */
  score?: number;
}

/**
 * Outcome of a successful translation of a single string
 */
export interface TranslationResult {
  sourceText: string;
  translatedText: string;
  /** 0..1 */
  confidence: number;
  usedCache: boolean;
}

/**
 * Request to replace the string at `offset`
 */
export interface TextEdit {
  offset: number;
  oldText: string;
  newText: string;
  /** Byte length of the original slot, the span's `byteLength` */
  oldByteLength?: number;
}

/**
 * Reinsertion strategies, see Reinjector
 */
export type ReinjectionStrategy = 'conservative' | 'aggressive' | 'safe' | 'test-first';

/**
 * Strategies that write bytes themselves (test-first delegates to one of these)
 */
export type ConcreteStrategy = Exclude<ReinjectionStrategy, 'test-first'>;

export const REINJECTION_STRATEGIES: readonly ReinjectionStrategy[] = ['conservative', 'aggressive', 'safe', 'test-first'];

/**
 * Classification states of a file's text content
 */
export type ClassificationStatus = 'Translated' | 'PartiallyTranslated' | 'Untranslated' | 'NoText';

export interface FileClassification {
  status: ClassificationStatus;
  /** 0..1 */
  confidenceScore: number;
  frenchIndicatorCount: number;
  englishIndicatorCount: number;
  totalWords: number;
  /** Reporting only, never changes `status` */
  suspectedTruncation: boolean;
}

/**
 * Text returned by a translation service
 */
export interface ServiceTranslation {
  text: string;
  confidence?: number;
}

/**
 * External translation service. Implementations throw ServiceError.
 */
export interface TranslationService {
  readonly name: string;
  request(text: string, sourceLocale: string, targetLocale: string, timeoutMs: number): Promise<ServiceTranslation>;
}

/**
 * Key-value store of previous translations with expiry
 */
export interface TranslationCache {
  get(sourceText: string, locale: string): Promise<string | undefined>;
  put(sourceText: string, locale: string, translatedText: string, ttlMs: number): Promise<void>;
}
