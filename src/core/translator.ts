/**
 * Translator - cache-first translation with bounded retry
 *
 * A miss calls the translation service. Transient failures are retried with
 * exponential backoff plus jitter, bounded by a retry count and an overall
 * wall-clock ceiling. Anything else fails at once. On failure callers get the
 * original text back as `fallbackText` and keep the span untranslated.
 */

import { log } from '../ipc/protocol';
import { errorMessage, ServiceError, TranslationError } from './errors';
import { ServiceTranslation, TranslationCache, TranslationResult, TranslationService } from './types';

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Base delay for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay cap, before jitter */
  maxDelayMs: number;
  /** Random extra delay in [0, jitterMs) */
  jitterMs: number;
  /** Timeout handed to the service for each attempt */
  attemptTimeoutMs: number;
  /** Give up once this much time has passed since the first attempt */
  maxTotalMs: number;
}

export interface TranslatorOptions {
  sourceLocale: string;
  cacheTtlMs: number;
  /** Pause between service calls in translateBatch */
  requestDelayMs: number;
  retry: RetryOptions;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, maxRetries: number, error: Error, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export type TranslateOutcome =
  | { success: true; data: TranslationResult }
  | { success: false; error: TranslationError; fallbackText: string };

export interface BatchProgress {
  done: number;
  total: number;
  failed: number;
}

/**
 * Sleep for a given number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class Translator {
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private now: () => number;

  constructor(
    private service: TranslationService,
    private cache: TranslationCache,
    private options: TranslatorOptions
  ) {
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async translate(text: string, targetLocale: string): Promise<TranslateOutcome> {
    if (text.trim().length === 0 || targetLocale === this.options.sourceLocale) {
      return { success: true, data: { sourceText: text, translatedText: text, confidence: 1, usedCache: false } };
    }

    const cached = await this.readCache(text, targetLocale);
    if (cached !== undefined) {
      return { success: true, data: { sourceText: text, translatedText: cached, confidence: 1, usedCache: true } };
    }

    const { maxRetries, baseDelayMs, maxDelayMs, jitterMs, attemptTimeoutMs, maxTotalMs } = this.options.retry;
    const startedAt = this.now();
    let lastError: Error = new Error('no attempt made');

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const remaining = maxTotalMs - (this.now() - startedAt);
      const timeoutMs = Math.max(1, Math.min(attemptTimeoutMs, remaining));

      try {
        const response = await this.requestWithTimeout(text, targetLocale, timeoutMs);
        if (response.text.trim().length === 0) {
          return this.failure('Permanent', `${this.service.name} returned an empty translation`, attempt + 1, text);
        }

        await this.writeCache(text, targetLocale, response.text);

        return {
          success: true,
          data: {
            sourceText: text,
            translatedText: response.text,
            confidence: response.confidence ?? 1,
            usedCache: false,
          },
        };
      } catch (error) {
        if (!(error instanceof ServiceError) || !error.transient) {
          return this.failure('Permanent', errorMessage(error), attempt + 1, text);
        }
        lastError = error;

        // Don't retry after last attempt
        if (attempt >= maxRetries) {
          break;
        }

        // Exponential backoff: baseDelay * 2^attempt, capped, plus jitter
        const delayMs = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs) + Math.floor(this.random() * jitterMs);
        if (this.now() - startedAt + delayMs > maxTotalMs) {
          return this.failure('Exhausted', `time budget of ${maxTotalMs}ms spent: ${error.message}`, attempt + 1, text);
        }

        log(`[Translator] Retryable error on attempt ${attempt + 1}/${maxRetries + 1}: ${error.message}`);
        log(`[Translator] Retrying in ${delayMs}ms...`);
        this.options.onRetry?.(attempt + 1, maxRetries, error, delayMs);

        await this.sleep(delayMs);
      }
    }

    return this.failure('Exhausted', `gave up after ${maxRetries + 1} attempts: ${lastError.message}`, maxRetries + 1, text);
  }

  /**
   * Translate many strings one after another, pausing between service calls.
   * Duplicates are translated once.
   */
  async translateBatch(
    texts: string[],
    targetLocale: string,
    onProgress?: (progress: BatchProgress) => void
  ): Promise<Map<string, TranslateOutcome>> {
    const unique = Array.from(new Set(texts));
    const outcomes = new Map<string, TranslateOutcome>();
    let failed = 0;

    for (let i = 0; i < unique.length; i++) {
      const outcome = await this.translate(unique[i], targetLocale);
      outcomes.set(unique[i], outcome);
      if (!outcome.success) failed++;

      onProgress?.({ done: i + 1, total: unique.length, failed });

      // Delay between service calls (cache hits and the last item need none)
      const calledService = !outcome.success || !outcome.data.usedCache;
      if (calledService && i < unique.length - 1 && this.options.requestDelayMs > 0) {
        await this.sleep(this.options.requestDelayMs);
      }
    }

    return outcomes;
  }

  private failure(kind: TranslationError['kind'], message: string, attempts: number, text: string): TranslateOutcome {
    log(`[Translator] ${kind} failure after ${attempts} attempt(s): ${message}`);
    return {
      success: false,
      error: new TranslationError(kind, message, attempts),
      fallbackText: text,
    };
  }

  /**
   * Call the service, failing with a transient ServiceError if it has not
   * answered within `timeoutMs` even when it ignores the timeout itself
   */
  private async requestWithTimeout(text: string, targetLocale: string, timeoutMs: number): Promise<ServiceTranslation> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ServiceError(`${this.service.name} timed out after ${timeoutMs}ms`, true));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.service.request(text, this.options.sourceLocale, targetLocale, timeoutMs),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readCache(text: string, locale: string): Promise<string | undefined> {
    try {
      return await this.cache.get(text, locale);
    } catch (error) {
      log(`[Translator] Cache read failed, treating as miss: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async writeCache(text: string, locale: string, translated: string): Promise<void> {
    try {
      await this.cache.put(text, locale, translated, this.options.cacheTtlMs);
    } catch (error) {
      log(`[Translator] Cache write failed: ${errorMessage(error)}`);
    }
  }
}
