/**
 * Fake translation service
 *
 * Provides deterministic responses for testing without network access.
 * Translations come from a lookup table; failures can be queued per call.
 */

import { ServiceError } from '../core/errors';
import { ServiceTranslation, TranslationService } from '../core/types';

export interface FakeServiceCall {
  text: string;
  sourceLocale: string;
  targetLocale: string;
  timeoutMs: number;
}

export class FakeTranslationService implements TranslationService {
  readonly name = 'fake';

  /** Track calls for assertions */
  readonly calls: FakeServiceCall[] = [];

  private translations: Map<string, string>;
  private failures: Error[] = [];

  /**
   * @param translations - Source text to translated text; unknown text comes back prefixed with "fr:"
   */
  constructor(translations: Record<string, string> = {}) {
    this.translations = new Map(Object.entries(translations));
  }

  setTranslation(source: string, translated: string): void {
    this.translations.set(source, translated);
  }

  /**
   * Make the next calls fail, one error per call, before translations resume
   */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  static transient(status = 503): ServiceError {
    return new ServiceError(`fake error ${status}`, true, status);
  }

  static permanent(status = 400): ServiceError {
    return new ServiceError(`fake error ${status}`, false, status);
  }

  async request(text: string, sourceLocale: string, targetLocale: string, timeoutMs: number): Promise<ServiceTranslation> {
    this.calls.push({ text, sourceLocale, targetLocale, timeoutMs });

    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }

    return { text: this.translations.get(text) ?? `fr:${text}` };
  }
}
