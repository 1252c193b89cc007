/**
 * HTTP clients for external translation services
 *
 * Every failure is reported as a ServiceError whose `transient` flag tells the
 * Translator whether a retry can help.
 */

import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { errorMessage, ServiceError } from '../core/errors';
import { ServiceTranslation, TranslationService } from '../core/types';

export type FetchResponse = Pick<Response, 'ok' | 'status' | 'json' | 'text'>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<FetchResponse>;

export const GOOGLE_FREE_URL = 'https://translate.googleapis.com/translate_a/single';

/**
 * [[["Bonjour","Hello",null,null,10], ...], null, "en", ...]
 */
const GoogleResponseSchema = z.tuple([
  z.array(z.tuple([z.string().nullable()]).rest(z.unknown())),
]).rest(z.unknown());

const LibreResponseSchema = z.object({
  translatedText: z.string(),
});

/**
 * Timeouts, rate limits and server errors are worth retrying; other client errors are not
 */
export function classifyHttpStatus(status: number): 'ok' | 'transient' | 'permanent' {
  if (status < 400) return 'ok';
  if (status === 408 || status === 425 || status === 429 || status >= 500) return 'transient';
  return 'permanent';
}

/**
 * Send a request and turn every failure into a ServiceError
 */
async function requestJson(
  fetchImpl: FetchLike,
  serviceName: string,
  url: string,
  init: RequestInit
): Promise<unknown> {
  let response: FetchResponse;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    const reason = error instanceof FetchError && error.type === 'request-timeout'
      ? 'timed out'
      : `network error: ${errorMessage(error)}`;
    throw new ServiceError(`${serviceName} ${reason}`, true);
  }

  if (!response.ok) {
    const classification = classifyHttpStatus(response.status);
    const body = await response.text().catch(() => '');
    throw new ServiceError(
      `${serviceName} error ${response.status}: ${body.slice(0, 200)}`,
      classification === 'transient',
      response.status
    );
  }

  try {
    const data: unknown = await response.json();
    return data;
  } catch (error) {
    throw new ServiceError(`${serviceName} returned an unparseable body: ${errorMessage(error)}`, false, response.status);
  }
}

/**
 * Free Google endpoint (client=gtx). No key, aggressively rate limited.
 */
export class GoogleFreeTranslationService implements TranslationService {
  readonly name = 'google-free';

  constructor(
    private baseUrl: string = GOOGLE_FREE_URL,
    private fetchImpl: FetchLike = fetch
  ) {}

  async request(text: string, sourceLocale: string, targetLocale: string, timeoutMs: number): Promise<ServiceTranslation> {
    const params = new URLSearchParams({
      client: 'gtx',
      sl: sourceLocale,
      tl: targetLocale,
      dt: 't',
      q: text,
    });

    const data = await requestJson(this.fetchImpl, this.name, `${this.baseUrl}?${params.toString()}`, {
      method: 'GET',
      timeout: timeoutMs,
    });

    const parsed = GoogleResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ServiceError(`${this.name} response has an unexpected shape`, false);
    }

    // Long input comes back split into sentences
    const translated = parsed.data[0].map(segment => segment[0] ?? '').join('');
    return { text: translated };
  }
}

/**
 * LibreTranslate compatible server (self-hosted or public instance)
 */
export class LibreTranslateService implements TranslationService {
  readonly name = 'libretranslate';

  constructor(
    private url: string,
    private apiKey?: string,
    private fetchImpl: FetchLike = fetch
  ) {}

  async request(text: string, sourceLocale: string, targetLocale: string, timeoutMs: number): Promise<ServiceTranslation> {
    const body: Record<string, string> = {
      q: text,
      source: sourceLocale,
      target: targetLocale,
      format: 'text',
    };
    if (this.apiKey) {
      body.api_key = this.apiKey;
    }

    const data = await requestJson(this.fetchImpl, this.name, this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      timeout: timeoutMs,
    });

    const parsed = LibreResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ServiceError(`${this.name} response has no translatedText`, false);
    }

    return { text: parsed.data.translatedText };
  }
}

export interface ServiceSettings {
  provider: 'google-free' | 'libretranslate';
  url?: string;
  apiKey?: string;
}

export function createTranslationService(settings: ServiceSettings, fetchImpl: FetchLike = fetch): TranslationService {
  switch (settings.provider) {
    case 'google-free':
      return new GoogleFreeTranslationService(settings.url ?? GOOGLE_FREE_URL, fetchImpl);
    case 'libretranslate':
      if (!settings.url) {
        throw new Error('libretranslate provider needs service.url');
      }
      return new LibreTranslateService(settings.url, settings.apiKey, fetchImpl);
  }
}
