/**
 * Translation Cache
 *
 * LRU cache of previous translations keyed by (source text, target locale),
 * each entry carrying its own expiry. The file-backed variant persists to a
 * JSON file with a debounced save.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { TranslationCache } from '../core/types';
import { log } from '../ipc/protocol';

const DEFAULT_MAX_ENTRIES = 10000;
const SAVE_DEBOUNCE_MS = 5000;

const CacheEntrySchema = z.object({
  locale: z.string(),
  translatedText: z.string(),
  expiresAt: z.number(),
});

const CacheFileSchema = z.record(CacheEntrySchema);

type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CacheOptions {
  maxEntries?: number;
  now?: () => number;
}

/**
 * Cache key: sha256 of locale and source text
 */
export function cacheKey(sourceText: string, locale: string): string {
  return crypto.createHash('sha256').update(`${locale}\0${sourceText}`, 'utf8').digest('hex');
}

export class MemoryTranslationCache implements TranslationCache {
  protected entries: Map<string, CacheEntry> = new Map();
  protected now: () => number;
  private maxEntries: number;

  constructor(options: CacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  async get(sourceText: string, locale: string): Promise<string | undefined> {
    const key = cacheKey(sourceText, locale);
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    // Check TTL
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.onChange();
      return undefined;
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);

    return entry.translatedText;
  }

  async put(sourceText: string, locale: string, translatedText: string, ttlMs: number): Promise<void> {
    const key = cacheKey(sourceText, locale);

    // Evict oldest entry if at capacity
    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) {
        this.entries.delete(firstKey);
      }
    }

    this.entries.delete(key);
    this.entries.set(key, { locale, translatedText, expiresAt: this.now() + ttlMs });
    this.onChange();
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.onChange();
  }

  /**
   * Called after every mutation
   */
  protected onChange(): void {}
}

/**
 * Cache persisted to a JSON file
 */
export class FileTranslationCache extends MemoryTranslationCache {
  private dirty = false;
  private saveTimeout: NodeJS.Timeout | null = null;

  constructor(private filePath: string, options: CacheOptions = {}) {
    super(options);
    this.load();
  }

  /**
   * Write pending changes now
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (!this.dirty) {
      return;
    }

    const data: Record<string, CacheEntry> = Object.fromEntries(this.entries);

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(this.filePath, JSON.stringify(data, null, 2), 'utf-8');
    this.dirty = false;
    log(`[TranslationCache] Saved ${this.entries.size} entries to ${this.filePath}`);
  }

  protected onChange(): void {
    this.dirty = true;
    this.scheduleSave();
  }

  /**
   * Load cache from disk, dropping expired entries. A corrupt file is ignored.
   */
  private load(): void {
    try {
      if (!fs.existsSync(this.filePath)) {
        return;
      }

      const content = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = CacheFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        log(`[TranslationCache] Ignoring malformed cache file ${this.filePath}: ${parsed.error.message}`);
        return;
      }

      const now = this.now();
      for (const [key, entry] of Object.entries(parsed.data)) {
        if (entry.expiresAt > now) {
          this.entries.set(key, entry);
        }
      }
      log(`[TranslationCache] Loaded ${this.entries.size} entries from ${this.filePath}`);
    } catch (error) {
      log(`[TranslationCache] Failed to load ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Save cache to disk (debounced)
   */
  private scheduleSave(): void {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.flush().catch(error => {
        log(`[TranslationCache] Failed to save ${this.filePath}: ${errorMessage(error)}`);
      });
    }, SAVE_DEBOUNCE_MS);
    // Never keep the process alive just to save
    this.saveTimeout.unref();
  }
}
