/**
 * Configuration Settings
 *
 * Reads settings from ~/.asset-translator/config.json (or --config),
 * validates them with zod and applies ASSET_TL_* environment overrides.
 * Provides defaults for all settings.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { REINJECTION_STRATEGIES, ReinjectionStrategy } from '../core/types';
import { SUPPORTED_ENCODINGS } from '../core/encoding';
import { log } from '../ipc/protocol';
import { getDefaultCachePath, getDefaultConfigPath } from './paths';

const DAY_MS = 24 * 60 * 60 * 1000;

const strategySchema = z.custom<ReinjectionStrategy>(
  value => REINJECTION_STRATEGIES.some(s => s === value),
  { message: `strategy must be one of ${REINJECTION_STRATEGIES.join(', ')}` }
);

const encodingSchema = z.enum(['utf8', 'latin1', 'shift_jis']);

const ratio = z.number().min(0).max(1);

export const SettingsSchema = z.object({
  locales: z.object({
    source: z.string().min(2).default('en'),
    target: z.string().min(2).default('fr'),
  }).default({}),

  service: z.object({
    provider: z.enum(['google-free', 'libretranslate']).default('google-free'),
    url: z.string().url().optional(),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().positive().default(15000),
    /** Pause between service calls, the free endpoint rate limits hard */
    requestDelayMs: z.number().int().nonnegative().default(500),
  }).default({}),

  retry: z.object({
    maxRetries: z.number().int().nonnegative().default(3),
    baseDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(15000),
    jitterMs: z.number().int().nonnegative().default(250),
    maxTotalMs: z.number().int().positive().default(60000),
  }).default({}),

  cache: z.object({
    enabled: z.boolean().default(true),
    path: z.string().optional(),
    ttlMs: z.number().int().positive().default(30 * DAY_MS),
  }).default({}),

  extraction: z.object({
    encoding: encodingSchema.default('utf8'),
    minRunLength: z.number().int().min(1).default(4),
    minScore: ratio.default(0.35),
  }).default({}),

  analysis: z.object({
    translatedMinFrenchRatio: ratio.default(0.6),
    translatedMaxEnglishRatio: ratio.default(0.1),
    partialMinRatio: ratio.default(0.1),
    truncationFragmentMaxLength: z.number().int().nonnegative().default(3),
  }).default({}),

  reinjection: z.object({
    strategy: strategySchema.default('conservative'),
  }).default({}),

  orchestrator: z.object({
    concurrency: z.number().int().min(1).max(64).default(4),
    extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/i)).default(['.pm1', '.pac', '.pak', '.bf', '.tbl', '.msg', '.bin']),
    outputDir: z.string().default('TranslatedFiles'),
    backupDir: z.string().optional(),
  }).default({}),

  /** Added to the bundled proper noun list */
  protectedTerms: z.array(z.string().min(1)).default([]),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Parse a positive integer env var, undefined when absent or invalid
 */
function readIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log(`[Config] Ignoring ${name}=${raw}: not a positive integer`);
    return undefined;
  }
  return value;
}

/**
 * Apply ASSET_TL_* environment variables on top of file settings
 */
export function applyEnvOverrides(settings: Settings, env: NodeJS.ProcessEnv = process.env): Settings {
  const next: Settings = {
    ...settings,
    locales: { ...settings.locales },
    service: { ...settings.service },
    orchestrator: { ...settings.orchestrator },
    extraction: { ...settings.extraction },
  };

  if (env.ASSET_TL_TARGET_LOCALE) {
    next.locales.target = env.ASSET_TL_TARGET_LOCALE;
  }

  const provider = env.ASSET_TL_PROVIDER;
  if (provider === 'google-free' || provider === 'libretranslate') {
    next.service.provider = provider;
  } else if (provider) {
    log(`[Config] Ignoring unknown ASSET_TL_PROVIDER=${provider}`);
  }

  if (env.ASSET_TL_SERVICE_URL) {
    next.service.url = env.ASSET_TL_SERVICE_URL;
  }
  if (env.ASSET_TL_API_KEY) {
    next.service.apiKey = env.ASSET_TL_API_KEY;
  }

  const concurrency = readIntEnv(env, 'ASSET_TL_CONCURRENCY');
  if (concurrency !== undefined) {
    next.orchestrator.concurrency = Math.min(concurrency, 64);
  }

  const encoding = env.ASSET_TL_ENCODING;
  if (encoding) {
    const parsed = encodingSchema.safeParse(encoding);
    if (parsed.success) {
      next.extraction.encoding = parsed.data;
    } else {
      log(`[Config] Ignoring ASSET_TL_ENCODING=${encoding}, expected one of ${SUPPORTED_ENCODINGS.join(', ')}`);
    }
  }

  return next;
}

/**
 * Load config from disk. A missing file means defaults; an invalid one is
 * logged and replaced by defaults.
 */
export function loadSettings(configPath: string = getDefaultConfigPath(), env: NodeJS.ProcessEnv = process.env): Settings {
  let fileSettings = defaultSettings();

  try {
    if (fs.existsSync(configPath)) {
      const content = fs.readFileSync(configPath, 'utf-8');
      const parsed = SettingsSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        fileSettings = parsed.data;
        log(`[Config] Loaded ${configPath}`);
      } else {
        log(`[Config] Invalid config ${configPath}, using defaults: ${parsed.error.message}`);
      }
    }
  } catch (error) {
    log(`[Config] Failed to load config: ${errorMessage(error)}`);
  }

  return applyEnvOverrides(fileSettings, env);
}

/**
 * Cache file location, from settings or under the app home
 */
export function resolveCachePath(settings: Settings): string {
  return settings.cache.path ?? getDefaultCachePath();
}
