/**
 * Builds the pipeline's components from settings
 */

import * as path from 'path';
import { FileAnalyzer } from '../analysis/fileAnalyzer';
import { getDefaultVocabulary } from '../analysis/indicators';
import { FileTranslationCache, MemoryTranslationCache } from '../cache/translationCache';
import { resolveCachePath, Settings } from '../config/settings';
import { Extractor } from '../core/extractor';
import { Reinjector } from '../core/reinjector';
import { loadDefaultProtectedTerms, TokenGuard } from '../core/tokenGuard';
import { Translator } from '../core/translator';
import { TranslationService } from '../core/types';
import { createTranslationService } from '../service/client';
import { FileCommitter } from './committer';
import { OrchestratorDeps, OrchestratorOptions } from './orchestrator';

export interface Pipeline {
  deps: OrchestratorDeps;
  cache: MemoryTranslationCache;
  /** Persist whatever the cache still holds in memory */
  close(): Promise<void>;
}

/**
 * @param service - Overrides the configured provider (tests pass a fake)
 */
export function createPipeline(settings: Settings, service?: TranslationService): Pipeline {
  const vocabulary = getDefaultVocabulary();
  const tokenGuard = new TokenGuard([...loadDefaultProtectedTerms(), ...settings.protectedTerms]);
  const extractor = new Extractor(vocabulary, settings.extraction, tokenGuard);

  const fileCache = settings.cache.enabled ? new FileTranslationCache(resolveCachePath(settings)) : null;
  const cache = fileCache ?? new MemoryTranslationCache();

  const translator = new Translator(service ?? createTranslationService(settings.service), cache, {
    sourceLocale: settings.locales.source,
    cacheTtlMs: settings.cache.ttlMs,
    requestDelayMs: settings.service.requestDelayMs,
    retry: { ...settings.retry, attemptTimeoutMs: settings.service.timeoutMs },
  });

  const backupDir = settings.orchestrator.backupDir ?? path.join(settings.orchestrator.outputDir, 'backups');

  return {
    deps: {
      extractor,
      analyzer: new FileAnalyzer(extractor, vocabulary, settings.analysis),
      translator,
      reinjector: new Reinjector(extractor),
      tokenGuard,
      committer: new FileCommitter(backupDir),
    },
    cache,
    close: async () => {
      if (fileCache) {
        await fileCache.flush();
      }
    },
  };
}

export function orchestratorOptions(settings: Settings): OrchestratorOptions {
  return {
    outputDir: settings.orchestrator.outputDir,
    targetLocale: settings.locales.target,
    strategy: settings.reinjection.strategy,
    concurrency: settings.orchestrator.concurrency,
    extensions: settings.orchestrator.extensions,
    encoding: settings.extraction.encoding,
  };
}
