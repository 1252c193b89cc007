/**
 * Tests for settings loading and environment overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import { applyEnvOverrides, defaultSettings, loadSettings } from '../config/settings';
import { makeTempDir, removeDir } from './helpers/assets';

describe('settings', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should provide defaults for every section', () => {
    const settings = defaultSettings();

    expect(settings.locales).toEqual({ source: 'en', target: 'fr' });
    expect(settings.reinjection.strategy).toBe('conservative');
    expect(settings.orchestrator.concurrency).toBe(4);
    expect(settings.extraction).toEqual({ encoding: 'utf8', minRunLength: 4, minScore: 0.35 });
    expect(settings.retry.maxRetries).toBe(3);
  });

  it('should use defaults when the config file is missing', () => {
    expect(loadSettings(path.join(dir, 'missing.json'), {})).toEqual(defaultSettings());
  });

  it('should merge a partial config file with defaults', () => {
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify({
      locales: { target: 'de' },
      reinjection: { strategy: 'test-first' },
      protectedTerms: ['Midgar'],
    }));

    const settings = loadSettings(configPath, {});

    expect(settings.locales).toEqual({ source: 'en', target: 'de' });
    expect(settings.reinjection.strategy).toBe('test-first');
    expect(settings.protectedTerms).toEqual(['Midgar']);
    expect(settings.service.provider).toBe('google-free');
  });

  it.each([
    ['an unknown strategy', '{"reinjection": {"strategy": "yolo"}}'],
    ['invalid JSON', '{"locales": '],
  ])('should fall back to defaults on %s', (_label, content) => {
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(configPath, content);

    expect(loadSettings(configPath, {})).toEqual(defaultSettings());
  });

  describe('applyEnvOverrides', () => {
    it('should apply ASSET_TL_* variables', () => {
      const settings = applyEnvOverrides(defaultSettings(), {
        ASSET_TL_TARGET_LOCALE: 'es',
        ASSET_TL_PROVIDER: 'libretranslate',
        ASSET_TL_SERVICE_URL: 'http://localhost:5000/translate',
        ASSET_TL_API_KEY: 'test-secret',
        ASSET_TL_CONCURRENCY: '100',
        ASSET_TL_ENCODING: 'shift_jis',
      });

      expect(settings.locales.target).toBe('es');
      expect(settings.service).toMatchObject({
        provider: 'libretranslate',
        url: 'http://localhost:5000/translate',
        apiKey: 'test-secret',
      });
      expect(settings.orchestrator.concurrency).toBe(64);
      expect(settings.extraction.encoding).toBe('shift_jis');
    });

    it('should ignore invalid values', () => {
      const settings = applyEnvOverrides(defaultSettings(), {
        ASSET_TL_PROVIDER: 'babelfish',
        ASSET_TL_CONCURRENCY: 'lots',
        ASSET_TL_ENCODING: 'ebcdic',
      });

      expect(settings.service.provider).toBe('google-free');
      expect(settings.orchestrator.concurrency).toBe(4);
      expect(settings.extraction.encoding).toBe('utf8');
    });

    it('should not modify its input', () => {
      const base = defaultSettings();
      applyEnvOverrides(base, { ASSET_TL_TARGET_LOCALE: 'es' });

      expect(base.locales.target).toBe('fr');
    });
  });
});
