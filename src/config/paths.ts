import * as os from 'os';
import * as path from 'path';

/**
 * Home directory for config, logs and the translation cache.
 * `ASSET_TL_HOME` overrides `~/.asset-translator`.
 */
export function getAppHome(): string {
  const override = process.env.ASSET_TL_HOME;
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), '.asset-translator');
}

export function getDefaultConfigPath(): string {
  return path.join(getAppHome(), 'config.json');
}

export function getDefaultCachePath(): string {
  return path.join(getAppHome(), 'cache', 'translations.json');
}

export function getDefaultLogPath(): string {
  return path.join(getAppHome(), 'logs', 'asset-tl.log');
}
