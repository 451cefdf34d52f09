import type { AppDirsConfig, AppDirsOptions } from './schema.js';
import { validateOptions } from './schema.js';
import { getDefaultConfig } from './defaults.js';

// Caller options win over defaults; keys explicitly set to undefined keep the default
export function resolveConfig(options: AppDirsOptions = {}): AppDirsConfig {
  const errors = validateOptions(options);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
  }

  const defaults = getDefaultConfig();
  return {
    platform: options.platform ?? options.provider?.platform ?? defaults.platform,
    env: options.env ?? defaults.env,
    homedir: options.homedir ?? defaults.homedir,
    provider: options.provider ?? defaults.provider,
    logLevel: options.logLevel ?? defaults.logLevel,
    json: options.json ?? defaults.json,
  };
}
