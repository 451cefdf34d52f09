import * as path from 'node:path';
import type { LogLevel } from '../observability/logger.js';
import { LOG_LEVELS } from '../observability/logger.js';
import type { Platform } from '../platform.js';
import { PLATFORMS, isPlatform } from '../platform.js';
import { BaseDirProvider } from '../providers/base.js';
import type { Environment } from '../providers/base.js';

export interface AppDirsConfig {
  platform: Platform;
  env: Environment;
  homedir: string | undefined;
  provider: BaseDirProvider | undefined; // Overrides the platform's own provider
  logLevel: LogLevel;
  json: boolean;
}

export type AppDirsOptions = Partial<AppDirsConfig>;

export interface ValidationError {
  path: string;
  message: string;
}

const KNOWN_KEYS = ['platform', 'env', 'homedir', 'provider', 'logLevel', 'json'];

// Validate and return errors (empty array if valid)
export function validateOptions(options: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (typeof options !== 'object' || options === null) {
    errors.push({ path: 'root', message: 'Options must be an object' });
    return errors;
  }

  const entries = new Map<string, unknown>(Object.entries(options));

  const platform = entries.get('platform');
  if (platform !== undefined && !isPlatform(platform)) {
    errors.push({
      path: 'platform',
      message: `Must be one of: ${PLATFORMS.join(', ')}`,
    });
  }

  const env = entries.get('env');
  if (env !== undefined) {
    if (typeof env !== 'object' || env === null || Array.isArray(env)) {
      errors.push({ path: 'env', message: 'Must be an object of strings' });
    } else {
      for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && typeof value !== 'string') {
          errors.push({ path: `env.${key}`, message: 'Must be a string' });
        }
      }
    }
  }

  const homedir = entries.get('homedir');
  if (homedir !== undefined) {
    if (typeof homedir !== 'string' || homedir.trim() === '') {
      errors.push({ path: 'homedir', message: 'Must be a non-empty string' });
    } else if (!path.posix.isAbsolute(homedir) && !path.win32.isAbsolute(homedir)) {
      errors.push({ path: 'homedir', message: 'Must be an absolute path' });
    }
  }

  const provider = entries.get('provider');
  if (provider !== undefined) {
    if (!(provider instanceof BaseDirProvider)) {
      errors.push({ path: 'provider', message: 'Must extend BaseDirProvider' });
    } else if (isPlatform(platform) && provider.platform !== platform) {
      errors.push({ path: 'provider', message: `Serves ${provider.platform}, not ${platform}` });
    }
  }

  const logLevel = entries.get('logLevel');
  if (logLevel !== undefined && !LOG_LEVELS.some((level) => level === logLevel)) {
    errors.push({
      path: 'logLevel',
      message: `Must be one of: ${LOG_LEVELS.join(', ')}`,
    });
  }

  const json = entries.get('json');
  if (json !== undefined && typeof json !== 'boolean') {
    errors.push({ path: 'json', message: 'Must be a boolean' });
  }

  for (const key of entries.keys()) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({ path: key, message: 'Unknown option' });
    }
  }

  return errors;
}

// Type guard
export function isValidOptions(options: unknown): options is AppDirsOptions {
  return validateOptions(options).length === 0;
}
