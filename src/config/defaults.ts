import * as os from 'node:os';
import type { AppDirsConfig } from './schema.js';
import { currentPlatform } from '../platform.js';

export function getDefaultConfig(): AppDirsConfig {
  const home = os.homedir();
  return {
    platform: currentPlatform(),
    env: process.env,
    homedir: home === '' ? undefined : home,
    provider: undefined,
    logLevel: 'silent',
    json: false,
  };
}
