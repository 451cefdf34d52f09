import type { BaseDirProvider, ProviderOptions } from './base.js';
import { XdgProvider } from './xdg.js';
import { WindowsProvider } from './windows.js';
import { MacosProvider } from './macos.js';
import type { Platform } from '../platform.js';

export { BaseDirProvider } from './base.js';
export type { Environment, ProviderOptions } from './base.js';
export { XdgProvider } from './xdg.js';
export { WindowsProvider } from './windows.js';
export { MacosProvider } from './macos.js';

export function createProvider(platform: Platform, options: ProviderOptions = {}): BaseDirProvider {
  switch (platform) {
    case 'linux':
      return new XdgProvider(options);
    case 'windows':
      return new WindowsProvider(options);
    case 'macos':
      return new MacosProvider(options);
  }
}
