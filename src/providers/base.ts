import * as path from 'node:path';
import type { DirectoryKind } from '../kinds.js';
import type { Platform } from '../platform.js';

export type Environment = Record<string, string | undefined>;

export interface ProviderOptions {
  env?: Environment;
  homedir?: string;
}

export abstract class BaseDirProvider {
  abstract readonly platform: Platform;

  protected env: Environment;
  protected homedir: string | undefined;

  constructor(options: ProviderOptions = {}) {
    this.env = options.env ?? process.env;
    this.homedir = options.homedir;
  }

  // Standard location of this kind on the platform, or undefined when it has none
  abstract basePath(kind: DirectoryKind): string | undefined;

  // path.posix or path.win32, independent of the host running the code
  get pathApi(): path.PlatformPath {
    return this.platform === 'windows' ? path.win32 : path.posix;
  }

  protected getEnv(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === '' ? undefined : value;
  }

  // Environment value only when it holds an absolute path
  protected getEnvPath(name: string): string | undefined {
    const value = this.getEnv(name);
    if (value === undefined || !this.pathApi.isAbsolute(value)) return undefined;
    return value;
  }

  protected getHome(): string | undefined {
    return this.homedir;
  }

  protected fromHome(...segments: string[]): string | undefined {
    const home = this.getHome();
    if (home === undefined) return undefined;
    return this.pathApi.join(home, ...segments);
  }
}
