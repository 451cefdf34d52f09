import { BaseDirProvider } from './base.js';
import type { DirectoryKind } from '../kinds.js';

/**
 * Base directories from the XDG Base Directory specification.
 *
 * Relative values in `XDG_*` variables are ignored, as XDG requires, and
 * the documented default under `$HOME` is used instead.
 */
export class XdgProvider extends BaseDirProvider {
  readonly platform = 'linux';

  basePath(kind: DirectoryKind): string | undefined {
    switch (kind) {
      case 'cache':
        return this.getEnvPath('XDG_CACHE_HOME') ?? this.fromHome('.cache');
      case 'config':
        return this.getEnvPath('XDG_CONFIG_HOME') ?? this.fromHome('.config');
      case 'data':
      case 'dataLocal':
      case 'log':
        return this.getEnvPath('XDG_DATA_HOME') ?? this.fromHome('.local', 'share');
      case 'application':
        return '/opt';
      case 'applicationShared':
        return '/usr/local/lib';
      case 'userApplication':
        return this.getEnvPath('XDG_BIN_HOME') ?? this.fromHome('.local', 'bin');
      case 'favorites':
      case 'preferences':
      case 'template':
      case 'appContainer':
      case 'appContainerExecutable':
      case 'userAppContainer':
      case 'userAppContainerExecutable':
        return undefined;
    }
  }

  protected override getHome(): string | undefined {
    return this.getEnvPath('HOME') ?? this.homedir;
  }
}
