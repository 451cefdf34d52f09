import { BaseDirProvider } from './base.js';
import type { DirectoryKind } from '../kinds.js';

// Apple's Standard Directories, in the user domain unless noted
export class MacosProvider extends BaseDirProvider {
  readonly platform = 'macos';

  basePath(kind: DirectoryKind): string | undefined {
    switch (kind) {
      case 'cache':
        return this.fromHome('Library', 'Caches');
      case 'config':
      case 'data':
      case 'dataLocal':
      case 'template':
        return this.fromHome('Library', 'Application Support');
      case 'log':
        return this.fromHome('Library', 'Logs');
      case 'favorites':
        return this.fromHome('Library', 'Favorites');
      case 'preferences':
        return this.fromHome('Library', 'Preferences');
      // local domain
      case 'application':
        return '/Applications';
      case 'applicationShared':
        return '/Library/Frameworks';
      case 'userApplication':
      case 'userAppContainer':
      case 'userAppContainerExecutable':
        return this.fromHome('Applications');
      case 'appContainer':
      case 'appContainerExecutable':
        return this.fromHome('Library', 'Containers');
    }
  }

  protected override getHome(): string | undefined {
    return this.getEnvPath('HOME') ?? this.homedir;
  }
}
