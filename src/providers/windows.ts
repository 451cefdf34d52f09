import { BaseDirProvider } from './base.js';
import type { DirectoryKind } from '../kinds.js';

const DEFAULT_SYSTEM_DRIVE = 'C:';

/**
 * Known Folder locations, read from the environment variables Windows sets
 * for them. Variable names are matched case-insensitively, as Windows does.
 */
export class WindowsProvider extends BaseDirProvider {
  readonly platform = 'windows';

  basePath(kind: DirectoryKind): string | undefined {
    switch (kind) {
      case 'cache':
      case 'dataLocal':
        return this.localAppData();
      case 'config':
      case 'data':
      case 'preferences':
        return this.roamingAppData();
      case 'log':
        return this.join(this.localAppData(), 'Logs');
      case 'favorites':
        return this.join(this.getHome(), 'Favorites');
      case 'template':
        return this.join(this.roamingAppData(), 'Microsoft', 'Windows', 'Templates');
      case 'application':
        return this.programFiles();
      case 'applicationShared':
        return this.getEnvPath('CommonProgramFiles') ?? this.join(this.programFiles(), 'Common Files');
      case 'userApplication':
        return this.join(this.localAppData(), 'Programs');
      case 'appContainer':
      case 'appContainerExecutable':
      case 'userAppContainer':
      case 'userAppContainerExecutable':
        return undefined;
    }
  }

  protected override getEnv(name: string): string | undefined {
    const wanted = name.toUpperCase();
    for (const [key, value] of Object.entries(this.env)) {
      if (key.toUpperCase() === wanted && value !== undefined && value !== '') {
        return value;
      }
    }
    return undefined;
  }

  protected override getHome(): string | undefined {
    return this.getEnvPath('USERPROFILE') ?? this.homedir;
  }

  // FOLDERID_LocalAppData
  private localAppData(): string | undefined {
    return this.getEnvPath('LOCALAPPDATA') ?? this.fromHome('AppData', 'Local');
  }

  // FOLDERID_RoamingAppData
  private roamingAppData(): string | undefined {
    return this.getEnvPath('APPDATA') ?? this.fromHome('AppData', 'Roaming');
  }

  // FOLDERID_ProgramFiles
  private programFiles(): string {
    const programFiles = this.getEnvPath('ProgramFiles');
    if (programFiles) return programFiles;
    const drive = this.getEnv('SystemDrive');
    const root = drive !== undefined && this.pathApi.isAbsolute(`${drive}\\`) ? drive : DEFAULT_SYSTEM_DRIVE;
    return this.pathApi.join(`${root}\\`, 'Program Files');
  }

  private join(base: string | undefined, ...segments: string[]): string | undefined {
    return base === undefined ? undefined : this.pathApi.join(base, ...segments);
  }
}
