import { describe, it, expect } from 'vitest';
import {
  XdgProvider,
  WindowsProvider,
  MacosProvider,
  createProvider,
} from '../src/providers/index.js';
import { DIRECTORY_KINDS } from '../src/kinds.js';

describe('XdgProvider', () => {
  const provider = new XdgProvider({ env: { HOME: '/home/u' } });

  it('should fall back to the XDG defaults under $HOME', () => {
    expect(provider.basePath('cache')).toBe('/home/u/.cache');
    expect(provider.basePath('config')).toBe('/home/u/.config');
    expect(provider.basePath('data')).toBe('/home/u/.local/share');
    expect(provider.basePath('dataLocal')).toBe('/home/u/.local/share');
    expect(provider.basePath('log')).toBe('/home/u/.local/share');
    expect(provider.basePath('userApplication')).toBe('/home/u/.local/bin');
  });

  it('should prefer absolute XDG variables', () => {
    const xdg = new XdgProvider({
      env: {
        HOME: '/home/u',
        XDG_CACHE_HOME: '/var/cache/u',
        XDG_CONFIG_HOME: '/etc/u',
        XDG_DATA_HOME: '/srv/data/u',
        XDG_BIN_HOME: '/srv/bin/u',
      },
    });

    expect(xdg.basePath('cache')).toBe('/var/cache/u');
    expect(xdg.basePath('config')).toBe('/etc/u');
    expect(xdg.basePath('data')).toBe('/srv/data/u');
    expect(xdg.basePath('dataLocal')).toBe('/srv/data/u');
    expect(xdg.basePath('userApplication')).toBe('/srv/bin/u');
  });

  it('should ignore relative or empty XDG variables', () => {
    const xdg = new XdgProvider({
      env: { HOME: '/home/u', XDG_CACHE_HOME: 'cache', XDG_CONFIG_HOME: '' },
    });

    expect(xdg.basePath('cache')).toBe('/home/u/.cache');
    expect(xdg.basePath('config')).toBe('/home/u/.config');
  });

  it('should use the configured home directory when $HOME is unset', () => {
    const xdg = new XdgProvider({ env: {}, homedir: '/srv/home' });
    expect(xdg.basePath('cache')).toBe('/srv/home/.cache');
  });

  it('should report home-relative kinds as absent without any home', () => {
    const xdg = new XdgProvider({ env: { XDG_CACHE_HOME: '/tmp/c' } });
    expect(xdg.basePath('cache')).toBe('/tmp/c');
    expect(xdg.basePath('config')).toBeUndefined();
    expect(xdg.basePath('userApplication')).toBeUndefined();
  });

  it('should use fixed system locations for installed applications', () => {
    expect(provider.basePath('application')).toBe('/opt');
    expect(provider.basePath('applicationShared')).toBe('/usr/local/lib');
  });

  it('should have no favorites, preferences, templates or containers', () => {
    expect(provider.basePath('favorites')).toBeUndefined();
    expect(provider.basePath('preferences')).toBeUndefined();
    expect(provider.basePath('template')).toBeUndefined();
    expect(provider.basePath('appContainer')).toBeUndefined();
    expect(provider.basePath('appContainerExecutable')).toBeUndefined();
    expect(provider.basePath('userAppContainer')).toBeUndefined();
    expect(provider.basePath('userAppContainerExecutable')).toBeUndefined();
  });
});

describe('MacosProvider', () => {
  const provider = new MacosProvider({ env: { HOME: '/Users/alice' } });

  it('should resolve the Library folders', () => {
    expect(provider.basePath('cache')).toBe('/Users/alice/Library/Caches');
    expect(provider.basePath('config')).toBe('/Users/alice/Library/Application Support');
    expect(provider.basePath('data')).toBe('/Users/alice/Library/Application Support');
    expect(provider.basePath('dataLocal')).toBe('/Users/alice/Library/Application Support');
    expect(provider.basePath('template')).toBe('/Users/alice/Library/Application Support');
    expect(provider.basePath('log')).toBe('/Users/alice/Library/Logs');
    expect(provider.basePath('favorites')).toBe('/Users/alice/Library/Favorites');
    expect(provider.basePath('preferences')).toBe('/Users/alice/Library/Preferences');
  });

  it('should resolve application locations', () => {
    expect(provider.basePath('application')).toBe('/Applications');
    expect(provider.basePath('applicationShared')).toBe('/Library/Frameworks');
    expect(provider.basePath('userApplication')).toBe('/Users/alice/Applications');
  });

  it('should resolve container roots', () => {
    expect(provider.basePath('appContainer')).toBe('/Users/alice/Library/Containers');
    expect(provider.basePath('appContainerExecutable')).toBe('/Users/alice/Library/Containers');
    expect(provider.basePath('userAppContainer')).toBe('/Users/alice/Applications');
    expect(provider.basePath('userAppContainerExecutable')).toBe('/Users/alice/Applications');
  });

  it('should keep system locations without a home directory', () => {
    const homeless = new MacosProvider({ env: {} });
    expect(homeless.basePath('application')).toBe('/Applications');
    expect(homeless.basePath('cache')).toBeUndefined();
  });
});

describe('WindowsProvider', () => {
  const env = {
    USERPROFILE: 'C:\\Users\\Alice',
    LOCALAPPDATA: 'C:\\Users\\Alice\\AppData\\Local',
    APPDATA: 'C:\\Users\\Alice\\AppData\\Roaming',
    ProgramFiles: 'C:\\Program Files',
    CommonProgramFiles: 'C:\\Program Files\\Common Files',
  };
  const provider = new WindowsProvider({ env });

  it('should read Known Folders from the environment', () => {
    expect(provider.basePath('cache')).toBe('C:\\Users\\Alice\\AppData\\Local');
    expect(provider.basePath('dataLocal')).toBe('C:\\Users\\Alice\\AppData\\Local');
    expect(provider.basePath('config')).toBe('C:\\Users\\Alice\\AppData\\Roaming');
    expect(provider.basePath('data')).toBe('C:\\Users\\Alice\\AppData\\Roaming');
    expect(provider.basePath('preferences')).toBe('C:\\Users\\Alice\\AppData\\Roaming');
    expect(provider.basePath('log')).toBe('C:\\Users\\Alice\\AppData\\Local\\Logs');
    expect(provider.basePath('favorites')).toBe('C:\\Users\\Alice\\Favorites');
    expect(provider.basePath('template')).toBe(
      'C:\\Users\\Alice\\AppData\\Roaming\\Microsoft\\Windows\\Templates'
    );
  });

  it('should resolve program folders', () => {
    expect(provider.basePath('application')).toBe('C:\\Program Files');
    expect(provider.basePath('applicationShared')).toBe('C:\\Program Files\\Common Files');
    expect(provider.basePath('userApplication')).toBe('C:\\Users\\Alice\\AppData\\Local\\Programs');
  });

  it('should match variable names case-insensitively', () => {
    const lower = new WindowsProvider({ env: { userprofile: 'D:\\Home\\bob' } });
    expect(lower.basePath('cache')).toBe('D:\\Home\\bob\\AppData\\Local');
    expect(lower.basePath('config')).toBe('D:\\Home\\bob\\AppData\\Roaming');
    expect(lower.basePath('favorites')).toBe('D:\\Home\\bob\\Favorites');
  });

  it('should derive program folders from the system drive', () => {
    const bare = new WindowsProvider({ env: { SystemDrive: 'E:' } });
    expect(bare.basePath('application')).toBe('E:\\Program Files');
    expect(bare.basePath('applicationShared')).toBe('E:\\Program Files\\Common Files');
  });

  it('should ignore a system drive that is not a drive root', () => {
    const bare = new WindowsProvider({ env: { SystemDrive: 'E' } });
    expect(bare.basePath('application')).toBe('C:\\Program Files');
    expect(bare.pathApi.isAbsolute(bare.basePath('application') ?? '')).toBe(true);
  });

  it('should default the system drive to C:', () => {
    const bare = new WindowsProvider({ env: {} });
    expect(bare.basePath('application')).toBe('C:\\Program Files');
  });

  it('should report profile folders as absent without a profile', () => {
    const bare = new WindowsProvider({ env: {} });
    expect(bare.basePath('favorites')).toBeUndefined();
    expect(bare.basePath('cache')).toBeUndefined();
    expect(bare.basePath('userApplication')).toBeUndefined();
  });

  it('should have no containers', () => {
    expect(provider.basePath('appContainer')).toBeUndefined();
    expect(provider.basePath('userAppContainerExecutable')).toBeUndefined();
  });
});

describe('createProvider', () => {
  it('should pick the provider for each platform', () => {
    expect(createProvider('linux')).toBeInstanceOf(XdgProvider);
    expect(createProvider('windows')).toBeInstanceOf(WindowsProvider);
    expect(createProvider('macos')).toBeInstanceOf(MacosProvider);
  });

  it('should pass options through', () => {
    const provider = createProvider('linux', { env: {}, homedir: '/srv/home' });
    expect(provider.platform).toBe('linux');
    expect(provider.basePath('config')).toBe('/srv/home/.config');
  });

  it('should return absolute paths whenever a base exists', () => {
    const providers = [
      new XdgProvider({ env: { HOME: '/home/u' } }),
      new MacosProvider({ env: { HOME: '/Users/alice' } }),
      new WindowsProvider({ env: { USERPROFILE: 'C:\\Users\\Alice' } }),
    ];

    for (const p of providers) {
      for (const kind of DIRECTORY_KINDS) {
        const base = p.basePath(kind);
        if (base !== undefined) {
          expect(p.pathApi.isAbsolute(base)).toBe(true);
        }
      }
    }
  });
});
