import type { AppScopedKind, GenericKind, InstallKind } from './kinds.js';
import type { Platform } from './platform.js';
import type { BaseDirProvider } from './providers/base.js';
import type { Log } from './observability/logger.js';

/**
 * How an application name is placed under a base directory: the segment
 * built from the name, followed by any fixed trailing segments.
 */
export interface JoinRule {
  segment(app: string): string;
  trailing: readonly string[];
}

const verbatim = (trailing: readonly string[] = []): JoinRule => ({
  segment: (app) => app,
  trailing,
});

const bundle = (trailing: readonly string[] = []): JoinRule => ({
  segment: (app) => `${app}.app`,
  trailing,
});

const BUNDLE_EXECUTABLE = ['Contents', 'MacOS'];

// null: the kind has no application-specific location on that platform,
// whatever base directory the provider reports.
export const JOIN_RULES: Record<Platform, Record<AppScopedKind, JoinRule | null>> = {
  linux: {
    cache: verbatim(),
    config: verbatim(),
    data: verbatim(),
    dataLocal: verbatim(),
    log: verbatim(['logs']),
    favorites: null,
    preferences: null,
    template: null,
    appContainer: null,
    appContainerExecutable: null,
    userAppContainer: null,
    userAppContainerExecutable: null,
  },
  windows: {
    cache: verbatim(),
    config: verbatim(),
    data: verbatim(),
    dataLocal: verbatim(),
    log: verbatim(),
    favorites: verbatim(),
    preferences: verbatim(),
    template: verbatim(),
    appContainer: null,
    appContainerExecutable: null,
    userAppContainer: null,
    userAppContainerExecutable: null,
  },
  macos: {
    cache: verbatim(),
    config: verbatim(),
    data: verbatim(),
    dataLocal: verbatim(),
    log: verbatim(),
    favorites: verbatim(),
    preferences: verbatim(),
    template: verbatim(['Templates']),
    appContainer: verbatim(['Data']),
    appContainerExecutable: verbatim(['Data', ...BUNDLE_EXECUTABLE]),
    userAppContainer: bundle(),
    userAppContainerExecutable: bundle(BUNDLE_EXECUTABLE),
  },
};

/**
 * Standard directories for one platform, with application-specific variants.
 *
 * Every method is a pure lookup: nothing is created on disk and nothing is
 * remembered between calls. A method returns `undefined` when the platform has
 * no standard location for the requested directory.
 *
 * The application name is used verbatim as a path segment; `.` and `..` are
 * kept as written. Names containing separators produce well-formed but
 * unintended paths.
 */
export class AppDirs {
  readonly platform: Platform;
  private provider: BaseDirProvider;
  private log: Log;

  constructor(provider: BaseDirProvider, log: Log) {
    this.platform = provider.platform;
    this.provider = provider;
    this.log = log.child({ platform: provider.platform });
  }

  /** The generic, application-independent directory of a kind. */
  dir(kind: GenericKind | InstallKind): string | undefined {
    const base = this.provider.basePath(kind);
    if (base === undefined) {
      this.log.debug('No base directory', { kind });
    }
    return base;
  }

  /** The directory of `kind` belonging to application `app`. */
  dirFor(kind: AppScopedKind, app: string): string | undefined {
    const rule = JOIN_RULES[this.platform][kind];
    if (rule === null) {
      this.log.debug('Kind not supported on this platform', { kind });
      return undefined;
    }

    const base = this.provider.basePath(kind);
    if (base === undefined) {
      this.log.debug('No base directory', { kind });
      return undefined;
    }

    return this.join(base, rule.segment(app), rule.trailing);
  }

  cacheDir(): string | undefined {
    return this.dir('cache');
  }

  configDir(): string | undefined {
    return this.dir('config');
  }

  dataDir(): string | undefined {
    return this.dir('data');
  }

  dataLocalDir(): string | undefined {
    return this.dir('dataLocal');
  }

  applicationDir(): string | undefined {
    return this.dir('application');
  }

  applicationSharedDir(): string | undefined {
    return this.dir('applicationShared');
  }

  userApplicationDir(): string | undefined {
    return this.dir('userApplication');
  }

  cacheDirFor(app: string): string | undefined {
    return this.dirFor('cache', app);
  }

  configDirFor(app: string): string | undefined {
    return this.dirFor('config', app);
  }

  dataDirFor(app: string): string | undefined {
    return this.dirFor('data', app);
  }

  dataLocalDirFor(app: string): string | undefined {
    return this.dirFor('dataLocal', app);
  }

  favoritesDirFor(app: string): string | undefined {
    return this.dirFor('favorites', app);
  }

  logDirFor(app: string): string | undefined {
    return this.dirFor('log', app);
  }

  preferenceDirFor(app: string): string | undefined {
    return this.dirFor('preferences', app);
  }

  templateDirFor(app: string): string | undefined {
    return this.dirFor('template', app);
  }

  appContainerDirFor(app: string): string | undefined {
    return this.dirFor('appContainer', app);
  }

  appContainerExecutableDirFor(app: string): string | undefined {
    return this.dirFor('appContainerExecutable', app);
  }

  userAppContainerDirFor(app: string): string | undefined {
    return this.dirFor('userAppContainer', app);
  }

  userAppContainerExecutableDirFor(app: string): string | undefined {
    return this.dirFor('userAppContainerExecutable', app);
  }

  // Concatenated rather than path.join()ed so the name stays verbatim: '.' and '..' are not resolved
  private join(base: string, segment: string, trailing: readonly string[]): string {
    const { sep } = this.provider.pathApi;
    let dir = (base.endsWith(sep) ? base : base + sep) + segment;
    for (const part of trailing) {
      dir = dir.endsWith(sep) ? dir + part : dir + sep + part;
    }
    return dir;
  }
}
