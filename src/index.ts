import { AppDirs } from './deriver.js';
import { resolveConfig } from './config/loader.js';
import type { AppDirsOptions } from './config/schema.js';
import { createProvider } from './providers/index.js';
import { createLogger } from './observability/logger.js';

export const VERSION = '0.3.0';

export { AppDirs, JOIN_RULES } from './deriver.js';
export type { JoinRule } from './deriver.js';
export {
  BaseDirProvider,
  XdgProvider,
  WindowsProvider,
  MacosProvider,
  createProvider,
} from './providers/index.js';
export type { Environment, ProviderOptions } from './providers/index.js';
export { currentPlatform, isPlatform, PLATFORMS } from './platform.js';
export type { Platform } from './platform.js';
export {
  APP_SCOPED_KINDS,
  CONTAINER_KINDS,
  DIRECTORY_KINDS,
  GENERIC_KINDS,
  INSTALL_KINDS,
} from './kinds.js';
export type { AppScopedKind, ContainerKind, DirectoryKind, GenericKind, InstallKind } from './kinds.js';
export { validateOptions, isValidOptions } from './config/schema.js';
export type { AppDirsConfig, AppDirsOptions, ValidationError } from './config/schema.js';
export { resolveConfig } from './config/loader.js';
export { Logger, createLogger } from './observability/logger.js';
export type { Log, LogEntry, LogLevel, LoggerOptions } from './observability/logger.js';

/**
 * Build an {@link AppDirs} for a platform. Without options it describes the
 * host, reading `process.env` at call time.
 *
 * @throws Error when the options fail validation
 */
export function createAppDirs(options: AppDirsOptions = {}): AppDirs {
  const config = resolveConfig(options);
  const provider =
    config.provider ?? createProvider(config.platform, { env: config.env, homedir: config.homedir });
  const logger = createLogger({ level: config.logLevel, json: config.json });
  return new AppDirs(provider, logger);
}

let defaultAppDirs: AppDirs | null = null;

// Host instance behind the function exports below
export function getAppDirs(): AppDirs {
  if (!defaultAppDirs) {
    defaultAppDirs = createAppDirs();
  }
  return defaultAppDirs;
}

export const cacheDir = (): string | undefined => getAppDirs().cacheDir();
export const configDir = (): string | undefined => getAppDirs().configDir();
export const dataDir = (): string | undefined => getAppDirs().dataDir();
export const dataLocalDir = (): string | undefined => getAppDirs().dataLocalDir();

export const applicationDir = (): string | undefined => getAppDirs().applicationDir();
export const applicationSharedDir = (): string | undefined => getAppDirs().applicationSharedDir();
export const userApplicationDir = (): string | undefined => getAppDirs().userApplicationDir();

export const cacheDirFor = (app: string): string | undefined => getAppDirs().cacheDirFor(app);
export const configDirFor = (app: string): string | undefined => getAppDirs().configDirFor(app);
export const dataDirFor = (app: string): string | undefined => getAppDirs().dataDirFor(app);
export const dataLocalDirFor = (app: string): string | undefined => getAppDirs().dataLocalDirFor(app);
export const favoritesDirFor = (app: string): string | undefined => getAppDirs().favoritesDirFor(app);
export const logDirFor = (app: string): string | undefined => getAppDirs().logDirFor(app);
export const preferenceDirFor = (app: string): string | undefined => getAppDirs().preferenceDirFor(app);
export const templateDirFor = (app: string): string | undefined => getAppDirs().templateDirFor(app);

export const appContainerDirFor = (app: string): string | undefined =>
  getAppDirs().appContainerDirFor(app);
export const appContainerExecutableDirFor = (app: string): string | undefined =>
  getAppDirs().appContainerExecutableDirFor(app);
export const userAppContainerDirFor = (app: string): string | undefined =>
  getAppDirs().userAppContainerDirFor(app);
export const userAppContainerExecutableDirFor = (app: string): string | undefined =>
  getAppDirs().userAppContainerExecutableDirFor(app);
