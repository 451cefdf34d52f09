/** Kinds that have both a generic and an application-specific form. */
export type GenericKind = 'cache' | 'config' | 'data' | 'dataLocal';

/** Locations where applications are installed; these take no application name. */
export type InstallKind = 'application' | 'applicationShared' | 'userApplication';

export type ContainerKind =
  | 'appContainer'
  | 'appContainerExecutable'
  | 'userAppContainer'
  | 'userAppContainerExecutable';

/** Every kind that is only meaningful together with an application name. */
export type AppScopedKind = GenericKind | 'log' | 'favorites' | 'preferences' | 'template' | ContainerKind;

export type DirectoryKind = AppScopedKind | InstallKind;

export const GENERIC_KINDS: readonly GenericKind[] = ['cache', 'config', 'data', 'dataLocal'];

export const INSTALL_KINDS: readonly InstallKind[] = ['application', 'applicationShared', 'userApplication'];

export const CONTAINER_KINDS: readonly ContainerKind[] = [
  'appContainer',
  'appContainerExecutable',
  'userAppContainer',
  'userAppContainerExecutable',
];

export const APP_SCOPED_KINDS: readonly AppScopedKind[] = [
  ...GENERIC_KINDS,
  'log',
  'favorites',
  'preferences',
  'template',
  ...CONTAINER_KINDS,
];

export const DIRECTORY_KINDS: readonly DirectoryKind[] = [...APP_SCOPED_KINDS, ...INSTALL_KINDS];
