export type Platform = 'linux' | 'windows' | 'macos';

export const PLATFORMS: readonly Platform[] = ['linux', 'windows', 'macos'];

// Map a Node platform identifier onto the directory convention it follows.
// Every Unix other than Apple's follows the XDG layout.
export function currentPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  switch (nodePlatform) {
    case 'darwin':
      return 'macos';
    case 'win32':
      return 'windows';
    default:
      return 'linux';
  }
}

export function isPlatform(value: unknown): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}
