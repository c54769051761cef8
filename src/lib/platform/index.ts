/**
 * Platform profile selection
 */

import { PosixPlatform } from './posix';
import { Win32Platform } from './win32';
import type { PlatformName, SocketPlatform } from './types';

export * from './types';
export { BasePlatform } from './base-platform';
export { PosixPlatform } from './posix';
export { Win32Platform } from './win32';

/**
 * Create the profile for a platform family
 */
export function createPlatform(name: PlatformName): SocketPlatform {
  return name === 'win32' ? new Win32Platform() : new PosixPlatform();
}

/**
 * Profile for the running process
 */
export function selectPlatform(platform: NodeJS.Platform = process.platform): SocketPlatform {
  return createPlatform(platform === 'win32' ? 'win32' : 'posix');
}
