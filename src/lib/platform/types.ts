/**
 * Platform Profile Types
 *
 * Everything that differs between the two operating-system families lives
 * behind this interface; socket code never branches on process.platform.
 */

import type { SocketOptionName } from '../types/socket';

export type PlatformName = 'posix' | 'win32';

/**
 * One row of a platform's error table
 */
export interface ErrorTableEntry {
  errno?: number;
  message: string;
}

export interface SocketPlatform {
  readonly name: PlatformName;
  /** Whether the network subsystem must be started before any socket call */
  readonly requiresStartup: boolean;
  /** Largest listen backlog the platform accepts (SOMAXCONN) */
  readonly maxBacklog: number;
  /** Option set on listening sockets to control address reuse */
  readonly reuseAddressOption: Extract<SocketOptionName, 'SO_REUSEADDR' | 'SO_EXCLUSIVEADDRUSE'>;
  /** Whether the local (Unix-domain) address family exists */
  readonly supportsLocalSockets: boolean;

  supportsOption(name: SocketOptionName): boolean;
  /** Numeric platform error number for a symbolic code, 0 when unknown */
  errorNumber(code: string): number;
  /** Human-readable text for a symbolic code, undefined when unknown */
  errorToString(code: string): string | undefined;
}
