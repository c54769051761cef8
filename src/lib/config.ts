/**
 * Socket configuration
 */

import { SOCKET_CONSTANTS } from './constants';

export interface SocketConfig {
  /** Size of the per-socket scratch buffer used by text and readAvailable reads */
  bufferSize: number;
  /** Listen backlog; undefined means the platform maximum */
  backlog?: number;
  /** Connect timeout in milliseconds, 0 waits indefinitely */
  connectTimeout: number;
  /** Try the remaining resolved candidates when a blocking connect fails */
  connectFallback: boolean;
}

export const DEFAULT_SOCKET_CONFIG: Readonly<SocketConfig> = {
  bufferSize: SOCKET_CONSTANTS.DEFAULT_BUFFER_SIZE,
  backlog: undefined,
  connectTimeout: 0,
  connectFallback: true
};

/**
 * Merge caller options over the defaults
 */
export function resolveSocketConfig(options: Partial<SocketConfig> = {}): SocketConfig {
  return {
    bufferSize: options.bufferSize || DEFAULT_SOCKET_CONFIG.bufferSize,
    backlog: options.backlog ?? DEFAULT_SOCKET_CONFIG.backlog,
    connectTimeout: options.connectTimeout || DEFAULT_SOCKET_CONFIG.connectTimeout,
    connectFallback: options.connectFallback ?? DEFAULT_SOCKET_CONFIG.connectFallback
  };
}
