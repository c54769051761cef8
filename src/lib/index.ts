/**
 * Main library export file
 *
 * Exports the socket classes, the backends they run on and the supporting
 * layers (errors, platform profiles, resolution, interfaces, initialization).
 */

// Socket classes
export {
  Socket,
  ServerSocket,
  DatagramSocket,
  UnixSocket,
  StreamSocket,
  SocketResources,
  isLocalSocketSupported,
  captureEndpoint
} from './sockets';
export type {
  SocketOptions,
  ServerSocketOptions,
  DatagramSocketOptions,
  UnixSocketOptions,
  DatagramReceipt,
  DatagramMessage
} from './sockets';

// Backends
export * from './backend';

// Errors and diagnostics
export * from './errors';
export { Diagnostics, diagnostics } from './diagnostics';
export type { CleanupErrorEvent, LiveHandlesEvent } from './diagnostics';

// Platform profiles
export * from './platform';

// Address resolution
export * from './resolver';

// Interfaces and network initialization
export * from './interfaces';
export * from './runtime';

// Configuration, constants and shared types
export { DEFAULT_SOCKET_CONFIG, resolveSocketConfig } from './config';
export type { SocketConfig } from './config';
export { SOCKET_CONSTANTS, OPTION_DEFAULTS, OPTION_LEVELS, WOULD_BLOCK_CODES, BACKEND_CONSTANTS } from './constants';
export * from './types/socket';
