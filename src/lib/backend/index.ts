/**
 * Socket backends
 */

import { NodeSocketBackend } from './node-backend';
import type { SocketBackend } from './types';

export * from './types';
export { BaseSocketBackend, initialSocketState } from './base-backend';
export type { BackendSocketState } from './base-backend';
export { NodeSocketBackend } from './node-backend';
export type { NodeBackendOptions } from './node-backend';
export { LoopbackSocketBackend, DEFAULT_LOOPBACK_HOSTS, DEFAULT_LOOPBACK_INTERFACES } from './loopback-backend';
export type { LoopbackBackendOptions } from './loopback-backend';

let sharedBackend: SocketBackend | undefined;

/**
 * Backend used when a socket is opened without one: real sockets for the
 * running platform, created on first use
 */
export function defaultBackend(): SocketBackend {
  if (!sharedBackend) {
    sharedBackend = new NodeSocketBackend();
  }
  return sharedBackend;
}

/**
 * Replace the backend used when none is given
 */
export function setDefaultBackend(backend: SocketBackend): void {
  sharedBackend = backend;
}
