/**
 * Socket class options and results
 */

import type { SocketBackend } from '../backend/types';
import type { SocketConfig } from '../config';
import type { FamilyHint } from '../types/socket';

export interface SocketOptions extends Partial<SocketConfig> {
  /** Defaults to the shared Node backend */
  backend?: SocketBackend;
  family?: FamilyHint;
}

export interface ServerSocketOptions extends SocketOptions {
  /** Local address to listen on; null or absent listens on all interfaces */
  host?: string | null;
}

export interface DatagramSocketOptions {
  backend?: SocketBackend;
  family?: FamilyHint;
  /** Remote host that send() addresses */
  host?: string;
  /** Local port to bind, or the remote port when host is given */
  port?: number;
  bufferSize?: number;
}

export interface UnixSocketOptions {
  backend?: SocketBackend;
  bufferSize?: number;
  backlog?: number;
}

/**
 * Outcome of recvFrom() into a caller buffer
 */
export interface DatagramReceipt {
  bytes: number;
  address: string;
  port: number;
}

/**
 * Outcome of receive() through the scratch buffer
 */
export interface DatagramMessage {
  data: Buffer;
  address: string;
  port: number;
}
