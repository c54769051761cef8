/**
 * Local (Unix-domain) Stream Socket
 */

import Debug from 'debug';
import { defaultBackend } from '../backend';
import type { SocketBackend } from '../backend/types';
import { resolveSocketConfig } from '../config';
import type { SocketConfig } from '../config';
import { WOULD_BLOCK_CODES } from '../constants';
import {
  AcceptError,
  BindError,
  ConnectError,
  CreationError,
  ListenError,
  invalidState,
  translateError
} from '../errors';
import { toSystemError } from '../errors/system-error';
import { SocketState } from '../types/socket';
import type { AcceptedConnection, LocalAddress, SocketHandle } from '../types/socket';
import { StreamSocket } from './stream-socket';
import type { UnixSocketOptions } from './types';

const debug = Debug('sockwell:unix-socket');

/**
 * Whether the backend's platform has the local socket family
 */
export function isLocalSocketSupported(backend: SocketBackend = defaultBackend()): boolean {
  return backend.platform.supportsLocalSockets;
}

export class UnixSocket extends StreamSocket {
  private path: string;

  private constructor(backend: SocketBackend, config: SocketConfig, path: string, initialState: SocketState) {
    super(backend, config, 'unix-socket', initialState);
    this.path = path;
  }

  /**
   * Create a local stream socket for path; nothing is bound or connected yet
   */
  static async open(path: string, options: UnixSocketOptions = {}): Promise<UnixSocket> {
    const backend = options.backend || defaultBackend();
    let handle: SocketHandle;
    try {
      handle = backend.create('local', 'stream', 'default');
    } catch (error) {
      throw translateError(CreationError, 'socket', error, backend.platform);
    }

    const config = resolveSocketConfig({ bufferSize: options.bufferSize, backlog: options.backlog });
    const socket = new UnixSocket(backend, config, path, SocketState.UNBOUND);
    socket.resources.adopt(handle);
    debug(`Opened local socket ${handle} for ${path}`);
    return socket;
  }

  private get address(): LocalAddress {
    return { family: 'local', path: this.path };
  }

  getSocketPath(): string {
    return this.path;
  }

  /**
   * Remove whatever file is left at the path, then bind to it
   */
  async bind(): Promise<void> {
    const handle = this.requireHandle('bind');
    if (this.state !== SocketState.UNBOUND) {
      throw invalidState('bind', 'Socket is already bound', this.platform);
    }
    try {
      await this.backend.unlinkLocal(this.path);
      await this.backend.bind(handle, this.address);
    } catch (error) {
      throw translateError(BindError, 'bind', error, this.platform);
    }
    this.state = SocketState.BOUND;
  }

  listen(backlog: number = this.config.backlog ?? this.platform.maxBacklog): void {
    const handle = this.requireHandle('listen');
    if (this.state !== SocketState.BOUND) {
      throw invalidState('listen', 'Socket is not bound', this.platform);
    }
    try {
      this.backend.listen(handle, backlog);
    } catch (error) {
      throw translateError(ListenError, 'listen', error, this.platform);
    }
    this.state = SocketState.LISTENING;
  }

  async accept(): Promise<UnixSocket> {
    const handle = this.requireHandle('accept');
    if (this.state !== SocketState.LISTENING) {
      throw invalidState('accept', 'Socket is not listening', this.platform);
    }
    let connection: AcceptedConnection;
    try {
      connection = await this.backend.accept(handle);
    } catch (error) {
      throw translateError(AcceptError, 'accept', error, this.platform);
    }

    const accepted = new UnixSocket(this.backend, { ...this.config }, this.path, SocketState.CONNECTED);
    accepted.resources.adopt(connection.handle);
    accepted.remote = connection.peer;
    return accepted;
  }

  async connect(): Promise<void> {
    const handle = this.requireHandle('connect');
    if (this.state === SocketState.CONNECTED || this.state === SocketState.CONNECTING) {
      throw invalidState('connect', 'Socket is already connected', this.platform);
    }
    try {
      await this.backend.connect(handle, this.address, this.config.connectTimeout);
    } catch (error) {
      const failure = toSystemError(error, 'connect');
      if (WOULD_BLOCK_CODES.includes(failure.code)) {
        this.state = SocketState.CONNECTING;
      }
      throw translateError(ConnectError, 'connect', failure, this.platform);
    }
    this.onConnected();
  }

  /**
   * Move this socket into a new object; this one is left invalid
   */
  transfer(): UnixSocket {
    const target = new UnixSocket(this.backend, this.config, this.path, SocketState.UNBOUND);
    target.assign(this);
    return target;
  }

  /**
   * Take over source, closing whatever this socket held
   */
  assign(source: UnixSocket): this {
    this.moveFrom(source);
    this.path = source.path;
    return this;
  }
}
