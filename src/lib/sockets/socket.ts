/**
 * Connected TCP Socket
 */

import Debug from 'debug';
import { defaultBackend } from '../backend';
import type { SocketBackend } from '../backend/types';
import { resolveSocketConfig } from '../config';
import type { SocketConfig } from '../config';
import { SOCKET_CONSTANTS, WOULD_BLOCK_CODES } from '../constants';
import { ConnectError, socketError, translateError } from '../errors';
import { toSystemError } from '../errors/system-error';
import type { SystemError } from '../errors/system-error';
import { resolveCandidates, selectClientCandidate } from '../resolver/address-resolver';
import type { CandidateSelection } from '../resolver/address-resolver';
import { SocketState } from '../types/socket';
import type { Endpoint, SocketHandle } from '../types/socket';
import { StreamSocket } from './stream-socket';
import type { SocketOptions } from './types';

const debug = Debug('sockwell:socket');

export class Socket extends StreamSocket {
  private constructor(backend: SocketBackend, config: SocketConfig) {
    super(backend, config, 'socket', SocketState.UNCONNECTED);
  }

  /**
   * Resolve host and port and create a handle for the first candidate that
   * allows it. The socket is not connected yet.
   */
  static async open(host: string, port: number, options: SocketOptions = {}): Promise<Socket> {
    const backend = options.backend || defaultBackend();
    const list = await resolveCandidates(backend, host, String(port), {
      family: options.family || 'unspec',
      kind: 'stream',
      protocol: 'tcp',
      passive: false
    });

    let selection: CandidateSelection;
    try {
      selection = selectClientCandidate(backend, list);
    } catch (error) {
      list.release();
      throw error;
    }

    const socket = new Socket(backend, resolveSocketConfig(options));
    socket.resources.adopt(selection.handle, list, selection.index);
    debug(`Opened socket ${selection.handle} for ${host}:${port}`);
    return socket;
  }

  /**
   * Wrap a handle produced by accept(); the peer was captured by the caller
   */
  static fromAccepted(backend: SocketBackend, handle: SocketHandle, peer: Endpoint | null, config: SocketConfig): Socket {
    const socket = new Socket(backend, { ...config });
    socket.resources.adopt(handle);
    socket.remote = peer;
    socket.state = SocketState.CONNECTED;
    return socket;
  }

  /**
   * Connect to the selected candidate. When that fails on a blocking socket
   * the remaining candidates are tried in order, unless connectFallback is off.
   */
  async connect(): Promise<void> {
    const handle = this.requireHandle('connect');
    if (this.state === SocketState.CONNECTED || this.state === SocketState.CONNECTING) {
      const code = this.state === SocketState.CONNECTED ? 'EISCONN' : 'EALREADY';
      throw socketError(ConnectError, 'connect', code, this.platform);
    }
    const candidate = this.resources.selected;
    if (!candidate) {
      throw socketError(ConnectError, 'connect', SOCKET_CONSTANTS.NO_ADDRESS_CODE, this.platform);
    }

    try {
      await this.backend.connect(handle, candidate.address, this.config.connectTimeout);
    } catch (error) {
      const failure = toSystemError(error, 'connect');
      if (WOULD_BLOCK_CODES.includes(failure.code)) {
        this.state = SocketState.CONNECTING;
        throw translateError(ConnectError, 'connect', failure, this.platform);
      }
      if (!this.config.connectFallback || this.nonBlocking) {
        throw translateError(ConnectError, 'connect', failure, this.platform);
      }
      await this.connectRemaining(failure);
      return;
    }
    this.onConnected();
  }

  private async connectRemaining(firstFailure: SystemError): Promise<void> {
    const list = this.resources.candidateList;
    let lastFailure = firstFailure;
    let next = this.resources.selectedPosition + 1;

    while (list && next < list.length) {
      let selection: CandidateSelection;
      try {
        selection = selectClientCandidate(this.backend, list, next);
      } catch (error) {
        debug(`No further candidate could be created: ${error instanceof Error ? error.message : String(error)}`);
        break;
      }
      const candidate = list.at(selection.index);
      if (!candidate) {
        break;
      }

      this.resources.closeHandle();
      this.resources.reselect(selection.handle, selection.index);
      this.replayOptions(selection.handle);
      debug(`Falling back to candidate ${selection.index}`);

      try {
        await this.backend.connect(selection.handle, candidate.address, this.config.connectTimeout);
        this.onConnected();
        return;
      } catch (error) {
        lastFailure = toSystemError(error, 'connect');
        next = selection.index + 1;
      }
    }

    throw translateError(ConnectError, 'connect', lastFailure, this.platform);
  }

  enableNoDelay(enabled = true): void {
    this.setSocketOption('tcp', 'TCP_NODELAY', enabled ? 1 : 0);
  }

  enableKeepAlive(enabled = true): void {
    this.setSocketOption('socket', 'SO_KEEPALIVE', enabled ? 1 : 0);
  }

  /**
   * Move this socket into a new object; this one is left invalid
   */
  transfer(): Socket {
    const target = new Socket(this.backend, this.config);
    target.moveFrom(this);
    return target;
  }

  /**
   * Take over source, closing whatever this socket held
   */
  assign(source: Socket): this {
    this.moveFrom(source);
    return this;
  }
}
