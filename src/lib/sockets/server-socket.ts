/**
 * Listening TCP Socket
 *
 * Unbound -> Bound -> Listening -> Closed. Open resolves the wildcard
 * addresses of both families and prefers a dual-stack IPv6 handle.
 */

import Debug from 'debug';
import { defaultBackend } from '../backend';
import type { SocketBackend } from '../backend/types';
import { resolveSocketConfig } from '../config';
import type { SocketConfig } from '../config';
import { SOCKET_CONSTANTS } from '../constants';
import { diagnostics } from '../diagnostics';
import {
  AcceptError,
  BindError,
  ConfigurationError,
  ListenError,
  OptionError,
  ShutdownError,
  invalidState,
  socketError,
  translateError
} from '../errors';
import type { SocketPlatform } from '../platform/types';
import { addressToString } from '../resolver/address-codec';
import { resolveCandidates, selectServerCandidate } from '../resolver/address-resolver';
import type { CandidateSelection } from '../resolver/address-resolver';
import { SocketState } from '../types/socket';
import type { AcceptedConnection, Endpoint, SocketHandle } from '../types/socket';
import { Socket } from './socket';
import { SocketResources, resourceFinalizer, trackResources } from './socket-resources';
import { captureEndpoint } from './stream-socket';
import type { ServerSocketOptions } from './types';

const debug = Debug('sockwell:server-socket');

export class ServerSocket {
  private readonly backend: SocketBackend;
  private readonly resources: SocketResources;
  private config: SocketConfig;
  private state: SocketState = SocketState.UNBOUND;
  private port: number;

  private constructor(backend: SocketBackend, config: SocketConfig, port: number) {
    this.backend = backend;
    this.config = config;
    this.port = port;
    this.resources = new SocketResources(backend, 'server-socket');
    resourceFinalizer.register(this, this.resources, this);
  }

  /**
   * Resolve the listening addresses for port, select a candidate and set
   * the platform's address-reuse option
   */
  static async open(port: number, options: ServerSocketOptions = {}): Promise<ServerSocket> {
    const backend = options.backend || defaultBackend();
    const list = await resolveCandidates(backend, options.host ?? null, String(port), {
      family: options.family || 'unspec',
      kind: 'stream',
      protocol: 'tcp',
      passive: true
    });

    let selection: CandidateSelection;
    try {
      selection = selectServerCandidate(backend, list);
    } catch (error) {
      list.release();
      throw error;
    }

    const server = new ServerSocket(backend, resolveSocketConfig(options), port);
    server.resources.adopt(selection.handle, list, selection.index);

    try {
      backend.setOption(selection.handle, 'socket', backend.platform.reuseAddressOption, 1);
    } catch (error) {
      server.resources.release();
      server.state = SocketState.CLOSED;
      resourceFinalizer.unregister(server);
      throw translateError(ConfigurationError, 'setsockopt', error, backend.platform);
    }

    debug(`Opened server socket ${selection.handle} for port ${port}`);
    return server;
  }

  private get platform(): SocketPlatform {
    return this.backend.platform;
  }

  private requireHandle(operation: string): SocketHandle {
    if (!this.resources.valid) {
      const reason = this.state === SocketState.CLOSED ? 'Socket is closed' : 'Socket has no handle';
      throw invalidState(operation, reason, this.platform);
    }
    return this.resources.handle;
  }

  getState(): SocketState {
    return this.state;
  }

  isValid(): boolean {
    return this.resources.valid;
  }

  async bind(): Promise<void> {
    const handle = this.requireHandle('bind');
    if (this.state !== SocketState.UNBOUND) {
      throw invalidState('bind', 'Socket is already bound', this.platform);
    }
    if (this.port === 0) {
      throw socketError(BindError, 'bind', 'EINVAL', this.platform);
    }
    const candidate = this.resources.selected;
    if (!candidate) {
      throw socketError(BindError, 'bind', SOCKET_CONSTANTS.NO_ADDRESS_CODE, this.platform);
    }

    try {
      await this.backend.bind(handle, candidate.address);
    } catch (error) {
      throw translateError(BindError, 'bind', error, this.platform);
    }
    this.resources.releaseCandidates();
    this.state = SocketState.BOUND;
    debug(`Server socket ${handle} bound to port ${this.port}`);
  }

  /**
   * Start accepting; the backlog defaults to the configured value or the
   * platform maximum
   */
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

  async accept(): Promise<Socket> {
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

    const peer: Endpoint | null = connection.peer ? captureEndpoint(connection.peer) : null;
    debug(`Accepted ${connection.handle} from ${peer ? addressToString(peer) : 'unknown peer'}`);
    return Socket.fromAccepted(this.backend, connection.handle, peer, this.config);
  }

  shutdown(): void {
    const handle = this.requireHandle('shutdown');
    try {
      this.backend.shutdown(handle, 'both');
    } catch (error) {
      throw translateError(ShutdownError, 'shutdown', error, this.platform);
    }
  }

  /**
   * Shut down, then release the handle and candidate list. A shutdown
   * failure is reported to the diagnostic channel; close itself never throws.
   */
  close(): void {
    if (this.resources.valid) {
      try {
        this.shutdown();
      } catch (error) {
        diagnostics.reportCleanupError('server-socket', 'shutdown', error);
      }
    }
    this.resources.release();
    this.state = SocketState.CLOSED;
    resourceFinalizer.unregister(this);
  }

  setNonBlocking(enabled: boolean): void {
    const handle = this.requireHandle('setNonBlocking');
    try {
      this.backend.setNonBlocking(handle, enabled);
    } catch (error) {
      throw translateError(OptionError, 'setNonBlocking', error, this.platform);
    }
  }

  /**
   * Accept timeout in milliseconds; 0 waits indefinitely
   */
  setTimeout(millis: number): void {
    const handle = this.requireHandle('setsockopt');
    try {
      this.backend.setOption(handle, 'socket', 'SO_RCVTIMEO', millis);
    } catch (error) {
      throw translateError(OptionError, 'setsockopt', error, this.platform);
    }
  }

  getLocalSocketAddress(): string {
    return addressToString(this.localEndpoint());
  }

  getLocalPort(): number {
    const local = this.localEndpoint();
    return local.family === 'local' ? 0 : local.port;
  }

  private localEndpoint(): Endpoint {
    const handle = this.requireHandle('getsockname');
    let local: Endpoint | null;
    try {
      local = this.backend.localAddress(handle);
    } catch (error) {
      throw translateError(OptionError, 'getsockname', error, this.platform);
    }
    if (!local) {
      throw invalidState('getsockname', 'Socket is not bound', this.platform);
    }
    return captureEndpoint(local);
  }

  /**
   * Move this socket into a new object; this one is left invalid
   */
  transfer(): ServerSocket {
    const target = new ServerSocket(this.backend, this.config, this.port);
    target.assign(this);
    return target;
  }

  /**
   * Take over source, closing whatever this socket held
   */
  assign(source: ServerSocket): this {
    if (source === this) {
      return this;
    }
    source.resources.transferTo(this.resources);
    this.config = { ...source.config };
    this.state = source.state;
    this.port = source.port;
    source.state = SocketState.CLOSED;
    resourceFinalizer.unregister(source);
    trackResources(this, this.resources);
    return this;
  }
}
