/**
 * UDP Datagram Socket
 *
 * The handle is created lazily: by bind(), by the first send, or by open()
 * when a default destination is given. Options set before then are kept and
 * applied to the handle when it appears.
 */

import Debug from 'debug';
import { defaultBackend } from '../backend';
import type { SocketBackend } from '../backend/types';
import { OPTION_DEFAULTS, SOCKET_CONSTANTS } from '../constants';
import {
  BindError,
  OptionError,
  ReceiveError,
  SendError,
  invalidState,
  socketError,
  translateError
} from '../errors';
import type { SocketPlatform } from '../platform/types';
import { addressToString, formatIp, normalizeMappedAddress } from '../resolver/address-codec';
import { resolveCandidates, selectClientCandidate } from '../resolver/address-resolver';
import type { CandidateAddressList } from '../resolver/candidate-list';
import { SocketState } from '../types/socket';
import type { Endpoint, FamilyHint, InetAddress, OptionLevel, SocketHandle, SocketOptionName } from '../types/socket';
import { SocketResources, resourceFinalizer, trackResources } from './socket-resources';
import type { DatagramMessage, DatagramReceipt, DatagramSocketOptions } from './types';

const debug = Debug('sockwell:datagram-socket');

interface PendingOption {
  level: OptionLevel;
  value: number;
}

export class DatagramSocket {
  private readonly backend: SocketBackend;
  private readonly resources: SocketResources;
  private state: SocketState = SocketState.UNBOUND;
  private familyHint: FamilyHint;
  private family: InetAddress['family'] | null = null;
  private remoteHost: string | null = null;
  private remotePort = 0;
  private scratch: Buffer;
  private nonBlocking = false;
  private pendingOptions: Map<SocketOptionName, PendingOption> = new Map();

  private constructor(backend: SocketBackend, familyHint: FamilyHint, bufferSize: number) {
    this.backend = backend;
    this.familyHint = familyHint;
    this.scratch = Buffer.alloc(bufferSize);
    this.resources = new SocketResources(backend, 'datagram-socket');
    resourceFinalizer.register(this, this.resources, this);
  }

  /**
   * open() leaves the socket unbound; open({ port }) binds it; open({ host, port })
   * creates a handle for host and makes it the destination of send()
   */
  static async open(options: DatagramSocketOptions = {}): Promise<DatagramSocket> {
    const backend = options.backend || defaultBackend();
    const socket = new DatagramSocket(
      backend,
      options.family || 'unspec',
      options.bufferSize || SOCKET_CONSTANTS.DEFAULT_BUFFER_SIZE
    );

    if (options.host) {
      const port = options.port ?? 0;
      const list = await socket.resolve(options.host, port, false);
      try {
        const selection = selectClientCandidate(backend, list);
        const candidate = list.at(selection.index);
        socket.adoptHandle(selection.handle, candidate ? candidate.family : 'inet');
      } finally {
        list.release();
      }
      socket.remoteHost = options.host;
      socket.remotePort = port;
      debug(`Opened datagram socket ${socket.resources.handle} for ${options.host}:${port}`);
    } else if (options.port !== undefined) {
      await socket.bind(options.port);
    }
    return socket;
  }

  private get platform(): SocketPlatform {
    return this.backend.platform;
  }

  getState(): SocketState {
    return this.state;
  }

  isValid(): boolean {
    return this.resources.valid;
  }

  getBufferSize(): number {
    return this.scratch.length;
  }

  private requireOpen(operation: string): void {
    if (this.state === SocketState.CLOSED) {
      throw invalidState(operation, 'Socket is closed', this.platform);
    }
  }

  private requireHandle(operation: string): SocketHandle {
    this.requireOpen(operation);
    if (!this.resources.valid) {
      throw invalidState(operation, 'Socket has no handle', this.platform);
    }
    return this.resources.handle;
  }

  private resolve(host: string | null, port: number, passive: boolean): Promise<CandidateAddressList> {
    return resolveCandidates(this.backend, host, String(port), {
      family: this.family || this.familyHint,
      kind: 'dgram',
      protocol: 'udp',
      passive
    });
  }

  /**
   * Take a freshly created handle and apply what was configured before it existed
   */
  private adoptHandle(handle: SocketHandle, family: InetAddress['family']): void {
    this.resources.adopt(handle);
    this.family = family;
    try {
      for (const [name, { level, value }] of this.pendingOptions) {
        this.backend.setOption(handle, level, name, value);
      }
      if (this.nonBlocking) {
        this.backend.setNonBlocking(handle, true);
      }
    } catch (error) {
      this.resources.closeHandle();
      this.family = null;
      throw translateError(OptionError, 'setsockopt', error, this.platform);
    }
    this.pendingOptions.clear();
  }

  /**
   * Bind to port on the wildcard address of the socket's family
   */
  async bind(port: number): Promise<void> {
    this.requireOpen('bind');
    if (this.state === SocketState.BOUND || this.boundLocally()) {
      throw socketError(BindError, 'bind', 'EINVAL', this.platform);
    }

    const list = await this.resolve(null, port, true);
    try {
      let address: Endpoint;
      if (this.resources.valid) {
        const candidate = list.at(0);
        if (!candidate) {
          throw socketError(BindError, 'bind', SOCKET_CONSTANTS.NO_ADDRESS_CODE, this.platform);
        }
        address = candidate.address;
      } else {
        const selection = selectClientCandidate(this.backend, list);
        const candidate = list.at(selection.index);
        if (!candidate) {
          this.backend.close(selection.handle);
          throw socketError(BindError, 'bind', SOCKET_CONSTANTS.NO_ADDRESS_CODE, this.platform);
        }
        this.adoptHandle(selection.handle, candidate.family);
        address = candidate.address;
      }

      try {
        await this.backend.bind(this.resources.handle, address);
      } catch (error) {
        throw translateError(BindError, 'bind', error, this.platform);
      }
    } finally {
      list.release();
    }
    this.state = SocketState.BOUND;
    debug(`Datagram socket ${this.resources.handle} bound to port ${port}`);
  }

  private boundLocally(): boolean {
    if (!this.resources.valid) {
      return false;
    }
    try {
      return this.backend.localAddress(this.resources.handle) !== null;
    } catch (error) {
      debug(`getsockname failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  /**
   * Send one datagram to host:port, resolving host on every call
   */
  async sendTo(data: string | Uint8Array, host: string, port: number): Promise<number> {
    this.requireOpen('send');
    const payload = typeof data === 'string' ? Buffer.from(data) : data;
    const list = await this.resolve(host, port, false);
    try {
      let index = 0;
      if (!this.resources.valid) {
        const selection = selectClientCandidate(this.backend, list);
        const created = list.at(selection.index);
        this.adoptHandle(selection.handle, created ? created.family : 'inet');
        index = selection.index;
      }
      const candidate = list.at(index);
      if (!candidate) {
        throw socketError(SendError, 'send', SOCKET_CONSTANTS.NO_ADDRESS_CODE, this.platform);
      }

      try {
        return await this.backend.sendTo(this.resources.handle, payload, candidate.address);
      } catch (error) {
        throw translateError(SendError, 'send', error, this.platform);
      }
    } finally {
      list.release();
    }
  }

  /**
   * Send to the host and port given to open()
   */
  async send(data: string | Uint8Array): Promise<number> {
    if (this.remoteHost === null) {
      throw invalidState('send', 'Socket has no default destination', this.platform);
    }
    return this.sendTo(data, this.remoteHost, this.remotePort);
  }

  /**
   * Receive one datagram into buffer; excess bytes of a longer datagram are lost
   */
  async recvFrom(buffer: Buffer): Promise<DatagramReceipt> {
    const handle = this.requireHandle('receive');
    if (!this.boundLocally()) {
      throw invalidState('receive', 'Socket is not bound', this.platform);
    }
    try {
      const { bytes, from } = await this.backend.recvFrom(handle, buffer);
      const sender = normalizeMappedAddress(from);
      return { bytes, address: formatIp(sender), port: sender.port };
    } catch (error) {
      throw translateError(ReceiveError, 'receive', error, this.platform);
    }
  }

  /**
   * Receive one datagram of at most maxSize bytes
   */
  async receive(maxSize: number = this.scratch.length): Promise<DatagramMessage> {
    const target = maxSize <= this.scratch.length ? this.scratch.subarray(0, maxSize) : Buffer.alloc(maxSize);
    const { bytes, address, port } = await this.recvFrom(target);
    return { data: Buffer.from(target.subarray(0, bytes)), address, port };
  }

  setOption(level: OptionLevel, name: SocketOptionName, value: number): void {
    this.requireOpen('setsockopt');
    if (!this.resources.valid) {
      this.pendingOptions.set(name, { level, value });
      return;
    }
    try {
      this.backend.setOption(this.resources.handle, level, name, value);
    } catch (error) {
      throw translateError(OptionError, 'setsockopt', error, this.platform);
    }
  }

  getOption(level: OptionLevel, name: SocketOptionName): number {
    this.requireOpen('getsockopt');
    if (!this.resources.valid) {
      const pending = this.pendingOptions.get(name);
      return pending ? pending.value : OPTION_DEFAULTS[name];
    }
    try {
      return this.backend.getOption(this.resources.handle, level, name);
    } catch (error) {
      throw translateError(OptionError, 'getsockopt', error, this.platform);
    }
  }

  setNonBlocking(enabled: boolean): void {
    this.requireOpen('setNonBlocking');
    if (this.resources.valid) {
      try {
        this.backend.setNonBlocking(this.resources.handle, enabled);
      } catch (error) {
        throw translateError(OptionError, 'setNonBlocking', error, this.platform);
      }
    }
    this.nonBlocking = enabled;
  }

  /**
   * Receive and send timeout in milliseconds; 0 disables it
   */
  setTimeout(millis: number): void {
    if (!Number.isInteger(millis) || millis < 0) {
      throw socketError(OptionError, 'setsockopt', 'EINVAL', this.platform);
    }
    this.setOption('socket', 'SO_RCVTIMEO', millis);
    this.setOption('socket', 'SO_SNDTIMEO', millis);
  }

  setBufferSize(size: number): void {
    if (!Number.isInteger(size) || size <= 0) {
      throw socketError(OptionError, 'setBufferSize', 'EINVAL', this.platform);
    }
    this.scratch = Buffer.alloc(size);
  }

  getLocalSocketAddress(): string {
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
    return addressToString(local.family === 'local' ? local : normalizeMappedAddress(local));
  }

  /**
   * Release the handle; never throws, calling it again does nothing
   */
  close(): void {
    this.resources.release();
    this.pendingOptions.clear();
    this.state = SocketState.CLOSED;
    resourceFinalizer.unregister(this);
  }

  /**
   * Move this socket into a new object; this one is left invalid
   */
  transfer(): DatagramSocket {
    const target = new DatagramSocket(this.backend, this.familyHint, this.scratch.length);
    target.assign(this);
    return target;
  }

  /**
   * Take over source, closing whatever this socket held
   */
  assign(source: DatagramSocket): this {
    if (source === this) {
      return this;
    }
    source.resources.transferTo(this.resources);
    this.state = source.state;
    this.familyHint = source.familyHint;
    this.family = source.family;
    this.remoteHost = source.remoteHost;
    this.remotePort = source.remotePort;
    this.scratch = source.scratch;
    this.nonBlocking = source.nonBlocking;
    this.pendingOptions = new Map(source.pendingOptions);

    source.state = SocketState.CLOSED;
    source.family = null;
    source.remoteHost = null;
    source.pendingOptions = new Map();
    resourceFinalizer.unregister(source);
    trackResources(this, this.resources);
    return this;
  }
}
