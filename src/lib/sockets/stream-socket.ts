/**
 * Stream Socket
 *
 * Byte-stream I/O shared by TCP and local sockets: exact and available
 * reads, writes, half-close, readiness polling and the option toggles.
 */

import Debug from 'debug';
import type { SocketBackend } from '../backend/types';
import type { SocketConfig } from '../config';
import { SOCKET_CONSTANTS, WOULD_BLOCK_CODES } from '../constants';
import { diagnostics } from '../diagnostics';
import {
  ConnectError,
  ConnectionClosedError,
  OptionError,
  PollError,
  ReadError,
  ShutdownError,
  WriteError,
  invalidState,
  socketError,
  translateError
} from '../errors';
import { toSystemError } from '../errors/system-error';
import type { SocketPlatform } from '../platform/types';
import { addressToString, normalizeMappedAddress } from '../resolver/address-codec';
import { SocketState } from '../types/socket';
import type { Endpoint, OptionLevel, ShutdownMode, SocketHandle, SocketOptionName } from '../types/socket';
import { SocketResources, resourceFinalizer, trackResources } from './socket-resources';

const debug = Debug('sockwell:stream-socket');

interface AppliedOption {
  level: OptionLevel;
  value: number;
}

/**
 * Capture an address once, with IPv4-mapped addresses reduced to IPv4
 */
export function captureEndpoint(address: Endpoint): Endpoint {
  return address.family === 'local' ? { ...address } : normalizeMappedAddress(address);
}

export abstract class StreamSocket {
  protected readonly backend: SocketBackend;
  protected readonly resources: SocketResources;
  protected config: SocketConfig;
  protected state: SocketState;
  protected remote: Endpoint | null = null;
  protected scratch: Buffer;
  protected nonBlocking = false;
  /** Options set through this object, replayed onto a replacement handle */
  protected appliedOptions: Map<SocketOptionName, AppliedOption> = new Map();

  protected constructor(backend: SocketBackend, config: SocketConfig, source: string, initialState: SocketState) {
    this.backend = backend;
    this.config = config;
    this.state = initialState;
    this.resources = new SocketResources(backend, source);
    this.scratch = Buffer.alloc(config.bufferSize);
    resourceFinalizer.register(this, this.resources, this);
  }

  protected get platform(): SocketPlatform {
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

  protected requireHandle(operation: string): SocketHandle {
    if (!this.resources.valid) {
      const reason = this.state === SocketState.CLOSED ? 'Socket is closed' : 'Socket has no handle';
      throw invalidState(operation, reason, this.platform);
    }
    return this.resources.handle;
  }

  // Reading

  /**
   * Read exactly size bytes, looping over partial reads
   */
  async readExact(size: number): Promise<Buffer> {
    const handle = this.requireHandle('read');
    if (!Number.isInteger(size) || size < 0) {
      throw socketError(ReadError, 'read', 'EINVAL', this.platform);
    }
    const result = Buffer.alloc(size);
    let offset = 0;
    while (offset < size) {
      offset += await this.receiveInto(handle, result.subarray(offset));
    }
    return result;
  }

  /**
   * Read whatever is available, 1 to maxSize bytes. Reads up to the scratch
   * buffer size go through the scratch buffer.
   */
  async readAvailable(maxSize: number = this.scratch.length): Promise<Buffer> {
    const handle = this.requireHandle('read');
    if (maxSize <= 0) {
      return Buffer.alloc(0);
    }
    const target = maxSize <= this.scratch.length ? this.scratch.subarray(0, maxSize) : Buffer.alloc(maxSize);
    const bytes = await this.receiveInto(handle, target);
    return Buffer.from(target.subarray(0, bytes));
  }

  /**
   * Text of one readAvailable()
   */
  async read(encoding: BufferEncoding = 'utf8'): Promise<string> {
    const data = await this.readAvailable();
    return data.toString(encoding);
  }

  private async receiveInto(handle: SocketHandle, target: Buffer): Promise<number> {
    let bytes: number;
    try {
      bytes = await this.backend.recv(handle, target);
    } catch (error) {
      throw translateError(ReadError, 'read', error, this.platform);
    }
    if (bytes === 0 && target.length > 0) {
      throw socketError(ConnectionClosedError, 'read', SOCKET_CONSTANTS.CONNECTION_CLOSED_CODE, this.platform);
    }
    return bytes;
  }

  // Writing

  /**
   * Send data once; returns the number of bytes the backend accepted
   */
  async write(data: string | Uint8Array): Promise<number> {
    const handle = this.requireHandle('write');
    const payload = typeof data === 'string' ? Buffer.from(data) : data;
    try {
      return await this.backend.send(handle, payload);
    } catch (error) {
      throw translateError(WriteError, 'write', error, this.platform);
    }
  }

  shutdown(mode: ShutdownMode = 'both'): void {
    const handle = this.requireHandle('shutdown');
    try {
      this.backend.shutdown(handle, mode);
    } catch (error) {
      throw translateError(ShutdownError, 'shutdown', error, this.platform);
    }

    const readDown = mode !== 'write' || this.state === SocketState.SHUTDOWN_READ || this.state === SocketState.SHUTDOWN_BOTH;
    const writeDown = mode !== 'read' || this.state === SocketState.SHUTDOWN_WRITE || this.state === SocketState.SHUTDOWN_BOTH;
    if (readDown && writeDown) {
      this.state = SocketState.SHUTDOWN_BOTH;
    } else {
      this.state = readDown ? SocketState.SHUTDOWN_READ : SocketState.SHUTDOWN_WRITE;
    }
  }

  /**
   * Release the handle and any candidate list. Never throws; calling it
   * again does nothing.
   */
  close(): void {
    if (this.state === SocketState.CLOSED && !this.resources.valid) {
      return;
    }
    this.resources.release();
    this.state = SocketState.CLOSED;
    resourceFinalizer.unregister(this);
  }

  // Options

  protected setSocketOption(level: OptionLevel, name: SocketOptionName, value: number): void {
    const handle = this.requireHandle('setsockopt');
    try {
      this.backend.setOption(handle, level, name, value);
    } catch (error) {
      throw translateError(OptionError, 'setsockopt', error, this.platform);
    }
    this.appliedOptions.set(name, { level, value });
  }

  /**
   * Re-apply the recorded options to a freshly created handle
   */
  protected replayOptions(handle: SocketHandle): void {
    for (const [name, { level, value }] of this.appliedOptions) {
      try {
        this.backend.setOption(handle, level, name, value);
      } catch (error) {
        throw translateError(OptionError, 'setsockopt', error, this.platform);
      }
    }
  }

  setNonBlocking(enabled: boolean): void {
    const handle = this.requireHandle('setNonBlocking');
    try {
      this.backend.setNonBlocking(handle, enabled);
    } catch (error) {
      throw translateError(OptionError, 'setNonBlocking', error, this.platform);
    }
    this.nonBlocking = enabled;
  }

  /**
   * Receive and send timeout, or with forConnect the connect timeout; 0 disables it
   */
  setTimeout(millis: number, forConnect = false): void {
    if (!Number.isInteger(millis) || millis < 0) {
      throw socketError(OptionError, 'setsockopt', 'EINVAL', this.platform);
    }
    if (forConnect) {
      this.requireHandle('setsockopt');
      this.config.connectTimeout = millis;
      return;
    }
    this.setSocketOption('socket', 'SO_RCVTIMEO', millis);
    this.setSocketOption('socket', 'SO_SNDTIMEO', millis);
  }

  setBufferSize(size: number): void {
    if (!Number.isInteger(size) || size <= 0) {
      throw socketError(OptionError, 'setBufferSize', 'EINVAL', this.platform);
    }
    this.scratch = Buffer.alloc(size);
    this.config.bufferSize = size;
  }

  // Readiness

  /**
   * Wait up to timeoutMillis for the socket to become readable (or writable).
   * Write readiness completes a connect started in non-blocking mode.
   */
  async waitReady(forWrite: boolean, timeoutMillis: number): Promise<boolean> {
    const handle = this.requireHandle('poll');
    let ready: boolean;
    try {
      ready = await this.backend.poll(handle, forWrite ? 'write' : 'read', timeoutMillis);
    } catch (error) {
      throw translateError(PollError, 'poll', error, this.platform);
    }
    if (ready && forWrite && this.state === SocketState.CONNECTING) {
      this.completeConnect(handle);
    }
    return ready;
  }

  private completeConnect(handle: SocketHandle): void {
    const failure = this.backend.takeError(handle);
    if (failure) {
      this.state = SocketState.UNCONNECTED;
      throw translateError(ConnectError, 'connect', failure, this.platform);
    }
    this.onConnected();
  }

  /**
   * Best-effort liveness probe: a non-destructive peek in non-blocking mode
   */
  async isConnected(): Promise<boolean> {
    if (!this.resources.valid) {
      return false;
    }
    const handle = this.resources.handle;
    const probe = Buffer.alloc(1);
    let previous: boolean;
    try {
      previous = this.backend.isNonBlocking(handle);
      this.backend.setNonBlocking(handle, true);
    } catch (error) {
      debug(`Liveness probe could not switch mode: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }

    try {
      const bytes = await this.backend.recv(handle, probe, { peek: true });
      return bytes > 0;
    } catch (error) {
      return WOULD_BLOCK_CODES.includes(toSystemError(error, 'recv').code);
    } finally {
      try {
        this.backend.setNonBlocking(handle, previous);
      } catch (error) {
        diagnostics.reportCleanupError(this.resources.source, 'setNonBlocking', error);
      }
    }
  }

  // Addresses

  /**
   * Record the peer and drop the candidate list once a connection exists
   */
  protected onConnected(): void {
    try {
      this.remote = captureEndpoint(this.backend.peerAddress(this.resources.handle));
    } catch (error) {
      debug(`Peer address unavailable: ${error instanceof Error ? error.message : String(error)}`);
      this.remote = null;
    }
    this.state = SocketState.CONNECTED;
    this.resources.releaseCandidates();
  }

  getRemoteSocketAddress(): string {
    if (!this.remote) {
      throw invalidState('getpeername', 'Socket has no remote address', this.platform);
    }
    return addressToString(this.remote);
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
    return addressToString(captureEndpoint(local));
  }

  // Ownership

  /**
   * Take over everything source owns; source is left closed and invalid
   */
  protected moveFrom(source: StreamSocket): void {
    if (source === this) {
      return;
    }
    source.resources.transferTo(this.resources);
    this.config = { ...source.config };
    this.state = source.state;
    this.remote = source.remote;
    this.scratch = source.scratch;
    this.nonBlocking = source.nonBlocking;
    this.appliedOptions = new Map(source.appliedOptions);

    source.state = SocketState.CLOSED;
    source.remote = null;
    source.appliedOptions = new Map();
    resourceFinalizer.unregister(source);
    trackResources(this, this.resources);
  }
}
