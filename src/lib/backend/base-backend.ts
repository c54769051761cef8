/**
 * Base Socket Backend
 *
 * Holds what every backend shares: the handle table, startup reference
 * counting, name and service resolution for numeric input, option storage
 * and validation, non-blocking mode, send and receive timeouts and readiness
 * polling.
 * Subclasses supply the transport itself.
 */

import Debug from 'debug';
import { BACKEND_CONSTANTS, OPTION_DEFAULTS, OPTION_LEVELS, SOCKET_CONSTANTS } from '../constants';
import { SystemError, toSystemError } from '../errors/system-error';
import type { SocketPlatform } from '../platform/types';
import { createInetAddress, ipFamily } from '../resolver/address-codec';
import type {
  AcceptedConnection,
  CandidateAddress,
  Endpoint,
  FamilyHint,
  HostAddress,
  InetAddress,
  OptionLevel,
  PollInterest,
  ReceiveFlags,
  ReceivedDatagram,
  ResolveHints,
  ShutdownMode,
  SocketFamily,
  SocketHandle,
  SocketKind,
  SocketOptionName,
  TransportProtocol
} from '../types/socket';
import { INVALID_SOCKET } from '../types/socket';
import { ByteChannel, DatagramQueue, Signal, settleWithin } from './channel';
import type { SocketBackend } from './types';
import services from './services.json';

const debug = Debug('sockwell:backend');

const SERVICES: Readonly<Record<string, number>> = services;

/**
 * Per-handle state every backend keeps
 */
export interface BackendSocketState {
  handle: SocketHandle;
  family: SocketFamily;
  kind: SocketKind;
  protocol: TransportProtocol;
  options: Map<SocketOptionName, number>;
  nonBlocking: boolean;
  bound: boolean;
  listening: boolean;
  connecting: boolean;
  connected: boolean;
  readShut: boolean;
  writeShut: boolean;
  closed: boolean;
  /** Outcome of a background connect, read through takeError() */
  connectError?: SystemError;
  inbound: ByteChannel;
  datagrams: DatagramQueue;
  /** Notified on every change that may wake a waiting operation */
  signal: Signal;
}

/**
 * Fresh state for a new socket of the given type
 */
export function initialSocketState(family: SocketFamily, kind: SocketKind, protocol: TransportProtocol): BackendSocketState {
  return {
    handle: INVALID_SOCKET,
    family,
    kind,
    protocol,
    options: new Map(),
    nonBlocking: false,
    bound: false,
    listening: false,
    connecting: false,
    connected: false,
    readShut: false,
    writeShut: false,
    closed: false,
    inbound: new ByteChannel(),
    datagrams: new DatagramQueue(),
    signal: new Signal()
  };
}

export abstract class BaseSocketBackend<TState extends BackendSocketState> implements SocketBackend {
  abstract readonly name: string;
  readonly platform: SocketPlatform;

  private sockets: Map<SocketHandle, TState> = new Map();
  private nextHandle: number = BACKEND_CONSTANTS.FIRST_HANDLE;
  private startupCount = 0;

  constructor(platform: SocketPlatform) {
    this.platform = platform;
  }

  /** Wrap base state with the backend's own fields */
  protected abstract newState(base: BackendSocketState): TState;
  /** Hostname lookup; returns numeric addresses in resolver order */
  protected abstract lookupHost(host: string, family: FamilyHint): Promise<string[]>;
  protected abstract bindState(state: TState, address: Endpoint): Promise<void>;
  protected abstract listenState(state: TState, backlog: number): void;
  /** Next queued connection of a listening socket, not yet registered */
  protected abstract takeConnection(state: TState): TState | undefined;
  protected abstract hasPendingConnection(state: TState): boolean;
  protected abstract connectState(state: TState, address: Endpoint): Promise<void>;
  /** Cancel an in-flight connect so that connectState() settles */
  protected abstract abortConnect(state: TState): void;
  protected abstract sendState(state: TState, data: Uint8Array): Promise<number>;
  protected abstract sendToState(state: TState, data: Uint8Array, address: InetAddress): Promise<number>;
  protected abstract shutdownState(state: TState, mode: ShutdownMode): void;
  protected abstract closeState(state: TState): void;
  /** Push an option to the live transport; throw to reject it */
  protected abstract applyOption(state: TState, name: SocketOptionName, value: number): void;
  protected abstract localAddressOf(state: TState): Endpoint | null;
  protected abstract peerAddressOf(state: TState): Endpoint | null;

  abstract unlinkLocal(path: string): Promise<void>;
  abstract networkInterfaces(): HostAddress[];

  /**
   * Called after data has been consumed from a stream's inbound channel
   */
  protected afterRead(_state: TState): void {
    // Nothing to do unless the transport applies backpressure
  }

  /**
   * Reject socket types the backend cannot create
   */
  protected checkSupported(family: SocketFamily, kind: SocketKind, protocol: TransportProtocol): void {
    if (family === 'local') {
      if (!this.platform.supportsLocalSockets) {
        throw new SystemError('EAFNOSUPPORT', 'socket');
      }
      if (kind !== 'stream' || protocol !== 'default') {
        throw new SystemError('EPROTONOSUPPORT', 'socket');
      }
      return;
    }
    const expected = kind === 'stream' ? 'tcp' : 'udp';
    if (protocol !== 'default' && protocol !== expected) {
      throw new SystemError('EPROTONOSUPPORT', 'socket');
    }
  }

  // Network subsystem

  async startup(): Promise<void> {
    this.startupCount++;
    debug(`${this.name} startup (count ${this.startupCount})`);
  }

  async cleanup(): Promise<void> {
    if (this.startupCount === 0) {
      if (this.platform.requiresStartup) {
        throw new SystemError('WSANOTINITIALISED', 'cleanup');
      }
      return;
    }
    this.startupCount--;
    debug(`${this.name} cleanup (count ${this.startupCount})`);
  }

  isStarted(): boolean {
    return this.startupCount > 0;
  }

  private requireStarted(syscall: string): void {
    if (this.platform.requiresStartup && this.startupCount === 0) {
      throw new SystemError('WSANOTINITIALISED', syscall);
    }
  }

  // Resolution

  async resolve(host: string | null, service: string, hints: ResolveHints): Promise<CandidateAddress[]> {
    this.requireStarted('getaddrinfo');
    const port = this.parseService(service, hints);
    const addresses = await this.resolveHost(host, hints);
    const protocol: TransportProtocol = hints.protocol === 'default'
      ? (hints.kind === 'stream' ? 'tcp' : 'udp')
      : hints.protocol;

    const candidates: CandidateAddress[] = [];
    for (const text of addresses) {
      const address = createInetAddress(text, port);
      candidates.push({ family: address.family, kind: hints.kind, protocol, address });
    }
    debug(`Resolved ${host ?? '<any>'}:${service} to ${addresses.join(', ')}`);
    return candidates;
  }

  private parseService(service: string, hints: ResolveHints): number {
    if (/^\d+$/.test(service)) {
      const port = Number(service);
      if (port > SOCKET_CONSTANTS.MAX_PORT) {
        throw new SystemError('EAI_SERVICE', 'getaddrinfo');
      }
      return port;
    }
    if (hints.numericService) {
      throw new SystemError('EAI_NONAME', 'getaddrinfo');
    }
    const name = service.toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(SERVICES, name)) {
      throw new SystemError('EAI_SERVICE', 'getaddrinfo');
    }
    return SERVICES[name];
  }

  private async resolveHost(host: string | null, hints: ResolveHints): Promise<string[]> {
    const matches = (text: string): boolean => hints.family === 'unspec' || ipFamily(text) === hints.family;

    if (host === null) {
      const defaults = hints.passive
        ? [SOCKET_CONSTANTS.INET_ANY, SOCKET_CONSTANTS.INET6_ANY]
        : [SOCKET_CONSTANTS.INET6_LOOPBACK, SOCKET_CONSTANTS.INET_LOOPBACK];
      return defaults.filter(matches);
    }

    if (ipFamily(host.split('%')[0])) {
      if (!matches(host.split('%')[0])) {
        throw new SystemError('EAI_ADDRFAMILY', 'getaddrinfo');
      }
      return [host];
    }

    if (hints.numericHost || host.length === 0) {
      throw new SystemError('EAI_NONAME', 'getaddrinfo');
    }

    const found = await this.lookupHost(host, hints.family);
    const unique = [...new Set(found)].filter(matches);
    if (unique.length === 0) {
      throw new SystemError('ENOTFOUND', 'getaddrinfo');
    }
    return unique;
  }

  // Handle table

  create(family: SocketFamily, kind: SocketKind, protocol: TransportProtocol): SocketHandle {
    this.requireStarted('socket');
    this.checkSupported(family, kind, protocol);
    const state = this.newState(initialSocketState(family, kind, protocol));
    const handle = this.register(state);
    debug(`Created ${family}/${kind} socket ${handle}`);
    return handle;
  }

  protected register(state: TState): SocketHandle {
    const handle = this.nextHandle++;
    state.handle = handle;
    this.sockets.set(handle, state);
    return handle;
  }

  protected lookup(handle: SocketHandle, syscall: string): TState {
    const state = this.sockets.get(handle);
    if (!state) {
      throw new SystemError('EBADF', syscall);
    }
    return state;
  }

  openHandles(): SocketHandle[] {
    return [...this.sockets.keys()];
  }

  protected optionValue(state: TState, name: SocketOptionName): number {
    return state.options.get(name) ?? OPTION_DEFAULTS[name];
  }

  private checkFamily(state: TState, address: Endpoint, syscall: string): void {
    if (address.family !== state.family) {
      throw new SystemError('EAFNOSUPPORT', syscall);
    }
    if (address.family !== 'local' && (address.port < 0 || address.port > SOCKET_CONSTANTS.MAX_PORT)) {
      throw new SystemError('EINVAL', syscall);
    }
  }

  /**
   * Retry attempt() until it yields a value, honouring non-blocking mode,
   * SO_RCVTIMEO and close of the handle
   */
  protected async waitFor<T>(state: TState, syscall: string, attempt: () => T | undefined): Promise<T> {
    const timeoutMs = this.optionValue(state, 'SO_RCVTIMEO');
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : 0;

    for (;;) {
      if (state.closed) {
        throw new SystemError('EBADF', syscall);
      }
      const result = attempt();
      if (result !== undefined) {
        return result;
      }
      if (state.nonBlocking) {
        throw new SystemError('EAGAIN', syscall);
      }

      let remaining = 0;
      if (deadline) {
        remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw new SystemError('ETIMEDOUT', syscall);
        }
      }
      await state.signal.wait(remaining);
    }
  }

  // Connection setup

  async bind(handle: SocketHandle, address: Endpoint): Promise<void> {
    const state = this.lookup(handle, 'bind');
    if (state.bound) {
      throw new SystemError('EINVAL', 'bind');
    }
    this.checkFamily(state, address, 'bind');
    await this.bindState(state, address);
    state.bound = true;
    debug(`Socket ${handle} bound`);
  }

  listen(handle: SocketHandle, backlog: number): void {
    const state = this.lookup(handle, 'listen');
    if (state.kind !== 'stream') {
      throw new SystemError('EOPNOTSUPP', 'listen');
    }
    if (state.connected || state.connecting) {
      throw new SystemError('EINVAL', 'listen');
    }
    if (!state.bound) {
      throw new SystemError('EDESTADDRREQ', 'listen');
    }
    const effective = Math.max(1, Math.min(backlog, this.platform.maxBacklog));
    this.listenState(state, effective);
    state.listening = true;
    debug(`Socket ${handle} listening (backlog ${effective})`);
  }

  async accept(handle: SocketHandle): Promise<AcceptedConnection> {
    const state = this.lookup(handle, 'accept');
    if (!state.listening) {
      throw new SystemError('EINVAL', 'accept');
    }
    const child = await this.waitFor(state, 'accept', () => this.takeConnection(state));
    const accepted = this.register(child);
    debug(`Socket ${handle} accepted ${accepted}`);
    return { handle: accepted, peer: this.peerAddressOf(child) };
  }

  async connect(handle: SocketHandle, address: Endpoint, timeoutMs = 0): Promise<void> {
    const state = this.lookup(handle, 'connect');
    if (state.kind !== 'stream') {
      throw new SystemError('EOPNOTSUPP', 'connect');
    }
    if (state.listening) {
      throw new SystemError('EINVAL', 'connect');
    }
    if (state.connected) {
      throw new SystemError('EISCONN', 'connect');
    }
    if (state.connecting) {
      throw new SystemError('EALREADY', 'connect');
    }
    this.checkFamily(state, address, 'connect');

    state.connecting = true;
    state.connectError = undefined;
    const attempt = this.runConnect(state, address);
    if (state.nonBlocking) {
      throw new SystemError('EINPROGRESS', 'connect');
    }

    const outcome = await settleWithin(attempt, timeoutMs);
    if (!outcome.settled) {
      this.abortConnect(state);
      throw new SystemError('ETIMEDOUT', 'connect');
    }
    if (outcome.value) {
      state.connectError = undefined;
      throw outcome.value;
    }
    debug(`Socket ${handle} connected`);
  }

  private async runConnect(state: TState, address: Endpoint): Promise<SystemError | undefined> {
    try {
      await this.connectState(state, address);
      state.connected = true;
      state.bound = true;
      return undefined;
    } catch (error) {
      const failure = toSystemError(error, 'connect');
      state.connectError = failure;
      return failure;
    } finally {
      state.connecting = false;
      state.signal.notify();
    }
  }

  takeError(handle: SocketHandle): SystemError | undefined {
    const state = this.lookup(handle, 'getsockopt');
    const error = state.connectError;
    state.connectError = undefined;
    return error;
  }

  // Data transfer

  async send(handle: SocketHandle, data: Uint8Array): Promise<number> {
    const state = this.lookup(handle, 'send');
    if (state.kind !== 'stream') {
      throw new SystemError('EDESTADDRREQ', 'send');
    }
    if (state.writeShut) {
      throw new SystemError('EPIPE', 'send');
    }
    if (!state.connected) {
      throw new SystemError('ENOTCONN', 'send');
    }
    if (data.length === 0) {
      return 0;
    }
    return this.withinSendTimeout(state, 'send', () => this.sendState(state, data));
  }

  /**
   * Run a transport send, failing with ETIMEDOUT once SO_SNDTIMEO passes
   */
  private async withinSendTimeout(state: TState, syscall: string, sending: () => Promise<number>): Promise<number> {
    const outcome = await settleWithin(sending(), this.optionValue(state, 'SO_SNDTIMEO'));
    if (!outcome.settled) {
      debug(`Socket ${state.handle} ${syscall} timed out`);
      throw new SystemError('ETIMEDOUT', syscall);
    }
    return outcome.value;
  }

  async recv(handle: SocketHandle, target: Buffer, flags: ReceiveFlags = {}): Promise<number> {
    const state = this.lookup(handle, 'recv');
    if (state.kind !== 'stream' || !state.connected) {
      throw new SystemError('ENOTCONN', 'recv');
    }
    if (state.readShut) {
      return 0;
    }
    const bytes = await this.waitFor(state, 'recv', () => state.inbound.read(target, flags.peek));
    if (!flags.peek) {
      this.afterRead(state);
    }
    return bytes;
  }

  async sendTo(handle: SocketHandle, data: Uint8Array, address: InetAddress): Promise<number> {
    const state = this.lookup(handle, 'sendto');
    if (state.kind !== 'dgram') {
      throw new SystemError('EOPNOTSUPP', 'sendto');
    }
    this.checkFamily(state, address, 'sendto');
    const limit = state.family === 'inet6' ? BACKEND_CONSTANTS.MAX_INET6_DATAGRAM : BACKEND_CONSTANTS.MAX_INET_DATAGRAM;
    if (data.length > limit) {
      throw new SystemError('EMSGSIZE', 'sendto');
    }
    const bytes = await this.withinSendTimeout(state, 'sendto', () => this.sendToState(state, data, address));
    state.bound = true;
    return bytes;
  }

  async recvFrom(handle: SocketHandle, target: Buffer): Promise<ReceivedDatagram> {
    const state = this.lookup(handle, 'recvfrom');
    if (state.kind !== 'dgram') {
      throw new SystemError('EOPNOTSUPP', 'recvfrom');
    }
    const datagram = await this.waitFor(state, 'recvfrom', () => state.datagrams.shift());
    const bytes = datagram.data.copy(target, 0, 0, Math.min(target.length, datagram.data.length));
    return { bytes, from: datagram.from };
  }

  // Teardown

  shutdown(handle: SocketHandle, mode: ShutdownMode): void {
    const state = this.lookup(handle, 'shutdown');
    if (state.kind !== 'stream' || !state.connected) {
      throw new SystemError('ENOTCONN', 'shutdown');
    }
    this.shutdownState(state, mode);
    if (mode !== 'write') {
      state.readShut = true;
    }
    if (mode !== 'read') {
      state.writeShut = true;
    }
    state.signal.notify();
  }

  close(handle: SocketHandle): void {
    const state = this.lookup(handle, 'close');
    if (state.connecting) {
      this.abortConnect(state);
    }
    state.closed = true;
    this.sockets.delete(handle);
    debug(`Closed socket ${handle}`);
    try {
      this.closeState(state);
    } finally {
      state.signal.notify();
    }
  }

  // Options

  private checkOption(state: TState, level: OptionLevel, name: SocketOptionName, syscall: string): void {
    if (OPTION_LEVELS[name] !== level || !this.platform.supportsOption(name)) {
      throw new SystemError('ENOPROTOOPT', syscall);
    }
    if (state.family === 'local' && level !== 'socket') {
      throw new SystemError('EOPNOTSUPP', syscall);
    }
    if (level === 'tcp' && state.kind !== 'stream') {
      throw new SystemError('ENOPROTOOPT', syscall);
    }
    if (level === 'ipv6' && state.family !== 'inet6') {
      throw new SystemError('ENOPROTOOPT', syscall);
    }
  }

  setOption(handle: SocketHandle, level: OptionLevel, name: SocketOptionName, value: number): void {
    const state = this.lookup(handle, 'setsockopt');
    this.checkOption(state, level, name, 'setsockopt');
    if (!Number.isInteger(value) || value < 0) {
      throw new SystemError('EINVAL', 'setsockopt');
    }
    if (name === 'IPV6_V6ONLY' && state.bound) {
      throw new SystemError('EINVAL', 'setsockopt');
    }
    try {
      this.applyOption(state, name, value);
    } catch (error) {
      throw toSystemError(error, 'setsockopt');
    }
    state.options.set(name, value);
    if (name === 'SO_RCVTIMEO') {
      state.signal.notify();
    }
  }

  getOption(handle: SocketHandle, level: OptionLevel, name: SocketOptionName): number {
    const state = this.lookup(handle, 'getsockopt');
    this.checkOption(state, level, name, 'getsockopt');
    return this.optionValue(state, name);
  }

  setNonBlocking(handle: SocketHandle, enabled: boolean): void {
    const state = this.lookup(handle, 'ioctl');
    state.nonBlocking = enabled;
  }

  isNonBlocking(handle: SocketHandle): boolean {
    return this.lookup(handle, 'ioctl').nonBlocking;
  }

  // Readiness

  private isReadable(state: TState): boolean {
    if (state.listening) {
      return this.hasPendingConnection(state);
    }
    if (state.kind === 'dgram') {
      return state.datagrams.readable;
    }
    return state.readShut || state.inbound.readable;
  }

  private isWritable(state: TState): boolean {
    if (state.listening) {
      return false;
    }
    return !state.connecting;
  }

  async poll(handle: SocketHandle, interest: PollInterest, timeoutMs: number): Promise<boolean> {
    const state = this.lookup(handle, 'poll');
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : 0;

    for (;;) {
      if (state.closed) {
        throw new SystemError('EBADF', 'poll');
      }
      if (interest === 'read' ? this.isReadable(state) : this.isWritable(state)) {
        return true;
      }
      if (timeoutMs === 0) {
        return false;
      }

      let remaining = 0;
      if (deadline) {
        remaining = deadline - Date.now();
        if (remaining <= 0) {
          return false;
        }
      }
      await state.signal.wait(remaining);
    }
  }

  // Addresses

  localAddress(handle: SocketHandle): Endpoint | null {
    return this.localAddressOf(this.lookup(handle, 'getsockname'));
  }

  peerAddress(handle: SocketHandle): Endpoint {
    const peer = this.peerAddressOf(this.lookup(handle, 'getpeername'));
    if (!peer) {
      throw new SystemError('ENOTCONN', 'getpeername');
    }
    return peer;
  }
}
