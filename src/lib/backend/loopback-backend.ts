/**
 * Loopback Socket Backend
 *
 * An in-process network stack. Stream and datagram sockets bound to local
 * addresses (127.0.0.0/8, ::1, the wildcards and the configured interface
 * addresses) talk to each other through memory; local-socket paths live in a
 * virtual registry in which a closed listener leaves a stale entry behind,
 * like the socket file a crashed process leaves on disk.
 *
 * Failures can be injected per address family and per option, which makes
 * the candidate selection paths reproducible without a real network.
 */

import Debug from 'debug';
import { SOCKET_CONSTANTS, BACKEND_CONSTANTS } from '../constants';
import { SystemError } from '../errors/system-error';
import { selectPlatform } from '../platform';
import type { SocketPlatform } from '../platform/types';
import {
  createInetAddress,
  ipFamily,
  isMappedAddress,
  loopbackAddress,
  normalizeMappedAddress,
  toMappedAddress,
  wildcardAddress
} from '../resolver/address-codec';
import type {
  Endpoint,
  FamilyHint,
  HostAddress,
  InetAddress,
  LocalAddress,
  ShutdownMode,
  SocketFamily,
  SocketKind,
  SocketOptionName,
  TransportProtocol
} from '../types/socket';
import { BaseSocketBackend, initialSocketState } from './base-backend';
import type { BackendSocketState } from './base-backend';

const debug = Debug('sockwell:backend:loopback');

export interface LoopbackBackendOptions {
  platform?: SocketPlatform;
  /** Host name table; defaults to localhost -> ::1, 127.0.0.1 */
  hosts?: Record<string, string[]>;
  /** Interfaces reported by networkInterfaces(); their addresses count as local */
  interfaces?: HostAddress[];
  /** Families whose socket creation fails with EAFNOSUPPORT */
  unavailableFamilies?: SocketFamily[];
  /** Options whose setOption() fails, with the code to fail with */
  failingOptions?: Partial<Record<SocketOptionName, string>>;
  /** Connects to non-local addresses hang (until a timeout) instead of failing with ENETUNREACH */
  dropUnroutable?: boolean;
}

interface LoopbackSocketState extends BackendSocketState {
  local: Endpoint | null;
  peer: Endpoint | null;
  /** Other end of an established stream */
  remote: LoopbackSocketState | null;
  backlog: number;
  acceptQueue: LoopbackSocketState[];
  /** Rejects a connect that is waiting on an unroutable destination */
  abortPending: ((error: SystemError) => void) | null;
}

interface BoundSocket {
  state: LoopbackSocketState;
  /** The receiver is a dual-stack IPv6 socket reached over IPv4 */
  mapped: boolean;
}

export const DEFAULT_LOOPBACK_HOSTS: Readonly<Record<string, string[]>> = {
  localhost: [SOCKET_CONSTANTS.INET6_LOOPBACK, SOCKET_CONSTANTS.INET_LOOPBACK]
};

export const DEFAULT_LOOPBACK_INTERFACES: readonly HostAddress[] = [
  { name: 'lo', family: 'IPv4', address: SOCKET_CONSTANTS.INET_LOOPBACK, internal: true },
  { name: 'lo', family: 'IPv6', address: SOCKET_CONSTANTS.INET6_LOOPBACK, internal: true }
];

export class LoopbackSocketBackend extends BaseSocketBackend<LoopbackSocketState> {
  readonly name = 'loopback';

  private readonly hosts: Map<string, string[]>;
  private readonly interfaces: HostAddress[];
  private readonly unavailableFamilies: Set<SocketFamily>;
  private readonly failingOptions: Partial<Record<SocketOptionName, string>>;
  private readonly dropUnroutable: boolean;

  private bindings: LoopbackSocketState[] = [];
  private paths: Map<string, LoopbackSocketState> = new Map();
  private nextEphemeralPort: number = SOCKET_CONSTANTS.EPHEMERAL_PORT_START;

  constructor(options: LoopbackBackendOptions = {}) {
    super(options.platform || selectPlatform());
    this.hosts = new Map(
      Object.entries(options.hosts || DEFAULT_LOOPBACK_HOSTS).map(([name, addresses]) => [name.toLowerCase(), addresses])
    );
    this.interfaces = [...(options.interfaces || DEFAULT_LOOPBACK_INTERFACES)];
    this.unavailableFamilies = new Set(options.unavailableFamilies || []);
    this.failingOptions = options.failingOptions || {};
    this.dropUnroutable = options.dropUnroutable || false;
  }

  /**
   * Paths currently present in the virtual local-socket registry
   */
  localPaths(): string[] {
    return [...this.paths.keys()];
  }

  protected newState(base: BackendSocketState): LoopbackSocketState {
    return {
      ...base,
      local: null,
      peer: null,
      remote: null,
      backlog: 0,
      acceptQueue: [],
      abortPending: null
    };
  }

  protected checkSupported(family: SocketFamily, kind: SocketKind, protocol: TransportProtocol): void {
    if (this.unavailableFamilies.has(family)) {
      throw new SystemError('EAFNOSUPPORT', 'socket');
    }
    super.checkSupported(family, kind, protocol);
  }

  protected async lookupHost(host: string, family: FamilyHint): Promise<string[]> {
    const addresses = this.hosts.get(host.toLowerCase());
    if (!addresses) {
      throw new SystemError('ENOTFOUND', 'getaddrinfo', host);
    }
    return addresses.filter(address => family === 'unspec' || ipFamily(address) === family);
  }

  // Address bookkeeping

  private isLocalAddress(address: InetAddress): boolean {
    const plain = normalizeMappedAddress(address);
    if (plain.bytes.every(byte => byte === 0)) {
      return true;
    }
    if (plain.family === 'inet' && plain.bytes[0] === 127) {
      return true;
    }
    if (plain.bytes.equals(loopbackAddress(plain.family, 0).bytes)) {
      return true;
    }
    return this.interfaces.some(entry => {
      const bare = entry.address.split('%')[0];
      return ipFamily(bare) === plain.family && createInetAddress(bare, 0).bytes.equals(plain.bytes);
    });
  }

  private isWildcard(address: InetAddress): boolean {
    return address.bytes.every(byte => byte === 0);
  }

  private isDualStack(state: LoopbackSocketState): boolean {
    return state.family === 'inet6' && this.optionValue(state, 'IPV6_V6ONLY') === 0;
  }

  private boundInet(state: LoopbackSocketState): InetAddress | null {
    return state.local && state.local.family !== 'local' ? state.local : null;
  }

  private portInUse(kind: SocketKind, port: number): boolean {
    return this.bindings.some(other => other.kind === kind && this.boundInet(other)?.port === port);
  }

  private allocatePort(kind: SocketKind): number {
    const span = SOCKET_CONSTANTS.MAX_PORT - SOCKET_CONSTANTS.EPHEMERAL_PORT_START + 1;
    for (let tries = 0; tries < span; tries++) {
      const port = this.nextEphemeralPort;
      this.nextEphemeralPort = port === SOCKET_CONSTANTS.MAX_PORT ? SOCKET_CONSTANTS.EPHEMERAL_PORT_START : port + 1;
      if (!this.portInUse(kind, port)) {
        return port;
      }
    }
    throw new SystemError('EADDRINUSE', 'bind');
  }

  private conflicts(state: LoopbackSocketState, address: InetAddress): boolean {
    return this.bindings.some(other => {
      const bound = this.boundInet(other);
      if (other === state || other.kind !== state.kind || !bound || bound.port !== address.port) {
        return false;
      }
      if (bound.family === address.family) {
        return this.isWildcard(bound) || this.isWildcard(address) || bound.bytes.equals(address.bytes);
      }
      // A dual-stack wildcard also occupies the IPv4 port
      const v6 = bound.family === 'inet6' ? other : state;
      const v6Address = bound.family === 'inet6' ? bound : address;
      return this.isWildcard(v6Address) && this.isDualStack(v6);
    });
  }

  private addBinding(state: LoopbackSocketState, address: InetAddress): void {
    state.local = address;
    this.bindings.push(state);
  }

  /**
   * Socket bound to a destination: exact address first, then the family's
   * wildcard, then a dual-stack IPv6 wildcard for IPv4 traffic
   */
  private findBound(kind: SocketKind, destination: InetAddress, accepts: (state: LoopbackSocketState) => boolean): BoundSocket | null {
    const candidates = this.bindings.filter(state => {
      const bound = this.boundInet(state);
      return state.kind === kind && !state.closed && bound !== null && bound.port === destination.port && accepts(state);
    });

    const exact = candidates.find(state => {
      const bound = this.boundInet(state);
      return bound !== null && bound.family === destination.family && bound.bytes.equals(destination.bytes);
    });
    if (exact) {
      return { state: exact, mapped: false };
    }

    const wildcard = candidates.find(state => {
      const bound = this.boundInet(state);
      return bound !== null && bound.family === destination.family && this.isWildcard(bound);
    });
    if (wildcard) {
      return { state: wildcard, mapped: false };
    }

    if (destination.family === 'inet') {
      const dual = candidates.find(state => {
        const bound = this.boundInet(state);
        return bound !== null && bound.family === 'inet6' && this.isWildcard(bound) && this.isDualStack(state);
      });
      if (dual) {
        return { state: dual, mapped: true };
      }
    }
    return null;
  }

  /**
   * Destination as routed: a wildcard destination means this host
   */
  private route(destination: InetAddress): InetAddress {
    if (this.isWildcard(destination)) {
      return loopbackAddress(destination.family, destination.port);
    }
    if (isMappedAddress(destination)) {
      return normalizeMappedAddress(destination);
    }
    return destination;
  }

  // Transport

  protected async bindState(state: LoopbackSocketState, address: Endpoint): Promise<void> {
    if (address.family === 'local') {
      if (this.paths.has(address.path)) {
        throw new SystemError('EADDRINUSE', 'bind', address.path);
      }
      this.paths.set(address.path, state);
      state.local = address;
      return;
    }

    if (!this.isLocalAddress(address)) {
      throw new SystemError('EADDRNOTAVAIL', 'bind');
    }
    const port = address.port || this.allocatePort(state.kind);
    const local: InetAddress = { ...address, port };
    if (this.conflicts(state, local)) {
      throw new SystemError('EADDRINUSE', 'bind');
    }
    this.addBinding(state, local);
  }

  protected listenState(state: LoopbackSocketState, backlog: number): void {
    state.backlog = backlog;
  }

  protected takeConnection(state: LoopbackSocketState): LoopbackSocketState | undefined {
    return state.acceptQueue.shift();
  }

  protected hasPendingConnection(state: LoopbackSocketState): boolean {
    return state.acceptQueue.length > 0;
  }

  private link(client: LoopbackSocketState, server: LoopbackSocketState): void {
    client.remote = server;
    server.remote = client;
    server.connected = true;
    server.bound = true;
  }

  protected async connectState(state: LoopbackSocketState, address: Endpoint): Promise<void> {
    if (address.family === 'local') {
      this.connectLocal(state, address);
      return;
    }

    const destination = this.route(address);
    if (!this.isLocalAddress(destination)) {
      if (!this.dropUnroutable) {
        throw new SystemError('ENETUNREACH', 'connect');
      }
      debug(`Dropping connect to unroutable ${destination.bytes.toString('hex')}`);
      await new Promise<void>((_resolve, reject) => {
        state.abortPending = reject;
      });
      return;
    }

    const found = this.findBound('stream', destination, candidate => candidate.listening);
    if (!found || found.state.acceptQueue.length >= found.state.backlog) {
      throw new SystemError('ECONNREFUSED', 'connect');
    }
    const listener = found.state;

    let local = this.boundInet(state);
    if (!local) {
      // Implicit bind to the address the destination is reached through
      local = { family: destination.family, bytes: Buffer.from(destination.bytes), port: this.allocatePort('stream') };
      this.addBinding(state, local);
    }

    const server = this.newState(initialSocketState(listener.family, 'stream', listener.protocol));
    const reached: InetAddress = { family: destination.family, bytes: Buffer.from(destination.bytes), port: destination.port };
    server.local = found.mapped ? toMappedAddress(reached) : reached;
    server.peer = found.mapped ? toMappedAddress(local) : { ...local };
    this.link(state, server);
    state.peer = reached;

    listener.acceptQueue.push(server);
    listener.signal.notify();
  }

  private connectLocal(state: LoopbackSocketState, address: LocalAddress): void {
    const listener = this.paths.get(address.path);
    if (!listener) {
      throw new SystemError('ENOENT', 'connect', address.path);
    }
    if (listener.closed || !listener.listening || listener.acceptQueue.length >= listener.backlog) {
      throw new SystemError('ECONNREFUSED', 'connect', address.path);
    }

    const server = this.newState(initialSocketState('local', 'stream', listener.protocol));
    server.local = { family: 'local', path: address.path };
    server.peer = state.local || { family: 'local', path: '' };
    this.link(state, server);
    state.peer = { family: 'local', path: address.path };

    listener.acceptQueue.push(server);
    listener.signal.notify();
  }

  protected abortConnect(state: LoopbackSocketState): void {
    if (state.abortPending) {
      const abort = state.abortPending;
      state.abortPending = null;
      abort(new SystemError('ECONNABORTED', 'connect'));
    }
  }

  protected async sendState(state: LoopbackSocketState, data: Uint8Array): Promise<number> {
    const remote = state.remote;
    if (!remote || remote.closed) {
      throw new SystemError('EPIPE', 'send');
    }
    if (!remote.readShut) {
      remote.inbound.push(data);
      remote.signal.notify();
    }
    return data.length;
  }

  protected async sendToState(state: LoopbackSocketState, data: Uint8Array, address: InetAddress): Promise<number> {
    let local = this.boundInet(state);
    if (!local) {
      local = wildcardAddress(state.family === 'inet6' ? 'inet6' : 'inet', this.allocatePort('dgram'));
      this.addBinding(state, local);
    }

    if (address.family === 'inet' && address.bytes.equals(createInetAddress(BACKEND_CONSTANTS.LIMITED_BROADCAST, 0).bytes)) {
      if (this.optionValue(state, 'SO_BROADCAST') === 0) {
        throw new SystemError('EACCES', 'sendto');
      }
    }

    const destination = this.route(address);
    const found = this.isLocalAddress(destination) ? this.findBound('dgram', destination, () => true) : null;
    if (!found) {
      debug(`Datagram to port ${destination.port} dropped: no receiver`);
      return data.length;
    }

    const source: InetAddress = {
      family: destination.family,
      bytes: Buffer.from(this.isWildcard(local) ? destination.bytes : normalizeMappedAddress(local).bytes),
      port: local.port
    };
    const receiver = found.state;
    receiver.datagrams.push({ data: Buffer.from(data), from: found.mapped ? toMappedAddress(source) : source });
    receiver.signal.notify();
    return data.length;
  }

  protected shutdownState(state: LoopbackSocketState, mode: ShutdownMode): void {
    const remote = state.remote;
    if (mode !== 'read' && remote) {
      remote.inbound.end();
      remote.signal.notify();
    }
  }

  protected closeState(state: LoopbackSocketState): void {
    this.bindings = this.bindings.filter(other => other !== state);

    for (const pending of state.acceptQueue.splice(0)) {
      const client = pending.remote;
      if (client) {
        client.remote = null;
        client.inbound.fail(new SystemError('ECONNRESET', 'recv'));
        client.signal.notify();
      }
    }

    const remote = state.remote;
    if (remote) {
      remote.remote = null;
      remote.inbound.end();
      remote.signal.notify();
      state.remote = null;
    }
  }

  protected applyOption(state: LoopbackSocketState, name: SocketOptionName, value: number): void {
    const code = this.failingOptions[name];
    if (code) {
      throw new SystemError(code, 'setsockopt', `${name}=${value} on socket ${state.handle}`);
    }
  }

  protected localAddressOf(state: LoopbackSocketState): Endpoint | null {
    return state.local;
  }

  protected peerAddressOf(state: LoopbackSocketState): Endpoint | null {
    return state.peer;
  }

  async unlinkLocal(path: string): Promise<void> {
    this.paths.delete(path);
  }

  networkInterfaces(): HostAddress[] {
    return this.interfaces.map(entry => ({ ...entry }));
  }
}
