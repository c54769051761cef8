/**
 * Node Socket Backend
 *
 * Real sockets over Node's net, dgram, dns and os modules. Node has no
 * separate bind step for stream sockets, so binding one opens the listening
 * server straight away; connections that arrive before listen() (or beyond
 * the backlog) are dropped.
 */

import * as dgram from 'dgram';
import * as dns from 'dns';
import * as net from 'net';
import * as os from 'os';
import Debug from 'debug';
import { remove } from 'fs-extra';
import { SystemError, toSystemError } from '../errors/system-error';
import { selectPlatform } from '../platform';
import type { SocketPlatform } from '../platform/types';
import { createInetAddress, formatIp, wildcardAddress } from '../resolver/address-codec';
import type {
  Endpoint,
  FamilyHint,
  HostAddress,
  InetAddress,
  ShutdownMode,
  SocketFamily,
  SocketKind,
  SocketOptionName,
  TransportProtocol
} from '../types/socket';
import { BaseSocketBackend, initialSocketState } from './base-backend';
import type { BackendSocketState } from './base-backend';

const debug = Debug('sockwell:backend:node');

/**
 * Interface entry as reported by os.networkInterfaces(); family is a number
 * on some Node releases
 */
interface NetworkInterfaceInfo {
  address: string;
  family: string | number;
  internal: boolean;
}

interface NodeSocketState extends BackendSocketState {
  server: net.Server | null;
  socket: net.Socket | null;
  udp: dgram.Socket | null;
  /** Set by listen(); the server is already open from bind() */
  accepting: boolean;
  backlog: number;
  acceptQueue: NodeSocketState[];
  /** Local-socket addresses, which Node does not report back */
  localPath: string | null;
  peerPath: string | null;
}

export interface NodeBackendOptions {
  platform?: SocketPlatform;
}

function hostOf(address: InetAddress): string {
  const text = formatIp(address);
  return address.scopeId ? `${text}%${address.scopeId}` : text;
}

export class NodeSocketBackend extends BaseSocketBackend<NodeSocketState> {
  readonly name = 'node';
  private ipv6Stack: boolean | null = null;

  constructor(options: NodeBackendOptions = {}) {
    super(options.platform || selectPlatform());
  }

  /**
   * IPv6 sockets fail to create on hosts without an IPv6 address, even ::1,
   * so that server selection falls back to IPv4
   */
  protected checkSupported(family: SocketFamily, kind: SocketKind, protocol: TransportProtocol): void {
    if (family === 'inet6' && !this.hasIpv6Stack()) {
      throw new SystemError('EAFNOSUPPORT', 'socket');
    }
    super.checkSupported(family, kind, protocol);
  }

  private hasIpv6Stack(): boolean {
    if (this.ipv6Stack === null) {
      this.ipv6Stack = this.networkInterfaces().some(entry => entry.family === 'IPv6');
      debug(`IPv6 stack ${this.ipv6Stack ? 'available' : 'unavailable'}`);
    }
    return this.ipv6Stack;
  }

  protected newState(base: BackendSocketState): NodeSocketState {
    return {
      ...base,
      server: null,
      socket: null,
      udp: null,
      accepting: false,
      backlog: 0,
      acceptQueue: [],
      localPath: null,
      peerPath: null
    };
  }

  protected async lookupHost(host: string, family: FamilyHint): Promise<string[]> {
    try {
      const results = await dns.promises.lookup(host, {
        all: true,
        family: family === 'inet' ? 4 : family === 'inet6' ? 6 : 0,
        verbatim: true
      });
      return results.map(result => result.address);
    } catch (error) {
      throw toSystemError(error, 'getaddrinfo');
    }
  }

  // Streams

  private attachStream(state: NodeSocketState, socket: net.Socket): void {
    state.socket = socket;
    socket.on('data', (chunk: Buffer) => {
      state.inbound.push(chunk);
      if (state.inbound.size >= this.optionValue(state, 'SO_RCVBUF')) {
        socket.pause();
      }
      state.signal.notify();
    });
    socket.on('end', () => {
      state.inbound.end();
      state.signal.notify();
    });
    socket.on('error', (error: Error) => {
      debug(`Socket ${state.handle} error: ${error.message}`);
      state.inbound.fail(toSystemError(error, 'recv'));
      state.signal.notify();
    });
    socket.on('close', () => {
      state.inbound.end();
      state.signal.notify();
    });
    this.applyLiveOptions(state);
  }

  protected afterRead(state: NodeSocketState): void {
    const socket = state.socket;
    if (socket && socket.isPaused() && !state.readShut && state.inbound.size < this.optionValue(state, 'SO_RCVBUF')) {
      socket.resume();
    }
  }

  private onConnection(state: NodeSocketState, socket: net.Socket): void {
    if (state.closed || !state.accepting || state.acceptQueue.length >= state.backlog) {
      debug(`Dropping connection from ${socket.remoteAddress}:${socket.remotePort}`);
      socket.destroy();
      return;
    }
    const child = this.newState(initialSocketState(state.family, 'stream', state.protocol));
    child.connected = true;
    child.bound = true;
    child.localPath = state.localPath;
    this.attachStream(child, socket);
    state.acceptQueue.push(child);
    state.signal.notify();
  }

  private openServer(state: NodeSocketState, address: Endpoint): Promise<void> {
    const server = net.createServer({ allowHalfOpen: true });
    server.on('connection', (socket: net.Socket) => this.onConnection(state, socket));

    const options: net.ListenOptions = address.family === 'local'
      ? { path: address.path, exclusive: true }
      : {
          host: hostOf(address),
          port: address.port,
          exclusive: true,
          ipv6Only: this.optionValue(state, 'IPV6_V6ONLY') === 1
        };

    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        server.close();
        reject(toSystemError(error, 'bind'));
      };
      server.once('error', onError);
      server.listen(options, () => {
        server.off('error', onError);
        server.on('error', (error: Error) => debug(`Server ${state.handle} error: ${error.message}`));
        state.server = server;
        resolve();
      });
    });
  }

  // Datagrams

  private ensureUdp(state: NodeSocketState): dgram.Socket {
    if (state.udp) {
      return state.udp;
    }
    const udp = dgram.createSocket({
      type: state.family === 'inet6' ? 'udp6' : 'udp4',
      ipv6Only: this.optionValue(state, 'IPV6_V6ONLY') === 1,
      reuseAddr: this.optionValue(state, 'SO_REUSEADDR') === 1
    });
    udp.on('message', (message: Buffer, rinfo: dgram.RemoteInfo) => {
      state.datagrams.push({ data: message, from: createInetAddress(rinfo.address, rinfo.port) });
      state.signal.notify();
    });
    udp.on('error', (error: Error) => {
      debug(`Datagram socket ${state.handle} error: ${error.message}`);
      if (state.bound) {
        state.datagrams.fail(toSystemError(error, 'recvfrom'));
        state.signal.notify();
      }
    });
    state.udp = udp;
    return udp;
  }

  private bindUdp(state: NodeSocketState, address: InetAddress): Promise<void> {
    const udp = this.ensureUdp(state);
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => reject(toSystemError(error, 'bind'));
      udp.once('error', onError);
      udp.bind({ address: hostOf(address), port: address.port, exclusive: true }, () => {
        udp.off('error', onError);
        state.bound = true;
        this.applyLiveOptions(state);
        resolve();
      });
    });
  }

  // Transport

  protected async bindState(state: NodeSocketState, address: Endpoint): Promise<void> {
    if (state.kind === 'dgram') {
      if (address.family === 'local') {
        throw new SystemError('EAFNOSUPPORT', 'bind');
      }
      await this.bindUdp(state, address);
      return;
    }
    await this.openServer(state, address);
    if (address.family === 'local') {
      state.localPath = address.path;
    }
  }

  protected listenState(state: NodeSocketState, backlog: number): void {
    state.backlog = backlog;
    state.accepting = true;
  }

  protected takeConnection(state: NodeSocketState): NodeSocketState | undefined {
    return state.acceptQueue.shift();
  }

  protected hasPendingConnection(state: NodeSocketState): boolean {
    return state.acceptQueue.length > 0;
  }

  protected connectState(state: NodeSocketState, address: Endpoint): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = address.family === 'local'
        ? net.connect({ path: address.path, allowHalfOpen: true })
        : net.connect({
            host: hostOf(address),
            port: address.port,
            family: address.family === 'inet6' ? 6 : 4,
            allowHalfOpen: true
          });
      state.socket = socket;

      const onError = (error: Error): void => {
        state.socket = null;
        socket.destroy();
        reject(toSystemError(error, 'connect'));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        if (address.family === 'local') {
          state.peerPath = address.path;
        }
        this.attachStream(state, socket);
        resolve();
      });
    });
  }

  protected abortConnect(state: NodeSocketState): void {
    state.socket?.destroy(new SystemError('ECONNABORTED', 'connect'));
  }

  protected sendState(state: NodeSocketState, data: Uint8Array): Promise<number> {
    const socket = state.socket;
    if (!socket || socket.destroyed || !socket.writable) {
      throw new SystemError('EPIPE', 'send');
    }
    if (state.nonBlocking && socket.writableNeedDrain) {
      throw new SystemError('EAGAIN', 'send');
    }
    return new Promise((resolve, reject) => {
      socket.write(data, (error?: Error | null) => {
        if (error) {
          reject(toSystemError(error, 'send'));
        } else {
          resolve(data.length);
        }
      });
    });
  }

  protected async sendToState(state: NodeSocketState, data: Uint8Array, address: InetAddress): Promise<number> {
    if (!state.bound) {
      await this.bindUdp(state, wildcardAddress(address.family, 0));
    }
    const udp = this.ensureUdp(state);
    return new Promise((resolve, reject) => {
      udp.send(data, address.port, hostOf(address), (error: Error | null, bytes: number) => {
        if (error) {
          reject(toSystemError(error, 'sendto'));
        } else {
          resolve(bytes);
        }
      });
    });
  }

  protected shutdownState(state: NodeSocketState, mode: ShutdownMode): void {
    const socket = state.socket;
    if (!socket) {
      return;
    }
    if (mode !== 'read') {
      socket.end();
    }
    if (mode !== 'write') {
      socket.pause();
    }
  }

  protected closeState(state: NodeSocketState): void {
    for (const pending of state.acceptQueue.splice(0)) {
      pending.socket?.destroy();
    }
    state.socket?.destroy();
    state.server?.close();
    state.udp?.close();
    state.socket = null;
    state.server = null;
    state.udp = null;
  }

  protected applyOption(state: NodeSocketState, name: SocketOptionName, value: number): void {
    this.applyToLive(state, name, value);
  }

  private applyLiveOptions(state: NodeSocketState): void {
    for (const [name, value] of state.options) {
      try {
        this.applyToLive(state, name, value);
      } catch (error) {
        debug(`Could not apply ${name}=${value} to socket ${state.handle}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /**
   * Push an option to the live Node object; options without a Node
   * counterpart are only stored
   */
  private applyToLive(state: NodeSocketState, name: SocketOptionName, value: number): void {
    const socket = state.socket;
    const udp = state.bound ? state.udp : null;
    switch (name) {
      case 'TCP_NODELAY':
        socket?.setNoDelay(value !== 0);
        break;
      case 'SO_KEEPALIVE':
        socket?.setKeepAlive(value !== 0);
        break;
      case 'SO_BROADCAST':
        udp?.setBroadcast(value !== 0);
        break;
      case 'IP_TTL':
        udp?.setTTL(value);
        break;
      case 'IP_MULTICAST_TTL':
        udp?.setMulticastTTL(value);
        break;
      case 'IP_MULTICAST_LOOP':
        udp?.setMulticastLoopback(value !== 0);
        break;
      case 'SO_RCVBUF':
        udp?.setRecvBufferSize(value);
        break;
      case 'SO_SNDBUF':
        udp?.setSendBufferSize(value);
        break;
      default:
        break;
    }
  }

  protected localAddressOf(state: NodeSocketState): Endpoint | null {
    if (state.family === 'local') {
      return state.localPath !== null ? { family: 'local', path: state.localPath } : null;
    }
    if (state.server) {
      const address = state.server.address();
      if (address && typeof address === 'object') {
        return createInetAddress(address.address, address.port);
      }
    }
    if (state.socket?.localAddress && state.socket.localPort !== undefined) {
      return createInetAddress(state.socket.localAddress, state.socket.localPort);
    }
    if (state.udp && state.bound) {
      const address = state.udp.address();
      return createInetAddress(address.address, address.port);
    }
    return null;
  }

  protected peerAddressOf(state: NodeSocketState): Endpoint | null {
    if (!state.connected) {
      return null;
    }
    if (state.family === 'local') {
      return { family: 'local', path: state.peerPath ?? '' };
    }
    const socket = state.socket;
    if (socket?.remoteAddress && socket.remotePort !== undefined) {
      return createInetAddress(socket.remoteAddress, socket.remotePort);
    }
    return null;
  }

  async unlinkLocal(path: string): Promise<void> {
    try {
      await remove(path);
    } catch (error) {
      throw toSystemError(error, 'unlink');
    }
  }

  networkInterfaces(): HostAddress[] {
    const result: HostAddress[] = [];
    const interfaces = os.networkInterfaces();
    for (const [name, entries] of Object.entries(interfaces)) {
      for (const entry of entries || []) {
        const info: NetworkInterfaceInfo = entry;
        const family = info.family === 'IPv6' || info.family === 6 ? 'IPv6' : 'IPv4';
        result.push({ name, family, address: info.address, internal: info.internal });
      }
    }
    return result;
  }
}
