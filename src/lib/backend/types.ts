/**
 * Socket Backend Types
 *
 * The raw socket primitives the socket classes are written against. Every
 * failure is thrown as a SystemError carrying a symbolic code; handles are
 * plain numbers owned by exactly one socket object.
 */

import type { SystemError } from '../errors/system-error';
import type { SocketPlatform } from '../platform/types';
import type {
  AcceptedConnection,
  CandidateAddress,
  Endpoint,
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

export interface SocketBackend {
  readonly name: string;
  readonly platform: SocketPlatform;

  /** Start the network subsystem; reference counted */
  startup(): Promise<void>;
  /** Undo one startup(); the subsystem stops with the last one */
  cleanup(): Promise<void>;
  isStarted(): boolean;

  /** getaddrinfo: never returns an empty list */
  resolve(host: string | null, service: string, hints: ResolveHints): Promise<CandidateAddress[]>;

  create(family: SocketFamily, kind: SocketKind, protocol: TransportProtocol): SocketHandle;
  bind(handle: SocketHandle, address: Endpoint): Promise<void>;
  listen(handle: SocketHandle, backlog: number): void;
  accept(handle: SocketHandle): Promise<AcceptedConnection>;
  /**
   * Connect a stream socket. A positive timeout bounds the wait (ETIMEDOUT);
   * in non-blocking mode the attempt continues in the background and the call
   * fails with EINPROGRESS.
   */
  connect(handle: SocketHandle, address: Endpoint, timeoutMs?: number): Promise<void>;
  /** Result of a background connect (SO_ERROR); reading it clears it */
  takeError(handle: SocketHandle): SystemError | undefined;

  send(handle: SocketHandle, data: Uint8Array): Promise<number>;
  /** Bytes copied into target; 0 means the peer closed its side */
  recv(handle: SocketHandle, target: Buffer, flags?: ReceiveFlags): Promise<number>;
  sendTo(handle: SocketHandle, data: Uint8Array, address: InetAddress): Promise<number>;
  recvFrom(handle: SocketHandle, target: Buffer): Promise<ReceivedDatagram>;

  shutdown(handle: SocketHandle, mode: ShutdownMode): void;
  close(handle: SocketHandle): void;

  setOption(handle: SocketHandle, level: OptionLevel, name: SocketOptionName, value: number): void;
  getOption(handle: SocketHandle, level: OptionLevel, name: SocketOptionName): number;
  setNonBlocking(handle: SocketHandle, enabled: boolean): void;
  isNonBlocking(handle: SocketHandle): boolean;

  /**
   * Wait until the handle is ready for the given interest. A timeout of 0
   * checks without waiting; a negative timeout waits indefinitely.
   */
  poll(handle: SocketHandle, interest: PollInterest, timeoutMs: number): Promise<boolean>;

  /** getsockname; null while unbound */
  localAddress(handle: SocketHandle): Endpoint | null;
  /** getpeername; throws ENOTCONN while unconnected */
  peerAddress(handle: SocketHandle): Endpoint;

  /** Remove a local socket path; absence is not an error */
  unlinkLocal(path: string): Promise<void>;
  networkInterfaces(): HostAddress[];
  openHandles(): SocketHandle[];
}
