/**
 * Common socket types for the sockwell library
 */

/**
 * Opaque handle issued by a socket backend
 */
export type SocketHandle = number;

/**
 * Sentinel for "no handle" (never opened, already closed, or moved away)
 */
export const INVALID_SOCKET: SocketHandle = -1;

/**
 * Address families a socket can be created in
 */
export type SocketFamily = 'inet' | 'inet6' | 'local';

/**
 * Address family preference used in resolver hints
 */
export type FamilyHint = 'unspec' | 'inet' | 'inet6';

/**
 * Socket types: connection-oriented byte stream or connectionless datagram
 */
export type SocketKind = 'stream' | 'dgram';

/**
 * Transport protocols; 'default' lets the backend pick (used by local sockets)
 */
export type TransportProtocol = 'tcp' | 'udp' | 'default';

/**
 * Binary network address with port, the equivalent of a sockaddr_in/sockaddr_in6
 */
export interface InetAddress {
  family: 'inet' | 'inet6';
  /** 4 bytes for inet, 16 bytes for inet6 */
  bytes: Buffer;
  port: number;
  scopeId?: number;
}

/**
 * Filesystem-path address of a local (Unix-domain) socket
 */
export interface LocalAddress {
  family: 'local';
  path: string;
}

export type Endpoint = InetAddress | LocalAddress;

/**
 * One resolver-produced record usable for socket creation
 */
export interface CandidateAddress {
  family: 'inet' | 'inet6';
  kind: SocketKind;
  protocol: TransportProtocol;
  address: InetAddress;
}

/**
 * Hints passed to the resolver
 */
export interface ResolveHints {
  family: FamilyHint;
  kind: SocketKind;
  protocol: TransportProtocol;
  /** Wildcard addresses suitable for bind() when no host is given */
  passive: boolean;
  /** Refuse hostnames; only numeric literals are accepted */
  numericHost?: boolean;
  /** Refuse service names; only numeric ports are accepted */
  numericService?: boolean;
}

/**
 * Which direction(s) of a connected socket to shut down
 */
export type ShutdownMode = 'read' | 'write' | 'both';

/**
 * Readiness interest used when polling a handle
 */
export type PollInterest = 'read' | 'write';

/**
 * Socket option levels
 */
export type OptionLevel = 'socket' | 'ip' | 'ipv6' | 'tcp';

/**
 * Socket options understood by the backends
 */
export type SocketOptionName =
  | 'SO_REUSEADDR'
  | 'SO_EXCLUSIVEADDRUSE'
  | 'SO_KEEPALIVE'
  | 'SO_BROADCAST'
  | 'SO_RCVBUF'
  | 'SO_SNDBUF'
  | 'SO_RCVTIMEO'
  | 'SO_SNDTIMEO'
  | 'IP_TTL'
  | 'IP_MULTICAST_TTL'
  | 'IP_MULTICAST_LOOP'
  | 'IPV6_V6ONLY'
  | 'TCP_NODELAY';

/**
 * Flags for a receive call
 */
export interface ReceiveFlags {
  /** Leave the data in the receive queue */
  peek?: boolean;
}

/**
 * A connection taken off a listening handle's accept queue
 */
export interface AcceptedConnection {
  handle: SocketHandle;
  peer: Endpoint | null;
}

/**
 * Result of a datagram receive into a caller buffer
 */
export interface ReceivedDatagram {
  bytes: number;
  from: InetAddress;
}

/**
 * One configured address of a local network interface
 */
export interface HostAddress {
  name: string;
  family: 'IPv4' | 'IPv6';
  address: string;
  internal: boolean;
}

/**
 * Lifecycle states of the socket classes
 */
export enum SocketState {
  UNBOUND = 'unbound',
  BOUND = 'bound',
  LISTENING = 'listening',
  UNCONNECTED = 'unconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  SHUTDOWN_READ = 'shutdown-read',
  SHUTDOWN_WRITE = 'shutdown-write',
  SHUTDOWN_BOTH = 'shutdown-both',
  CLOSED = 'closed'
}
