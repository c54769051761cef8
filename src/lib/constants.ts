/**
 * Socket Constants
 */

import type { OptionLevel, SocketOptionName } from './types/socket';

export const SOCKET_CONSTANTS = {
  // Buffers
  DEFAULT_BUFFER_SIZE: 512,

  // Ports
  MIN_PORT: 0,
  MAX_PORT: 65535,
  EPHEMERAL_PORT_START: 49152,

  // Wildcard and loopback literals
  INET_ANY: '0.0.0.0',
  INET6_ANY: '::',
  INET_LOOPBACK: '127.0.0.1',
  INET6_LOOPBACK: '::1',

  // Library-level codes that have no operating-system counterpart
  NO_ADDRESS_CODE: 'ENOADDRESS',
  CONNECTION_CLOSED_CODE: 'ECLOSED',
  INVALID_STATE_CODE: 'EINVALIDSTATE',
  UNKNOWN_CODE: 'EUNKNOWN'
} as const;

/**
 * Level each option lives at; setting an option at another level fails with ENOPROTOOPT
 */
export const OPTION_LEVELS: Record<SocketOptionName, OptionLevel> = {
  SO_REUSEADDR: 'socket',
  SO_EXCLUSIVEADDRUSE: 'socket',
  SO_KEEPALIVE: 'socket',
  SO_BROADCAST: 'socket',
  SO_RCVBUF: 'socket',
  SO_SNDBUF: 'socket',
  SO_RCVTIMEO: 'socket',
  SO_SNDTIMEO: 'socket',
  IP_TTL: 'ip',
  IP_MULTICAST_TTL: 'ip',
  IP_MULTICAST_LOOP: 'ip',
  IPV6_V6ONLY: 'ipv6',
  TCP_NODELAY: 'tcp'
};

/**
 * Values reported by getOption() before an option has been set
 */
export const OPTION_DEFAULTS: Record<SocketOptionName, number> = {
  SO_REUSEADDR: 0,
  SO_EXCLUSIVEADDRUSE: 0,
  SO_KEEPALIVE: 0,
  SO_BROADCAST: 0,
  SO_RCVBUF: 212992,
  SO_SNDBUF: 212992,
  SO_RCVTIMEO: 0,
  SO_SNDTIMEO: 0,
  IP_TTL: 64,
  IP_MULTICAST_TTL: 1,
  IP_MULTICAST_LOOP: 1,
  IPV6_V6ONLY: 0,
  TCP_NODELAY: 0
};

/**
 * Codes that mean "the call would have suspended"
 */
export const WOULD_BLOCK_CODES: readonly string[] = ['EAGAIN', 'EWOULDBLOCK', 'EINPROGRESS', 'EALREADY'];

/**
 * Backend limits
 */
export const BACKEND_CONSTANTS = {
  // Handles 0-2 are the standard streams on POSIX
  FIRST_HANDLE: 3,
  MAX_INET_DATAGRAM: 65507,
  MAX_INET6_DATAGRAM: 65527,
  LIMITED_BROADCAST: '255.255.255.255'
} as const;
