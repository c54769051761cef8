/**
 * Address conversion
 *
 * Converts between the textual "ip:port" form and the binary InetAddress
 * representation used by the backends. Only numeric hosts are accepted;
 * nothing here consults a resolver.
 */

import * as net from 'net';
import * as ip from 'ip';
import { SOCKET_CONSTANTS } from '../constants';
import type { Endpoint, InetAddress } from '../types/socket';

const MAPPED_PREFIX = Buffer.from([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff]);

/**
 * Family of a numeric IP literal, or null when the text is not one
 */
export function ipFamily(text: string): 'inet' | 'inet6' | null {
  switch (net.isIP(text)) {
    case 4:
      return 'inet';
    case 6:
      return 'inet6';
    default:
      return null;
  }
}

/**
 * Build a binary address from a numeric IP literal. A "%zone" suffix on an
 * IPv6 literal becomes the scope id when it is numeric.
 */
export function createInetAddress(text: string, port: number): InetAddress {
  const [bare, zone] = text.split('%');
  const family = ipFamily(bare);
  if (!family) {
    throw new TypeError(`Not a numeric IP address: ${text}`);
  }
  const address: InetAddress = { family, bytes: ip.toBuffer(bare), port };
  if (family === 'inet6' && zone !== undefined && /^\d+$/.test(zone)) {
    address.scopeId = Number(zone);
  }
  return address;
}

export function wildcardAddress(family: 'inet' | 'inet6', port: number): InetAddress {
  return createInetAddress(family === 'inet' ? SOCKET_CONSTANTS.INET_ANY : SOCKET_CONSTANTS.INET6_ANY, port);
}

export function loopbackAddress(family: 'inet' | 'inet6', port: number): InetAddress {
  return createInetAddress(family === 'inet' ? SOCKET_CONSTANTS.INET_LOOPBACK : SOCKET_CONSTANTS.INET6_LOOPBACK, port);
}

/**
 * Whether an IPv6 address is an IPv4-mapped address (::ffff:a.b.c.d)
 */
export function isMappedAddress(address: InetAddress): boolean {
  return address.family === 'inet6' && address.bytes.length === 16 && address.bytes.subarray(0, 12).equals(MAPPED_PREFIX);
}

/**
 * Map an IPv4 address into the IPv6 space, as a dual-stack socket reports it
 */
export function toMappedAddress(address: InetAddress): InetAddress {
  if (address.family === 'inet6') {
    return address;
  }
  return { family: 'inet6', bytes: Buffer.concat([MAPPED_PREFIX, address.bytes]), port: address.port };
}

/**
 * Turn an IPv4-mapped IPv6 address into the plain IPv4 address with the same
 * port. Any other address is returned unchanged. The input is not modified.
 */
export function normalizeMappedAddress(address: InetAddress): InetAddress {
  if (!isMappedAddress(address)) {
    return address;
  }
  return { family: 'inet', bytes: Buffer.from(address.bytes.subarray(12)), port: address.port };
}

/**
 * Numeric IP text of an address, without port
 */
export function formatIp(address: InetAddress): string {
  if (isMappedAddress(address)) {
    return `::ffff:${ip.toString(address.bytes, 12, 4)}`;
  }
  return ip.toString(address.bytes);
}

/**
 * Render an endpoint as "ip:port" (IPv6 without brackets), or its path for a
 * local endpoint
 */
export function addressToString(address: Endpoint): string {
  if (address.family === 'local') {
    return address.path;
  }
  return `${formatIp(address)}:${address.port}`;
}

/**
 * Parse "ip:port", splitting on the last colon. The host may be bracketed and
 * must be numeric. Returns null on malformed input.
 */
export function stringToAddress(text: string): InetAddress | null {
  const separator = text.lastIndexOf(':');
  if (separator <= 0) {
    return null;
  }

  let host = text.slice(0, separator);
  const portText = text.slice(separator + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  if (!/^\d{1,5}$/.test(portText)) {
    return null;
  }
  const port = Number(portText);
  if (port > SOCKET_CONSTANTS.MAX_PORT) {
    return null;
  }

  if (!ipFamily(host.split('%')[0])) {
    return null;
  }
  return createInetAddress(host, port);
}

/**
 * Byte-wise equality of two endpoints, port included
 */
export function sameEndpoint(a: Endpoint, b: Endpoint): boolean {
  if (a.family === 'local' || b.family === 'local') {
    return a.family === 'local' && b.family === 'local' && a.path === b.path;
  }
  return a.family === b.family && a.port === b.port && a.bytes.equals(b.bytes);
}
