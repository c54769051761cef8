/**
 * Host address enumeration
 */

import Debug from 'debug';
import { defaultBackend } from '../backend';
import type { SocketBackend } from '../backend/types';
import type { HostAddress } from '../types/socket';

const debug = Debug('sockwell:interfaces');

/**
 * Every address of every local interface, in the order the system reports them
 */
export function listHostAddresses(backend: SocketBackend = defaultBackend()): HostAddress[] {
  const addresses = backend.networkInterfaces();
  debug(`Found ${addresses.length} interface address(es)`);
  return addresses;
}

/**
 * One line per interface address, e.g. "eth0 IPv4 Address 192.0.2.10"
 */
export function getHostAddr(backend: SocketBackend = defaultBackend()): string[] {
  return listHostAddresses(backend).map(entry => `${entry.name} ${entry.family} Address ${entry.address}`);
}
