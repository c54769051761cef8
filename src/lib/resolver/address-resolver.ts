/**
 * Address Resolution
 *
 * Resolves host and service into candidate addresses and picks the candidate
 * a socket is created for. Servers prefer IPv6 and make the chosen socket
 * dual-stack; clients take the resolver's order.
 */

import Debug from 'debug';
import type { SocketBackend } from '../backend/types';
import { diagnostics } from '../diagnostics';
import { ConfigurationError, CreationError, ResolutionError, socketError, translateError } from '../errors';
import { toSystemError } from '../errors/system-error';
import type { ResolveHints, SocketHandle } from '../types/socket';
import { CandidateAddressList } from './candidate-list';
import { formatIp } from './address-codec';

const debug = Debug('sockwell:resolver');

/**
 * A handle created for one entry of a candidate list
 */
export interface CandidateSelection {
  handle: SocketHandle;
  index: number;
}

/**
 * getaddrinfo: resolve host (null for the local wildcard or loopback
 * addresses) and service into a candidate list
 */
export async function resolveCandidates(
  backend: SocketBackend,
  host: string | null,
  service: string,
  hints: ResolveHints
): Promise<CandidateAddressList> {
  try {
    const candidates = await backend.resolve(host, service, hints);
    return new CandidateAddressList(candidates);
  } catch (error) {
    throw translateError(ResolutionError, 'resolve', error, backend.platform);
  }
}

function tryCreate(backend: SocketBackend, list: CandidateAddressList, index: number): SocketHandle | Error {
  const candidate = list.at(index);
  if (!candidate) {
    return new Error(`No candidate at ${index}`);
  }
  try {
    return backend.create(candidate.family, candidate.kind, candidate.protocol);
  } catch (error) {
    debug(`Socket creation failed for ${formatIp(candidate.address)}: ${error instanceof Error ? error.message : String(error)}`);
    return error instanceof Error ? error : new Error(String(error));
  }
}

function creationFailure(backend: SocketBackend, lastError: Error | undefined): CreationError {
  if (!lastError) {
    return socketError(CreationError, 'socket', 'EAFNOSUPPORT', backend.platform);
  }
  return socketError(CreationError, 'socket', toSystemError(lastError, 'socket').code, backend.platform);
}

/**
 * Server selection: the first IPv6 candidate that creates, made dual-stack;
 * failing that, the first IPv4 candidate that creates
 */
export function selectServerCandidate(backend: SocketBackend, list: CandidateAddressList): CandidateSelection {
  let lastError: Error | undefined;

  for (let index = 0; index < list.length; index++) {
    if (list.at(index)?.family !== 'inet6') {
      continue;
    }
    const result = tryCreate(backend, list, index);
    if (result instanceof Error) {
      lastError = result;
      continue;
    }

    try {
      backend.setOption(result, 'ipv6', 'IPV6_V6ONLY', 0);
    } catch (error) {
      try {
        backend.close(result);
      } catch (closeError) {
        diagnostics.reportCleanupError('resolver', 'close', closeError);
      }
      throw translateError(ConfigurationError, 'setsockopt', error, backend.platform);
    }
    debug(`Selected dual-stack candidate ${index}`);
    return { handle: result, index };
  }

  for (let index = 0; index < list.length; index++) {
    if (list.at(index)?.family !== 'inet') {
      continue;
    }
    const result = tryCreate(backend, list, index);
    if (result instanceof Error) {
      lastError = result;
      continue;
    }
    debug(`Selected IPv4 candidate ${index}`);
    return { handle: result, index };
  }

  throw creationFailure(backend, lastError);
}

/**
 * Client selection: the first candidate, in resolver order from start, that creates
 */
export function selectClientCandidate(backend: SocketBackend, list: CandidateAddressList, start = 0): CandidateSelection {
  let lastError: Error | undefined;

  for (let index = start; index < list.length; index++) {
    const result = tryCreate(backend, list, index);
    if (result instanceof Error) {
      lastError = result;
      continue;
    }
    debug(`Selected candidate ${index}`);
    return { handle: result, index };
  }

  throw creationFailure(backend, lastError);
}
