/**
 * Socket Error Reporting
 *
 * Every failure carries the originating code (symbolic, e.g. ECONNREFUSED),
 * the platform's numeric errno and a human-readable description. The class
 * tells the caller which step failed.
 */

import Debug from 'debug';
import { SOCKET_CONSTANTS, WOULD_BLOCK_CODES } from '../constants';
import type { SocketPlatform } from '../platform/types';
import { toSystemError } from './system-error';

export { SystemError, toSystemError } from './system-error';

const debug = Debug('sockwell:errors');

/**
 * Descriptions of library-level codes that have no operating-system counterpart
 */
const LIBRARY_MESSAGES: Record<string, string> = {
  [SOCKET_CONSTANTS.NO_ADDRESS_CODE]: 'No candidate address has been selected for this socket',
  [SOCKET_CONSTANTS.CONNECTION_CLOSED_CODE]: 'Connection closed by remote host',
  [SOCKET_CONSTANTS.INVALID_STATE_CODE]: 'Operation not valid in the current socket state',
  [SOCKET_CONSTANTS.UNKNOWN_CODE]: 'Unknown error'
};

export interface SocketErrorDetails {
  code: string;
  errno: number;
  description: string;
  /** Name of the failing operation, e.g. "connect" */
  operation: string;
}

export abstract class SocketError extends Error {
  readonly code: string;
  readonly errno: number;
  readonly description: string;
  readonly operation: string;

  constructor(details: SocketErrorDetails) {
    super(`${details.operation} failed: ${details.description} (${details.code})`);
    this.code = details.code;
    this.errno = details.errno;
    this.description = details.description;
    this.operation = details.operation;
  }

  /** The call would have suspended (non-blocking mode, or a connect still in progress) */
  get wouldBlock(): boolean {
    return WOULD_BLOCK_CODES.includes(this.code);
  }

  /** A configured timeout expired */
  get timedOut(): boolean {
    return this.code === 'ETIMEDOUT';
  }
}

/** The resolver could not produce candidate addresses */
export class ResolutionError extends SocketError {
  readonly name = 'ResolutionError';
}

/** No candidate address yielded a usable handle */
export class CreationError extends SocketError {
  readonly name = 'CreationError';
}

/** An option required during setup could not be applied */
export class ConfigurationError extends SocketError {
  readonly name = 'ConfigurationError';
}

export class BindError extends SocketError {
  readonly name = 'BindError';
}

export class ListenError extends SocketError {
  readonly name = 'ListenError';
}

export class AcceptError extends SocketError {
  readonly name = 'AcceptError';
}

export class ConnectError extends SocketError {
  readonly name = 'ConnectError';
}

export class ReadError extends SocketError {
  readonly name = 'ReadError';
}

export class ReceiveError extends SocketError {
  readonly name = 'ReceiveError';
}

export class WriteError extends SocketError {
  readonly name = 'WriteError';
}

export class SendError extends SocketError {
  readonly name = 'SendError';
}

export class ShutdownError extends SocketError {
  readonly name = 'ShutdownError';
}

export class OptionError extends SocketError {
  readonly name = 'OptionError';
}

export class PollError extends SocketError {
  readonly name = 'PollError';
}

/** The peer closed the connection cleanly (a zero-byte read) */
export class ConnectionClosedError extends SocketError {
  readonly name = 'ConnectionClosedError';
}

/** The socket lacks the state the operation needs (closed, moved from, not bound...) */
export class InvalidStateError extends SocketError {
  readonly name = 'InvalidStateError';
}

export type SocketErrorClass<T extends SocketError> = new (details: SocketErrorDetails) => T;

/**
 * Human-readable text for an error code. Never throws: a failed lookup
 * degrades to a generic message so it is safe on cleanup paths.
 */
export function describeError(code: string, platform: SocketPlatform): string {
  const library = LIBRARY_MESSAGES[code];
  if (library !== undefined) {
    return library;
  }
  try {
    const message = platform.errorToString(code);
    if (message !== undefined) {
      return message;
    }
  } catch (error) {
    debug(`Error message lookup failed for ${code}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return `Unknown error ${code}`;
}

function errorNumber(code: string, platform: SocketPlatform): number {
  try {
    return platform.errorNumber(code);
  } catch (error) {
    debug(`Error number lookup failed for ${code}: ${error instanceof Error ? error.message : String(error)}`);
    return 0;
  }
}

/**
 * Build a typed error for a known code
 */
export function socketError<T extends SocketError>(
  ErrorClass: SocketErrorClass<T>,
  operation: string,
  code: string,
  platform: SocketPlatform,
  description?: string
): T {
  return new ErrorClass({
    code,
    errno: errorNumber(code, platform),
    description: description ?? describeError(code, platform),
    operation
  });
}

/**
 * Translate whatever a backend threw into a typed error. Errors that are
 * already SocketErrors pass through unchanged.
 */
export function translateError<T extends SocketError>(
  ErrorClass: SocketErrorClass<T>,
  operation: string,
  error: unknown,
  platform: SocketPlatform
): SocketError {
  if (error instanceof SocketError) {
    return error;
  }
  const systemError = toSystemError(error, operation);
  return socketError(ErrorClass, operation, systemError.code, platform);
}

/**
 * Shorthand for the InvalidStateError raised by every socket class
 */
export function invalidState(operation: string, reason: string, platform: SocketPlatform): InvalidStateError {
  return socketError(InvalidStateError, operation, SOCKET_CONSTANTS.INVALID_STATE_CODE, platform, reason);
}
