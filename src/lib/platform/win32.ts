/**
 * Windows platform profile (Winsock)
 *
 * Winsock must be started before use, rejects SO_REUSEADDR semantics in favour
 * of SO_EXCLUSIVEADDRUSE, and reports WSA error numbers.
 */

import type { SocketOptionName } from '../types/socket';
import { BasePlatform } from './base-platform';
import type { ErrorTableEntry } from './types';
import win32Errors from './win32-errors.json';

const WIN32_ERRORS: Readonly<Record<string, ErrorTableEntry>> = win32Errors;

export class Win32Platform extends BasePlatform {
  readonly name = 'win32' as const;
  readonly requiresStartup = true;
  readonly maxBacklog = 0x7fffffff;
  readonly reuseAddressOption = 'SO_EXCLUSIVEADDRUSE' as const;
  readonly supportsLocalSockets: boolean;

  protected readonly errorTable = WIN32_ERRORS;
  protected readonly unsupportedOptions: readonly SocketOptionName[] = [];

  constructor(options: { supportsLocalSockets?: boolean } = {}) {
    super();
    // AF_UNIX exists from Windows 10 1803 onwards
    this.supportsLocalSockets = options.supportsLocalSockets !== false;
  }

  protected lookupErrno(): number | undefined {
    return undefined;
  }
}
