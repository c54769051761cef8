/**
 * POSIX platform profile (Linux, macOS, BSD)
 */

import * as util from 'util';
import type { SocketOptionName } from '../types/socket';
import { BasePlatform } from './base-platform';
import type { ErrorTableEntry } from './types';
import posixErrors from './posix-errors.json';

const POSIX_ERRORS: Readonly<Record<string, ErrorTableEntry>> = posixErrors;

let systemErrnos: Map<string, number> | undefined;

/**
 * Code -> positive errno, built once from the runtime's system error map
 */
function systemErrnoTable(): Map<string, number> {
  if (!systemErrnos) {
    systemErrnos = new Map();
    for (const [negated, [name]] of util.getSystemErrorMap()) {
      systemErrnos.set(name, Math.abs(negated));
    }
  }
  return systemErrnos;
}

export class PosixPlatform extends BasePlatform {
  readonly name = 'posix' as const;
  readonly requiresStartup = false;
  readonly maxBacklog = 4096;
  readonly reuseAddressOption = 'SO_REUSEADDR' as const;
  readonly supportsLocalSockets: boolean;

  protected readonly errorTable = POSIX_ERRORS;
  protected readonly unsupportedOptions: readonly SocketOptionName[] = ['SO_EXCLUSIVEADDRUSE'];

  constructor(options: { supportsLocalSockets?: boolean } = {}) {
    super();
    this.supportsLocalSockets = options.supportsLocalSockets !== false;
  }

  protected lookupErrno(code: string): number | undefined {
    return systemErrnoTable().get(code);
  }
}
