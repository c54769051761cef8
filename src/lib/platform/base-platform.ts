import Debug from 'debug';
import type { SocketOptionName } from '../types/socket';
import type { ErrorTableEntry, PlatformName, SocketPlatform } from './types';

const debug = Debug('sockwell:platform');

/**
 * Table-driven platform profile
 */
export abstract class BasePlatform implements SocketPlatform {
  abstract readonly name: PlatformName;
  abstract readonly requiresStartup: boolean;
  abstract readonly maxBacklog: number;
  abstract readonly reuseAddressOption: 'SO_REUSEADDR' | 'SO_EXCLUSIVEADDRUSE';
  abstract readonly supportsLocalSockets: boolean;

  protected abstract readonly errorTable: Readonly<Record<string, ErrorTableEntry>>;
  protected abstract readonly unsupportedOptions: readonly SocketOptionName[];

  /**
   * Fallback errno lookup for codes whose table row carries no number
   */
  protected abstract lookupErrno(code: string): number | undefined;

  supportsOption(name: SocketOptionName): boolean {
    return !this.unsupportedOptions.includes(name);
  }

  errorNumber(code: string): number {
    const entry = this.entry(code);
    if (entry?.errno !== undefined) {
      return entry.errno;
    }
    return this.lookupErrno(code) ?? 0;
  }

  errorToString(code: string): string | undefined {
    return this.entry(code)?.message;
  }

  private entry(code: string): ErrorTableEntry | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.errorTable, code)) {
      debug(`No ${this.name} error table entry for ${code}`);
      return undefined;
    }
    return this.errorTable[code];
  }
}
