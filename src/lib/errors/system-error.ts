/**
 * Failure raised by a socket backend: the equivalent of a syscall returning -1
 * with errno set. Socket classes translate it into a typed SocketError.
 */
export class SystemError extends Error {
  readonly code: string;
  readonly syscall: string;

  constructor(code: string, syscall: string, detail?: string) {
    super(detail ? `${syscall} ${code}: ${detail}` : `${syscall} ${code}`);
    this.name = 'SystemError';
    this.code = code;
    this.syscall = syscall;
  }
}

interface ErrnoLike {
  code: string;
  syscall?: string;
}

function isErrnoLike(value: unknown): value is ErrnoLike {
  return typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string';
}

/**
 * Normalize anything thrown by Node's net/dgram/dns/fs APIs into a SystemError
 */
export function toSystemError(error: unknown, syscall: string): SystemError {
  if (error instanceof SystemError) {
    return error;
  }
  if (isErrnoLike(error)) {
    return new SystemError(error.code, error.syscall ?? syscall, error instanceof Error ? error.message : undefined);
  }
  return new SystemError('EUNKNOWN', syscall, error instanceof Error ? error.message : String(error));
}
