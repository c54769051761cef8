import { LoopbackSocketBackend } from '../src/lib/backend';
import type { LoopbackBackendOptions } from '../src/lib/backend';
import { diagnostics } from '../src/lib/diagnostics';
import type { CleanupErrorEvent, LiveHandlesEvent } from '../src/lib/diagnostics';
import { PosixPlatform, Win32Platform } from '../src/lib/platform';
import { SocketError } from '../src/lib/errors';

export function posixBackend(options: LoopbackBackendOptions = {}): LoopbackSocketBackend {
  return new LoopbackSocketBackend({ platform: new PosixPlatform(), ...options });
}

export function win32Backend(options: LoopbackBackendOptions = {}): LoopbackSocketBackend {
  return new LoopbackSocketBackend({ platform: new Win32Platform(), ...options });
}

/**
 * Collect diagnostic events until the returned stop() is called
 */
export function recordDiagnostics(): { cleanup: CleanupErrorEvent[]; live: LiveHandlesEvent[]; stop: () => void } {
  const cleanup: CleanupErrorEvent[] = [];
  const live: LiveHandlesEvent[] = [];
  const onCleanup = (event: CleanupErrorEvent): void => {
    cleanup.push(event);
  };
  const onLive = (event: LiveHandlesEvent): void => {
    live.push(event);
  };
  diagnostics.on('cleanup-error', onCleanup);
  diagnostics.on('live-handles', onLive);
  return {
    cleanup,
    live,
    stop: () => {
      diagnostics.off('cleanup-error', onCleanup);
      diagnostics.off('live-handles', onLive);
    }
  };
}

/**
 * The SocketError a promise rejects with
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<SocketError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SocketError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the operation to fail');
}

/**
 * The SocketError a synchronous call throws
 */
export function thrownBy(fn: () => unknown): SocketError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SocketError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the operation to fail');
}
