/**
 * Diagnostic channel
 *
 * Cleanup paths (close, finalizers, initializer release) never throw. Their
 * failures are logged under sockwell:diagnostics and emitted here so that an
 * application can surface them.
 */

import { EventEmitter } from 'events';
import Debug from 'debug';

const debug = Debug('sockwell:diagnostics');

export interface CleanupErrorEvent {
  /** Component reporting the failure, e.g. "server-socket" */
  source: string;
  operation: string;
  error: unknown;
}

export interface LiveHandlesEvent {
  handles: number[];
}

export class Diagnostics extends EventEmitter {
  /**
   * Report a failure that happened while releasing a resource
   */
  reportCleanupError(source: string, operation: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    debug(`${source}: ${operation} failed during cleanup: ${message}`);
    this.emit('cleanup-error', { source, operation, error });
  }

  /**
   * Report handles still open when the network subsystem is torn down
   */
  reportLiveHandles(handles: number[]): void {
    debug(`Network released with ${handles.length} open handle(s): ${handles.join(', ')}`);
    this.emit('live-handles', { handles });
  }
}

export const diagnostics = new Diagnostics();
