/**
 * Network Initializer
 *
 * Scoped ownership of the backend's network subsystem. Each acquisition
 * counts one startup; the subsystem stops when the last one is released.
 */

import Debug from 'debug';
import { defaultBackend } from '../backend';
import type { SocketBackend } from '../backend/types';
import { diagnostics } from '../diagnostics';
import { ConfigurationError, translateError } from '../errors';

const debug = Debug('sockwell:network');

export class NetworkInitializer {
  private readonly backend: SocketBackend;
  private active = true;

  private constructor(backend: SocketBackend) {
    this.backend = backend;
  }

  /**
   * Start the network subsystem (or add a reference to it)
   */
  static async acquire(backend: SocketBackend = defaultBackend()): Promise<NetworkInitializer> {
    try {
      await backend.startup();
    } catch (error) {
      throw translateError(ConfigurationError, 'startup', error, backend.platform);
    }
    debug(`Network acquired on ${backend.name}`);
    return new NetworkInitializer(backend);
  }

  /**
   * Run fn with the network held, releasing it however fn settles
   */
  static async withNetwork<T>(fn: () => Promise<T> | T, backend: SocketBackend = defaultBackend()): Promise<T> {
    const network = await NetworkInitializer.acquire(backend);
    try {
      return await fn();
    } finally {
      await network.release();
    }
  }

  get isActive(): boolean {
    return this.active;
  }

  /**
   * Drop this reference. Never throws; only the first call has an effect.
   */
  async release(): Promise<void> {
    if (!this.active) {
      return;
    }
    this.active = false;

    try {
      await this.backend.cleanup();
    } catch (error) {
      diagnostics.reportCleanupError('network-initializer', 'cleanup', error);
      return;
    }

    if (!this.backend.isStarted()) {
      const handles = this.backend.openHandles();
      if (handles.length > 0) {
        diagnostics.reportLiveHandles(handles);
      }
      debug(`Network released on ${this.backend.name}`);
    }
  }
}
