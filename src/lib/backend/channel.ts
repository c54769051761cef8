/**
 * Wait primitives shared by the backends
 *
 * Backends keep inbound data in these structures and notify a per-socket
 * Signal whenever anything changes (data, end of stream, a queued connection,
 * close). Waiting operations re-check their condition after every wake-up.
 */

import { SystemError } from '../errors/system-error';
import type { InetAddress } from '../types/socket';

/**
 * Wake-up notification for any number of waiters
 */
export class Signal {
  private waiters = new Set<() => void>();

  /**
   * Resolves true when notified, false when timeoutMs (if positive) elapses first
   */
  wait(timeoutMs = 0): Promise<boolean> {
    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const wake = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        this.waiters.delete(wake);
        resolve(true);
      };
      this.waiters.add(wake);
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.waiters.delete(wake);
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  notify(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  get pending(): number {
    return this.waiters.size;
  }
}

/**
 * Inbound side of a byte stream
 */
export class ByteChannel {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: SystemError | undefined;

  get size(): number {
    return this.buffered;
  }

  /** Data, end of stream or a failure is waiting */
  get readable(): boolean {
    return this.buffered > 0 || this.ended || this.failure !== undefined;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  push(chunk: Uint8Array): void {
    if (this.ended || chunk.length === 0) {
      return;
    }
    this.chunks.push(Buffer.from(chunk));
    this.buffered += chunk.length;
  }

  /** Peer sent FIN: reads drain the buffer and then return 0 */
  end(): void {
    this.ended = true;
  }

  /** Connection failed: reads drain the buffer and then throw */
  fail(error: SystemError): void {
    if (!this.failure) {
      this.failure = error;
    }
  }

  /**
   * Copy up to target.length bytes. Returns undefined when nothing is
   * available yet, 0 at end of stream.
   */
  read(target: Buffer, peek = false): number | undefined {
    if (this.buffered === 0) {
      if (this.failure) {
        throw this.failure;
      }
      return this.ended ? 0 : undefined;
    }
    if (target.length === 0) {
      return 0;
    }

    let copied = 0;
    let index = 0;
    while (copied < target.length && index < this.chunks.length) {
      const chunk = this.chunks[index];
      const count = Math.min(chunk.length, target.length - copied);
      chunk.copy(target, copied, 0, count);
      copied += count;
      if (count < chunk.length) {
        if (!peek) {
          this.chunks[index] = chunk.subarray(count);
        }
        break;
      }
      index++;
    }

    if (!peek) {
      this.chunks.splice(0, index);
      this.buffered -= copied;
    }
    return copied;
  }

  /** Drop everything still buffered */
  clear(): void {
    this.chunks = [];
    this.buffered = 0;
  }
}

export interface QueuedDatagram {
  data: Buffer;
  from: InetAddress;
}

/**
 * Inbound datagrams, each delivered whole or truncated to the receive buffer
 */
export class DatagramQueue {
  private datagrams: QueuedDatagram[] = [];
  private failure: SystemError | undefined;

  get length(): number {
    return this.datagrams.length;
  }

  get readable(): boolean {
    return this.datagrams.length > 0 || this.failure !== undefined;
  }

  push(datagram: QueuedDatagram): void {
    this.datagrams.push(datagram);
  }

  /** Asynchronous error (e.g. ICMP unreachable) reported by the next receive */
  fail(error: SystemError): void {
    this.failure = error;
  }

  shift(): QueuedDatagram | undefined {
    if (this.failure) {
      const failure = this.failure;
      this.failure = undefined;
      throw failure;
    }
    return this.datagrams.shift();
  }
}

export type Settled<T> = { settled: true; value: T } | { settled: false };

/**
 * Wait for a promise for at most timeoutMs; 0 or less waits indefinitely
 */
export function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<Settled<T>> {
  if (timeoutMs <= 0) {
    return promise.then((value): Settled<T> => ({ settled: true, value }));
  }
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve({ settled: false }), timeoutMs);
    void promise.then(
      value => {
        clearTimeout(timer);
        resolve({ settled: true, value });
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
