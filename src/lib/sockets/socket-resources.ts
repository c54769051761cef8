/**
 * Socket Resources
 *
 * The single owner of what a socket object holds at the backend: the handle,
 * the candidate list it was created from and the index of the selected
 * candidate. The selected candidate reads as null once the list is gone.
 */

import Debug from 'debug';
import type { SocketBackend } from '../backend/types';
import { diagnostics } from '../diagnostics';
import type { CandidateAddressList } from '../resolver/candidate-list';
import { INVALID_SOCKET } from '../types/socket';
import type { CandidateAddress, SocketHandle } from '../types/socket';

const debug = Debug('sockwell:resources');

export class SocketResources {
  readonly backend: SocketBackend;
  /** Component name used when reporting cleanup failures */
  readonly source: string;

  private _handle: SocketHandle = INVALID_SOCKET;
  private candidates: CandidateAddressList | null = null;
  private selectedIndex = -1;

  constructor(backend: SocketBackend, source: string) {
    this.backend = backend;
    this.source = source;
  }

  get handle(): SocketHandle {
    return this._handle;
  }

  get valid(): boolean {
    return this._handle !== INVALID_SOCKET;
  }

  get selected(): CandidateAddress | null {
    return this.candidates ? this.candidates.at(this.selectedIndex) : null;
  }

  get selectedPosition(): number {
    return this.selectedIndex;
  }

  get candidateList(): CandidateAddressList | null {
    return this.candidates;
  }

  /**
   * Take ownership of a handle and, optionally, the list it was selected from
   */
  adopt(handle: SocketHandle, candidates: CandidateAddressList | null = null, index = -1): void {
    this._handle = handle;
    if (candidates !== this.candidates) {
      this.candidates?.release();
    }
    this.candidates = candidates;
    this.selectedIndex = candidates ? index : -1;
  }

  /**
   * Point at another candidate of the held list with a new handle
   */
  reselect(handle: SocketHandle, index: number): void {
    this._handle = handle;
    this.selectedIndex = index;
  }

  releaseCandidates(): void {
    if (this.candidates) {
      this.candidates.release();
      this.candidates = null;
    }
    this.selectedIndex = -1;
  }

  /**
   * Close the handle; failures go to the diagnostic channel
   */
  closeHandle(): void {
    if (this._handle === INVALID_SOCKET) {
      return;
    }
    const handle = this._handle;
    this._handle = INVALID_SOCKET;
    try {
      this.backend.close(handle);
    } catch (error) {
      diagnostics.reportCleanupError(this.source, 'close', error);
    }
  }

  /**
   * Release everything held; safe to call repeatedly
   */
  release(): void {
    this.closeHandle();
    this.releaseCandidates();
  }

  /**
   * Move everything into target, which releases what it held before
   */
  transferTo(target: SocketResources): void {
    if (target === this) {
      return;
    }
    target.release();
    target._handle = this._handle;
    target.candidates = this.candidates;
    target.selectedIndex = this.selectedIndex;
    this._handle = INVALID_SOCKET;
    this.candidates = null;
    this.selectedIndex = -1;
  }
}

/**
 * Releases the resources of socket objects that were collected unclosed
 */
export const resourceFinalizer = new FinalizationRegistry<SocketResources>(resources => {
  if (resources.valid) {
    debug(`${resources.source} socket ${resources.handle} collected without close()`);
  }
  try {
    resources.release();
  } catch (error) {
    diagnostics.reportCleanupError(resources.source, 'finalize', error);
  }
});

/**
 * Track owner's resources for finalization again after they changed hands;
 * an owner holding nothing is not tracked
 */
export function trackResources(owner: object, resources: SocketResources): void {
  resourceFinalizer.unregister(owner);
  if (resources.valid) {
    resourceFinalizer.register(owner, resources, owner);
  }
}
