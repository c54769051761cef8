/**
 * Candidate Address List
 *
 * The ordered result of one resolution call. It is released exactly once;
 * afterwards it is empty and every lookup into it returns null.
 */

import type { CandidateAddress } from '../types/socket';

export class CandidateAddressList implements Iterable<CandidateAddress> {
  private entries: CandidateAddress[] | null;

  constructor(entries: CandidateAddress[]) {
    this.entries = [...entries];
  }

  get length(): number {
    return this.entries ? this.entries.length : 0;
  }

  get released(): boolean {
    return this.entries === null;
  }

  at(index: number): CandidateAddress | null {
    if (!this.entries || index < 0 || index >= this.entries.length) {
      return null;
    }
    return this.entries[index];
  }

  /**
   * Drop the list; calling it again is a no-op
   */
  release(): void {
    this.entries = null;
  }

  [Symbol.iterator](): Iterator<CandidateAddress> {
    return (this.entries || [])[Symbol.iterator]();
  }
}
