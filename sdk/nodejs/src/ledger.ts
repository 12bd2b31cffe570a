// SPDX-License-Identifier: MIT

/**
 * Difference between two cumulative readings, never negative.
 * A counter that went backwards (e.g. a session reset) yields 0.
 */
export function clampedDelta(current: number, previous: number): number {
  return current > previous ? current - previous : 0;
}

/**
 * Last observed cumulative exchange count of every peer seen so far.
 *
 * Entries are never evicted: a peer that disconnects keeps its last count,
 * so that a reconnection is measured from where it left off.
 */
export class ExchangeLedger {
  private readonly counts = new Map<string, number>();

  /**
   * Records the current cumulative count of a peer.
   *
   * @returns The count exchanged since the previous observation (0 for a counter reset).
   */
  record(peerId: string, exchanged: number): number {
    const delta = clampedDelta(exchanged, this.counts.get(peerId) ?? 0);
    this.counts.set(peerId, exchanged);
    return delta;
  }

  get(peerId: string): number | undefined {
    return this.counts.get(peerId);
  }

  has(peerId: string): boolean {
    return this.counts.has(peerId);
  }

  get size(): number {
    return this.counts.size;
  }
}
