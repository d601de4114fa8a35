import type { Discovery } from '../types/discovery.js';

interface BufferedDiscovery {
  discovery: Discovery;
  processed: boolean;
  shared: boolean;
}

/** Score bonus for a discovery whose topic is one of the persona's interests */
const INTEREST_BONUS = 0.2;

/**
 * Bounded buffer of discoveries awaiting processing and sharing.
 * Oldest entries fall out once the buffer is full.
 */
export class DiscoveryBuffer {
  private readonly maxSize: number;
  private readonly entries: BufferedDiscovery[] = [];
  private added = 0;

  constructor(maxSize = 50) {
    this.maxSize = maxSize;
  }

  /**
   * Add discoveries, skipping ids already buffered.
   * @returns How many were added
   */
  add(discoveries: Discovery[]): number {
    let count = 0;
    for (const discovery of discoveries) {
      if (this.entries.some((e) => e.discovery.id === discovery.id)) continue;
      this.entries.push({ discovery, processed: false, shared: false });
      count++;
    }
    if (this.entries.length > this.maxSize) {
      this.entries.splice(0, this.entries.length - this.maxSize);
    }
    this.added += count;
    return count;
  }

  /**
   * Discoveries added since startup. Only ever grows.
   */
  getAddedCount(): number {
    return this.added;
  }

  size(): number {
    return this.entries.length;
  }

  /**
   * Take the newest `limit` unprocessed discoveries and mark them processed.
   */
  takeUnprocessed(limit: number): Discovery[] {
    const pending = this.entries.filter((e) => !e.processed).slice(-limit);
    for (const entry of pending) {
      entry.processed = true;
    }
    return pending.map((e) => e.discovery);
  }

  /**
   * The unshared discovery most worth bringing up: highest importance, with a
   * bonus for topics among the given interests. Newer wins ties.
   */
  bestUnshared(interests: readonly string[]): Discovery | null {
    const lowered = new Set(interests.map((i) => i.toLowerCase()));
    let best: { discovery: Discovery; score: number } | null = null;

    for (const entry of this.entries) {
      if (entry.shared) continue;
      const bonus = lowered.has(entry.discovery.topic.toLowerCase()) ? INTEREST_BONUS : 0;
      const score = entry.discovery.importance + bonus;
      if (best === null || score >= best.score) {
        best = { discovery: entry.discovery, score };
      }
    }

    return best?.discovery ?? null;
  }

  markShared(id: string): void {
    const entry = this.entries.find((e) => e.discovery.id === id);
    if (entry) entry.shared = true;
  }

  list(): Discovery[] {
    return this.entries.map((e) => e.discovery);
  }
}
