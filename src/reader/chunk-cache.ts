/** Upper bound on chunks kept in memory for one open novel. */
export const MAX_CACHED_CHUNKS = 5;

/**
 * Bounded map of chunk index -> chunk text.
 *
 * Eviction is by index, not by recency: when an insert pushes the size past
 * the bound, the lowest indices are dropped until `capacity` entries remain.
 * Jumping backwards therefore evicts the chunk just inserted if it is the
 * lowest one cached.
 */
export class ChunkCache {
  private readonly entries = new Map<number, string>();

  public constructor(public readonly capacity = MAX_CACHED_CHUNKS) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer (got ${capacity})`);
    }
  }

  public get size(): number {
    return this.entries.size;
  }

  public get(index: number): string | undefined {
    return this.entries.get(index);
  }

  public has(index: number): boolean {
    return this.entries.has(index);
  }

  /** Insert a chunk and apply eviction. @returns Indices that were evicted. */
  public set(index: number, text: string): number[] {
    this.entries.set(index, text);
    if (this.entries.size <= this.capacity) return [];
    const evicted = this.indices().slice(0, this.entries.size - this.capacity);
    for (const key of evicted) this.entries.delete(key);
    return evicted;
  }

  /** Cached indices in ascending order. */
  public indices(): number[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b);
  }

  public clear(): void {
    this.entries.clear();
  }
}
