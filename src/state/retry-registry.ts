/**
 * Containers with a retry queued, sleeping or running.
 *
 * Only used for deduplication: `tryAcquire` is the single check-and-set that
 * keeps at most one retry in flight per container.
 */
export class RetryRegistry {
  private pending = new Set<string>();

  /** Returns false if a retry is already registered for this container. */
  tryAcquire(entityId: string): boolean {
    if (this.pending.has(entityId)) return false;
    this.pending.add(entityId);
    return true;
  }

  release(entityId: string): void {
    this.pending.delete(entityId);
  }

  has(entityId: string): boolean {
    return this.pending.has(entityId);
  }

  ids(): string[] {
    return [...this.pending];
  }

  get size(): number {
    return this.pending.size;
  }
}
