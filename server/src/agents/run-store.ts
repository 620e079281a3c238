/**
 * In-memory run records with a retention window.
 *
 * Records without an expiry (runs still in progress) are never pruned.
 * Pruning is lazy: it happens on access, so no background timer keeps
 * the process alive.
 */

export interface Expiring {
  expiresAt: number | null;
}

export class RunStore<T extends Expiring> {
  private readonly records = new Map<string, T>();

  constructor(private readonly now: () => number = Date.now) {}

  set(runId: string, record: T): void {
    this.prune();
    this.records.set(runId, record);
  }

  get(runId: string): T | undefined {
    const record = this.records.get(runId);
    if (!record) return undefined;
    if (record.expiresAt !== null && record.expiresAt <= this.now()) {
      this.records.delete(runId);
      return undefined;
    }
    return record;
  }

  values(): T[] {
    this.prune();
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [runId, record] of this.records) {
      if (record.expiresAt !== null && record.expiresAt <= now) {
        this.records.delete(runId);
        removed += 1;
      }
    }
    return removed;
  }
}
