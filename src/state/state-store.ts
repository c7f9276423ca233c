/**
 * Last-known status per container.
 *
 * Every method is synchronous, so each call is atomic on the event loop.
 * Sequences of calls are not: a probe pass and a retry for the same
 * container may interleave, and the last write wins.
 */

import type { EntityRecord, EntityStatus } from '../types.js';

export class StateStore {
  private records = new Map<string, EntityRecord>();

  get(entityId: string): EntityRecord | undefined {
    const record = this.records.get(entityId);
    return record ? { ...record } : undefined;
  }

  /** Status for a container, `unknown` when it has never been recorded. */
  statusOf(entityId: string): EntityStatus {
    return this.records.get(entityId)?.status ?? 'unknown';
  }

  upsert(entityId: string, status: EntityStatus, group: string, timestamp: Date = new Date()): EntityRecord {
    const existing = this.records.get(entityId);
    const record: EntityRecord = {
      entityId,
      group,
      status,
      lastCheck: timestamp,
      escalated: status === 'healthy' ? false : existing?.escalated ?? false,
    };
    this.records.set(entityId, record);
    return { ...record };
  }

  /** Flag that an alert went out for the current bad streak. No-op for untracked ids. */
  markEscalated(entityId: string): void {
    const record = this.records.get(entityId);
    if (record) record.escalated = true;
  }

  remove(entityId: string): boolean {
    return this.records.delete(entityId);
  }

  snapshotIds(): Set<string> {
    return new Set(this.records.keys());
  }

  get size(): number {
    return this.records.size;
  }
}
