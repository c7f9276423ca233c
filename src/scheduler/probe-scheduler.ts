/**
 * One probe pass over every listed container.
 *
 * Each container is probed as its own pool job. A transition into a bad status
 * arms the retry scheduler; containers that were tracked before the pass but
 * are missing from the listing are reported as `not_found` straight away and
 * dropped, since there is nothing left to re-probe.
 */

import type { EntityStatus, ProbeAdapter } from '../types.js';
import { isBadStatus } from '../types.js';
import type { StateStore } from '../state/state-store.js';
import type { WorkerPool } from './worker-pool.js';
import type { RetryScheduler } from './retry-scheduler.js';
import type { AlertContext } from './alerts.js';
import { raiseAlert } from './alerts.js';
import { AdapterNotFoundError, errorMessage } from '../errors.js';

export interface ProbeSchedulerDeps extends AlertContext {
  adapter:          ProbeAdapter;
  store:            StateStore;
  pool:             WorkerPool;
  retry:            RetryScheduler;
  /** Send an alert when an escalated container comes back healthy */
  notifyOnRecovery: boolean;
}

export interface PassSummary {
  listed:      number;
  probed:      number;
  /** No healthcheck configured */
  skipped:     number;
  failed:      number;
  transitions: number;
  armed:       number;
  disappeared: number;
  recovered:   number;
}

export class ProbeScheduler {
  constructor(private readonly deps: ProbeSchedulerDeps) {}

  /**
   * Run a single pass. Returns null when the container listing itself failed;
   * state is left untouched in that case.
   */
  async runOnce(): Promise<PassSummary | null> {
    const { adapter, store, pool, logger } = this.deps;

    let listed: string[];
    try {
      listed = await adapter.listEntityIds();
    } catch (err) {
      logger.error({ err }, `Listing containers failed, skipping this pass: ${errorMessage(err)}`);
      return null;
    }

    const summary: PassSummary = {
      listed: listed.length, probed: 0, skipped: 0, failed: 0,
      transitions: 0, armed: 0, disappeared: 0, recovered: 0,
    };
    const trackedBefore = store.snapshotIds();
    const seen = new Set(listed);

    const checks = listed.map((entityId) =>
      pool.submit(() => this.checkEntity(entityId, summary)),
    );

    for (const entityId of trackedBefore) {
      if (seen.has(entityId)) continue;
      if (await this.reportDisappeared(entityId)) summary.disappeared++;
    }

    const settled = await Promise.allSettled(checks);
    settled.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        summary.failed++;
        logger.error({ entityId: listed[i], err: outcome.reason }, `Error processing health check for ${listed[i]}`);
      }
    });

    logger.info(
      { ...summary },
      `Pass complete: ${summary.probed} probed, ${summary.armed} re-check(s) scheduled, ${summary.disappeared} gone`,
    );
    return summary;
  }

  private async checkEntity(entityId: string, summary: PassSummary): Promise<void> {
    const { adapter, store, retry, logger } = this.deps;

    let observed: EntityStatus;
    let group: string;
    try {
      const result = await adapter.probe(entityId);
      if (result.status === 'no_health_info') {
        summary.skipped++;
        return;
      }
      observed = result.status;
      group = result.group;
    } catch (err) {
      if (!(err instanceof AdapterNotFoundError)) {
        summary.failed++;
        logger.error({ entityId, err }, `Error getting health for ${entityId}: ${errorMessage(err)}`);
        return;
      }
      const known = store.get(entityId);
      // Never tracked, so nothing to report
      if (!known) return;
      observed = 'not_found';
      group = known.group;
    }
    summary.probed++;

    const previous = store.get(entityId);
    const previousStatus: EntityStatus = previous?.status ?? 'unknown';
    store.upsert(entityId, observed, group, this.deps.now());

    if (observed === previousStatus) return;
    summary.transitions++;
    logger.info({ entityId, group, from: previousStatus, to: observed }, `[${group}] ${entityId}: ${previousStatus} → ${observed}`);

    if (isBadStatus(observed)) {
      if (retry.arm({ entityId, group, previousStatus }) === 'armed') summary.armed++;
      return;
    }

    if (this.deps.notifyOnRecovery && previous?.escalated) {
      await raiseAlert(this.deps, entityId, group, 'healthy', previousStatus, 'Container recovered to healthy status.');
      summary.recovered++;
    }
  }

  private async reportDisappeared(entityId: string): Promise<boolean> {
    const { store, logger } = this.deps;
    const record = store.get(entityId);
    if (!record) return false;

    logger.warn({ entityId, group: record.group }, `[${record.group}] ${entityId}: container no longer running`);
    // Already recorded as missing by an earlier inspect; no real transition to show
    const previousStatus = record.status === 'not_found' ? undefined : record.status;
    await raiseAlert(
      this.deps, entityId, record.group, 'not_found', previousStatus,
      'Container is no longer running or has been removed.',
    );
    store.remove(entityId);
    return true;
  }
}
