/**
 * Deferred re-probe for containers that turned bad.
 *
 * A transition into a bad status arms one retry per container. The retry
 * sleeps for the backoff delay (without holding a worker slot), then re-probes
 * through the pool:
 *
 *   healthy        → store updated; no alert unless an escalated container
 *                    recovered and recovery alerts are on
 *   starting/unhealthy → alert with recent logs, optionally re-armed
 *   not found      → `not_found` alert, record removed
 *   no healthcheck → dropped silently
 *
 * Re-arming is a command the finished task hands back to `arm` after its
 * registry slot has been released, so a container never has two retries.
 */

import type { ProbeAdapter, ProbeResult, RetryTask } from '../types.js';
import type { StateStore } from '../state/state-store.js';
import type { RetryRegistry } from '../state/retry-registry.js';
import type { WorkerPool } from './worker-pool.js';
import type { AlertContext } from './alerts.js';
import { raiseAlert, formatDuration } from './alerts.js';
import { computeRetryDelay, shouldRearm, type BackoffPolicy } from './backoff.js';
import { sleep } from './sleep.js';
import { AdapterNotFoundError, errorMessage } from '../errors.js';

export type ArmRequest = Omit<RetryTask, 'attempt'> & { attempt?: number };

export type ArmResult = 'armed' | 'already_armed' | 'shutting_down';

export type RetryOutcome =
  | { kind: 'cancelled' }
  | { kind: 'recovered' }
  | { kind: 'no_health_info' }
  | { kind: 'not_found' }
  | { kind: 'escalated'; next?: RetryTask }
  | { kind: 'failed' };

export interface RetrySchedulerDeps extends AlertContext {
  adapter:  ProbeAdapter;
  store:    StateStore;
  registry: RetryRegistry;
  pool:     WorkerPool;
  policy:   BackoffPolicy;
  /** Log lines attached to an escalation */
  logLines: number;
  signal:   AbortSignal;
  /** Send an alert when an escalated container comes back healthy */
  notifyOnRecovery: boolean;
  random?:  () => number;
}

export class RetryScheduler {
  private inFlight = new Set<Promise<void>>();
  private readonly random: () => number;

  constructor(private readonly deps: RetrySchedulerDeps) {
    this.random = deps.random ?? Math.random;
  }

  arm(request: ArmRequest): ArmResult {
    const { registry, policy, signal, logger } = this.deps;
    if (signal.aborted) return 'shutting_down';
    if (!registry.tryAcquire(request.entityId)) {
      logger.debug({ entityId: request.entityId }, `Retry already scheduled for ${request.entityId}`);
      return 'already_armed';
    }

    const task: RetryTask = { ...request, attempt: request.attempt ?? 1 };
    const delayMs = computeRetryDelay(task.attempt, policy, this.random);
    logger.info(
      { entityId: task.entityId, group: task.group, attempt: task.attempt, delayMs },
      `[${task.group}] ${task.entityId}: re-checking in ${formatDuration(delayMs)} (attempt ${task.attempt})`,
    );

    const run: Promise<void> = this.execute(task, delayMs)
      .catch((err: unknown): RetryOutcome => {
        logger.error({ entityId: task.entityId, err }, `Retry for ${task.entityId} failed: ${errorMessage(err)}`);
        return { kind: 'failed' };
      })
      .then((outcome) => this.settle(task, outcome))
      .finally(() => this.inFlight.delete(run));
    this.inFlight.add(run);
    return 'armed';
  }

  /** Resolves when every retry, including ones re-armed meanwhile, has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private async execute(task: RetryTask, delayMs: number): Promise<RetryOutcome> {
    const completed = await sleep(delayMs, this.deps.signal);
    if (!completed) return { kind: 'cancelled' };
    return this.deps.pool.submit(() => this.recheck(task, delayMs));
  }

  private async recheck(task: RetryTask, waitedMs: number): Promise<RetryOutcome> {
    const { adapter, store, logger, logLines, signal } = this.deps;
    if (signal.aborted) return { kind: 'cancelled' };

    let result: ProbeResult;
    try {
      result = await adapter.probe(task.entityId);
    } catch (err) {
      if (err instanceof AdapterNotFoundError) {
        // Already reported and dropped by a listing pass
        if (!store.get(task.entityId)) return { kind: 'not_found' };
        await raiseAlert(
          this.deps, task.entityId, task.group, 'not_found', task.previousStatus,
          'Container disappeared during retry wait period.',
        );
        store.remove(task.entityId);
        return { kind: 'not_found' };
      }
      logger.error({ entityId: task.entityId, err }, `Re-check of ${task.entityId} failed: ${errorMessage(err)}`);
      await raiseAlert(
        this.deps, task.entityId, task.group, 'unknown', task.previousStatus,
        `Container health could not be re-checked after ${formatDuration(waitedMs)}: ${errorMessage(err)}`,
      );
      return { kind: 'escalated', next: this.nextAttempt(task) };
    }

    switch (result.status) {
      case 'no_health_info':
        return { kind: 'no_health_info' };

      case 'healthy': {
        const before = store.get(task.entityId);
        store.upsert(task.entityId, 'healthy', result.group, this.deps.now());
        if (this.deps.notifyOnRecovery && before?.escalated) {
          await raiseAlert(
            this.deps, task.entityId, result.group, 'healthy', before.status,
            'Container recovered to healthy status.',
          );
        }
        return { kind: 'recovered' };
      }

      case 'starting':
      case 'unhealthy': {
        const logs = await adapter.recentDiagnostics(task.entityId, logLines);
        await raiseAlert(
          this.deps, task.entityId, result.group, result.status, task.previousStatus,
          `Container remained ${result.status} after ${formatDuration(waitedMs)}.\n\nRecent logs:\n\n${logs}`,
        );
        store.upsert(task.entityId, result.status, result.group, this.deps.now());
        store.markEscalated(task.entityId);
        return { kind: 'escalated', next: this.nextAttempt({ ...task, group: result.group }) };
      }
    }
  }

  private nextAttempt(task: RetryTask): RetryTask | undefined {
    if (!shouldRearm(task.attempt, this.deps.policy)) return undefined;
    return { ...task, attempt: task.attempt + 1 };
  }

  private settle(task: RetryTask, outcome: RetryOutcome): void {
    const { registry, logger } = this.deps;
    registry.release(task.entityId);

    switch (outcome.kind) {
      case 'cancelled':
        logger.info({ entityId: task.entityId }, `Retry for ${task.entityId} abandoned on shutdown`);
        return;
      case 'recovered':
        logger.info({ entityId: task.entityId }, `[${task.group}] ${task.entityId}: healthy again on re-check`);
        return;
      case 'no_health_info':
        logger.info({ entityId: task.entityId }, `${task.entityId} no longer reports health; retry dropped`);
        return;
      case 'not_found':
        logger.warn({ entityId: task.entityId }, `[${task.group}] ${task.entityId}: gone during retry wait`);
        return;
      case 'failed':
        return;
      case 'escalated':
        if (outcome.next) this.arm(outcome.next);
        return;
    }
  }
}
