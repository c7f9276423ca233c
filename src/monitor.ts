/**
 * Health monitor.
 *
 * Owns the shared state (status store, retry registry, worker pool) and the
 * cancellation signal, runs a probe pass on a fixed cadence, and shuts down
 * by abandoning sleeping retries and draining in-flight work.
 */

import { setMaxListeners } from 'node:events';
import type { Config } from './config.js';
import type { Notifier, ProbeAdapter } from './types.js';
import { StateStore } from './state/state-store.js';
import { RetryRegistry } from './state/retry-registry.js';
import { WorkerPool } from './scheduler/worker-pool.js';
import { RetryScheduler } from './scheduler/retry-scheduler.js';
import { ProbeScheduler, type PassSummary } from './scheduler/probe-scheduler.js';
import { sleep } from './scheduler/sleep.js';
import { formatDuration } from './scheduler/alerts.js';
import { resolveRecipients } from './services/routing.js';
import { createLogger, type Logger } from './logger.js';
import { errorMessage } from './errors.js';

export type MonitorConfig = Pick<
  Config,
  'checkIntervalMs' | 'retry' | 'logLines' | 'workerPoolSize' | 'notifyOnRecovery' | 'recipients' | 'routing'
>;

export interface MonitorDeps {
  adapter:  ProbeAdapter;
  notifier: Notifier;
  logger?:  Logger;
  now?:     () => Date;
  random?:  () => number;
}

export class HealthMonitor {
  readonly store    = new StateStore();
  readonly registry = new RetryRegistry();
  readonly pool:     WorkerPool;
  readonly retry:    RetryScheduler;
  readonly probes:   ProbeScheduler;

  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private running = false;

  constructor(private readonly config: MonitorConfig, deps: MonitorDeps) {
    this.logger = deps.logger ?? createLogger('monitor');
    this.pool   = new WorkerPool(config.workerPoolSize);
    // Every sleeping retry listens on the one shutdown signal
    setMaxListeners(0, this.controller.signal);

    const alerts = {
      notifier:      deps.notifier,
      recipientsFor: (entityId: string, group: string) =>
        resolveRecipients(entityId, group, config.routing, config.recipients),
      now:           deps.now ?? (() => new Date()),
    };

    this.retry = new RetryScheduler({
      ...alerts,
      logger:   this.logger.child({ component: 'retry' }),
      adapter:  deps.adapter,
      store:    this.store,
      registry: this.registry,
      pool:     this.pool,
      policy:   config.retry,
      logLines: config.logLines,
      signal:   this.controller.signal,
      random:   deps.random,
      notifyOnRecovery: config.notifyOnRecovery,
    });

    this.probes = new ProbeScheduler({
      ...alerts,
      logger:           this.logger.child({ component: 'probe' }),
      adapter:          deps.adapter,
      store:            this.store,
      pool:             this.pool,
      retry:            this.retry,
      notifyOnRecovery: config.notifyOnRecovery,
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopping(): boolean {
    return this.controller.signal.aborted;
  }

  /** A single probe pass. Retries it arms keep running in the background. */
  async runOnce(): Promise<PassSummary | null> {
    if (this.stopping) return null;
    try {
      return await this.probes.runOnce();
    } catch (err) {
      this.logger.error({ err }, `Unexpected error in probe pass: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Pass immediately, then every `checkIntervalMs` until `stop()`.
   * Resolves once shutdown has drained.
   */
  async start(): Promise<void> {
    if (this.running) throw new Error('Monitor already running');
    this.running = true;
    this.logger.info(`Monitor started, probing every ${formatDuration(this.config.checkIntervalMs)}`);

    while (!this.stopping) {
      await this.runOnce();
      await sleep(this.config.checkIntervalMs, this.signal);
    }

    await this.drain();
    this.running = false;
    this.logger.info('Monitor stopped');
  }

  /** Request shutdown. Idempotent. */
  stop(): void {
    if (this.stopping) return;
    this.logger.info('Shutdown requested');
    this.controller.abort();
  }

  /** Wait for every retry and pool job in flight. */
  async drain(): Promise<void> {
    await this.retry.drain();
    await this.pool.drain();
  }
}
