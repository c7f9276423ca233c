/**
 * In-process stand-ins for the Docker adapter and notifier, shared by tests.
 */

import type { Alert, Notifier, ProbeAdapter, ProbeResult, ProbeStatus } from '../types.js';
import type { MonitorConfig } from '../monitor.js';
import { AdapterNotFoundError, AdapterProbeError } from '../errors.js';
import { sleep } from '../scheduler/sleep.js';

type Scripted = ProbeStatus | 'gone' | 'error';

export class FakeAdapter implements ProbeAdapter {
  /** What `listEntityIds` returns */
  listed: string[] = [];
  listError?: Error;
  diagnostics = 'app: connection refused';
  /** Artificial latency for each probe */
  probeDelayMs = 0;

  readonly probeCalls: string[] = [];
  readonly diagnosticCalls: Array<[string, number]> = [];

  private statuses = new Map<string, Scripted>();
  private groups   = new Map<string, string>();

  /** Set the status `probe` reports, and list the container. */
  set(entityId: string, status: Scripted, group = 'shop'): this {
    this.statuses.set(entityId, status);
    this.groups.set(entityId, group);
    if (!this.listed.includes(entityId)) this.listed.push(entityId);
    return this;
  }

  /** Remove from the listing; `probe` then throws AdapterNotFoundError. */
  remove(entityId: string): this {
    this.listed = this.listed.filter((id) => id !== entityId);
    this.statuses.set(entityId, 'gone');
    return this;
  }

  async listEntityIds(): Promise<string[]> {
    if (this.listError) throw this.listError;
    return [...this.listed];
  }

  async probe(entityId: string): Promise<ProbeResult> {
    this.probeCalls.push(entityId);
    if (this.probeDelayMs > 0) await sleep(this.probeDelayMs);
    const status = this.statuses.get(entityId) ?? 'gone';
    if (status === 'gone') throw new AdapterNotFoundError(entityId);
    if (status === 'error') throw new AdapterProbeError(entityId, 'Docker daemon timeout');
    return { status, group: this.groups.get(entityId) ?? 'unknown' };
  }

  async recentDiagnostics(entityId: string, maxLines: number): Promise<string> {
    this.diagnosticCalls.push([entityId, maxLines]);
    return this.diagnostics;
  }
}

export class RecordingNotifier implements Notifier {
  readonly alerts: Alert[] = [];

  async notify(alert: Alert): Promise<void> {
    this.alerts.push(alert);
  }
}

export function testMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    checkIntervalMs: 50,
    retry: {
      baseDelayMs:    20,
      backoffEnabled: false,
      multiplier:     2,
      maxDelayMs:     200,
      jitterMs:       0,
      maxAttempts:    3,
    },
    logLines:         5,
    workerPoolSize:   4,
    notifyOnRecovery: false,
    recipients:       ['ops@example.com'],
    routing:          new Map(),
    ...overrides,
  };
}

export const FIXED_NOW = new Date('2024-05-01T09:30:00.000Z');
