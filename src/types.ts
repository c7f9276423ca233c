/**
 * Shared types for the container health watchdog
 */

// ── Health status ─────────────────────────────────────────────────────────────

/** Status tracked per container. `unknown` means never probed. */
export type EntityStatus =
  | 'unknown'
  | 'starting'
  | 'healthy'
  | 'unhealthy'
  | 'not_found';

/** What a single probe can report. */
export type ProbeStatus =
  | 'starting'
  | 'healthy'
  | 'unhealthy'
  | 'no_health_info';

export interface ProbeResult {
  status: ProbeStatus;
  /** Compose project (or best-effort guess from the container name) */
  group:  string;
}

/** Statuses that arm a deferred re-probe when transitioned into. */
export function isBadStatus(status: EntityStatus): boolean {
  return status !== 'healthy' && status !== 'unknown';
}

export function describeTransition(previous: EntityStatus | undefined, current: EntityStatus): string {
  return previous ? `${previous} → ${current}` : current;
}

// ── Tracked state ─────────────────────────────────────────────────────────────

export interface EntityRecord {
  entityId:  string;
  group:     string;
  status:    EntityStatus;
  lastCheck: Date;
  /** An alert for the current bad streak has been sent */
  escalated: boolean;
}

export interface RetryTask {
  entityId:       string;
  group:          string;
  /** Status observed before the transition that armed this retry */
  previousStatus: EntityStatus;
  attempt:        number;
}

// ── Alerts ────────────────────────────────────────────────────────────────────

export interface Alert {
  entityId:        string;
  group:           string;
  status:          EntityStatus;
  previousStatus?: EntityStatus;
  details:         string;
  recipients:      string[];
  timestamp:       Date;
}

// ── Collaborators ─────────────────────────────────────────────────────────────

/**
 * Source of containers and their health.
 *
 * `listEntityIds` throws AdapterListError; `probe` throws AdapterProbeError, or
 * AdapterNotFoundError when the container vanished mid-call.
 * `recentDiagnostics` never throws.
 */
export interface ProbeAdapter {
  listEntityIds(): Promise<string[]>;
  probe(entityId: string): Promise<ProbeResult>;
  recentDiagnostics(entityId: string, maxLines: number): Promise<string>;
}

/** Delivers an alert. Implementations log their own failures and never throw. */
export interface Notifier {
  notify(alert: Alert): Promise<void>;
}

/** Maps a container to the addresses that should hear about it. */
export type RecipientResolver = (entityId: string, group: string) => string[];
