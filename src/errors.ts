/**
 * Error taxonomy.
 *
 * Probe and notifier errors are contained at the entity, pass or channel
 * they belong to. Only ConfigError ends the process.
 */

export class WatchdogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Listing containers failed; the whole pass is skipped. */
export class AdapterListError extends WatchdogError {}

/** One container could not be probed this cycle. */
export class AdapterProbeError extends WatchdogError {
  constructor(readonly entityId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The container disappeared while it was being probed. Reported as `not_found`. */
export class AdapterNotFoundError extends WatchdogError {
  constructor(readonly entityId: string, options?: { cause?: unknown }) {
    super(`Container ${entityId} not found`, options);
  }
}

/** A notification channel failed to deliver. */
export class NotifierError extends WatchdogError {
  constructor(readonly channel: string, message: string, options?: { cause?: unknown }) {
    super(`[${channel}] ${message}`, options);
  }
}

export class ConfigError extends WatchdogError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
