import type { Logger } from '../logger.js';
import type { Alert, EntityStatus, Notifier, RecipientResolver } from '../types.js';
import { errorMessage } from '../errors.js';

export interface AlertContext {
  notifier:      Notifier;
  recipientsFor: RecipientResolver;
  logger:        Logger;
  now:           () => Date;
}

/**
 * Build and hand an alert to the notifier. A throwing notifier is logged and
 * otherwise ignored; tracked state is never rolled back for a failed send.
 */
export async function raiseAlert(
  ctx: AlertContext,
  entityId: string,
  group: string,
  status: EntityStatus,
  previousStatus: EntityStatus | undefined,
  details: string,
): Promise<void> {
  const alert: Alert = {
    entityId,
    group,
    status,
    previousStatus,
    details,
    recipients: ctx.recipientsFor(entityId, group),
    timestamp:  ctx.now(),
  };
  try {
    await ctx.notifier.notify(alert);
  } catch (err) {
    ctx.logger.error({ entityId, group, status, err }, `Notifier failed for ${entityId}: ${errorMessage(err)}`);
  }
}

/** "15 minutes", "1 minute", "45 seconds", "250 ms" */
export function formatDuration(ms: number): string {
  if (ms >= 60_000) {
    const minutes = Math.round((ms / 60_000) * 10) / 10;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  if (ms >= 1000) {
    const seconds = Math.round(ms / 1000);
    return `${seconds} second${seconds === 1 ? '' : 's'}`;
  }
  return `${Math.round(ms)} ms`;
}
