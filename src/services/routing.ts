/**
 * Project-specific alert routing.
 *
 * Format: `pattern:a@example.com,b@example.com;other:c@example.com`.
 * A pattern matches when it appears anywhere in the container or project name.
 */

export type AlertRouting = Map<string, string[]>;

export function parseRouting(raw: string | undefined): AlertRouting {
  const routing: AlertRouting = new Map();
  if (!raw) return routing;

  for (const mapping of raw.split(';')) {
    const sep = mapping.indexOf(':');
    if (sep < 0) continue;
    const pattern    = mapping.slice(0, sep).trim();
    const recipients = splitList(mapping.slice(sep + 1));
    if (pattern && recipients.length > 0) routing.set(pattern, recipients);
  }
  return routing;
}

/** First matching pattern wins, in configuration order. */
export function resolveRecipients(
  entityId: string,
  group:    string,
  routing:  AlertRouting,
  defaults: string[],
): string[] {
  for (const [pattern, recipients] of routing) {
    if (entityId.includes(pattern) || group.includes(pattern)) return recipients;
  }
  return defaults;
}

export function splitList(raw: string | undefined): string[] {
  return (raw ?? '').split(',').map(s => s.trim()).filter(Boolean);
}
