/**
 * Watchdog configuration.
 *
 * Read from environment variables (a `.env` file is loaded by the entry
 * point) and validated once at startup. Durations are given in the units
 * their names say and converted to milliseconds here.
 */

import { z } from 'zod';
import type { BackoffPolicy } from './scheduler/backoff.js';
import { parseRouting, splitList, type AlertRouting } from './services/routing.js';
import { ConfigError } from './errors.js';
import { MAX_TIMER_MS } from './scheduler/sleep.js';

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  pass?: string;
}

export interface TelegramConfig {
  token:  string;
  chatId: string;
}

export interface Config {
  /** Shown in every alert */
  serverName:        string;
  /** Docker socket; dockerode's default when unset */
  dockerSocketPath?: string;
  /** Time between probe passes */
  checkIntervalMs:   number;
  retry:             BackoffPolicy;
  /** Container log lines attached to an escalation */
  logLines:          number;
  workerPoolSize:    number;
  notifyOnRecovery:  boolean;

  /** Default alert recipients */
  recipients: string[];
  routing:    AlertRouting;

  smtp?:              SmtpConfig;
  telegram?:          TelegramConfig;
  discordWebhookUrl?: string;

  /** Run a single pass and exit */
  once: boolean;
}

// Every delay must fit in one Node timer after conversion to milliseconds
const MAX_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
const MAX_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);

const seconds = () => z.coerce.number().max(MAX_SECONDS, `Must be at most ${MAX_SECONDS} seconds`);
const minutes = () => z.coerce.number().max(MAX_MINUTES, `Must be at most ${MAX_MINUTES} minutes`);

const flag = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z
  .object({
    SERVER_NAME:               z.string().default('Production'),
    DOCKER_SOCKET_PATH:        z.string().optional(),
    HEALTH_CHECK_INTERVAL_SEC: seconds().positive().default(30),
    WAIT_AND_CHECK_AGAIN_MIN:  minutes().nonnegative().default(15),
    RETRY_BACKOFF_ENABLED:     flag.default('false'),
    RETRY_BACKOFF_MULTIPLIER:  z.coerce.number().gt(1).default(2),
    RETRY_BACKOFF_MAX_MIN:     minutes().positive().default(60),
    RETRY_JITTER_SEC:          seconds().nonnegative().default(0),
    RETRY_MAX_ATTEMPTS:        z.coerce.number().int().min(1).default(3),
    HEALTH_CHECK_LOG_LINES:    z.coerce.number().int().positive().default(10),
    WORKER_POOL_SIZE:          z.coerce.number().int().positive().default(30),
    NOTIFY_ON_RECOVERY:        flag.default('false'),
    HEALTH_CHECK_ALERT_EMAILS: z
      .string({ required_error: 'HEALTH_CHECK_ALERT_EMAILS must be configured' })
      .transform(splitList)
      .refine((list) => list.length > 0, 'HEALTH_CHECK_ALERT_EMAILS must list at least one recipient'),
    CONTAINER_ALERT_ROUTING:   z.string().optional(),
    SMTP_HOST:                 z.string().optional(),
    SMTP_PORT:                 z.coerce.number().int().positive().default(465),
    SMTP_USER:                 z.string().optional(),
    SMTP_PASS:                 z.string().optional(),
    TELEGRAM_BOT_TOKEN:        z.string().optional(),
    TELEGRAM_CHAT_ID:          z.string().optional(),
    DISCORD_WEBHOOK_URL:       z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SMTP_HOST && !env.SMTP_USER) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SMTP_USER'], message: 'SMTP_USER is required when SMTP_HOST is set' });
    }
    if (Boolean(env.TELEGRAM_BOT_TOKEN) !== Boolean(env.TELEGRAM_CHAT_ID)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['TELEGRAM_CHAT_ID'], message: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together' });
    }
    if (!env.SMTP_HOST && !env.TELEGRAM_BOT_TOKEN && !env.DISCORD_WEBHOOK_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [], message: 'No alert channel configured (SMTP_HOST, TELEGRAM_BOT_TOKEN or DISCORD_WEBHOOK_URL)' });
    }
  });

/** Drop unset and blank variables so schema defaults apply. */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv): Config {
  const parsed = EnvSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  const e = parsed.data;

  return {
    serverName:       e.SERVER_NAME,
    dockerSocketPath: e.DOCKER_SOCKET_PATH,
    checkIntervalMs:  e.HEALTH_CHECK_INTERVAL_SEC * 1000,
    retry: {
      baseDelayMs:    e.WAIT_AND_CHECK_AGAIN_MIN * 60_000,
      backoffEnabled: e.RETRY_BACKOFF_ENABLED,
      multiplier:     e.RETRY_BACKOFF_MULTIPLIER,
      maxDelayMs:     e.RETRY_BACKOFF_MAX_MIN * 60_000,
      jitterMs:       e.RETRY_JITTER_SEC * 1000,
      maxAttempts:    e.RETRY_MAX_ATTEMPTS,
    },
    logLines:         e.HEALTH_CHECK_LOG_LINES,
    workerPoolSize:   e.WORKER_POOL_SIZE,
    notifyOnRecovery: e.NOTIFY_ON_RECOVERY,

    recipients: e.HEALTH_CHECK_ALERT_EMAILS,
    routing:    parseRouting(e.CONTAINER_ALERT_ROUTING),

    smtp: e.SMTP_HOST && e.SMTP_USER
      ? { host: e.SMTP_HOST, port: e.SMTP_PORT, user: e.SMTP_USER, pass: e.SMTP_PASS }
      : undefined,
    telegram: e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
      ? { token: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID }
      : undefined,
    discordWebhookUrl: e.DISCORD_WEBHOOK_URL,

    once: argv.includes('--once'),
  };
}
