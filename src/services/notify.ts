/**
 * Notifications over email, Telegram and Discord
 *
 * Every configured channel gets every alert. A failing channel is logged and
 * never affects the others or the caller.
 */

import nodemailer from 'nodemailer';
import type { Alert, EntityStatus, Notifier } from '../types.js';
import { describeTransition } from '../types.js';
import type { Config } from '../config.js';
import { NotifierError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

// ── Transports (stubbed in tests via dependency injection) ─────────────────────

export interface MailMessage {
  from:    string;
  to:      string;
  subject: string;
  text:    string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type PostJsonFn = (url: string, body: unknown) => Promise<void>;

/** POST JSON with native fetch (Node 18+) */
export const defaultPostJson: PostJsonFn = async (url, body) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), 30_000);
  try {
    const res = await fetch(url, {
      method:  'POST',
      headers: { 'Content-Type': 'application/json' },
      body:    JSON.stringify(body),
      signal:  controller.signal,
    });
    if (!res.ok) throw new Error(`HTTP ${res.status} ${await res.text()}`);
  } finally {
    clearTimeout(timer);
  }
};

export function createSmtpTransport(smtp: NonNullable<Config['smtp']>): MailTransport {
  return nodemailer.createTransport({
    host:    smtp.host,
    port:    smtp.port,
    // 465 is implicit TLS; anything else upgrades with STARTTLS
    secure:  smtp.port === 465,
    auth:    smtp.pass ? { user: smtp.user, pass: smtp.pass } : undefined,
    connectionTimeout: 30_000,
  });
}

// ── Formatting ────────────────────────────────────────────────────────────────

export type Severity = 'CRITICAL' | 'ERROR' | 'WARNING' | 'INFO';

const STATUS_EMOJI: Record<EntityStatus, string> = {
  unhealthy: '🔴',
  not_found: '⚠️',
  starting:  '🟡',
  healthy:   '✅',
  unknown:   '❔',
};

export function severityOf(status: EntityStatus): Severity {
  switch (status) {
    case 'unhealthy': return 'CRITICAL';
    case 'not_found': return 'ERROR';
    case 'starting':  return 'WARNING';
    default:          return 'INFO';
  }
}

/** `2024-05-01 09:30:00 UTC` */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}

function actionSteps(alert: Alert): string[] {
  const { entityId: name, group } = alert;
  switch (alert.status) {
    case 'unhealthy':
      return [
        '1. Check container logs:',
        `   docker logs ${name}`,
        '',
        '2. Inspect container:',
        `   docker inspect ${name}`,
        '',
        '3. Restart container:',
        `   docker restart ${name}`,
        '',
        '   Or navigate to the project and restart:',
        `   cd /path/to/${group}`,
        '   docker compose restart',
        '',
        '4. Check the application health endpoint',
        '',
        '5. Review recent code changes or deployments',
      ];
    case 'not_found':
      return [
        '1. Check if the container is running:',
        `   docker ps -a | grep ${name}`,
        '',
        '2. Navigate to the project directory:',
        `   cd /path/to/${group}`,
        '',
        '3. Check compose status:',
        '   docker compose ps',
        '',
        '4. Restart services:',
        '   docker compose up -d',
        '',
        '5. Check docker-compose.yml configuration',
      ];
    case 'healthy':
      return ['None. The container is healthy again.'];
    default:
      return ['Monitor the situation and check logs for more information.'];
  }
}

export interface FormattedAlert {
  subject: string;
  body:    string;
}

export function formatAlert(alert: Alert, serverName: string): FormattedAlert {
  const severity = severityOf(alert.status);
  const subject  = `${STATUS_EMOJI[alert.status]} ${severity}: [${alert.group}] ${alert.entityId} - Health Status Changed`;

  const body = [
    'Docker Container Health Alert',
    '==============================',
    '',
    `Server:          ${serverName}`,
    `Project:         ${alert.group}`,
    `Container:       ${alert.entityId}`,
    `Status Change:   ${describeTransition(alert.previousStatus, alert.status)}`,
    `Severity:        ${severity}`,
    `Time:            ${formatTimestamp(alert.timestamp)}`,
    '',
    'Details:',
    '--------',
    alert.details,
    '',
    'Action Required:',
    '----------------',
    ...actionSteps(alert),
    '',
    '---',
    `Automated alert from Container Health Watchdog on ${serverName}`,
  ].join('\n');

  return { subject, body };
}

function formatChat(alert: Alert, serverName: string): string {
  return [
    `${STATUS_EMOJI[alert.status]} ${severityOf(alert.status)} on ${serverName}`,
    `Project: ${alert.group}`,
    `Container: ${alert.entityId}`,
    `Status: ${describeTransition(alert.previousStatus, alert.status)}`,
    `Time: ${formatTimestamp(alert.timestamp)}`,
  ].join('\n');
}

// ── Notifier ──────────────────────────────────────────────────────────────────

export interface AlertNotifierDeps {
  mail?:     MailTransport;
  postJson?: PostJsonFn;
  logger?:   Logger;
}

type ChannelConfig = Pick<Config, 'serverName' | 'smtp' | 'telegram' | 'discordWebhookUrl'>;

export class AlertNotifier implements Notifier {
  private readonly mail?:    MailTransport;
  private readonly postJson: PostJsonFn;
  private readonly logger:   Logger;

  constructor(private readonly config: ChannelConfig, deps: AlertNotifierDeps = {}) {
    this.mail     = deps.mail ?? (config.smtp ? createSmtpTransport(config.smtp) : undefined);
    this.postJson = deps.postJson ?? defaultPostJson;
    this.logger   = deps.logger ?? createLogger('notify');
  }

  async notify(alert: Alert): Promise<void> {
    this.logger.info(
      { entityId: alert.entityId, group: alert.group, status: alert.status },
      `[${alert.group}] ${alert.entityId}: alerting ${describeTransition(alert.previousStatus, alert.status)}`,
    );

    const channels: Array<[string, () => Promise<void>]> = [];
    if (this.mail && this.config.smtp)  channels.push(['email', () => this.sendEmail(alert)]);
    if (this.config.telegram)           channels.push(['telegram', () => this.sendTelegram(alert)]);
    if (this.config.discordWebhookUrl)  channels.push(['discord', () => this.sendDiscord(alert)]);

    const results = await Promise.allSettled(channels.map(([, send]) => send()));
    results.forEach((result, i) => {
      const [channel] = channels[i];
      if (result.status === 'rejected') {
        const err = new NotifierError(channel, errorMessage(result.reason), { cause: result.reason });
        this.logger.error({ entityId: alert.entityId, channel, err }, `✗ ${err.message}`);
      } else {
        this.logger.info({ entityId: alert.entityId, channel }, `✓ Alert sent for [${alert.group}] ${alert.entityId} via ${channel}`);
      }
    });
  }

  private async sendEmail(alert: Alert): Promise<void> {
    const { smtp, serverName } = this.config;
    if (!this.mail || !smtp) return;
    if (alert.recipients.length === 0) throw new Error('No recipients for alert');

    const { subject, body } = formatAlert(alert, serverName);
    await this.mail.sendMail({
      from:    smtp.user,
      to:      alert.recipients.join(', '),
      subject,
      text:    body,
    });
  }

  private async sendTelegram(alert: Alert): Promise<void> {
    const { telegram, serverName } = this.config;
    if (!telegram) return;
    await this.postJson(`https://api.telegram.org/bot${telegram.token}/sendMessage`, {
      chat_id: telegram.chatId,
      text:    formatChat(alert, serverName),
    });
  }

  private async sendDiscord(alert: Alert): Promise<void> {
    const { discordWebhookUrl, serverName } = this.config;
    if (!discordWebhookUrl) return;
    await this.postJson(discordWebhookUrl, { content: formatChat(alert, serverName) });
  }
}
