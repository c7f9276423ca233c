import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

const minimal = {
  HEALTH_CHECK_ALERT_EMAILS: 'ops@example.com, oncall@example.com',
  SMTP_HOST:                 'smtp.example.com',
  SMTP_USER:                 'watchdog@example.com',
  SMTP_PASS:                 'test-secret',
};

function configError(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env, []);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected ConfigError');
}

describe('loadConfig()', () => {
  it('applies defaults and converts durations to milliseconds', () => {
    const config = loadConfig(minimal, ['node', 'index.js']);

    expect(config.serverName).toBe('Production');
    expect(config.checkIntervalMs).toBe(30_000);
    expect(config.retry).toEqual({
      baseDelayMs:    900_000,
      backoffEnabled: false,
      multiplier:     2,
      maxDelayMs:     3_600_000,
      jitterMs:       0,
      maxAttempts:    3,
    });
    expect(config.logLines).toBe(10);
    expect(config.workerPoolSize).toBe(30);
    expect(config.notifyOnRecovery).toBe(false);
    expect(config.recipients).toEqual(['ops@example.com', 'oncall@example.com']);
    expect(config.smtp).toEqual({ host: 'smtp.example.com', port: 465, user: 'watchdog@example.com', pass: 'test-secret' });
    expect(config.telegram).toBeUndefined();
    expect(config.once).toBe(false);
  });

  it('reads overrides, flags and routing', () => {
    const config = loadConfig({
      ...minimal,
      SERVER_NAME:               'staging',
      HEALTH_CHECK_INTERVAL_SEC: '10',
      WAIT_AND_CHECK_AGAIN_MIN:  '0.5',
      RETRY_BACKOFF_ENABLED:     'TRUE',
      RETRY_BACKOFF_MULTIPLIER:  '1.5',
      RETRY_BACKOFF_MAX_MIN:     '5',
      RETRY_JITTER_SEC:          '3',
      RETRY_MAX_ATTEMPTS:        '4',
      NOTIFY_ON_RECOVERY:        'yes',
      SMTP_PORT:                 '587',
      CONTAINER_ALERT_ROUTING:   'billing:billing@example.com;broken;crm:',
      TELEGRAM_BOT_TOKEN:        'test-token',
      TELEGRAM_CHAT_ID:          '-100',
    }, ['node', 'index.js', '--once']);

    expect(config.serverName).toBe('staging');
    expect(config.checkIntervalMs).toBe(10_000);
    expect(config.retry).toEqual({
      baseDelayMs:    30_000,
      backoffEnabled: true,
      multiplier:     1.5,
      maxDelayMs:     300_000,
      jitterMs:       3000,
      maxAttempts:    4,
    });
    expect(config.notifyOnRecovery).toBe(true);
    expect(config.smtp?.port).toBe(587);
    expect([...config.routing]).toEqual([['billing', ['billing@example.com']]]);
    expect(config.telegram).toEqual({ token: 'test-token', chatId: '-100' });
    expect(config.once).toBe(true);
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ ...minimal, WORKER_POOL_SIZE: '  ', SERVER_NAME: '' }, []);
    expect(config.workerPoolSize).toBe(30);
    expect(config.serverName).toBe('Production');
  });

  it('requires alert recipients', () => {
    const err = configError({ SMTP_HOST: 'smtp.example.com', SMTP_USER: 'watchdog@example.com' });
    expect(err.issues).toContain('HEALTH_CHECK_ALERT_EMAILS: HEALTH_CHECK_ALERT_EMAILS must be configured');
  });

  it('reports every malformed value', () => {
    const err = configError({
      ...minimal,
      WORKER_POOL_SIZE:         '0',
      RETRY_BACKOFF_MULTIPLIER: '1',
      RETRY_BACKOFF_ENABLED:    'maybe',
    });
    const keys = err.issues.map((issue) => issue.split(':')[0]);
    expect(keys.sort()).toEqual(['RETRY_BACKOFF_ENABLED', 'RETRY_BACKOFF_MULTIPLIER', 'WORKER_POOL_SIZE']);
  });

  it('rejects delays longer than a Node timer can hold', () => {
    const err = configError({
      ...minimal,
      WAIT_AND_CHECK_AGAIN_MIN:  '40000',
      RETRY_BACKOFF_MAX_MIN:     '35792',
      HEALTH_CHECK_INTERVAL_SEC: '3000000',
    });
    expect(err.issues.sort()).toEqual([
      'HEALTH_CHECK_INTERVAL_SEC: Must be at most 2147483 seconds',
      'RETRY_BACKOFF_MAX_MIN: Must be at most 35791 minutes',
      'WAIT_AND_CHECK_AGAIN_MIN: Must be at most 35791 minutes',
    ]);
  });

  it('accepts the longest delays a timer can hold', () => {
    const config = loadConfig({ ...minimal, WAIT_AND_CHECK_AGAIN_MIN: '35791', RETRY_BACKOFF_MAX_MIN: '35791' }, []);
    expect(config.retry.baseDelayMs).toBe(2_147_460_000);
    expect(config.retry.maxDelayMs).toBe(2_147_460_000);
  });

  it('requires at least one alert channel', () => {
    const err = configError({ HEALTH_CHECK_ALERT_EMAILS: 'ops@example.com' });
    expect(err.issues).toEqual(['No alert channel configured (SMTP_HOST, TELEGRAM_BOT_TOKEN or DISCORD_WEBHOOK_URL)']);
  });

  it('requires Telegram token and chat id together', () => {
    const err = configError({ ...minimal, TELEGRAM_BOT_TOKEN: 'test-token' });
    expect(err.issues).toEqual(['TELEGRAM_CHAT_ID: TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together']);
  });
});
