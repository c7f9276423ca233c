#!/usr/bin/env node
/**
 * Container Health Watchdog
 *
 * Watches every container that defines a healthcheck and alerts when one
 * stays unhealthy past the retry window.
 *
 * Usage:
 *   node dist/index.js           # Continuous monitoring
 *   node dist/index.js --once    # Single pass
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { HealthMonitor } from './monitor.js';
import { DockerProbeAdapter } from './services/docker-adapter.js';
import { AlertNotifier } from './services/notify.js';
import { ConfigError } from './errors.js';
import { logger, log } from './logger.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const monitor = new HealthMonitor(config, {
    adapter:  DockerProbeAdapter.connect(config.dockerSocketPath),
    notifier: new AlertNotifier(config),
  });

  log('Container Health Watchdog starting');
  log(`Server: ${config.serverName}`);
  log(`Default alert recipients: ${config.recipients.join(', ')}`);
  log(`Check interval: ${config.checkIntervalMs / 1000}s, retry delay: ${config.retry.baseDelayMs / 60_000}min`);
  if (config.retry.backoffEnabled) {
    log(`Backoff: x${config.retry.multiplier} up to ${config.retry.maxDelayMs / 60_000}min, ${config.retry.maxAttempts} attempt(s)`);
  }
  if (config.routing.size > 0) {
    log(`Project routing configured for: ${[...config.routing.keys()].join(', ')}`);
  }

  // Graceful shutdown
  const onSignal = (signal: NodeJS.Signals): void => {
    log(`Received ${signal}, shutting down`);
    monitor.stop();
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  if (config.once) {
    // Let retries armed by this pass run to completion
    await monitor.runOnce();
    await monitor.drain();
    return;
  }

  await monitor.start();
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.fatal(err.message);
  } else {
    logger.fatal({ err }, 'Failed to start health monitor');
  }
  process.exit(1);
});
