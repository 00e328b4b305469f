import { randomBytes } from 'crypto';
import { Logger } from '@nestjs/common';
import type { PostlineConfiguration } from './config.types';

/**
 * Generate Token Secret
 *
 * Used when POSTLINE_TOKEN_SECRET is not configured. Tokens signed with it
 * stop verifying when the process restarts.
 */
export function generateTokenSecret(): string {
  return randomBytes(32).toString('hex');
}

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * The token secret is never printed.
 */
export function logConfigurationSummary(config: PostlineConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`Server Host: ${config.main.serverHost}`);
  summaryLogger.log(`HTTP Server: port ${config.main.port} (origin: ${config.main.origin})`);
  summaryLogger.log(`Database: ${config.database.path}`);
  summaryLogger.log(`Session Server: ${config.session.host}:${config.session.port}`);
  summaryLogger.log(`Session Max Connections: ${config.session.maxConnections}`);

  if (config.sessionRateLimit.enabled) {
    summaryLogger.log(
      `Session Rate Limiting: enabled (${config.sessionRateLimit.points} attempts per ${config.sessionRateLimit.duration}s)`,
    );
  } else {
    summaryLogger.log('Session Rate Limiting: disabled');
  }

  summaryLogger.log(`Relay: port ${config.relay.port}, timeout ${config.relay.timeout}ms`);
  summaryLogger.log(`Token Secret: ******** (ttl ${config.auth.tokenTtl}s)`);
  summaryLogger.log(`Attachments: max ${config.attachments.maxCount} x ${config.attachments.maxSize} bytes`);
  summaryLogger.log(`API Rate Limiting: ${config.throttle.limit} requests per ${config.throttle.ttl}ms`);
  summaryLogger.log(`Demo Accounts: ${config.seedDemoAccounts ? 'seeded' : 'disabled'}`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
