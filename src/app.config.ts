import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { Logger } from '@nestjs/common';
import {
  DEFAULT_SERVER_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_ORIGIN,
  DEFAULT_DATABASE_PATH,
  DEFAULT_SESSION_HOST,
  DEFAULT_SESSION_PORT,
  DEFAULT_SESSION_MAX_CONNECTIONS,
  DEFAULT_SESSION_IDLE_TIMEOUT,
  DEFAULT_SESSION_LIST_LIMIT,
  DEFAULT_SESSION_BANNER,
  DEFAULT_SESSION_RATE_LIMIT_POINTS,
  DEFAULT_SESSION_RATE_LIMIT_DURATION,
  DEFAULT_HUB_KEEPALIVE_INTERVAL,
  DEFAULT_HUB_WRITE_TIMEOUT,
  DEFAULT_RELAY_PORT,
  DEFAULT_RELAY_TIMEOUT,
  DEFAULT_TOKEN_TTL,
  DEFAULT_ATTACHMENT_MAX_SIZE,
  DEFAULT_ATTACHMENT_MAX_COUNT,
  DEFAULT_THROTTLE_TTL,
  DEFAULT_THROTTLE_LIMIT,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseServerHost,
} from './config/config.parsers';
import { validateTokenSecret } from './config/config.validators';
import { generateTokenSecret } from './config/config.utils';
import type { PostlineConfiguration } from './config/config.types';

const logger = new Logger('ConfigValidation');

/**
 * Build Main Server Configuration
 *
 * Optional environment variables:
 * - POSTLINE_SERVER_HOST: Host name this server delivers mail for (default: localhost)
 * - POSTLINE_HTTP_PORT: HTTP API port (default: 8080)
 * - POSTLINE_ORIGIN: Allowed CORS origin (default: http://localhost:3000)
 *
 * @throws {Error} If POSTLINE_SERVER_HOST is not a valid host name
 */
function buildMainConfig() {
  return {
    serverHost: parseServerHost(process.env.POSTLINE_SERVER_HOST, DEFAULT_SERVER_HOST),
    port: parseNumberWithDefault(process.env.POSTLINE_HTTP_PORT, DEFAULT_HTTP_PORT),
    origin: parseStringWithDefault(process.env.POSTLINE_ORIGIN?.trim(), DEFAULT_ORIGIN),
  };
}

/**
 * Build Database Configuration
 *
 * - POSTLINE_DATABASE_PATH: SQLite file, or `:memory:` (default: ./data/postline.db)
 */
function buildDatabaseConfig() {
  return {
    path: parseStringWithDefault(process.env.POSTLINE_DATABASE_PATH, DEFAULT_DATABASE_PATH),
  };
}

/**
 * Build Session Protocol Configuration
 *
 * Configures the line-oriented TCP listener used by terminal clients.
 *
 * Optional environment variables:
 * - POSTLINE_SESSION_HOST: Bind address (default: 0.0.0.0)
 * - POSTLINE_SESSION_PORT: Port, 0 picks a free one (default: 2525)
 * - POSTLINE_SESSION_MAX_CONNECTIONS: Concurrent sockets (default: 100)
 * - POSTLINE_SESSION_IDLE_TIMEOUT: Idle socket timeout in ms (default: 300000)
 * - POSTLINE_SESSION_LIST_LIMIT: Entries returned by LIST (default: 20)
 * - POSTLINE_SESSION_BANNER: Greeting text after the 220 code
 */
function buildSessionConfig() {
  const listLimit = parseNumberWithDefault(process.env.POSTLINE_SESSION_LIST_LIMIT, DEFAULT_SESSION_LIST_LIMIT);

  if (listLimit === 0) {
    throw new Error('Invalid POSTLINE_SESSION_LIST_LIMIT: must be at least 1');
  }

  return {
    host: parseStringWithDefault(process.env.POSTLINE_SESSION_HOST, DEFAULT_SESSION_HOST),
    port: parseNumberWithDefault(process.env.POSTLINE_SESSION_PORT, DEFAULT_SESSION_PORT),
    maxConnections: parseNumberWithDefault(
      process.env.POSTLINE_SESSION_MAX_CONNECTIONS,
      DEFAULT_SESSION_MAX_CONNECTIONS,
    ),
    idleTimeout: parseNumberWithDefault(process.env.POSTLINE_SESSION_IDLE_TIMEOUT, DEFAULT_SESSION_IDLE_TIMEOUT),
    listLimit,
    banner: parseStringWithDefault(process.env.POSTLINE_SESSION_BANNER, DEFAULT_SESSION_BANNER),
  };
}

/**
 * Build Session Rate Limit Configuration
 *
 * Per-IP limit on session connections and CONNECT attempts. Separate from
 * the HTTP throttler.
 *
 * - POSTLINE_SESSION_RATE_LIMIT_ENABLED (default: true)
 * - POSTLINE_SESSION_RATE_LIMIT_POINTS: Attempts per window (default: 30)
 * - POSTLINE_SESSION_RATE_LIMIT_DURATION: Window in seconds (default: 60)
 */
function buildSessionRateLimitConfig() {
  return {
    enabled: parseOptionalBoolean(process.env.POSTLINE_SESSION_RATE_LIMIT_ENABLED, true),
    points: parseNumberWithDefault(
      process.env.POSTLINE_SESSION_RATE_LIMIT_POINTS,
      DEFAULT_SESSION_RATE_LIMIT_POINTS,
    ),
    duration: parseNumberWithDefault(
      process.env.POSTLINE_SESSION_RATE_LIMIT_DURATION,
      DEFAULT_SESSION_RATE_LIMIT_DURATION,
    ),
  };
}

function buildHubConfig() {
  const keepaliveInterval = parseNumberWithDefault(
    process.env.POSTLINE_HUB_KEEPALIVE_INTERVAL,
    DEFAULT_HUB_KEEPALIVE_INTERVAL,
  );

  if (keepaliveInterval === 0) {
    throw new Error('Invalid POSTLINE_HUB_KEEPALIVE_INTERVAL: must be greater than 0');
  }

  const writeTimeout = parseNumberWithDefault(process.env.POSTLINE_HUB_WRITE_TIMEOUT, DEFAULT_HUB_WRITE_TIMEOUT);
  if (writeTimeout === 0) {
    throw new Error('Invalid POSTLINE_HUB_WRITE_TIMEOUT: must be greater than 0');
  }

  return { keepaliveInterval, writeTimeout };
}

/**
 * Build Relay Configuration
 *
 * - POSTLINE_RELAY_PORT: Port of the peer's HTTP API (default: 8080)
 * - POSTLINE_RELAY_TIMEOUT: Request timeout in ms (default: 10000)
 */
function buildRelayConfig() {
  return {
    port: parseNumberWithDefault(process.env.POSTLINE_RELAY_PORT, DEFAULT_RELAY_PORT),
    timeout: parseNumberWithDefault(process.env.POSTLINE_RELAY_TIMEOUT, DEFAULT_RELAY_TIMEOUT),
  };
}

/**
 * Build Auth Configuration
 *
 * When POSTLINE_TOKEN_SECRET is unset a random secret is generated, so
 * issued tokens do not survive a restart.
 */
function buildAuthConfig() {
  const configuredSecret = process.env.POSTLINE_TOKEN_SECRET?.trim();
  let tokenSecret: string;

  if (configuredSecret) {
    validateTokenSecret(configuredSecret);
    tokenSecret = configuredSecret;
  } else {
    tokenSecret = generateTokenSecret();
    logger.warn('POSTLINE_TOKEN_SECRET not set - generated a random secret, tokens will not survive a restart');
  }

  return {
    tokenSecret,
    tokenTtl: parseNumberWithDefault(process.env.POSTLINE_TOKEN_TTL, DEFAULT_TOKEN_TTL),
  };
}

function buildAttachmentsConfig() {
  return {
    maxSize: parseNumberWithDefault(process.env.POSTLINE_ATTACHMENT_MAX_SIZE, DEFAULT_ATTACHMENT_MAX_SIZE),
    maxCount: parseNumberWithDefault(process.env.POSTLINE_ATTACHMENT_MAX_COUNT, DEFAULT_ATTACHMENT_MAX_COUNT),
  };
}

/**
 * Build Throttle Configuration
 *
 * Configures rate limiting for the HTTP API.
 *
 * - POSTLINE_THROTTLE_TTL: Time window in milliseconds (default: 60000)
 * - POSTLINE_THROTTLE_LIMIT: Max requests per window (default: 500)
 */
function buildThrottleConfig() {
  return {
    ttl: parseNumberWithDefault(process.env.POSTLINE_THROTTLE_TTL, DEFAULT_THROTTLE_TTL),
    limit: parseNumberWithDefault(process.env.POSTLINE_THROTTLE_LIMIT, DEFAULT_THROTTLE_LIMIT),
  };
}

/**
 * Build the complete configuration from the environment.
 */
export function buildPostlineConfig(): PostlineConfiguration {
  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    main: buildMainConfig(),
    database: buildDatabaseConfig(),
    session: buildSessionConfig(),
    sessionRateLimit: buildSessionRateLimitConfig(),
    hub: buildHubConfig(),
    relay: buildRelayConfig(),
    auth: buildAuthConfig(),
    attachments: buildAttachmentsConfig(),
    throttle: buildThrottleConfig(),
    seedDemoAccounts: parseOptionalBoolean(process.env.POSTLINE_SEED_DEMO_ACCOUNTS, false),
  };
}

/**
 * Register Config Postline
 */
export default registerAs('postline', buildPostlineConfig);
