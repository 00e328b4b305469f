export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

// Configuration defaults
export const DEFAULT_SERVER_HOST = 'localhost';
export const DEFAULT_HTTP_PORT = 8080;
export const DEFAULT_ORIGIN = 'http://localhost:3000';
export const DEFAULT_DATABASE_PATH = './data/postline.db';
export const DEFAULT_SESSION_HOST = '0.0.0.0';
export const DEFAULT_SESSION_PORT = 2525;
export const DEFAULT_SESSION_MAX_CONNECTIONS = 100;
export const DEFAULT_SESSION_IDLE_TIMEOUT = 300000; // 5 minutes
export const DEFAULT_SESSION_LIST_LIMIT = 20;
export const DEFAULT_SESSION_BANNER = 'Postline Server ready';
export const DEFAULT_SESSION_RATE_LIMIT_POINTS = 30;
export const DEFAULT_SESSION_RATE_LIMIT_DURATION = 60;
export const DEFAULT_HUB_KEEPALIVE_INTERVAL = 30000;
export const DEFAULT_HUB_WRITE_TIMEOUT = 10000;
export const DEFAULT_RELAY_PORT = 8080;
export const DEFAULT_RELAY_TIMEOUT = 10000;
export const DEFAULT_TOKEN_TTL = 86400; // 24 hours
export const DEFAULT_ATTACHMENT_MAX_SIZE = 50 * 1024 * 1024;
export const DEFAULT_ATTACHMENT_MAX_COUNT = 10;
export const DEFAULT_THROTTLE_TTL = 60000;
export const DEFAULT_THROTTLE_LIMIT = 500;

export const MIN_TOKEN_SECRET_LENGTH = 16;
