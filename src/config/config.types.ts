/**
 * Configuration type definition for type-safe access
 */
export interface PostlineConfiguration {
  environment: string;
  main: {
    serverHost: string;
    port: number;
    origin: string;
  };
  database: {
    path: string;
  };
  session: {
    host: string;
    port: number;
    maxConnections: number;
    idleTimeout: number;
    listLimit: number;
    banner: string;
  };
  sessionRateLimit: {
    enabled: boolean;
    points: number;
    duration: number;
  };
  hub: {
    keepaliveInterval: number;
    writeTimeout: number;
  };
  relay: {
    port: number;
    timeout: number;
  };
  auth: {
    tokenSecret: string;
    tokenTtl: number;
  };
  attachments: {
    maxSize: number;
    maxCount: number;
  };
  throttle: {
    ttl: number;
    limit: number;
  };
  seedDemoAccounts: boolean;
}
