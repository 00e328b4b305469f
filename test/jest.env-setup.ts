import 'reflect-metadata';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadEnv } from 'dotenv';

// Load .env.test BEFORE any modules are imported so that app.config sees it
// while the modules under test are being compiled.
const envPath = resolve(__dirname, '../.env.test');
if (existsSync(envPath)) {
  loadEnv({ path: envPath, override: true, quiet: true });
}

process.env.NODE_ENV = process.env.NODE_ENV ?? 'test';
