import { ConfigService } from '@nestjs/config';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DatabaseService } from '../database.service';
import { MIGRATIONS } from '../database.migrations';
import { createTestDatabase } from '../../../test/helpers/database';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('DatabaseService', () => {
  const restoreLogger = silenceNestLogger(['log', 'warn', 'error', 'debug']);

  afterAll(() => restoreLogger());

  it('should create the schema on an in-memory database', () => {
    const database = createTestDatabase();
    const tables = database.connection
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => row.name);

    expect(tables).toEqual(expect.arrayContaining(['accounts', 'attachments', 'messages']));
    expect(database.connection.pragma('user_version', { simple: true })).toBe(MIGRATIONS.length);

    database.onModuleDestroy();
  });

  it('should report healthy while open and unhealthy once closed', () => {
    const database = createTestDatabase();
    expect(database.isHealthy()).toBe(true);

    database.onModuleDestroy();
    expect(database.isHealthy()).toBe(false);
  });

  it('should close only once', () => {
    const database = createTestDatabase();
    database.onModuleDestroy();
    expect(() => database.onModuleDestroy()).not.toThrow();
  });

  describe('file databases', () => {
    let directory: string;

    beforeEach(() => {
      directory = mkdtempSync(join(tmpdir(), 'postline-db-'));
    });

    afterEach(() => {
      rmSync(directory, { recursive: true, force: true });
    });

    it('should create missing directories and reopen without reapplying migrations', () => {
      const path = join(directory, 'nested', 'postline.db');
      const config = new ConfigService({ postline: { database: { path } } });

      const first = new DatabaseService(config);
      first.connection
        .prepare(
          'INSERT INTO accounts (username, email, password_hash, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
        )
        .run('alice', 'alice@postline.test', 'hash', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z');
      first.onModuleDestroy();

      const second = new DatabaseService(config);
      const row = second.connection.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM accounts').get();
      expect(row?.count).toBe(1);
      second.onModuleDestroy();
    });
  });
});
