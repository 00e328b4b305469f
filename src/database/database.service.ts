import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { MIGRATIONS } from './database.migrations';
import { getErrorMessage } from '../shared/error.utils';

const IN_MEMORY_PATH = ':memory:';

/**
 * Owns the single SQLite connection shared by every store.
 *
 * better-sqlite3 is synchronous, so statements from concurrent sessions and
 * requests run one at a time on the event loop; multi-statement writes use
 * `connection.transaction()`.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly connection: Database.Database;

  constructor(private readonly configService: ConfigService) {
    const path = this.configService.get<string>('postline.database.path', IN_MEMORY_PATH);

    if (path !== IN_MEMORY_PATH) {
      mkdirSync(dirname(resolve(path)), { recursive: true });
    }

    this.connection = new Database(path);
    this.connection.pragma('journal_mode = WAL');
    this.connection.pragma('synchronous = NORMAL');
    this.connection.pragma('busy_timeout = 5000');
    this.connection.pragma('foreign_keys = ON');

    this.runMigrations();
    this.logger.log(`Database opened at ${path}`);
  }

  /**
   * Runs a trivial query; used by the health check.
   */
  isHealthy(): boolean {
    try {
      this.connection.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      this.logger.warn(`Database health query failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  onModuleDestroy(): void {
    if (this.connection.open) {
      this.connection.close();
      this.logger.log('Database closed');
    }
  }

  private runMigrations(): void {
    const version = this.connection.pragma('user_version', { simple: true });
    const currentVersion = typeof version === 'number' ? version : 0;
    if (currentVersion >= MIGRATIONS.length) return;

    const migrate = this.connection.transaction(() => {
      for (let i = currentVersion; i < MIGRATIONS.length; i++) {
        this.connection.exec(MIGRATIONS[i]);
        this.logger.debug(`Applied migration ${i + 1}`);
      }
      this.connection.pragma(`user_version = ${MIGRATIONS.length}`);
    });

    migrate();
  }
}
