import { BadRequestException, ConflictException, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { DatabaseService } from '../../database/database.service';
import { parseAddress } from '../../shared/address.utils';
import { getErrorMessage } from '../../shared/error.utils';
import { DEFAULT_SERVER_HOST } from '../../config/config.constants';
import type { Account, IdentityResolver } from '../interfaces';
import { hashPassword, verifyPassword } from './password.utils';

interface AccountRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
  updated_at: string;
}

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{3,20}$/;
const MIN_PASSWORD_LENGTH = 6;

const DEMO_ACCOUNTS = [
  { username: 'alice', password: 'password123' },
  { username: 'bob', password: 'password456' },
  { username: 'charlie', password: 'password789' },
] as const;

@Injectable()
export class AccountStorageService implements IdentityResolver, OnModuleInit {
  private readonly logger = new Logger(AccountStorageService.name);
  private readonly serverHost: string;
  private readonly stmts: {
    insert: Database.Statement<[string, string, string, string, string]>;
    getById: Database.Statement<[number], AccountRow>;
    getByUsername: Database.Statement<[string], AccountRow>;
    getByEmail: Database.Statement<[string], AccountRow>;
  };

  constructor(
    database: DatabaseService,
    private readonly configService: ConfigService,
  ) {
    this.serverHost = this.configService.get<string>('postline.main.serverHost', DEFAULT_SERVER_HOST);

    const db = database.connection;
    this.stmts = {
      insert: db.prepare<[string, string, string, string, string]>(
        `INSERT INTO accounts (username, email, password_hash, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)`,
      ),
      getById: db.prepare<[number], AccountRow>('SELECT * FROM accounts WHERE id = ?'),
      getByUsername: db.prepare<[string], AccountRow>('SELECT * FROM accounts WHERE username = ?'),
      getByEmail: db.prepare<[string], AccountRow>('SELECT * FROM accounts WHERE email = ?'),
    };
  }

  async onModuleInit(): Promise<void> {
    if (!this.configService.get<boolean>('postline.seedDemoAccounts', false)) {
      return;
    }

    if (this.configService.get<string>('postline.environment') === 'production') {
      this.logger.warn('POSTLINE_SEED_DEMO_ACCOUNTS is ignored in production');
      return;
    }

    await this.seedDemoAccounts();
  }

  /**
   * Creates an account.
   *
   * @throws {BadRequestException} On an invalid username, email or password
   * @throws {ConflictException} When the username or email is taken
   */
  async register(username: string, email: string, password: string): Promise<Account> {
    const normalizedEmail = email.trim().toLowerCase();

    if (!USERNAME_PATTERN.test(username)) {
      throw new BadRequestException({
        error: 'invalid_username',
        message: 'Username must be 3-20 characters of letters, digits, "_", "." or "-"',
      });
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new BadRequestException({
        error: 'password_too_short',
        message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
      });
    }
    if (!parseAddress(normalizedEmail)) {
      throw new BadRequestException({ error: 'invalid_email', message: 'Invalid email format' });
    }

    this.assertAvailable(username, normalizedEmail);

    const passwordHash = await hashPassword(password);
    const now = new Date().toISOString();

    try {
      // Re-checked after hashing, another registration may have landed meanwhile
      this.assertAvailable(username, normalizedEmail);
      const result = this.stmts.insert.run(username, normalizedEmail, passwordHash, now, now);
      const account = this.getById(Number(result.lastInsertRowid));
      if (!account) {
        throw new Error(`Account ${result.lastInsertRowid} vanished after insert`);
      }

      this.logger.log(`Account registered: ${account.username} (id=${account.id})`);
      return account;
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT')) {
        throw new ConflictException({ error: 'account_exists', message: 'Username or email already exists' });
      }
      throw error;
    }
  }

  async authenticate(username: string, password: string): Promise<Account | undefined> {
    const row = this.stmts.getByUsername.get(username);
    if (!row) {
      return undefined;
    }

    const valid = await verifyPassword(password, row.password_hash);
    return valid ? this.toAccount(row) : undefined;
  }

  resolveAddress(address: string): Account | undefined {
    const parsed = parseAddress(address);
    if (!parsed || parsed.domain !== this.serverHost) {
      return undefined;
    }

    return this.getByUsername(parsed.localPart);
  }

  getById(id: number): Account | undefined {
    const row = this.stmts.getById.get(id);
    return row ? this.toAccount(row) : undefined;
  }

  getByUsername(username: string): Account | undefined {
    const row = this.stmts.getByUsername.get(username);
    return row ? this.toAccount(row) : undefined;
  }

  /**
   * Address of an account on this server, used as the sender of session mail.
   */
  addressOf(account: Account): string {
    return `${account.username}@${this.serverHost}`;
  }

  private assertAvailable(username: string, email: string): void {
    if (this.stmts.getByUsername.get(username)) {
      throw new ConflictException({ error: 'username_exists', message: 'Username already exists' });
    }
    if (this.stmts.getByEmail.get(email)) {
      throw new ConflictException({ error: 'email_exists', message: 'Email already exists' });
    }
  }

  private async seedDemoAccounts(): Promise<void> {
    for (const demo of DEMO_ACCOUNTS) {
      if (this.getByUsername(demo.username)) {
        continue;
      }

      try {
        await this.register(demo.username, `${demo.username}@${this.serverHost}`, demo.password);
      } catch (error) {
        this.logger.warn(`Failed to seed demo account ${demo.username}: ${getErrorMessage(error)}`);
      }
    }
  }

  private toAccount(row: AccountRow): Account {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
