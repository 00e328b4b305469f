import { Injectable, Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { randomBytes } from 'crypto';
import { DatabaseService } from '../database/database.service';
import { getErrorStack } from '../shared/error.utils';
import { PersistenceError } from './thread-store.errors';
import type { CreateMessageInput, Message } from './interfaces';

interface MessageRow {
  id: number;
  from_account_id: number | null;
  to_account_id: number | null;
  from_address: string;
  to_address: string;
  subject: string;
  body: string;
  is_html: number;
  thread_id: string;
  parent_id: number | null;
  is_read: number;
  created_at: string;
  attachment_count: number;
}

type InsertParams = [
  number | null,
  number | null,
  string,
  string,
  string,
  string,
  number,
  string,
  number | null,
  string,
];

const THREAD_ID_BYTES = 16;

const MESSAGE_COLUMNS = `m.*, (SELECT COUNT(*) FROM attachments a WHERE a.message_id = m.id) AS attachment_count`;

/**
 * One representative per thread that holds mail for the account: the
 * lowest-id message addressed to it. Threads are ranked by their newest
 * member, whoever sent it.
 */
const INBOX_ROOTS_SQL = `
  WITH roots AS (
    SELECT thread_id, MIN(id) AS root_id
    FROM messages
    WHERE to_account_id = ?
    GROUP BY thread_id
  ),
  ranked AS (
    SELECT r.root_id,
           (SELECT MAX(t.created_at) FROM messages t WHERE t.thread_id = r.thread_id) AS last_activity
    FROM roots r
  )
  SELECT ${MESSAGE_COLUMNS}
  FROM ranked
  JOIN messages m ON m.id = ranked.root_id
  ORDER BY ranked.last_activity DESC, ranked.root_id DESC
  LIMIT ? OFFSET ?`;

/**
 * Persists messages and answers thread and inbox queries.
 *
 * Thread roots and last activity are computed at query time, so concurrent
 * replies into one thread cannot leave a stale root or ordering behind.
 */
@Injectable()
export class ThreadStoreService {
  private readonly logger = new Logger(ThreadStoreService.name);
  private readonly db: Database.Database;
  private readonly stmts: {
    insert: Database.Statement<InsertParams>;
    getById: Database.Statement<[number], MessageRow>;
    getThreadIdOf: Database.Statement<[number], { thread_id: string }>;
    getThread: Database.Statement<[string], MessageRow>;
    getInboxRoots: Database.Statement<[number, number, number], MessageRow>;
    getSent: Database.Statement<[number, number, number], MessageRow>;
    getInboxForAddress: Database.Statement<[string, number, number], MessageRow>;
    markRead: Database.Statement<[number]>;
    unreadCount: Database.Statement<[number], { count: number }>;
  };

  constructor(database: DatabaseService) {
    this.db = database.connection;
    this.stmts = {
      insert: this.db.prepare<InsertParams>(
        `INSERT INTO messages (from_account_id, to_account_id, from_address, to_address, subject, body,
                               is_html, thread_id, parent_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      ),
      getById: this.db.prepare<[number], MessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM messages m WHERE m.id = ?`),
      getThreadIdOf: this.db.prepare<[number], { thread_id: string }>('SELECT thread_id FROM messages WHERE id = ?'),
      getThread: this.db.prepare<[string], MessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM messages m WHERE m.thread_id = ? ORDER BY m.created_at ASC, m.id ASC`,
      ),
      getInboxRoots: this.db.prepare<[number, number, number], MessageRow>(INBOX_ROOTS_SQL),
      getSent: this.db.prepare<[number, number, number], MessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM messages m
         WHERE m.from_account_id = ?
         ORDER BY m.created_at DESC, m.id DESC
         LIMIT ? OFFSET ?`,
      ),
      getInboxForAddress: this.db.prepare<[string, number, number], MessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM messages m
         WHERE m.to_address = ? COLLATE NOCASE
         ORDER BY m.created_at DESC, m.id DESC
         LIMIT ? OFFSET ?`,
      ),
      markRead: this.db.prepare<[number]>('UPDATE messages SET is_read = 1 WHERE id = ?'),
      unreadCount: this.db.prepare<[number], { count: number }>(
        'SELECT COUNT(*) AS count FROM messages WHERE to_account_id = ? AND is_read = 0',
      ),
    };
  }

  /**
   * Stores a message and returns the reloaded row.
   *
   * Without `threadId` or `parentId` a new thread is minted. An existing
   * parent's thread always wins over a supplied `threadId`. A parent that does
   * not exist is accepted as advisory metadata.
   *
   * @throws {PersistenceError} When the insert fails; nothing is written
   */
  createMessage(input: CreateMessageInput): Message {
    const create = this.db.transaction((): MessageRow => {
      const threadId = this.resolveThreadId(input);
      const result = this.stmts.insert.run(
        input.fromAccountId ?? null,
        input.toAccountId ?? null,
        input.fromAddress,
        input.toAddress,
        input.subject,
        input.body,
        input.isHtml ? 1 : 0,
        threadId,
        input.parentId ?? null,
        new Date().toISOString(),
      );

      const row = this.stmts.getById.get(Number(result.lastInsertRowid));
      if (!row) {
        throw new Error(`Message ${result.lastInsertRowid} not found after insert`);
      }
      return row;
    });

    const row = this.execute('create message', () => create());
    this.logger.debug(`Message ${row.id} stored in thread ${row.thread_id} (${row.from_address} -> ${row.to_address})`);
    return this.toMessage(row);
  }

  getMessage(id: number): Message | undefined {
    const row = this.execute('load message', () => this.stmts.getById.get(id));
    return row ? this.toMessage(row) : undefined;
  }

  /**
   * All messages of a thread, oldest first; ties on creation time by id.
   */
  getThread(threadId: string): Message[] {
    return this.execute('load thread', () => this.stmts.getThread.all(threadId)).map((row) => this.toMessage(row));
  }

  /**
   * One entry per conversation that holds mail for the account, freshest
   * activity first. Roots of multi-message threads carry the other members
   * as `replies`, in thread order.
   */
  getInboxRoots(accountId: number, limit: number, offset: number): Message[] {
    const roots = this.execute('load inbox', () => this.stmts.getInboxRoots.all(accountId, limit, offset));

    return roots.map((row) => {
      const root = this.toMessage(row);
      const thread = this.getThread(root.threadId);
      if (thread.length > 1) {
        root.replies = thread.filter((member) => member.id !== root.id);
      }
      return root;
    });
  }

  getSent(accountId: number, limit: number, offset: number): Message[] {
    return this.execute('load sent messages', () => this.stmts.getSent.all(accountId, limit, offset)).map((row) =>
      this.toMessage(row),
    );
  }

  /**
   * Messages addressed to a raw address, newest first. Covers recipients
   * that have no local account.
   */
  getInboxForAddress(address: string, limit: number, offset: number): Message[] {
    return this.execute('load address inbox', () =>
      this.stmts.getInboxForAddress.all(address.trim(), limit, offset),
    ).map((row) => this.toMessage(row));
  }

  /**
   * Idempotent. Returns false when the message does not exist.
   */
  markRead(id: number): boolean {
    return this.execute('mark message read', () => this.stmts.markRead.run(id)).changes > 0;
  }

  unreadCount(accountId: number): number {
    return this.execute('count unread messages', () => this.stmts.unreadCount.get(accountId))?.count ?? 0;
  }

  private resolveThreadId(input: CreateMessageInput): string {
    const hinted = input.threadId || undefined;

    if (input.parentId !== undefined) {
      const parent = this.stmts.getThreadIdOf.get(input.parentId);

      if (parent) {
        if (hinted !== undefined && hinted !== parent.thread_id) {
          this.logger.warn(
            `Thread id ${hinted} disagrees with parent ${input.parentId} (thread ${parent.thread_id}); using the parent's`,
          );
        }
        return parent.thread_id;
      }

      this.logger.warn(`Parent message ${input.parentId} does not exist; storing reply without a verified parent`);
    }

    return hinted ?? randomBytes(THREAD_ID_BYTES).toString('hex');
  }

  private execute<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      this.logger.error(`Failed to ${operation}`, getErrorStack(error));
      throw new PersistenceError(operation, error);
    }
  }

  private toMessage(row: MessageRow): Message {
    return {
      id: row.id,
      fromAccountId: row.from_account_id,
      toAccountId: row.to_account_id,
      fromAddress: row.from_address,
      toAddress: row.to_address,
      subject: row.subject,
      body: row.body,
      isHtml: row.is_html === 1,
      threadId: row.thread_id,
      parentId: row.parent_id,
      isRead: row.is_read === 1,
      createdAt: row.created_at,
      attachmentCount: row.attachment_count,
    };
  }
}
