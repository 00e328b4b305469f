import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { DatabaseService } from '../../database/database.service';
import { DEFAULT_ATTACHMENT_MAX_COUNT, DEFAULT_ATTACHMENT_MAX_SIZE } from '../../config/config.constants';
import { getErrorMessage } from '../../shared/error.utils';
import type { AttachmentFile, AttachmentStoreResult, AttachmentUpload, StoredAttachment } from '../interfaces';

interface AttachmentRow {
  id: number;
  message_id: number;
  filename: string;
  original_name: string;
  content_type: string;
  size: number;
  created_at: string;
}

type InsertParams = [number, string, string, string, number, Buffer, string];

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Attachment bytes keyed by message id. Each upload is validated and stored
 * on its own; a bad item becomes a warning and never fails the message.
 */
@Injectable()
export class AttachmentStorageService {
  private readonly logger = new Logger(AttachmentStorageService.name);
  private readonly maxSize: number;
  private readonly maxCount: number;
  private readonly stmts: {
    insert: Database.Statement<InsertParams>;
    getById: Database.Statement<[number], AttachmentRow>;
    listForMessage: Database.Statement<[number], AttachmentRow>;
    getData: Database.Statement<[number], { data: Buffer }>;
    countForMessage: Database.Statement<[number], { count: number }>;
  };

  constructor(database: DatabaseService, configService: ConfigService) {
    this.maxSize = configService.get<number>('postline.attachments.maxSize', DEFAULT_ATTACHMENT_MAX_SIZE);
    this.maxCount = configService.get<number>('postline.attachments.maxCount', DEFAULT_ATTACHMENT_MAX_COUNT);

    const db = database.connection;
    this.stmts = {
      insert: db.prepare<InsertParams>(
        `INSERT INTO attachments (message_id, filename, original_name, content_type, size, data, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      ),
      getById: db.prepare<[number], AttachmentRow>(
        `SELECT id, message_id, filename, original_name, content_type, size, created_at
         FROM attachments WHERE id = ?`,
      ),
      listForMessage: db.prepare<[number], AttachmentRow>(
        `SELECT id, message_id, filename, original_name, content_type, size, created_at
         FROM attachments WHERE message_id = ? ORDER BY id`,
      ),
      getData: db.prepare<[number], { data: Buffer }>('SELECT data FROM attachments WHERE id = ?'),
      countForMessage: db.prepare<[number], { count: number }>(
        'SELECT COUNT(*) AS count FROM attachments WHERE message_id = ?',
      ),
    };
  }

  /**
   * Stores base64 uploads and raw files alike, in the order given; the
   * per-message count limit applies across both.
   */
  store(messageId: number, uploads: readonly (AttachmentUpload | AttachmentFile)[]): AttachmentStoreResult {
    const result: AttachmentStoreResult = { processed: 0, total: uploads.length, warnings: [] };

    uploads.forEach((upload, index) => {
      const name = upload.filename.trim() || `attachment-${index + 1}`;

      if (index >= this.maxCount) {
        result.warnings.push(`Attachment ${name} skipped: at most ${this.maxCount} attachments per message`);
        return;
      }

      const data = 'data' in upload ? upload.data : decodeBase64(upload.content);
      if (!data) {
        result.warnings.push(`Attachment ${name} skipped: content is not valid base64`);
        return;
      }

      if (data.length > this.maxSize) {
        result.warnings.push(`Attachment ${name} skipped: ${data.length} bytes exceeds the ${this.maxSize} byte limit`);
        return;
      }

      try {
        this.stmts.insert.run(
          messageId,
          `${randomUUID()}-${sanitizeFilename(name)}`,
          name,
          upload.contentType?.trim() || DEFAULT_CONTENT_TYPE,
          data.length,
          data,
          new Date().toISOString(),
        );
        result.processed += 1;
      } catch (error) {
        this.logger.error(`Failed to store attachment ${name} for message ${messageId}: ${getErrorMessage(error)}`);
        result.warnings.push(`Attachment ${name} could not be stored`);
      }
    });

    if (uploads.length > 0) {
      this.logger.log(`Stored ${result.processed}/${result.total} attachment(s) for message ${messageId}`);
    }
    return result;
  }

  getById(id: number): StoredAttachment | undefined {
    const row = this.stmts.getById.get(id);
    return row ? toStoredAttachment(row) : undefined;
  }

  listForMessage(messageId: number): StoredAttachment[] {
    return this.stmts.listForMessage.all(messageId).map(toStoredAttachment);
  }

  getData(id: number): Buffer | undefined {
    return this.stmts.getData.get(id)?.data;
  }

  countForMessage(messageId: number): number {
    return this.stmts.countForMessage.get(messageId)?.count ?? 0;
  }
}

function toStoredAttachment(row: AttachmentRow): StoredAttachment {
  return {
    id: row.id,
    messageId: row.message_id,
    filename: row.filename,
    originalName: row.original_name,
    contentType: row.content_type,
    size: row.size,
    createdAt: row.created_at,
  };
}

function decodeBase64(content: string): Buffer | undefined {
  const compact = content.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return undefined;
  }
  return Buffer.from(compact, 'base64');
}

function sanitizeFilename(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 100);
}
