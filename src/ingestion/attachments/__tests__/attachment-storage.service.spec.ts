import { ConfigService } from '@nestjs/config';
import { AttachmentStorageService } from '../attachment-storage.service';
import { ThreadStoreService } from '../../../threads/thread-store.service';
import { DatabaseService } from '../../../database/database.service';
import { createTestDatabase, insertAccount } from '../../../../test/helpers/database';
import { silenceNestLogger } from '../../../../test/helpers/silence-logger';

describe('AttachmentStorageService', () => {
  let database: DatabaseService;
  let messageId: number;
  const restoreLogger = silenceNestLogger(['log', 'error']);

  afterAll(() => restoreLogger());

  function createService(maxSize = 1024, maxCount = 3): AttachmentStorageService {
    return new AttachmentStorageService(
      database,
      new ConfigService({ postline: { attachments: { maxSize, maxCount } } }),
    );
  }

  beforeEach(() => {
    database = createTestDatabase();
    const alice = insertAccount(database, 'alice');
    const bob = insertAccount(database, 'bob');
    messageId = new ThreadStoreService(database).createMessage({
      fromAccountId: alice,
      toAccountId: bob,
      fromAddress: 'alice@postline.test',
      toAddress: 'bob@postline.test',
      subject: 'Files',
      body: 'See attached',
      isHtml: false,
    }).id;
  });

  afterEach(() => {
    database.onModuleDestroy();
  });

  it('should store decoded bytes with their metadata', () => {
    const service = createService();

    const result = service.store(messageId, [
      { filename: 'hello.txt', contentType: 'text/plain', content: 'aGVsbG8=' },
    ]);

    expect(result).toEqual({ processed: 1, total: 1, warnings: [] });
    expect(service.countForMessage(messageId)).toBe(1);

    const attachment = service.getById(1);
    expect(attachment).toMatchObject({
      id: 1,
      messageId,
      originalName: 'hello.txt',
      contentType: 'text/plain',
      size: 5,
    });
    expect(attachment?.filename).toMatch(/^[0-9a-f-]{36}-hello\.txt$/);
    expect(service.getData(1)?.toString('utf8')).toBe('hello');
    expect(service.listForMessage(messageId)).toEqual([attachment]);
  });

  it('should default the content type', () => {
    const service = createService();

    service.store(messageId, [{ filename: 'blob', content: 'AAEC' }]);

    expect(service.getById(1)?.contentType).toBe('application/octet-stream');
  });

  it('should warn about content that is not base64', () => {
    const service = createService();

    const result = service.store(messageId, [{ filename: 'bad.bin', content: '!!!!' }]);

    expect(result).toEqual({
      processed: 0,
      total: 1,
      warnings: ['Attachment bad.bin skipped: content is not valid base64'],
    });
    expect(service.countForMessage(messageId)).toBe(0);
  });

  it('should warn about oversize attachments', () => {
    const service = createService(4);

    const result = service.store(messageId, [{ filename: 'hello.txt', content: 'aGVsbG8=' }]);

    expect(result.warnings).toEqual(['Attachment hello.txt skipped: 5 bytes exceeds the 4 byte limit']);
  });

  it('should store up to the per-message limit and warn about the rest', () => {
    const service = createService(1024, 1);

    const result = service.store(messageId, [
      { filename: 'a.txt', content: 'YQ==' },
      { filename: 'b.txt', content: 'Yg==' },
    ]);

    expect(result).toEqual({
      processed: 1,
      total: 2,
      warnings: ['Attachment b.txt skipped: at most 1 attachments per message'],
    });
  });

  it('should store raw file bytes alongside base64 uploads', () => {
    const service = createService(1024, 2);

    const result = service.store(messageId, [
      { filename: 'a.txt', content: 'YQ==' },
      { filename: 'scan.pdf', contentType: 'application/pdf', data: Buffer.from([1, 2, 3]) },
      { filename: 'extra.bin', data: Buffer.from([4]) },
    ]);

    expect(result).toEqual({
      processed: 2,
      total: 3,
      warnings: ['Attachment extra.bin skipped: at most 2 attachments per message'],
    });
    const listed = service.listForMessage(messageId);
    expect(listed.map(({ originalName, contentType, size }) => ({ originalName, contentType, size }))).toEqual([
      { originalName: 'a.txt', contentType: 'application/octet-stream', size: 1 },
      { originalName: 'scan.pdf', contentType: 'application/pdf', size: 3 },
    ]);
    expect(service.getData(2)).toEqual(Buffer.from([1, 2, 3]));
  });

  it('should warn about oversize raw files', () => {
    const service = createService(2);

    const result = service.store(messageId, [{ filename: 'big.bin', data: Buffer.alloc(3) }]);

    expect(result.warnings).toEqual(['Attachment big.bin skipped: 3 bytes exceeds the 2 byte limit']);
  });

  it('should return undefined for unknown attachments', () => {
    const service = createService();

    expect(service.getById(99)).toBeUndefined();
    expect(service.getData(99)).toBeUndefined();
  });
});
