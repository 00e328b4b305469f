import { Test, TestingModule } from '@nestjs/testing';
import { ForbiddenException, NotFoundException, StreamableFile } from '@nestjs/common';
import { AttachmentsController } from '../attachments.controller';
import { AttachmentStorageService } from '../attachment-storage.service';
import { ThreadStoreService } from '../../../threads/thread-store.service';
import { AccountAuthGuard } from '../../../accounts/guards/account-auth.guard';
import { authenticatedRequest, buildAccount } from '../../../../test/helpers/accounts';

describe('AttachmentsController', () => {
  let controller: AttachmentsController;
  let threadStore: { getMessage: jest.Mock };

  const attachment = {
    id: 5,
    messageId: 9,
    filename: 'uuid-report.pdf',
    originalName: 'report.pdf',
    contentType: 'application/pdf',
    size: 3,
    createdAt: '2024-03-01T10:00:00.000Z',
  };

  beforeEach(async () => {
    threadStore = { getMessage: jest.fn().mockReturnValue({ id: 9, fromAccountId: 1, toAccountId: 2 }) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AttachmentsController],
      providers: [
        {
          provide: AttachmentStorageService,
          useValue: {
            getById: jest.fn((id: number) => (id === 5 ? attachment : undefined)),
            getData: jest.fn().mockReturnValue(Buffer.from('pdf')),
            listForMessage: jest.fn().mockReturnValue([attachment]),
          },
        },
        { provide: ThreadStoreService, useValue: threadStore },
      ],
    })
      .overrideGuard(AccountAuthGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get<AttachmentsController>(AttachmentsController);
  });

  it.each([
    ['sender', buildAccount(1, 'alice')],
    ['recipient', buildAccount(2, 'bob')],
  ])('should serve the bytes to the %s', (_role, account) => {
    const file = controller.download(authenticatedRequest(account), 5);

    expect(file).toBeInstanceOf(StreamableFile);
    expect(file.getHeaders()).toEqual({
      type: 'application/pdf',
      length: 3,
      disposition: 'attachment; filename="report.pdf"',
    });
  });

  it('should refuse other accounts', () => {
    expect(() => controller.download(authenticatedRequest(buildAccount(3, 'carol')), 5)).toThrow(ForbiddenException);
  });

  it('should return 404 for unknown attachments', () => {
    expect(() => controller.download(authenticatedRequest(buildAccount(1, 'alice')), 6)).toThrow(NotFoundException);
  });

  describe('list', () => {
    it('should list attachments for a participant', () => {
      expect(controller.list(authenticatedRequest(buildAccount(2, 'bob')), 9)).toEqual([attachment]);
    });

    it('should refuse other accounts', () => {
      expect(() => controller.list(authenticatedRequest(buildAccount(3, 'carol')), 9)).toThrow(ForbiddenException);
    });

    it('should return 404 for unknown messages', () => {
      threadStore.getMessage.mockReturnValue(undefined);

      expect(() => controller.list(authenticatedRequest(buildAccount(1, 'alice')), 10)).toThrow(NotFoundException);
    });
  });
});
