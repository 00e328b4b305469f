import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { DatabaseModule } from '../database/database.module';
import { AccountsModule } from '../accounts/accounts.module';
import { ThreadsModule } from '../threads/threads.module';
import { RelayModule } from '../relay/relay.module';
import { MessageDeliveryService } from './message-delivery.service';
import { AttachmentStorageService } from './attachments/attachment-storage.service';
import { AttachmentsController } from './attachments/attachments.controller';
import { SendController } from './send.controller';
import { FederationController } from './federation.controller';
import { DEFAULT_ATTACHMENT_MAX_COUNT, DEFAULT_ATTACHMENT_MAX_SIZE } from '../config/config.constants';

/**
 * Entry points that create messages. The session module reuses
 * `MessageDeliveryService` so every path shares one pipeline.
 */
@Module({
  imports: [
    DatabaseModule,
    AccountsModule,
    ThreadsModule,
    RelayModule,
    // Parts are buffered in memory; the attachment limits apply while parsing
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        limits: {
          fileSize: config.get<number>('postline.attachments.maxSize', DEFAULT_ATTACHMENT_MAX_SIZE),
          files: config.get<number>('postline.attachments.maxCount', DEFAULT_ATTACHMENT_MAX_COUNT),
        },
      }),
    }),
  ],
  controllers: [SendController, AttachmentsController, FederationController],
  providers: [MessageDeliveryService, AttachmentStorageService],
  exports: [MessageDeliveryService, AttachmentStorageService],
})
export class IngestionModule {}
