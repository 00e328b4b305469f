import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DEFAULT_ATTACHMENT_MAX_SIZE } from './config/config.constants';

const BODY_OVERHEAD = 1024 * 1024;

/**
 * Settings shared by the server entry point and the end-to-end tests.
 */
export function configureApp(app: NestExpressApplication): void {
  const config = app.get(ConfigService);
  const attachmentMaxSize = config.get<number>('postline.attachments.maxSize', DEFAULT_ATTACHMENT_MAX_SIZE);

  // One maximum-size attachment, base64-encoded, plus the rest of the message
  app.useBodyParser('json', { limit: Math.ceil((attachmentMaxSize * 4) / 3) + BODY_OVERHEAD });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip properties not in DTO
      forbidNonWhitelisted: true, // Reject requests with extra properties
      transform: true, // Transform payloads to DTO instances
    }),
  );
}
