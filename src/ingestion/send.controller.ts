import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  UploadedFiles,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { ApiBearerAuth, ApiConsumes, ApiOkResponse, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AccountAuthGuard } from '../accounts/guards/account-auth.guard';
import { AccountStorageService } from '../accounts/storage/account-storage.service';
import type { AuthenticatedRequest } from '../accounts/interfaces';
import { MessageDeliveryService } from './message-delivery.service';
import { AttachmentStorageService } from './attachments/attachment-storage.service';
import { toHttpException } from './ingestion.http-errors';
import { SendMessageDto } from './dto/send-message.dto';
import { SendMessageResponseDto } from './dto/response.dto';
import type { AttachmentFile, DeliveryOutcome, UploadedFilePart } from './interfaces';

@ApiTags('Messages')
@ApiBearerAuth()
@UseGuards(AccountAuthGuard)
@Controller('api')
export class SendController {
  private readonly logger = new Logger(SendController.name);

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly delivery: MessageDeliveryService,
    private readonly attachments: AttachmentStorageService,
    private readonly accounts: AccountStorageService,
  ) {}

  /**
   * POST /api/send
   * JSON with base64 `attachments`, or multipart/form-data with the same
   * fields and `attachments` file parts. Attachments are stored after the
   * message; a rejected attachment is reported in `warnings` and does not
   * fail the send.
   */
  @Post('send')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FilesInterceptor('attachments'))
  @ApiConsumes('application/json', 'multipart/form-data')
  @ApiOperation({ summary: 'Send a message, optionally as a reply' })
  @ApiOkResponse({ type: SendMessageResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid recipient or payload.' })
  @ApiResponse({ status: 413, description: 'A multipart file exceeds the attachment size limit.' })
  @ApiResponse({ status: 500, description: 'The message could not be stored.' })
  async send(
    @Req() request: AuthenticatedRequest,
    @Body() dto: SendMessageDto,
    @UploadedFiles() files?: UploadedFilePart[],
  ): Promise<SendMessageResponseDto> {
    const sender = request.account;

    let outcome: DeliveryOutcome;
    try {
      outcome = await this.delivery.deliver({
        fromAccountId: sender.id,
        fromAddress: this.accounts.addressOf(sender),
        toAddress: dto.to,
        subject: dto.subject,
        body: dto.body ?? '',
        isHtml: dto.isHtml,
        threadId: dto.threadId,
        parentId: dto.parentId,
      });
    } catch (error) {
      throw toHttpException(error);
    }

    const uploadedFiles: AttachmentFile[] = (files ?? []).map((file) => ({
      filename: file.originalname,
      contentType: file.mimetype,
      data: file.buffer,
    }));
    const stored = this.attachments.store(outcome.message.id, [...(dto.attachments ?? []), ...uploadedFiles]);
    const warnings = [...outcome.warnings, ...stored.warnings];
    if (warnings.length > 0) {
      this.logger.warn(`Message ${outcome.message.id} sent with warnings: ${warnings.join('; ')}`);
    }

    return {
      success: true,
      id: outcome.message.id,
      threadId: outcome.message.threadId,
      attachments: { processed: stored.processed, total: stored.total },
      ...(warnings.length > 0 ? { warnings } : {}),
    };
  }
}
