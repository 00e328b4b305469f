import {
  Controller,
  ForbiddenException,
  Get,
  NotFoundException,
  Param,
  ParseIntPipe,
  Req,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AccountAuthGuard } from '../../accounts/guards/account-auth.guard';
import type { Account, AuthenticatedRequest } from '../../accounts/interfaces';
import { ThreadStoreService } from '../../threads/thread-store.service';
import { AttachmentStorageService } from './attachment-storage.service';
import { AttachmentResponseDto } from '../dto/response.dto';

@ApiTags('Attachments')
@ApiBearerAuth()
@UseGuards(AccountAuthGuard)
@Controller('api')
export class AttachmentsController {
  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly attachments: AttachmentStorageService,
    private readonly threadStore: ThreadStoreService,
  ) {}

  /**
   * GET /api/messages/:id/attachments
   */
  @Get('messages/:id/attachments')
  @ApiOperation({ summary: 'List the attachments of a message' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: [AttachmentResponseDto] })
  @ApiResponse({ status: 403, description: 'Not a participant of the message.' })
  @ApiResponse({ status: 404, description: 'Message not found.' })
  list(@Req() request: AuthenticatedRequest, @Param('id', ParseIntPipe) id: number): AttachmentResponseDto[] {
    this.assertParticipant(request.account, id);
    return this.attachments.listForMessage(id);
  }

  /**
   * GET /api/attachments/:id
   * Only the sender or recipient of the owning message may download.
   */
  @Get('attachments/:id')
  @ApiOperation({ summary: 'Download an attachment' })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: 200, description: 'Attachment bytes.' })
  @ApiResponse({ status: 403, description: 'Not a participant of the owning message.' })
  @ApiResponse({ status: 404, description: 'Attachment not found.' })
  download(@Req() request: AuthenticatedRequest, @Param('id', ParseIntPipe) id: number): StreamableFile {
    const attachment = this.attachments.getById(id);
    const data = attachment ? this.attachments.getData(id) : undefined;
    if (!attachment || !data) {
      throw new NotFoundException({ error: 'attachment_not_found', message: `Attachment ${id} not found` });
    }

    this.assertParticipant(request.account, attachment.messageId);

    return new StreamableFile(data, {
      type: attachment.contentType,
      length: attachment.size,
      disposition: `attachment; filename="${attachment.originalName.replace(/["\\\r\n]/g, '_')}"`,
    });
  }

  private assertParticipant(account: Account, messageId: number): void {
    const message = this.threadStore.getMessage(messageId);
    if (!message) {
      throw new NotFoundException({ error: 'message_not_found', message: `Message ${messageId} not found` });
    }
    if (message.fromAccountId !== account.id && message.toAccountId !== account.id) {
      throw new ForbiddenException({ error: 'forbidden', message: 'Not a participant of this message' });
    }
  }
}
