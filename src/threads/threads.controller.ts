import {
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ThreadStoreService } from './thread-store.service';
import { AccountAuthGuard } from '../accounts/guards/account-auth.guard';
import type { AuthenticatedRequest } from '../accounts/interfaces';
import { DEFAULT_PAGE_LIMIT, ListMessagesQueryDto } from './dto/list-messages-query.dto';
import { MarkReadResponseDto, MessageResponseDto, UnreadCountResponseDto } from './dto/response.dto';

@ApiTags('Messages')
@ApiBearerAuth()
@UseGuards(AccountAuthGuard)
@Controller('api')
export class ThreadsController {
  constructor(private readonly threadStore: ThreadStoreService) {}

  /**
   * GET /api/messages
   * One entry per conversation, freshest first
   */
  @Get('messages')
  @ApiOperation({ summary: 'Inbox, grouped by thread' })
  @ApiOkResponse({ type: [MessageResponseDto] })
  getInbox(@Req() request: AuthenticatedRequest, @Query() query: ListMessagesQueryDto): MessageResponseDto[] {
    return this.threadStore.getInboxRoots(request.account.id, query.limit ?? DEFAULT_PAGE_LIMIT, query.offset ?? 0);
  }

  /**
   * GET /api/messages/sent
   */
  @Get('messages/sent')
  @ApiOperation({ summary: 'Sent messages, newest first' })
  @ApiOkResponse({ type: [MessageResponseDto] })
  getSent(@Req() request: AuthenticatedRequest, @Query() query: ListMessagesQueryDto): MessageResponseDto[] {
    return this.threadStore.getSent(request.account.id, query.limit ?? DEFAULT_PAGE_LIMIT, query.offset ?? 0);
  }

  /**
   * GET /api/messages/unread-count
   */
  @Get('messages/unread-count')
  @ApiOperation({ summary: 'Number of unread messages' })
  @ApiOkResponse({ type: UnreadCountResponseDto })
  getUnreadCount(@Req() request: AuthenticatedRequest): UnreadCountResponseDto {
    return { unreadCount: this.threadStore.unreadCount(request.account.id) };
  }

  /**
   * POST /api/messages/:id/read
   */
  @Post('messages/:id/read')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a received message read' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: MarkReadResponseDto })
  @ApiResponse({ status: 403, description: 'The caller is not the recipient.' })
  @ApiResponse({ status: 404, description: 'Message not found.' })
  markRead(@Req() request: AuthenticatedRequest, @Param('id', ParseIntPipe) id: number): MarkReadResponseDto {
    const message = this.threadStore.getMessage(id);
    if (!message) {
      throw new NotFoundException(`Message ${id} not found`);
    }
    if (message.toAccountId !== request.account.id) {
      throw new ForbiddenException('Only the recipient can mark a message read');
    }

    this.threadStore.markRead(id);
    return { success: true };
  }

  /**
   * GET /api/threads/:threadId
   * Members the caller sent or received, oldest first
   */
  @Get('threads/:threadId')
  @ApiOperation({ summary: 'Messages of one conversation' })
  @ApiParam({ name: 'threadId', type: String })
  @ApiOkResponse({ type: [MessageResponseDto] })
  @ApiResponse({ status: 404, description: 'No visible messages in the thread.' })
  getThread(@Req() request: AuthenticatedRequest, @Param('threadId') threadId: string): MessageResponseDto[] {
    const accountId = request.account.id;
    const visible = this.threadStore
      .getThread(threadId)
      .filter((message) => message.fromAccountId === accountId || message.toAccountId === accountId);

    if (visible.length === 0) {
      throw new NotFoundException(`Thread ${threadId} not found`);
    }
    return visible;
  }
}
