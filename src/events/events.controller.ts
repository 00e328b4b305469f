import { Controller, Get, Logger, Req, Res, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { AccountAuthGuard } from '../accounts/guards/account-auth.guard';
import type { AuthenticatedRequest } from '../accounts/interfaces';
import { ThreadStoreService } from '../threads/thread-store.service';
import { getErrorMessage } from '../shared/error.utils';
import { DeliveryHubService } from './delivery-hub.service';
import { ServerSentEventSink } from './server-sent-event.sink';

export const CONNECTED_MESSAGE = 'Connected to inbox updates';

/**
 * @class EventsController
 * @description Live inbox stream. Each request becomes one hub subscription
 * that lives until the client disconnects or a write fails.
 */
@ApiTags('Events')
@ApiBearerAuth()
@UseGuards(AccountAuthGuard)
@Controller('api/events')
export class EventsController {
  private readonly logger = new Logger(EventsController.name);

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly hub: DeliveryHubService,
    private readonly threadStore: ThreadStoreService,
  ) {}

  /**
   * @method inbox
   * @description Opens the stream, then sends `connected` and the current
   * `unread-count` ahead of any live event. The headers are already out by
   * then, so a failed count is logged and skipped.
   */
  @Get('inbox')
  @ApiOperation({
    summary: 'Subscribe to inbox updates',
    description: 'Server-Sent Events stream of `connected`, `new-message` and `unread-count` events.',
  })
  @ApiQuery({ name: 'token', required: false, description: 'Session token for clients that cannot set headers' })
  @ApiResponse({ status: 200, description: 'Stream established (text/event-stream).' })
  @ApiResponse({ status: 401, description: 'Missing or invalid token.' })
  inbox(@Req() request: AuthenticatedRequest, @Res() response: Response): void {
    const account = request.account;
    const sink = new ServerSentEventSink(response);
    const subscription = this.hub.subscribe(account.id, sink);

    this.logger.log(`Live stream opened for ${account.username} (${subscription.id})`);

    request.on('close', () => {
      this.logger.log(`Live stream closed for ${account.username} (${subscription.id})`);
      this.hub.unsubscribe(subscription);
    });

    this.hub.send(subscription, 'connected', { message: CONNECTED_MESSAGE });

    try {
      this.hub.send(subscription, 'unread-count', { count: this.threadStore.unreadCount(account.id) });
    } catch (error) {
      this.logger.warn(`Unread count for ${account.username} unavailable: ${getErrorMessage(error)}`);
    }
  }
}
