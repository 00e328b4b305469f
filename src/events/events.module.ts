import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { ThreadsModule } from '../threads/threads.module';
import { DeliveryHubService } from './delivery-hub.service';
import { EventsController } from './events.controller';

/**
 * @module EventsModule
 * @description Live delivery of stored messages to connected clients.
 * The hub listens for `message.stored`, so nothing needs to import it to publish.
 */
@Module({
  imports: [AccountsModule, ThreadsModule],
  controllers: [EventsController],
  providers: [DeliveryHubService],
  exports: [DeliveryHubService],
})
export class EventsModule {}
