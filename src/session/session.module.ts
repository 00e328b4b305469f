import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { ThreadsModule } from '../threads/threads.module';
import { IngestionModule } from '../ingestion/ingestion.module';
import { SessionServerService } from './session-server.service';
import { SessionRateLimiterService } from './session-rate-limiter.service';

@Module({
  imports: [AccountsModule, ThreadsModule, IngestionModule],
  providers: [SessionServerService, SessionRateLimiterService],
  exports: [SessionServerService],
})
export class SessionModule {}
