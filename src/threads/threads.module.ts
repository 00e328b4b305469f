import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { AccountsModule } from '../accounts/accounts.module';
import { ThreadStoreService } from './thread-store.service';
import { ThreadsController } from './threads.controller';

@Module({
  imports: [DatabaseModule, AccountsModule],
  controllers: [ThreadsController],
  providers: [ThreadStoreService],
  exports: [ThreadStoreService],
})
export class ThreadsModule {}
