import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { AccountsController } from './accounts.controller';
import { AccountStorageService } from './storage/account-storage.service';
import { TokenService } from './token/token.service';
import { AccountAuthGuard } from './guards/account-auth.guard';
import { IDENTITY_RESOLVER } from './accounts.tokens';

@Module({
  imports: [DatabaseModule],
  controllers: [AccountsController],
  providers: [
    AccountStorageService,
    TokenService,
    AccountAuthGuard,
    { provide: IDENTITY_RESOLVER, useExisting: AccountStorageService },
  ],
  exports: [AccountStorageService, TokenService, AccountAuthGuard, IDENTITY_RESOLVER],
})
export class AccountsModule {}
