import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { SessionHealthIndicator } from './session.health';
import { DatabaseHealthIndicator } from './database.health';
import { SessionModule } from '../session/session.module';
import { DatabaseModule } from '../database/database.module';

@Module({
  imports: [TerminusModule, SessionModule, DatabaseModule],
  controllers: [HealthController],
  providers: [SessionHealthIndicator, DatabaseHealthIndicator],
})
export class HealthModule {}
