import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { DatabaseService } from '../database/database.service';

@Injectable()
export class DatabaseHealthIndicator {
  constructor(
    private readonly database: DatabaseService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    return Promise.resolve(this.database.isHealthy() ? indicator.up() : indicator.down({ message: 'Query failed' }));
  }
}
