import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SessionHealthIndicator } from './session.health';
import { DatabaseHealthIndicator } from './database.health';
import { HealthResponseDto } from './dto/health-response.dto';

@ApiTags('Health')
@SkipThrottle()
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly session: SessionHealthIndicator,
    private readonly database: DatabaseHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description: 'Reports the HTTP server, the session listener and the database.',
  })
  @ApiResponse({ status: 200, description: 'All components are up.', type: HealthResponseDto })
  @ApiResponse({ status: 503, description: 'One or more components are down.', type: HealthResponseDto })
  check() {
    return this.health.check([
      () => Promise.resolve({ server: { status: 'up' } }),
      () => this.session.isHealthy('session'),
      () => this.database.isHealthy('database'),
    ]);
  }
}
