import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Response for GET /health
 */
export class HealthResponseDto {
  @ApiProperty({ description: 'Overall health status', example: 'ok', enum: ['ok', 'error'] })
  status!: string;

  @ApiPropertyOptional({
    description: 'Indicators that are up',
    example: {
      server: { status: 'up' },
      session: { status: 'up', listening: true, port: 2525, connections: 3 },
      database: { status: 'up' },
    },
  })
  info?: Record<string, unknown>;

  @ApiPropertyOptional({
    description: 'Indicators that are down',
    example: { session: { status: 'down', listening: false, connections: 0 } },
  })
  error?: Record<string, unknown>;

  @ApiProperty({ description: 'Every indicator, up or down' })
  details!: Record<string, unknown>;
}
