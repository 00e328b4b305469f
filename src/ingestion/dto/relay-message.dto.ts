import { IsISO8601, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Body of `POST /federation/relay`, as sent by another server's relay client.
 */
export class RelayMessageDto {
  @ApiProperty({ example: 'eve@remote.example' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  from!: string;

  @ApiProperty({ example: 'bob@localhost' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  to!: string;

  @ApiProperty()
  @IsString()
  @MaxLength(998)
  subject!: string;

  @ApiProperty()
  @IsString()
  body!: string;

  @ApiPropertyOptional({ example: '2024-01-01T12:00:00.000Z' })
  @IsOptional()
  @IsISO8601()
  timestamp?: string;
}
