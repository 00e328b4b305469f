import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class AttachmentSummaryDto {
  @ApiProperty({ example: 1 })
  processed!: number;

  @ApiProperty({ example: 1 })
  total!: number;
}

export class SendMessageResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: 42 })
  id!: number;

  @ApiProperty({ example: '9f86d081884c7d659a2feaa0c55ad015' })
  threadId!: string;

  @ApiProperty({ type: AttachmentSummaryDto })
  attachments!: AttachmentSummaryDto;

  @ApiPropertyOptional({ type: [String], example: ['Relay to remote.example failed: connect ECONNREFUSED'] })
  warnings?: string[];
}

export class RelayResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: 'delivered' })
  status!: string;

  @ApiProperty({ example: 42 })
  id!: number;
}

export class AttachmentResponseDto {
  @ApiProperty({ example: 3 })
  id!: number;

  @ApiProperty({ example: 42 })
  messageId!: number;

  @ApiProperty({ description: 'Name under which the bytes are stored.' })
  filename!: string;

  @ApiProperty({ example: 'report.pdf' })
  originalName!: string;

  @ApiProperty({ example: 'application/pdf' })
  contentType!: string;

  @ApiProperty({ example: 1024 })
  size!: number;

  @ApiProperty({ example: '2024-01-01T12:00:00.000Z' })
  createdAt!: string;
}
