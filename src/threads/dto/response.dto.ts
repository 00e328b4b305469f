import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class MessageResponseDto {
  @ApiProperty({ example: 42 })
  id!: number;

  @ApiProperty({ nullable: true, type: Number })
  fromAccountId!: number | null;

  @ApiProperty({ nullable: true, type: Number })
  toAccountId!: number | null;

  @ApiProperty({ example: 'alice@localhost' })
  fromAddress!: string;

  @ApiProperty({ example: 'bob@localhost' })
  toAddress!: string;

  @ApiProperty()
  subject!: string;

  @ApiProperty()
  body!: string;

  @ApiProperty({ description: 'True when the body is HTML.' })
  isHtml!: boolean;

  @ApiProperty({ description: '32 hex characters shared by every message of a conversation.' })
  threadId!: string;

  @ApiProperty({ nullable: true, type: Number })
  parentId!: number | null;

  @ApiProperty()
  isRead!: boolean;

  @ApiProperty({ example: '2024-01-01T12:00:00.000Z' })
  createdAt!: string;

  @ApiProperty()
  attachmentCount!: number;

  @ApiPropertyOptional({
    type: () => [MessageResponseDto],
    description: 'Other members of the thread; present on inbox roots of multi-message threads.',
  })
  replies?: MessageResponseDto[];
}

export class UnreadCountResponseDto {
  @ApiProperty({ example: 3 })
  unreadCount!: number;
}

export class MarkReadResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;
}
