import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** Multipart fields arrive as strings; JSON values pass through unchanged */
function parseFormBoolean(value: unknown): unknown {
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  return value;
}

function parseFormInteger(value: unknown): unknown {
  if (value === '') {
    return undefined;
  }
  return typeof value === 'string' ? Number(value) : value;
}

export class AttachmentUploadDto {
  @ApiProperty({ example: 'notes.txt', maxLength: 255 })
  @IsString()
  @MaxLength(255)
  filename!: string;

  @ApiPropertyOptional({ example: 'text/plain', description: 'Defaults to application/octet-stream.' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  contentType?: string;

  @ApiProperty({ description: 'Base64-encoded file content.' })
  @IsString()
  content!: string;
}

export class SendMessageDto {
  @ApiProperty({ example: 'bob@localhost', maxLength: 254 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  to!: string;

  @ApiProperty({ example: 'Lunch?', maxLength: 998 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(998)
  subject!: string;

  @ApiPropertyOptional({ default: '' })
  @IsOptional()
  @IsString()
  body?: string;

  @ApiPropertyOptional({ default: false, description: 'True when the body is HTML.' })
  @Transform(({ value }) => parseFormBoolean(value))
  @IsOptional()
  @IsBoolean()
  isHtml?: boolean;

  @ApiPropertyOptional({ description: 'Thread to reply into. An empty string counts as absent.' })
  @Transform(({ value }) => (value === '' ? undefined : value))
  @IsOptional()
  @IsString()
  @MaxLength(64)
  threadId?: string;

  @ApiPropertyOptional({ description: 'Id of the message being replied to.' })
  @Transform(({ value }) => parseFormInteger(value))
  @IsOptional()
  @IsInt()
  @Min(1)
  parentId?: number;

  @ApiPropertyOptional({ type: [AttachmentUploadDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AttachmentUploadDto)
  attachments?: AttachmentUploadDto[];
}
