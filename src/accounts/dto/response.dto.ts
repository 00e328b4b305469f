import { ApiProperty } from '@nestjs/swagger';

export class AccountResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'alice' })
  username!: string;

  @ApiProperty({ example: 'alice@localhost' })
  email!: string;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  createdAt!: string;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  updatedAt!: string;
}

export class LoginResponseDto {
  @ApiProperty({ description: 'Bearer token for the Authorization header or the `token` query parameter.' })
  token!: string;

  @ApiProperty({ example: '2024-01-02T00:00:00.000Z' })
  expiresAt!: string;

  @ApiProperty({ type: AccountResponseDto })
  account!: AccountResponseDto;
}
