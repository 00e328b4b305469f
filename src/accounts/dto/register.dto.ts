import { IsEmail, IsString, Matches, MaxLength, MinLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RegisterDto {
  @ApiProperty({ description: 'Login name, also the local part of the address.', example: 'alice' })
  @IsString()
  @Matches(/^[A-Za-z0-9_.-]{3,20}$/, {
    message: 'username must be 3-20 characters of letters, digits, "_", "." or "-"',
  })
  username!: string;

  @ApiProperty({ example: 'alice@example.com', maxLength: 254 })
  @IsEmail()
  @MaxLength(254)
  email!: string;

  @ApiProperty({ minLength: 6 })
  @IsString()
  @MinLength(6)
  password!: string;
}
