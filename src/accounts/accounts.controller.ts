import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiCreatedResponse, ApiOkResponse, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AccountStorageService } from './storage/account-storage.service';
import { TokenService } from './token/token.service';
import { AccountAuthGuard } from './guards/account-auth.guard';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';
import { AccountResponseDto, LoginResponseDto } from './dto/response.dto';
import type { AuthenticatedRequest } from './interfaces';

@ApiTags('Accounts')
@Controller('api')
export class AccountsController {
  private readonly logger = new Logger(AccountsController.name);

  constructor(
    private readonly accountStorage: AccountStorageService,
    private readonly tokenService: TokenService,
  ) {}

  /**
   * POST /api/register
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Register an account' })
  @ApiCreatedResponse({ type: AccountResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid username, email or password.' })
  @ApiResponse({ status: 409, description: 'Username or email already exists.' })
  async register(@Body() dto: RegisterDto): Promise<AccountResponseDto> {
    return this.accountStorage.register(dto.username, dto.email, dto.password);
  }

  /**
   * POST /api/login
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange credentials for a bearer token' })
  @ApiOkResponse({ type: LoginResponseDto })
  @ApiResponse({ status: 401, description: 'Invalid credentials.' })
  async login(@Body() dto: LoginDto): Promise<LoginResponseDto> {
    const account = await this.accountStorage.authenticate(dto.username, dto.password);
    if (!account) {
      this.logger.warn(`Failed login for ${dto.username}`);
      throw new UnauthorizedException({ error: 'invalid_credentials', message: 'Invalid username or password' });
    }

    const { token, expiresAt } = this.tokenService.issue(account);
    return { token, expiresAt: expiresAt.toISOString(), account };
  }

  /**
   * GET /api/profile
   */
  @Get('profile')
  @UseGuards(AccountAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Current account' })
  @ApiOkResponse({ type: AccountResponseDto })
  @ApiResponse({ status: 401, description: 'Missing or invalid token.' })
  getProfile(@Req() request: AuthenticatedRequest): AccountResponseDto {
    return request.account;
  }
}
