import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  NotFoundException,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOkResponse, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { IDENTITY_RESOLVER } from '../accounts/accounts.tokens';
import type { IdentityResolver } from '../accounts/interfaces';
import { DEFAULT_SERVER_HOST } from '../config/config.constants';
import { parseAddress } from '../shared/address.utils';
import { MessageDeliveryService } from './message-delivery.service';
import { toHttpException } from './ingestion.http-errors';
import { RelayMessageDto } from './dto/relay-message.dto';
import { RelayResponseDto } from './dto/response.dto';

/**
 * Receiving side of server-to-server relay.
 */
@ApiTags('Federation')
@Controller('federation')
export class FederationController {
  private readonly logger = new Logger(FederationController.name);
  private readonly serverHost: string;

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly delivery: MessageDeliveryService,
    @Inject(IDENTITY_RESOLVER) private readonly identityResolver: IdentityResolver,
    configService: ConfigService,
  ) {
    this.serverHost = configService.get<string>('postline.main.serverHost', DEFAULT_SERVER_HOST);
  }

  @Post('relay')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Accept a message relayed by another server' })
  @ApiOkResponse({ type: RelayResponseDto })
  @ApiResponse({ status: 400, description: 'Recipient is not on this server.' })
  @ApiResponse({ status: 404, description: 'Recipient account does not exist.' })
  async relay(@Body() dto: RelayMessageDto): Promise<RelayResponseDto> {
    const address = parseAddress(dto.to);
    if (!address) {
      throw new BadRequestException({ error: 'invalid_email', message: `Invalid recipient address: "${dto.to}"` });
    }

    if (address.domain !== this.serverHost) {
      this.logger.warn(`Rejected relay for ${dto.to} from ${dto.from}: not hosted here`);
      throw new BadRequestException({
        error: 'recipient_not_on_server',
        message: `Recipient domain ${address.domain} is not served by ${this.serverHost}`,
      });
    }

    if (!this.identityResolver.resolveAddress(dto.to)) {
      throw new NotFoundException({ error: 'user_not_found', message: `No account for ${dto.to}` });
    }

    try {
      const outcome = await this.delivery.deliver({
        fromAddress: dto.from.trim(),
        toAddress: dto.to,
        subject: dto.subject,
        body: dto.body,
      });

      this.logger.log(`Accepted relayed message ${outcome.message.id} from ${dto.from}`);
      return { success: true, status: 'delivered', id: outcome.message.id };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
