import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom, timeout } from 'rxjs';
import { isAxiosError } from 'axios';
import { DEFAULT_RELAY_PORT, DEFAULT_RELAY_TIMEOUT, DEFAULT_SERVER_HOST } from '../config/config.constants';
import { getErrorMessage } from '../shared/error.utils';
import type { RelayPayload, RelayResult } from './interfaces';

export const RELAY_PATH = '/federation/relay';

/**
 * Best-effort push of a message to the server that owns the recipient's
 * domain. One attempt, bounded by the relay timeout; failures are returned,
 * never thrown, and never retried.
 */
@Injectable()
export class RelayClientService {
  private readonly logger = new Logger(RelayClientService.name);
  private readonly serverHost: string;
  private readonly relayPort: number;
  private readonly relayTimeout: number;

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.serverHost = this.configService.get<string>('postline.main.serverHost', DEFAULT_SERVER_HOST);
    this.relayPort = this.configService.get<number>('postline.relay.port', DEFAULT_RELAY_PORT);
    this.relayTimeout = this.configService.get<number>('postline.relay.timeout', DEFAULT_RELAY_TIMEOUT);
  }

  async sendMessage(from: string, to: string, subject: string, body: string, targetHost: string): Promise<RelayResult> {
    if (targetHost.toLowerCase() === this.serverHost) {
      this.logger.debug(`Skipping relay of ${to}: ${targetHost} is this server`);
      return { delivered: true, skipped: true };
    }

    const url = `http://${targetHost}:${this.relayPort}${RELAY_PATH}`;
    const payload: RelayPayload = { from, to, subject, body, timestamp: new Date().toISOString() };

    try {
      const response = await firstValueFrom(
        this.httpService
          .post(url, payload, {
            headers: { 'Content-Type': 'application/json' },
            timeout: this.relayTimeout,
          })
          .pipe(timeout(this.relayTimeout)),
      );

      this.logger.log(`Relayed message for ${to} to ${targetHost} (${response.status})`);
      return { delivered: true, statusCode: response.status };
    } catch (error) {
      const statusCode = isAxiosError(error) ? error.response?.status : undefined;
      const message = statusCode ? `relay server returned status ${statusCode}` : getErrorMessage(error);

      this.logger.warn(`Relay to ${targetHost} failed for ${to}: ${message}`);
      return { delivered: false, statusCode, error: message };
    }
  }
}
