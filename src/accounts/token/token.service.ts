import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'crypto';
import type { Account, TokenPayload } from '../interfaces';

/**
 * Issues and verifies bearer tokens of the form `<payload>.<signature>`,
 * both base64url. The payload is JSON `{ sub, username, exp }` and the
 * signature is HMAC-SHA256 over the encoded payload.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly secret: string;
  private readonly ttlSeconds: number;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    this.secret = this.configService.get<string>('postline.auth.tokenSecret', '');
    this.ttlSeconds = this.configService.get<number>('postline.auth.tokenTtl', 86400);

    if (!this.secret) {
      this.logger.error('Token secret not configured - every token will be rejected');
    }
  }

  issue(account: Account, now: Date = new Date()): { token: string; expiresAt: Date } {
    const exp = Math.floor(now.getTime() / 1000) + this.ttlSeconds;
    const payload: TokenPayload = { sub: account.id, username: account.username, exp };
    const encoded = Buffer.from(JSON.stringify(payload)).toString('base64url');

    return {
      token: `${encoded}.${this.sign(encoded)}`,
      expiresAt: new Date(exp * 1000),
    };
  }

  /**
   * Returns the payload of a valid, unexpired token.
   */
  verify(token: string, now: Date = new Date()): TokenPayload | undefined {
    if (!this.secret) {
      return undefined;
    }

    const parts = token.split('.');
    if (parts.length !== 2) {
      return undefined;
    }

    const [encoded, signature] = parts;
    const expected = Buffer.from(this.sign(encoded));
    const provided = Buffer.from(signature);
    if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
      return undefined;
    }

    const payload = this.decodePayload(encoded);
    if (!payload) {
      return undefined;
    }

    if (payload.exp <= Math.floor(now.getTime() / 1000)) {
      this.logger.debug(`Rejected expired token for ${payload.username}`);
      return undefined;
    }

    return payload;
  }

  private sign(encodedPayload: string): string {
    return createHmac('sha256', this.secret).update(encodedPayload).digest('base64url');
  }

  private decodePayload(encoded: string): TokenPayload | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
    } catch {
      return undefined;
    }

    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('sub' in parsed) ||
      !('username' in parsed) ||
      !('exp' in parsed)
    ) {
      return undefined;
    }

    const { sub, username, exp } = parsed;
    if (typeof sub !== 'number' || typeof username !== 'string' || typeof exp !== 'number') {
      return undefined;
    }

    return { sub, username, exp };
  }
}
