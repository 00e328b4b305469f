/**
 * Per-IP limits for the session listener: one budget for new connections and
 * one for `CONNECT` attempts. In-memory via rate-limiter-flexible.
 *
 * @module session-rate-limiter
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { DEFAULT_SESSION_RATE_LIMIT_DURATION, DEFAULT_SESSION_RATE_LIMIT_POINTS } from '../config/config.constants';

export interface SessionRateLimitConfig {
  enabled: boolean;
  points: number; // Attempts per duration
  duration: number; // Seconds
}

export type RateLimitedAction = 'connection' | 'login';

export class RateLimitExceededError extends Error {
  readonly responseCode = 421;

  constructor(readonly retryAfter?: number) {
    super(
      retryAfter
        ? `Too many attempts from your address. Try again in ${Math.ceil(retryAfter / 1000)} seconds.`
        : 'Too many attempts from your address. Try again later.',
    );
    this.name = 'RateLimitExceededError';
  }
}

@Injectable()
export class SessionRateLimiterService {
  private readonly logger = new Logger(SessionRateLimiterService.name);
  private readonly config: SessionRateLimitConfig;
  private readonly rateLimiter?: RateLimiterMemory;

  constructor(private readonly configService: ConfigService) {
    this.config = this.configService.get<SessionRateLimitConfig>('postline.sessionRateLimit') ?? {
      enabled: true,
      points: DEFAULT_SESSION_RATE_LIMIT_POINTS,
      duration: DEFAULT_SESSION_RATE_LIMIT_DURATION,
    };

    if (!this.config.enabled) {
      this.logger.log('Session rate limiting disabled');
      return;
    }

    this.rateLimiter = new RateLimiterMemory({
      points: this.config.points,
      duration: this.config.duration,
      blockDuration: 0,
    });

    this.logger.log(`Session rate limiter: ${this.config.points} attempts per ${this.config.duration}s per IP`);
  }

  /**
   * @throws {RateLimitExceededError} When the IP has used up its budget for the action
   */
  async consume(action: RateLimitedAction, ip: string): Promise<void> {
    if (!this.rateLimiter) {
      return;
    }

    try {
      await this.rateLimiter.consume(`${action}:${ip}`, 1);
    } catch (error) {
      if (error instanceof RateLimiterRes) {
        this.logger.warn(
          `Rate limit exceeded for ${action} from ${ip} (${error.consumedPoints}/${this.config.points}), ` +
            `retry after ${Math.ceil(error.msBeforeNext / 1000)}s`,
        );
        throw new RateLimitExceededError(error.msBeforeNext);
      }

      throw error;
    }
  }

  async reset(action: RateLimitedAction, ip: string): Promise<void> {
    if (!this.rateLimiter) {
      return;
    }
    await this.rateLimiter.delete(`${action}:${ip}`);
  }
}
