import { CanActivate, ExecutionContext, Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { TokenService } from '../token/token.service';
import { IDENTITY_RESOLVER } from '../accounts.tokens';
import type { AuthenticatedRequest, IdentityResolver } from '../interfaces';

/**
 * Accepts `Authorization: Bearer <token>`, or a `token` query parameter for
 * EventSource clients that cannot set headers. Attaches the account to the
 * request.
 */
@Injectable()
export class AccountAuthGuard implements CanActivate {
  private readonly logger = new Logger(AccountAuthGuard.name);

  constructor(
    private readonly tokenService: TokenService,
    @Inject(IDENTITY_RESOLVER) private readonly identityResolver: IdentityResolver,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    // Allow OPTIONS requests for CORS preflight
    if (request.method === 'OPTIONS') {
      return true;
    }

    const token = this.extractToken(request);
    if (!token) {
      throw new UnauthorizedException('Missing bearer token');
    }

    const payload = this.tokenService.verify(token);
    if (!payload) {
      this.logger.warn(`Request with invalid or expired token path=${request.path}`);
      throw new UnauthorizedException('Invalid or expired token');
    }

    const account = this.identityResolver.getById(payload.sub);
    if (!account) {
      this.logger.warn(`Token for unknown account ${payload.sub} path=${request.path}`);
      throw new UnauthorizedException('Account no longer exists');
    }

    Object.assign(request, { account });
    return isAuthenticated(request);
  }

  private extractToken(request: Request): string | undefined {
    const header = request.headers.authorization;
    if (header) {
      const [scheme, value] = header.split(' ');
      return scheme.toLowerCase() === 'bearer' && value ? value : undefined;
    }

    const query = request.query.token;
    return typeof query === 'string' && query.length > 0 ? query : undefined;
  }
}

export function isAuthenticated(request: Request): request is AuthenticatedRequest {
  return 'account' in request && typeof request.account === 'object' && request.account !== null;
}
