import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountAuthGuard } from '../guards/account-auth.guard';
import { TokenService } from '../token/token.service';
import type { Account, IdentityResolver } from '../interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('AccountAuthGuard', () => {
  const account: Account = {
    id: 3,
    username: 'bob',
    email: 'bob@postline.test',
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
  const restoreLogger = silenceNestLogger();

  let tokenService: TokenService;
  let identityResolver: jest.Mocked<IdentityResolver>;
  let guard: AccountAuthGuard;

  afterAll(() => restoreLogger());

  beforeEach(() => {
    tokenService = new TokenService(
      new ConfigService({ postline: { auth: { tokenSecret: 'test-secret', tokenTtl: 3600 } } }),
    );
    identityResolver = {
      authenticate: jest.fn(),
      resolveAddress: jest.fn(),
      getById: jest.fn().mockReturnValue(account),
    };
    guard = new AccountAuthGuard(tokenService, identityResolver);
  });

  const createMockRequest = (partial: { method?: string; authorization?: string; token?: string }) => ({
    method: partial.method ?? 'GET',
    path: '/api/profile',
    headers: partial.authorization ? { authorization: partial.authorization } : {},
    query: partial.token ? { token: partial.token } : {},
  });

  const contextFor = (mockRequest: ReturnType<typeof createMockRequest>) =>
    ({
      switchToHttp: jest.fn().mockReturnValue({
        getRequest: jest.fn().mockReturnValue(mockRequest),
      }),
    }) as unknown as ExecutionContext;

  it('should accept a bearer token and attach the account', () => {
    const { token } = tokenService.issue(account);
    const request = createMockRequest({ authorization: `Bearer ${token}` });

    expect(guard.canActivate(contextFor(request))).toBe(true);
    expect(request).toHaveProperty('account', account);
    expect(identityResolver.getById).toHaveBeenCalledWith(3);
  });

  it('should accept the token query parameter', () => {
    const { token } = tokenService.issue(account);
    const request = createMockRequest({ token });

    expect(guard.canActivate(contextFor(request))).toBe(true);
  });

  it('should let CORS preflight through', () => {
    expect(guard.canActivate(contextFor(createMockRequest({ method: 'OPTIONS' })))).toBe(true);
  });

  it('should reject a request without a token', () => {
    expect(() => guard.canActivate(contextFor(createMockRequest({})))).toThrow(UnauthorizedException);
  });

  it('should reject a non-bearer authorization header', () => {
    expect(() => guard.canActivate(contextFor(createMockRequest({ authorization: 'Basic abc' })))).toThrow(
      UnauthorizedException,
    );
  });

  it('should reject an invalid token', () => {
    expect(() => guard.canActivate(contextFor(createMockRequest({ authorization: 'Bearer abc.def' })))).toThrow(
      'Invalid or expired token',
    );
  });

  it('should reject a token for a deleted account', () => {
    identityResolver.getById.mockReturnValue(undefined);
    const { token } = tokenService.issue(account);

    expect(() => guard.canActivate(contextFor(createMockRequest({ token })))).toThrow('Account no longer exists');
  });
});
