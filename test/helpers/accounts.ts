import type { Account, AuthenticatedRequest } from '../../src/accounts/interfaces';

export function buildAccount(id: number, username: string, host = 'postline.test'): Account {
  return {
    id,
    username,
    email: `${username}@${host}`,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

/**
 * A request as the AccountAuthGuard leaves it, for calling controllers directly.
 */
export function authenticatedRequest(account: Account): AuthenticatedRequest {
  return { account } as unknown as AuthenticatedRequest;
}
