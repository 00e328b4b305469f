import type { Request } from 'express';

/**
 * A local account. The password hash never leaves the storage layer.
 */
export interface Account {
  id: number;
  username: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Resolves credentials and addresses to local accounts.
 */
export interface IdentityResolver {
  authenticate(username: string, password: string): Promise<Account | undefined>;
  /** Returns undefined when the address is not local to this server. */
  resolveAddress(address: string): Account | undefined;
  getById(id: number): Account | undefined;
}

export interface TokenPayload {
  /** Account id */
  sub: number;
  username: string;
  /** Expiry, seconds since epoch */
  exp: number;
}

export interface AuthenticatedRequest extends Request {
  account: Account;
}
