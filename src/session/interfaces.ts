import type { IdentityResolver } from '../accounts/interfaces';
import type { DeliveryOutcome, MessageSubmission } from '../ingestion/interfaces';
import type { Message } from '../threads/interfaces';
import type { RateLimitedAction } from './session-rate-limiter.service';

/**
 * Byte side of one connection. `write` receives complete CRLF-terminated lines.
 */
export interface SessionTransport {
  readonly remoteAddress: string;
  write(chunk: string): void;
  close(): void;
}

/**
 * Collaborators a session needs; shared by every connection.
 */
export interface SessionContext {
  serverHost: string;
  banner: string;
  listLimit: number;
  identityResolver: Pick<IdentityResolver, 'authenticate'>;
  delivery: { deliver(submission: MessageSubmission): Promise<DeliveryOutcome> };
  inbox: {
    getInboxRoots(accountId: number, limit: number, offset: number): Message[];
    markRead(id: number): boolean;
  };
  rateLimiter: {
    consume(action: RateLimitedAction, ip: string): Promise<void>;
    reset(action: RateLimitedAction, ip: string): Promise<void>;
  };
}
