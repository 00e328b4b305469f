import type { Message } from './interfaces';

export const MESSAGE_STORED_EVENT = 'message.stored';

/**
 * Emitted after a message addressed to a local account is persisted.
 */
export interface MessageStoredPayload {
  message: Message;
  recipientAccountId: number;
}
