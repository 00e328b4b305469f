/**
 * A persisted message. Immutable apart from `isRead`.
 */
export interface Message {
  id: number;
  fromAccountId: number | null;
  toAccountId: number | null;
  fromAddress: string;
  toAddress: string;
  subject: string;
  body: string;
  isHtml: boolean;
  threadId: string;
  parentId: number | null;
  isRead: boolean;
  createdAt: string;
  attachmentCount: number;
  /** Other members of the thread, set on inbox roots only */
  replies?: Message[];
}

export interface CreateMessageInput {
  fromAccountId?: number;
  toAccountId?: number;
  fromAddress: string;
  toAddress: string;
  subject: string;
  body: string;
  isHtml: boolean;
  /** Thread to join; ignored in favour of the parent's thread when the parent exists */
  threadId?: string;
  /** Advisory reference to the message being replied to */
  parentId?: number;
}
