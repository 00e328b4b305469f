import type { Message } from '../threads/interfaces';

/**
 * A message entering the server from any entry point.
 */
export interface MessageSubmission {
  /** Local sender; absent for relayed mail */
  fromAccountId?: number;
  fromAddress: string;
  toAddress: string;
  subject: string;
  body: string;
  isHtml?: boolean;
  threadId?: string;
  parentId?: number;
}

export interface DeliveryOutcome {
  message: Message;
  /** True when the recipient is an account on this server */
  local: boolean;
  /** Non-fatal problems, e.g. a failed relay */
  warnings: string[];
}

export interface AttachmentUpload {
  filename: string;
  contentType?: string;
  /** Base64 */
  content: string;
}

/** An attachment that arrived as raw bytes, e.g. a multipart file part */
export interface AttachmentFile {
  filename: string;
  contentType?: string;
  data: Buffer;
}

/** The fields of a multipart file part the send endpoint reads */
export interface UploadedFilePart {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

export interface StoredAttachment {
  id: number;
  messageId: number;
  filename: string;
  originalName: string;
  contentType: string;
  size: number;
  createdAt: string;
}

export interface AttachmentStoreResult {
  processed: number;
  total: number;
  warnings: string[];
}
