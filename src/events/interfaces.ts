import type { Message } from '../threads/interfaces';

/**
 * @interface HubEventPayloads
 * @description Payload carried by each named event on the live stream.
 */
export interface HubEventPayloads {
  connected: { message: string };
  'new-message': Message;
  'unread-count': { count: number };
}

export type HubEventKind = keyof HubEventPayloads;

/**
 * @interface EventSink
 * @description Output side of one live connection. Each promise settles once
 * the bytes are handed to the transport and rejects when the connection is gone.
 */
export interface EventSink {
  write(kind: HubEventKind, data: HubEventPayloads[HubEventKind]): Promise<void>;
  keepalive(): Promise<void>;
  close(): void;
}

/**
 * @interface Subscription
 * @description Handle returned by `subscribe`, retained by the connection owner
 * and passed back to `unsubscribe`.
 */
export interface Subscription {
  readonly id: string;
  readonly accountId: number;
  /** Last time a write to the sink succeeded */
  readonly lastSeenAt: Date;
}
