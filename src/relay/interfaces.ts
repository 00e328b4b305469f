/**
 * Body of `POST /federation/relay`, sent to and accepted from peer servers.
 */
export interface RelayPayload {
  from: string;
  to: string;
  subject: string;
  body: string;
  /** ISO-8601 time the sender accepted the message */
  timestamp: string;
}

export interface RelayResult {
  delivered: boolean;
  /** Set when the target is this server and nothing was sent */
  skipped?: boolean;
  statusCode?: number;
  error?: string;
}
