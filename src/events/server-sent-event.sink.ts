import type { Response } from 'express';
import type { EventSink, HubEventKind, HubEventPayloads } from './interfaces';

/**
 * @class ServerSentEventSink
 * @description Writes hub events to an Express response as
 * `event: <kind>\ndata: <json>\n\n`, with `: ping\n\n` as keepalive.
 */
export class ServerSentEventSink implements EventSink {
  constructor(private readonly response: Response) {
    response.status(200);
    response.setHeader('Content-Type', 'text/event-stream');
    response.setHeader('Cache-Control', 'no-cache');
    response.setHeader('Connection', 'keep-alive');
    response.setHeader('X-Accel-Buffering', 'no');
    response.flushHeaders();
  }

  write(kind: HubEventKind, data: HubEventPayloads[HubEventKind]): Promise<void> {
    return this.writeChunk(`event: ${kind}\ndata: ${JSON.stringify(data)}\n\n`);
  }

  keepalive(): Promise<void> {
    return this.writeChunk(': ping\n\n');
  }

  close(): void {
    if (!this.response.writableEnded) {
      this.response.end();
    }
  }

  private writeChunk(chunk: string): Promise<void> {
    if (this.response.writableEnded || this.response.destroyed) {
      return Promise.reject(new Error('Event stream is closed'));
    }

    return new Promise((resolve, reject) => {
      this.response.write(chunk, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
