import { get } from 'http';
import type { ClientRequest, IncomingMessage } from 'http';

export interface ReceivedEvent {
  event: string;
  data: unknown;
}

/**
 * Reads named Server-Sent Events from a live HTTP response. Comment frames
 * (keepalives) are counted but not queued.
 */
export class EventStreamClient {
  private buffer = '';
  private readonly events: ReceivedEvent[] = [];
  private readonly waiters: Array<(event: ReceivedEvent) => void> = [];
  comments = 0;

  private constructor(
    private readonly request: ClientRequest,
    readonly response: IncomingMessage,
  ) {
    response.setEncoding('utf8');
    response.on('data', (chunk: string) => this.consume(chunk));
    response.on('error', () => undefined);
  }

  static open(url: string): Promise<EventStreamClient> {
    return new Promise((resolve, reject) => {
      const request = get(url, (response) => resolve(new EventStreamClient(request, response)));
      request.once('error', reject);
    });
  }

  next(): Promise<ReceivedEvent> {
    const event = this.events.shift();
    if (event) {
      return Promise.resolve(event);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(): void {
    this.request.destroy();
  }

  private consume(chunk: string): void {
    this.buffer += chunk;
    let index = this.buffer.indexOf('\n\n');
    while (index >= 0) {
      this.parseFrame(this.buffer.slice(0, index));
      this.buffer = this.buffer.slice(index + 2);
      index = this.buffer.indexOf('\n\n');
    }
  }

  private parseFrame(frame: string): void {
    let event = 'message';
    const data: string[] = [];
    for (const line of frame.split('\n')) {
      if (line.startsWith(':')) {
        this.comments += 1;
      } else if (line.startsWith('event: ')) {
        event = line.slice('event: '.length);
      } else if (line.startsWith('data: ')) {
        data.push(line.slice('data: '.length));
      }
    }
    if (data.length === 0) {
      return;
    }

    const received: ReceivedEvent = { event, data: JSON.parse(data.join('\n')) };
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(received);
      return;
    }
    this.events.push(received);
  }
}
