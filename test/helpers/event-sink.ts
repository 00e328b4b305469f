import type { EventSink, HubEventKind, HubEventPayloads } from '../../src/events/interfaces';

export interface RecordedEvent {
  kind: HubEventKind | 'keepalive';
  data?: HubEventPayloads[HubEventKind];
}

/**
 * In-memory EventSink. `fail()` makes every later write reject.
 */
export class RecordingSink implements EventSink {
  readonly events: RecordedEvent[] = [];
  closed = 0;
  private failing = false;

  fail(): void {
    this.failing = true;
  }

  write(kind: HubEventKind, data: HubEventPayloads[HubEventKind]): Promise<void> {
    if (this.failing) {
      return Promise.reject(new Error('connection reset'));
    }
    this.events.push({ kind, data });
    return Promise.resolve();
  }

  keepalive(): Promise<void> {
    if (this.failing) {
      return Promise.reject(new Error('connection reset'));
    }
    this.events.push({ kind: 'keepalive' });
    return Promise.resolve();
  }

  close(): void {
    this.closed += 1;
  }

  kinds(): RecordedEvent['kind'][] {
    return this.events.map((event) => event.kind);
  }
}

/**
 * EventSink whose writes never settle, like a peer that stopped reading.
 */
export class StalledSink implements EventSink {
  writes = 0;
  closed = 0;

  write(): Promise<void> {
    this.writes += 1;
    return new Promise(() => undefined);
  }

  keepalive(): Promise<void> {
    this.writes += 1;
    return new Promise(() => undefined);
  }

  close(): void {
    this.closed += 1;
  }
}
