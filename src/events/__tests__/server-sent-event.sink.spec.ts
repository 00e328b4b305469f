import type { Response } from 'express';
import { ServerSentEventSink } from '../server-sent-event.sink';

describe('ServerSentEventSink', () => {
  let written: string[];
  let response: {
    status: jest.Mock;
    setHeader: jest.Mock;
    flushHeaders: jest.Mock;
    write: jest.Mock;
    end: jest.Mock;
    writableEnded: boolean;
    destroyed: boolean;
  };
  let sink: ServerSentEventSink;

  beforeEach(() => {
    written = [];
    response = {
      status: jest.fn(),
      setHeader: jest.fn(),
      flushHeaders: jest.fn(),
      write: jest.fn((chunk: string, callback: (error?: Error | null) => void) => {
        written.push(chunk);
        callback();
        return true;
      }),
      end: jest.fn(() => {
        response.writableEnded = true;
      }),
      writableEnded: false,
      destroyed: false,
    };
    sink = new ServerSentEventSink(response as unknown as Response);
  });

  it('should send event-stream headers immediately', () => {
    expect(response.status).toHaveBeenCalledWith(200);
    expect(response.setHeader).toHaveBeenCalledWith('Content-Type', 'text/event-stream');
    expect(response.setHeader).toHaveBeenCalledWith('Cache-Control', 'no-cache');
    expect(response.flushHeaders).toHaveBeenCalled();
  });

  it('should frame events with their name and JSON data', async () => {
    await sink.write('unread-count', { count: 2 });

    expect(written).toEqual(['event: unread-count\ndata: {"count":2}\n\n']);
  });

  it('should write keepalives as comments', async () => {
    await sink.keepalive();

    expect(written).toEqual([': ping\n\n']);
  });

  it('should reject when the transport reports an error', async () => {
    response.write.mockImplementation((_chunk: string, callback: (error?: Error | null) => void) => {
      callback(new Error('EPIPE'));
      return false;
    });

    await expect(sink.keepalive()).rejects.toThrow('EPIPE');
  });

  it('should reject writes after the response is destroyed', async () => {
    response.destroyed = true;

    await expect(sink.write('connected', { message: 'hi' })).rejects.toThrow('Event stream is closed');
    expect(response.write).not.toHaveBeenCalled();
  });

  it('should end the response once', () => {
    sink.close();
    sink.close();

    expect(response.end).toHaveBeenCalledTimes(1);
  });
});
