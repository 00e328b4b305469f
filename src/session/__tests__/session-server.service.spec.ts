import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SessionServerService } from '../session-server.service';
import { SessionRateLimiterService } from '../session-rate-limiter.service';
import { IDENTITY_RESOLVER } from '../../accounts/accounts.tokens';
import { ThreadStoreService } from '../../threads/thread-store.service';
import { MessageDeliveryService } from '../../ingestion/message-delivery.service';
import { buildAccount } from '../../../test/helpers/accounts';
import { LineClient } from '../../../test/helpers/line-client';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('SessionServerService', () => {
  let server: SessionServerService;
  let delivery: { deliver: jest.Mock };
  let clients: LineClient[];
  let restoreLogger: () => void;

  async function createServer(session: Record<string, unknown> = {}): Promise<SessionServerService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionServerService,
        SessionRateLimiterService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            postline: {
              main: { serverHost: 'postline.test' },
              session: { host: '127.0.0.1', port: 0, banner: 'Test ready', listLimit: 20, ...session },
              sessionRateLimit: { enabled: false, points: 1, duration: 60 },
            },
          }),
        },
        {
          provide: IDENTITY_RESOLVER,
          useValue: {
            authenticate: jest.fn((username: string, password: string) =>
              Promise.resolve(username === 'alice' && password === 'password123' ? buildAccount(1, 'alice') : undefined),
            ),
            resolveAddress: jest.fn(),
            getById: jest.fn(),
          },
        },
        { provide: ThreadStoreService, useValue: { getInboxRoots: jest.fn().mockReturnValue([]), markRead: jest.fn() } },
        { provide: MessageDeliveryService, useValue: delivery },
      ],
    }).compile();

    const service = module.get<SessionServerService>(SessionServerService);
    await service.start();
    return service;
  }

  async function open(): Promise<LineClient> {
    const port = server.getListeningPort();
    if (port === undefined) {
      throw new Error('server is not listening');
    }
    const client = await LineClient.connect(port);
    clients.push(client);
    return client;
  }

  beforeEach(() => {
    restoreLogger = silenceNestLogger(['log', 'warn', 'error', 'debug']);
    delivery = { deliver: jest.fn().mockResolvedValue({ message: { id: 9 }, local: true, warnings: [] }) };
    clients = [];
  });

  afterEach(async () => {
    clients.forEach((client) => client.destroy());
    await server.stop();
    restoreLogger();
  });

  it('should listen on an ephemeral port', async () => {
    server = await createServer();

    expect(server.isListening()).toBe(true);
    expect(server.getListeningPort()).toBeGreaterThan(0);
  });

  it('should run a full session over TCP', async () => {
    server = await createServer();
    const client = await open();

    expect(await client.readLine()).toBe('220 Test ready');

    client.send('CONNECT alice password123');
    client.send('SEND bob@postline.test');
    client.send('SUBJECT Hi');
    client.send('BODY Hello there');
    client.send('QUIT');

    expect(await client.readLines(5)).toEqual([
      '250 Hello alice',
      '250 Recipient set to bob@postline.test',
      '250 Subject set',
      '250 9',
      '221 Goodbye',
    ]);
    await client.closed;
    expect(delivery.deliver).toHaveBeenCalledTimes(1);
  });

  it('should refuse connections beyond the limit', async () => {
    server = await createServer({ maxConnections: 1 });
    const first = await open();
    expect(await first.readLine()).toBe('220 Test ready');

    const second = await open();

    expect(await second.readLine()).toBe('421 Too many connections, try again later');
    await second.closed;
    expect(server.connectionCount).toBe(1);
  });

  it('should close idle connections', async () => {
    server = await createServer({ idleTimeout: 50 });
    const client = await open();

    expect(await client.readLines(2)).toEqual(['220 Test ready', '421 Idle timeout, closing connection']);
    await client.closed;
  });

  it('should stop listening on stop', async () => {
    server = await createServer();
    await server.stop();

    expect(server.isListening()).toBe(false);
    expect(server.getListeningPort()).toBeUndefined();
  });
});
