import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createServer } from 'net';
import type { AddressInfo, Server, Socket } from 'net';
import { createInterface } from 'readline';
import { IDENTITY_RESOLVER } from '../accounts/accounts.tokens';
import type { IdentityResolver } from '../accounts/interfaces';
import { ThreadStoreService } from '../threads/thread-store.service';
import { MessageDeliveryService } from '../ingestion/message-delivery.service';
import { normalizeIp } from '../shared/ip.utils';
import { getErrorMessage, getErrorStack } from '../shared/error.utils';
import {
  DEFAULT_SERVER_HOST,
  DEFAULT_SESSION_BANNER,
  DEFAULT_SESSION_HOST,
  DEFAULT_SESSION_IDLE_TIMEOUT,
  DEFAULT_SESSION_LIST_LIMIT,
  DEFAULT_SESSION_MAX_CONNECTIONS,
  DEFAULT_SESSION_PORT,
} from '../config/config.constants';
import { ProtocolSession } from './protocol-session';
import { RateLimitExceededError, SessionRateLimiterService } from './session-rate-limiter.service';
import type { SessionContext, SessionTransport } from './interfaces';

interface SessionServerConfig {
  host: string;
  port: number;
  maxConnections: number;
  idleTimeout: number;
}

/**
 * TCP listener for the line protocol. Each socket gets its own
 * `ProtocolSession`; its lines are processed strictly one after another.
 */
@Injectable()
export class SessionServerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionServerService.name);
  private readonly config: SessionServerConfig;
  private readonly context: SessionContext;
  private readonly sockets = new Set<Socket>();
  private server?: Server;
  private listeningPort?: number;

  /* v8 ignore next 8 - false positive on constructor parameter properties */
  constructor(
    configService: ConfigService,
    @Inject(IDENTITY_RESOLVER) identityResolver: IdentityResolver,
    threadStore: ThreadStoreService,
    delivery: MessageDeliveryService,
    private readonly rateLimiter: SessionRateLimiterService,
  ) {
    this.config = {
      host: configService.get<string>('postline.session.host', DEFAULT_SESSION_HOST),
      port: configService.get<number>('postline.session.port', DEFAULT_SESSION_PORT),
      maxConnections: configService.get<number>('postline.session.maxConnections', DEFAULT_SESSION_MAX_CONNECTIONS),
      idleTimeout: configService.get<number>('postline.session.idleTimeout', DEFAULT_SESSION_IDLE_TIMEOUT),
    };
    this.context = {
      serverHost: configService.get<string>('postline.main.serverHost', DEFAULT_SERVER_HOST),
      banner: configService.get<string>('postline.session.banner', DEFAULT_SESSION_BANNER),
      listLimit: configService.get<number>('postline.session.listLimit', DEFAULT_SESSION_LIST_LIMIT),
      identityResolver,
      delivery,
      inbox: threadStore,
      rateLimiter,
    };
  }

  async onModuleInit(): Promise<void> {
    await this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((socket) => this.handleConnection(socket));
    server.on('error', (error) => {
      this.logger.error(`Session server error: ${error.message}`, error.stack);
    });

    await this.listen(server);
    this.server = server;
    this.listeningPort = this.resolveListeningPort(server.address());

    this.logger.log(
      `Session server listening on ${this.config.host}:${this.listeningPort ?? this.config.port} ` +
        `(maxConnections=${this.config.maxConnections}, idleTimeout=${this.config.idleTimeout}ms)`,
    );
  }

  /**
   * Stops accepting connections and closes the open ones.
   */
  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = undefined;
    this.listeningPort = undefined;

    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    for (const socket of this.sockets) {
      socket.end('421 Server shutting down\r\n', () => socket.destroy());
    }

    try {
      await closed;
    } catch (error) {
      this.logger.error(`Error shutting down session server: ${getErrorMessage(error)}`, getErrorStack(error));
      throw error;
    }

    this.logger.log('Session server shut down cleanly.');
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  getListeningPort(): number | undefined {
    return this.listeningPort;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  private handleConnection(socket: Socket): void {
    const ip = normalizeIp(socket.remoteAddress) ?? 'unknown';

    socket.on('error', (error) => {
      this.logger.debug(`Socket error from ${ip}: ${error.message}`);
    });

    if (this.sockets.size >= this.config.maxConnections) {
      this.logger.warn(`Refusing connection from ${ip}: ${this.sockets.size} connections open`);
      socket.end('421 Too many connections, try again later\r\n');
      return;
    }

    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));

    this.runSession(socket, ip).catch((error: unknown) => {
      this.logger.error(`Session from ${ip} failed: ${getErrorMessage(error)}`, getErrorStack(error));
      socket.destroy();
    });
  }

  private async runSession(socket: Socket, ip: string): Promise<void> {
    socket.setEncoding('utf8');

    const transport: SessionTransport = {
      remoteAddress: ip,
      write: (chunk) => {
        if (socket.writable) {
          socket.write(chunk);
        }
      },
      close: () => {
        socket.end();
      },
    };
    const session = new ProtocolSession(transport, this.context);

    try {
      await this.rateLimiter.consume('connection', ip);
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        session.close(`${error.responseCode} ${error.message}`);
        return;
      }
      throw error;
    }

    this.logger.log(`Session opened from ${ip}`);

    if (this.config.idleTimeout > 0) {
      socket.setTimeout(this.config.idleTimeout, () => {
        this.logger.log(`Closing idle session from ${ip}`);
        session.close('421 Idle timeout, closing connection');
      });
    }

    session.greet();

    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    let linesClosed = false;
    const closeLines = () => {
      if (!linesClosed) {
        linesClosed = true;
        lines.close();
      }
    };
    socket.once('close', closeLines);

    try {
      for await (const line of lines) {
        await session.handleLine(line);
        if (session.closed) {
          break;
        }
      }
    } finally {
      closeLines();
      session.close();
      this.logger.log(`Session from ${ip} closed`);
    }
  }

  private listen(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      server.once('error', onError);
      server.listen(this.config.port, this.config.host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });
  }

  private resolveListeningPort(address: AddressInfo | string | null): number | undefined {
    if (!address || typeof address === 'string') {
      return undefined;
    }
    return address.port;
  }
}
