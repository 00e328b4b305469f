import { Test, TestingModule } from '@nestjs/testing';
import type { NestExpressApplication } from '@nestjs/platform-express';
import type { AddressInfo } from 'net';
import request from 'supertest';
import type { App } from 'supertest/types';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { SessionServerService } from '../../src/session/session-server.service';
import { RelayClientService } from '../../src/relay/relay-client.service';

export interface BootstrappedApp {
  moduleRef: TestingModule;
  app: NestExpressApplication;
  httpServer: App;
  httpPort: number;
  sessionPort: number;
  relayClient: { sendMessage: jest.Mock };
}

/**
 * Boots the whole application against the `.env.test` settings
 * (in-memory database, ephemeral ports) with a stubbed relay client.
 */
export async function bootstrapTestApp(): Promise<BootstrappedApp> {
  // Relay never leaves the process
  const relayClient = {
    sendMessage: jest.fn().mockResolvedValue({ delivered: false, error: 'connect ECONNREFUSED' }),
  };

  const moduleRef = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(RelayClientService)
    .useValue(relayClient)
    .compile();

  const app = moduleRef.createNestApplication<NestExpressApplication>();
  configureApp(app);
  await app.init();

  // Listen on an ephemeral port for the event stream tests
  await app.listen(0, '127.0.0.1');

  const address: AddressInfo | string | null = app.getHttpServer().address();
  const sessionPort = app.get(SessionServerService).getListeningPort();
  if (!address || typeof address === 'string' || sessionPort === undefined) {
    throw new Error('Test application did not bind its ports');
  }

  return { moduleRef, app, httpServer: app.getHttpServer(), httpPort: address.port, sessionPort, relayClient };
}

export async function shutdownTestApp(instance: BootstrappedApp | undefined): Promise<void> {
  if (!instance) {
    return;
  }
  await instance.app.close();
}

/**
 * Registers an account and returns its bearer token.
 */
export async function registerAndLogin(httpServer: App, username: string, password = 'password123'): Promise<string> {
  await request(httpServer)
    .post('/api/register')
    .send({ username, email: `${username}@example.com`, password })
    .expect(201);

  const login = await request(httpServer).post('/api/login').send({ username, password }).expect(200);
  const token: unknown = login.body.token;
  if (typeof token !== 'string') {
    throw new Error(`Login for ${username} returned no token`);
  }
  return token;
}
