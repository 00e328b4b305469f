import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FederationController } from '../federation.controller';
import { MessageDeliveryService } from '../message-delivery.service';
import { IDENTITY_RESOLVER } from '../../accounts/accounts.tokens';
import { buildAccount } from '../../../test/helpers/accounts';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('FederationController', () => {
  let controller: FederationController;
  let delivery: { deliver: jest.Mock };
  let identityResolver: { resolveAddress: jest.Mock };
  const restoreLogger = silenceNestLogger(['log', 'warn']);

  afterAll(() => restoreLogger());

  const relayed = {
    from: 'eve@remote-host',
    to: 'bob@postline.test',
    subject: 'Hello',
    body: 'From afar',
    timestamp: '2024-03-01T10:00:00.000Z',
  };

  beforeEach(async () => {
    delivery = { deliver: jest.fn().mockResolvedValue({ message: { id: 21 }, local: true, warnings: [] }) };
    identityResolver = { resolveAddress: jest.fn().mockReturnValue(buildAccount(2, 'bob')) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [FederationController],
      providers: [
        { provide: MessageDeliveryService, useValue: delivery },
        { provide: IDENTITY_RESOLVER, useValue: identityResolver },
        { provide: ConfigService, useValue: new ConfigService({ postline: { main: { serverHost: 'postline.test' } } }) },
      ],
    }).compile();

    controller = module.get<FederationController>(FederationController);
  });

  it('should store relayed mail without a sender account', async () => {
    await expect(controller.relay(relayed)).resolves.toEqual({ success: true, status: 'delivered', id: 21 });

    expect(delivery.deliver).toHaveBeenCalledWith({
      fromAddress: 'eve@remote-host',
      toAddress: 'bob@postline.test',
      subject: 'Hello',
      body: 'From afar',
    });
  });

  it('should reject recipients on other domains', async () => {
    const error: unknown = await controller.relay({ ...relayed, to: 'bob@elsewhere' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error instanceof BadRequestException && error.getResponse()).toMatchObject({
      error: 'recipient_not_on_server',
    });
    expect(delivery.deliver).not.toHaveBeenCalled();
  });

  it('should report unknown local users', async () => {
    identityResolver.resolveAddress.mockReturnValue(undefined);

    const error: unknown = await controller.relay(relayed).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundException);
    expect(error instanceof NotFoundException && error.getResponse()).toMatchObject({ error: 'user_not_found' });
  });

  it('should reject malformed recipients', async () => {
    const error: unknown = await controller.relay({ ...relayed, to: 'nobody' }).catch((e: unknown) => e);

    expect(error instanceof BadRequestException && error.getResponse()).toMatchObject({ error: 'invalid_email' });
  });
});
