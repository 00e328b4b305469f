import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { IDENTITY_RESOLVER } from '../accounts/accounts.tokens';
import type { IdentityResolver } from '../accounts/interfaces';
import { ThreadStoreService } from '../threads/thread-store.service';
import { MESSAGE_STORED_EVENT, MessageStoredPayload } from '../threads/thread.events';
import { RelayClientService } from '../relay/relay-client.service';
import { parseAddress } from '../shared/address.utils';
import { AddressValidationError } from './ingestion.errors';
import type { DeliveryOutcome, MessageSubmission } from './interfaces';

/**
 * Single delivery pipeline for the session protocol, the send endpoint and
 * inbound relay: validate, resolve, persist, then notify or relay.
 */
@Injectable()
export class MessageDeliveryService {
  private readonly logger = new Logger(MessageDeliveryService.name);

  /* v8 ignore next 6 - false positive on constructor parameter properties */
  constructor(
    @Inject(IDENTITY_RESOLVER) private readonly identityResolver: IdentityResolver,
    private readonly threadStore: ThreadStoreService,
    private readonly relayClient: RelayClientService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * @throws {AddressValidationError} When the recipient is not `local@domain`
   * @throws {PersistenceError} When the message cannot be stored
   */
  async deliver(submission: MessageSubmission): Promise<DeliveryOutcome> {
    const toAddress = submission.toAddress.trim();
    const address = parseAddress(toAddress);
    if (!address) {
      throw new AddressValidationError(submission.toAddress);
    }

    const recipient = this.identityResolver.resolveAddress(toAddress);

    const message = this.threadStore.createMessage({
      fromAccountId: submission.fromAccountId,
      toAccountId: recipient?.id,
      fromAddress: submission.fromAddress,
      toAddress,
      subject: submission.subject,
      body: submission.body,
      isHtml: submission.isHtml ?? false,
      threadId: submission.threadId,
      parentId: submission.parentId,
    });

    this.logger.log(`Stored message ${message.id} from ${message.fromAddress} to ${message.toAddress}`);

    if (recipient) {
      const payload: MessageStoredPayload = { message, recipientAccountId: recipient.id };
      this.eventEmitter.emit(MESSAGE_STORED_EVENT, payload);
      return { message, local: true, warnings: [] };
    }

    const warnings: string[] = [];
    const relay = await this.relayClient.sendMessage(
      message.fromAddress,
      message.toAddress,
      message.subject,
      message.body,
      address.domain,
    );
    if (!relay.delivered) {
      warnings.push(`Relay to ${address.domain} failed: ${relay.error ?? 'unknown error'}`);
    }

    return { message, local: false, warnings };
  }
}
