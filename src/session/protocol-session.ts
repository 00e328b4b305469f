import { Logger } from '@nestjs/common';
import type { Account } from '../accounts/interfaces';
import type { Message } from '../threads/interfaces';
import { parseAddress } from '../shared/address.utils';
import { getErrorMessage, getErrorStack } from '../shared/error.utils';
import { AddressValidationError } from '../ingestion/ingestion.errors';
import { EMPTY_COMPOSE, nextComposeState } from './compose-state';
import type { ComposeEvent, ComposeState } from './compose-state';
import { RateLimitExceededError } from './session-rate-limiter.service';
import type { SessionContext, SessionTransport } from './interfaces';

type SessionState =
  | { phase: 'unauthenticated' }
  | { phase: 'authenticated'; account: Account; compose: ComposeState }
  | { phase: 'closed' };

const HELP_LINES = [
  '214 Available commands:',
  '  CONNECT <username> <password> - Authenticate',
  '  SEND <recipient@host> - Set recipient',
  '  SUBJECT <subject> - Set message subject',
  '  BODY <body> - Set message body and send',
  '  LIST - Show inbox',
  '  READ <number> - Read specific message',
  '  HELP - Show this help',
  '  QUIT - Close connection',
];

/**
 * One connection of the line protocol. Lines must be fed one at a time,
 * awaiting each `handleLine` before the next.
 */
export class ProtocolSession {
  private readonly logger = new Logger(ProtocolSession.name);
  private state: SessionState = { phase: 'unauthenticated' };

  constructor(
    private readonly transport: SessionTransport,
    private readonly context: SessionContext,
  ) {}

  get closed(): boolean {
    return this.state.phase === 'closed';
  }

  get account(): Account | undefined {
    return this.state.phase === 'authenticated' ? this.state.account : undefined;
  }

  greet(): void {
    this.reply(`220 ${this.context.banner}`);
  }

  async handleLine(raw: string): Promise<void> {
    const line = raw.trim();
    if (this.closed || line.length === 0) {
      return;
    }

    const spaceAt = line.search(/\s/);
    const command = (spaceAt < 0 ? line : line.slice(0, spaceAt)).toUpperCase();
    const args = spaceAt < 0 ? '' : line.slice(spaceAt + 1).trim();

    this.logger.debug(`[${this.transport.remoteAddress}] ${command}`);

    switch (command) {
      case 'CONNECT':
        return this.handleConnect(args);
      case 'SEND':
        return this.handleSend(args);
      case 'SUBJECT':
        return this.handleSubject(args);
      case 'BODY':
        return this.handleBody(args);
      case 'LIST':
        return this.handleList();
      case 'READ':
        return this.handleRead(args);
      case 'HELP':
        return this.reply(...HELP_LINES);
      case 'QUIT':
        return this.close('221 Goodbye');
      default:
        return this.reply(`500 Unknown command: ${command}`);
    }
  }

  /**
   * Sends a final line, if any, and closes the transport. Safe to call twice.
   */
  close(finalLine?: string): void {
    if (this.closed) {
      return;
    }
    if (finalLine) {
      this.reply(finalLine);
    }
    this.state = { phase: 'closed' };
    this.transport.close();
  }

  private async handleConnect(args: string): Promise<void> {
    const spaceAt = args.indexOf(' ');
    const username = spaceAt < 0 ? '' : args.slice(0, spaceAt);
    const password = spaceAt < 0 ? '' : args.slice(spaceAt + 1);
    if (!username || !password) {
      return this.reply('501 Usage: CONNECT <username> <password>');
    }

    const ip = this.transport.remoteAddress;
    try {
      await this.context.rateLimiter.consume('login', ip);
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        return this.reply(`${error.responseCode} ${error.message}`);
      }
      throw error;
    }

    let account: Account | undefined;
    try {
      account = await this.context.identityResolver.authenticate(username, password);
    } catch (error) {
      this.logger.error(`Authentication lookup failed for ${username}: ${getErrorMessage(error)}`, getErrorStack(error));
    }

    if (this.closed) {
      return;
    }
    if (!account) {
      this.logger.warn(`Failed CONNECT for ${username} from ${ip}`);
      return this.reply('535 Authentication failed');
    }

    await this.context.rateLimiter.reset('login', ip);
    this.state = { phase: 'authenticated', account, compose: EMPTY_COMPOSE };
    this.logger.log(`${account.username} authenticated from ${ip}`);
    this.reply(`250 Hello ${account.username}`);
  }

  private handleSend(args: string): void {
    if (this.state.phase !== 'authenticated') {
      return this.reply('530 Not authenticated');
    }
    if (!args) {
      return this.reply('501 Usage: SEND <recipient@host>');
    }
    if (!parseAddress(args)) {
      return this.reply(`501 Invalid address: ${args}`);
    }

    this.transition({ kind: 'recipient', to: args });
    this.reply(`250 Recipient set to ${args}`);
  }

  private handleSubject(args: string): void {
    if (this.state.phase !== 'authenticated') {
      return this.reply('530 Not authenticated');
    }
    if (this.state.compose.stage === 'empty') {
      return this.reply('503 Use SEND first');
    }
    if (!args) {
      return this.reply('501 Usage: SUBJECT <text>');
    }

    this.transition({ kind: 'subject', subject: args });
    this.reply('250 Subject set');
  }

  private async handleBody(args: string): Promise<void> {
    if (this.state.phase !== 'authenticated') {
      return this.reply('530 Not authenticated');
    }

    const { account, compose } = this.state;
    if (compose.stage !== 'have-subject') {
      return this.reply('503 Use SEND and SUBJECT first');
    }

    // Cleared on success and failure alike
    this.transition({ kind: 'clear' });

    try {
      const outcome = await this.context.delivery.deliver({
        fromAccountId: account.id,
        fromAddress: `${account.username}@${this.context.serverHost}`,
        toAddress: compose.to,
        subject: compose.subject,
        body: args,
      });

      for (const warning of outcome.warnings) {
        this.logger.warn(`Message ${outcome.message.id}: ${warning}`);
      }
      this.reply(`250 ${outcome.message.id}`);
    } catch (error) {
      if (error instanceof AddressValidationError) {
        return this.reply(`501 Invalid address: ${error.address}`);
      }
      this.logger.error(`Failed to send message for ${account.username}: ${getErrorMessage(error)}`, getErrorStack(error));
      this.reply('550 Failed to send message');
    }
  }

  private handleList(): void {
    if (this.state.phase !== 'authenticated') {
      return this.reply('530 Not authenticated');
    }

    const messages = this.loadInbox(this.state.account);
    if (!messages) {
      return;
    }

    this.reply(
      `250 ${messages.length} messages`,
      ...messages.map(
        (message, index) =>
          `${index + 1}. From: ${singleLine(message.fromAddress)} | Subject: ${singleLine(message.subject)} | ` +
          `${message.isRead ? 'read' : 'unread'} | ${formatTimestamp(message.createdAt, false)}`,
      ),
    );
  }

  private handleRead(args: string): void {
    if (this.state.phase !== 'authenticated') {
      return this.reply('530 Not authenticated');
    }
    if (!args) {
      return this.reply('501 Usage: READ <message_number>');
    }

    const messages = this.loadInbox(this.state.account);
    if (!messages) {
      return;
    }

    const index = /^\d+$/.test(args) ? Number(args) : 0;
    const message = index >= 1 ? messages[index - 1] : undefined;
    if (!message) {
      return this.reply('501 Invalid message number');
    }

    try {
      this.context.inbox.markRead(message.id);
    } catch (error) {
      this.logger.error(`Failed to mark message ${message.id} read: ${getErrorMessage(error)}`, getErrorStack(error));
      return this.reply('550 Failed to retrieve messages');
    }

    this.reply(
      '250 Message content:',
      `From: ${singleLine(message.fromAddress)}`,
      `To: ${singleLine(message.toAddress)}`,
      `Subject: ${singleLine(message.subject)}`,
      `Date: ${formatTimestamp(message.createdAt, true)}`,
      '',
      ...message.body.split(/\r?\n/).map((line) => (line.startsWith('.') ? `.${line}` : line)),
      '.',
    );
  }

  private loadInbox(account: Account): Message[] | undefined {
    try {
      return this.context.inbox.getInboxRoots(account.id, this.context.listLimit, 0);
    } catch (error) {
      this.logger.error(`Failed to load inbox for ${account.username}: ${getErrorMessage(error)}`, getErrorStack(error));
      this.reply('550 Failed to retrieve messages');
      return undefined;
    }
  }

  private transition(event: ComposeEvent): void {
    if (this.state.phase !== 'authenticated') {
      return;
    }
    const compose = nextComposeState(this.state.compose, event);
    if (compose) {
      this.state = { ...this.state, compose };
    }
  }

  private reply(...lines: string[]): void {
    if (this.closed) {
      return;
    }
    this.transport.write(lines.map((line) => `${line}\r\n`).join(''));
  }
}

function singleLine(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

/** `YYYY-MM-DD HH:MM`, or with seconds, in UTC */
function formatTimestamp(iso: string, withSeconds: boolean): string {
  return iso.replace('T', ' ').slice(0, withSeconds ? 19 : 16);
}
