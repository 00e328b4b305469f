import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { OnEvent } from '@nestjs/event-emitter';
import { catchError, firstValueFrom, from, map, of, timeout } from 'rxjs';
import { ThreadStoreService } from '../threads/thread-store.service';
import { MESSAGE_STORED_EVENT, MessageStoredPayload } from '../threads/thread.events';
import type { Message } from '../threads/interfaces';
import { DEFAULT_HUB_KEEPALIVE_INTERVAL, DEFAULT_HUB_WRITE_TIMEOUT } from '../config/config.constants';
import { getErrorMessage } from '../shared/error.utils';
import { HubSubscription, SubscriberRegistry } from './subscriber-registry';
import type { EventSink, HubEventKind, HubEventPayloads, Subscription } from './interfaces';

export const KEEPALIVE_INTERVAL_NAME = 'delivery-hub-keepalive';

/** Deliveries a subscription may have queued before it is treated as stalled */
export const MAX_PENDING_DELIVERIES = 100;

/** Keepalive intervals without a successful write before a subscription is evicted */
export const STALE_AFTER_INTERVALS = 2;

/**
 * @class DeliveryHubService
 * @description Per-account fan-out of live events to open connections.
 *
 * `notify` snapshots the account's subscriptions and hands the event to each
 * subscription's own queue, then returns. A failed write, whether an event or
 * a keepalive, goes through `unsubscribe` like an explicit disconnect. So do
 * a write that outlives `hub.writeTimeout`, a queue longer than
 * `MAX_PENDING_DELIVERIES`, and a sweep that finds no successful write in
 * `STALE_AFTER_INTERVALS` keepalive intervals.
 * Deliveries in flight are tracked so shutdown can wait for them, for at most
 * one write timeout.
 */
@Injectable()
export class DeliveryHubService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DeliveryHubService.name);
  private readonly registry = new SubscriberRegistry();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly keepaliveInterval: number;
  private readonly writeTimeout: number;

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly threadStore: ThreadStoreService,
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.keepaliveInterval = this.configService.get<number>(
      'postline.hub.keepaliveInterval',
      DEFAULT_HUB_KEEPALIVE_INTERVAL,
    );
    this.writeTimeout = this.configService.get<number>('postline.hub.writeTimeout', DEFAULT_HUB_WRITE_TIMEOUT);
  }

  onModuleInit(): void {
    const interval = setInterval(() => this.sweep(), this.keepaliveInterval);
    this.schedulerRegistry.addInterval(KEEPALIVE_INTERVAL_NAME, interval);
    this.logger.log(`Keepalive sweep scheduled every ${this.keepaliveInterval}ms`);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.schedulerRegistry.doesExist('interval', KEEPALIVE_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(KEEPALIVE_INTERVAL_NAME);
    }

    if (!(await this.drain(this.writeTimeout))) {
      this.logger.warn(`Shutting down with ${this.inFlight.size} live deliveries still pending`);
    }

    const remaining = this.registry.snapshotAll();
    for (const subscription of remaining) {
      this.unsubscribe(subscription);
    }
    if (remaining.length > 0) {
      this.logger.log(`Closed ${remaining.length} live connection(s) on shutdown`);
    }
  }

  /**
   * @method subscribe
   * @description Registers a sink for the account. The caller keeps the handle
   * for the life of its connection.
   */
  subscribe(accountId: number, sink: EventSink): Subscription {
    const subscription = new HubSubscription(accountId, sink);
    this.registry.add(subscription);
    this.logger.debug(`Subscription ${subscription.id} opened for account ${accountId}`);
    return subscription;
  }

  /**
   * @method unsubscribe
   * @description Idempotent. Drops the account entry with its last subscription.
   */
  unsubscribe(subscription: Subscription): void {
    const registered = this.registry.get(subscription.accountId, subscription.id);
    if (!registered || registered.closed) {
      return;
    }

    registered.closed = true;
    this.registry.remove(registered.accountId, registered.id);
    registered.sink.close();
    this.logger.debug(`Subscription ${registered.id} closed for account ${registered.accountId}`);
  }

  /**
   * @method notify
   * @description Queues the event for every current subscription of the account.
   */
  notify<K extends HubEventKind>(accountId: number, kind: K, payload: HubEventPayloads[K]): void {
    for (const subscription of this.registry.snapshot(accountId)) {
      this.deliver(subscription, (sink) => sink.write(kind, payload));
    }
  }

  /**
   * @method send
   * @description Queues an event for a single subscription, e.g. the handshake.
   */
  send<K extends HubEventKind>(subscription: Subscription, kind: K, payload: HubEventPayloads[K]): void {
    const registered = this.registry.get(subscription.accountId, subscription.id);
    if (registered) {
      this.deliver(registered, (sink) => sink.write(kind, payload));
    }
  }

  /**
   * @method notifyNewMessage
   * @description `new-message` followed by a freshly computed `unread-count`
   * for the recipient. Messages without a local recipient are ignored.
   */
  notifyNewMessage(message: Message): void {
    const accountId = message.toAccountId;
    if (accountId === null || !this.registry.hasAccount(accountId)) {
      return;
    }

    this.notify(accountId, 'new-message', message);

    try {
      this.notify(accountId, 'unread-count', { count: this.threadStore.unreadCount(accountId) });
    } catch (error) {
      this.logger.warn(`Unread count for account ${accountId} unavailable: ${getErrorMessage(error)}`);
    }
  }

  @OnEvent(MESSAGE_STORED_EVENT)
  handleMessageStored(payload: MessageStoredPayload): void {
    this.notifyNewMessage(payload.message);
  }

  /**
   * @method sweep
   * @description Evicts subscriptions with no successful write for
   * `STALE_AFTER_INTERVALS` keepalive intervals and probes the rest.
   */
  sweep(): void {
    const staleBefore = Date.now() - this.keepaliveInterval * STALE_AFTER_INTERVALS;

    for (const subscription of this.registry.snapshotAll()) {
      if (subscription.lastSeenAt.getTime() < staleBefore) {
        this.logger.debug(
          `Evicting subscription ${subscription.id}: no successful write since ${subscription.lastSeenAt.toISOString()}`,
        );
        this.unsubscribe(subscription);
        continue;
      }
      this.deliver(subscription, (sink) => sink.keepalive());
    }
  }

  /**
   * @method drain
   * @description Resolves true once every delivery queued so far has settled,
   * or false when `timeoutMs` elapses first.
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    const settled = this.settleInFlight();
    if (timeoutMs === undefined) {
      await settled;
      return true;
    }

    return firstValueFrom(
      from(settled).pipe(
        timeout(timeoutMs),
        map(() => true),
        catchError(() => of(false)),
      ),
    );
  }

  get subscriptionCount(): number {
    return this.registry.size;
  }

  private async settleInFlight(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  private deliver(subscription: HubSubscription, task: (sink: EventSink) => Promise<void>): void {
    if (subscription.pending >= MAX_PENDING_DELIVERIES) {
      this.logger.debug(`Dropping subscription ${subscription.id}: ${subscription.pending} deliveries pending`);
      this.unsubscribe(subscription);
      return;
    }

    const bounded = (sink: EventSink) => firstValueFrom(from(task(sink)).pipe(timeout(this.writeTimeout)));

    const delivery = subscription.enqueue(bounded).then(
      () => {
        subscription.lastSeenAt = new Date();
      },
      (error: unknown) => {
        this.logger.debug(`Dropping subscription ${subscription.id}: ${getErrorMessage(error)}`);
        this.unsubscribe(subscription);
      },
    );

    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }
}
