import { randomUUID } from 'crypto';
import type { EventSink, Subscription } from './interfaces';

type DeliveryTask = (sink: EventSink) => Promise<void>;

/**
 * @class HubSubscription
 * @description A subscription with its own delivery queue. Tasks run one at a
 * time in the order they were enqueued, so a subscriber sees its events in
 * generation order while other subscribers proceed independently.
 */
export class HubSubscription implements Subscription {
  readonly id = randomUUID();
  lastSeenAt = new Date();
  closed = false;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(
    readonly accountId: number,
    readonly sink: EventSink,
  ) {}

  /**
   * @method enqueue
   * @description Runs the task after every earlier task has settled. The
   * returned promise carries the task's own outcome; tasks enqueued after a
   * closed subscription resolve without touching the sink.
   */
  enqueue(task: DeliveryTask): Promise<void> {
    this.queued += 1;
    const run = this.tail.then(() => (this.closed ? undefined : task(this.sink)));
    // The next task waits for this one whatever its outcome; failures reach the caller through `run`
    this.tail = run.then(
      () => {
        this.queued -= 1;
      },
      () => {
        this.queued -= 1;
      },
    );
    return run;
  }

  /** Tasks enqueued and not yet settled, including the running one */
  get pending(): number {
    return this.queued;
  }
}

/**
 * @class SubscriberRegistry
 * @description Account id to live subscriptions. Mutation is synchronous, so
 * it cannot interleave with enumeration on the event loop; callers that do I/O
 * work on the arrays returned by `snapshot`.
 */
export class SubscriberRegistry {
  private readonly byAccount = new Map<number, Map<string, HubSubscription>>();

  add(subscription: HubSubscription): void {
    let subscriptions = this.byAccount.get(subscription.accountId);
    if (!subscriptions) {
      subscriptions = new Map();
      this.byAccount.set(subscription.accountId, subscriptions);
    }
    subscriptions.set(subscription.id, subscription);
  }

  /**
   * @method remove
   * @description Drops the subscription and, with it, the account entry when
   * it was the last one. Returns false when it was already gone.
   */
  remove(accountId: number, subscriptionId: string): boolean {
    const subscriptions = this.byAccount.get(accountId);
    if (!subscriptions?.delete(subscriptionId)) {
      return false;
    }
    if (subscriptions.size === 0) {
      this.byAccount.delete(accountId);
    }
    return true;
  }

  get(accountId: number, subscriptionId: string): HubSubscription | undefined {
    return this.byAccount.get(accountId)?.get(subscriptionId);
  }

  snapshot(accountId: number): HubSubscription[] {
    return Array.from(this.byAccount.get(accountId)?.values() ?? []);
  }

  snapshotAll(): HubSubscription[] {
    return Array.from(this.byAccount.values()).flatMap((subscriptions) => Array.from(subscriptions.values()));
  }

  hasAccount(accountId: number): boolean {
    return this.byAccount.has(accountId);
  }

  get size(): number {
    let total = 0;
    for (const subscriptions of this.byAccount.values()) {
      total += subscriptions.size;
    }
    return total;
  }
}
