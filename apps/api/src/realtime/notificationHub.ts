import type { OverflowPolicy } from "../config/env.js";
import type { NotificationRecord } from "../data/repositories/notificationRepository.js";
import { log } from "../logger.js";

export type NotificationFilter = (record: NotificationRecord) => boolean;

export type HubOptions = {
  bufferSize: number;
  overflowPolicy: OverflowPolicy;
};

export type SubscribeOptions = {
  filter?: NotificationFilter;
  /** Shown in overflow logs; usually the subscriber's subject id. */
  label?: string;
};

type OfferOutcome = "delivered" | "filtered" | "dropped" | "closed";

export type PublishResult = {
  delivered: number;
  dropped: number;
  closed: number;
};

export class PublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PublishError";
  }
}

/**
 * One subscriber's channel. Records wait in a bounded buffer until the
 * consumer pulls them; the hub never waits on a consumer.
 */
export class NotificationSubscription implements AsyncIterable<NotificationRecord> {
  private readonly buffer: NotificationRecord[] = [];
  private waiter: ((result: IteratorResult<NotificationRecord>) => void) | null = null;
  private readonly closeListeners = new Set<() => void>();
  private cancelled = false;

  constructor(
    private readonly options: HubOptions,
    private readonly filter: NotificationFilter,
    private readonly detach: (subscription: NotificationSubscription) => void,
    readonly label?: string
  ) {}

  get isClosed(): boolean {
    return this.cancelled;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  offer(record: NotificationRecord): OfferOutcome {
    if (this.cancelled) return "closed";
    if (!this.filter(record)) return "filtered";

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: record, done: false });
      return "delivered";
    }

    if (this.buffer.length >= this.options.bufferSize) {
      if (this.options.overflowPolicy === "close-subscriber") {
        this.cancel();
        return "closed";
      }
      this.buffer.shift();
      this.buffer.push(record);
      return "dropped";
    }

    this.buffer.push(record);
    return "delivered";
  }

  next(): Promise<IteratorResult<NotificationRecord>> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) return Promise.resolve({ value: buffered, done: false });
    if (this.cancelled) return Promise.resolve({ value: undefined, done: true });
    if (this.waiter) {
      return Promise.reject(new Error("Subscription already has a pending read"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Calls `listener` once when the subscription is cancelled, straight away if
   * it already is. Returns a function that removes the listener.
   */
  onClose(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /** Detaches from the hub. Safe to call more than once. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.buffer.length = 0;
    this.detach(this);
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ value: undefined, done: true });
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) listener();
  }

  [Symbol.asyncIterator](): AsyncIterator<NotificationRecord> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      }
    };
  }
}

/**
 * Process-wide multicast of newly persisted notifications. Created once at
 * startup and closed on shutdown; passed explicitly to whoever needs it.
 */
export class NotificationHub {
  private readonly subscribers = new Set<NotificationSubscription>();
  private closed = false;

  constructor(private readonly options: HubOptions) {
    if (!Number.isInteger(options.bufferSize) || options.bufferSize <= 0) {
      throw new Error("bufferSize must be a positive integer");
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // No replay: a new subscription only sees records published after this call.
  subscribe(opts: SubscribeOptions = {}): NotificationSubscription {
    if (this.closed) throw new PublishError("Broadcast hub is closed");
    const subscription = new NotificationSubscription(
      this.options,
      opts.filter ?? (() => true),
      (sub) => {
        this.subscribers.delete(sub);
      },
      opts.label
    );
    this.subscribers.add(subscription);
    return subscription;
  }

  publish(record: NotificationRecord): PublishResult {
    if (this.closed) throw new PublishError("Broadcast hub is closed");

    const result: PublishResult = { delivered: 0, dropped: 0, closed: 0 };
    // Snapshot: close-subscriber overflow detaches while we iterate.
    for (const subscription of [...this.subscribers]) {
      const outcome = subscription.offer(record);
      if (outcome === "filtered") continue;
      if (outcome === "delivered") {
        result.delivered += 1;
        continue;
      }
      result[outcome] += 1;
      log({
        level: "error",
        msg: "notification_publish_overflow",
        sequence_id: record.sequence_id,
        recipient_id: record.user_id,
        subscriber: subscription.label,
        policy: this.options.overflowPolicy,
        buffer_size: this.options.bufferSize,
        outcome
      });
    }
    return result;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const subscription of [...this.subscribers]) {
      subscription.cancel();
    }
  }
}
