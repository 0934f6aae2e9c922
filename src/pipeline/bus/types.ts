/**
 * Publish/subscribe contract used for both work dispatch and completion
 * notification. Delivery is at-least-once, so every handler must be
 * idempotent.
 */

export type PartitionedMessage = {
  /** Partition key; per-request order is preserved within a consumer group. */
  requestId: string;
};

export type DeliveryMeta = {
  topic: string;
  offset: number;
  /** 1 on first delivery, incremented on every redelivery. */
  deliveryAttempt: number;
  group: string;
  memberId: string;
};

export type MessageHandler<T> = (message: T, meta: DeliveryMeta) => void | Promise<void>;

export type SubscribeOptions<T> = {
  /** Exact topics, or a prefix ending in ".*" (e.g. "pipeline.result.*"). */
  topics: string[];
  group: string;
  handler: MessageHandler<T>;
  memberId?: string;
};

export interface Subscription {
  readonly group: string;
  readonly memberId: string;
  unsubscribe(): void;
}

export type RetainedMessage<T> = {
  topic: string;
  offset: number;
  publishedAt: string;
  message: T;
};

export type DeadLetter<T> = RetainedMessage<T> & {
  group: string;
  deliveryAttempts: number;
  lastError: string;
};

export interface EventBus<T extends PartitionedMessage> {
  /** Returns the offset of the message in its topic log. */
  publish(topic: string, message: T): Promise<number>;
  subscribe(options: SubscribeOptions<T>): Subscription;
  /** Retained messages of a topic, from `fromOffset` (inclusive). */
  replay(topic: string, fromOffset?: number): RetainedMessage<T>[];
  deadLetters(group?: string): DeadLetter<T>[];
  /** Resolves once no delivery is pending or running. */
  drain(): Promise<void>;
  close(): Promise<void>;
}
