import crypto from "node:crypto";
import { createLogger, type Logger } from "../logger.js";
import { topicMatches } from "./topics.js";
import type {
  DeadLetter,
  EventBus,
  PartitionedMessage,
  RetainedMessage,
  SubscribeOptions,
  Subscription
} from "./types.js";

export type InMemoryEventBusOptions = {
  /** Deliveries of one message before it is dead-lettered. */
  maxDeliveryAttempts?: number;
  /** Retained messages per topic; older ones are dropped from the log. */
  retentionLimit?: number;
  logger?: Logger;
  /** Clock for `publishedAt`. */
  now?: () => number;
};

type Member<T> = {
  memberId: string;
  topics: string[];
  handler: SubscribeOptions<T>["handler"];
};

type Pending<T> = RetainedMessage<T> & { deliveries: number };

type Partition<T> = {
  key: string;
  queue: Pending<T>[];
  running: boolean;
};

type Group<T> = {
  name: string;
  members: Member<T>[];
  partitions: Map<string, Partition<T>>;
};

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * FNV-1a; stable member choice for a partition key.
 */
function hashKey(key: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * In-process transport with broker-like semantics:
 * - each consumer group sees every message published after it subscribed
 * - inside a group, messages are partitioned by requestId and handled in
 *   order, one at a time per partition
 * - a throwing handler gets the same message again, up to
 *   maxDeliveryAttempts, then the message is dead-lettered
 */
export class InMemoryEventBus<T extends PartitionedMessage> implements EventBus<T> {
  private readonly maxDeliveryAttempts: number;
  private readonly retentionLimit: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly logs = new Map<string, RetainedMessage<T>[]>();
  private readonly nextOffset = new Map<string, number>();
  private readonly groups = new Map<string, Group<T>>();
  private readonly dead: DeadLetter<T>[] = [];
  private readonly active = new Set<Promise<void>>();
  private closed = false;

  constructor(options: InMemoryEventBusOptions = {}) {
    this.maxDeliveryAttempts = options.maxDeliveryAttempts ?? 5;
    this.retentionLimit = options.retentionLimit ?? 10_000;
    this.logger = options.logger ?? createLogger("bus");
    this.now = options.now ?? Date.now;
    if (this.maxDeliveryAttempts < 1) {
      throw new Error("maxDeliveryAttempts must be at least 1");
    }
  }

  async publish(topic: string, message: T): Promise<number> {
    if (this.closed) throw new Error("Event bus is closed");
    const offset = this.nextOffset.get(topic) ?? 0;
    this.nextOffset.set(topic, offset + 1);
    const retained: RetainedMessage<T> = {
      topic,
      offset,
      publishedAt: new Date(this.now()).toISOString(),
      message: structuredClone(message)
    };

    const log = this.logs.get(topic) ?? [];
    log.push(retained);
    if (log.length > this.retentionLimit) log.splice(0, log.length - this.retentionLimit);
    this.logs.set(topic, log);

    for (const group of this.groups.values()) {
      if (!group.members.some((m) => m.topics.some((p) => topicMatches(p, topic)))) continue;
      const key = message.requestId;
      const partition = group.partitions.get(key) ?? { key, queue: [], running: false };
      group.partitions.set(key, partition);
      partition.queue.push({ ...retained, message: structuredClone(message), deliveries: 0 });
      this.schedule(group, partition);
    }
    return offset;
  }

  subscribe(options: SubscribeOptions<T>): Subscription {
    if (this.closed) throw new Error("Event bus is closed");
    const group: Group<T> = this.groups.get(options.group) ?? { name: options.group, members: [], partitions: new Map() };
    this.groups.set(options.group, group);

    const member: Member<T> = {
      memberId: options.memberId ?? crypto.randomUUID(),
      topics: [...options.topics],
      handler: options.handler
    };
    group.members.push(member);

    // Partitions paused for lack of members resume with the newcomer.
    for (const partition of group.partitions.values()) {
      this.schedule(group, partition);
    }

    return {
      group: group.name,
      memberId: member.memberId,
      unsubscribe: () => {
        const idx = group.members.indexOf(member);
        if (idx !== -1) group.members.splice(idx, 1);
      }
    };
  }

  replay(topic: string, fromOffset = 0): RetainedMessage<T>[] {
    return (this.logs.get(topic) ?? [])
      .filter((m) => m.offset >= fromOffset)
      .map((m) => ({ ...m, message: structuredClone(m.message) }));
  }

  deadLetters(group?: string): DeadLetter<T>[] {
    return this.dead.filter((d) => group === undefined || d.group === group);
  }

  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all(Array.from(this.active));
    }
  }

  async close(): Promise<void> {
    await this.drain();
    this.closed = true;
    this.groups.clear();
  }

  private schedule(group: Group<T>, partition: Partition<T>): void {
    if (partition.running || partition.queue.length === 0) return;
    partition.running = true;
    const pumped = this.pump(group, partition).catch((err: unknown) => {
      this.logger.error("partition pump crashed", {
        group: group.name,
        requestId: partition.key,
        error: err instanceof Error ? err.message : String(err)
      });
      return "paused" as const;
    });
    const run: Promise<void> = pumped.then((state) => {
      partition.running = false;
      this.active.delete(run);
      if (partition.queue.length === 0) {
        group.partitions.delete(partition.key);
      } else if (state === "idle") {
        // Messages arrived while the pump was winding down.
        this.schedule(group, partition);
      }
    });
    this.active.add(run);
  }

  private pickMember(group: Group<T>, topic: string, key: string): Member<T> | undefined {
    const candidates = group.members.filter((m) => m.topics.some((p) => topicMatches(p, topic)));
    if (candidates.length === 0) return undefined;
    return candidates[hashKey(key) % candidates.length];
  }

  private async pump(group: Group<T>, partition: Partition<T>): Promise<"idle" | "paused"> {
    await nextTurn();
    while (partition.queue.length > 0) {
      const head = partition.queue[0];
      if (!head) break;
      const member = this.pickMember(group, head.topic, partition.key);
      if (!member) return "paused"; // until a member for this topic subscribes

      head.deliveries++;
      try {
        await member.handler(structuredClone(head.message), {
          topic: head.topic,
          offset: head.offset,
          deliveryAttempt: head.deliveries,
          group: group.name,
          memberId: member.memberId
        });
        partition.queue.shift();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (head.deliveries >= this.maxDeliveryAttempts) {
          partition.queue.shift();
          this.dead.push({
            topic: head.topic,
            offset: head.offset,
            publishedAt: head.publishedAt,
            message: head.message,
            group: group.name,
            deliveryAttempts: head.deliveries,
            lastError: message
          });
          this.logger.error("message dead-lettered", {
            group: group.name,
            topic: head.topic,
            offset: head.offset,
            requestId: partition.key,
            error: message
          });
        } else {
          this.logger.warn("handler failed, redelivering", {
            group: group.name,
            topic: head.topic,
            offset: head.offset,
            deliveryAttempt: head.deliveries,
            error: message
          });
          await nextTurn();
        }
      }
    }
    return "idle";
  }
}
