/**
 * Fan-out of session updates to every subscriber: the client transport,
 * test probes, and anything else that wants to watch a session.
 */
import type { SessionNotification } from "@agentclientprotocol/sdk";
import { NotificationQueue, type NotificationSink } from "./notification-queue.js";
import type { AcpClient, Logger } from "./types.js";

export type SendResult = { ok: true; receivers: number } | { ok: false; reason: "no_subscribers" };

export interface Subscription {
  readonly name: string;
  /** Updates dropped because this subscriber fell more than `capacity` behind. */
  readonly dropped: number;
  unsubscribe(): void;
}

export class NotificationBroadcaster {
  private queues = new Set<NotificationQueue>();
  private counter = 0;

  constructor(
    private logger: Logger,
    private capacity = 1000,
  ) {}

  get subscriberCount(): number {
    return this.queues.size;
  }

  subscribe(sink: NotificationSink, name = `subscriber-${++this.counter}`): Subscription {
    const queue = new NotificationQueue(name, sink, this.capacity, this.logger);
    this.queues.add(queue);
    const queues = this.queues;
    return {
      name,
      get dropped() {
        return queue.dropped;
      },
      unsubscribe() {
        queues.delete(queue);
      },
    };
  }

  /**
   * Enqueue to every subscriber. With nobody subscribed the update is not
   * delivered anywhere and the result says so; it never throws.
   */
  send(notification: SessionNotification): SendResult {
    if (this.queues.size === 0) {
      return { ok: false, reason: "no_subscribers" };
    }
    for (const queue of this.queues) {
      queue.enqueue(notification);
    }
    return { ok: true, receivers: this.queues.size };
  }

  /** Wait until every subscriber has been handed everything sent so far. */
  async flush(): Promise<void> {
    await Promise.all([...this.queues].map((q) => q.idle()));
  }
}

/** Subscribe the ACP client connection so every broadcast becomes a `session/update`. */
export function connectClient(broadcaster: NotificationBroadcaster, client: AcpClient): Subscription {
  return broadcaster.subscribe((notification) => client.sessionUpdate(notification), "client");
}
