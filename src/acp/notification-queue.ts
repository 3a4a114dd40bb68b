/**
 * Ordered, bounded delivery queue for one notification subscriber.
 *
 * Notifications are handed to the sink one at a time in enqueue order. When
 * the backlog reaches capacity the oldest queued entry is dropped and counted,
 * so a stalled subscriber cannot grow memory without bound.
 */
import type { SessionNotification } from "@agentclientprotocol/sdk";
import type { Logger } from "./types.js";
import { perfStart } from "../utils/perf.js";
import { errorFields } from "../utils/log.js";

export type NotificationSink = (notification: SessionNotification) => void | Promise<void>;

export class NotificationQueue {
  private buffer: SessionNotification[] = [];
  private draining = false;
  private idleWaiters: Array<() => void> = [];
  private droppedCount = 0;

  constructor(
    readonly name: string,
    private sink: NotificationSink,
    private capacity: number,
    private logger: Logger,
  ) {}

  /** Number of notifications dropped because this subscriber lagged. */
  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.buffer.length;
  }

  enqueue(notification: SessionNotification): void {
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
      this.logger.warn(
        { subscriber: this.name, dropped: this.droppedCount },
        "notification subscriber lagging, dropped oldest update",
      );
    }
    this.buffer.push(notification);
    if (!this.draining) {
      this.drain().catch((err) => {
        this.logger.error({ subscriber: this.name, ...errorFields(err) }, "notification drain failed");
      });
    }
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      for (let next = this.buffer.shift(); next; next = this.buffer.shift()) {
        const span = perfStart("notificationQueue.deliver");
        try {
          await this.sink(next);
        } catch (err) {
          this.logger.warn(
            { subscriber: this.name, sessionId: next.sessionId, ...errorFields(err) },
            "notification delivery failed",
          );
        } finally {
          span.end({ subscriber: this.name });
        }
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /** Resolves once everything enqueued so far has been handed to the sink. */
  idle(): Promise<void> {
    if (!this.draining && this.buffer.length === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }
}
