/**
 * MessageRouter: reads a model message stream continuously, hands messages
 * that need immediate handling to `intercept`, and buffers the rest for the
 * consumer. The model process keeps making progress (running tools, reporting
 * results) while the consumer is busy awaiting a permission round-trip.
 */
import type { Logger } from "../acp/types.js";
import { errorFields } from "../utils/log.js";

export class MessageRouter<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private resolver: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private rejecter: ((err: unknown) => void) | null = null;
  private finished = false;
  private streamError: unknown = null;
  private failed = false;
  readonly done: Promise<void>;

  constructor(
    private source: AsyncIterator<T>,
    /** Return true when the message was consumed and should not be buffered. */
    private intercept: (msg: T) => boolean,
    private logger: Logger,
  ) {
    this.done = this.startReading();
  }

  private async startReading(): Promise<void> {
    try {
      while (true) {
        const result = await this.source.next();
        if (result.done) {
          this.finished = true;
          if (this.resolver) {
            this.resolver({ value: undefined, done: true });
            this.resolver = null;
            this.rejecter = null;
          }
          break;
        }

        const msg = result.value;
        if (this.intercept(msg)) continue;

        if (this.resolver) {
          this.resolver({ value: msg, done: false });
          this.resolver = null;
          this.rejecter = null;
        } else {
          this.buffer.push(msg);
        }
      }
    } catch (err) {
      this.logger.debug({ ...errorFields(err) }, "model stream ended with error");
      this.finished = true;
      this.failed = true;
      this.streamError = err;
      if (this.rejecter) {
        this.rejecter(err);
        this.resolver = null;
        this.rejecter = null;
      }
    }
  }

  get bufferDepth(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      return Promise.resolve({ value: buffered, done: false });
    }
    if (this.finished) {
      if (this.failed) return Promise.reject(this.streamError);
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.resolver = resolve;
      this.rejecter = reject;
    });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
