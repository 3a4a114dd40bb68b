/**
 * Rendezvous between the engine's permission flow and the model process's
 * own permission callback. Either side may arrive first.
 */
import type { ToolCallOutcome } from "../acp/notifications.js";
import type { ToolVerdict } from "./backend.js";

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  settled: boolean;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  const d: Deferred<T> = {
    promise,
    settled: false,
    resolve(value) {
      if (d.settled) return;
      d.settled = true;
      resolve(value);
    },
  };
  return d;
}

/**
 * Promises keyed by id; settling before anyone waits is fine. Once closed,
 * open entries and any later unknown key resolve with the closing value.
 */
export class DeferredMap<T> {
  private entries = new Map<string, Deferred<T>>();
  private closedWith: { value: T } | null = null;

  private entry(key: string): Deferred<T> {
    let d = this.entries.get(key);
    if (!d) {
      d = deferred<T>();
      if (this.closedWith) d.resolve(this.closedWith.value);
      this.entries.set(key, d);
    }
    return d;
  }

  wait(key: string): Promise<T> {
    return this.entry(key).promise;
  }

  settle(key: string, value: T): void {
    this.entry(key).resolve(value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  close(value: T): void {
    this.closedWith = { value };
    for (const d of this.entries.values()) d.resolve(value);
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }
}

export class ToolGate {
  private verdicts = new DeferredMap<ToolVerdict>();
  private results = new DeferredMap<ToolCallOutcome>();
  /** Tool calls seen in model output, oldest first, for callbacks that carry no id. */
  private announced: Array<{ id: string; name: string }> = [];
  /** Id-less callbacks that arrived before their tool_use was seen. */
  private waiting: Array<{ name: string; resolve(id: string | undefined): void }> = [];

  constructor(private announceTimeoutMs = 5000) {}

  announce(id: string, name: string): void {
    const index = this.waiting.findIndex((w) => w.name === name);
    if (index >= 0) {
      const [waiter] = this.waiting.splice(index, 1);
      waiter.resolve(id);
      return;
    }
    this.announced.push({ id, name });
  }

  /** Match a callback without an id to the oldest announced call of that tool. */
  claim(name: string): string | undefined {
    const index = this.announced.findIndex((a) => a.name === name);
    if (index < 0) return undefined;
    const [claimed] = this.announced.splice(index, 1);
    return claimed.id;
  }

  /**
   * Like `claim`, but when no call of that tool has been announced yet, wait
   * up to the announce timeout for one. Undefined on timeout, abort or close.
   */
  claimOrWait(name: string, signal?: AbortSignal): Promise<string | undefined> {
    const id = this.claim(name);
    if (id !== undefined || this.closed || signal?.aborted) return Promise.resolve(id);
    return new Promise((resolve) => {
      const waiter = {
        name,
        resolve(value: string | undefined) {
          clearTimeout(timer);
          signal?.removeEventListener("abort", giveUp);
          resolve(value);
        },
      };
      const giveUp = () => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        waiter.resolve(undefined);
      };
      const timer = setTimeout(giveUp, this.announceTimeoutMs);
      signal?.addEventListener("abort", giveUp, { once: true });
      this.waiting.push(waiter);
    });
  }

  release(id: string): void {
    this.announced = this.announced.filter((a) => a.id !== id);
  }

  /** Called from the model's permission callback. Resolves with a denial if `signal` aborts. */
  waitForVerdict(id: string, signal?: AbortSignal): Promise<ToolVerdict> {
    if (signal?.aborted) return Promise.resolve({ allowed: false, reason: "Tool use aborted" });
    const verdict = this.verdicts.wait(id);
    if (!signal) return verdict;
    return Promise.race([
      verdict,
      new Promise<ToolVerdict>((resolve) => {
        signal.addEventListener("abort", () => resolve({ allowed: false, reason: "Tool use aborted" }), {
          once: true,
        });
      }),
    ]);
  }

  decide(id: string, verdict: ToolVerdict): void {
    this.verdicts.settle(id, verdict);
  }

  waitForResult(id: string): Promise<ToolCallOutcome> {
    return this.results.wait(id);
  }

  deliverResult(id: string, outcome: ToolCallOutcome): void {
    this.results.settle(id, outcome);
  }

  /**
   * The query is over: deny callbacks still waiting and fail results that
   * never arrived. Results already delivered stay readable.
   */
  close(reason: string): void {
    this.verdicts.close({ allowed: false, reason });
    this.results.close({ status: "failed", reason });
    this.announced = [];
    const waiting = this.waiting;
    this.waiting = [];
    for (const w of waiting) w.resolve(undefined);
  }

  get closed(): boolean {
    return this.results.closed;
  }
}
