/**
 * Per-session cancellation flags plus a push signal for waiters.
 *
 * A session's record is created lazily and replaced wholesale at turn
 * boundaries, so a cancel from one turn never leaks into the next.
 */
import { EventEmitter } from "node:events";
import type { Logger } from "./types.js";

export interface CancellationState {
  cancelled: boolean;
  cancellationTime?: Date;
  reason: string;
  cancelledOperations: Set<string>;
}

export type CancellationEvent = {
  type: "cancelled";
  sessionId: string;
  reason: string;
  at: Date;
};

/** Activity classes registered by `cancel`. */
export const CANCELLED_OPERATIONS = ["claude_requests", "tool_executions", "permission_requests"] as const;

function freshState(): CancellationState {
  return { cancelled: false, reason: "", cancelledOperations: new Set() };
}

export class CancellationCoordinator {
  private states = new Map<string, CancellationState>();
  private emitter = new EventEmitter();

  constructor(
    private logger: Logger,
    subscriberCapacity = 100,
  ) {
    this.emitter.setMaxListeners(subscriberCapacity);
  }

  private state(sessionId: string): CancellationState {
    let state = this.states.get(sessionId);
    if (!state) {
      state = freshState();
      this.states.set(sessionId, state);
    }
    return state;
  }

  isCancelled(sessionId: string): boolean {
    return this.states.get(sessionId)?.cancelled ?? false;
  }

  /** Copy of the current record. */
  getState(sessionId: string): CancellationState {
    const state = this.state(sessionId);
    return { ...state, cancelledOperations: new Set(state.cancelledOperations) };
  }

  /**
   * Flag the session and push the event to subscribers.
   * Returns false when nobody was listening; the flag is set either way.
   */
  markCancelled(sessionId: string, reason: string): boolean {
    const state = this.state(sessionId);
    const at = new Date();
    state.cancelled = true;
    state.cancellationTime = at;
    state.reason = reason;

    const delivered = this.emitter.emit("event", {
      type: "cancelled",
      sessionId,
      reason,
      at,
    } satisfies CancellationEvent);
    if (!delivered) {
      this.logger.debug({ sessionId }, "no cancellation subscribers");
    }
    return delivered;
  }

  addCancelledOperation(sessionId: string, operation: string): void {
    this.state(sessionId).cancelledOperations.add(operation);
  }

  isOperationCancelled(sessionId: string, operation: string): boolean {
    return this.states.get(sessionId)?.cancelledOperations.has(operation) ?? false;
  }

  resetForNewTurn(sessionId: string): void {
    this.states.set(sessionId, freshState());
  }

  remove(sessionId: string): void {
    this.states.delete(sessionId);
  }

  subscribe(listener: (event: CancellationEvent) => void): () => void {
    this.emitter.on("event", listener);
    return () => {
      this.emitter.off("event", listener);
    };
  }

  /**
   * Resolves once the session is cancelled (immediately if it already is).
   * Aborting `signal` detaches the waiter without resolving it.
   */
  waitForCancellation(sessionId: string, signal?: AbortSignal): Promise<void> {
    if (this.isCancelled(sessionId)) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const unsubscribe = this.subscribe((event) => {
        if (event.sessionId !== sessionId) return;
        unsubscribe();
        resolve();
      });
      signal?.addEventListener("abort", unsubscribe, { once: true });
    });
  }
}
