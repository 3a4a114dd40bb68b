/**
 * Timing spans for the prompt path, switched on with ACP_PERF=1.
 * When off, every call returns a shared no-op.
 *
 *   const scope = perfScope("prompt");
 *   const s = scope.start("backend.next");
 *   ...
 *   s.end({ chunk: 3 });
 *   scope.summary();
 */
import type { Logger } from "../acp/types.js";

let enabled = !!process.env.ACP_PERF;
let sink: Pick<Logger, "info"> | null = null;

export interface Span {
  end(meta?: Record<string, unknown>): number;
}

interface OpStats {
  count: number;
  totalMs: number;
  maxMs: number;
}

const NOOP_SPAN: Span = Object.freeze({ end: () => 0 });

/** Where spans are reported. Without a logger, spans stay silent. */
export function configurePerf(logger: Pick<Logger, "info">, force?: boolean): void {
  sink = logger;
  if (force !== undefined) enabled = force;
}

function report(data: object): void {
  sink?.info(data, "perf");
}

function now(): number {
  return performance.now();
}

export function perfStart(op: string): Span {
  if (!enabled) return NOOP_SPAN;
  const t0 = now();
  return {
    end(meta?: Record<string, unknown>): number {
      const ms = +(now() - t0).toFixed(2);
      report({ perf: { op, ms, ...meta } });
      return ms;
    },
  };
}

export interface PerfScope {
  start(op: string): Span;
  summary(): void;
}

const NOOP_SCOPE: PerfScope = Object.freeze({
  start: () => NOOP_SPAN,
  summary: () => {},
});

/** Aggregates spans and reports one summary line; individual spans only when slow. */
export function perfScope(name: string, slowMs = 50): PerfScope {
  if (!enabled) return NOOP_SCOPE;

  const t0 = now();
  const ops = new Map<string, OpStats>();

  function track(op: string, ms: number) {
    let s = ops.get(op);
    if (!s) {
      s = { count: 0, totalMs: 0, maxMs: 0 };
      ops.set(op, s);
    }
    s.count++;
    s.totalMs += ms;
    if (ms > s.maxMs) s.maxMs = ms;
  }

  return {
    start(op: string): Span {
      const st = now();
      return {
        end(meta?: Record<string, unknown>): number {
          const ms = +(now() - st).toFixed(2);
          track(op, ms);
          if (ms > slowMs) {
            report({ perf: { op, ms, scope: name, ...meta } });
          }
          return ms;
        },
      };
    },

    summary() {
      const byOp: Record<string, { n: number; total_ms: number; max_ms: number }> = {};
      for (const [op, s] of ops) {
        byOp[op] = { n: s.count, total_ms: +s.totalMs.toFixed(2), max_ms: +s.maxMs.toFixed(2) };
      }
      report({ perf_summary: { scope: name, total_ms: +(now() - t0).toFixed(2), ops: byOp } });
    },
  };
}
