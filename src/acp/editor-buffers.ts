/**
 * Unsaved editor content pushed by the client through `editor/update_buffers`.
 * File reads consult this cache before going to disk. Entries expire after
 * `ttlMs` so a client that stops pushing does not pin stale content.
 */
import * as path from "node:path";
import { z } from "zod";

export const editorBuffersSchema = z.object({
  buffers: z
    .record(
      z.object({
        content: z.string(),
        modified: z.boolean().default(false),
        encoding: z.string().default("UTF-8"),
      }),
    )
    .default({}),
  unavailable_paths: z.array(z.string()).default([]),
});

export type EditorBuffersUpdate = z.infer<typeof editorBuffersSchema>;

export interface EditorBuffer {
  path: string;
  content: string;
  modified: boolean;
  encoding: string;
}

interface CachedBuffer {
  buffer: EditorBuffer;
  cachedAt: number;
}

export class EditorBufferCache {
  private cache = new Map<string, CachedBuffer>();

  constructor(
    private ttlMs = 1000,
    private now: () => number = Date.now,
  ) {}

  apply(update: EditorBuffersUpdate): { cached: number; removed: number } {
    const at = this.now();
    for (const [bufferPath, buffer] of Object.entries(update.buffers)) {
      const key = path.resolve(bufferPath);
      this.cache.set(key, { buffer: { path: key, ...buffer }, cachedAt: at });
    }
    let removed = 0;
    for (const p of update.unavailable_paths) {
      if (this.cache.delete(path.resolve(p))) removed++;
    }
    return { cached: Object.keys(update.buffers).length, removed };
  }

  get(filePath: string): EditorBuffer | undefined {
    const key = path.resolve(filePath);
    const cached = this.cache.get(key);
    if (!cached) return undefined;
    if (this.now() - cached.cachedAt >= this.ttlMs) {
      this.cache.delete(key);
      return undefined;
    }
    return cached.buffer;
  }

  invalidate(filePath: string): void {
    this.cache.delete(path.resolve(filePath));
  }

  get size(): number {
    return this.cache.size;
  }
}
