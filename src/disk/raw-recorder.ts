/**
 * Append-only JSONL transcript of everything a root session sends and
 * receives, written to `<cwd>/.acp/transcript_raw.jsonl`.
 *
 * A single writer owns the file handle and drains one queue, so lines from
 * concurrent producers never interleave. Each line is synced before the next
 * is written.
 */
import * as fs from "node:fs";
import type { Logger } from "../acp/types.js";
import { errorFields } from "../utils/log.js";
import { transcriptDir, transcriptPath } from "./paths.js";

export type RecordKind = "notification" | "backend_chunk" | "prompt" | "response";

export interface TranscriptLine {
  timestamp: string;
  sessionId: string;
  kind: RecordKind;
  data: unknown;
}

export class RawMessageRecorder {
  private queue: string[] = [];
  private handle: fs.promises.FileHandle | null = null;
  private writing: Promise<void> | null = null;
  private closed = false;

  constructor(
    readonly filePath: string,
    private logger: Logger,
  ) {}

  record(sessionId: string, kind: RecordKind, data: unknown): void {
    if (this.closed) {
      this.logger.debug({ sessionId, kind }, "recorder closed, dropping transcript line");
      return;
    }
    const line: TranscriptLine = { timestamp: new Date().toISOString(), sessionId, kind, data };
    this.queue.push(`${JSON.stringify(line)}\n`);
    this.kick();
  }

  private kick(): void {
    if (this.writing) return;
    this.writing = this.drain().finally(() => {
      this.writing = null;
      if (this.queue.length > 0) this.kick();
    });
  }

  private async open(): Promise<fs.promises.FileHandle> {
    if (!this.handle) {
      this.handle = await fs.promises.open(this.filePath, "a", 0o600);
    }
    return this.handle;
  }

  private async drain(): Promise<void> {
    for (let line = this.queue.shift(); line !== undefined; line = this.queue.shift()) {
      try {
        const handle = await this.open();
        await handle.appendFile(line, "utf8");
        await handle.datasync();
      } catch (err) {
        this.logger.warn({ file: this.filePath, ...errorFields(err) }, "transcript write failed");
      }
    }
  }

  /** Resolves once every line recorded so far is on disk. */
  async flush(): Promise<void> {
    while (this.writing) await this.writing;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}

/** Root session id → recorder. Subagent sessions share their root's recorder. */
export class RawRecorderRegistry {
  private recorders = new Map<string, RawMessageRecorder>();

  constructor(private logger: Logger) {}

  async getOrCreate(rootSessionId: string, cwd: string): Promise<RawMessageRecorder> {
    const existing = this.recorders.get(rootSessionId);
    if (existing) return existing;
    await fs.promises.mkdir(transcriptDir(cwd), { recursive: true });
    // A concurrent caller may have registered while we awaited mkdir.
    const raced = this.recorders.get(rootSessionId);
    if (raced) return raced;
    const recorder = new RawMessageRecorder(transcriptPath(cwd), this.logger);
    this.recorders.set(rootSessionId, recorder);
    return recorder;
  }

  get(rootSessionId: string): RawMessageRecorder | undefined {
    return this.recorders.get(rootSessionId);
  }

  async release(rootSessionId: string): Promise<void> {
    const recorder = this.recorders.get(rootSessionId);
    if (!recorder) return;
    this.recorders.delete(rootSessionId);
    await recorder.close();
  }

  async closeAll(): Promise<void> {
    const all = [...this.recorders.values()];
    this.recorders.clear();
    await Promise.all(all.map((r) => r.close()));
  }

  get size(): number {
    return this.recorders.size;
  }
}
