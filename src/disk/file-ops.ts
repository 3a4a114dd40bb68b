/**
 * Text file access for `fs/read_text_file` and `fs/write_text_file`.
 *
 * Writes are atomic: content lands in a temp file beside the destination and
 * is renamed over it, so a failed write leaves the original untouched.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { contentTooLarge, fileIoError, internalError, invalidParams } from "../acp/errors.js";
import type { EditorBufferCache } from "../acp/editor-buffers.js";
import type { Logger } from "../acp/types.js";
import { errorFields } from "../utils/log.js";

export interface ReadOptions {
  /** 1-based first line. */
  line?: number | null;
  limit?: number | null;
}

export function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
}

/**
 * Select `limit` lines starting at 1-based `line`. Past the end, or with a
 * zero limit, the result is empty.
 */
export function applyLineFilter(content: string, options: ReadOptions = {}): string {
  const { line, limit } = options;
  if (line === undefined || line === null) {
    if (limit === undefined || limit === null) return splitLines(content).join("\n");
  } else if (line < 1) {
    throw invalidParams("line must be 1 or greater", "invalid_line", { line });
  }

  const lines = splitLines(content);
  const start = line ? line - 1 : 0;
  if (start >= lines.length) return "";
  if (limit === 0) return "";
  const end = limit ? Math.min(start + limit, lines.length) : lines.length;
  return lines.slice(start, end).join("\n");
}

/** Absolute, no `..` segments, no NUL bytes. Returns the normalized path. */
export function validateFilePath(filePath: string): string {
  if (filePath.includes("\0")) {
    throw invalidParams("Invalid file path", "invalid_path", { reason: "nul_byte" });
  }
  if (!path.isAbsolute(filePath)) {
    throw invalidParams("Invalid file path", "invalid_path", { reason: "not_absolute" });
  }
  if (filePath.split(/[\\/]/).includes("..")) {
    throw invalidParams("Invalid file path", "invalid_path", { reason: "traversal" });
  }
  return path.normalize(filePath);
}

export interface FileOperationsOptions {
  maxFileSize: number;
  logger: Logger;
  editorBuffers?: EditorBufferCache;
}

export class FileOperations {
  private maxFileSize: number;
  private logger: Logger;
  private editorBuffers?: EditorBufferCache;

  constructor(options: FileOperationsOptions) {
    this.maxFileSize = options.maxFileSize;
    this.logger = options.logger;
    this.editorBuffers = options.editorBuffers;
  }

  async readTextFile(filePath: string, options: ReadOptions = {}): Promise<string> {
    const target = validateFilePath(filePath);
    if (options.line !== undefined && options.line !== null && options.line < 1) {
      throw invalidParams("line must be 1 or greater", "invalid_line", { line: options.line });
    }

    const buffer = this.editorBuffers?.get(target);
    if (buffer) {
      this.logger.debug({ path: target, modified: buffer.modified }, "reading from editor buffer");
      return applyLineFilter(buffer.content, options);
    }

    let content: string;
    try {
      const stat = await fs.promises.stat(target);
      if (stat.size > this.maxFileSize) {
        throw invalidParams(
          `File size ${stat.size} bytes exceeds maximum ${this.maxFileSize} bytes`,
          "file_too_large",
          { size: stat.size, maxSize: this.maxFileSize },
        );
      }
      content = await fs.promises.readFile(target, "utf8");
    } catch (err) {
      throw fileIoError(err, target, "read");
    }
    return applyLineFilter(content, options);
  }

  async writeTextFile(filePath: string, content: string): Promise<void> {
    const target = validateFilePath(filePath);
    const size = Buffer.byteLength(content, "utf8");
    if (size > this.maxFileSize) {
      throw contentTooLarge(size, this.maxFileSize);
    }

    const parent = path.dirname(target);
    try {
      await fs.promises.mkdir(parent, { recursive: true });
    } catch (err) {
      throw fileIoError(err, parent, "write");
    }

    // Resolve symlinks in the parent chain before committing anything.
    let realParent: string;
    try {
      realParent = await fs.promises.realpath(parent);
    } catch (err) {
      throw fileIoError(err, parent, "write");
    }
    const tempPath = validateFilePath(path.join(realParent, `.tmp.${path.basename(target)}.${uuidv4()}`));

    try {
      await fs.promises.writeFile(tempPath, content, { encoding: "utf8", mode: 0o600 });
    } catch (err) {
      await this.removeTemp(tempPath);
      throw fileIoError(err, target, "write");
    }

    try {
      await fs.promises.chmod(tempPath, 0o600);
    } catch (err) {
      this.logger.warn({ path: tempPath, ...errorFields(err) }, "could not restrict temp file permissions");
    }

    try {
      await fs.promises.rename(tempPath, path.join(realParent, path.basename(target)));
    } catch (err) {
      await this.removeTemp(tempPath);
      throw internalError(`Failed to write ${target}: ${err instanceof Error ? err.message : String(err)}`, "file_io_error", {
        path: target,
      });
    }
    this.editorBuffers?.invalidate(target);
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.promises.unlink(tempPath);
    } catch (err) {
      this.logger.warn({ path: tempPath, ...errorFields(err) }, "temp file cleanup failed");
    }
  }
}
