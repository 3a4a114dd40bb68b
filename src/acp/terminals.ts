/**
 * Local process execution backing the `terminal/*` extension methods.
 */
import { spawn, type ChildProcess } from "node:child_process";
import { once } from "node:events";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { internalError, invalidParams } from "./errors.js";
import type { Logger } from "./types.js";
import { errorFields } from "../utils/log.js";

export const terminalCreateSchema = z.object({
  sessionId: z.string(),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
  cwd: z.string().nullish(),
  outputByteLimit: z.number().int().nonnegative().nullish(),
});

export const terminalRefSchema = z.object({
  sessionId: z.string(),
  terminalId: z.string(),
});

export type TerminalCreateParams = z.infer<typeof terminalCreateSchema>;

export interface TerminalExitStatus {
  exitCode: number | null;
  signal: string | null;
}

export interface TerminalOutput {
  output: string;
  truncated: boolean;
  exitStatus?: TerminalExitStatus;
}

export interface TerminalService {
  create(params: TerminalCreateParams): Promise<string>;
  output(terminalId: string): TerminalOutput;
  waitForExit(terminalId: string): Promise<TerminalExitStatus>;
  kill(terminalId: string): void;
  /** Kill if still running and forget the terminal. */
  release(terminalId: string): void;
  releaseAll(): void;
}

interface RunningTerminal {
  child: ChildProcess;
  sessionId: string;
  output: string;
  truncated: boolean;
  limit?: number;
  exitStatus?: TerminalExitStatus;
  exited: Promise<TerminalExitStatus>;
}

/**
 * Drop bytes from the front until `text` fits in `limit` bytes, never
 * splitting a UTF-8 sequence.
 */
export function keepTail(text: string, limit: number): { text: string; truncated: boolean } {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= limit) return { text, truncated: false };
  let start = bytes.length - limit;
  while (start < bytes.length && (bytes[start] & 0xc0) === 0x80) start++;
  return { text: bytes.subarray(start).toString("utf8"), truncated: true };
}

export class ProcessTerminalService implements TerminalService {
  private terminals = new Map<string, RunningTerminal>();

  constructor(private logger: Logger) {}

  async create(params: TerminalCreateParams): Promise<string> {
    const env = { ...process.env };
    for (const { name, value } of params.env) env[name] = value;

    const child = spawn(params.command, params.args, {
      cwd: params.cwd ?? undefined,
      env,
      stdio: ["ignore", "pipe", "pipe"],
    });
    try {
      await once(child, "spawn");
    } catch (err) {
      throw internalError(
        `Failed to start ${params.command}: ${err instanceof Error ? err.message : String(err)}`,
        "terminal_spawn_failed",
        { command: params.command },
      );
    }

    const id = `term_${uuidv4()}`;
    const exited = new Promise<TerminalExitStatus>((resolve) => {
      child.on("close", (code, signal) => {
        const status = { exitCode: code, signal };
        terminal.exitStatus = status;
        this.logger.debug({ terminalId: id, ...status }, "terminal exited");
        resolve(status);
      });
    });
    const terminal: RunningTerminal = {
      child,
      sessionId: params.sessionId,
      output: "",
      truncated: false,
      limit: params.outputByteLimit ?? undefined,
      exited,
    };
    child.on("error", (err) => {
      this.logger.warn({ terminalId: id, ...errorFields(err) }, "terminal process error");
    });

    // Decode per stream so a character split across reads stays whole.
    const append = (chunk: string) => {
      terminal.output += chunk;
      if (terminal.limit !== undefined) {
        const kept = keepTail(terminal.output, terminal.limit);
        terminal.output = kept.text;
        terminal.truncated ||= kept.truncated;
      }
    };
    child.stdout?.setEncoding("utf8").on("data", append);
    child.stderr?.setEncoding("utf8").on("data", append);

    this.terminals.set(id, terminal);
    this.logger.debug({ terminalId: id, sessionId: params.sessionId, command: params.command }, "terminal created");
    return id;
  }

  private lookup(terminalId: string): RunningTerminal {
    const terminal = this.terminals.get(terminalId);
    if (!terminal) {
      throw invalidParams(`Terminal not found: ${terminalId}`, "terminal_not_found", { terminalId });
    }
    return terminal;
  }

  output(terminalId: string): TerminalOutput {
    const terminal = this.lookup(terminalId);
    return {
      output: terminal.output,
      truncated: terminal.truncated,
      ...(terminal.exitStatus && { exitStatus: terminal.exitStatus }),
    };
  }

  waitForExit(terminalId: string): Promise<TerminalExitStatus> {
    return this.lookup(terminalId).exited;
  }

  kill(terminalId: string): void {
    const terminal = this.lookup(terminalId);
    if (!terminal.exitStatus) terminal.child.kill("SIGTERM");
  }

  release(terminalId: string): void {
    const terminal = this.terminals.get(terminalId);
    if (!terminal) return;
    if (!terminal.exitStatus) terminal.child.kill("SIGTERM");
    this.terminals.delete(terminalId);
  }

  releaseAll(): void {
    for (const id of [...this.terminals.keys()]) this.release(id);
  }
}
