/**
 * ModelBackend on top of the Claude Code CLI, driven through the agent SDK's
 * `query()`. One query runs per prompt turn; the CLI's own session id is kept
 * so the next turn resumes the same conversation.
 */
import type { McpServer } from "@agentclientprotocol/sdk";
import {
  query,
  type McpServerConfig,
  type Options,
  type PermissionResult,
  type SDKMessage,
  type SDKUserMessage,
} from "@anthropic-ai/claude-agent-sdk";
import type { ToolCallOutcome } from "../acp/notifications.js";
import type { Logger, ToolCallRecord } from "../acp/types.js";
import { readAgentDefinitions, toSessionModes, type AgentDefinition } from "../disk/agents.js";
import { errorFields } from "../utils/log.js";
import { perfScope } from "../utils/perf.js";
import type {
  BackendChunk,
  BackendStopReason,
  HandshakeResult,
  ModelBackend,
  QueryContext,
  ToolVerdict,
} from "./backend.js";
import { MessageRouter } from "./message-router.js";
import { ToolGate } from "./tool-gate.js";

export type QueryHandle = AsyncIterable<SDKMessage> & { interrupt(): Promise<void> };
export type QueryFn = (params: { prompt: AsyncIterable<SDKUserMessage>; options?: Options }) => QueryHandle;

export interface ClaudeBackendOptions {
  logger: Logger;
  model?: string;
  executable?: string;
  defaultMode?: string;
  env?: NodeJS.ProcessEnv;
  queryFn?: QueryFn;
  /** How long an id-less permission callback waits for its tool_use. */
  announceTimeoutMs?: number;
}

interface ClaudeSession {
  cwd: string;
  mcpServers: McpServer[];
  agents: AgentDefinition[];
  /** Claude Code's session id, learned from the init message. */
  resumeId?: string;
  gate: ToolGate;
  active?: { handle: QueryHandle; abort: AbortController };
}

export function toSdkMcpServers(servers: McpServer[]): Record<string, McpServerConfig> {
  const out: Record<string, McpServerConfig> = {};
  for (const server of servers) {
    if (!("type" in server)) {
      out[server.name] = {
        type: "stdio",
        command: server.command,
        args: server.args,
        env: Object.fromEntries(server.env.map((e) => [e.name, e.value])),
      };
      continue;
    }
    const headers = Object.fromEntries(server.headers.map((h) => [h.name, h.value]));
    out[server.name] =
      server.type === "http" ? { type: "http", url: server.url, headers } : { type: "sse", url: server.url, headers };
  }
  return out;
}

export function toRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

type ToolResultLike = {
  content?: string | ReadonlyArray<{ type: string }>;
  is_error?: boolean;
};

export function toolResultOutcome(block: ToolResultLike): ToolCallOutcome {
  let text = "";
  if (typeof block.content === "string") {
    text = block.content;
  } else if (block.content) {
    text = block.content
      .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
      .filter((t) => t.length > 0)
      .join("\n");
  }
  if (block.is_error) return { status: "failed", reason: text || "Tool reported an error" };
  return { status: "completed", output: text };
}

/**
 * Streaming input carrying one user message. Input stays open until the turn
 * ends so permission callbacks can still be answered.
 */
function promptInput(text: string, turnDone: Promise<void>): AsyncIterable<SDKUserMessage> {
  const message: SDKUserMessage = {
    type: "user",
    message: { role: "user", content: text },
    parent_tool_use_id: null,
    session_id: "",
  };
  return (async function* () {
    yield message;
    await turnDone;
  })();
}

function toolUseIdOf(options: object): string | undefined {
  return "toolUseID" in options && typeof options.toolUseID === "string" ? options.toolUseID : undefined;
}

export class ClaudeBackend implements ModelBackend {
  private sessions = new Map<string, ClaudeSession>();
  private queryFn: QueryFn;

  constructor(private options: ClaudeBackendOptions) {
    this.queryFn = options.queryFn ?? query;
  }

  async spawnAndHandshake(
    sessionId: string,
    cwd: string,
    mcpServers: McpServer[],
    mode?: string,
  ): Promise<HandshakeResult> {
    const agents = await readAgentDefinitions(cwd, this.options.logger, this.options.env);
    const existing = this.sessions.get(sessionId);
    this.sessions.set(sessionId, {
      cwd,
      mcpServers,
      agents,
      resumeId: existing?.resumeId,
      gate: existing?.gate ?? new ToolGate(),
    });

    const modes = toSessionModes(agents);
    const wanted = mode ?? this.options.defaultMode;
    const currentMode = wanted !== undefined && modes.some((m) => m.id === wanted) ? wanted : undefined;
    this.options.logger.debug({ sessionId, modes: modes.length, currentMode }, "claude session ready");
    return { ...(modes.length > 0 && { modes }), ...(currentMode !== undefined && { currentMode }) };
  }

  private session(context: QueryContext): ClaudeSession {
    let session = this.sessions.get(context.sessionId);
    if (!session) {
      session = { cwd: context.cwd, mcpServers: context.mcpServers, agents: [], gate: new ToolGate() };
      this.sessions.set(context.sessionId, session);
    }
    return session;
  }

  private async canUseTool(
    gate: ToolGate,
    toolName: string,
    input: Record<string, unknown>,
    options: { signal: AbortSignal },
  ): Promise<PermissionResult> {
    const explicit = toolUseIdOf(options);
    const id = explicit ?? (await gate.claimOrWait(toolName, options.signal));
    if (explicit) gate.release(explicit);
    if (id === undefined) {
      this.options.logger.warn({ tool: toolName }, "permission callback for a tool call that was never announced");
      return { behavior: "deny", message: "Tool call was not announced to the client" };
    }
    const verdict = await gate.waitForVerdict(id, options.signal);
    return verdict.allowed
      ? { behavior: "allow", updatedInput: input }
      : { behavior: "deny", message: verdict.reason };
  }

  /** Tool results arrive as user messages; route them to the gate instead of the turn. */
  private intercept(gate: ToolGate, msg: SDKMessage): boolean {
    if (msg.type !== "user" || typeof msg.message.content === "string") return false;
    let consumed = false;
    for (const block of msg.message.content) {
      if (block.type !== "tool_result") continue;
      gate.deliverResult(block.tool_use_id, toolResultOutcome(block));
      consumed = true;
    }
    return consumed;
  }

  async *queryStream(text: string, context: QueryContext, mode?: string): AsyncIterable<BackendChunk> {
    const { logger } = this.options;
    const session = this.session(context);
    const gate = new ToolGate(this.options.announceTimeoutMs);
    session.gate = gate;
    const abort = new AbortController();

    const options: Options = {
      cwd: context.cwd,
      mcpServers: toSdkMcpServers(context.mcpServers),
      includePartialMessages: true,
      abortController: abort,
      canUseTool: (toolName, input, opts) => this.canUseTool(gate, toolName, input, opts),
    };
    if (session.resumeId) options.resume = session.resumeId;
    if (this.options.model) options.model = this.options.model;
    if (this.options.executable) options.pathToClaudeCodeExecutable = this.options.executable;
    const agent = mode === undefined ? undefined : session.agents.find((a) => a.name === mode);
    if (agent && agent.prompt) {
      options.systemPrompt = { type: "preset", preset: "claude_code", append: agent.prompt };
    }

    let endTurn: () => void = () => {};
    const turnDone = new Promise<void>((resolve) => {
      endTurn = resolve;
    });

    const perf = perfScope("claude.query");
    const handle = this.queryFn({ prompt: promptInput(text, turnDone), options });
    session.active = { handle, abort };
    const router = new MessageRouter<SDKMessage>(
      handle[Symbol.asyncIterator](),
      (msg) => this.intercept(gate, msg),
      logger,
    );
    router.done
      .then(() => gate.close("Model stream ended before the tool ran"))
      .catch((err) => logger.error({ ...errorFields(err) }, "tool gate close failed"));

    let stopReason: BackendStopReason = "end_turn";
    let finished = false;
    try {
      for await (const msg of router) {
        const span = perf.start(`message.${msg.type}`);
        switch (msg.type) {
          case "system":
            if (msg.subtype === "init") session.resumeId = msg.session_id;
            break;
          case "stream_event": {
            const event = msg.event;
            if (msg.parent_tool_use_id === null && event.type === "content_block_delta" && event.delta.type === "text_delta") {
              yield { content: event.delta.text };
            }
            break;
          }
          case "assistant": {
            if (msg.message.stop_reason === "max_tokens") stopReason = "max_tokens";
            for (const block of msg.message.content) {
              if (block.type !== "tool_use") continue;
              gate.announce(block.id, block.name);
              yield { content: "", toolCall: { id: block.id, name: block.name, input: toRecord(block.input) } };
            }
            break;
          }
          case "result":
            endTurn();
            if (msg.subtype === "success") {
              if (msg.is_error) throw new Error(msg.result);
            } else if (msg.subtype === "error_during_execution") {
              throw new Error("Model run failed during execution");
            } else {
              logger.warn({ sessionId: context.sessionId, subtype: msg.subtype }, "model run stopped early");
            }
            break;
          default:
            break;
        }
        span.end();
      }
      finished = true;
      yield { content: "", stopReason };
    } finally {
      endTurn();
      if (!finished) abort.abort();
      gate.close("Query ended");
      if (session.active?.handle === handle) session.active = undefined;
      perf.summary();
    }
  }

  async completeToolCall(sessionId: string, call: ToolCallRecord, verdict: ToolVerdict): Promise<ToolCallOutcome> {
    const session = this.sessions.get(sessionId);
    if (!session) return { status: "failed", reason: "No model session" };
    session.gate.decide(call.id, verdict);
    if (!verdict.allowed) return { status: "failed", reason: verdict.reason };
    return session.gate.waitForResult(call.id);
  }

  async interrupt(sessionId: string): Promise<void> {
    const active = this.sessions.get(sessionId)?.active;
    if (!active) return;
    await active.handle.interrupt();
  }

  async terminate(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    session.active?.abort.abort();
    session.active = undefined;
    session.gate.close("Session terminated");
  }
}
