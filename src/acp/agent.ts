/**
 * BridgeAcpAgent: the ACP engine. Owns sessions, turns and cancellation, and
 * drives a ModelBackend for the actual model work.
 */
import {
  AgentSideConnection,
  ndJsonStream,
  type Agent,
  type AgentCapabilities,
  type AuthenticateRequest,
  type AvailableCommand,
  type CancelNotification,
  type ClientCapabilities,
  type InitializeRequest,
  type InitializeResponse,
  type LoadSessionRequest,
  type LoadSessionResponse,
  type NewSessionRequest,
  type NewSessionResponse,
  type PromptRequest,
  type PromptResponse,
  type SessionNotification,
  type SetSessionModeRequest,
  type SetSessionModeResponse,
  type StopReason,
} from "@agentclientprotocol/sdk";
import { z } from "zod";
import type { AgentConfig } from "../config.js";
import { RawRecorderRegistry } from "../disk/raw-recorder.js";
import { FileOperations } from "../disk/file-ops.js";
import type { McpManager, ModelBackend, QueryContext } from "../sdk/backend.js";
import { ClaudeBackend } from "../sdk/claude-backend.js";
import { isAllowed, PermissionFlow } from "../sdk/permissions.js";
import { RulePolicyEvaluator, type PermissionPolicyEvaluator } from "../sdk/policy.js";
import { PermissionPreferenceCache } from "../sdk/preferences.js";
import { errorFields } from "../utils/log.js";
import { perfStart } from "../utils/perf.js";
import { nodeToWebReadable, nodeToWebWritable } from "../utils/streams.js";
import { CANCELLED_OPERATIONS, CancellationCoordinator } from "./cancellation.js";
import { connectClient, NotificationBroadcaster } from "./broadcaster.js";
import { EditorBufferCache, editorBuffersSchema } from "./editor-buffers.js";
import {
  capabilityNotDeclared,
  internalError,
  invalidParams,
  invalidSessionId,
  methodNotFound,
  sessionNotFound,
} from "./errors.js";
import {
  agentMessageChunk,
  cancellationNotice,
  currentModeUpdate,
  historyReplay,
  planUpdate,
  toolCallFinished,
  toolCallStarted,
  userMessageChunk,
  type ToolCallOutcome,
} from "./notifications.js";
import { PlanConversionError, planFromTodoWrite, PlanTracker, type PlanStatus } from "./plan.js";
import { isRefusal } from "./refusal.js";
import { InMemorySessionTable, parseSessionId, type SessionTable } from "./session-table.js";
import { ProcessTerminalService, terminalCreateSchema, terminalRefSchema, type TerminalService } from "./terminals.js";
import { AGENT_INFO, PLAN_TOOL_NAME, type AcpClient, type Logger, type Session, type SessionUpdate, type ToolCallRecord } from "./types.js";
import {
  loadSessionUnsupported,
  negotiateProtocolVersion,
  promptText,
  supportsEditorState,
  validateClientCapabilities,
  validateMcpTransports,
  validatePrompt,
  validateProtocolVersion,
  wantsStreaming,
} from "./validation.js";

/** Extension methods served by the agent, advertised in `agentCapabilities._meta.tools`. */
export const EXT_METHODS = [
  "fs/read_text_file",
  "fs/write_text_file",
  "terminal/create",
  "terminal/output",
  "terminal/release",
  "terminal/wait_for_exit",
  "terminal/kill",
  "editor/update_buffers",
] as const;

export const AGENT_CAPABILITIES: AgentCapabilities = {
  loadSession: true,
  promptCapabilities: {
    image: true,
    audio: true,
    embeddedContext: true,
    _meta: { streaming: true },
  },
  mcpCapabilities: { http: true, sse: false },
  _meta: { streaming: true, tools: [...EXT_METHODS] },
};

const readTextFileSchema = z.object({
  sessionId: z.string(),
  path: z.string(),
  line: z.number().int().nullish(),
  limit: z.number().int().nonnegative().nullish(),
});

const writeTextFileSchema = z.object({
  sessionId: z.string(),
  path: z.string(),
  content: z.string(),
});

function parseParams<T extends z.ZodTypeAny>(schema: T, method: string, params: unknown): z.infer<T> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`);
    throw invalidParams(`Invalid params for ${method}: ${issues.join("; ")}`, "invalid_params", { method, issues });
  }
  return result.data;
}

function cancelled(sessionId: string, meta: Record<string, unknown>): PromptResponse {
  return { stopReason: "cancelled", _meta: { ...meta, session_id: sessionId } };
}

export interface BridgeAgentDeps {
  config: AgentConfig;
  logger: Logger;
  backend: ModelBackend;
  sessions?: SessionTable;
  policy?: PermissionPolicyEvaluator;
  preferences?: PermissionPreferenceCache;
  /** Present when transcripts are recorded. */
  recorders?: RawRecorderRegistry;
  mcpManager?: McpManager;
  terminals?: TerminalService;
  editorBuffers?: EditorBufferCache;
}

export class BridgeAcpAgent implements Agent {
  readonly sessions: SessionTable;
  readonly cancellation: CancellationCoordinator;
  readonly broadcaster: NotificationBroadcaster;
  readonly plans = new PlanTracker();
  readonly permissions: PermissionFlow;
  readonly editorBuffers: EditorBufferCache;

  private config: AgentConfig;
  private logger: Logger;
  private backend: ModelBackend;
  private recorders?: RawRecorderRegistry;
  private mcpManager?: McpManager;
  private terminals: TerminalService;
  private fileOps: FileOperations;
  private clientCapabilities?: ClientCapabilities;
  /** sessionId → tool call id → call, for calls whose permission is pending or running. */
  private toolCalls = new Map<string, Map<string, ToolCallRecord>>();
  private unsubscribeMcp?: () => void;

  constructor(client: AcpClient, deps: BridgeAgentDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.backend = deps.backend;
    this.recorders = deps.recorders;
    this.mcpManager = deps.mcpManager;
    this.sessions = deps.sessions ?? new InMemorySessionTable();
    this.cancellation = new CancellationCoordinator(this.logger, this.config.cancellationBufferSize);
    this.broadcaster = new NotificationBroadcaster(this.logger, this.config.notificationBufferSize);
    connectClient(this.broadcaster, client);
    this.terminals = deps.terminals ?? new ProcessTerminalService(this.logger);
    this.editorBuffers = deps.editorBuffers ?? new EditorBufferCache();
    this.fileOps = new FileOperations({
      maxFileSize: this.config.maxFileSize,
      logger: this.logger,
      editorBuffers: this.editorBuffers,
    });
    this.permissions = new PermissionFlow({
      client,
      cancellation: this.cancellation,
      policy: deps.policy ?? new RulePolicyEvaluator(this.config.permissionPolicies),
      preferences: deps.preferences ?? new PermissionPreferenceCache(),
      logger: this.logger,
      lookupToolCall: (sessionId, toolCallId) => this.toolCalls.get(sessionId)?.get(toolCallId),
    });

    if (this.mcpManager) {
      this.unsubscribeMcp = this.mcpManager.subscribeToChangeNotifications(() => {
        for (const sessionId of this.sessions.list()) {
          this.sendAvailableCommands(sessionId).catch((err) =>
            this.logger.warn({ sessionId, ...errorFields(err) }, "failed to refresh available commands"),
          );
        }
      });
    }
  }

  async initialize(request: InitializeRequest): Promise<InitializeResponse & { agentInfo: typeof AGENT_INFO }> {
    if (this.config.strictProtocolVersion) {
      validateProtocolVersion(request.protocolVersion);
    }
    validateClientCapabilities(request.clientCapabilities, this.logger);
    this.clientCapabilities = request.clientCapabilities;

    const protocolVersion = negotiateProtocolVersion(request.protocolVersion);
    this.logger.info({ requested: request.protocolVersion, negotiated: protocolVersion }, "initialized");
    return {
      protocolVersion,
      agentCapabilities: AGENT_CAPABILITIES,
      authMethods: [],
      agentInfo: AGENT_INFO,
    };
  }

  async authenticate(_params: AuthenticateRequest): Promise<void> {
    throw methodNotFound("authenticate");
  }

  async newSession(params: NewSessionRequest): Promise<NewSessionResponse> {
    validateMcpTransports(params.mcpServers, AGENT_CAPABILITIES);
    const mcpServers = params.mcpServers ?? [];

    const created = this.sessions.create(params.cwd, this.clientCapabilities ?? {});
    const sessionId = created.id;
    await this.sessions.update(sessionId, (s) => {
      s.mcpServers = mcpServers;
    });

    if (this.config.recordTranscripts && this.recorders) {
      try {
        await this.recorders.getOrCreate(sessionId, params.cwd);
      } catch (err) {
        this.logger.warn({ sessionId, ...errorFields(err) }, "could not open transcript");
      }
    }

    let modes: Session["availableModes"];
    let currentMode: string | undefined;
    try {
      const handshake = await this.backend.spawnAndHandshake(sessionId, params.cwd, mcpServers, this.config.defaultMode);
      modes = handshake.modes;
      currentMode = handshake.currentMode;
    } catch (err) {
      this.logger.error({ sessionId, ...errorFields(err) }, "model backend failed to start");
    }
    if (modes !== undefined || currentMode !== undefined) {
      await this.sessions.update(sessionId, (s) => {
        s.availableModes = modes;
        s.currentMode = currentMode;
      });
    }

    await this.sendAvailableCommands(sessionId);
    this.logger.info({ sessionId, cwd: params.cwd, mcpServers: mcpServers.length }, "session created");

    return {
      sessionId,
      ...(currentMode !== undefined && { modes: { currentModeId: currentMode, availableModes: modes ?? [] } }),
    };
  }

  async loadSession(params: LoadSessionRequest): Promise<LoadSessionResponse> {
    if (!AGENT_CAPABILITIES.loadSession) {
      throw loadSessionUnsupported();
    }
    validateMcpTransports(params.mcpServers, AGENT_CAPABILITIES);

    const sessionId = parseSessionId(params.sessionId);
    const session = sessionId === null ? undefined : this.sessions.get(sessionId);
    if (!session) {
      throw sessionNotFound(params.sessionId);
    }

    for (const message of session.history) {
      this.send(historyReplay(session.id, message));
    }
    await this.broadcaster.flush();

    return {
      ...(session.currentMode !== undefined && {
        modes: { currentModeId: session.currentMode, availableModes: session.availableModes ?? [] },
      }),
      _meta: {
        session_id: session.id,
        created_at: session.createdAt.toISOString(),
        message_count: session.history.length,
        history_replayed: session.history.length,
      },
    };
  }

  async setSessionMode(params: SetSessionModeRequest): Promise<SetSessionModeResponse> {
    const sessionId = parseSessionId(params.sessionId);
    if (sessionId === null) {
      throw invalidSessionId(params.sessionId);
    }
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw sessionNotFound(sessionId);
    }

    const available = session.availableModes ?? [];
    if (!available.some((m) => m.id === params.modeId)) {
      throw invalidParams(`Invalid mode: ${params.modeId}`, "invalid_mode", {
        modeId: params.modeId,
        availableModes: available.map((m) => m.id),
      });
    }

    const changed = session.currentMode !== params.modeId;
    await this.sessions.update(sessionId, (s) => {
      s.currentMode = params.modeId;
    });

    if (changed) {
      try {
        await this.backend.terminate(sessionId);
      } catch (err) {
        this.logger.warn({ sessionId, ...errorFields(err) }, "failed to stop model process for mode switch");
      }
      try {
        await this.backend.spawnAndHandshake(sessionId, session.cwd, session.mcpServers, params.modeId);
      } catch (err) {
        throw internalError(
          `Failed to restart model backend in mode ${params.modeId}: ${err instanceof Error ? err.message : String(err)}`,
          "backend_spawn_failed",
          { sessionId, modeId: params.modeId },
        );
      }
      await this.publish(sessionId, currentModeUpdate(params.modeId));
      await this.broadcaster.flush();
    }

    return {
      _meta: {
        mode_set: true,
        message: "Session mode updated",
        mode_changed: changed,
        ...(changed && { process_action: "process_replaced" }),
      },
    };
  }

  async prompt(params: PromptRequest): Promise<PromptResponse> {
    const sessionId = parseSessionId(params.sessionId);
    if (sessionId === null) {
      throw invalidParams(`Invalid session id: ${params.sessionId}`, "invalid_session_id", {
        sessionId: params.sessionId,
      });
    }
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw sessionNotFound(sessionId);
    }
    validatePrompt(params, this.config.maxPromptLength);

    this.record(sessionId, "prompt", params);
    const userChunks = params.prompt.map((block) => userMessageChunk(block));
    for (const update of userChunks) {
      this.send({ sessionId, update });
    }

    if (this.cancellation.isCancelled(sessionId)) {
      this.cancellation.resetForNewTurn(sessionId);
      await this.broadcaster.flush();
      return cancelled(sessionId, { cancelled_before_processing: true });
    }

    const span = perfStart("acp.prompt");
    try {
      const response = await this.runTurn(session, params);
      this.record(sessionId, "response", response);
      return response;
    } finally {
      this.cancellation.resetForNewTurn(sessionId);
      await this.broadcaster.flush();
      span.end({ sessionId });
    }
  }

  private async runTurn(session: Session, params: PromptRequest): Promise<PromptResponse> {
    const sessionId = session.id;
    const text = promptText(params.prompt);
    const now = new Date();

    const counters = await this.sessions.update(sessionId, (s) => {
      s.turnRequestCount = 0;
      s.turnTokenCount = 0;
      for (const block of params.prompt) {
        s.history.push({ update: userMessageChunk(block), timestamp: now });
      }
      s.turnRequestCount += 1;
      s.turnTokenCount += Math.ceil(text.length / 4);
      return { requests: s.turnRequestCount, tokens: s.turnTokenCount };
    });

    if (counters.requests > this.config.maxTurnRequests) {
      return {
        stopReason: "max_turn_requests",
        _meta: {
          turn_requests: counters.requests,
          max_turn_requests: this.config.maxTurnRequests,
          session_id: sessionId,
        },
      };
    }
    if (counters.tokens > this.config.maxTokensPerTurn) {
      return {
        stopReason: "max_tokens",
        _meta: {
          turn_tokens: counters.tokens,
          max_tokens_per_turn: this.config.maxTokensPerTurn,
          session_id: sessionId,
        },
      };
    }

    const streaming = wantsStreaming(session.clientCapabilities);
    if (this.cancellation.isCancelled(sessionId)) {
      return cancelled(sessionId, { cancelled_before_api_request: true });
    }

    const context: QueryContext = { sessionId, cwd: session.cwd, mcpServers: session.mcpServers };
    let response = "";
    let chunks = 0;
    let backendStop: string | undefined;

    try {
      for await (const chunk of this.backend.queryStream(text, context, session.currentMode)) {
        if (this.cancellation.isCancelled(sessionId)) {
          return cancelled(
            sessionId,
            streaming
              ? { cancelled_during_streaming: true }
              : { cancelled_during_api_response: true, partial_response_length: response.length },
          );
        }
        chunks += 1;
        this.record(sessionId, "backend_chunk", chunk);
        if (chunk.stopReason) backendStop = chunk.stopReason;

        if (chunk.content.length > 0) {
          response += chunk.content;
          if (streaming) await this.publish(sessionId, agentMessageChunk(chunk.content));
        }
        if (chunk.toolCall) {
          const call: ToolCallRecord = {
            id: chunk.toolCall.id ?? `tool_${chunks}`,
            name: chunk.toolCall.name,
            rawInput: chunk.toolCall.input,
          };
          await this.runToolCall(sessionId, call);
        }

        if (this.cancellation.isCancelled(sessionId)) {
          return cancelled(
            sessionId,
            streaming
              ? { cancelled_during_streaming: true }
              : { cancelled_during_api_response: true, partial_response_length: response.length },
          );
        }
      }
    } catch (err) {
      if (this.cancellation.isCancelled(sessionId)) {
        this.logger.debug({ sessionId, ...errorFields(err) }, "model stream ended after cancellation");
        return cancelled(
          sessionId,
          streaming
            ? { cancelled_during_streaming: true }
            : { cancelled_during_api_response: true, partial_response_length: response.length },
        );
      }
      this.logger.error({ sessionId, ...errorFields(err) }, "model backend failed");
      throw internalError(`Model backend failed: ${err instanceof Error ? err.message : String(err)}`, "backend_error", {
        sessionId,
      });
    }

    if (this.cancellation.isCancelled(sessionId)) {
      return cancelled(
        sessionId,
        streaming ? { cancelled_after_streaming: true } : { cancelled_after_api_response: true, response_length: response.length },
      );
    }

    if (!streaming && response.length > 0) {
      await this.publish(sessionId, agentMessageChunk(response));
    }

    if (isRefusal(response)) {
      return {
        stopReason: "refusal",
        _meta: { refusal_detected: true, session_id: sessionId, streaming },
      };
    }

    const stopReason: StopReason = backendStop === "max_tokens" ? "max_tokens" : "end_turn";
    if (streaming) {
      return { stopReason, _meta: { streaming: true, chunks_processed: chunks } };
    }
    const historyLength = this.sessions.get(sessionId)?.history.length ?? 0;
    return {
      stopReason,
      _meta: { processed: true, streaming: false, response_text: response, session_messages: historyLength },
    };
  }

  private async runToolCall(sessionId: string, call: ToolCallRecord): Promise<void> {
    let calls = this.toolCalls.get(sessionId);
    if (!calls) {
      calls = new Map();
      this.toolCalls.set(sessionId, calls);
    }
    calls.set(call.id, call);

    try {
      await this.publish(sessionId, toolCallStarted(call));
      // The client must see the tool_call before any permission request naming it.
      await this.broadcaster.flush();
      const decision = await this.permissions.requestPermission(sessionId, call.id);

      let outcome: ToolCallOutcome;
      if (isAllowed(decision.outcome, decision.options)) {
        try {
          outcome = await this.backend.completeToolCall(sessionId, call, { allowed: true });
        } catch (err) {
          this.logger.warn({ sessionId, tool: call.name, ...errorFields(err) }, "tool execution failed");
          outcome = { status: "failed", reason: err instanceof Error ? err.message : String(err) };
        }
      } else {
        const reason = decision.reason ?? "Permission denied";
        outcome = { status: "failed", reason };
        try {
          await this.backend.completeToolCall(sessionId, call, { allowed: false, reason });
        } catch (err) {
          this.logger.warn({ sessionId, tool: call.name, ...errorFields(err) }, "failed to hand denial to model");
        }
      }

      await this.publish(sessionId, toolCallFinished(call, outcome));
      if (call.name === PLAN_TOOL_NAME) {
        await this.applyTodoWrite(sessionId, call);
      }
    } finally {
      calls.delete(call.id);
      if (calls.size === 0) this.toolCalls.delete(sessionId);
    }
  }

  private async applyTodoWrite(sessionId: string, call: ToolCallRecord): Promise<void> {
    try {
      const plan = this.plans.updatePlan(sessionId, planFromTodoWrite(call.rawInput));
      await this.publish(sessionId, planUpdate(plan));
    } catch (err) {
      if (!(err instanceof PlanConversionError)) throw err;
      this.logger.warn({ sessionId, ...errorFields(err) }, "ignoring malformed TodoWrite input");
    }
  }

  /** Set one plan entry's status and broadcast the whole plan. */
  async updatePlanEntryStatus(sessionId: string, entryId: string, status: PlanStatus): Promise<void> {
    if (!this.plans.updatePlanEntryStatus(sessionId, entryId, status)) {
      throw invalidParams(`Plan entry not found: ${entryId}`, "plan_entry_not_found", { sessionId, entryId });
    }
    const plan = this.plans.getPlan(sessionId);
    if (plan) await this.publish(sessionId, planUpdate(plan));
  }

  async cancel(params: CancelNotification): Promise<void> {
    const sessionId = parseSessionId(params.sessionId) ?? params.sessionId;
    this.logger.info({ sessionId }, "cancel requested");

    this.cancellation.markCancelled(sessionId, "Client sent session/cancel notification");
    for (const operation of CANCELLED_OPERATIONS) {
      this.cancellation.addCancelledOperation(sessionId, operation);
    }

    try {
      await this.backend.interrupt(sessionId);
    } catch (err) {
      this.logger.warn({ sessionId, ...errorFields(err) }, "failed to interrupt model");
    }

    const at = this.cancellation.getState(sessionId).cancellationTime ?? new Date();
    this.send(cancellationNotice(sessionId, at));
  }

  async extMethod(method: string, params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const caps = this.clientCapabilities;
    switch (method) {
      case "fs/read_text_file": {
        if (!caps?.fs?.readTextFile) throw capabilityNotDeclared(method, "fs.readTextFile");
        const p = parseParams(readTextFileSchema, method, params);
        const content = await this.fileOps.readTextFile(p.path, {
          ...(typeof p.line === "number" && { line: p.line }),
          ...(typeof p.limit === "number" && { limit: p.limit }),
        });
        return { content };
      }
      case "fs/write_text_file": {
        if (!caps?.fs?.writeTextFile) throw capabilityNotDeclared(method, "fs.writeTextFile");
        const p = parseParams(writeTextFileSchema, method, params);
        await this.fileOps.writeTextFile(p.path, p.content);
        return {};
      }
      case "terminal/create": {
        if (!caps?.terminal) throw capabilityNotDeclared(method, "terminal");
        const p = parseParams(terminalCreateSchema, method, params);
        return { terminalId: await this.terminals.create(p) };
      }
      case "terminal/output": {
        if (!caps?.terminal) throw capabilityNotDeclared(method, "terminal");
        const p = parseParams(terminalRefSchema, method, params);
        return { ...this.terminals.output(p.terminalId) };
      }
      case "terminal/wait_for_exit": {
        if (!caps?.terminal) throw capabilityNotDeclared(method, "terminal");
        const p = parseParams(terminalRefSchema, method, params);
        return { ...(await this.terminals.waitForExit(p.terminalId)) };
      }
      case "terminal/kill": {
        if (!caps?.terminal) throw capabilityNotDeclared(method, "terminal");
        const p = parseParams(terminalRefSchema, method, params);
        this.terminals.kill(p.terminalId);
        return {};
      }
      case "terminal/release": {
        if (!caps?.terminal) throw capabilityNotDeclared(method, "terminal");
        const p = parseParams(terminalRefSchema, method, params);
        this.terminals.release(p.terminalId);
        return {};
      }
      case "editor/update_buffers": {
        if (!supportsEditorState(caps)) throw capabilityNotDeclared(method, "fs._meta.editorState");
        const p = parseParams(editorBuffersSchema, method, params);
        return { ...this.editorBuffers.apply(p) };
      }
      default:
        throw methodNotFound(method);
    }
  }

  async extNotification(method: string, params: Record<string, unknown>): Promise<void> {
    this.logger.debug({ method, params }, "ignoring extension notification");
  }

  /** Stop terminals, close transcripts and detach from the MCP manager. */
  async dispose(): Promise<void> {
    this.unsubscribeMcp?.();
    this.terminals.releaseAll();
    await this.broadcaster.flush();
    await this.recorders?.closeAll();
  }

  private async sendAvailableCommands(sessionId: string): Promise<void> {
    if (!this.mcpManager) return;
    let availableCommands: AvailableCommand[];
    try {
      const prompts = await this.mcpManager.listAvailablePrompts();
      availableCommands = prompts.map((p) => {
        const args = p.arguments ?? [];
        return {
          name: p.name,
          description: p.description ?? "",
          ...(args.length > 0 && { input: { hint: args.map((a) => a.name).join(" ") } }),
        };
      });
    } catch (err) {
      this.logger.warn({ sessionId, ...errorFields(err) }, "failed to list MCP prompts");
      return;
    }
    this.send({ sessionId, update: { sessionUpdate: "available_commands_update", availableCommands } });
  }

  private record(sessionId: string, kind: "notification" | "backend_chunk" | "prompt" | "response", data: unknown): void {
    this.recorders?.get(sessionId)?.record(sessionId, kind, data);
  }

  /** Broadcast without touching history. */
  private send(notification: SessionNotification): void {
    this.record(notification.sessionId, "notification", notification);
    const result = this.broadcaster.send(notification);
    if (!result.ok) {
      this.logger.debug({ sessionId: notification.sessionId, reason: result.reason }, "notification not delivered");
    }
  }

  /** Append to history, then broadcast. A history failure is logged and the update still goes out. */
  private async publish(sessionId: string, update: SessionUpdate): Promise<void> {
    try {
      await this.sessions.update(sessionId, (s) => {
        s.history.push({ update, timestamp: new Date() });
      });
    } catch (err) {
      this.logger.warn({ sessionId, ...errorFields(err) }, "failed to store history message");
    }
    this.send({ sessionId, update });
  }
}

export interface AcpRuntime {
  connection: AgentSideConnection;
  /** Release terminals and transcripts. Safe to call more than once. */
  shutdown(): Promise<void>;
}

/** Serve ACP over stdio with the Claude backend. */
export function runAcp(config: AgentConfig, logger: Logger): AcpRuntime {
  const stream = ndJsonStream(nodeToWebWritable(process.stdout), nodeToWebReadable(process.stdin));
  const recorders = new RawRecorderRegistry(logger);
  const backend = new ClaudeBackend({
    logger,
    model: config.model,
    executable: config.claudeExecutable,
    defaultMode: config.defaultMode,
  });

  let agent: BridgeAcpAgent | undefined;
  const connection = new AgentSideConnection((client) => {
    agent = new BridgeAcpAgent(client, { config, logger, backend, recorders });
    return agent;
  }, stream);

  return {
    connection,
    async shutdown() {
      await agent?.dispose();
    },
  };
}
