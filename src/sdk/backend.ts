/**
 * Seams between the protocol engine and the things it drives: the model
 * process and, optionally, an MCP manager.
 */
import type { McpServer, SessionMode } from "@agentclientprotocol/sdk";
import type { ToolCallOutcome } from "../acp/notifications.js";
import type { ToolCallRecord } from "../acp/types.js";

export interface BackendToolCall {
  /** Absent when the backend does not assign ids. */
  id?: string;
  name: string;
  input: Record<string, unknown>;
}

export type BackendStopReason = "end_turn" | "max_tokens" | "stop_sequence" | "tool_use" | "refusal";

/** One unit of model output. Text, a tool request, or the end-of-turn marker. */
export interface BackendChunk {
  content: string;
  toolCall?: BackendToolCall;
  stopReason?: BackendStopReason;
}

export interface HandshakeResult {
  modes?: SessionMode[];
  currentMode?: string;
}

export interface QueryContext {
  sessionId: string;
  cwd: string;
  mcpServers: McpServer[];
}

export type ToolVerdict = { allowed: true } | { allowed: false; reason: string };

export interface ModelBackend {
  spawnAndHandshake(sessionId: string, cwd: string, mcpServers: McpServer[], mode?: string): Promise<HandshakeResult>;
  queryStream(text: string, context: QueryContext, mode?: string): AsyncIterable<BackendChunk>;
  /**
   * Hand the permission verdict to the model process. For an allowed call,
   * resolves with the tool's result once it has run.
   */
  completeToolCall(sessionId: string, call: ToolCallRecord, verdict: ToolVerdict): Promise<ToolCallOutcome>;
  /** Stop the in-flight query, keeping the session usable. */
  interrupt(sessionId: string): Promise<void>;
  terminate(sessionId: string): Promise<void>;
}

export interface McpPromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface McpPrompt {
  name: string;
  description?: string;
  arguments?: McpPromptArgument[];
}

export interface McpTool {
  name: string;
  description?: string;
}

export interface McpManager {
  listAvailablePrompts(): Promise<McpPrompt[]>;
  listAvailableTools(): Promise<McpTool[]>;
  subscribeToChangeNotifications(callback: () => void): () => void;
}
