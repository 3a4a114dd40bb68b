import type {
  AgentSideConnection,
  ClientCapabilities,
  McpServer,
  SessionMode,
  SessionNotification,
} from "@agentclientprotocol/sdk";

/**
 * Structured logger surface. pino loggers satisfy it directly; tests pass
 * `vi.fn()` mocks.
 */
export interface Logger {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
}

/** The slice of the client connection the engine calls into. */
export type AcpClient = Pick<AgentSideConnection, "sessionUpdate" | "requestPermission">;

export type SessionUpdate = SessionNotification["update"];

export interface HistoryMessage {
  update: SessionUpdate;
  timestamp: Date;
}

export interface Session {
  id: string;
  cwd: string;
  clientCapabilities: ClientCapabilities;
  currentMode?: string;
  availableModes?: SessionMode[];
  history: HistoryMessage[];
  turnRequestCount: number;
  turnTokenCount: number;
  mcpServers: McpServer[];
  createdAt: Date;
  lastAccessed: Date;
}

/** A tool invocation requested by the model, as seen by the permission flow. */
export interface ToolCallRecord {
  id: string;
  name: string;
  rawInput: Record<string, unknown>;
}

export const PLAN_TOOL_NAME = "TodoWrite";

export const AGENT_INFO = {
  name: "acp-bridge-agent",
  title: "ACP Bridge Agent",
  version: "0.1.0",
} as const;
