// Export the engine and its collaborators for library usage

// --- ACP Layer ---
export { BridgeAcpAgent, runAcp, AGENT_CAPABILITIES, EXT_METHODS } from "./acp/agent.js";
export type { BridgeAgentDeps, AcpRuntime } from "./acp/agent.js";
export { InMemorySessionTable, parseSessionId, generateSessionId, SessionNotFoundError } from "./acp/session-table.js";
export type { SessionTable } from "./acp/session-table.js";
export { CancellationCoordinator, CANCELLED_OPERATIONS } from "./acp/cancellation.js";
export type { CancellationState, CancellationEvent } from "./acp/cancellation.js";
export { NotificationBroadcaster, connectClient } from "./acp/broadcaster.js";
export type { SendResult, Subscription } from "./acp/broadcaster.js";
export { PlanTracker, planFromTodoWrite, PlanConversionError } from "./acp/plan.js";
export type { AgentPlan, TrackedPlanEntry, PlanStatus } from "./acp/plan.js";
export { isRefusal } from "./acp/refusal.js";
export { EditorBufferCache } from "./acp/editor-buffers.js";
export { ProcessTerminalService } from "./acp/terminals.js";
export type { TerminalService, TerminalOutput, TerminalExitStatus } from "./acp/terminals.js";
export { ErrorCode } from "./acp/errors.js";
export type { AcpClient, Logger, Session, HistoryMessage, ToolCallRecord } from "./acp/types.js";

// --- SDK Layer ---
export { ClaudeBackend } from "./sdk/claude-backend.js";
export type {
  BackendChunk,
  BackendToolCall,
  HandshakeResult,
  McpManager,
  ModelBackend,
  QueryContext,
  ToolVerdict,
} from "./sdk/backend.js";
export { PermissionFlow, isAllowed } from "./sdk/permissions.js";
export type { PermissionDecision } from "./sdk/permissions.js";
export { RulePolicyEvaluator, DEFAULT_PERMISSION_RULES } from "./sdk/policy.js";
export type { PermissionPolicyEvaluator, PolicyEvaluation } from "./sdk/policy.js";
export { PermissionPreferenceCache } from "./sdk/preferences.js";

// --- Disk Layer ---
export { FileOperations } from "./disk/file-ops.js";
export { RawMessageRecorder, RawRecorderRegistry } from "./disk/raw-recorder.js";
export { readAgentDefinitions } from "./disk/agents.js";

// --- Config & utils ---
export { loadConfig, parseConfig, defaultConfig, ConfigError } from "./config.js";
export type { AgentConfig, PermissionRule } from "./config.js";
export { createLogger, silentLogger } from "./utils/log.js";
