/**
 * Builders for the session updates the engine emits.
 */
import type { ContentBlock, SessionNotification, ToolCallContent, ToolKind } from "@agentclientprotocol/sdk";
import type { AgentPlan } from "./plan.js";
import { toAcpPlanEntries } from "./plan.js";
import type { HistoryMessage, SessionUpdate, ToolCallRecord } from "./types.js";

export const CANCELLATION_NOTICE = "[Session cancelled by client request]";

export function toolKindFor(toolName: string): ToolKind {
  const name = toolName.toLowerCase();
  if (name.includes("read")) return "read";
  if (name.includes("write") || name.includes("edit")) return "edit";
  if (name.includes("bash") || name.includes("execute")) return "execute";
  return "other";
}

export function textBlock(text: string, meta?: Record<string, unknown>): ContentBlock {
  return meta ? { type: "text", text, _meta: meta } : { type: "text", text };
}

export function userMessageChunk(content: ContentBlock): SessionUpdate {
  return { sessionUpdate: "user_message_chunk", content };
}

export function agentMessageChunk(text: string, meta?: Record<string, unknown>): SessionUpdate {
  return { sessionUpdate: "agent_message_chunk", content: textBlock(text, meta) };
}

export function toolCallStarted(call: ToolCallRecord): SessionUpdate {
  return {
    sessionUpdate: "tool_call",
    toolCallId: call.id,
    title: call.name,
    kind: toolKindFor(call.name),
    status: "pending",
    rawInput: call.rawInput,
  };
}

export type ToolCallOutcome =
  | { status: "completed"; output?: string; rawOutput?: Record<string, unknown> }
  | { status: "failed"; reason: string };

export function toolCallFinished(call: ToolCallRecord, outcome: ToolCallOutcome): SessionUpdate {
  if (outcome.status === "failed") {
    return {
      sessionUpdate: "tool_call_update",
      toolCallId: call.id,
      status: "failed",
      content: [{ type: "content", content: textBlock(outcome.reason) }],
      rawOutput: { error: outcome.reason },
    };
  }
  const content: ToolCallContent[] = outcome.output
    ? [{ type: "content", content: textBlock(outcome.output) }]
    : [];
  return {
    sessionUpdate: "tool_call_update",
    toolCallId: call.id,
    status: "completed",
    content,
    ...(outcome.rawOutput && { rawOutput: outcome.rawOutput }),
  };
}

export function planUpdate(plan: AgentPlan): SessionUpdate {
  return {
    sessionUpdate: "plan",
    entries: toAcpPlanEntries(plan),
    ...(plan.metadata && { _meta: plan.metadata }),
  };
}

export function currentModeUpdate(modeId: string): SessionUpdate {
  return { sessionUpdate: "current_mode_update", currentModeId: modeId };
}

export function cancellationNotice(sessionId: string, at: Date): SessionNotification {
  return {
    sessionId,
    update: agentMessageChunk(CANCELLATION_NOTICE, {
      cancelled_at: at.toISOString(),
      reason: "client_cancellation",
      session_id: sessionId,
    }),
    _meta: { final_update: true, cancellation: true },
  };
}

/** A stored history message re-sent during session/load. */
export function historyReplay(sessionId: string, message: HistoryMessage): SessionNotification {
  return {
    sessionId,
    update: message.update,
    _meta: {
      timestamp: Math.floor(message.timestamp.getTime() / 1000),
      message_type: "historical_replay",
    },
  };
}
