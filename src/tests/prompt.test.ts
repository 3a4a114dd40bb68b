import { describe, it, expect } from "vitest";
import { generateSessionId } from "../acp/session-table.js";
import { RulePolicyEvaluator } from "../sdk/policy.js";
import { PermissionPreferenceCache } from "../sdk/preferences.js";
import { createTestAgent, FakeBackend, textPrompt, updatesOfKind, type TestAgentOptions } from "./fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function setup(options: TestAgentOptions & { streaming?: boolean } = {}) {
  const { streaming, ...rest } = options;
  const env = createTestAgent(rest);
  await env.agent.initialize({
    protocolVersion: 1,
    clientCapabilities: streaming ? { _meta: { streaming: true } } : {},
  });
  const { sessionId } = await env.agent.newSession({ cwd: "/work", mcpServers: [] });
  env.updates.length = 0;
  return { ...env, sessionId };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("prompt() validation", () => {
  it("rejects an id that does not parse", async () => {
    const { agent } = await setup();
    await expect(agent.prompt(textPrompt("abc", "hi"))).rejects.toMatchObject({
      code: -32602,
      data: { errorType: "invalid_session_id" },
    });
  });

  it("rejects an unknown session", async () => {
    const { agent } = await setup();
    await expect(agent.prompt(textPrompt(generateSessionId(), "hi"))).rejects.toMatchObject({
      code: -32602,
      data: { errorType: "session_not_found" },
    });
  });

  it("rejects a prompt with no blocks", async () => {
    const { agent, sessionId } = await setup();
    await expect(agent.prompt({ sessionId, prompt: [] })).rejects.toMatchObject({
      code: -32602,
      message: "Prompt must contain at least one content block",
      data: { errorType: "empty_prompt" },
    });
  });

  it("rejects a prompt whose blocks are all blank", async () => {
    const { agent, sessionId } = await setup();
    await expect(agent.prompt(textPrompt(sessionId, "   "))).rejects.toMatchObject({
      message: "Prompt must contain at least one non-empty content block",
    });
  });

  it("rejects a prompt over the configured length", async () => {
    const { agent, sessionId } = await setup({ config: { maxPromptLength: 5 } });
    await expect(agent.prompt(textPrompt(sessionId, "123456"))).rejects.toMatchObject({
      code: -32602,
      message: "Prompt too long: 6 characters exceeds maximum 5",
      data: { errorType: "prompt_too_long", length: 6, maxLength: 5 },
    });
  });
});

// ---------------------------------------------------------------------------
// Turn limits and cancellation
// ---------------------------------------------------------------------------

describe("prompt() turn control", () => {
  it("echoes each prompt block as a user message chunk", async () => {
    const { agent, updates, sessionId } = await setup();
    await agent.prompt({
      sessionId,
      prompt: [
        { type: "text", text: "look at" },
        { type: "resource_link", uri: "file:///work/a.ts", name: "a.ts" },
      ],
    });
    expect(updatesOfKind(updates, "user_message_chunk").map((u) => u.content.type)).toEqual(["text", "resource_link"]);
  });

  it("returns cancelled without calling the backend when cancelled before the turn", async () => {
    const { agent, backend, sessionId } = await setup();
    await agent.cancel({ sessionId });

    const response = await agent.prompt(textPrompt(sessionId, "hello"));

    expect(response).toEqual({
      stopReason: "cancelled",
      _meta: { cancelled_before_processing: true, session_id: sessionId },
    });
    expect(backend.queries).toEqual([]);
    expect(agent.cancellation.isCancelled(sessionId)).toBe(false);

    const next = await agent.prompt(textPrompt(sessionId, "hello again"));
    expect(next.stopReason).toBe("end_turn");
    expect(backend.queries.map((q) => q.text)).toEqual(["hello again"]);
  });

  it("stops at the request limit", async () => {
    const { agent, backend, sessionId } = await setup({ config: { maxTurnRequests: 0 } });
    const response = await agent.prompt(textPrompt(sessionId, "hello"));
    expect(response).toEqual({
      stopReason: "max_turn_requests",
      _meta: { turn_requests: 1, max_turn_requests: 0, session_id: sessionId },
    });
    expect(backend.queries).toEqual([]);
  });

  it("resets the request counter every turn", async () => {
    const { agent, sessionId } = await setup({ config: { maxTurnRequests: 1 } });
    expect((await agent.prompt(textPrompt(sessionId, "one"))).stopReason).toBe("end_turn");
    expect((await agent.prompt(textPrompt(sessionId, "two"))).stopReason).toBe("end_turn");
    expect(agent.sessions.get(sessionId)?.turnRequestCount).toBe(1);
  });

  it("stops at the token limit", async () => {
    const { agent, sessionId } = await setup({ config: { maxTokensPerTurn: 1 } });
    const response = await agent.prompt(textPrompt(sessionId, "hello world"));
    expect(response).toEqual({
      stopReason: "max_tokens",
      _meta: { turn_tokens: 3, max_tokens_per_turn: 1, session_id: sessionId },
    });
  });

  it("returns cancelled when a cancel lands mid-stream", async () => {
    const backend = new FakeBackend([{ content: "a" }, { content: "b" }, { content: "", stopReason: "end_turn" }]);
    const { agent, sessionId } = await setup({ backend });
    backend.beforeChunk = async (index) => {
      if (index === 1) await agent.cancel({ sessionId });
    };

    const response = await agent.prompt(textPrompt(sessionId, "go"));

    expect(response).toEqual({
      stopReason: "cancelled",
      _meta: { cancelled_during_api_response: true, partial_response_length: 1, session_id: sessionId },
    });
    expect(backend.interrupted).toEqual([sessionId]);
    expect(agent.cancellation.isCancelled(sessionId)).toBe(false);
  });

  it("reports streaming cancellation in streaming mode", async () => {
    const backend = new FakeBackend([{ content: "a" }, { content: "b" }]);
    const { agent, sessionId } = await setup({ backend, streaming: true });
    backend.beforeChunk = async (index) => {
      if (index === 1) await agent.cancel({ sessionId });
    };

    const response = await agent.prompt(textPrompt(sessionId, "go"));
    expect(response).toEqual({
      stopReason: "cancelled",
      _meta: { cancelled_during_streaming: true, session_id: sessionId },
    });
  });

  it("maps a backend failure to an internal error", async () => {
    const backend = new FakeBackend([{ content: "partial" }]);
    backend.streamError = new Error("process exited");
    const { agent, sessionId } = await setup({ backend });

    await expect(agent.prompt(textPrompt(sessionId, "go"))).rejects.toMatchObject({
      code: -32603,
      message: "Model backend failed: process exited",
      data: { errorType: "backend_error", sessionId },
    });
  });
});

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

describe("prompt() output", () => {
  it("sends one message with the whole response when batching", async () => {
    const backend = new FakeBackend([{ content: "Hel" }, { content: "lo" }, { content: "", stopReason: "end_turn" }]);
    const { agent, updates, sessionId } = await setup({ backend });

    const response = await agent.prompt(textPrompt(sessionId, "greet me"));

    expect(response).toEqual({
      stopReason: "end_turn",
      _meta: { processed: true, streaming: false, response_text: "Hello", session_messages: 2 },
    });
    expect(updatesOfKind(updates, "agent_message_chunk")).toEqual([
      { sessionUpdate: "agent_message_chunk", content: { type: "text", text: "Hello" } },
    ]);
    expect(backend.queries[0]).toEqual({
      text: "greet me",
      context: { sessionId, cwd: "/work", mcpServers: [] },
      mode: undefined,
    });
  });

  it("forwards every text chunk when streaming", async () => {
    const backend = new FakeBackend([{ content: "Hel" }, { content: "lo" }, { content: "", stopReason: "end_turn" }]);
    const { agent, updates, sessionId } = await setup({ backend, streaming: true });

    const response = await agent.prompt(textPrompt(sessionId, "greet me"));

    expect(response).toEqual({ stopReason: "end_turn", _meta: { streaming: true, chunks_processed: 3 } });
    expect(updatesOfKind(updates, "agent_message_chunk").map((u) => u.content)).toEqual([
      { type: "text", text: "Hel" },
      { type: "text", text: "lo" },
    ]);
    expect(agent.sessions.get(sessionId)?.history).toHaveLength(3);
  });

  it("passes max_tokens through from the backend", async () => {
    const backend = new FakeBackend([{ content: "cut off" }, { content: "", stopReason: "max_tokens" }]);
    const { agent, sessionId } = await setup({ backend });
    expect((await agent.prompt(textPrompt(sessionId, "write a novel"))).stopReason).toBe("max_tokens");
  });

  it("treats other backend stop reasons as end_turn", async () => {
    const backend = new FakeBackend([{ content: "ok" }, { content: "", stopReason: "stop_sequence" }]);
    const { agent, sessionId } = await setup({ backend });
    expect((await agent.prompt(textPrompt(sessionId, "go"))).stopReason).toBe("end_turn");
  });

  it("detects a refusal", async () => {
    const backend = new FakeBackend([{ content: "I can't help with that." }]);
    const { agent, updates, sessionId } = await setup({ backend });

    const response = await agent.prompt(textPrompt(sessionId, "do something"));

    expect(response).toEqual({
      stopReason: "refusal",
      _meta: { refusal_detected: true, session_id: sessionId, streaming: false },
    });
    expect(updatesOfKind(updates, "agent_message_chunk")).toHaveLength(1);
  });

  it("sends the mode to the backend", async () => {
    const backend = new FakeBackend();
    backend.handshake = { modes: [{ id: "reviewer", name: "reviewer" }], currentMode: "reviewer" };
    const { agent, sessionId } = await setup({ backend });
    await agent.prompt(textPrompt(sessionId, "review"));
    expect(backend.queries[0].mode).toBe("reviewer");
  });
});

// ---------------------------------------------------------------------------
// Tool calls
// ---------------------------------------------------------------------------

describe("prompt() tool calls", () => {
  it("runs a tool the policy allows", async () => {
    const backend = new FakeBackend([
      { content: "", toolCall: { id: "tu_1", name: "Read", input: { file_path: "/work/a.ts" } } },
      { content: "done" },
    ]);
    const { agent, client, updates, sessionId } = await setup({ backend });

    await agent.prompt(textPrompt(sessionId, "read it"));

    expect(client.requestPermission).not.toHaveBeenCalled();
    expect(backend.verdicts.map((v) => v.verdict)).toEqual([{ allowed: true }]);
    expect(updatesOfKind(updates, "tool_call")).toEqual([
      {
        sessionUpdate: "tool_call",
        toolCallId: "tu_1",
        title: "Read",
        kind: "read",
        status: "pending",
        rawInput: { file_path: "/work/a.ts" },
      },
    ]);
    expect(updatesOfKind(updates, "tool_call_update")).toEqual([
      {
        sessionUpdate: "tool_call_update",
        toolCallId: "tu_1",
        status: "completed",
        content: [{ type: "content", content: { type: "text", text: "tool output" } }],
      },
    ]);
  });

  it("delivers the tool_call before asking for permission", async () => {
    const backend = new FakeBackend([
      { content: "streamed before the tool" },
      { content: "", toolCall: { id: "tu_1", name: "Bash", input: { command: "ls" } } },
    ]);
    const { agent, client, updates, sessionId } = await setup({ backend, streaming: true });
    let seenAtRequest: string[] = [];
    client.requestPermission.mockImplementation(async () => {
      seenAtRequest = updates.map((u) => u.update.sessionUpdate);
      return { outcome: { outcome: "selected", optionId: "allow-once" } };
    });

    await agent.prompt(textPrompt(sessionId, "list files"));

    expect(seenAtRequest).toEqual(["user_message_chunk", "agent_message_chunk", "tool_call"]);
  });

  it("streams text around a tool call and keeps every update in history", async () => {
    const backend = new FakeBackend([
      { content: "Let me look." },
      { content: "", toolCall: { id: "tu_1", name: "Read", input: { file_path: "/work/a.ts" } } },
      { content: "Looks fine." },
    ]);
    const { agent, updates, sessionId } = await setup({ backend, streaming: true });

    const response = await agent.prompt(textPrompt(sessionId, "check a.ts"));

    expect(response).toEqual({ stopReason: "end_turn", _meta: { streaming: true, chunks_processed: 3 } });
    const broadcast = updates.map((u) => u.update);
    expect(broadcast.map((u) => u.sessionUpdate)).toEqual([
      "user_message_chunk",
      "agent_message_chunk",
      "tool_call",
      "tool_call_update",
      "agent_message_chunk",
    ]);
    expect(updatesOfKind(updates, "agent_message_chunk").map((u) => u.content)).toEqual([
      { type: "text", text: "Let me look." },
      { type: "text", text: "Looks fine." },
    ]);
    expect(updatesOfKind(updates, "tool_call_update")).toEqual([
      {
        sessionUpdate: "tool_call_update",
        toolCallId: "tu_1",
        status: "completed",
        content: [{ type: "content", content: { type: "text", text: "tool output" } }],
      },
    ]);
    expect(agent.sessions.get(sessionId)?.history.map((m) => m.update)).toEqual(broadcast);
  });

  it("asks the client and does not remember a one-time answer", async () => {
    const backend = new FakeBackend([{ content: "", toolCall: { id: "tu_1", name: "Bash", input: { command: "ls" } } }]);
    const preferences = new PermissionPreferenceCache();
    const { agent, client, sessionId } = await setup({ backend, preferences });
    client.requestPermission.mockResolvedValue({ outcome: { outcome: "selected", optionId: "allow-once" } });

    await agent.prompt(textPrompt(sessionId, "list files"));
    await agent.prompt(textPrompt(sessionId, "list files again"));

    expect(client.requestPermission).toHaveBeenCalledTimes(2);
    expect(client.requestPermission.mock.calls[0][0]).toEqual({
      sessionId,
      options: [
        { optionId: "allow-once", name: "Allow once", kind: "allow_once" },
        { optionId: "reject-once", name: "Reject", kind: "reject_once" },
        { optionId: "reject-always", name: "Reject always (Bash)", kind: "reject_always" },
      ],
      toolCall: { toolCallId: "tu_1", title: "Bash", rawInput: { command: "ls" } },
    });
    expect(preferences.size).toBe(0);
    expect(backend.verdicts.map((v) => v.verdict)).toEqual([{ allowed: true }, { allowed: true }]);
  });

  it("reports a rejected tool as failed with the reason", async () => {
    const backend = new FakeBackend([{ content: "", toolCall: { id: "tu_1", name: "Bash", input: {} } }]);
    const { agent, client, updates, sessionId } = await setup({ backend });
    client.requestPermission.mockResolvedValue({ outcome: { outcome: "selected", optionId: "reject-once" } });

    await agent.prompt(textPrompt(sessionId, "rm it"));

    const reason = "User rejected permission for Bash";
    expect(backend.verdicts.map((v) => v.verdict)).toEqual([{ allowed: false, reason }]);
    expect(updatesOfKind(updates, "tool_call_update")).toEqual([
      {
        sessionUpdate: "tool_call_update",
        toolCallId: "tu_1",
        status: "failed",
        content: [{ type: "content", content: { type: "text", text: reason } }],
        rawOutput: { error: reason },
      },
    ]);
  });

  it("refuses tools the policy denies without asking", async () => {
    const backend = new FakeBackend([{ content: "", toolCall: { id: "tu_1", name: "WebFetch", input: {} } }]);
    const policy = new RulePolicyEvaluator([{ toolPattern: "Web*", action: "deny", risk: "high" }]);
    const { agent, client, sessionId } = await setup({ backend, policy });

    await agent.prompt(textPrompt(sessionId, "fetch"));

    expect(client.requestPermission).not.toHaveBeenCalled();
    expect(backend.verdicts[0].verdict).toEqual({ allowed: false, reason: "Tool 'WebFetch' is denied by policy" });
  });

  it("numbers tool calls the backend left without an id", async () => {
    const backend = new FakeBackend([{ content: "thinking" }, { content: "", toolCall: { name: "Grep", input: {} } }]);
    const { agent, updates, sessionId } = await setup({ backend });

    await agent.prompt(textPrompt(sessionId, "search"));

    expect(updatesOfKind(updates, "tool_call").map((u) => u.toolCallId)).toEqual(["tool_2"]);
  });

  it("tracks TodoWrite calls as a plan", async () => {
    const todos = [
      { content: "Write tests", status: "in_progress", activeForm: "Writing tests" },
      { content: "Ship it", status: "pending" },
    ];
    const backend = new FakeBackend([{ content: "", toolCall: { id: "todo_1", name: "TodoWrite", input: { todos } } }]);
    const { agent, updates, sessionId } = await setup({ backend });

    await agent.prompt(textPrompt(sessionId, "plan"));

    const plans = updatesOfKind(updates, "plan");
    expect(plans).toHaveLength(1);
    expect(plans[0].entries.map(({ content, status, priority }) => ({ content, status, priority }))).toEqual([
      { content: "Writing tests", status: "in_progress", priority: "high" },
      { content: "Ship it", status: "pending", priority: "medium" },
    ]);
    expect(updates.map((u) => u.update.sessionUpdate)).toEqual([
      "user_message_chunk",
      "tool_call",
      "tool_call_update",
      "plan",
    ]);

    const plan = agent.plans.getPlan(sessionId);
    expect(plan?.entries.map((e) => e.key)).toEqual(["Write tests", "Ship it"]);
  });

  it("updates a single plan entry by id", async () => {
    const todos = [{ content: "Ship it", status: "pending" }];
    const backend = new FakeBackend([{ content: "", toolCall: { id: "todo_1", name: "TodoWrite", input: { todos } } }]);
    const { agent, updates, sessionId } = await setup({ backend });
    await agent.prompt(textPrompt(sessionId, "plan"));
    const entryId = agent.plans.getPlan(sessionId)?.entries[0].id ?? "";
    updates.length = 0;

    await agent.updatePlanEntryStatus(sessionId, entryId, "completed");
    await agent.broadcaster.flush();

    const plans = updatesOfKind(updates, "plan");
    expect(plans[0].entries[0]).toMatchObject({ content: "Ship it", status: "completed", priority: "low" });
    await expect(agent.updatePlanEntryStatus(sessionId, "missing", "completed")).rejects.toMatchObject({
      code: -32602,
      data: { errorType: "plan_entry_not_found", entryId: "missing" },
    });
  });

  it("ignores malformed TodoWrite input", async () => {
    const backend = new FakeBackend([
      { content: "", toolCall: { id: "todo_1", name: "TodoWrite", input: { todos: "not a list" } } },
    ]);
    const { agent, updates, logger, sessionId } = await setup({ backend });

    await agent.prompt(textPrompt(sessionId, "plan"));

    expect(updatesOfKind(updates, "plan")).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ sessionId }), "ignoring malformed TodoWrite input");
  });
});
