/**
 * Request validation for the protocol engine: version negotiation, client
 * capability checks, MCP transport checks and prompt shape checks.
 * Everything here runs before any state is touched.
 */
import type {
  AgentCapabilities,
  ClientCapabilities,
  ContentBlock,
  McpServer,
  PromptRequest,
  RequestError,
} from "@agentclientprotocol/sdk";
import { ErrorCode, invalidParams, protocolError } from "./errors.js";
import { AGENT_INFO, type Logger } from "./types.js";

export const SUPPORTED_PROTOCOL_VERSIONS: readonly number[] = [0, 1];
export const LATEST_PROTOCOL_VERSION = Math.max(...SUPPORTED_PROTOCOL_VERSIONS);

/** Echo a supported version, otherwise offer the newest one we speak. */
export function negotiateProtocolVersion(requested: number): number {
  return SUPPORTED_PROTOCOL_VERSIONS.includes(requested) ? requested : LATEST_PROTOCOL_VERSION;
}

/** Hard check used when the agent is configured to refuse unsupported versions. */
export function validateProtocolVersion(requested: number): void {
  if (SUPPORTED_PROTOCOL_VERSIONS.includes(requested)) return;
  const latest = LATEST_PROTOCOL_VERSION;
  throw protocolError(
    ErrorCode.InvalidRequest,
    `Protocol version ${requested} is not supported by this agent. The latest supported version is ${latest}. Please upgrade your client or use a compatible protocol version.`,
    {
      errorType: "protocol_version_mismatch",
      requestedVersion: requested,
      supportedVersion: latest,
      supportedVersions: [...SUPPORTED_PROTOCOL_VERSIONS],
      action: "downgrade_or_disconnect",
      severity: "fatal",
      recoverySuggestions: [
        `Downgrade client to use protocol version ${latest}`,
        "Check for agent updates that support your protocol version",
        "Verify client-agent compatibility requirements",
      ],
      compatibilityInfo: {
        agentVersion: AGENT_INFO.version,
        backwardCompatible: SUPPORTED_PROTOCOL_VERSIONS.length > 1,
      },
    },
  );
}

export function jsonTypeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

const BOOLEAN_META_CAPABILITIES = new Set(["streaming", "notifications", "progress"]);

/**
 * Known flags must have the right type; anything else is accepted and
 * logged so newer clients keep working.
 */
export function validateClientCapabilities(caps: ClientCapabilities | undefined, logger: Logger): void {
  if (!caps) return;

  for (const [key, value] of Object.entries(caps._meta ?? {})) {
    if (!BOOLEAN_META_CAPABILITIES.has(key)) {
      logger.debug({ capability: key }, "unknown client meta capability");
      continue;
    }
    if (typeof value !== "boolean") {
      throw invalidParams(
        `Invalid client capabilities: '${key}' must be a boolean value, received ${JSON.stringify(value)}`,
        "invalid_capability_type",
        {
          invalidCapability: key,
          expectedType: "boolean",
          receivedType: jsonTypeName(value),
          receivedValue: value,
          recoverySuggestion: `Set '${key}' to true or false`,
        },
      );
    }
  }

  for (const [key, value] of Object.entries(caps.fs?._meta ?? {})) {
    if (key !== "encoding") {
      logger.debug({ capability: key }, "unknown filesystem meta capability");
      continue;
    }
    if (typeof value !== "string") {
      throw invalidParams(`Invalid filesystem capability: '${key}' must be a string value`, "invalid_capability_type", {
        invalidCapability: key,
        capabilityCategory: "filesystem",
        expectedType: "string",
        receivedType: jsonTypeName(value),
        recoverySuggestion: "Specify encoding as a string (e.g., 'utf-8', 'latin1')",
      });
    }
  }
}

export function wantsStreaming(caps: ClientCapabilities | undefined): boolean {
  return caps?._meta?.streaming === true;
}

export function supportsEditorState(caps: ClientCapabilities | undefined): boolean {
  return caps?.fs?._meta?.editorState === true;
}

export type McpTransport = "stdio" | "http" | "sse";

export function mcpTransport(server: McpServer): McpTransport {
  return "type" in server ? server.type : "stdio";
}

/** stdio is always accepted; http and sse only when declared in our capabilities. */
export function validateMcpTransports(servers: McpServer[] | undefined, capabilities: AgentCapabilities): void {
  const declared = capabilities.mcpCapabilities ?? {};
  const supportedTransports: McpTransport[] = ["stdio"];
  if (declared.http) supportedTransports.push("http");
  if (declared.sse) supportedTransports.push("sse");

  for (const server of servers ?? []) {
    const transport = mcpTransport(server);
    if (supportedTransports.includes(transport)) continue;
    throw invalidParams(
      `${transport.toUpperCase()} transport not supported: agent did not declare mcpCapabilities.${transport}`,
      "transport_not_supported",
      {
        requestedTransport: transport,
        serverName: server.name,
        declaredCapability: false,
        supportedTransports,
      },
    );
  }
}

export function loadSessionUnsupported(): RequestError {
  return protocolError(ErrorCode.MethodNotFound, "Method not supported: agent does not declare loadSession", {
    errorType: "capability_not_supported",
    method: "session/load",
    requiredCapability: "loadSession",
    declared: false,
  });
}

function blockText(block: ContentBlock): string {
  switch (block.type) {
    case "text":
      return block.text;
    case "resource":
      return "text" in block.resource ? block.resource.text : "";
    case "resource_link":
      return block.uri;
    case "image":
    case "audio":
      return block.data;
  }
}

/**
 * Shape checks for a prompt, in order: at least one block, combined text
 * within `maxLength` characters, at least one non-empty block.
 */
export function validatePrompt(request: PromptRequest, maxLength: number): void {
  const blocks = request.prompt;
  if (blocks.length === 0) {
    throw invalidParams("Prompt must contain at least one content block", "empty_prompt");
  }

  let total = 0;
  let nonEmpty = false;
  for (const block of blocks) {
    const text = blockText(block);
    if (block.type === "text" || block.type === "resource") total += text.length;
    if (text.trim().length > 0) nonEmpty = true;
  }

  if (total > maxLength) {
    throw invalidParams(`Prompt too long: ${total} characters exceeds maximum ${maxLength}`, "prompt_too_long", {
      length: total,
      maxLength,
    });
  }
  if (!nonEmpty) {
    throw invalidParams("Prompt must contain at least one non-empty content block", "empty_prompt");
  }
}

/** Flatten the prompt into the text sent to the backend. */
export function promptText(blocks: ContentBlock[]): string {
  let text = "";
  for (const block of blocks) {
    switch (block.type) {
      case "text":
        text += block.text;
        break;
      case "image":
        text += `\n[Image content: ${block.mimeType} (${block.uri ?? "embedded data"})]`;
        break;
      case "audio":
        text += `\n[Audio content: ${block.mimeType} (embedded data)]`;
        break;
      case "resource":
        text += "\n[Embedded Resource]";
        break;
      case "resource_link":
        text += `\n[Resource Link: ${block.uri}]`;
        break;
    }
  }
  return text;
}
