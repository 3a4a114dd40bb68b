/**
 * Tool-call permission flow: remembered "always" answers first, then the
 * policy, then a round-trip to the client raced against cancellation.
 */
import type { PermissionOption, RequestPermissionResponse } from "@agentclientprotocol/sdk";
import type { CancellationCoordinator } from "../acp/cancellation.js";
import type { AcpClient, Logger, ToolCallRecord } from "../acp/types.js";
import { errorFields } from "../utils/log.js";
import type { PermissionPolicyEvaluator, PolicyEvaluation } from "./policy.js";
import type { PermissionPreferenceCache } from "./preferences.js";

export type PermissionOutcome = RequestPermissionResponse["outcome"];

export type PermissionSource = "cancelled" | "preference" | "policy" | "client";

export interface PermissionDecision {
  outcome: PermissionOutcome;
  /** The options the outcome's optionId refers to. */
  options: PermissionOption[];
  source: PermissionSource;
  /** Why the call was refused, when it was. */
  reason?: string;
}

/** Options used for decisions made without asking the client. */
export const STANDARD_OPTIONS: readonly PermissionOption[] = [
  { optionId: "allow-once", name: "Allow once", kind: "allow_once" },
  { optionId: "allow-always", name: "Allow always", kind: "allow_always" },
  { optionId: "reject-once", name: "Reject", kind: "reject_once" },
  { optionId: "reject-always", name: "Reject always", kind: "reject_always" },
];

export const UNKNOWN_TOOL: Omit<ToolCallRecord, "id"> = { name: "unknown_tool", rawInput: {} };

class PermissionCancelled extends Error {
  constructor() {
    super("Permission request cancelled");
    this.name = "PermissionCancelled";
  }
}

/**
 * Race the client round-trip against the session being cancelled, so a
 * cancel does not leave the turn waiting on an unanswered prompt.
 */
async function raceWithCancellation(
  request: Promise<RequestPermissionResponse>,
  cancelled: Promise<void>,
): Promise<RequestPermissionResponse> {
  return Promise.race([
    request,
    cancelled.then(() => {
      throw new PermissionCancelled();
    }),
  ]);
}

export function isAllowed(outcome: PermissionOutcome, options: readonly PermissionOption[]): boolean {
  if (outcome.outcome !== "selected") return false;
  const option = options.find((o) => o.optionId === outcome.optionId);
  return option?.kind === "allow_once" || option?.kind === "allow_always";
}

export interface PermissionFlowDeps {
  client: AcpClient;
  cancellation: CancellationCoordinator;
  policy: PermissionPolicyEvaluator;
  preferences: PermissionPreferenceCache;
  logger: Logger;
  /** Resolve a tool call id to the call the model made. */
  lookupToolCall(sessionId: string, toolCallId: string): ToolCallRecord | undefined;
}

export class PermissionFlow {
  constructor(private deps: PermissionFlowDeps) {}

  async requestPermission(
    sessionId: string,
    toolCallId: string,
    options?: PermissionOption[],
  ): Promise<PermissionDecision> {
    const { cancellation, logger, preferences } = this.deps;
    const supplied = options && options.length > 0 ? options : undefined;
    const cancelled = (reason: string): PermissionDecision => ({
      outcome: { outcome: "cancelled" },
      options: supplied ?? [...STANDARD_OPTIONS],
      source: "cancelled",
      reason,
    });

    if (cancellation.isCancelled(sessionId)) {
      return cancelled("Session was cancelled");
    }

    const call = this.deps.lookupToolCall(sessionId, toolCallId) ?? { id: toolCallId, ...UNKNOWN_TOOL };

    const remembered = preferences.get(call.name);
    if (remembered) {
      logger.debug({ sessionId, tool: call.name, kind: remembered }, "permission from stored preference");
      const optionId = remembered === "allow_always" ? "allow-always" : "reject-always";
      return {
        outcome: { outcome: "selected", optionId },
        options: [...STANDARD_OPTIONS],
        source: "preference",
        ...(remembered === "reject_always" && { reason: `Tool '${call.name}' was rejected permanently` }),
      };
    }

    let evaluation: PolicyEvaluation;
    try {
      evaluation = await this.deps.policy.evaluate(call.name, call.rawInput);
    } catch (err) {
      logger.error({ sessionId, tool: call.name, ...errorFields(err) }, "permission policy evaluation failed");
      return cancelled("Permission evaluation failed");
    }

    switch (evaluation.type) {
      case "allowed":
        return {
          outcome: { outcome: "selected", optionId: "allow-once" },
          options: [...STANDARD_OPTIONS],
          source: "policy",
        };
      case "denied":
        return {
          outcome: { outcome: "selected", optionId: "reject-once" },
          options: [...STANDARD_OPTIONS],
          source: "policy",
          reason: evaluation.reason,
        };
      case "require_consent":
        return this.askClient(sessionId, call, supplied ?? evaluation.options);
    }
  }

  private async askClient(
    sessionId: string,
    call: ToolCallRecord,
    options: PermissionOption[],
  ): Promise<PermissionDecision> {
    const { client, cancellation, logger, preferences } = this.deps;
    const detach = new AbortController();

    let response: RequestPermissionResponse;
    try {
      response = await raceWithCancellation(
        client.requestPermission({
          sessionId,
          options,
          toolCall: { toolCallId: call.id, title: call.name, rawInput: call.rawInput },
        }),
        cancellation.waitForCancellation(sessionId, detach.signal),
      );
    } catch (err) {
      if (!(err instanceof PermissionCancelled)) {
        logger.warn({ sessionId, tool: call.name, ...errorFields(err) }, "permission request to client failed");
      }
      return { outcome: { outcome: "cancelled" }, options, source: "cancelled", reason: "Permission request cancelled" };
    } finally {
      detach.abort();
    }

    const outcome = response.outcome;
    if (outcome.outcome === "cancelled") {
      return { outcome, options, source: "client", reason: "Permission request cancelled" };
    }

    const selected = options.find((o) => o.optionId === outcome.optionId);
    if (selected && preferences.set(call.name, selected.kind)) {
      logger.debug({ tool: call.name, kind: selected.kind }, "stored permission preference");
    }
    const allowed = isAllowed(outcome, options);
    return {
      outcome,
      options,
      source: "client",
      ...(!allowed && { reason: `User rejected permission for ${call.name}` }),
    };
  }
}
