/**
 * Rule-based tool permission policy. The first rule whose pattern matches the
 * tool name decides; configured rules are consulted before the built-in ones.
 */
import type { PermissionOption } from "@agentclientprotocol/sdk";
import type { PermissionRule } from "../config.js";

export type RiskLevel = PermissionRule["risk"];

export type PolicyEvaluation =
  | { type: "allowed" }
  | { type: "denied"; reason: string }
  | { type: "require_consent"; options: PermissionOption[] };

export interface PermissionPolicyEvaluator {
  evaluate(toolName: string, args: Record<string, unknown>): Promise<PolicyEvaluation>;
}

export const DEFAULT_PERMISSION_RULES: readonly PermissionRule[] = [
  { toolPattern: "fs_read*", action: "allow", risk: "low" },
  { toolPattern: "fs_write*", action: "ask", risk: "medium" },
  { toolPattern: "terminal*", action: "ask", risk: "high" },
  { toolPattern: "http*", action: "ask", risk: "high" },
  // Claude Code tool names
  { toolPattern: "Read", action: "allow", risk: "low" },
  { toolPattern: "Glob", action: "allow", risk: "low" },
  { toolPattern: "Grep", action: "allow", risk: "low" },
  { toolPattern: "LS", action: "allow", risk: "low" },
  { toolPattern: "TodoWrite", action: "allow", risk: "low" },
  { toolPattern: "Write", action: "ask", risk: "medium" },
  { toolPattern: "Edit", action: "ask", risk: "medium" },
  { toolPattern: "MultiEdit", action: "ask", risk: "medium" },
  { toolPattern: "NotebookEdit", action: "ask", risk: "medium" },
  { toolPattern: "Bash", action: "ask", risk: "high" },
  { toolPattern: "WebFetch", action: "ask", risk: "high" },
  { toolPattern: "WebSearch", action: "ask", risk: "high" },
  { toolPattern: "*", action: "ask", risk: "medium" },
];

/** `*`, an exact name, `prefix*` or `*suffix`. */
export function matchesToolPattern(pattern: string, toolName: string): boolean {
  if (pattern === "*" || pattern === toolName) return true;
  if (pattern.endsWith("*")) return toolName.startsWith(pattern.slice(0, -1));
  if (pattern.startsWith("*")) return toolName.endsWith(pattern.slice(1));
  return false;
}

/**
 * Higher risk narrows the "always" choices: low risk offers allow-always,
 * medium offers both, high only reject-always.
 */
export function permissionOptions(toolName: string, risk: RiskLevel): PermissionOption[] {
  const options: PermissionOption[] = [
    { optionId: "allow-once", name: "Allow once", kind: "allow_once" },
    { optionId: "reject-once", name: "Reject", kind: "reject_once" },
  ];
  switch (risk) {
    case "low":
      options.splice(1, 0, { optionId: "allow-always", name: "Allow always", kind: "allow_always" });
      break;
    case "medium":
      options.splice(1, 0, { optionId: "allow-always", name: `Allow always (${toolName})`, kind: "allow_always" });
      options.push({ optionId: "reject-always", name: `Reject always (${toolName})`, kind: "reject_always" });
      break;
    case "high":
      options.push({ optionId: "reject-always", name: `Reject always (${toolName})`, kind: "reject_always" });
      break;
  }
  return options;
}

export class RulePolicyEvaluator implements PermissionPolicyEvaluator {
  private rules: PermissionRule[];

  constructor(rules: readonly PermissionRule[] = []) {
    this.rules = [...rules, ...DEFAULT_PERMISSION_RULES];
  }

  async evaluate(toolName: string, _args: Record<string, unknown>): Promise<PolicyEvaluation> {
    const rule = this.rules.find((r) => matchesToolPattern(r.toolPattern, toolName));
    if (!rule) {
      return { type: "require_consent", options: permissionOptions(toolName, "medium") };
    }
    switch (rule.action) {
      case "allow":
        return { type: "allowed" };
      case "deny":
        return { type: "denied", reason: `Tool '${toolName}' is denied by policy` };
      case "ask":
        return { type: "require_consent", options: permissionOptions(toolName, rule.risk) };
    }
  }
}
