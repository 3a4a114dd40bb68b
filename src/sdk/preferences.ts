import type { PermissionOption } from "@agentclientprotocol/sdk";

export type PermissionOptionKind = PermissionOption["kind"];

export type PersistentKind = Extract<PermissionOptionKind, "allow_always" | "reject_always">;

export function isPersistentKind(kind: PermissionOptionKind): kind is PersistentKind {
  return kind === "allow_always" || kind === "reject_always";
}

/**
 * "Always" answers remembered per tool name for the life of the process.
 * One-shot answers are never stored.
 */
export class PermissionPreferenceCache {
  private preferences = new Map<string, PersistentKind>();

  get(toolName: string): PersistentKind | undefined {
    return this.preferences.get(toolName);
  }

  /** Returns false (and stores nothing) for a one-shot kind. */
  set(toolName: string, kind: PermissionOptionKind): boolean {
    if (!isPersistentKind(kind)) return false;
    this.preferences.set(toolName, kind);
    return true;
  }

  delete(toolName: string): boolean {
    return this.preferences.delete(toolName);
  }

  clear(): void {
    this.preferences.clear();
  }

  get size(): number {
    return this.preferences.size;
  }
}
