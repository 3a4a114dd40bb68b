/**
 * Per-session plan tracking.
 *
 * Plans arrive as complete task lists (the model re-sends every todo on each
 * TodoWrite call). Entries keep their id across updates so status changes by
 * id keep resolving after the model re-submits the list.
 */
import type { PlanEntry } from "@agentclientprotocol/sdk";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";

export type PlanStatus = PlanEntry["status"];
export type PlanPriority = PlanEntry["priority"];

export function priorityFor(status: PlanStatus): PlanPriority {
  switch (status) {
    case "pending":
      return "medium";
    case "in_progress":
      return "high";
    case "completed":
      return "low";
  }
}

export interface TrackedPlanEntry {
  id: string;
  /** Identity of the task across re-submissions: the todo's own text. */
  key: string;
  /** Display text. */
  content: string;
  status: PlanStatus;
  notes?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface AgentPlan {
  entries: TrackedPlanEntry[];
  metadata?: Record<string, unknown>;
}

export class PlanConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanConversionError";
  }
}

const todoWriteSchema = z.object({
  todos: z.array(
    z.object({
      content: z.string(),
      status: z.string(),
      activeForm: z.string().optional(),
    }),
  ),
});

function toStatus(raw: string): PlanStatus {
  if (raw === "pending" || raw === "in_progress" || raw === "completed") return raw;
  throw new PlanConversionError(`Unknown todo status: ${raw}`);
}

export function newPlanEntry(key: string, content: string, status: PlanStatus, notes?: string): TrackedPlanEntry {
  const now = new Date();
  return { id: uuidv4(), key, content, status, notes, createdAt: now, updatedAt: now };
}

/**
 * Convert TodoWrite arguments into a plan. An in-progress task is shown by
 * its active form ("Running tests") with the plain text kept in notes.
 */
export function planFromTodoWrite(args: unknown): AgentPlan {
  const parsed = todoWriteSchema.safeParse(args);
  if (!parsed.success) {
    throw new PlanConversionError(`Invalid TodoWrite arguments: ${parsed.error.errors.map((e) => e.message).join(", ")}`);
  }

  const entries = parsed.data.todos.map((todo) => {
    const status = toStatus(todo.status);
    if (status === "in_progress" && todo.activeForm) {
      return newPlanEntry(todo.content, todo.activeForm, status, `Original: ${todo.content}`);
    }
    const notes = todo.activeForm ? `Active form: ${todo.activeForm}` : undefined;
    return newPlanEntry(todo.content, todo.content, status, notes);
  });

  return { entries, metadata: { source: "todowrite", tool: "TodoWrite" } };
}

export function toAcpPlanEntries(plan: AgentPlan): PlanEntry[] {
  return plan.entries.map((entry) => ({
    content: entry.content,
    status: entry.status,
    priority: priorityFor(entry.status),
    _meta: {
      id: entry.id,
      ...(entry.notes !== undefined && { notes: entry.notes }),
      created_at: entry.createdAt.toISOString(),
      updated_at: entry.updatedAt.toISOString(),
    },
  }));
}

function clonePlan(plan: AgentPlan): AgentPlan {
  return structuredClone(plan);
}

export class PlanTracker {
  private plans = new Map<string, AgentPlan>();

  setPlan(sessionId: string, plan: AgentPlan): void {
    this.plans.set(sessionId, clonePlan(plan));
  }

  /**
   * Replace the entry list, matching incoming entries to existing ones by id
   * first and by task key second. Matched entries keep their id and
   * creation time.
   */
  updatePlan(sessionId: string, plan: AgentPlan): AgentPlan {
    const existing = this.plans.get(sessionId);
    if (!existing) {
      this.setPlan(sessionId, plan);
      return clonePlan(plan);
    }

    const unclaimed = new Map(existing.entries.map((e) => [e.id, e]));
    const now = new Date();
    const entries = plan.entries.map((incoming) => {
      let match = unclaimed.get(incoming.id);
      if (!match) {
        for (const candidate of unclaimed.values()) {
          if (candidate.key === incoming.key) {
            match = candidate;
            break;
          }
        }
      }
      if (!match) return { ...incoming };

      unclaimed.delete(match.id);
      const changed =
        match.status !== incoming.status || match.content !== incoming.content || match.notes !== incoming.notes;
      return {
        ...incoming,
        id: match.id,
        createdAt: match.createdAt,
        updatedAt: changed ? now : match.updatedAt,
      };
    });

    const merged: AgentPlan = { entries, metadata: plan.metadata ?? existing.metadata };
    this.plans.set(sessionId, clonePlan(merged));
    return merged;
  }

  getPlan(sessionId: string): AgentPlan | undefined {
    const plan = this.plans.get(sessionId);
    return plan ? clonePlan(plan) : undefined;
  }

  /** False when the session has no plan or no entry with that id. */
  updatePlanEntryStatus(sessionId: string, entryId: string, status: PlanStatus): boolean {
    const entry = this.plans.get(sessionId)?.entries.find((e) => e.id === entryId);
    if (!entry) return false;
    if (entry.status !== status) {
      entry.status = status;
      entry.updatedAt = new Date();
    }
    return true;
  }

  removePlan(sessionId: string): boolean {
    return this.plans.delete(sessionId);
  }
}
