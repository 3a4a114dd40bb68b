import type { ClientCapabilities } from "@agentclientprotocol/sdk";
import { parse as parseUuid, stringify as stringifyUuid, v7 as uuidv7, validate as isUuid } from "uuid";
import { KeyedLock } from "../utils/keyed-lock.js";
import type { Session } from "./types.js";

/**
 * Canonical form of a session id, or null when the string is not one.
 * Ids are UUIDv7, so they sort by creation time.
 */
export function parseSessionId(raw: string): string | null {
  if (!isUuid(raw)) return null;
  return stringifyUuid(parseUuid(raw));
}

export function generateSessionId(): string {
  return uuidv7();
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export interface SessionTable {
  create(cwd: string, clientCapabilities: ClientCapabilities): Session;
  /** A detached snapshot; mutating it does not affect the table. */
  get(id: string): Session | undefined;
  /**
   * Run `mutator` against the stored record. Calls for the same session
   * never interleave. Rejects with SessionNotFoundError for unknown ids.
   */
  update<T>(id: string, mutator: (session: Session) => T | Promise<T>): Promise<T>;
  list(): string[];
  delete(id: string): boolean;
}

export class InMemorySessionTable implements SessionTable {
  private sessions = new Map<string, Session>();
  private lock = new KeyedLock();

  create(cwd: string, clientCapabilities: ClientCapabilities): Session {
    const now = new Date();
    const session: Session = {
      id: generateSessionId(),
      cwd,
      clientCapabilities: structuredClone(clientCapabilities),
      history: [],
      turnRequestCount: 0,
      turnTokenCount: 0,
      mcpServers: [],
      createdAt: now,
      lastAccessed: now,
    };
    this.sessions.set(session.id, session);
    return structuredClone(session);
  }

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : undefined;
  }

  update<T>(id: string, mutator: (session: Session) => T | Promise<T>): Promise<T> {
    return this.lock.run(id, async () => {
      const session = this.sessions.get(id);
      if (!session) throw new SessionNotFoundError(id);
      const result = await mutator(session);
      session.lastAccessed = new Date();
      return result;
    });
  }

  list(): string[] {
    return [...this.sessions.keys()].sort();
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }
}
