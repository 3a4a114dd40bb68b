/**
 * Session modes discovered from `.claude/agents/*.md` definitions.
 *
 *   ---
 *   name: reviewer
 *   description: Reviews diffs before commit
 *   ---
 *   You are a careful reviewer...
 */
import * as fs from "node:fs";
import * as path from "node:path";
import type { SessionMode } from "@agentclientprotocol/sdk";
import type { Logger } from "../acp/types.js";
import { errorFields } from "../utils/log.js";
import { agentDirs } from "./paths.js";

export interface AgentDefinition {
  name: string;
  description?: string;
  /** Body after the frontmatter. */
  prompt: string;
  file: string;
}

const FRONTMATTER = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?/;

/** `key: value` pairs between the leading `---` fences. */
export function parseFrontmatter(text: string): Record<string, string> {
  const match = FRONTMATTER.exec(text);
  if (!match) return {};
  const fields: Record<string, string> = {};
  for (const line of match[1].split(/\r?\n/)) {
    const sep = line.indexOf(":");
    if (sep <= 0) continue;
    const key = line.slice(0, sep).trim();
    const value = line
      .slice(sep + 1)
      .trim()
      .replace(/^(["'])(.*)\1$/, "$2");
    if (key && value) fields[key] = value;
  }
  return fields;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

async function readAgentDir(dir: string, logger: Logger): Promise<AgentDefinition[]> {
  let files: string[];
  try {
    files = (await fs.promises.readdir(dir)).filter((f) => f.endsWith(".md")).sort();
  } catch (err) {
    if (!isMissing(err)) logger.warn({ dir, ...errorFields(err) }, "cannot list agent definitions");
    return [];
  }

  const results = await Promise.all(
    files.map(async (file): Promise<AgentDefinition | null> => {
      const fullPath = path.join(dir, file);
      try {
        const text = await fs.promises.readFile(fullPath, "utf-8");
        const fields = parseFrontmatter(text);
        return {
          name: fields.name ?? file.replace(/\.md$/, ""),
          description: fields.description,
          prompt: text.replace(FRONTMATTER, "").trim(),
          file: fullPath,
        };
      } catch (err) {
        logger.warn({ file: fullPath, ...errorFields(err) }, "cannot read agent definition");
        return null;
      }
    }),
  );
  return results.filter((r): r is AgentDefinition => r !== null);
}

/** Project definitions shadow user definitions of the same name. */
export async function readAgentDefinitions(cwd: string, logger: Logger, env?: NodeJS.ProcessEnv): Promise<AgentDefinition[]> {
  const seen = new Map<string, AgentDefinition>();
  for (const dir of agentDirs(cwd, env)) {
    for (const def of await readAgentDir(dir, logger)) {
      if (!seen.has(def.name)) seen.set(def.name, def);
    }
  }
  return [...seen.values()];
}

export function toSessionModes(defs: AgentDefinition[]): SessionMode[] {
  return defs.map((d) => ({ id: d.name, name: d.name, ...(d.description !== undefined && { description: d.description }) }));
}
