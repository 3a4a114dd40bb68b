/**
 * Filesystem locations the agent reads from or writes to.
 */
import * as path from "node:path";
import * as os from "node:os";

/** Claude config root: CLAUDE_CONFIG_DIR, else ~/.claude. */
export function claudeConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CLAUDE_CONFIG_DIR ?? path.join(os.homedir(), ".claude");
}

/** Agent definition directories, project first. */
export function agentDirs(cwd: string, env: NodeJS.ProcessEnv = process.env): string[] {
  return [path.join(cwd, ".claude", "agents"), path.join(claudeConfigDir(env), "agents")];
}

/** Per-project directory for raw transcripts. */
export function transcriptDir(cwd: string): string {
  return path.join(cwd, ".acp");
}

export function transcriptPath(cwd: string): string {
  return path.join(transcriptDir(cwd), "transcript_raw.jsonl");
}
