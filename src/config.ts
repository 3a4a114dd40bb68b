/**
 * Agent configuration: defaults, then an optional JSON file, then `ACP_*`
 * environment variables, then explicit overrides (CLI flags).
 */
import * as fs from "node:fs";
import { z } from "zod";

const permissionRuleSchema = z.object({
  toolPattern: z.string().min(1),
  action: z.enum(["allow", "deny", "ask"]),
  risk: z.enum(["low", "medium", "high"]).default("medium"),
});

export const configSchema = z.object({
  maxPromptLength: z.number().int().positive().default(100_000),
  notificationBufferSize: z.number().int().positive().default(1000),
  cancellationBufferSize: z.number().int().positive().default(100),
  maxTokensPerTurn: z.number().int().nonnegative().default(100_000),
  maxTurnRequests: z.number().int().nonnegative().default(50),
  maxFileSize: z
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
  logLevel: z.enum(["error", "warn", "info", "debug", "trace"]).default("info"),
  logPretty: z.boolean().default(false),
  strictProtocolVersion: z.boolean().default(false),
  recordTranscripts: z.boolean().default(false),
  defaultMode: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  claudeExecutable: z.string().min(1).optional(),
  permissionPolicies: z.array(permissionRuleSchema).optional(),
});

export type AgentConfig = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
export type PermissionRule = z.infer<typeof permissionRuleSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defaultConfig(): AgentConfig {
  return configSchema.parse({});
}

/** Validate a partial config, filling defaults. Throws ConfigError with the zod issues. */
export function parseConfig(input: unknown): AgentConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

const ENV_NUMBERS = {
  ACP_MAX_PROMPT_LENGTH: "maxPromptLength",
  ACP_NOTIFICATION_BUFFER_SIZE: "notificationBufferSize",
  ACP_CANCELLATION_BUFFER_SIZE: "cancellationBufferSize",
  ACP_MAX_TOKENS_PER_TURN: "maxTokensPerTurn",
  ACP_MAX_TURN_REQUESTS: "maxTurnRequests",
  ACP_MAX_FILE_SIZE: "maxFileSize",
} as const;

const ENV_BOOLEANS = {
  ACP_LOG_PRETTY: "logPretty",
  ACP_STRICT_PROTOCOL: "strictProtocolVersion",
  ACP_RECORD_TRANSCRIPTS: "recordTranscripts",
} as const;

const ENV_STRINGS = {
  ACP_LOG_LEVEL: "logLevel",
  ACP_DEFAULT_MODE: "defaultMode",
  CLAUDE_MODEL: "model",
  CLAUDE_CODE_EXECUTABLE: "claudeExecutable",
} as const;

/**
 * Read overrides from the environment. Values are left unvalidated here
 * (a non-numeric number stays a string) so the schema reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    const n = Number(raw);
    out[key] = Number.isFinite(n) ? n : raw;
  }
  for (const [name, key] of Object.entries(ENV_BOOLEANS)) {
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    out[key] = raw === "1" || raw.toLowerCase() === "true";
  }
  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    out[key] = raw;
  }
  if (out.logLevel === undefined && env.LOG_LEVEL) {
    out.logLevel = env.LOG_LEVEL;
  }
  return out;
}

function readConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${String(err)}`, []);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${String(err)}`, []);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`, []);
  }
  return { ...parsed };
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Validated along with everything else. */
  overrides?: Record<string, unknown>;
}

export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const filePath = options.configPath ?? env.ACP_CONFIG;
  const fromFile = filePath ? readConfigFile(filePath) : {};
  return parseConfig({ ...fromFile, ...configFromEnv(env), ...options.overrides });
}
