#!/usr/bin/env node
import { Command } from "commander";
import { runAcp } from "./acp/agent.js";
import { ConfigError, loadConfig, type AgentConfig } from "./config.js";
import { createLogger, errorFields } from "./utils/log.js";
import { configurePerf } from "./utils/perf.js";

interface CliOptions {
  config?: string;
  logLevel?: string;
  strictProtocol?: boolean;
  record?: boolean;
}

const program = new Command()
  .name("acp-bridge-agent")
  .description("Serve the Agent Client Protocol over stdio, backed by Claude Code")
  .option("-c, --config <path>", "JSON config file (also ACP_CONFIG)")
  .option("-l, --log-level <level>", "error | warn | info | debug | trace")
  .option("--strict-protocol", "reject unsupported protocol versions instead of negotiating")
  .option("--record", "write a raw transcript to <cwd>/.acp/transcript_raw.jsonl")
  .parse();

const opts = program.opts<CliOptions>();

// Flags only override what they actually set.
const overrides: Record<string, unknown> = {};
if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel;
if (opts.strictProtocol) overrides.strictProtocolVersion = true;
if (opts.record) overrides.recordTranscripts = true;

function readConfig(): AgentConfig {
  try {
    return loadConfig({ configPath: opts.config, overrides });
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`);
      process.exit(2);
    }
    throw err;
  }
}

const config = readConfig();

const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
configurePerf(logger);

const runtime = runAcp(config, logger);
logger.info({ strictProtocol: config.strictProtocolVersion, record: config.recordTranscripts }, "acp agent started");

function shutdown(code: number): void {
  runtime
    .shutdown()
    .catch((err) => logger.error({ ...errorFields(err) }, "shutdown failed"))
    .finally(() => process.exit(code));
}

process.stdin.on("end", () => shutdown(0));
process.on("SIGINT", () => shutdown(130));
process.on("SIGTERM", () => shutdown(143));
