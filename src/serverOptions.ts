import { LOG_LEVELS, type RuntimeConfigOverrides } from "./config/runtime.js";
import { parseList } from "./config/env.js";
import type { LogLevel } from "./logger.js";

/** Options parsed from the command line. */
export interface CliOptions {
  /** Print usage and exit without starting the server. */
  help: boolean;
  overrides: RuntimeConfigOverrides;
}

/** Raised for malformed command-line arguments. */
export class CliOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliOptionsError";
  }
}

const FLAG_WITH_VALUE = new Set([
  "--log-file",
  "--log-level",
  "--handshake-timeout-ms",
  "--proxy-timeout-ms",
  "--max-tool-steps",
  "--models",
  "--default-model",
  "--searx-url",
]);

export const USAGE = `Usage: agent-orchestrator-mcp [options]

Serves the agent orchestration tools over MCP stdio.

Options:
  --log-file <path>             Mirror logs to a file (rotated by size)
  --log-level <level>           debug | info | warn | error (default: info)
  --handshake-timeout-ms <ms>   Bound on MCP provider launch and discovery
  --proxy-timeout-ms <ms>       Bound on each proxied tool call
  --max-tool-steps <n>          Maximum model steps per agent turn
  --models <a,b,...>            Models accepted for agents
  --default-model <model>       Model used when an agent names none
  --searx-url <url>             Base URL of the SearxNG instance
  --help                        Show this message
`;

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliOptionsError(`${flag} expects a positive integer, received '${value}'`);
  }
  return parsed;
}

function parseNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new CliOptionsError(`${flag} cannot be empty`);
  }
  return trimmed;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new CliOptionsError(`--log-level expects one of ${LOG_LEVELS.join(", ")}, received '${value}'`);
  }
  return level;
}

/**
 * Parses `process.argv.slice(2)`. Flags take their value inline
 * (`--flag=value`) or as the next argument; unknown flags are rejected.
 */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const overrides: RuntimeConfigOverrides = {};
  let help = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      throw new CliOptionsError(`Unexpected argument '${arg ?? ""}'`);
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliOptionsError(`${flag} requires a value`);
      }
      value = next;
      index += 1;
    }
    const raw = value ?? "";

    switch (flag) {
      case "--help":
        help = true;
        break;
      case "--log-file":
        overrides.logFile = parseNonEmpty(raw, flag);
        break;
      case "--log-level":
        overrides.logLevel = parseLogLevel(raw);
        break;
      case "--handshake-timeout-ms":
        overrides.handshakeTimeoutMs = parsePositiveInteger(raw, flag);
        break;
      case "--proxy-timeout-ms":
        overrides.proxyCallTimeoutMs = parsePositiveInteger(raw, flag);
        break;
      case "--max-tool-steps":
        overrides.maxToolSteps = parsePositiveInteger(raw, flag);
        break;
      case "--models": {
        const models = parseList(raw);
        if (models.length === 0) {
          throw new CliOptionsError("--models requires at least one model");
        }
        overrides.supportedModels = models;
        break;
      }
      case "--default-model":
        overrides.defaultModel = parseNonEmpty(raw, flag);
        break;
      case "--searx-url":
        overrides.searxUrl = parseNonEmpty(raw, flag);
        break;
      default:
        throw new CliOptionsError(`Unknown option '${flag}'`);
    }
  }

  return { help, overrides };
}
