import { readEnum, readInt, readList, readOptionalString, readString, type EnvSource } from "./env.js";
import type { LogLevel } from "../logger.js";

/** Models accepted by `create_adk_agent` unless overridden by the operator. */
export const DEFAULT_SUPPORTED_MODELS = ["gemini-2.0-flash", "gemini-1.5-pro", "gemini-1.5-flash"] as const;

export const DEFAULT_MODEL = "gemini-2.0-flash";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Fully resolved configuration shared by every runtime component. */
export interface RuntimeConfig {
  readonly supportedModels: readonly string[];
  readonly defaultModel: string;
  /** Bound on the provider launch, `initialize` handshake and `tools/list`. */
  readonly handshakeTimeoutMs: number;
  /** Bound on each forwarded `tools/call`. */
  readonly proxyCallTimeoutMs: number;
  /** Maximum number of model steps (tool round trips) for one agent turn. */
  readonly maxToolSteps: number;
  readonly search: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
  };
  readonly pageLoader: {
    readonly timeoutMs: number;
    readonly maxChars: number;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly file: string | null;
  };
}

/** Partial overrides, typically coming from CLI flags. */
export type RuntimeConfigOverrides = {
  supportedModels?: readonly string[];
  defaultModel?: string;
  handshakeTimeoutMs?: number;
  proxyCallTimeoutMs?: number;
  maxToolSteps?: number;
  searxUrl?: string;
  logLevel?: LogLevel;
  logFile?: string | null;
};

/**
 * Builds the runtime configuration from `AGENT_MCP_*` variables, then applies
 * explicit overrides. The default model is always part of the allow-list.
 */
export function loadRuntimeConfig(
  overrides: RuntimeConfigOverrides = {},
  env: EnvSource = process.env,
): RuntimeConfig {
  const defaultModel = overrides.defaultModel ?? readString("AGENT_MCP_DEFAULT_MODEL", DEFAULT_MODEL, env);
  const models = overrides.supportedModels ?? readList("AGENT_MCP_SUPPORTED_MODELS", DEFAULT_SUPPORTED_MODELS, env);
  const supportedModels = models.includes(defaultModel) ? [...models] : [defaultModel, ...models];

  return {
    supportedModels,
    defaultModel,
    handshakeTimeoutMs:
      overrides.handshakeTimeoutMs ?? readInt("AGENT_MCP_PROXY_HANDSHAKE_TIMEOUT_MS", 10_000, { min: 100 }, env),
    proxyCallTimeoutMs:
      overrides.proxyCallTimeoutMs ?? readInt("AGENT_MCP_PROXY_CALL_TIMEOUT_MS", 30_000, { min: 100 }, env),
    maxToolSteps: overrides.maxToolSteps ?? readInt("AGENT_MCP_MAX_TOOL_STEPS", 8, { min: 1, max: 64 }, env),
    search: {
      baseUrl: overrides.searxUrl ?? readString("AGENT_MCP_SEARX_URL", "http://127.0.0.1:8080", env),
      timeoutMs: readInt("AGENT_MCP_SEARCH_TIMEOUT_MS", 10_000, { min: 100 }, env),
    },
    pageLoader: {
      timeoutMs: readInt("AGENT_MCP_FETCH_TIMEOUT_MS", 10_000, { min: 100 }, env),
      maxChars: readInt("AGENT_MCP_MAX_PAGE_CHARS", 20_000, { min: 100 }, env),
    },
    logging: {
      level: overrides.logLevel ?? readEnum("AGENT_MCP_LOG_LEVEL", LOG_LEVELS, "info", env),
      file: overrides.logFile !== undefined ? overrides.logFile : readOptionalString("AGENT_MCP_LOG_FILE", env) ?? null,
    },
  };
}
