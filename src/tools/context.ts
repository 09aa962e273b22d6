import type { AgentComposer } from "../agents/composer.js";
import type { AgentRegistry } from "../agents/registry.js";
import type { RuntimeConfig } from "../config/runtime.js";
import type { ExecutionEngine } from "../engine/executor.js";
import type { EvaluationHarness } from "../eval/harness.js";
import type { StructuredLogger } from "../logger.js";
import type { ToolProxyManager } from "../proxy/manager.js";
import type { SessionStore } from "../sessions/store.js";
import type { BuiltinToolbox } from "./builtins.js";

/** Components reachable from tool handlers. */
export interface ToolContext {
  readonly config: RuntimeConfig;
  readonly logger: StructuredLogger;
  readonly registry: AgentRegistry;
  readonly composer: AgentComposer;
  readonly sessions: SessionStore;
  readonly proxies: ToolProxyManager;
  readonly engine: ExecutionEngine;
  readonly harness: EvaluationHarness;
  readonly builtins: BuiltinToolbox;
}
