/**
 * Composition root for the orchestrator runtime.
 *
 * Builds every component from a {@link RuntimeConfig}, registers the tool
 * catalogue and exposes an MCP server whose `tools/list` and `tools/call`
 * requests are served through the {@link Dispatcher}. Transports are attached
 * by the caller (stdio for the CLI, in-memory pairs in tests).
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import { AgentComposer } from "../agents/composer.js";
import { AgentRegistry } from "../agents/registry.js";
import { AiSdkBackend, type ModelFactory } from "../backend/aiSdk.js";
import type { ModelBackend } from "../backend/types.js";
import type { EnvSource } from "../config/env.js";
import { loadRuntimeConfig, type RuntimeConfig, type RuntimeConfigOverrides } from "../config/runtime.js";
import { ExecutionEngine } from "../engine/executor.js";
import { ToolResolver } from "../engine/toolResolver.js";
import { EvaluationHarness } from "../eval/harness.js";
import { StructuredLogger } from "../logger.js";
import { ToolCatalogue } from "../mcp/catalogue.js";
import { Dispatcher } from "../mcp/dispatcher.js";
import { ToolProxyManager, type TransportFactory } from "../proxy/manager.js";
import { PageLoader } from "../search/pageLoader.js";
import { SearxClient } from "../search/searxClient.js";
import { SessionStore } from "../sessions/store.js";
import { registerAgentTools } from "../tools/agentTools.js";
import { BuiltinToolbox } from "../tools/builtins.js";
import type { ToolContext } from "../tools/context.js";
import { registerEvaluationTools } from "../tools/evaluationTools.js";
import { registerProxyTools } from "../tools/proxyTools.js";
import { registerServerTools } from "../tools/serverTools.js";
import { registerSessionTools } from "../tools/sessionTools.js";
import { registerWebTools } from "../tools/webTools.js";
import { SERVER_NAME, SERVER_VERSION } from "../version.js";

export interface OrchestratorRuntimeOptions {
  readonly config?: RuntimeConfigOverrides;
  readonly env?: EnvSource;
  readonly logger?: StructuredLogger;
  /** Replaces the AI SDK backend entirely (tests, alternative providers). */
  readonly backend?: ModelBackend;
  /** Model factory handed to the default AI SDK backend. */
  readonly modelFactory?: ModelFactory;
  /** Launches MCP tool providers; defaults to stdio child processes. */
  readonly transportFactory?: TransportFactory;
  /** HTTP client used by the web search and page loader. */
  readonly fetchImpl?: typeof fetch;
}

export interface OrchestratorRuntime extends ToolContext {
  readonly catalogue: ToolCatalogue;
  readonly dispatcher: Dispatcher;
  readonly server: Server;
  /** Closes providers, forgets sessions, closes the MCP server and flushes logs. */
  close(): Promise<void>;
}

export function createOrchestratorRuntime(options: OrchestratorRuntimeOptions = {}): OrchestratorRuntime {
  const config: RuntimeConfig = loadRuntimeConfig(options.config, options.env);
  const logger =
    options.logger ?? new StructuredLogger({ level: config.logging.level, logFile: config.logging.file });
  const fetchImpl = options.fetchImpl ?? fetch;

  const builtins = new BuiltinToolbox(
    new SearxClient({ baseUrl: config.search.baseUrl, timeoutMs: config.search.timeoutMs }, fetchImpl),
    new PageLoader({ timeoutMs: config.pageLoader.timeoutMs, maxChars: config.pageLoader.maxChars }, fetchImpl),
  );
  const registry = new AgentRegistry({
    supportedModels: config.supportedModels,
    defaultModel: config.defaultModel,
    builtinTools: builtins.names(),
    logger,
  });
  const sessions = new SessionStore({ logger });
  const proxies = new ToolProxyManager({
    logger,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    callTimeoutMs: config.proxyCallTimeoutMs,
    transportFactory: options.transportFactory,
  });
  const resolver = new ToolResolver({ registry, builtins, proxies });
  const backend =
    options.backend ??
    new AiSdkBackend({ logger, maxSteps: config.maxToolSteps, modelFactory: options.modelFactory });
  const engine = new ExecutionEngine({ registry, sessions, resolver, backend, logger });
  const harness = new EvaluationHarness(registry, engine, logger);
  const composer = new AgentComposer(registry, logger);

  const context: ToolContext = { config, logger, registry, composer, sessions, proxies, engine, harness, builtins };

  const catalogue = new ToolCatalogue();
  registerAgentTools(catalogue, context);
  registerSessionTools(catalogue, context);
  registerProxyTools(catalogue, context);
  registerEvaluationTools(catalogue, context);
  registerWebTools(catalogue, context);
  registerServerTools(catalogue, context);

  const dispatcher = new Dispatcher(catalogue, logger);

  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: catalogue.manifests().map((manifest) => ({
      name: manifest.name,
      title: manifest.title,
      description: manifest.description,
      inputSchema: manifest.inputSchema,
    })),
  }));
  server.setRequestHandler(CallToolRequestSchema, (request, extra) =>
    dispatcher.handleCallTool(request.params.name, request.params.arguments ?? {}, extra.requestId),
  );

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    await proxies.closeAll();
    sessions.clear();
    await server.close();
    logger.info("runtime_closed");
    await logger.flush();
  };

  logger.info("runtime_ready", {
    tools: catalogue.names().length,
    default_model: config.defaultModel,
    supported_models: config.supportedModels,
  });

  return { ...context, catalogue, dispatcher, server, close };
}
