import { randomUUID } from "node:crypto";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "../logger.js";
import { isRecord } from "../types.js";
import { SERVER_NAME, SERVER_VERSION } from "../version.js";
import {
  HandshakeTimeoutError,
  LaunchFailedError,
  ProxyCallFailedError,
  ProxyNotFoundError,
  ProxyTimeoutError,
  ProxyToolNotExposedError,
  ProxyUnavailableError,
} from "./errors.js";

export type ProxyState = "starting" | "ready" | "failed" | "closed";

/** Command line of an external MCP tool provider. */
export interface ProviderSpec {
  readonly command: string;
  readonly args: readonly string[];
}

/** Creates the client-side transport for a provider; stdio by default. */
export type TransportFactory = (spec: ProviderSpec) => Transport | Promise<Transport>;

export const stdioTransportFactory: TransportFactory = (spec) =>
  new StdioClientTransport({ command: spec.command, args: [...spec.args], stderr: "inherit" });

export interface RemoteTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
}

export interface ProxyAttachRequest extends ProviderSpec {
  readonly agentName: string;
  /** Remote tool names to expose; empty or absent exposes everything advertised. */
  readonly filter?: readonly string[];
}

export interface ProxySummary {
  proxy_id: string;
  agent_name: string;
  command: string;
  args: string[];
  state: ProxyState;
  advertised_tools: string[];
  exposed_tools: string[];
  filter: string[] | null;
  last_error: string | null;
  started_at: string;
}

export interface ProxyAttachResult {
  proxy: ProxySummary;
  warning?: { code: "NoMatchingTools"; message: string };
}

export interface ProxyCallOutput {
  text: string;
  isError: boolean;
}

export interface ToolProxyManagerOptions {
  readonly logger: StructuredLogger;
  readonly handshakeTimeoutMs: number;
  readonly callTimeoutMs: number;
  readonly transportFactory?: TransportFactory;
}

interface ProxyHandle {
  readonly id: string;
  readonly agentName: string;
  readonly spec: ProviderSpec;
  readonly filter: readonly string[] | null;
  readonly startedAt: string;
  state: ProxyState;
  client: Client | null;
  advertised: RemoteTool[];
  exposed: RemoteTool[];
  lastError: string | null;
}

function isRequestTimeout(error: unknown): boolean {
  return error instanceof McpError && error.code === ErrorCode.RequestTimeout;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Flattens an MCP `tools/call` result into the text handed back to the model. */
export function renderToolOutput(result: unknown): ProxyCallOutput {
  if (!isRecord(result)) {
    return { text: JSON.stringify(result ?? null), isError: false };
  }
  const isError = result.isError === true;
  const parts: string[] = [];
  if (Array.isArray(result.content)) {
    for (const item of result.content) {
      if (isRecord(item) && item.type === "text" && typeof item.text === "string") {
        parts.push(item.text);
      } else {
        parts.push(JSON.stringify(item));
      }
    }
  }
  if (parts.length === 0 && result.structuredContent !== undefined) {
    parts.push(JSON.stringify(result.structuredContent));
  }
  if (parts.length === 0 && "toolResult" in result) {
    parts.push(JSON.stringify(result.toolResult));
  }
  return { text: parts.join("\n"), isError };
}

/**
 * Owns the lifecycle of external MCP tool providers. Each proxy has its own
 * client and child process; one proxy failing never affects another.
 */
export class ToolProxyManager {
  private readonly proxies = new Map<string, ProxyHandle>();
  private readonly logger: StructuredLogger;
  private readonly handshakeTimeoutMs: number;
  private readonly callTimeoutMs: number;
  private readonly transportFactory: TransportFactory;

  constructor(options: ToolProxyManagerOptions) {
    this.logger = options.logger;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs;
    this.callTimeoutMs = options.callTimeoutMs;
    this.transportFactory = options.transportFactory ?? stdioTransportFactory;
  }

  /**
   * Launches the provider, performs the handshake and discovers its tools.
   * The handle is registered before launching and ends `ready` or `failed`.
   */
  async attach(request: ProxyAttachRequest): Promise<ProxyAttachResult> {
    const filter = request.filter && request.filter.length > 0 ? [...new Set(request.filter)] : null;
    const handle: ProxyHandle = {
      id: `proxy-${randomUUID()}`,
      agentName: request.agentName,
      spec: { command: request.command, args: [...request.args] },
      filter,
      startedAt: new Date().toISOString(),
      state: "starting",
      client: null,
      advertised: [],
      exposed: [],
      lastError: null,
    };
    this.proxies.set(handle.id, handle);
    this.logger.info("mcp_proxy_starting", {
      proxy_id: handle.id,
      agent_name: handle.agentName,
      command: handle.spec.command,
      args: handle.spec.args,
    });

    const client = new Client({ name: `${SERVER_NAME}-proxy`, version: SERVER_VERSION }, { capabilities: {} });
    try {
      const transport = await this.transportFactory(handle.spec);
      handle.client = client;
      client.onclose = () => this.handleUnexpectedClose(handle);
      await client.connect(transport, { timeout: this.handshakeTimeoutMs });
      handle.advertised = await this.discoverTools(client);
    } catch (error) {
      const failure = isRequestTimeout(error)
        ? new HandshakeTimeoutError(handle.spec.command, this.handshakeTimeoutMs)
        : new LaunchFailedError(handle.spec.command, error);
      handle.state = "failed";
      handle.lastError = failure.message;
      handle.client = null;
      await this.closeClient(client, handle.id);
      this.logger.warn("mcp_proxy_failed", { proxy_id: handle.id, code: failure.code, message: failure.message });
      throw failure;
    }

    handle.exposed = filter
      ? handle.advertised.filter((tool) => filter.includes(tool.name))
      : [...handle.advertised];
    handle.state = "ready";
    this.logger.info("mcp_proxy_ready", {
      proxy_id: handle.id,
      advertised: handle.advertised.map((tool) => tool.name),
      exposed: handle.exposed.map((tool) => tool.name),
    });

    const result: ProxyAttachResult = { proxy: this.summarise(handle) };
    if (handle.exposed.length === 0) {
      result.warning = {
        code: "NoMatchingTools",
        message: filter
          ? `None of the requested tools (${filter.join(", ")}) are advertised by '${handle.spec.command}'`
          : `'${handle.spec.command}' does not advertise any tools`,
      };
      this.logger.warn("mcp_proxy_no_matching_tools", { proxy_id: handle.id, filter });
    }
    return result;
  }

  get(proxyId: string): ProxySummary | undefined {
    const handle = this.proxies.get(proxyId);
    return handle ? this.summarise(handle) : undefined;
  }

  list(agentName?: string): ProxySummary[] {
    return [...this.proxies.values()]
      .filter((handle) => agentName === undefined || handle.agentName === agentName)
      .map((handle) => this.summarise(handle));
  }

  /** Exposed tool descriptor, or `undefined` when the proxy or tool is unknown. */
  findExposedTool(proxyId: string, remoteName: string): RemoteTool | undefined {
    return this.proxies.get(proxyId)?.exposed.find((tool) => tool.name === remoteName);
  }

  stateOf(proxyId: string): ProxyState | undefined {
    return this.proxies.get(proxyId)?.state;
  }

  /**
   * Forwards a call to the provider. Failed or closed proxies are rejected
   * without any I/O; a timeout leaves the provider running.
   */
  async invoke(proxyId: string, remoteName: string, args: Record<string, unknown>): Promise<ProxyCallOutput> {
    const handle = this.proxies.get(proxyId);
    if (!handle) {
      throw new ProxyNotFoundError(proxyId);
    }
    const client = handle.client;
    if (handle.state !== "ready" || !client) {
      throw new ProxyUnavailableError(proxyId, handle.state, handle.lastError);
    }
    if (!handle.exposed.some((tool) => tool.name === remoteName)) {
      throw new ProxyToolNotExposedError(
        proxyId,
        remoteName,
        handle.exposed.map((tool) => tool.name),
      );
    }

    const startedAt = Date.now();
    try {
      const result = await client.callTool({ name: remoteName, arguments: args }, undefined, {
        timeout: this.callTimeoutMs,
      });
      const output = renderToolOutput(result);
      this.logger.debug("mcp_proxy_call_completed", {
        proxy_id: proxyId,
        tool: remoteName,
        is_error: output.isError,
        duration_ms: Date.now() - startedAt,
      });
      return output;
    } catch (error) {
      if (isRequestTimeout(error)) {
        this.logger.warn("mcp_proxy_call_timeout", { proxy_id: proxyId, tool: remoteName });
        throw new ProxyTimeoutError(proxyId, remoteName, this.callTimeoutMs);
      }
      if (handle.state !== "ready") {
        throw new ProxyUnavailableError(proxyId, handle.state, handle.lastError);
      }
      throw new ProxyCallFailedError(proxyId, remoteName, error);
    }
  }

  async close(proxyId: string): Promise<ProxySummary> {
    const handle = this.proxies.get(proxyId);
    if (!handle) {
      throw new ProxyNotFoundError(proxyId);
    }
    const client = handle.client;
    handle.state = "closed";
    handle.client = null;
    if (client) {
      await this.closeClient(client, proxyId);
    }
    this.logger.info("mcp_proxy_closed", { proxy_id: proxyId });
    return this.summarise(handle);
  }

  /** Terminates every provider; used on shutdown. */
  async closeAll(): Promise<void> {
    await Promise.all([...this.proxies.keys()].map((proxyId) => this.close(proxyId)));
  }

  private async discoverTools(client: Client): Promise<RemoteTool[]> {
    const tools: RemoteTool[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined, { timeout: this.handshakeTimeoutMs });
      for (const tool of page.tools) {
        tools.push({ name: tool.name, description: tool.description ?? "", inputSchema: { ...tool.inputSchema } });
      }
      cursor = page.nextCursor;
    } while (cursor);
    return tools;
  }

  private handleUnexpectedClose(handle: ProxyHandle): void {
    if (handle.state !== "ready") {
      return;
    }
    handle.state = "failed";
    handle.lastError = "MCP server connection closed";
    handle.client = null;
    this.logger.warn("mcp_proxy_exited", { proxy_id: handle.id, command: handle.spec.command });
  }

  private async closeClient(client: Client, proxyId: string): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      this.logger.warn("mcp_proxy_close_failed", { proxy_id: proxyId, message: errorMessage(error) });
    }
  }

  private summarise(handle: ProxyHandle): ProxySummary {
    return {
      proxy_id: handle.id,
      agent_name: handle.agentName,
      command: handle.spec.command,
      args: [...handle.spec.args],
      state: handle.state,
      advertised_tools: handle.advertised.map((tool) => tool.name),
      exposed_tools: handle.exposed.map((tool) => tool.name),
      filter: handle.filter ? [...handle.filter] : null,
      last_error: handle.lastError,
      started_at: handle.startedAt,
    };
  }
}
