import { OrchestratorError } from "../rpc/errors.js";

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ProxyNotFoundError extends OrchestratorError {
  constructor(proxyId: string) {
    super("NotFound", "ProxyNotFound", `MCP proxy '${proxyId}' not found`, {
      hint: "list_mcp_proxies",
      details: { proxy_id: proxyId },
    });
  }
}

/** The provider process could not be started or exited before the handshake. */
export class LaunchFailedError extends OrchestratorError {
  constructor(command: string, cause: unknown) {
    super("ProxyError", "LaunchFailed", `Failed to launch MCP server '${command}': ${causeMessage(cause)}`, {
      hint: "check mcp_server_command and mcp_server_args",
      details: { command },
      cause,
    });
  }
}

export class HandshakeTimeoutError extends OrchestratorError {
  constructor(command: string, timeoutMs: number) {
    super("ProxyError", "HandshakeTimeout", `MCP server '${command}' did not answer within ${timeoutMs}ms`, {
      details: { command, timeout_ms: timeoutMs },
    });
  }
}

export class ProxyTimeoutError extends OrchestratorError {
  constructor(proxyId: string, toolName: string, timeoutMs: number) {
    super("ProxyError", "ProxyTimeout", `Tool '${toolName}' on proxy '${proxyId}' timed out after ${timeoutMs}ms`, {
      details: { proxy_id: proxyId, tool: toolName, timeout_ms: timeoutMs },
    });
  }
}

/** The proxy is failed or closed; no I/O is attempted. */
export class ProxyUnavailableError extends OrchestratorError {
  constructor(proxyId: string, state: string, lastError: string | null) {
    super("ProxyError", "ProxyUnavailable", `MCP proxy '${proxyId}' is ${state}`, {
      hint: "re-attach the MCP server with add_mcp_tools_to_agent",
      details: { proxy_id: proxyId, state, last_error: lastError },
    });
  }
}

export class ProxyToolNotExposedError extends OrchestratorError {
  constructor(proxyId: string, toolName: string, exposed: readonly string[]) {
    super("ProxyError", "ProxyToolNotExposed", `Tool '${toolName}' is not exposed by proxy '${proxyId}'`, {
      details: { proxy_id: proxyId, tool: toolName, exposed_tools: [...exposed] },
    });
  }
}

export class ProxyCallFailedError extends OrchestratorError {
  constructor(proxyId: string, toolName: string, cause: unknown) {
    super("ProxyError", "ProxyCallFailed", `Tool '${toolName}' on proxy '${proxyId}' failed: ${causeMessage(cause)}`, {
      details: { proxy_id: proxyId, tool: toolName },
      cause,
    });
  }
}
