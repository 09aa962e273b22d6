import type { ToolCatalogue } from "../mcp/catalogue.js";
import type { ProxyAttachResult } from "../proxy/manager.js";
import { AddMcpToolsInputSchema, ListProxiesInputSchema, ProxyIdInputSchema } from "../rpc/schemas.js";
import type { ToolBinding } from "../types.js";
import type { ToolContext } from "./context.js";

/** Registers the tools managing external MCP tool providers. */
export function registerProxyTools(catalogue: ToolCatalogue, context: ToolContext): void {
  const { registry, proxies, logger } = context;

  catalogue.register(
    {
      name: "add_mcp_tools_to_agent",
      title: "Attach MCP tools",
      description:
        "Launch an external MCP server, discover its tools and bind them (optionally filtered) to an agent.",
      category: "proxies",
    },
    AddMcpToolsInputSchema,
    async (input) =>
      registry.withAgentLock(input.agent_name, async () => {
        registry.require(input.agent_name);
        const attached: ProxyAttachResult = await proxies.attach({
          agentName: input.agent_name,
          command: input.mcp_server_command,
          args: input.mcp_server_args,
          filter: input.tool_filter,
        });
        const bindings = attached.proxy.exposed_tools.map(
          (remoteName): ToolBinding => ({ kind: "proxied", proxyId: attached.proxy.proxy_id, remoteName }),
        );
        const agent = bindings.length > 0 ? registry.appendBindings(input.agent_name, bindings) : registry.require(input.agent_name);
        logger.info("mcp_tools_attached", {
          agent_name: agent.name,
          proxy_id: attached.proxy.proxy_id,
          tools: attached.proxy.exposed_tools,
        });
        return {
          agent_name: agent.name,
          proxy: attached.proxy,
          tools_added: attached.proxy.exposed_tools,
          tools_count: agent.tools.length,
          ...(attached.warning ? { warning: attached.warning } : {}),
        };
      }),
  );

  catalogue.register(
    {
      name: "list_mcp_proxies",
      title: "List MCP proxies",
      description: "List external MCP servers attached to agents, optionally for one agent only.",
      category: "proxies",
    },
    ListProxiesInputSchema,
    async (input) => {
      const list = proxies.list(input.agent_name);
      return { proxies: list, total_count: list.length };
    },
  );

  catalogue.register(
    {
      name: "close_mcp_proxy",
      title: "Close MCP proxy",
      description: "Terminate an external MCP server and remove its tools from the owning agent.",
      category: "proxies",
    },
    ProxyIdInputSchema,
    async (input) => {
      const current = proxies.get(input.proxy_id);
      const owner = current?.agent_name ?? input.proxy_id;
      return registry.withAgentLock(owner, async () => {
        const closed = await proxies.close(input.proxy_id);
        const updatedAgents = registry.removeProxyBindings(closed.proxy_id);
        return { proxy: closed, updated_agents: updatedAgents };
      });
    },
  );
}
