import { summariseAgent } from "../agents/registry.js";
import type { ToolCatalogue } from "../mcp/catalogue.js";
import {
  AgentNameInputSchema,
  CreateAgentInputSchema,
  CreateMultiAgentSystemInputSchema,
  EmptyInputSchema,
  RunAgentInputSchema,
} from "../rpc/schemas.js";
import type { ToolBinding } from "../types.js";
import type { ToolContext } from "./context.js";

/**
 * Closes the live proxies of {@link agentName} that its current definition no
 * longer binds (after a replacement or a deletion). Callers hold the agent
 * lock, so no attach is half done.
 */
async function closeUnboundProxies(context: ToolContext, agentName: string): Promise<string[]> {
  const bound = new Set(
    (context.registry.get(agentName)?.tools ?? []).flatMap((binding) =>
      binding.kind === "proxied" ? [binding.proxyId] : [],
    ),
  );
  const unbound = context.proxies
    .list(agentName)
    .filter((proxy) => proxy.state !== "closed" && !bound.has(proxy.proxy_id));
  for (const proxy of unbound) {
    await context.proxies.close(proxy.proxy_id);
  }
  return unbound.map((proxy) => proxy.proxy_id);
}

/** Registers agent lifecycle and execution tools. */
export function registerAgentTools(catalogue: ToolCatalogue, context: ToolContext): void {
  const { registry, composer, engine, proxies, builtins } = context;

  catalogue.register(
    {
      name: "create_adk_agent",
      title: "Create agent",
      description: "Create a conversational agent with an instruction, a model and optional built-in tools.",
      category: "agents",
    },
    CreateAgentInputSchema,
    async (input) => {
      const tools = input.tools.map((name): ToolBinding => ({ kind: "builtin", name: builtins.canonicalName(name) }));
      return registry.withAgentLock(input.name, async () => {
        const definition = registry.create(
          {
            name: input.name,
            instruction: input.instruction,
            description: input.description,
            model: input.model,
            tools,
          },
          { overwrite: input.overwrite },
        );
        const closedProxies = await closeUnboundProxies(context, definition.name);
        return { agent: summariseAgent(definition), closed_proxies: closedProxies };
      });
    },
  );

  catalogue.register(
    {
      name: "list_adk_agents",
      title: "List agents",
      description: "List every registered agent.",
      category: "agents",
    },
    EmptyInputSchema,
    async () => {
      const agents = registry.list();
      return { agents, total_count: agents.length };
    },
  );

  catalogue.register(
    {
      name: "get_adk_agent_info",
      title: "Describe agent",
      description: "Return the full definition of an agent, including its tool bindings and attached MCP proxies.",
      category: "agents",
    },
    AgentNameInputSchema,
    async (input) => {
      const definition = registry.require(input.agent_name);
      return {
        agent: {
          name: definition.name,
          kind: definition.kind,
          instruction: definition.instruction,
          description: definition.description,
          model: definition.model,
          tools: definition.tools.map((binding) => ({ ...binding })),
          created_at: definition.createdAt,
        },
        mcp_proxies: proxies.list(definition.name),
      };
    },
  );

  catalogue.register(
    {
      name: "delete_adk_agent",
      title: "Delete agent",
      description: "Remove an agent and close the MCP proxies attached to it.",
      category: "agents",
    },
    AgentNameInputSchema,
    async (input) => {
      return registry.withAgentLock(input.agent_name, async () => {
        const deleted = registry.delete(input.agent_name);
        const closedProxies = await closeUnboundProxies(context, deleted.name);
        return { deleted: summariseAgent(deleted), closed_proxies: closedProxies };
      });
    },
  );

  catalogue.register(
    {
      name: "run_adk_agent",
      title: "Run agent",
      description:
        "Send a message to an agent. Reuse the returned session_id to continue the same conversation.",
      category: "agents",
    },
    RunAgentInputSchema,
    async (input) => {
      const result = await engine.run(input.agent_name, input.message, {
        sessionId: input.session_id,
        userId: input.user_id,
      });
      return {
        agent_name: input.agent_name,
        agent_response: result.reply,
        session_id: result.sessionId,
        turn_count: result.turnCount,
      };
    },
  );

  catalogue.register(
    {
      name: "create_multi_agent_system",
      title: "Compose agents",
      description: "Create a coordinator agent that delegates to existing sub-agents.",
      category: "agents",
    },
    CreateMultiAgentSystemInputSchema,
    async (input) => {
      const coordinator = await composer.compose({
        coordinatorName: input.coordinator_name,
        instruction: input.coordinator_instruction,
        subAgents: input.sub_agents,
        model: input.model,
        description: input.description,
        overwrite: input.overwrite,
      });
      const closedProxies = await registry.withAgentLock(coordinator.name, () =>
        closeUnboundProxies(context, coordinator.name),
      );
      return { coordinator: summariseAgent(coordinator), sub_agents: input.sub_agents, closed_proxies: closedProxies };
    },
  );
}
