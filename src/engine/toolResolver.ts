import type { ResolvedTool } from "../backend/types.js";
import type { AgentRegistry } from "../agents/registry.js";
import type { ToolProxyManager } from "../proxy/manager.js";
import { OrchestratorError } from "../rpc/errors.js";
import type { BuiltinToolbox } from "../tools/builtins.js";
import { describeBinding, type AgentDefinition, type ToolBinding } from "../types.js";

/** A binding could not be turned into a callable tool; the run is aborted. */
export class ToolResolutionError extends OrchestratorError {
  constructor(agentName: string, binding: ToolBinding, reason: string) {
    super("ConfigurationError", "ToolResolutionError", `Agent '${agentName}' cannot use ${describeBinding(binding)}: ${reason}`, {
      details: { agent_name: agentName, binding: { ...binding } },
    });
  }
}

/** Runs a sub-agent on a fresh, ephemeral session and returns its reply. */
export type SubAgentRunner = (agentName: string, request: string) => Promise<string>;

export interface ToolResolverDeps {
  readonly registry: AgentRegistry;
  readonly builtins: BuiltinToolbox;
  readonly proxies: ToolProxyManager;
}

const SUB_AGENT_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: { request: { type: "string", description: "Task or question for the sub-agent" } },
  required: ["request"],
};

/** Model-facing tool names: `[A-Za-z_][A-Za-z0-9_.-]*`, at most 64 characters. */
export function sanitiseToolName(name: string): string {
  let cleaned = name.replace(/[^A-Za-z0-9_.-]/g, "_");
  if (!/^[A-Za-z_]/.test(cleaned)) {
    cleaned = `_${cleaned}`;
  }
  return cleaned.slice(0, 64);
}

/**
 * Turns the bindings of a definition into callable handles. Every binding is
 * resolved before anything runs, so a broken binding aborts the whole turn.
 */
export class ToolResolver {
  constructor(private readonly deps: ToolResolverDeps) {}

  resolve(definition: AgentDefinition, runSubAgent: SubAgentRunner): ResolvedTool[] {
    const resolved: ResolvedTool[] = [];
    const usedNames = new Set<string>();
    for (const binding of definition.tools) {
      const tool = this.resolveBinding(definition.name, binding, runSubAgent);
      let name = sanitiseToolName(tool.name);
      for (let suffix = 2; usedNames.has(name); suffix += 1) {
        name = `${sanitiseToolName(tool.name).slice(0, 60)}_${suffix}`;
      }
      usedNames.add(name);
      resolved.push({ ...tool, name });
    }
    return resolved;
  }

  private resolveBinding(agentName: string, binding: ToolBinding, runSubAgent: SubAgentRunner): ResolvedTool {
    switch (binding.kind) {
      case "builtin": {
        const builtin = this.deps.builtins.get(binding.name);
        if (!builtin) {
          throw new ToolResolutionError(agentName, binding, "unknown built-in tool");
        }
        return {
          name: builtin.name,
          description: builtin.description,
          inputSchema: builtin.inputSchema,
          invoke: (args) => builtin.run(args),
        };
      }
      case "sub_agent": {
        const subAgent = this.deps.registry.get(binding.agentName);
        if (!subAgent) {
          throw new ToolResolutionError(agentName, binding, "sub-agent is not registered");
        }
        return {
          name: subAgent.name,
          description: subAgent.description || `Delegate a request to the '${subAgent.name}' agent`,
          inputSchema: SUB_AGENT_SCHEMA,
          invoke: async (args) => {
            const request = typeof args.request === "string" ? args.request : JSON.stringify(args);
            return runSubAgent(subAgent.name, request);
          },
        };
      }
      case "proxied": {
        const state = this.deps.proxies.stateOf(binding.proxyId);
        if (state !== "ready") {
          throw new ToolResolutionError(agentName, binding, `MCP proxy ${binding.proxyId} is ${state ?? "unknown"}`);
        }
        const remote = this.deps.proxies.findExposedTool(binding.proxyId, binding.remoteName);
        if (!remote) {
          throw new ToolResolutionError(agentName, binding, "remote tool is not exposed by the proxy");
        }
        return {
          name: remote.name,
          description: remote.description,
          inputSchema: remote.inputSchema,
          invoke: async (args) => {
            const output = await this.deps.proxies.invoke(binding.proxyId, binding.remoteName, args);
            return output.isError ? `Error: ${output.text}` : output.text;
          },
        };
      }
    }
  }
}
