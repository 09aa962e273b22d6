import type { StructuredLogger } from "../logger.js";
import { InvalidInputError } from "../rpc/errors.js";
import type { AgentDefinition, ToolBinding } from "../types.js";
import { CompositionError, CyclicCompositionError } from "./errors.js";
import type { AgentRegistry } from "./registry.js";

export interface CompositionRequest {
  readonly coordinatorName: string;
  readonly instruction: string;
  readonly subAgents: readonly string[];
  readonly model?: string;
  readonly description?: string;
  readonly overwrite?: boolean;
}

/**
 * Builds coordinator agents whose bindings delegate to registered sub-agents.
 * Composition is all-or-nothing: a missing or cyclic reference leaves the
 * registry untouched.
 */
export class AgentComposer {
  constructor(
    private readonly registry: AgentRegistry,
    private readonly logger: StructuredLogger,
  ) {}

  async compose(request: CompositionRequest): Promise<AgentDefinition> {
    const duplicates = request.subAgents.filter((name, index) => request.subAgents.indexOf(name) !== index);
    if (duplicates.length > 0) {
      throw new InvalidInputError("sub_agents must not contain duplicates", { duplicates });
    }

    if (request.subAgents.includes(request.coordinatorName)) {
      throw new CyclicCompositionError([request.coordinatorName, request.coordinatorName]);
    }

    return this.registry.withAgentLock([request.coordinatorName, ...request.subAgents], () => {
      const missing = request.subAgents.filter((name) => !this.registry.has(name));
      if (missing.length > 0) {
        throw new CompositionError(request.coordinatorName, missing);
      }

      const cycle = this.findCycle(request.coordinatorName, request.subAgents);
      if (cycle) {
        throw new CyclicCompositionError(cycle);
      }

      const tools = request.subAgents.map((agentName): ToolBinding => ({ kind: "sub_agent", agentName }));
      const definition = this.registry.create(
        {
          name: request.coordinatorName,
          kind: "coordinator",
          instruction: request.instruction,
          description:
            request.description ?? `Coordinator agent managing ${request.subAgents.length} sub-agents`,
          model: request.model,
          tools,
        },
        { overwrite: request.overwrite },
      );
      this.logger.info("multi_agent_system_composed", {
        coordinator_name: definition.name,
        sub_agents: [...request.subAgents],
      });
      return definition;
    });
  }

  /**
   * Depth-first walk over `sub_agent` bindings starting from each proposed
   * sub-agent. Returns the offending path when {@link coordinatorName} is
   * reachable, `null` otherwise.
   */
  private findCycle(coordinatorName: string, subAgents: readonly string[]): string[] | null {
    const visited = new Set<string>();

    const walk = (name: string, path: string[]): string[] | null => {
      if (name === coordinatorName) {
        return [...path, name];
      }
      if (visited.has(name)) {
        return null;
      }
      visited.add(name);
      for (const binding of this.registry.get(name)?.tools ?? []) {
        if (binding.kind !== "sub_agent") {
          continue;
        }
        const found = walk(binding.agentName, [...path, name]);
        if (found) {
          return found;
        }
      }
      return null;
    };

    for (const subAgent of subAgents) {
      const found = walk(subAgent, [coordinatorName]);
      if (found) {
        return found;
      }
    }
    return null;
  }
}
