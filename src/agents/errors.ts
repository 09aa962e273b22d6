import { OrchestratorError } from "../rpc/errors.js";

export class AgentNotFoundError extends OrchestratorError {
  readonly agentName: string;

  constructor(agentName: string) {
    super("NotFound", "AgentNotFound", `Agent '${agentName}' not found`, {
      hint: "list_adk_agents",
      details: { agent_name: agentName },
    });
    this.agentName = agentName;
  }
}

export class AgentAlreadyExistsError extends OrchestratorError {
  readonly agentName: string;

  constructor(agentName: string) {
    super("Conflict", "AlreadyExists", `Agent '${agentName}' already exists`, {
      hint: "pass overwrite=true to replace it",
      details: { agent_name: agentName },
    });
    this.agentName = agentName;
  }
}

export class InvalidModelError extends OrchestratorError {
  constructor(model: string, supported: readonly string[]) {
    super("BadRequest", "InvalidModel", `Model '${model}' is not supported`, {
      hint: "get_server_version lists the supported models",
      details: { model, supported_models: [...supported] },
    });
  }
}

/** Composition referenced agents that are not registered. */
export class CompositionError extends OrchestratorError {
  readonly missingNames: string[];

  constructor(coordinatorName: string, missingNames: readonly string[]) {
    super(
      "CompositionError",
      "CompositionError",
      `Cannot compose '${coordinatorName}': unknown sub-agent(s) ${missingNames.join(", ")}`,
      { details: { coordinator_name: coordinatorName, missing_names: [...missingNames] } },
    );
    this.missingNames = [...missingNames];
  }
}

/** Composition would make an agent reachable from itself. */
export class CyclicCompositionError extends OrchestratorError {
  readonly path: string[];

  constructor(path: readonly string[]) {
    super("CyclicCompositionError", "CyclicCompositionError", `Composition cycle: ${path.join(" -> ")}`, {
      details: { path: [...path] },
    });
    this.path = [...path];
  }
}
