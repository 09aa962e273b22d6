import { OrchestratorError } from "../rpc/errors.js";
import type { SessionTurn } from "../types.js";

/** Callable tool handed to the model for one agent turn. */
export interface ResolvedTool {
  /** Unique name within the turn; what the model calls. */
  readonly name: string;
  readonly description: string;
  /** JSON Schema of the tool arguments. */
  readonly inputSchema: Record<string, unknown>;
  invoke(args: Record<string, unknown>): Promise<string>;
}

export interface GenerateRequest {
  readonly agentName: string;
  readonly model: string;
  readonly instruction: string;
  readonly tools: readonly ResolvedTool[];
  /** Turns recorded before {@link message}, oldest first. */
  readonly history: readonly SessionTurn[];
  readonly message: string;
}

/**
 * Narrow contract with the language-model backend. Implementations decide
 * when and which tools to call; the orchestrator only supplies them.
 */
export interface ModelBackend {
  generate(request: GenerateRequest): Promise<string>;
}

export class ModelUnavailableError extends OrchestratorError {
  constructor(model: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("BackendError", "ModelUnavailable", `Model '${model}' failed: ${reason}`, {
      details: { model },
      cause,
    });
  }
}

export class CredentialError extends OrchestratorError {
  constructor(message: string) {
    super("BackendError", "CredentialError", message, {
      hint: "set GOOGLE_GENERATIVE_AI_API_KEY (or GOOGLE_API_KEY) for the server process",
    });
  }
}
