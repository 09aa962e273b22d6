/** Binding attaching one callable tool to an agent definition. */
export type ToolBinding =
  | { readonly kind: "builtin"; readonly name: string }
  | { readonly kind: "sub_agent"; readonly agentName: string }
  | { readonly kind: "proxied"; readonly proxyId: string; readonly remoteName: string };

export type AgentKind = "llm" | "coordinator";

/** Immutable description of an agent, keyed by its unique name. */
export interface AgentDefinition {
  readonly name: string;
  readonly kind: AgentKind;
  readonly instruction: string;
  readonly description: string;
  readonly model: string;
  readonly tools: readonly ToolBinding[];
  readonly createdAt: string;
}

export type TurnRole = "user" | "agent";

export interface SessionTurn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: string;
}

/** Compact description of a binding used in summaries and logs. */
export function describeBinding(binding: ToolBinding): string {
  switch (binding.kind) {
    case "builtin":
      return binding.name;
    case "sub_agent":
      return `agent:${binding.agentName}`;
    case "proxied":
      return `mcp:${binding.remoteName}`;
  }
}

/** Narrows unknown values to plain JSON-like records. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
