import type { StructuredLogger } from "../logger.js";
import { KeyedMutex } from "../infra/keyedMutex.js";
import { UnknownToolError } from "../rpc/errors.js";
import { describeBinding, type AgentDefinition, type AgentKind, type ToolBinding } from "../types.js";
import { AgentAlreadyExistsError, AgentNotFoundError, InvalidModelError } from "./errors.js";

/** Fields supplied by callers; `createdAt` is stamped by the registry. */
export interface AgentDraft {
  readonly name: string;
  readonly kind?: AgentKind;
  readonly instruction: string;
  readonly description?: string;
  readonly model?: string;
  readonly tools?: readonly ToolBinding[];
}

export interface AgentSummary {
  name: string;
  kind: AgentKind;
  model: string;
  description: string;
  tools_count: number;
  tools: string[];
  created_at: string;
}

export interface AgentRegistryOptions {
  readonly supportedModels: readonly string[];
  readonly defaultModel: string;
  /** Names accepted for `builtin` bindings. */
  readonly builtinTools: readonly string[];
  readonly logger: StructuredLogger;
  readonly now?: () => Date;
}

function cloneDefinition(definition: AgentDefinition): AgentDefinition {
  return { ...definition, tools: definition.tools.map((binding) => ({ ...binding })) };
}

export function summariseAgent(definition: AgentDefinition): AgentSummary {
  return {
    name: definition.name,
    kind: definition.kind,
    model: definition.model,
    description: definition.description,
    tools_count: definition.tools.length,
    tools: definition.tools.map(describeBinding),
    created_at: definition.createdAt,
  };
}

/**
 * Keyed store of agent definitions. Stored values are frozen copies and every
 * read returns a fresh copy, so a reader never observes a half-applied write.
 * Multi-step updates on the same name go through {@link withAgentLock}.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, AgentDefinition>();
  private readonly locks = new KeyedMutex();
  private readonly supportedModels: readonly string[];
  private readonly defaultModel: string;
  private readonly builtinTools: ReadonlySet<string>;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;

  constructor(options: AgentRegistryOptions) {
    this.supportedModels = [...options.supportedModels];
    this.defaultModel = options.defaultModel;
    this.builtinTools = new Set(options.builtinTools);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get models(): readonly string[] {
    return this.supportedModels;
  }

  get size(): number {
    return this.agents.size;
  }

  /**
   * Validates and stores a definition. An existing name fails with
   * {@link AgentAlreadyExistsError} unless `overwrite` is set, in which case
   * the previous definition is replaced wholesale.
   */
  create(draft: AgentDraft, options: { overwrite?: boolean } = {}): AgentDefinition {
    const model = draft.model ?? this.defaultModel;
    if (!this.supportedModels.includes(model)) {
      throw new InvalidModelError(model, this.supportedModels);
    }
    const tools = draft.tools ?? [];
    for (const binding of tools) {
      if (binding.kind === "builtin" && !this.builtinTools.has(binding.name)) {
        throw new UnknownToolError(binding.name, [...this.builtinTools]);
      }
    }

    const replaced = this.agents.has(draft.name);
    if (replaced && options.overwrite !== true) {
      throw new AgentAlreadyExistsError(draft.name);
    }

    const definition: AgentDefinition = Object.freeze({
      name: draft.name,
      kind: draft.kind ?? "llm",
      instruction: draft.instruction,
      description: draft.description ?? "",
      model,
      tools: Object.freeze(tools.map((binding) => Object.freeze({ ...binding }))),
      createdAt: this.now().toISOString(),
    });
    this.agents.set(definition.name, definition);
    this.logger.info(replaced ? "agent_replaced" : "agent_created", {
      agent_name: definition.name,
      kind: definition.kind,
      model: definition.model,
      tools: definition.tools.map(describeBinding),
    });
    return cloneDefinition(definition);
  }

  get(name: string): AgentDefinition | undefined {
    const definition = this.agents.get(name);
    return definition ? cloneDefinition(definition) : undefined;
  }

  require(name: string): AgentDefinition {
    const definition = this.get(name);
    if (!definition) {
      throw new AgentNotFoundError(name);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  /** Summaries in registration order. */
  list(): AgentSummary[] {
    return [...this.agents.values()].map(summariseAgent);
  }

  delete(name: string): AgentDefinition {
    const definition = this.agents.get(name);
    if (!definition) {
      throw new AgentNotFoundError(name);
    }
    this.agents.delete(name);
    this.logger.info("agent_deleted", { agent_name: name });
    return cloneDefinition(definition);
  }

  /** Appends bindings to an existing definition, keeping every other field. */
  appendBindings(name: string, bindings: readonly ToolBinding[]): AgentDefinition {
    const current = this.agents.get(name);
    if (!current) {
      throw new AgentNotFoundError(name);
    }
    const updated: AgentDefinition = Object.freeze({
      ...current,
      tools: Object.freeze([...current.tools, ...bindings.map((binding) => Object.freeze({ ...binding }))]),
    });
    this.agents.set(name, updated);
    this.logger.info("agent_bindings_added", {
      agent_name: name,
      added: bindings.map(describeBinding),
      tools_count: updated.tools.length,
    });
    return cloneDefinition(updated);
  }

  /** Drops every `proxied` binding pointing at {@link proxyId}. */
  removeProxyBindings(proxyId: string): string[] {
    const touched: string[] = [];
    for (const [name, definition] of this.agents) {
      const remaining = definition.tools.filter(
        (binding) => binding.kind !== "proxied" || binding.proxyId !== proxyId,
      );
      if (remaining.length !== definition.tools.length) {
        this.agents.set(name, Object.freeze({ ...definition, tools: Object.freeze(remaining) }));
        touched.push(name);
      }
    }
    return touched;
  }

  /** Serialises {@link task} with every other locked operation on the listed names. */
  withAgentLock<T>(names: string | readonly string[], task: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusiveMany(typeof names === "string" ? [names] : names, task);
  }
}
