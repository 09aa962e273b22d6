import type { AgentRegistry } from "../agents/registry.js";
import type { ModelBackend } from "../backend/types.js";
import type { StructuredLogger } from "../logger.js";
import type { SessionStore } from "../sessions/store.js";
import type { ToolResolver } from "./toolResolver.js";

export interface RunOptions {
  /** Existing or client-chosen session; a new id is generated when absent. */
  readonly sessionId?: string;
  readonly userId?: string;
  /** Deletes the session once the run completes (sub-agent and evaluation runs). */
  readonly ephemeral?: boolean;
}

export interface RunResult {
  reply: string;
  sessionId: string;
  turnCount: number;
}

export interface ExecutionEngineDeps {
  readonly registry: AgentRegistry;
  readonly sessions: SessionStore;
  readonly resolver: ToolResolver;
  readonly backend: ModelBackend;
  readonly logger: StructuredLogger;
}

/**
 * Executes one agent turn: lease the session, resolve every binding, record
 * the user message, ask the backend for a reply and record it. A failed turn
 * leaves the session exactly as it was, and a session it created is dropped.
 */
export class ExecutionEngine {
  private readonly deps: ExecutionEngineDeps;

  constructor(deps: ExecutionEngineDeps) {
    this.deps = deps;
  }

  async run(agentName: string, message: string, options: RunOptions = {}): Promise<RunResult> {
    const { registry, sessions, resolver, backend, logger } = this.deps;
    const definition = registry.require(agentName);
    const lease = sessions.acquire(options.sessionId, { userId: options.userId });
    const startedAt = Date.now();

    try {
      const tools = resolver.resolve(definition, (subAgent, request) =>
        this.run(subAgent, request, { ephemeral: true, userId: definition.name }).then((result) => result.reply),
      );
      const history = lease.history();
      const mark = lease.mark();
      lease.append("user", message);

      let reply: string;
      try {
        reply = await backend.generate({
          agentName: definition.name,
          model: definition.model,
          instruction: definition.instruction,
          tools,
          history,
          message,
        });
      } catch (error) {
        lease.rollbackTo(mark);
        throw error;
      }

      lease.append("agent", reply);
      const turnCount = lease.mark();
      logger.info("agent_run_completed", {
        agent_name: definition.name,
        session_id: lease.sessionId,
        tools: tools.map((tool) => tool.name),
        turn_count: turnCount,
        ephemeral: options.ephemeral === true,
        duration_ms: Date.now() - startedAt,
      });
      return { reply, sessionId: lease.sessionId, turnCount };
    } finally {
      lease.release();
      // A session opened by a failed first turn was never handed to the client.
      if (options.ephemeral || (lease.created && lease.mark() === 0)) {
        sessions.evict(lease.sessionId);
      }
    }
  }
}
