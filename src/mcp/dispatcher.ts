import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { runWithRequestContext } from "../infra/requestContext.js";
import type { StructuredLogger } from "../logger.js";
import { InvalidInputError, UnknownToolError } from "../rpc/errors.js";
import {
  buildToolSuccessResult,
  logAndWrap,
  normaliseToolError,
  type NormalisedToolError,
} from "../server/toolErrors.js";
import type { ToolCatalogue, ToolPayload } from "./catalogue.js";

/** Lifecycle of one request: received → validated → routed → completed | failed. */
export type DispatchPhase = "received" | "validated" | "routed" | "completed" | "failed";

export type DispatchOutcome =
  | { readonly status: "completed"; readonly tool: string; readonly result: ToolPayload; readonly durationMs: number }
  | {
      readonly status: "failed";
      readonly tool: string;
      /** Last phase reached before the failure. */
      readonly failedAt: Exclude<DispatchPhase, "completed" | "failed">;
      readonly error: NormalisedToolError;
      readonly durationMs: number;
    };

/**
 * Validates, routes and classifies tool calls. Unknown tools and invalid
 * arguments fail before any component runs; component failures are
 * normalised so the response always carries a stable kind and code.
 */
export class Dispatcher {
  constructor(
    private readonly catalogue: ToolCatalogue,
    private readonly logger: StructuredLogger,
  ) {}

  dispatch(tool: string, rawArgs: unknown, requestId: string | number | null = null): Promise<DispatchOutcome> {
    return runWithRequestContext({ requestId, tool }, () => this.process(tool, rawArgs));
  }

  /** Dispatches and encodes the outcome as an MCP `tools/call` result. */
  async handleCallTool(tool: string, rawArgs: unknown, requestId: string | number | null = null): Promise<CallToolResult> {
    const outcome = await this.dispatch(tool, rawArgs, requestId);
    if (outcome.status === "completed") {
      return buildToolSuccessResult(tool, outcome.result);
    }
    return runWithRequestContext({ requestId, tool }, () =>
      logAndWrap(this.logger, tool, outcome.error, { failed_at: outcome.failedAt, duration_ms: outcome.durationMs }),
    );
  }

  private async process(tool: string, rawArgs: unknown): Promise<DispatchOutcome> {
    const startedAt = Date.now();
    const elapsed = (): number => Date.now() - startedAt;
    this.logger.debug("tool_call_received");

    const bound = this.catalogue.bind(tool, rawArgs);
    if (!bound) {
      return this.fail(tool, "received", new UnknownToolError(tool, this.catalogue.names()), elapsed());
    }
    if (!bound.ok) {
      const error = new InvalidInputError(`Invalid arguments for ${tool}`, { issues: bound.error.issues });
      return this.fail(tool, "received", error, elapsed());
    }
    this.logger.debug("tool_call_validated");

    let result: ToolPayload;
    try {
      this.logger.debug("tool_call_routed");
      result = await bound.invoke();
    } catch (error) {
      return this.fail(tool, "routed", error, elapsed());
    }

    this.logger.debug("tool_call_completed", { duration_ms: elapsed() });
    return { status: "completed", tool, result, durationMs: elapsed() };
  }

  private fail(
    tool: string,
    failedAt: Exclude<DispatchPhase, "completed" | "failed">,
    error: unknown,
    durationMs: number,
  ): DispatchOutcome {
    const normalised = normaliseToolError(error);
    this.logger.debug("tool_call_failed", { failed_at: failedAt, code: normalised.code });
    return { status: "failed", tool, failedAt, error: normalised, durationMs };
  }
}
