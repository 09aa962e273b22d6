import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { OrchestratorError, type ErrorKind } from "../rpc/errors.js";

/** Machine-readable description of a failed tool call. */
export interface NormalisedToolError {
  kind: ErrorKind;
  code: string;
  message: string;
  hint?: string;
  details?: Record<string, unknown>;
}

/**
 * Classifies any thrown value. Domain errors keep their kind, code, hint and
 * details; zod failures become `BadRequest/InvalidInput`; everything else is
 * `Internal/Unexpected`.
 */
export function normaliseToolError(error: unknown): NormalisedToolError {
  if (error instanceof OrchestratorError) {
    return {
      kind: error.kind,
      code: error.code,
      message: error.message,
      ...(error.hint !== undefined ? { hint: error.hint } : {}),
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }
  if (error instanceof z.ZodError) {
    return {
      kind: "BadRequest",
      code: "InvalidInput",
      message: "Invalid tool arguments",
      hint: "invalid_input",
      details: { issues: error.issues },
    };
  }
  return {
    kind: "Internal",
    code: "Unexpected",
    message: error instanceof Error ? error.message : String(error),
  };
}

function serialise(payload: Record<string, unknown>): string {
  return JSON.stringify(payload, null, 2);
}

/** Success envelope: JSON text content mirrored in `structuredContent`. */
export function buildToolSuccessResult(tool: string, result: Record<string, unknown>): CallToolResult {
  const payload = { ok: true, tool, result };
  return {
    content: [{ type: "text", text: serialise(payload) }],
    structuredContent: payload,
  };
}

/** Failure envelope flagged with `isError`. */
export function buildToolErrorResult(tool: string, error: NormalisedToolError): CallToolResult {
  const payload: Record<string, unknown> = {
    ok: false,
    kind: error.kind,
    code: error.code,
    tool,
    message: error.message,
  };
  if (error.hint) {
    payload.hint = error.hint;
  }
  if (error.details !== undefined) {
    payload.details = error.details;
  }
  return {
    isError: true,
    content: [{ type: "text", text: serialise(payload) }],
    structuredContent: payload,
  };
}

/**
 * Logs the failure and returns the error envelope. Internal failures are
 * logged at `error`; domain failures the client can act on at `warn`.
 */
export function logAndWrap(
  logger: StructuredLogger,
  tool: string,
  normalised: NormalisedToolError,
  context: Record<string, unknown> = {},
): CallToolResult {
  const log = normalised.kind === "Internal" ? logger.error.bind(logger) : logger.warn.bind(logger);
  log(`${tool}_failed`, {
    ...context,
    kind: normalised.kind,
    code: normalised.code,
    message: normalised.message,
    details: normalised.details,
  });
  return buildToolErrorResult(tool, normalised);
}
