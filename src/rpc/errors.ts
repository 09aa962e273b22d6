/**
 * Error taxonomy shared by every component. Each failure carries a stable
 * `kind` (the category clients branch on) and a stable `code` naming the
 * precise condition. Optional `hint` and `details` travel to the client
 * unchanged.
 */
export const ERROR_KINDS = [
  "BadRequest",
  "NotFound",
  "Conflict",
  "CompositionError",
  "CyclicCompositionError",
  "ConfigurationError",
  "ProxyError",
  "BackendError",
  "ExternalToolError",
  "Internal",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface OrchestratorErrorOptions {
  readonly hint?: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/** Base class of every domain error surfaced through the dispatcher. */
export class OrchestratorError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly hint?: string;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, code: string, message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Arguments failed schema validation. */
export class InvalidInputError extends OrchestratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("BadRequest", "InvalidInput", message, { hint: "invalid_input", details });
  }
}

/** A tool name (protocol tool or built-in binding) is not part of the catalogue. */
export class UnknownToolError extends OrchestratorError {
  readonly toolName: string;

  constructor(toolName: string, available: readonly string[]) {
    super("BadRequest", "UnknownTool", `Unknown tool '${toolName}'`, {
      hint: "list_available_tools",
      details: { tool: toolName, available: [...available] },
    });
    this.toolName = toolName;
  }
}

/** Catch-all for failures that escaped every domain classification. */
export class InternalError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super("Internal", "Unexpected", message, { cause });
  }
}
