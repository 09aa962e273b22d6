import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import { isRecord } from "../types.js";

export type ToolCategory = "agents" | "sessions" | "proxies" | "evaluation" | "web" | "server";

/** JSON Schema advertised for tool arguments in `tools/list`. */
export interface ToolInputJsonSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
}

export interface ToolManifest {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly category: ToolCategory;
  readonly inputSchema: ToolInputJsonSchema;
}

export type ToolManifestDraft = Omit<ToolManifest, "inputSchema">;

/** Structured result returned by every handler. */
export type ToolPayload = Record<string, unknown>;

/** Outcome of validating raw arguments against a tool schema. */
export type BoundToolCall =
  | { readonly ok: true; invoke(): Promise<ToolPayload> }
  | { readonly ok: false; readonly error: z.ZodError };

interface CatalogueEntry {
  readonly manifest: ToolManifest;
  bind(rawArgs: unknown): BoundToolCall;
}

export class ToolRegistrationError extends Error {
  constructor(name: string) {
    super(`Tool '${name}' is already registered`);
    this.name = "ToolRegistrationError";
  }
}

/** Converts a zod object schema into the JSON Schema shape MCP clients expect. */
export function toInputJsonSchema(schema: z.ZodTypeAny): ToolInputJsonSchema {
  const converted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(zodToJsonSchema(schema, { $refStrategy: "none" }))) {
    converted[key] = value;
  }
  const required = Array.isArray(converted.required)
    ? converted.required.filter((entry): entry is string => typeof entry === "string")
    : [];
  return {
    type: "object",
    properties: isRecord(converted.properties) ? converted.properties : {},
    ...(required.length > 0 ? { required } : {}),
    ...(typeof converted.additionalProperties === "boolean"
      ? { additionalProperties: converted.additionalProperties }
      : {}),
  };
}

/**
 * Fixed mapping from tool name to manifest, input schema and handler. Each
 * entry binds its schema to its handler so validated input reaches the
 * handler with its parsed type.
 */
export class ToolCatalogue {
  private readonly entries = new Map<string, CatalogueEntry>();

  register<S extends z.ZodTypeAny>(
    draft: ToolManifestDraft,
    schema: S,
    handler: (input: z.output<S>) => Promise<ToolPayload>,
  ): ToolManifest {
    if (this.entries.has(draft.name)) {
      throw new ToolRegistrationError(draft.name);
    }
    const manifest: ToolManifest = Object.freeze({ ...draft, inputSchema: toInputJsonSchema(schema) });
    this.entries.set(draft.name, {
      manifest,
      bind: (rawArgs) => {
        const parsed = schema.safeParse(rawArgs ?? {});
        if (!parsed.success) {
          return { ok: false, error: parsed.error };
        }
        const input: z.output<S> = parsed.data;
        return { ok: true, invoke: () => handler(input) };
      },
    });
    return manifest;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Validates {@link rawArgs}; `undefined` when {@link name} is not catalogued. */
  bind(name: string, rawArgs: unknown): BoundToolCall | undefined {
    return this.entries.get(name)?.bind(rawArgs);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  manifests(): ToolManifest[] {
    return [...this.entries.values()].map((entry) => entry.manifest);
  }
}
