import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { generateText, jsonSchema, stepCountIs, tool, type LanguageModel, type ModelMessage, type ToolSet } from "ai";
import type { JSONSchema7 } from "json-schema";

import type { EnvSource } from "../config/env.js";
import type { StructuredLogger } from "../logger.js";
import { OrchestratorError } from "../rpc/errors.js";
import type { SessionTurn } from "../types.js";
import {
  CredentialError,
  ModelUnavailableError,
  type GenerateRequest,
  type ModelBackend,
  type ResolvedTool,
} from "./types.js";

/** Maps a model identifier (e.g. `gemini-2.0-flash`) to an AI SDK model. */
export type ModelFactory = (modelId: string) => LanguageModel;

/**
 * Gemini models through `@ai-sdk/google`. The key is read once; a missing
 * key surfaces as {@link CredentialError} on the first run, not at startup.
 */
export function createGoogleModelFactory(env: EnvSource = process.env): ModelFactory {
  const apiKey = env.GOOGLE_GENERATIVE_AI_API_KEY ?? env.GOOGLE_API_KEY;
  if (!apiKey) {
    return () => {
      throw new CredentialError("No Google Generative AI API key configured");
    };
  }
  const provider = createGoogleGenerativeAI({ apiKey });
  return (modelId) => provider(modelId);
}

export interface AiSdkBackendOptions {
  readonly logger: StructuredLogger;
  /** Upper bound on model steps (each tool round trip is one step). */
  readonly maxSteps: number;
  readonly modelFactory?: ModelFactory;
}

const EMPTY_OBJECT_SCHEMA: JSONSchema7 = { type: "object", properties: {} };

function isJsonSchemaObject(value: unknown): value is JSONSchema7 {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const type: unknown = Reflect.get(value, "type");
  return type === undefined || typeof type === "string" || Array.isArray(type);
}

function toModelMessage(turn: SessionTurn): ModelMessage {
  return turn.role === "user"
    ? { role: "user", content: turn.content }
    : { role: "assistant", content: turn.content };
}

/** {@link ModelBackend} running the tool loop with the Vercel AI SDK. */
export class AiSdkBackend implements ModelBackend {
  private readonly logger: StructuredLogger;
  private readonly maxSteps: number;
  private readonly modelFactory: ModelFactory;

  constructor(options: AiSdkBackendOptions) {
    this.logger = options.logger;
    this.maxSteps = options.maxSteps;
    this.modelFactory = options.modelFactory ?? createGoogleModelFactory();
  }

  async generate(request: GenerateRequest): Promise<string> {
    const model = this.modelFactory(request.model);
    const messages: ModelMessage[] = [
      ...request.history.map(toModelMessage),
      { role: "user", content: request.message },
    ];

    const startedAt = Date.now();
    try {
      const result = await generateText({
        model,
        system: request.instruction,
        messages,
        tools: this.buildToolSet(request.agentName, request.tools),
        stopWhen: stepCountIs(this.maxSteps),
      });
      this.logger.debug("model_generate_completed", {
        agent_name: request.agentName,
        model: request.model,
        steps: result.steps.length,
        finish_reason: result.finishReason,
        duration_ms: Date.now() - startedAt,
      });
      return result.text;
    } catch (error) {
      if (error instanceof OrchestratorError) {
        throw error;
      }
      throw new ModelUnavailableError(request.model, error);
    }
  }

  /**
   * Wraps each resolved tool for the SDK. A failing tool call reports its
   * error to the model as the tool output instead of aborting the turn.
   */
  private buildToolSet(agentName: string, resolved: readonly ResolvedTool[]): ToolSet {
    const tools: ToolSet = {};
    for (const entry of resolved) {
      const schema = isJsonSchemaObject(entry.inputSchema) ? entry.inputSchema : EMPTY_OBJECT_SCHEMA;
      tools[entry.name] = tool({
        description: entry.description,
        inputSchema: jsonSchema<Record<string, unknown>>(schema),
        execute: async (input: Record<string, unknown>) => {
          try {
            return await entry.invoke(input);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn("agent_tool_call_failed", { agent_name: agentName, tool: entry.name, message });
            return `Error: ${message}`;
          }
        },
      });
    }
    return tools;
  }
}
