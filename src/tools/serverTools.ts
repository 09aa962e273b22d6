import { readFile } from "node:fs/promises";

import { z } from "zod";

import type { ToolCatalogue } from "../mcp/catalogue.js";
import { DocumentationInputSchema, EmptyInputSchema } from "../rpc/schemas.js";
import { MCP_PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION, VERSION_INFO } from "../version.js";
import type { ToolContext } from "./context.js";

const DocumentationSchema = z.record(
  z.object({ description: z.string() }).catchall(z.array(z.string())),
);
export type Documentation = z.infer<typeof DocumentationSchema>;

const DOCUMENTATION_URL = new URL("../../resources/documentation.json", import.meta.url);

const documentationCache = new Map<string, Promise<Documentation>>();

/**
 * Loads and validates the topic documentation shipped in `resources/`. A
 * successful read is cached; a failed one is retried on the next call.
 */
export function loadDocumentation(url: URL = DOCUMENTATION_URL): Promise<Documentation> {
  const cached = documentationCache.get(url.href);
  if (cached) {
    return cached;
  }
  const loading = readFile(url, "utf8")
    .then((raw) => DocumentationSchema.parse(JSON.parse(raw)))
    .catch((error: unknown) => {
      documentationCache.delete(url.href);
      throw error;
    });
  documentationCache.set(url.href, loading);
  return loading;
}

const CAPABILITIES = [
  "agent_creation",
  "agent_execution",
  "session_management",
  "multi_agent_systems",
  "mcp_tool_integration",
  "agent_evaluation",
  "web_search",
  "web_page_loading",
];

export function registerServerTools(catalogue: ToolCatalogue, context: ToolContext): void {
  catalogue.register(
    {
      name: "get_server_version",
      title: "Server version",
      description: "Return the server version, capabilities and supported models.",
      category: "server",
    },
    EmptyInputSchema,
    async () => ({
      server_name: SERVER_NAME,
      version: SERVER_VERSION,
      version_info: VERSION_INFO,
      mcp_protocol_version: MCP_PROTOCOL_VERSION,
      capabilities: CAPABILITIES,
      supported_models: [...context.config.supportedModels],
      default_model: context.config.defaultModel,
      tools: catalogue.names(),
    }),
  );

  catalogue.register(
    {
      name: "get_adk_documentation",
      title: "Documentation",
      description: "Describe a feature area: agents, tools, sessions, multi_agent, mcp_proxies or evaluation.",
      category: "server",
    },
    DocumentationInputSchema,
    async (input) => {
      const documentation = await loadDocumentation();
      const topic = input.topic.toLowerCase();
      if (!Object.hasOwn(documentation, topic)) {
        return { found: false, topic: input.topic, available_topics: Object.keys(documentation) };
      }
      return { found: true, topic, documentation: documentation[topic] };
    },
  );
}
