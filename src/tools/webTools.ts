import type { ToolCatalogue } from "../mcp/catalogue.js";
import { EmptyInputSchema, LoadWebpageInputSchema, SearchWebInputSchema } from "../rpc/schemas.js";
import type { ToolContext } from "./context.js";

/** Binding kinds an agent definition may contain besides built-ins. */
const BINDING_KINDS = [
  { kind: "builtin", description: "In-process tool attached by name with create_adk_agent" },
  { kind: "sub_agent", description: "Another agent, bound by create_multi_agent_system" },
  { kind: "proxied", description: "Tool of an external MCP server, bound by add_mcp_tools_to_agent" },
];

export function registerWebTools(catalogue: ToolCatalogue, context: ToolContext): void {
  const { builtins } = context;

  catalogue.register(
    {
      name: "list_available_tools",
      title: "List agent tools",
      description: "List the built-in tools agents can use and the kinds of tool bindings.",
      category: "web",
    },
    EmptyInputSchema,
    async () => ({
      builtin_tools: builtins.names().map((name) => ({
        name,
        description: builtins.get(name)?.description ?? "",
      })),
      binding_kinds: BINDING_KINDS,
    }),
  );

  catalogue.register(
    {
      name: "search_web",
      title: "Search the web",
      description: "Run a web search and return titles, URLs and snippets.",
      category: "web",
    },
    SearchWebInputSchema,
    async (input) => {
      const response = await builtins.search(input.query, input.num_results);
      return { query: response.query, results: response.results, total_results: response.results.length };
    },
  );

  catalogue.register(
    {
      name: "load_webpage_content",
      title: "Load web page",
      description: "Fetch a web page and return its text content.",
      category: "web",
    },
    LoadWebpageInputSchema,
    async (input) => ({ page: await builtins.loadPage(input.url) }),
  );
}
