import { z } from "zod";

import { InvalidInputError } from "../rpc/errors.js";
import type { PageLoader, LoadedPage } from "../search/pageLoader.js";
import type { SearchResponse, SearxClient } from "../search/searxClient.js";

/** Tool implemented in-process and attachable to agents by name. */
export interface BuiltinTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
  run(args: Record<string, unknown>): Promise<string>;
}

export const WEB_SEARCH_TOOL = "web_search";
export const LOAD_WEB_PAGE_TOOL = "load_web_page";

export const BUILTIN_TOOL_NAMES: readonly string[] = [WEB_SEARCH_TOOL, LOAD_WEB_PAGE_TOOL];

/** Legacy names accepted in `create_adk_agent` tool lists. */
const BUILTIN_ALIASES: Readonly<Record<string, string>> = { google_search: WEB_SEARCH_TOOL };

const SearchArgsSchema = z.object({
  query: z.string().min(1),
  num_results: z.number().int().min(1).max(20).default(5),
});

const LoadPageArgsSchema = z.object({ url: z.string().url() });

function parseArgs<S extends z.ZodTypeAny>(schema: S, tool: string, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid arguments for ${tool}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/** Built-in web tools shared by the protocol surface and agent bindings. */
export class BuiltinToolbox {
  private readonly tools: ReadonlyMap<string, BuiltinTool>;

  constructor(
    private readonly searchClient: SearxClient,
    private readonly pageLoader: PageLoader,
  ) {
    const tools: BuiltinTool[] = [
      {
        name: WEB_SEARCH_TOOL,
        description: "Search the web and return titles, URLs and snippets.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Search query" },
            num_results: { type: "integer", minimum: 1, maximum: 20, description: "Number of results" },
          },
          required: ["query"],
        },
        run: async (args) => {
          const input = parseArgs(SearchArgsSchema, WEB_SEARCH_TOOL, args);
          return JSON.stringify(await this.search(input.query, input.num_results));
        },
      },
      {
        name: LOAD_WEB_PAGE_TOOL,
        description: "Fetch a web page and return its text content.",
        inputSchema: {
          type: "object",
          properties: { url: { type: "string", description: "Absolute http(s) URL" } },
          required: ["url"],
        },
        run: async (args) => {
          const input = parseArgs(LoadPageArgsSchema, LOAD_WEB_PAGE_TOOL, args);
          const page = await this.loadPage(input.url);
          return page.title ? `${page.title}\n\n${page.content}` : page.content;
        },
      },
    ];
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Maps legacy aliases onto the canonical built-in name; other names pass through. */
  canonicalName(name: string): string {
    return BUILTIN_ALIASES[name] ?? name;
  }

  get(name: string): BuiltinTool | undefined {
    return this.tools.get(name);
  }

  search(query: string, count: number): Promise<SearchResponse> {
    return this.searchClient.search(query, count);
  }

  loadPage(url: string): Promise<LoadedPage> {
    return this.pageLoader.load(url);
  }
}
