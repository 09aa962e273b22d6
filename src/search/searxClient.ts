import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";

import { OrchestratorError } from "../rpc/errors.js";

/** Raised when the search backend cannot produce a valid response. */
export class SearchUnavailableError extends OrchestratorError {
  readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super("ExternalToolError", "SearchUnavailable", message, {
      hint: "check AGENT_MCP_SEARX_URL",
      details: { status: options.status ?? null },
      cause: options.cause,
    });
    this.status = options.status ?? null;
  }
}

const searxResultSchema = z
  .object({
    url: z.string().url(),
    title: z.string().nullish(),
    content: z.string().nullish(),
    snippet: z.string().nullish(),
    engine: z.string().nullish(),
    score: z.number().nullish(),
  })
  .passthrough();

const searxResponseSchema = z
  .object({
    query: z.string().optional(),
    results: z.array(z.unknown()).default([]),
  })
  .passthrough();

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly engine: string | null;
}

export interface SearchResponse {
  readonly query: string;
  readonly results: readonly SearchResult[];
}

export interface SearxClientConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly apiPath?: string;
  readonly maxRetries?: number;
}

function isRetriableStatus(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

/**
 * Queries a SearxNG instance with the JSON output format. Retriable HTTP
 * statuses are retried with a short backoff; everything else fails at once.
 */
export class SearxClient {
  private readonly config: SearxClientConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: SearxClientConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async search(query: string, count: number): Promise<SearchResponse> {
    const url = new URL(this.config.apiPath ?? "/search", this.config.baseUrl);
    url.search = new URLSearchParams({ q: query, format: "json" }).toString();

    const maxAttempts = Math.max(1, (this.config.maxRetries ?? 1) + 1);
    for (let attempt = 1; ; attempt += 1) {
      try {
        const payload = await this.parseResponse(await this.performRequest(url));
        return { query: payload.query ?? query, results: normaliseResults(payload.results, count) };
      } catch (error) {
        const retriable = error instanceof SearchUnavailableError && isRetriableStatus(error.status ?? 0);
        if (!retriable || attempt >= maxAttempts) {
          throw error;
        }
        await delay(150 * attempt);
      }
    }
  }

  private async performRequest(url: URL): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new SearchUnavailableError(`Search request failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
    if (!response.ok) {
      throw new SearchUnavailableError(`Search backend responded with HTTP ${response.status}`, {
        status: response.status,
      });
    }
    return response;
  }

  private async parseResponse(response: Response): Promise<z.infer<typeof searxResponseSchema>> {
    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw new SearchUnavailableError("Search backend returned a non-JSON payload", {
        status: response.status,
        cause: error,
      });
    }
    const result = searxResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new SearchUnavailableError("Search payload did not match the expected schema", {
        status: response.status,
        cause: result.error,
      });
    }
    return result.data;
  }
}

/** Keeps the first {@link count} well-formed results, dropping duplicate URLs. */
function normaliseResults(raw: readonly unknown[], count: number): SearchResult[] {
  const seen = new Set<string>();
  const results: SearchResult[] = [];
  for (const candidate of raw) {
    const parsed = searxResultSchema.safeParse(candidate);
    if (!parsed.success || seen.has(parsed.data.url)) {
      continue;
    }
    seen.add(parsed.data.url);
    results.push({
      title: parsed.data.title?.trim() || parsed.data.url,
      url: parsed.data.url,
      snippet: (parsed.data.content ?? parsed.data.snippet ?? "").trim(),
      engine: parsed.data.engine ?? null,
    });
    if (results.length >= count) {
      break;
    }
  }
  return results;
}
