import { OrchestratorError } from "../rpc/errors.js";

export class PageLoadFailedError extends OrchestratorError {
  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super("ExternalToolError", "PageLoadFailed", `Failed to load ${url}: ${message}`, {
      details: { url, status: options.status ?? null },
      cause: options.cause,
    });
  }
}

export interface PageLoaderConfig {
  readonly timeoutMs: number;
  /** Extracted text beyond this length is cut and flagged as truncated. */
  readonly maxChars: number;
  readonly userAgent?: string;
}

export interface LoadedPage {
  url: string;
  final_url: string;
  status: number;
  content_type: string | null;
  title: string | null;
  content: string;
  truncated: boolean;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#")) {
      const hex = entity[1] === "x" || entity[1] === "X";
      const codePoint = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/** Reduces an HTML document to readable text, one block element per line. */
export function htmlToText(html: string): { title: string | null; text: string } {
  const titleMatch = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  const title = titleMatch?.[1] ? decodeEntities(titleMatch[1]).replace(/\s+/g, " ").trim() : null;

  const text = decodeEntities(
    html
      .replace(/<!--[\s\S]*?-->/g, " ")
      .replace(/<(script|style|noscript|template|svg|head)\b[^>]*>[\s\S]*?<\/\1>/gi, " ")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<\/(p|div|section|article|li|tr|h[1-6]|pre|blockquote|header|footer|main)>/gi, "\n")
      .replace(/<[^>]+>/g, " "),
  )
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\u00a0]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");

  return { title: title && title.length > 0 ? title : null, text };
}

/** Fetches a URL and returns its textual content. */
export class PageLoader {
  private readonly config: PageLoaderConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: PageLoaderConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async load(url: string): Promise<LoadedPage> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw new PageLoadFailedError(url, "invalid URL", { cause: error });
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new PageLoadFailedError(url, `unsupported protocol '${parsed.protocol}'`);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(parsed.href, {
        headers: {
          "user-agent": this.config.userAgent ?? "agent-orchestrator-mcp/1.0",
          accept: "text/html,text/plain;q=0.9,*/*;q=0.5",
        },
        redirect: "follow",
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new PageLoadFailedError(url, error instanceof Error ? error.message : String(error), { cause: error });
    }
    if (response.status >= 400) {
      throw new PageLoadFailedError(url, `HTTP ${response.status}`, { status: response.status });
    }

    const contentType = response.headers.get("content-type");
    const body = await response.text();
    const isHtml = contentType === null || /html|xml/i.test(contentType);
    const extracted = isHtml ? htmlToText(body) : { title: null, text: body.trim() };
    const truncated = extracted.text.length > this.config.maxChars;

    return {
      url,
      final_url: response.url || parsed.href,
      status: response.status,
      content_type: contentType,
      title: extracted.title,
      content: truncated ? extracted.text.slice(0, this.config.maxChars) : extracted.text,
      truncated,
    };
  }
}
