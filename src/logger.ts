import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getRequestContext } from "./infra/requestContext.js";

/** Placeholder inserted when a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are always replaced once redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "cookie",
  "set-cookie",
  "password",
  "secret",
]);

/**
 * Parses `AGENT_MCP_LOG_REDACT`. The variable accepts comma-separated
 * directives such as `"on,sk-"` or `"off"`; bare patterns imply `on`.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: string[];
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Size of the mirrored log file before it is rotated. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  request_id?: string | number | null;
  tool?: string;
  payload?: unknown;
}

/** Minimal sink the logger writes JSON lines to. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  readonly maxFileSizeBytes?: number;
  /** Number of log files retained, the active one included. */
  readonly maxFileCount?: number;
  /** Literal substrings or patterns scrubbed from string values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Explicit toggle; falls back to `AGENT_MCP_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Console sink. Defaults to stderr since stdout carries the MCP stream. */
  readonly sink?: LogSink | null;
  readonly onEntry?: (entry: LogEntry) => void;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

function describeError(error: unknown): { message: string } {
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Structured logger emitting one JSON object per line. Entries go to the
 * console sink and, when configured, to a mirrored file. File writes are
 * queued sequentially so the file preserves emission order.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly level: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: LogSink | null;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.level = options.level ?? "info";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.AGENT_MCP_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink === undefined ? process.stderr : options.sink;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits until every queued file write has been attempted. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }

    const context = getRequestContext();
    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context ? { request_id: context.requestId, tool: context.tool } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink?.write(line);
    this.entryListener?.(structuredClone(entry));

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        this.reportInternal("log_file_write_failed", describeError(error));
        this.logDirectoryReady = false;
      }
    });
  }

  private reportInternal(message: string, payload: unknown): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level: "error", message, payload };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /** Rotates `file → file.1 → … → file.(count-1)` when the next line would overflow. */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportInternal("log_file_rotation_failed", describeError(error));
    }
  }

  private async performRotation(logFile: string): Promise<void> {
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 0; index -= 1) {
      const source = index === 0 ? logFile : `${logFile}.${index}`;
      try {
        await rename(source, `${logFile}.${index + 1}`);
      } catch (error) {
        if (!isErrnoCode(error, "ENOENT")) {
          throw error;
        }
      }
    }
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(value: string): string {
    let sanitised = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        if (pattern.length > 0) {
          sanitised = sanitised.split(pattern).join(REDACTION_TOKEN);
        }
      } else {
        sanitised = sanitised.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitised;
  }
}
