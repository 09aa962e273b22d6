import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runWithRequestContext } from "../src/infra/requestContext.js";
import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../src/logger.js";

function capture(): { entries: LogEntry[]; onEntry: (entry: LogEntry) => void } {
  const entries: LogEntry[] = [];
  return { entries, onEntry: (entry) => entries.push(entry) };
}

describe("logger", () => {
  it("drops entries below the configured level", () => {
    const { entries, onEntry } = capture();
    const logger = new StructuredLogger({ level: "warn", sink: null, onEntry });

    logger.debug("noise");
    logger.info("still_noise");
    logger.warn("kept");
    logger.error("also_kept");

    expect(entries.map((entry) => entry.message)).to.deep.equal(["kept", "also_kept"]);
  });

  it("writes one JSON line per entry to the sink", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ sink: { write: (chunk) => lines.push(chunk) } });

    logger.info("agent_created", { agent_name: "faq" });

    expect(lines).to.have.length(1);
    expect(lines[0]?.endsWith("\n")).to.equal(true);
    const parsed: unknown = JSON.parse(lines[0] ?? "");
    expect(parsed).to.include({ level: "info", message: "agent_created" });
    expect(parsed).to.have.deep.property("payload", { agent_name: "faq" });
  });

  it("attaches the request id and tool of the surrounding call", () => {
    const { entries, onEntry } = capture();
    const logger = new StructuredLogger({ sink: null, onEntry });

    runWithRequestContext({ requestId: 7, tool: "run_adk_agent" }, () => logger.info("inside"));
    logger.info("outside");

    expect(entries[0]).to.include({ request_id: 7, tool: "run_adk_agent" });
    expect(entries[1]).to.not.have.property("request_id");
  });

  it("redacts sensitive keys and configured secrets when enabled", () => {
    const { entries, onEntry } = capture();
    const logger = new StructuredLogger({
      sink: null,
      onEntry,
      redactionEnabled: true,
      redactSecrets: ["test-secret"],
    });

    logger.info("call", { api_key: "abc", nested: { note: "uses test-secret here" }, list: ["test-secret"] });

    expect(entries[0]?.payload).to.deep.equal({
      api_key: "[REDACTED]",
      nested: { note: "uses [REDACTED] here" },
      list: ["[REDACTED]"],
    });
  });

  it("leaves payloads untouched when redaction is disabled", () => {
    const { entries, onEntry } = capture();
    const logger = new StructuredLogger({ sink: null, onEntry, redactionEnabled: false });

    logger.info("call", { token: "test-token" });

    expect(entries[0]?.payload).to.deep.equal({ token: "test-token" });
  });

  it("parses redaction directives", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on,sk-")).to.deep.equal({ enabled: true, tokens: ["sk-"] });
    expect(parseRedactionDirectives("off,sk-")).to.deep.equal({ enabled: false, tokens: ["sk-"] });
    expect(parseRedactionDirectives("placeholder")).to.deep.equal({ enabled: true, tokens: ["placeholder"] });
  });

  describe("file mirroring", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), "orchestrator-logger-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("rotates the file once the next line would exceed the size limit", async () => {
      const logFile = join(directory, "nested", "orchestrator.log");
      const logger = new StructuredLogger({ sink: null, logFile, maxFileSizeBytes: 200, maxFileCount: 2 });
      const blob = "x".repeat(160);

      logger.info("first", { blob });
      logger.info("second", { blob });
      logger.info("third", { blob });
      await logger.flush();

      const current: unknown = JSON.parse(await readFile(logFile, "utf8"));
      const previous: unknown = JSON.parse(await readFile(`${logFile}.1`, "utf8"));
      expect(current).to.include({ message: "third" });
      expect(previous).to.include({ message: "second" });

      let rotatedTwice = true;
      try {
        await stat(`${logFile}.2`);
      } catch {
        rotatedTwice = false;
      }
      expect(rotatedTwice).to.equal(false);
    });
  });
});
