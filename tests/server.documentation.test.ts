import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";

import { loadDocumentation } from "../src/tools/serverTools.js";

describe("topic documentation", () => {
  let workdir: string;

  beforeEach(async () => {
    workdir = await mkdtemp(join(tmpdir(), "agent-mcp-docs-"));
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  it("loads the shipped topics", async () => {
    const documentation = await loadDocumentation();

    expect(Object.keys(documentation)).to.deep.equal([
      "agents",
      "tools",
      "sessions",
      "multi_agent",
      "mcp_proxies",
      "evaluation",
    ]);
    expect(documentation.sessions?.description).to.equal("Sessions hold the ordered turns of one conversation.");
  });

  it("retries a read that failed instead of caching the failure", async () => {
    const path = join(workdir, "documentation.json");
    const url = pathToFileURL(path);

    let failure: unknown;
    try {
      await loadDocumentation(url);
    } catch (error) {
      failure = error;
    }
    expect(failure).to.have.property("code", "ENOENT");

    await writeFile(path, JSON.stringify({ agents: { description: "Agents.", features: ["create"] } }), "utf8");

    expect(await loadDocumentation(url)).to.deep.equal({ agents: { description: "Agents.", features: ["create"] } });
  });
});
