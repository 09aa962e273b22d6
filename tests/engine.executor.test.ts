import { beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { AgentRegistry } from "../src/agents/registry.js";
import { ModelUnavailableError } from "../src/backend/types.js";
import { ExecutionEngine } from "../src/engine/executor.js";
import { ToolResolutionError, ToolResolver, sanitiseToolName } from "../src/engine/toolResolver.js";
import { ToolProxyManager } from "../src/proxy/manager.js";
import { PageLoader } from "../src/search/pageLoader.js";
import { SearxClient } from "../src/search/searxClient.js";
import { SessionBusyError, SessionStore } from "../src/sessions/store.js";
import { BuiltinToolbox } from "../src/tools/builtins.js";
import { ScriptedBackend, createTestLogger, jsonResponse, recordingFetch, type BackendResponder } from "./helpers/fakes.js";

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

interface Fixture {
  registry: AgentRegistry;
  sessions: SessionStore;
  resolver: ToolResolver;
  engine: ExecutionEngine;
  backend: ScriptedBackend;
  fetchCalls: ReturnType<typeof recordingFetch>["calls"];
}

function createFixture(respond?: BackendResponder): Fixture {
  const { logger } = createTestLogger();
  const { fetchImpl, calls } = recordingFetch(() =>
    jsonResponse({
      query: "mcp",
      results: [{ url: "https://example.org/mcp", title: "Model Context Protocol", content: "Spec and SDKs" }],
    }),
  );
  const builtins = new BuiltinToolbox(
    new SearxClient({ baseUrl: "http://searx.test", timeoutMs: 1_000 }, fetchImpl),
    new PageLoader({ timeoutMs: 1_000, maxChars: 1_000 }, fetchImpl),
  );
  const registry = new AgentRegistry({
    supportedModels: ["model-a"],
    defaultModel: "model-a",
    builtinTools: builtins.names(),
    logger,
  });
  let nextId = 0;
  const sessions = new SessionStore({ logger, generateId: () => `session-${++nextId}` });
  const proxies = new ToolProxyManager({ logger, handshakeTimeoutMs: 100, callTimeoutMs: 100 });
  const resolver = new ToolResolver({ registry, builtins, proxies });
  const backend = new ScriptedBackend(respond);
  const engine = new ExecutionEngine({ registry, sessions, resolver, backend, logger });
  return { registry, sessions, resolver, engine, backend, fetchCalls: calls };
}

describe("execution engine", () => {
  let fixture: Fixture;

  beforeEach(() => {
    fixture = createFixture();
    fixture.registry.create({ name: "faq", instruction: "Answer briefly." });
  });

  it("records both turns and continues the same session", async () => {
    const first = await fixture.engine.run("faq", "What is MCP?");
    expect(first).to.deep.equal({ reply: "echo: What is MCP?", sessionId: "session-1", turnCount: 2 });

    const second = await fixture.engine.run("faq", "And tools?", { sessionId: first.sessionId });
    expect(second.turnCount).to.equal(4);

    const lastRequest = fixture.backend.requests[1];
    expect(lastRequest?.instruction).to.equal("Answer briefly.");
    expect(lastRequest?.history.map((turn) => [turn.role, turn.content])).to.deep.equal([
      ["user", "What is MCP?"],
      ["agent", "echo: What is MCP?"],
    ]);
    expect(lastRequest?.message).to.equal("And tools?");
  });

  it("fails unknown agents before touching the session store", async () => {
    const error = await captureRejection(fixture.engine.run("ghost", "hello"));

    expect(error).to.include({ kind: "NotFound", code: "AgentNotFound" });
    expect(fixture.sessions.size).to.equal(0);
  });

  it("rejects a concurrent run on a busy session", async () => {
    let unblock: (reply: string) => void = () => {};
    fixture = createFixture(
      () =>
        new Promise<string>((resolve) => {
          unblock = resolve;
        }),
    );
    fixture.registry.create({ name: "faq", instruction: "x" });

    const pending = fixture.engine.run("faq", "first", { sessionId: "shared" });
    const error = await captureRejection(fixture.engine.run("faq", "second", { sessionId: "shared" }));
    expect(error).to.be.instanceOf(SessionBusyError);

    unblock("done");
    expect((await pending).turnCount).to.equal(2);
    expect(fixture.sessions.require("shared").turns.map((turn) => turn.content)).to.deep.equal(["first", "done"]);
  });

  it("leaves the session unchanged when the backend fails", async () => {
    fixture = createFixture(() => {
      throw new ModelUnavailableError("model-a", new Error("quota exceeded"));
    });
    fixture.registry.create({ name: "faq", instruction: "x" });
    fixture.sessions.acquire("chat").release();

    const error = await captureRejection(fixture.engine.run("faq", "hello", { sessionId: "chat" }));

    expect(error).to.include({ kind: "BackendError", code: "ModelUnavailable" });
    expect(fixture.sessions.require("chat")).to.include({ busy: false });
    expect(fixture.sessions.require("chat").turns).to.deep.equal([]);
  });

  it("drops the sessions opened by failed first turns", async () => {
    fixture = createFixture(() => {
      throw new ModelUnavailableError("model-a", new Error("quota exceeded"));
    });
    fixture.registry.create({ name: "faq", instruction: "x" });

    for (let attempt = 0; attempt < 3; attempt += 1) {
      const error = await captureRejection(fixture.engine.run("faq", "hello"));
      expect(error).to.include({ code: "ModelUnavailable" });
    }

    expect(fixture.sessions.size).to.equal(0);
  });

  it("delegates to sub-agents in ephemeral sessions", async () => {
    fixture = createFixture(async (request) => {
      if (request.agentName === "desk") {
        const delegate = request.tools.find((tool) => tool.name === "billing");
        const answer = delegate ? await delegate.invoke({ request: "Can I get a refund?" }) : "no delegate";
        return `routed: ${answer}`;
      }
      return `billing says yes to '${request.message}'`;
    });
    fixture.registry.create({ name: "billing", instruction: "Handle billing." });
    fixture.registry.create({
      name: "desk",
      kind: "coordinator",
      instruction: "Route requests.",
      tools: [{ kind: "sub_agent", agentName: "billing" }],
    });

    const result = await fixture.engine.run("desk", "I was charged twice");

    expect(result.reply).to.equal("routed: billing says yes to 'Can I get a refund?'");
    expect(fixture.backend.requests.map((request) => request.agentName)).to.deep.equal(["desk", "billing"]);
    expect(fixture.backend.requests[1]?.history).to.deep.equal([]);
    expect(fixture.sessions.list().map((session) => session.id)).to.deep.equal([result.sessionId]);
  });

  it("lets the model call built-in web search", async () => {
    fixture = createFixture(async (request) => {
      const search = request.tools.find((tool) => tool.name === "web_search");
      return search ? search.invoke({ query: "mcp", num_results: 1 }) : "no tool";
    });
    fixture.registry.create({ name: "researcher", instruction: "x", tools: [{ kind: "builtin", name: "web_search" }] });

    const result = await fixture.engine.run("researcher", "find MCP");

    expect(fixture.fetchCalls.map((call) => call.url)).to.deep.equal(["http://searx.test/search?q=mcp&format=json"]);
    expect(JSON.parse(result.reply)).to.deep.equal({
      query: "mcp",
      results: [
        { title: "Model Context Protocol", url: "https://example.org/mcp", snippet: "Spec and SDKs", engine: null },
      ],
    });
  });

  it("aborts the turn when a binding cannot be resolved", async () => {
    fixture.registry.create({
      name: "broken",
      instruction: "x",
      tools: [{ kind: "proxied", proxyId: "proxy-missing", remoteName: "echo" }],
    });

    const error = await captureRejection(fixture.engine.run("broken", "hello", { sessionId: "chat" }));

    expect(error).to.be.instanceOf(ToolResolutionError);
    expect(error).to.include({ kind: "ConfigurationError", code: "ToolResolutionError" });
    expect(fixture.backend.requests).to.have.length(0);
    expect(fixture.sessions.get("chat")).to.equal(undefined);
  });
});

describe("tool resolver", () => {
  it("sanitises model-facing names", () => {
    expect(sanitiseToolName("my tool!")).to.equal("my_tool_");
    expect(sanitiseToolName("9lives")).to.equal("_9lives");
    expect(sanitiseToolName("a".repeat(80))).to.have.length(64);
  });

  it("suffixes duplicate names and forwards sub-agent requests", async () => {
    const fixture = createFixture();
    fixture.registry.create({ name: "helper", instruction: "x" });
    fixture.registry.create({
      name: "desk",
      instruction: "x",
      tools: [
        { kind: "builtin", name: "web_search" },
        { kind: "builtin", name: "web_search" },
        { kind: "sub_agent", agentName: "helper" },
      ],
    });
    const runSubAgent = sinon.spy(async (agentName: string, request: string) => `${agentName}:${request}`);

    const tools = fixture.resolver.resolve(fixture.registry.require("desk"), runSubAgent);

    expect(tools.map((tool) => tool.name)).to.deep.equal(["web_search", "web_search_2", "helper"]);
    const helper = tools[2];
    expect(helper?.description).to.equal("Delegate a request to the 'helper' agent");
    expect(await helper?.invoke({ request: "summarise" })).to.equal("helper:summarise");
    expect(runSubAgent.calledOnceWithExactly("helper", "summarise")).to.equal(true);
  });
});
