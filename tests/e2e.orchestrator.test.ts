/**
 * Drives the assembled runtime through a real MCP client over linked
 * in-memory transports: the model backend is scripted, tool providers are
 * in-process fakes and the search backend is a recording fetch.
 */
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";

import { createOrchestratorRuntime, type OrchestratorRuntime } from "../src/orchestrator/runtime.js";
import { isRecord } from "../src/types.js";
import { SERVER_NAME, SERVER_VERSION } from "../src/version.js";
import {
  FakeProviderFactory,
  ScriptedBackend,
  createTestLogger,
  jsonResponse,
  recordingFetch,
} from "./helpers/fakes.js";

interface Harness {
  runtime: OrchestratorRuntime;
  client: Client;
  backend: ScriptedBackend;
  provider: FakeProviderFactory;
}

async function startHarness(): Promise<Harness> {
  const backend = new ScriptedBackend(async (request) => {
    const echo = request.tools.find((tool) => tool.name === "echo");
    return echo ? echo.invoke({ text: request.message }) : `answer to ${request.message}`;
  });
  const provider = new FakeProviderFactory([
    { name: "echo", description: "Echo the text", run: (text) => `echo:${text}` },
    { name: "shout", description: "Upper-case the text", run: (text) => text.toUpperCase() },
  ]);
  const { fetchImpl } = recordingFetch(() =>
    jsonResponse({ results: [{ url: "https://example.org/docs", title: "Docs", content: "Reference" }] }),
  );
  const runtime = createOrchestratorRuntime({
    env: {},
    logger: createTestLogger("warn").logger,
    backend,
    transportFactory: provider.factory,
    fetchImpl,
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "e2e-client", version: "0.0.1" });
  await Promise.all([runtime.server.connect(serverTransport), client.connect(clientTransport)]);
  return { runtime, client, backend, provider };
}

async function call(client: Client, name: string, args: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
  const result = await client.callTool({ name, arguments: args });
  const structured = "structuredContent" in result ? result.structuredContent : undefined;
  if (!isRecord(structured)) {
    throw new Error(`${name} returned no structured content`);
  }
  return structured;
}

async function callOk(client: Client, name: string, args: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
  const envelope = await call(client, name, args);
  if (envelope.ok !== true || !isRecord(envelope.result)) {
    throw new Error(`${name} failed: ${JSON.stringify(envelope)}`);
  }
  return envelope.result;
}

describe("orchestrator over MCP", () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness();
  });

  afterEach(async () => {
    await harness.client.close();
    await harness.runtime.close();
  });

  it("lists the full tool catalogue", async () => {
    const { tools } = await harness.client.listTools();

    expect(tools.map((tool) => tool.name).sort()).to.deep.equal([
      "add_mcp_tools_to_agent",
      "close_mcp_proxy",
      "create_adk_agent",
      "create_multi_agent_system",
      "delete_adk_agent",
      "delete_adk_session",
      "evaluate_adk_agent",
      "get_adk_agent_info",
      "get_adk_documentation",
      "get_adk_session",
      "get_server_version",
      "list_adk_agents",
      "list_available_tools",
      "list_mcp_proxies",
      "load_webpage_content",
      "run_adk_agent",
      "search_web",
    ]);
    const run = tools.find((tool) => tool.name === "run_adk_agent");
    expect(run?.inputSchema.required).to.deep.equal(["agent_name", "message"]);
  });

  it("continues a conversation through the returned session id", async () => {
    const created = await callOk(harness.client, "create_adk_agent", {
      name: "faq",
      instruction: "Answer frequently asked questions.",
      tools: ["google_search"],
    });
    expect(created.agent).to.deep.include({ name: "faq", kind: "llm", model: "gemini-2.0-flash", tools: ["web_search"] });

    const first = await callOk(harness.client, "run_adk_agent", { agent_name: "faq", message: "What is MCP?" });
    expect(first).to.include({ agent_name: "faq", agent_response: "answer to What is MCP?", turn_count: 2 });

    const second = await callOk(harness.client, "run_adk_agent", {
      agent_name: "faq",
      message: "Who maintains it?",
      session_id: first.session_id,
    });
    expect(second).to.include({ session_id: first.session_id, turn_count: 4 });
    expect(harness.backend.requests[1]?.history).to.have.length(2);

    const session = await callOk(harness.client, "get_adk_session", { session_id: first.session_id });
    expect(session.session).to.deep.include({ session_id: first.session_id, turn_count: 4, busy: false });

    const deleted = await callOk(harness.client, "delete_adk_session", { session_id: first.session_id });
    expect(deleted.deleted).to.deep.equal({ session_id: first.session_id, turn_count: 4 });
  });

  it("returns error envelopes with stable kinds and codes", async () => {
    expect(await call(harness.client, "run_adk_agent", { agent_name: "ghost", message: "hi" })).to.include({
      ok: false,
      kind: "NotFound",
      code: "AgentNotFound",
      tool: "run_adk_agent",
    });
    expect(await call(harness.client, "create_adk_agent", { name: "bad name", instruction: "x" })).to.include({
      ok: false,
      kind: "BadRequest",
      code: "InvalidInput",
    });

    await callOk(harness.client, "create_adk_agent", { name: "faq", instruction: "x" });
    expect(await call(harness.client, "create_adk_agent", { name: "faq", instruction: "y" })).to.include({
      kind: "Conflict",
      code: "AlreadyExists",
    });
    expect(await call(harness.client, "create_adk_agent", { name: "other", instruction: "x", model: "gpt-x" })).to.include({
      kind: "BadRequest",
      code: "InvalidModel",
    });
  });

  it("composes coordinators and reports missing sub-agents", async () => {
    await callOk(harness.client, "create_adk_agent", { name: "billing", instruction: "Billing." });

    const missing = await call(harness.client, "create_multi_agent_system", {
      coordinator_name: "desk",
      coordinator_instruction: "Route.",
      sub_agents: ["billing", "legal"],
    });
    expect(missing).to.include({ ok: false, kind: "CompositionError", code: "CompositionError" });
    expect(missing.details).to.deep.equal({ coordinator_name: "desk", missing_names: ["legal"] });

    const composed = await callOk(harness.client, "create_multi_agent_system", {
      coordinator_name: "desk",
      coordinator_instruction: "Route.",
      sub_agents: ["billing"],
    });
    expect(composed.coordinator).to.deep.include({ kind: "coordinator", tools: ["agent:billing"] });

    const listed = await callOk(harness.client, "list_adk_agents");
    expect(listed.total_count).to.equal(2);
  });

  it("attaches, uses and closes an external MCP tool provider", async () => {
    await callOk(harness.client, "create_adk_agent", { name: "faq", instruction: "x" });

    const attached = await callOk(harness.client, "add_mcp_tools_to_agent", {
      agent_name: "faq",
      mcp_server_command: "fake-mcp",
      mcp_server_args: ["--stdio"],
      tool_filter: ["echo"],
    });
    expect(attached).to.deep.include({ agent_name: "faq", tools_added: ["echo"], tools_count: 1 });
    expect(attached).to.not.have.property("warning");
    expect(harness.provider.launches).to.deep.equal([{ command: "fake-mcp", args: ["--stdio"] }]);

    const reply = await callOk(harness.client, "run_adk_agent", { agent_name: "faq", message: "ping" });
    expect(reply.agent_response).to.equal("echo:ping");

    const proxies = await callOk(harness.client, "list_mcp_proxies", { agent_name: "faq" });
    expect(proxies.total_count).to.equal(1);
    const proxy = isRecord(attached.proxy) ? attached.proxy : {};

    const closed = await callOk(harness.client, "close_mcp_proxy", { proxy_id: proxy.proxy_id });
    expect(closed.updated_agents).to.deep.equal(["faq"]);

    const info = await callOk(harness.client, "get_adk_agent_info", { agent_name: "faq" });
    expect(info.agent).to.deep.include({ tools: [] });
  });

  it("closes the providers of an agent that is replaced or deleted", async () => {
    const attach = async (agentName: string): Promise<string> => {
      const attached = await callOk(harness.client, "add_mcp_tools_to_agent", {
        agent_name: agentName,
        mcp_server_command: "fake-mcp",
        mcp_server_args: [],
      });
      const proxy = isRecord(attached.proxy) ? attached.proxy : {};
      return String(proxy.proxy_id);
    };
    const states = async (agentName: string): Promise<unknown[]> => {
      const listed = await callOk(harness.client, "list_mcp_proxies", { agent_name: agentName });
      const proxies: unknown[] = Array.isArray(listed.proxies) ? listed.proxies : [];
      return proxies.map((proxy) => (isRecord(proxy) ? proxy.state : null));
    };

    await callOk(harness.client, "create_adk_agent", { name: "faq", instruction: "x" });
    const first = await attach("faq");
    const replaced = await callOk(harness.client, "create_adk_agent", { name: "faq", instruction: "y", overwrite: true });
    expect(replaced.closed_proxies).to.deep.equal([first]);
    expect(replaced.agent).to.deep.include({ tools: [] });
    expect(await states("faq")).to.deep.equal(["closed"]);

    await callOk(harness.client, "create_adk_agent", { name: "billing", instruction: "x" });
    const second = await attach("faq");
    const composed = await callOk(harness.client, "create_multi_agent_system", {
      coordinator_name: "faq",
      coordinator_instruction: "Route.",
      sub_agents: ["billing"],
      overwrite: true,
    });
    expect(composed.closed_proxies).to.deep.equal([second]);

    const third = await attach("billing");
    const deleted = await callOk(harness.client, "delete_adk_agent", { agent_name: "billing" });
    expect(deleted.closed_proxies).to.deep.equal([third]);
    expect(await states("billing")).to.deep.equal(["closed"]);
  });

  it("keeps the agent unchanged when a provider cannot be launched", async () => {
    const failing = createOrchestratorRuntime({
      env: {},
      logger: createTestLogger("error").logger,
      backend: harness.backend,
      transportFactory: () => {
        throw new Error("spawn missing-mcp ENOENT");
      },
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: "e2e-client", version: "0.0.1" });
    await Promise.all([failing.server.connect(serverTransport), client.connect(clientTransport)]);

    try {
      await callOk(client, "create_adk_agent", { name: "faq", instruction: "x" });
      const result = await call(client, "add_mcp_tools_to_agent", {
        agent_name: "faq",
        mcp_server_command: "missing-mcp",
        mcp_server_args: [],
      });
      expect(result).to.include({ ok: false, kind: "ProxyError", code: "LaunchFailed" });

      const info = await callOk(client, "get_adk_agent_info", { agent_name: "faq" });
      expect(info.agent).to.deep.include({ tools: [] });
    } finally {
      await client.close();
      await failing.close();
    }
  });

  it("evaluates an agent against test cases", async () => {
    await callOk(harness.client, "create_adk_agent", { name: "faq", instruction: "x" });

    const evaluated = await callOk(harness.client, "evaluate_adk_agent", {
      agent_name: "faq",
      test_cases: [
        { input: "sessions", expected_output: "ANSWER TO SESSIONS" },
        { input: "tools", expected_output: "something else" },
      ],
    });

    expect(evaluated.report).to.deep.include({ total: 2, passed: 1, failed: 1, pass_rate: 0.5 });
    expect(harness.runtime.sessions.size).to.equal(0);
  });

  it("serves web search, version and documentation", async () => {
    const search = await callOk(harness.client, "search_web", { query: "mcp docs", num_results: 3 });
    expect(search).to.deep.equal({
      query: "mcp docs",
      results: [{ title: "Docs", url: "https://example.org/docs", snippet: "Reference", engine: null }],
      total_results: 1,
    });

    const version = await callOk(harness.client, "get_server_version");
    expect(version).to.include({ server_name: SERVER_NAME, version: SERVER_VERSION, default_model: "gemini-2.0-flash" });
    expect(version.tools).to.have.length(17);

    const docs = await callOk(harness.client, "get_adk_documentation", { topic: "Sessions" });
    expect(docs).to.include({ found: true, topic: "sessions" });

    const unknown = await callOk(harness.client, "get_adk_documentation", { topic: "billing" });
    expect(unknown).to.deep.equal({
      found: false,
      topic: "billing",
      available_topics: ["agents", "tools", "sessions", "multi_agent", "mcp_proxies", "evaluation"],
    });

    const inherited = await callOk(harness.client, "get_adk_documentation", { topic: "constructor" });
    expect(inherited).to.include({ found: false, topic: "constructor" });

    const available = await callOk(harness.client, "list_available_tools");
    expect(available.builtin_tools).to.deep.equal([
      { name: "web_search", description: "Search the web and return titles, URLs and snippets." },
      { name: "load_web_page", description: "Fetch a web page and return its text content." },
    ]);
  });
});
