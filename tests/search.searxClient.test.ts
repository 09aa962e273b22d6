import { describe, it } from "mocha";
import { expect } from "chai";

import { SearchUnavailableError, SearxClient } from "../src/search/searxClient.js";
import { jsonResponse, recordingFetch } from "./helpers/fakes.js";

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("searx client", () => {
  it("queries the JSON endpoint and normalises results", async () => {
    const { fetchImpl, calls } = recordingFetch(() =>
      jsonResponse({
        query: "agent orchestration",
        results: [
          { url: "https://example.org/a", title: "  First  ", content: " snippet a ", engine: "duckduckgo" },
          { url: "https://example.org/a", title: "Duplicate" },
          { title: "missing url" },
          { url: "https://example.org/b", snippet: "snippet b" },
          { url: "https://example.org/c", title: "Third" },
        ],
      }),
    );
    const client = new SearxClient({ baseUrl: "http://searx.test", timeoutMs: 1_000 }, fetchImpl);

    const response = await client.search("agent orchestration", 2);

    expect(calls.map((call) => call.url)).to.deep.equal([
      "http://searx.test/search?q=agent+orchestration&format=json",
    ]);
    expect(response).to.deep.equal({
      query: "agent orchestration",
      results: [
        { title: "First", url: "https://example.org/a", snippet: "snippet a", engine: "duckduckgo" },
        { title: "https://example.org/b", url: "https://example.org/b", snippet: "snippet b", engine: null },
      ],
    });
  });

  it("retries retriable statuses before succeeding", async () => {
    let attempts = 0;
    const { fetchImpl } = recordingFetch(() => {
      attempts += 1;
      return attempts === 1 ? jsonResponse({ error: "busy" }, 503) : jsonResponse({ results: [] });
    });
    const client = new SearxClient({ baseUrl: "http://searx.test", timeoutMs: 1_000, maxRetries: 1 }, fetchImpl);

    expect(await client.search("q", 5)).to.deep.equal({ query: "q", results: [] });
    expect(attempts).to.equal(2);
  });

  it("fails at once on non-retriable statuses", async () => {
    const { fetchImpl, calls } = recordingFetch(() => jsonResponse({}, 400));
    const client = new SearxClient({ baseUrl: "http://searx.test", timeoutMs: 1_000, maxRetries: 3 }, fetchImpl);

    const error = await captureRejection(client.search("q", 5));

    expect(error).to.be.instanceOf(SearchUnavailableError);
    expect(error).to.include({ kind: "ExternalToolError", code: "SearchUnavailable", status: 400 });
    expect(calls).to.have.length(1);
  });

  it("reports transport errors and malformed payloads", async () => {
    const offline = new SearxClient(
      { baseUrl: "http://searx.test", timeoutMs: 1_000 },
      recordingFetch(() => {
        throw new Error("connect ECONNREFUSED");
      }).fetchImpl,
    );
    expect(await captureRejection(offline.search("q", 5))).to.have.property(
      "message",
      "Search request failed: connect ECONNREFUSED",
    );

    const garbled = new SearxClient(
      { baseUrl: "http://searx.test", timeoutMs: 1_000 },
      recordingFetch(() => new Response("<html>not json</html>", { status: 200 })).fetchImpl,
    );
    expect(await captureRejection(garbled.search("q", 5))).to.have.property(
      "message",
      "Search backend returned a non-JSON payload",
    );
  });
});
