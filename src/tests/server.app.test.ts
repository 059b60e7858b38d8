import { describe, it, before, after } from "node:test";
import assert from "assert/strict";
import { AddressInfo } from "net";
import { Server } from "http";
import fetch from "node-fetch";
import { createApp, toErrorMessage } from "../server/app";
import { MemoryVectorStore } from "./helpers/memory.store";

describe("HTTP server", () => {
  let server: Server;
  let baseUrl: string;

  before(async () => {
    const store = new MemoryVectorStore();
    const collection = await store.getOrCreateCollection("graph_methods", {
      paper_title: "Graph Methods",
    });
    await store.upsert(collection.id, [
      { id: "graph_methods_1", text: "We study graphs", metadata: { content_type: "paragraph" } },
    ]);

    server = createApp(store).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address: AddressInfo | string | null = server.address();
    assert.ok(address && typeof address === "object");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  function post(route: string, body: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("answers health checks", async () => {
    const response = await fetch(`${baseUrl}/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: "ok" });
  });

  it("lists papers with their counts", async () => {
    const response = await fetch(`${baseUrl}/papers`);
    assert.deepEqual(await response.json(), {
      success: true,
      papers: [{ name: "graph_methods", count: 1, metadata: { paper_title: "Graph Methods" } }],
    });
  });

  it("returns 404 for an unknown paper", async () => {
    const response = await fetch(`${baseUrl}/papers/missing`);
    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), {
      success: false,
      error: "Collection 'missing' does not exist.",
    });
  });

  it("queries a paper", async () => {
    const response = await post("/papers/graph_methods/query", { query: "graphs", nResults: 3 });
    const body = await response.json();

    assert.equal(response.status, 200);
    assert.deepEqual(body.results.ids, [["graph_methods_1"]]);
  });

  it("deletes a paper collection", async () => {
    const response = await fetch(`${baseUrl}/papers/graph_methods`, { method: "DELETE" });
    assert.deepEqual(await response.json(), { success: true, deleted: "graph_methods" });

    const again = await fetch(`${baseUrl}/papers/graph_methods`, { method: "DELETE" });
    assert.equal(again.status, 404);
  });

  it("validates request bodies", async () => {
    const query = await post("/papers/graph_methods/query", { query: "" });
    assert.equal(query.status, 400);

    const ask = await post("/ask", { question: 42 });
    assert.equal(ask.status, 400);
    assert.deepEqual(await ask.json(), {
      success: false,
      error: "Field 'question' is required and must be a string.",
    });
  });

  it("previews chunks and records for posted HTML", async () => {
    const response = await post("/parse", { html: "<h1>Title</h1><p>Body</p>" });
    const body = await response.json();

    assert.deepEqual(body.chunkTypes, { heading: 1, paragraph: 1 });
    assert.equal(body.chunks[0].content_type, "heading");
    assert.deepEqual(
      body.records.map((record: { content: string }) => record.content),
      ["Title", "Body"]
    );
    assert.deepEqual(body.summary, {
      totalRecords: 2,
      totalTokens: 2,
      byType: { header: 1, paragraph: 1 },
    });
  });
});

describe("toErrorMessage", () => {
  it("recognises unreachable services", () => {
    for (const message of [
      "request to http://localhost:8000 failed, reason: connect ECONNREFUSED 127.0.0.1:8000",
      "getaddrinfo ENOTFOUND chroma",
      "fetch failed",
    ]) {
      assert.equal(
        toErrorMessage(new Error(message), "fallback"),
        "Ollama or ChromaDB is not running or not reachable.",
        message
      );
    }
  });

  it("does not treat other connection wording as unreachable", () => {
    assert.equal(toErrorMessage(new Error("client disconnected"), "fallback"), "fallback");
    assert.equal(
      toErrorMessage(new Error("connection reset by peer after 200"), "fallback"),
      "fallback"
    );
  });

  it("passes missing-collection messages through", () => {
    assert.equal(
      toErrorMessage(new Error("Collection 'x' does not exist."), "fallback"),
      "Collection 'x' does not exist."
    );
  });
});
