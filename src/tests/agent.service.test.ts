import { describe, it, beforeEach } from "node:test";
import assert from "assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { ChatMessage } from "../modules/llm/ollama.service";
import { AGENT_TOOLS, executeTool, NO_COLLECTIONS_MARKER } from "../modules/agent/agent.tools";
import {
  AgentDeps,
  askQuestions,
  MAX_TURNS_ANSWER,
  runAgent,
  saveQaLog,
} from "../modules/agent/agent.service";
import { MemoryVectorStore } from "./helpers/memory.store";

async function seededStore(): Promise<MemoryVectorStore> {
  const store = new MemoryVectorStore();
  const collection = await store.getOrCreateCollection("graph_methods", {
    paper_title: "Graph Methods",
  });
  await store.upsert(collection.id, [
    {
      id: "graph_methods_1",
      text: "Graph methods overview",
      metadata: { paper_title: "Graph Methods", content_type: "header" },
    },
    {
      id: "graph_methods_2",
      text: "We study graphs in depth",
      metadata: { paper_title: "Graph Methods", content_type: "paragraph" },
    },
  ]);
  return store;
}

function toolCall(name: string, args: Record<string, unknown> = {}): ChatMessage {
  return { role: "assistant", content: "", tool_calls: [{ function: { name, arguments: args } }] };
}

/**
 * Replays the given replies in order and records a copy of every
 * conversation it was sent.
 */
function scriptedChat(replies: ChatMessage[]) {
  const seen: ChatMessage[][] = [];
  let index = 0;
  const chat: AgentDeps["chat"] = async (messages) => {
    seen.push(messages.map((message) => ({ ...message })));
    const reply = replies[Math.min(index, replies.length - 1)];
    index++;
    return reply;
  };
  return { chat, seen };
}

describe("executeTool", () => {
  let store: MemoryVectorStore;

  beforeEach(async () => {
    store = await seededStore();
  });

  it("exposes the four tools", () => {
    assert.deepEqual(
      AGENT_TOOLS.map((tool) => tool.function.name),
      ["list_collections", "get_collection_info", "query_documents", "get_documents"]
    );
  });

  it("lists collection names", async () => {
    assert.equal(await executeTool("list_collections", {}, store), '["graph_methods"]');
  });

  it("returns a marker when no collection exists", async () => {
    const result = await executeTool("list_collections", {}, new MemoryVectorStore());
    assert.deepEqual(JSON.parse(result), [NO_COLLECTIONS_MARKER]);
  });

  it("describes a collection", async () => {
    const info = JSON.parse(
      await executeTool("get_collection_info", { collection_name: "graph_methods" }, store)
    );

    assert.equal(info.name, "graph_methods");
    assert.equal(info.paper_title, "Graph Methods");
    assert.equal(info.count, 2);
    assert.deepEqual(info.sample_documents.ids, ["graph_methods_1"]);
  });

  it("queries with a metadata filter", async () => {
    const result = JSON.parse(
      await executeTool(
        "query_documents",
        {
          collection_name: "graph_methods",
          query_texts: ["graphs"],
          where: { content_type: "paragraph" },
        },
        store
      )
    );

    assert.deepEqual(result.ids, [["graph_methods_2"]]);
    assert.deepEqual(result.documents, [["We study graphs in depth"]]);
  });

  it("accepts a single query string and a result limit", async () => {
    const result = JSON.parse(
      await executeTool(
        "query_documents",
        { collection_name: "graph_methods", query_texts: "graph", n_results: 1 },
        store
      )
    );
    assert.deepEqual(result.ids, [["graph_methods_1"]]);
  });

  it("rejects an empty query list", async () => {
    await assert.rejects(
      executeTool("query_documents", { collection_name: "graph_methods", query_texts: [] }, store),
      { message: "The 'query_texts' list cannot be empty." }
    );
  });

  it("fetches documents by id", async () => {
    const result = JSON.parse(
      await executeTool(
        "get_documents",
        { collection_name: "graph_methods", ids: ["graph_methods_2"] },
        store
      )
    );
    assert.deepEqual(result.ids, ["graph_methods_2"]);
  });

  it("fails on unknown tools and collections", async () => {
    await assert.rejects(executeTool("drop_everything", {}, store), {
      message: "Unknown tool 'drop_everything'.",
    });
    await assert.rejects(executeTool("get_documents", { collection_name: "missing" }, store), {
      message: "Collection 'missing' does not exist.",
    });
  });
});

describe("runAgent", () => {
  it("rejects an empty question", async () => {
    const { chat } = scriptedChat([{ role: "assistant", content: "unused" }]);
    await assert.rejects(
      runAgent("  ", { chat, store: new MemoryVectorStore(), maxTurns: 3 }),
      { message: "Question cannot be empty" }
    );
  });

  it("returns a direct answer", async () => {
    const { chat, seen } = scriptedChat([{ role: "assistant", content: " Done. " }]);

    const result = await runAgent("Hello?", { chat, store: new MemoryVectorStore(), maxTurns: 3 });

    assert.deepEqual(result, { question: "Hello?", answer: "Done.", toolCalls: [], turns: 1 });
    assert.equal(seen[0][0].role, "system");
    assert.deepEqual(seen[0][1], { role: "user", content: "Hello?" });
  });

  it("feeds tool results back until the model answers", async () => {
    const store = await seededStore();
    const { chat, seen } = scriptedChat([
      toolCall("list_collections"),
      toolCall("query_documents", {
        collection_name: "graph_methods",
        query_texts: ["graphs"],
        where: { content_type: "paragraph" },
      }),
      { role: "assistant", content: "The paper studies graphs." },
    ]);

    const result = await runAgent("What is studied?", { chat, store, maxTurns: 5 });

    assert.equal(result.answer, "The paper studies graphs.");
    assert.equal(result.turns, 3);
    assert.deepEqual(
      result.toolCalls.map((call) => [call.tool, call.ok]),
      [
        ["list_collections", true],
        ["query_documents", true],
      ]
    );
    assert.deepEqual(seen[1][3], {
      role: "tool",
      content: '["graph_methods"]',
      tool_name: "list_collections",
    });
  });

  it("reports tool errors to the model instead of failing", async () => {
    const { chat, seen } = scriptedChat([
      toolCall("get_collection_info", { collection_name: "missing" }),
      { role: "assistant", content: "That paper is not in the database." },
    ]);

    const result = await runAgent("Tell me about missing", {
      chat,
      store: await seededStore(),
      maxTurns: 5,
    });

    assert.equal(result.answer, "That paper is not in the database.");
    assert.deepEqual(result.toolCalls, [
      { tool: "get_collection_info", arguments: { collection_name: "missing" }, ok: false },
    ]);
    assert.equal(seen[1][3].content, "Error: Collection 'missing' does not exist.");
  });

  it("gives up after the turn limit", async () => {
    const { chat } = scriptedChat([toolCall("list_collections")]);

    const result = await runAgent("Loop?", { chat, store: await seededStore(), maxTurns: 2 });

    assert.equal(result.answer, MAX_TURNS_ANSWER);
    assert.equal(result.turns, 2);
    assert.equal(result.toolCalls.length, 2);
  });
});

describe("Q&A log", () => {
  it("asks each question and saves the session", async () => {
    const { chat } = scriptedChat([{ role: "assistant", content: "Two papers." }]);
    const entries = await askQuestions(
      [{ question: "How many papers?", questionType: "basic" }, { question: "Again?" }],
      { chat, store: new MemoryVectorStore(), maxTurns: 2 }
    );

    assert.deepEqual(
      entries.map((entry) => [entry.question, entry.questionType, entry.response]),
      [
        ["How many papers?", "basic", "Two papers."],
        ["Again?", "general", "Two papers."],
      ]
    );

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "qa-"));
    const filePath = saveQaLog(entries, path.join(dir, "logs", "qa.json"));
    const saved = JSON.parse(fs.readFileSync(filePath, "utf-8"));

    assert.equal(saved.totalQuestions, 2);
    assert.deepEqual(saved.qaPairs, entries);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
