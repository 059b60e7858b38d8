import fs from "fs";
import path from "path";
import { chat, ChatMessage, ToolSpec } from "../llm/ollama.service";
import { chromaVectorStore, VectorStore } from "../vector/paper.indexer";
import { AGENT_TOOLS, executeTool } from "./agent.tools";

const AGENT_MAX_TURNS = Number(process.env.AGENT_MAX_TURNS ?? "8");
const AGENT_LOG_FILE = process.env.AGENT_LOG_FILE ?? path.join("data", "agent_qa_log.json");

export const MAX_TURNS_ANSWER =
  "I could not finish answering within the allowed number of tool calls.";

export const AGENT_INSTRUCTIONS = `You are a helpful assistant that answers questions about the research papers in a vector database.
Every paper is stored in its own collection.

Use the following tools to answer questions:
- list_collections: lists the names of all the papers in the database
- get_collection_info: gets the title, size and a sample document of a collection
- query_documents: semantic search in a collection; filter tables with {"content_type": "table"}
- get_documents: fetches documents of a collection by id or filter

Answer only from what the tools return. If the papers do not contain the answer, say so.`;

export interface AgentDeps {
  chat: (messages: ChatMessage[], tools: ToolSpec[]) => Promise<ChatMessage>;
  store: VectorStore;
  maxTurns: number;
}

export interface ToolTraceItem {
  tool: string;
  arguments: Record<string, unknown>;
  ok: boolean;
}

export interface AgentAnswer {
  question: string;
  answer: string;
  toolCalls: ToolTraceItem[];
  turns: number;
}

export interface QaEntry {
  question: string;
  questionType: string;
  response: string;
  timestamp: string;
}

export const defaultAgentDeps: AgentDeps = {
  chat: (messages, tools) => chat(messages, tools),
  store: chromaVectorStore,
  maxTurns: Number.isFinite(AGENT_MAX_TURNS) && AGENT_MAX_TURNS > 0 ? AGENT_MAX_TURNS : 8,
};

/**
 * Chat loop: every tool call the model makes is executed and its result sent
 * back, until the model answers without calling a tool.
 */
export async function runAgent(
  question: string,
  deps: AgentDeps = defaultAgentDeps
): Promise<AgentAnswer> {
  if (!question || question.trim().length === 0) {
    throw new Error("Question cannot be empty");
  }

  const messages: ChatMessage[] = [
    { role: "system", content: AGENT_INSTRUCTIONS },
    { role: "user", content: question },
  ];
  const toolCalls: ToolTraceItem[] = [];

  for (let turn = 1; turn <= deps.maxTurns; turn++) {
    const reply = await deps.chat(messages, AGENT_TOOLS);
    messages.push(reply);

    const calls = reply.tool_calls ?? [];
    if (calls.length === 0) {
      return { question, answer: reply.content.trim(), toolCalls, turns: turn };
    }

    for (const call of calls) {
      const name = call.function.name;
      const args = call.function.arguments ?? {};
      let content: string;
      let ok = true;
      try {
        content = await executeTool(name, args, deps.store);
      } catch (error) {
        ok = false;
        content = `Error: ${error instanceof Error ? error.message : String(error)}`;
        console.warn(`Tool ${name} failed:`, error);
      }
      toolCalls.push({ tool: name, arguments: args, ok });
      messages.push({ role: "tool", content, tool_name: name });
    }
  }

  console.warn(`Agent stopped after ${deps.maxTurns} turns without a final answer`);
  return { question, answer: MAX_TURNS_ANSWER, toolCalls, turns: deps.maxTurns };
}

export async function askQuestions(
  questions: Array<{ question: string; questionType?: string }>,
  deps: AgentDeps = defaultAgentDeps
): Promise<QaEntry[]> {
  const entries: QaEntry[] = [];

  for (const { question, questionType = "general" } of questions) {
    console.log("=".repeat(60));
    console.log(`Question (${questionType}): ${question}`);
    console.log("=".repeat(60));

    const result = await runAgent(question, deps);
    console.log(`Response: ${result.answer}`);

    entries.push({
      question,
      questionType,
      response: result.answer,
      timestamp: new Date().toISOString(),
    });
  }

  return entries;
}

/**
 * Overwrites the Q&A log with the given session.
 */
export function saveQaLog(entries: QaEntry[], filePath: string = AGENT_LOG_FILE): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const payload = {
    timestamp: new Date().toISOString(),
    totalQuestions: entries.length,
    qaPairs: entries,
  };
  fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), "utf-8");
  console.log(`Q&A data saved to: ${filePath}`);
  return filePath;
}
