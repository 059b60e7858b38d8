import fetch from "node-fetch";
import { JSON_HEADERS, REQUEST_TIMEOUT_MS } from "../http/request.config";

const OLLAMA_BASE_URL =
  process.env.OLLAMA_BASE_URL ?? "http://localhost:11434";
const OLLAMA_MODEL = process.env.OLLAMA_MODEL ?? "llama3.2";
const OLLAMA_CONVERSION_MODEL = process.env.OLLAMA_CONVERSION_MODEL || OLLAMA_MODEL;

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ToolCall {
  function: {
    name: string;
    arguments: Record<string, unknown>;
  };
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  tool_calls?: ToolCall[];
  tool_name?: string;
}

export interface ToolParameterSchema {
  type: "object";
  properties: Record<string, { type: string; description: string; items?: { type: string } }>;
  required: string[];
}

export interface ToolSpec {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ToolParameterSchema;
  };
}

export async function generate(prompt: string, modelName?: string): Promise<string> {
  const model = modelName ?? OLLAMA_MODEL;

  const response = await fetch(`${OLLAMA_BASE_URL}/api/generate`, {
    method: "POST",
    headers: JSON_HEADERS,
    timeout: REQUEST_TIMEOUT_MS,
    body: JSON.stringify({
      model,
      prompt,
      stream: false,
    }),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Ollama error: ${text}`);
  }

  const data = (await response.json()) as { response?: string };

  if (!data.response) {
    throw new Error("Ollama returned an empty response.");
  }

  return data.response;
}

/**
 * One non-streaming chat turn. The returned message may carry tool calls
 * instead of (or along with) text.
 */
export async function chat(
  messages: ChatMessage[],
  tools: ToolSpec[] = [],
  modelName?: string
): Promise<ChatMessage> {
  const model = modelName ?? OLLAMA_MODEL;

  const response = await fetch(`${OLLAMA_BASE_URL}/api/chat`, {
    method: "POST",
    headers: JSON_HEADERS,
    timeout: REQUEST_TIMEOUT_MS,
    body: JSON.stringify({
      model,
      messages,
      tools,
      stream: false,
    }),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Ollama chat error: ${text}`);
  }

  const data = (await response.json()) as { message?: ChatMessage };

  if (!data.message) {
    throw new Error("Ollama returned an empty chat message.");
  }

  return {
    role: "assistant",
    content: data.message.content ?? "",
    tool_calls: data.message.tool_calls,
  };
}

export const ollamaConfig = {
  baseUrl: OLLAMA_BASE_URL,
  model: OLLAMA_MODEL,
  conversionModel: OLLAMA_CONVERSION_MODEL,
};
