import fetch from "node-fetch";
import { JSON_HEADERS, REQUEST_TIMEOUT_MS } from "../http/request.config";

const OLLAMA_BASE_URL =
  process.env.OLLAMA_BASE_URL ?? "http://localhost:11434";
const EMBEDDING_MODEL = process.env.EMBEDDING_MODEL ?? "nomic-embed-text";

/**
 * Generates embeddings for the given text using Ollama
 * @param text - The text to embed
 * @returns The embedding vector
 */
export async function generateEmbedding(text: string): Promise<number[]> {
  if (!text || text.trim().length === 0) {
    throw new Error("Text cannot be empty");
  }

  const response = await fetch(`${OLLAMA_BASE_URL}/api/embeddings`, {
    method: "POST",
    headers: JSON_HEADERS,
    timeout: REQUEST_TIMEOUT_MS,
    body: JSON.stringify({
      model: EMBEDDING_MODEL,
      prompt: text,
    }),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Ollama embedding error: ${errorText}`);
  }

  const data = (await response.json()) as { embedding?: number[] };

  if (!data.embedding) {
    throw new Error("Ollama returned an empty embedding.");
  }

  return data.embedding;
}

/**
 * Generates embeddings for multiple texts in batch
 * @param texts - Array of texts to embed
 * @returns One vector per input text, in order
 */
export async function generateEmbeddingsBatch(
  texts: string[]
): Promise<number[][]> {
  if (!texts || texts.length === 0) {
    throw new Error("Texts array cannot be empty");
  }

  return Promise.all(texts.map((text) => generateEmbedding(text)));
}

export const embeddingConfig = {
  baseUrl: OLLAMA_BASE_URL,
  model: EMBEDDING_MODEL,
};
