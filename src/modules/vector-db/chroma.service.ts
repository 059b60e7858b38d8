import fetch from "node-fetch";
import { JSON_HEADERS, REQUEST_TIMEOUT_MS } from "../http/request.config";

const CHROMA_BASE_URL =
  process.env.CHROMA_BASE_URL ?? "http://localhost:8000";

// Chroma v2 multi-tenant configuration
const TENANT = "default";
const DATABASE = "default";
const CHROMA_API_BASE = `${CHROMA_BASE_URL}/api/v2/tenants/${TENANT}/databases/${DATABASE}`;

/**
 * Collection names mapped to their IDs
 */
const collectionCache: Map<string, string> = new Map();

/**
 * Chroma rejects lists and nested objects as metadata values.
 */
export type ChromaMetadata = Record<string, string | number | boolean>;

/**
 * Chroma `where` / `where_document` filter, passed through as given.
 */
export type ChromaFilter = Record<string, unknown>;

export type IncludeField = "documents" | "metadatas" | "distances" | "embeddings";

/**
 * Document to be stored in Chroma
 */
export interface ChromaDocument {
  id: string;
  text: string;
  embedding: number[];
  metadata?: ChromaMetadata;
}

export interface CollectionInfo {
  id: string;
  name: string;
  metadata?: ChromaMetadata | null;
}

export interface QueryResult {
  ids: string[][];
  documents?: (string | null)[][] | null;
  metadatas?: (ChromaMetadata | null)[][] | null;
  distances?: (number | null)[][] | null;
}

export interface GetResult {
  ids: string[];
  documents?: (string | null)[] | null;
  metadatas?: (ChromaMetadata | null)[] | null;
}

export interface GetDocumentsOptions {
  ids?: string[];
  where?: ChromaFilter;
  whereDocument?: ChromaFilter;
  include?: IncludeField[];
  limit?: number;
  offset?: number;
}

async function failWith(prefix: string, response: { text(): Promise<string> }): Promise<never> {
  const errorText = await response.text();
  throw new Error(`${prefix}: ${errorText}`);
}

function requireCollectionId(collectionId: string): void {
  if (!collectionId || collectionId.trim().length === 0) {
    throw new Error("Collection ID cannot be empty");
  }
}

function toCollectionInfo(value: unknown): CollectionInfo | null {
  if (typeof value !== "object" || value === null) return null;
  const id: unknown = Reflect.get(value, "id");
  const name: unknown = Reflect.get(value, "name");
  if (typeof id !== "string" || typeof name !== "string") return null;

  const metadata: unknown = Reflect.get(value, "metadata");
  const info: CollectionInfo = { id, name };
  if (typeof metadata === "object" && metadata !== null) {
    const flat: ChromaMetadata = {};
    for (const [key, raw] of Object.entries(metadata)) {
      if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
        flat[key] = raw;
      }
    }
    info.metadata = flat;
  }
  return info;
}

/**
 * Ensure the database exists in Chroma v2, creating it when missing
 */
export async function ensureDatabaseExists(): Promise<void> {
  try {
    const listResponse = await fetch(
      `${CHROMA_BASE_URL}/api/v2/tenants/${TENANT}/databases`,
      { timeout: REQUEST_TIMEOUT_MS }
    );

    if (!listResponse.ok) {
      throw new Error("Failed to list databases");
    }

    const databases = (await listResponse.json()) as Array<{ name: string }>;
    if (databases.some((db) => db.name === DATABASE)) {
      console.log(`✅ Database "${DATABASE}" exists in tenant "${TENANT}"`);
      return;
    }

    console.log(`📍 Database "${DATABASE}" not found. Creating it...`);

    const createResponse = await fetch(
      `${CHROMA_BASE_URL}/api/v2/tenants/${TENANT}/databases`,
      {
        method: "POST",
        headers: JSON_HEADERS,
        timeout: REQUEST_TIMEOUT_MS,
        body: JSON.stringify({ name: DATABASE }),
      }
    );

    if (!createResponse.ok) {
      await failWith("Failed to create database", createResponse);
    }

    console.log(`✅ Database "${DATABASE}" created successfully in tenant "${TENANT}"`);
  } catch (error) {
    console.error("Error ensuring database exists:", error);
    throw error;
  }
}

/**
 * List collections of the scoped tenant/database
 * @param limit - Maximum number of collections to return
 * @param offset - Number of collections to skip
 */
export async function listCollections(
  limit?: number,
  offset?: number
): Promise<CollectionInfo[]> {
  const params = new URLSearchParams();
  if (limit !== undefined) params.set("limit", String(limit));
  if (offset !== undefined) params.set("offset", String(offset));
  const query = params.toString();

  const response = await fetch(
    `${CHROMA_API_BASE}/collections${query ? `?${query}` : ""}`,
    { timeout: REQUEST_TIMEOUT_MS }
  );

  if (!response.ok) {
    await failWith("Failed to list collections", response);
  }

  const json: unknown = await response.json();

  // Handle both array and object response formats
  const raw: unknown = Array.isArray(json)
    ? json
    : typeof json === "object" && json !== null
      ? Reflect.get(json, "collections")
      : undefined;
  if (!Array.isArray(raw)) return [];

  const collections: CollectionInfo[] = [];
  for (const entry of raw) {
    const info = toCollectionInfo(entry);
    if (info) collections.push(info);
  }
  return collections;
}

/**
 * Find a collection by name without creating it
 */
export async function getCollectionByName(
  collectionName: string
): Promise<CollectionInfo | null> {
  const collections = await listCollections();
  const existing = collections.find((c) => c.name === collectionName);
  if (existing) collectionCache.set(collectionName, existing.id);
  return existing ?? null;
}

/**
 * Create or get a collection from ChromaDB v2
 * @param collectionName - Name of the collection
 * @param metadata - Stored with the collection when it is created
 */
export async function getOrCreateCollection(
  collectionName: string,
  metadata: ChromaMetadata = {}
): Promise<CollectionInfo> {
  const cachedId = collectionCache.get(collectionName);
  if (cachedId) {
    return { id: cachedId, name: collectionName };
  }

  const existing = await getCollectionByName(collectionName);
  if (existing) {
    console.log(`✅ Collection "${collectionName}" already exists (id: ${existing.id})`);
    return existing;
  }

  const createResponse = await fetch(`${CHROMA_API_BASE}/collections`, {
    method: "POST",
    headers: JSON_HEADERS,
    timeout: REQUEST_TIMEOUT_MS,
    body: JSON.stringify({
      name: collectionName,
      metadata: { "hnsw:space": "cosine", ...metadata },
    }),
  });

  if (!createResponse.ok) {
    await failWith("Failed to create collection", createResponse);
  }

  const created = toCollectionInfo(await createResponse.json());
  if (!created) {
    throw new Error(`Chroma returned no collection for "${collectionName}"`);
  }

  collectionCache.set(collectionName, created.id);
  console.log(`✅ Collection "${collectionName}" created successfully (id: ${created.id})`);
  return created;
}

/**
 * Insert or overwrite documents with embeddings (Chroma v2)
 */
export async function upsertDocuments(
  collectionId: string,
  documents: ChromaDocument[]
): Promise<void> {
  requireCollectionId(collectionId);

  if (!documents || documents.length === 0) {
    throw new Error("Documents array cannot be empty");
  }

  const response = await fetch(
    `${CHROMA_API_BASE}/collections/${collectionId}/upsert`,
    {
      method: "POST",
      headers: JSON_HEADERS,
      timeout: REQUEST_TIMEOUT_MS,
      body: JSON.stringify({
        ids: documents.map((doc) => doc.id),
        embeddings: documents.map((doc) => doc.embedding),
        documents: documents.map((doc) => doc.text),
        metadatas: documents.map((doc) => doc.metadata ?? {}),
      }),
    }
  );

  if (!response.ok) {
    await failWith("Failed to upsert documents", response);
  }

  console.log(`✅ Upserted ${documents.length} documents into collection (id: ${collectionId})`);
}

/**
 * Nearest-neighbour query with optional metadata/content filters (Chroma v2)
 * @param queryEmbeddings - One vector per query
 * @param nResults - Results per query
 */
export async function queryCollection(
  collectionId: string,
  queryEmbeddings: number[][],
  nResults: number = 5,
  where?: ChromaFilter,
  whereDocument?: ChromaFilter,
  include: IncludeField[] = ["documents", "metadatas", "distances"]
): Promise<QueryResult> {
  requireCollectionId(collectionId);

  if (queryEmbeddings.length === 0) {
    throw new Error("Query embeddings cannot be empty");
  }

  const response = await fetch(
    `${CHROMA_API_BASE}/collections/${collectionId}/query`,
    {
      method: "POST",
      headers: JSON_HEADERS,
      timeout: REQUEST_TIMEOUT_MS,
      body: JSON.stringify({
        query_embeddings: queryEmbeddings,
        n_results: nResults,
        where,
        where_document: whereDocument,
        include,
      }),
    }
  );

  if (!response.ok) {
    await failWith("Failed to query collection", response);
  }

  return (await response.json()) as QueryResult;
}

/**
 * Fetch documents by id and/or filter (Chroma v2)
 */
export async function getDocuments(
  collectionId: string,
  options: GetDocumentsOptions = {}
): Promise<GetResult> {
  requireCollectionId(collectionId);

  const response = await fetch(
    `${CHROMA_API_BASE}/collections/${collectionId}/get`,
    {
      method: "POST",
      headers: JSON_HEADERS,
      timeout: REQUEST_TIMEOUT_MS,
      body: JSON.stringify({
        ids: options.ids,
        where: options.where,
        where_document: options.whereDocument,
        include: options.include ?? ["documents", "metadatas"],
        limit: options.limit,
        offset: options.offset,
      }),
    }
  );

  if (!response.ok) {
    await failWith("Failed to get documents", response);
  }

  return (await response.json()) as GetResult;
}

/**
 * Number of documents in a collection (Chroma v2)
 */
export async function getCollectionCount(collectionId: string): Promise<number> {
  requireCollectionId(collectionId);

  const response = await fetch(
    `${CHROMA_API_BASE}/collections/${collectionId}/count`,
    { timeout: REQUEST_TIMEOUT_MS }
  );

  if (!response.ok) {
    await failWith("Failed to get collection count", response);
  }

  return (await response.json()) as number;
}

export async function deleteCollection(collectionName: string): Promise<void> {
  const response = await fetch(
    `${CHROMA_API_BASE}/collections/${encodeURIComponent(collectionName)}`,
    { method: "DELETE", timeout: REQUEST_TIMEOUT_MS }
  );

  if (!response.ok) {
    await failWith("Failed to delete collection", response);
  }

  collectionCache.delete(collectionName);
  console.log(`✅ Deleted collection "${collectionName}"`);
}

export const chromaConfig = {
  baseUrl: CHROMA_BASE_URL,
  apiBase: CHROMA_API_BASE,
  tenant: TENANT,
  database: DATABASE,
};
