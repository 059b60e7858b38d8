import fs from "fs";
import path from "path";
import { generateEmbeddingsBatch } from "../embeddings/embedding.service";
import {
  ChromaDocument,
  ChromaFilter,
  ChromaMetadata,
  CollectionInfo,
  deleteCollection,
  GetDocumentsOptions,
  GetResult,
  QueryResult,
  getCollectionByName,
  getCollectionCount,
  getDocuments,
  getOrCreateCollection,
  listCollections,
  queryCollection,
  upsertDocuments,
} from "../vector-db/chroma.service";
import { DatabaseRecord, RecordMetadata } from "../normalizer/record.converter";

const BATCH_SIZE = 16;
const MAX_COLLECTION_NAME_LENGTH = 63;
const UNKNOWN_PAPER = "Unknown Paper";

/**
 * What the indexer and the agent tools need from the vector database.
 * Embeddings are computed behind this boundary.
 */
export interface VectorStore {
  getOrCreateCollection(name: string, metadata: ChromaMetadata): Promise<CollectionInfo>;
  findCollection(name: string): Promise<CollectionInfo | null>;
  listCollections(limit?: number, offset?: number): Promise<CollectionInfo[]>;
  count(collectionId: string): Promise<number>;
  upsert(collectionId: string, documents: VectorDocument[]): Promise<void>;
  query(
    collectionId: string,
    queryTexts: string[],
    nResults: number,
    where?: ChromaFilter,
    whereDocument?: ChromaFilter
  ): Promise<QueryResult>;
  get(collectionId: string, options: GetDocumentsOptions): Promise<GetResult>;
  deleteCollection(name: string): Promise<void>;
}

export interface VectorDocument {
  id: string;
  text: string;
  metadata: ChromaMetadata;
}

export interface FolderIngestResult {
  totalFiles: number;
  successful: number;
  failed: number;
  totalChunks: number;
}

export interface PaperIngestResult {
  success: boolean;
  /** Documents written to the collection; records without text are not counted. */
  documents: number;
}

export interface PaperCollectionInfo {
  name: string;
  count: number;
  metadata: ChromaMetadata;
}

/**
 * Vector store backed by the Chroma REST API with Ollama embeddings.
 */
export const chromaVectorStore: VectorStore = {
  getOrCreateCollection: (name, metadata) => getOrCreateCollection(name, metadata),
  findCollection: (name) => getCollectionByName(name),
  listCollections: (limit, offset) => listCollections(limit, offset),
  count: (collectionId) => getCollectionCount(collectionId),
  async upsert(collectionId, documents) {
    const embeddings = await generateEmbeddingsBatch(documents.map((doc) => doc.text));
    const withEmbeddings: ChromaDocument[] = documents.map((doc, index) => ({
      ...doc,
      embedding: embeddings[index],
    }));
    await upsertDocuments(collectionId, withEmbeddings);
  },
  async query(collectionId, queryTexts, nResults, where, whereDocument) {
    const embeddings = await generateEmbeddingsBatch(queryTexts);
    return queryCollection(collectionId, embeddings, nResults, where, whereDocument);
  },
  get: (collectionId, options) => getDocuments(collectionId, options),
  deleteCollection: (name) => deleteCollection(name),
};

/**
 * Chroma-safe collection name derived from a paper title.
 */
export function toCollectionName(paperTitle: string): string {
  let name = paperTitle
    .replace(/[^a-zA-Z0-9\s]/g, "_")
    .replace(/[\s_]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_COLLECTION_NAME_LENGTH);

  if (name && !/^[a-zA-Z]/.test(name)) {
    name = `paper_${name}`;
  }

  name = name
    .toLowerCase()
    .slice(0, MAX_COLLECTION_NAME_LENGTH)
    .replace(/_+$/g, "");

  return name || "paper";
}

export function toVectorDocument(
  record: DatabaseRecord,
  paperTitle: string,
  collectionName: string
): VectorDocument {
  const source: RecordMetadata = record.metadata;
  const metadata: ChromaMetadata = {
    paper_title: paperTitle,
    chunk_id: String(record.id),
    content_type: source.type,
    html_class: source.html_class,
    token_count: source.token_count,
    position: source.position,
    tag_name: source.tag_name,
  };

  if (source.type === "header" && source.level !== undefined) {
    metadata.level = source.level;
  }
  if (source.type === "list" && source.list_type !== undefined) {
    metadata.list_type = source.list_type;
  }
  if (source.type === "table" && source.merged_chunks !== undefined) {
    metadata.merged_chunks = source.merged_chunks;
  }

  return {
    id: `${collectionName}_${record.id}`,
    text: record.content,
    metadata,
  };
}

function isDatabaseRecord(value: unknown): value is DatabaseRecord {
  if (typeof value !== "object" || value === null) return false;
  const id: unknown = Reflect.get(value, "id");
  const content: unknown = Reflect.get(value, "content");
  const metadata: unknown = Reflect.get(value, "metadata");
  return (
    typeof id === "number" &&
    typeof content === "string" &&
    typeof metadata === "object" &&
    metadata !== null &&
    typeof Reflect.get(metadata, "type") === "string"
  );
}

export function loadRecords(filePath: string): DatabaseRecord[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new Error(`Database file ${filePath} must contain a JSON array`);
  }
  return raw.filter(isDatabaseRecord);
}

export function resolvePaperTitle(records: DatabaseRecord[], filePath: string): string {
  const name = records[0]?.metadata.name;
  if (typeof name === "string" && name.trim() && name !== UNKNOWN_PAPER) return name;
  return path.basename(filePath).split(".")[0];
}

/**
 * Loads one paper's records into its own collection. Never throws; failures
 * are logged and reported as unsuccessful.
 */
export async function indexPaper(
  databaseJsonPath: string,
  store: VectorStore = chromaVectorStore
): Promise<PaperIngestResult> {
  try {
    console.log(`Processing: ${databaseJsonPath}`);
    const records = loadRecords(databaseJsonPath);

    if (records.length === 0) {
      console.warn(`No chunks found in ${databaseJsonPath}`);
      return { success: false, documents: 0 };
    }

    const paperTitle = resolvePaperTitle(records, databaseJsonPath);
    const collectionName = toCollectionName(paperTitle);
    console.log(`Paper: ${paperTitle}`);

    const collection = await store.getOrCreateCollection(collectionName, {
      paper_title: paperTitle,
    });

    const documents: VectorDocument[] = [];
    for (const record of records) {
      if (!record.content.trim()) {
        console.warn(`Skipping record ${record.id}: no content to embed`);
        continue;
      }
      documents.push(toVectorDocument(record, paperTitle, collectionName));
    }

    for (let i = 0; i < documents.length; i += BATCH_SIZE) {
      await store.upsert(collection.id, documents.slice(i, i + BATCH_SIZE));
    }

    console.log(`Added ${documents.length} chunks to collection "${collectionName}"`);
    return { success: true, documents: documents.length };
  } catch (error) {
    console.error(`Error processing ${databaseJsonPath}:`, error);
    return { success: false, documents: 0 };
  }
}

export async function ingestPaper(
  databaseJsonPath: string,
  store: VectorStore = chromaVectorStore
): Promise<boolean> {
  return (await indexPaper(databaseJsonPath, store)).success;
}

export async function ingestFolder(
  folderPath: string,
  store: VectorStore = chromaVectorStore
): Promise<FolderIngestResult> {
  const result: FolderIngestResult = {
    totalFiles: 0,
    successful: 0,
    failed: 0,
    totalChunks: 0,
  };

  if (!fs.existsSync(folderPath)) {
    console.warn(`Folder not found: ${folderPath}`);
    return result;
  }

  const files = fs
    .readdirSync(folderPath)
    .filter((file) => file.endsWith(".json"))
    .map((file) => path.join(folderPath, file));
  result.totalFiles = files.length;

  if (files.length === 0) {
    console.warn(`No JSON files found in ${folderPath}`);
    return result;
  }

  for (const file of files) {
    const paper = await indexPaper(file, store);
    if (paper.success) {
      result.successful++;
      result.totalChunks += paper.documents;
    } else {
      result.failed++;
    }
  }

  return result;
}

export async function listPaperCollections(
  store: VectorStore = chromaVectorStore
): Promise<string[]> {
  try {
    const collections = await store.listCollections();
    return collections.map((collection) => collection.name);
  } catch (error) {
    console.error("Error listing collections:", error);
    return [];
  }
}

export async function getCollectionInfo(
  collectionName: string,
  store: VectorStore = chromaVectorStore
): Promise<PaperCollectionInfo> {
  try {
    const collection = await store.findCollection(collectionName);
    if (!collection) {
      throw new Error(`Collection "${collectionName}" does not exist`);
    }
    return {
      name: collectionName,
      count: await store.count(collection.id),
      metadata: collection.metadata ?? {},
    };
  } catch (error) {
    console.error(`Error getting collection info for ${collectionName}:`, error);
    return { name: collectionName, count: 0, metadata: {} };
  }
}
