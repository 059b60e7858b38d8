import { ToolSpec } from "../llm/ollama.service";
import { ChromaFilter, CollectionInfo, IncludeField } from "../vector-db/chroma.service";
import { chromaVectorStore, VectorStore } from "../vector/paper.indexer";

export const NO_COLLECTIONS_MARKER = "__NO_COLLECTIONS_FOUND__";

export type ToolName =
  | "list_collections"
  | "get_collection_info"
  | "query_documents"
  | "get_documents";

type ToolArgs = Record<string, unknown>;

export const AGENT_TOOLS: ToolSpec[] = [
  {
    type: "function",
    function: {
      name: "list_collections",
      description:
        "List the collection names in the vector database. Each collection holds one paper.",
      parameters: {
        type: "object",
        properties: {
          limit: { type: "integer", description: "Maximum number of collections to return" },
          offset: { type: "integer", description: "Number of collections to skip" },
        },
        required: [],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "get_collection_info",
      description:
        "Get the paper title, document count and one sample document of a collection.",
      parameters: {
        type: "object",
        properties: {
          collection_name: { type: "string", description: "Name of the collection" },
        },
        required: ["collection_name"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "query_documents",
      description:
        "Semantic search in one collection. Supports Chroma metadata filters such as {\"content_type\": \"table\"}.",
      parameters: {
        type: "object",
        properties: {
          collection_name: { type: "string", description: "Name of the collection to query" },
          query_texts: {
            type: "array",
            items: { type: "string" },
            description: "Texts to search for",
          },
          n_results: { type: "integer", description: "Results per query text (default 5)" },
          where: { type: "object", description: "Optional metadata filter" },
          where_document: { type: "object", description: "Optional document content filter" },
        },
        required: ["collection_name", "query_texts"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "get_documents",
      description: "Fetch documents of a collection by id and/or filter, with paging.",
      parameters: {
        type: "object",
        properties: {
          collection_name: { type: "string", description: "Name of the collection" },
          ids: { type: "array", items: { type: "string" }, description: "Document ids" },
          where: { type: "object", description: "Optional metadata filter" },
          where_document: { type: "object", description: "Optional document content filter" },
          limit: { type: "integer", description: "Maximum number of documents" },
          offset: { type: "integer", description: "Number of documents to skip" },
        },
        required: ["collection_name"],
      },
    },
  },
];

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function requiredString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Argument '${key}' is required and must be a string.`);
  }
  return value.trim();
}

function optionalStringArray(args: ToolArgs, key: string): string[] | undefined {
  const value = args[key];
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

function optionalFilter(args: ToolArgs, key: string): ChromaFilter | undefined {
  const value = args[key];
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  const filter: ChromaFilter = { ...value };
  return Object.keys(filter).length > 0 ? filter : undefined;
}

async function requireCollection(store: VectorStore, name: string): Promise<CollectionInfo> {
  const collection = await store.findCollection(name);
  if (!collection) {
    throw new Error(`Collection '${name}' does not exist.`);
  }
  return collection;
}

async function listCollectionsTool(args: ToolArgs, store: VectorStore): Promise<string[]> {
  const collections = await store.listCollections(
    optionalNumber(args, "limit"),
    optionalNumber(args, "offset")
  );
  if (collections.length === 0) return [NO_COLLECTIONS_MARKER];
  return collections.map((collection) => collection.name);
}

async function getCollectionInfoTool(args: ToolArgs, store: VectorStore) {
  const name = requiredString(args, "collection_name");
  const collection = await requireCollection(store, name);
  const count = await store.count(collection.id);
  const sample = await store.get(collection.id, { limit: 1 });

  const sampleTitle = sample.metadatas?.[0]?.paper_title;
  const paperTitle =
    collection.metadata?.paper_title ?? (typeof sampleTitle === "string" ? sampleTitle : "");

  return {
    name,
    paper_title: paperTitle,
    count,
    sample_documents: sample,
  };
}

async function queryDocumentsTool(args: ToolArgs, store: VectorStore) {
  const name = requiredString(args, "collection_name");
  const queryTexts = optionalStringArray(args, "query_texts") ?? [];
  if (queryTexts.length === 0) {
    throw new Error("The 'query_texts' list cannot be empty.");
  }

  const collection = await requireCollection(store, name);
  return store.query(
    collection.id,
    queryTexts,
    optionalNumber(args, "n_results") ?? 5,
    optionalFilter(args, "where"),
    optionalFilter(args, "where_document")
  );
}

async function getDocumentsTool(args: ToolArgs, store: VectorStore) {
  const name = requiredString(args, "collection_name");
  const collection = await requireCollection(store, name);
  const include: IncludeField[] = ["documents", "metadatas"];

  return store.get(collection.id, {
    ids: optionalStringArray(args, "ids"),
    where: optionalFilter(args, "where"),
    whereDocument: optionalFilter(args, "where_document"),
    include,
    limit: optionalNumber(args, "limit"),
    offset: optionalNumber(args, "offset"),
  });
}

const TOOL_HANDLERS: Record<ToolName, (args: ToolArgs, store: VectorStore) => Promise<unknown>> = {
  list_collections: listCollectionsTool,
  get_collection_info: getCollectionInfoTool,
  query_documents: queryDocumentsTool,
  get_documents: getDocumentsTool,
};

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_HANDLERS, name);
}

/**
 * Runs one tool call and returns its result as the text handed back to the
 * model.
 */
export async function executeTool(
  name: string,
  args: ToolArgs,
  store: VectorStore = chromaVectorStore
): Promise<string> {
  if (!isToolName(name)) {
    throw new Error(`Unknown tool '${name}'.`);
  }
  console.log(`Tool call: ${name} ${JSON.stringify(args)}`);
  const result = await TOOL_HANDLERS[name](args, store);
  return JSON.stringify(result);
}
