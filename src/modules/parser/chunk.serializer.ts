import fs from "fs";
import path from "path";
import {
  ContentChunk,
  isContentType,
  ListType,
  SerializedChunk,
  SerializedTableInfo,
  TableInfo,
} from "./content.types";

function serializeTableInfo(info: TableInfo): SerializedTableInfo {
  const out: SerializedTableInfo = {};
  if (info.rows !== undefined) out.rows = info.rows;
  if (info.columns !== undefined) out.columns = info.columns;
  if (info.hasHeader !== undefined) out.has_header = info.hasHeader;
  if (info.mergedChunks !== undefined) out.merged_chunks = info.mergedChunks;
  if (info.originalPositions !== undefined) {
    out.original_positions = [...info.originalPositions];
  }
  return out;
}

export function chunkToJson(chunk: ContentChunk): SerializedChunk {
  return {
    content_type: chunk.contentType,
    content: chunk.content,
    tag_name: chunk.tagName,
    attributes: { ...chunk.attributes },
    level: chunk.level ?? null,
    list_type: chunk.listType ?? null,
    table_info: chunk.tableInfo ? serializeTableInfo(chunk.tableInfo) : null,
    position: chunk.position,
  };
}

export function chunksToJson(chunks: ContentChunk[]): SerializedChunk[] {
  return chunks.map(chunkToJson);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === "string") out[key] = raw;
    // Attribute lists (e.g. class) written by other tools are space-joined.
    else if (Array.isArray(raw)) out[key] = raw.map(String).join(" ");
    else if (typeof raw === "number" || typeof raw === "boolean") out[key] = String(raw);
  }
  return out;
}

function toOptionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function toListType(value: unknown): ListType | undefined {
  return value === "ul" || value === "ol" ? value : undefined;
}

function parseTableInfo(value: unknown): TableInfo | undefined {
  if (!isRecord(value)) return undefined;
  const info: TableInfo = {};
  const rows = toOptionalNumber(value.rows);
  const columns = toOptionalNumber(value.columns);
  const mergedChunks = toOptionalNumber(value.merged_chunks);
  if (rows !== undefined) info.rows = rows;
  if (columns !== undefined) info.columns = columns;
  if (typeof value.has_header === "boolean") info.hasHeader = value.has_header;
  if (mergedChunks !== undefined) info.mergedChunks = mergedChunks;
  if (Array.isArray(value.original_positions)) {
    info.originalPositions = value.original_positions.filter(
      (position): position is number => typeof position === "number"
    );
  }
  return Object.keys(info).length > 0 ? info : undefined;
}

/**
 * Validates one entry of a chunk file. Returns null for entries that cannot
 * be read as a chunk.
 */
export function chunkFromJson(value: unknown, fallbackPosition: number): ContentChunk | null {
  if (!isRecord(value)) return null;
  const contentType = value.content_type;
  if (!isContentType(contentType)) return null;

  const chunk: ContentChunk = {
    contentType,
    content: typeof value.content === "string" ? value.content : "",
    tagName: typeof value.tag_name === "string" ? value.tag_name : "",
    attributes: toStringMap(value.attributes),
    position: toOptionalNumber(value.position) ?? fallbackPosition,
  };

  const level = toOptionalNumber(value.level);
  const listType = toListType(value.list_type);
  const tableInfo = parseTableInfo(value.table_info);
  if (level !== undefined) chunk.level = level;
  if (listType !== undefined) chunk.listType = listType;
  if (tableInfo !== undefined) chunk.tableInfo = tableInfo;
  return chunk;
}

export function chunksFromJson(data: unknown): ContentChunk[] {
  if (!Array.isArray(data)) {
    throw new Error("Chunk file must contain a JSON array");
  }

  const chunks: ContentChunk[] = [];
  data.forEach((entry, index) => {
    const chunk = chunkFromJson(entry, index);
    if (!chunk) {
      console.warn(`Skipping malformed chunk at index ${index}`);
      return;
    }
    chunks.push(chunk);
  });
  return chunks;
}

export function saveChunksToJson(chunks: ContentChunk[], filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(chunksToJson(chunks), null, 2), "utf-8");
}

export function loadChunksFromJson(filePath: string): ContentChunk[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return chunksFromJson(raw);
}
