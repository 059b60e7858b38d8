import fs from "fs";
import path from "path";
import { ContentChunk, ContentType } from "../parser/content.types";
import { loadChunksFromJson } from "../parser/chunk.serializer";
import { mergeConsecutiveTableChunks } from "./table.merger";
import {
  extractPaperMetadata,
  extractPaperTitle,
  PaperMetadata,
} from "./paper.metadata";
import { countTokens } from "./text.cleaner";

export interface RecordMetadata {
  name: string;
  type: string;
  html_class: string;
  token_count: number;
  tag_name: string;
  position: number;
  level?: number;
  list_type?: string;
  merged_chunks?: number;
}

export interface DatabaseRecord {
  id: number;
  content: string;
  metadata: RecordMetadata;
}

export interface ConvertOptions {
  includeEmpty?: boolean;
  mergeTables?: boolean;
}

export interface RecordSummary {
  totalRecords: number;
  totalTokens: number;
  byType: Record<string, number>;
}

const RECORD_TYPE_LABELS: Record<ContentType, string> = {
  heading: "header",
  paragraph: "paragraph",
  list: "list",
  table: "table",
  divider: "divider",
  image: "image",
  code_block: "code",
  quote: "quote",
  form: "form",
  navigation: "navigation",
  footer: "footer",
  header: "header",
  sidebar: "sidebar",
  unknown: "unknown",
};

// Kept even when their text is empty.
const ALWAYS_KEPT: ReadonlySet<ContentType> = new Set<ContentType>(["divider", "image"]);

export function filterEmptyContent(chunks: ContentChunk[]): ContentChunk[] {
  return chunks.filter(
    (chunk) => ALWAYS_KEPT.has(chunk.contentType) || chunk.content.trim().length > 0
  );
}

export function emptyPaperMetadata(title: string): PaperMetadata {
  return {
    title,
    authors: [],
    institutions: [],
    authorsText: "",
    abstract: "",
    keywords: [],
    doi: "",
  };
}

export function convertChunkToRecord(
  chunk: ContentChunk,
  paper: PaperMetadata,
  id: number
): DatabaseRecord {
  const content = chunk.content.trim();

  const metadata: RecordMetadata = {
    name: paper.title,
    type: RECORD_TYPE_LABELS[chunk.contentType],
    html_class: chunk.attributes.class ?? "",
    token_count: countTokens(content),
    tag_name: chunk.tagName,
    position: chunk.position,
  };

  if (chunk.contentType === "heading" && chunk.level) {
    metadata.level = chunk.level;
  }
  if (chunk.contentType === "list" && chunk.listType) {
    metadata.list_type = chunk.listType;
  }
  // originalPositions is a list and cannot be stored; only the count crosses over.
  if (chunk.contentType === "table" && chunk.tableInfo?.mergedChunks !== undefined) {
    metadata.merged_chunks = chunk.tableInfo.mergedChunks;
  }

  return { id, content, metadata };
}

function describePaper(paper: PaperMetadata): void {
  console.log(`Paper title: ${paper.title}`);
  console.log(`Authors: ${paper.authors.length > 0 ? paper.authors.join(", ") : "Not found"}`);
  console.log(
    `Institutions: ${paper.institutions.length > 0 ? paper.institutions.join(", ") : "Not found"}`
  );
}

export function resolvePaperMetadata(chunks: ContentChunk[]): PaperMetadata {
  try {
    return extractPaperMetadata(chunks);
  } catch (error) {
    console.warn("Error extracting paper metadata, falling back to title only:", error);
    return emptyPaperMetadata(extractPaperTitle(chunks));
  }
}

/**
 * Metadata → filter → table merge → records numbered from 1.
 */
export function convertChunksToRecords(
  chunks: ContentChunk[],
  options: ConvertOptions = {},
  convert: typeof convertChunkToRecord = convertChunkToRecord
): DatabaseRecord[] {
  const paper = resolvePaperMetadata(chunks);
  describePaper(paper);

  let working = chunks;
  if (!options.includeEmpty) {
    working = filterEmptyContent(working);
    console.log(`Filtered out ${chunks.length - working.length} empty chunks`);
  }

  if (options.mergeTables !== false) {
    working = mergeConsecutiveTableChunks(working);
  } else {
    console.log("Table merging disabled");
  }

  const records: DatabaseRecord[] = [];
  for (const chunk of working) {
    const id = records.length + 1;
    try {
      records.push(convert(chunk, paper, id));
    } catch (error) {
      console.warn(`Error converting chunk ${id} (position ${chunk.position}):`, error);
    }
  }

  console.log(`Converted ${records.length} chunks to database format`);
  return records;
}

export function saveRecordsToJson(records: DatabaseRecord[], filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(records, null, 2), "utf-8");
}

/**
 * Reads a chunk file and converts it. A missing or unreadable input yields an
 * empty list; a failed write is logged and the records are still returned.
 */
export function convertChunkFileToRecords(
  inputPath: string,
  outputPath?: string,
  options: ConvertOptions = {}
): DatabaseRecord[] {
  console.log(`Loading chunks from: ${inputPath}`);

  let chunks: ContentChunk[];
  try {
    chunks = loadChunksFromJson(inputPath);
  } catch (error) {
    console.error(`Error reading chunk file ${inputPath}:`, error);
    return [];
  }
  console.log(`Loaded ${chunks.length} chunks`);

  const records = convertChunksToRecords(chunks, options);

  if (outputPath) {
    try {
      saveRecordsToJson(records, outputPath);
      console.log(`Saved database format to: ${outputPath}`);
    } catch (error) {
      console.error(`Error saving to ${outputPath}:`, error);
    }
  }

  return records;
}

export function summarizeRecords(records: DatabaseRecord[]): RecordSummary {
  const byType: Record<string, number> = {};
  let totalTokens = 0;
  for (const record of records) {
    byType[record.metadata.type] = (byType[record.metadata.type] ?? 0) + 1;
    totalTokens += record.metadata.token_count;
  }
  return { totalRecords: records.length, totalTokens, byType };
}

if (require.main === module) {
  const [inputPath, outputPath] = process.argv.slice(2);
  if (!inputPath) {
    console.error("Usage: convert <chunks.json> [database.json] [--keep-empty] [--no-merge]");
    process.exit(1);
  }

  const flags = new Set(process.argv.slice(2).filter((arg) => arg.startsWith("--")));
  const target = outputPath && !outputPath.startsWith("--")
    ? outputPath
    : inputPath.replace(/_chunks\.json$|\.json$/, "_database.json");

  const records = convertChunkFileToRecords(inputPath, target, {
    includeEmpty: flags.has("--keep-empty"),
    mergeTables: !flags.has("--no-merge"),
  });
  console.log(JSON.stringify(summarizeRecords(records), null, 2));
}
