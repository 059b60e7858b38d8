export type ContentType =
  | "heading"
  | "paragraph"
  | "list"
  | "table"
  | "divider"
  | "image"
  | "code_block"
  | "quote"
  | "form"
  | "navigation"
  | "footer"
  | "header"
  | "sidebar"
  | "unknown";

export const CONTENT_TYPES: readonly ContentType[] = [
  "heading",
  "paragraph",
  "list",
  "table",
  "divider",
  "image",
  "code_block",
  "quote",
  "form",
  "navigation",
  "footer",
  "header",
  "sidebar",
  "unknown",
];

export type ListType = "ul" | "ol";

export interface TableInfo {
  rows?: number;
  columns?: number;
  hasHeader?: boolean;
  /** Set on a chunk produced by merging a run of table chunks. */
  mergedChunks?: number;
  originalPositions?: number[];
}

export interface ContentChunk {
  contentType: ContentType;
  content: string;
  tagName: string;
  attributes: Record<string, string>;
  level?: number;
  listType?: ListType;
  tableInfo?: TableInfo;
  position: number;
}

/**
 * On-disk shape of a chunk, one JSON array per source document.
 */
export interface SerializedChunk {
  content_type: ContentType;
  content: string;
  tag_name: string;
  attributes: Record<string, string>;
  level: number | null;
  list_type: ListType | null;
  table_info: SerializedTableInfo | null;
  position: number;
}

export interface SerializedTableInfo {
  rows?: number;
  columns?: number;
  has_header?: boolean;
  merged_chunks?: number;
  original_positions?: number[];
}

export function isContentType(value: unknown): value is ContentType {
  return typeof value === "string" && CONTENT_TYPES.some((type) => type === value);
}
