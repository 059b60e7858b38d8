import { load, CheerioAPI } from "cheerio";
import { isTag, isText } from "domhandler";
import type { Element } from "domhandler";
import { ContentChunk, ContentType, ListType, TableInfo } from "./content.types";

type ChunkBody = Pick<ContentChunk, "content" | "level" | "listType" | "tableInfo">;

/**
 * Builds the content-specific part of a chunk. Returning null suppresses the
 * element.
 */
type Extractor = (el: Element, $: CheerioAPI) => ChunkBody | null;

// Never emitted as chunks of their own.
const IGNORED_TAGS = new Set<string>([
  "script",
  "style",
  "noscript",
  "meta",
  "link",
  "title",
  "head",
  "html",
  "body",
  "div",
  "span",
  "section",
  "article",
  "main",
]);

const TAG_CATEGORIES: Record<string, ContentType> = {
  h1: "heading",
  h2: "heading",
  h3: "heading",
  h4: "heading",
  h5: "heading",
  h6: "heading",
  p: "paragraph",
  ul: "list",
  ol: "list",
  li: "list",
  table: "table",
  thead: "table",
  tbody: "table",
  tfoot: "table",
  tr: "table",
  th: "table",
  td: "table",
  hr: "divider",
  img: "image",
  pre: "code_block",
  code: "code_block",
  blockquote: "quote",
  q: "quote",
  form: "form",
  input: "form",
  textarea: "form",
  select: "form",
  button: "form",
  nav: "navigation",
  footer: "footer",
  header: "header",
  aside: "sidebar",
};

function tagNameOf(el: Element): string {
  return el.name.toLowerCase();
}

function compact(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Direct text of an element, joined with single spaces. Ignored children
 * (containers, scripts, styles and the like) are descended into; every other
 * child element is left out because it yields a chunk of its own.
 */
export function extractTextContent(el: Element): string {
  const parts: string[] = [];
  for (const child of el.children) {
    if (isText(child)) {
      const text = compact(child.data);
      if (text) parts.push(text);
      continue;
    }
    if (isTag(child) && IGNORED_TAGS.has(tagNameOf(child))) {
      const text = extractTextContent(child);
      if (text) parts.push(text);
    }
  }
  return parts.join(" ");
}

function extractListContent(el: Element, $: CheerioAPI): string {
  if (tagNameOf(el) === "li") return extractTextContent(el);

  const items: string[] = [];
  $(el)
    .children("li")
    .each((_index, li) => {
      const text = extractTextContent(li);
      if (text) items.push(`• ${text}`);
    });
  return items.join("\n");
}

function extractTableContent(el: Element, $: CheerioAPI): string {
  const tag = tagNameOf(el);
  if (tag === "th" || tag === "td") return extractTextContent(el);

  const cells: string[] = [];
  $(el)
    .find("th, td")
    .each((_index, cell) => {
      const text = extractTextContent(cell);
      if (text) cells.push(text);
    });
  return cells.join(" | ");
}

function extractTableInfo(el: Element, $: CheerioAPI): TableInfo | undefined {
  if (tagNameOf(el) !== "table") return undefined;

  const rows = $(el).find("tr").toArray();
  let columns = 0;
  for (const row of rows) {
    columns = Math.max(columns, $(row).find("th, td").length);
  }

  return {
    rows: rows.length,
    columns,
    hasHeader: $(el).find("thead, th").length > 0,
  };
}

function extractFormContent(el: Element, $: CheerioAPI): string {
  if (tagNameOf(el) !== "form") return extractTextContent(el);

  const fields: string[] = [];
  $(el)
    .find("input, textarea, select")
    .each((_index, field) => {
      const type = field.attribs.type || "text";
      const name = field.attribs.name ?? "";
      const placeholder = field.attribs.placeholder ?? "";
      fields.push(`[${type}: ${name}] ${placeholder}`);
    });
  return fields.join(" | ");
}

const textOnly: Extractor = (el) => ({ content: extractTextContent(el) });

const EXTRACTORS: Record<ContentType, Extractor> = {
  heading: (el) => ({
    content: extractTextContent(el),
    level: Number(tagNameOf(el).charAt(1)),
  }),
  paragraph: textOnly,
  list: (el, $) => {
    const tag = tagNameOf(el);
    const listType: ListType | undefined =
      tag === "ul" || tag === "ol" ? tag : undefined;
    return { content: extractListContent(el, $), listType };
  },
  table: (el, $) => ({
    content: extractTableContent(el, $),
    tableInfo: extractTableInfo(el, $),
  }),
  divider: () => ({ content: "---" }),
  image: (el) => {
    const src = el.attribs.src ?? "";
    const alt = el.attribs.alt ?? "";
    return { content: alt ? `[Image: ${alt}] (${src})` : `[Image] (${src})` };
  },
  code_block: textOnly,
  quote: textOnly,
  form: (el, $) => ({ content: extractFormContent(el, $) }),
  navigation: textOnly,
  footer: textOnly,
  header: textOnly,
  sidebar: textOnly,
  unknown: (el) => {
    const content = extractTextContent(el);
    return content ? { content } : null;
  },
};

/**
 * Strips the markdown fence a generative converter tends to wrap HTML in.
 */
export function cleanHtmlString(html: string): string {
  let cleaned = html.trim();
  if (cleaned.startsWith("```html")) cleaned = cleaned.slice("```html".length);
  if (cleaned.endsWith("```")) cleaned = cleaned.slice(0, -3);
  return cleaned.trim();
}

export function classifyElement(tagName: string): ContentType | null {
  const tag = tagName.toLowerCase();
  if (IGNORED_TAGS.has(tag)) return null;
  return TAG_CATEGORIES[tag] ?? "unknown";
}

/**
 * Walks the document in order and emits at most one chunk per element.
 * Positions count emitted chunks only.
 */
export function parseHtmlContent(html: string): ContentChunk[] {
  const cleaned = cleanHtmlString(html);
  if (!cleaned) return [];

  // htmlparser2 keeps the markup as written: no implied html/body and no
  // re-parenting of stray table rows.
  const $ = load(cleaned, { xml: { xmlMode: false, decodeEntities: true } });
  const chunks: ContentChunk[] = [];

  $("*").each((_index, el) => {
    if (!isTag(el)) return;
    const contentType = classifyElement(el.name);
    if (!contentType) return;

    try {
      const body = EXTRACTORS[contentType](el, $);
      if (!body) return;

      const chunk: ContentChunk = {
        contentType,
        content: body.content,
        tagName: tagNameOf(el),
        attributes: { ...el.attribs },
        position: chunks.length,
      };
      if (body.level !== undefined) chunk.level = body.level;
      if (body.listType !== undefined) chunk.listType = body.listType;
      if (body.tableInfo !== undefined) chunk.tableInfo = body.tableInfo;
      chunks.push(chunk);
    } catch (error) {
      console.warn(`Skipping <${el.name}> element:`, error);
    }
  });

  return chunks;
}

export function getChunksByType(
  chunks: ContentChunk[],
  contentType: ContentType
): ContentChunk[] {
  return chunks.filter((chunk) => chunk.contentType === contentType);
}

export function summarizeChunkTypes(
  chunks: ContentChunk[]
): Partial<Record<ContentType, number>> {
  const summary: Partial<Record<ContentType, number>> = {};
  for (const chunk of chunks) {
    summary[chunk.contentType] = (summary[chunk.contentType] ?? 0) + 1;
  }
  return summary;
}
