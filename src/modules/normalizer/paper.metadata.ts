import { ContentChunk } from "../parser/content.types";
import { stripHtmlTags } from "./text.cleaner";

export interface PaperMetadata {
  title: string;
  authors: string[];
  institutions: string[];
  authorsText: string;
  abstract: string;
  keywords: string[];
  doi: string;
}

export const UNTITLED_PAPER = "Untitled Paper";

const AUTHOR_ATTRIBUTE_PATTERN = /\b(authors?|byline|contributors)\b/i;
const AUTHOR_BLOCK_WORDS = ["consulting", "bureau", "university", "institute", "laboratory"];
const INSTITUTION_WORDS = [...AUTHOR_BLOCK_WORDS, "company", "inc", "ltd"];
const NAME_SEPARATOR = /,\s*|\s+and\s+|\s*&\s*/;
const TITLE_FALLBACK_LENGTH = 100;

function mentionsAny(text: string, words: string[]): boolean {
  const lower = text.toLowerCase();
  return words.some((word) => lower.includes(word));
}

function splitNames(text: string): string[] {
  return text
    .split(NAME_SEPARATOR)
    .map((name) => name.trim())
    .filter(Boolean);
}

/**
 * Title precedence: first h1, then any heading, then the first non-empty
 * chunk cut to 100 characters.
 */
export function extractPaperTitle(chunks: ContentChunk[]): string {
  const withContent = chunks.filter((chunk) => chunk.content.trim().length > 0);

  const h1 = withContent.find(
    (chunk) => chunk.contentType === "heading" && chunk.level === 1
  );
  if (h1) return h1.content.trim();

  const heading = withContent.find((chunk) => chunk.contentType === "heading");
  if (heading) return heading.content.trim();

  const first = withContent[0];
  if (first) return `${first.content.trim().slice(0, TITLE_FALLBACK_LENGTH)}...`;

  return UNTITLED_PAPER;
}

/**
 * Heuristic split of an author block into names and affiliations. Either
 * "names / affiliation / more affiliations" over several lines, or a single
 * comma list whose last entry is the affiliation.
 */
export function parseAuthorsAndInstitutions(text: string): {
  authors: string[];
  institutions: string[];
} {
  const cleaned = stripHtmlTags(text.replace(/<br\s*\/?>/gi, "\n")).trim();
  const lines = cleaned.split(/\n|;/);

  let authors: string[] = [];
  let institutions: string[] = [];

  if (lines.length >= 2) {
    authors = splitNames(lines[0]);
    institutions = [lines[1].trim()];
    for (const line of lines.slice(2)) {
      const trimmed = line.trim();
      if (trimmed && mentionsAny(trimmed, INSTITUTION_WORDS)) {
        institutions.push(trimmed);
      }
    }
  } else if (cleaned.includes(",")) {
    const parts = cleaned.split(",");
    institutions = [parts[parts.length - 1].trim()];
    authors = splitNames(parts.slice(0, -1).join(","));
  }

  return {
    authors: authors.filter((name) => name.length > 1 && !/^\d+$/.test(name)),
    institutions: institutions.filter((name) => name.length > 3),
  };
}

function isAuthorBlock(chunk: ContentChunk): boolean {
  const className = chunk.attributes.class ?? "";
  const id = chunk.attributes.id ?? "";
  return (
    AUTHOR_ATTRIBUTE_PATTERN.test(className) ||
    AUTHOR_ATTRIBUTE_PATTERN.test(id) ||
    className.toLowerCase().includes("author")
  );
}

function looksLikeAuthorLine(content: string): boolean {
  return (
    content.includes(",") &&
    content.split(",").length >= 3 &&
    mentionsAny(content, AUTHOR_BLOCK_WORDS)
  );
}

export function extractAuthorsAndInstitutions(chunks: ContentChunk[]): {
  authors: string[];
  institutions: string[];
  authorsText: string;
} {
  const block =
    chunks.find((chunk) => chunk.content && isAuthorBlock(chunk)) ??
    chunks.find((chunk) => chunk.content && looksLikeAuthorLine(chunk.content));

  if (!block) return { authors: [], institutions: [], authorsText: "" };

  return {
    ...parseAuthorsAndInstitutions(block.content),
    authorsText: block.content,
  };
}

export function extractPaperMetadata(chunks: ContentChunk[]): PaperMetadata {
  const title = extractPaperTitle(chunks);
  const { authors, institutions, authorsText } = extractAuthorsAndInstitutions(chunks);

  let abstract = "";
  let keywords: string[] = [];
  let doi = "";

  for (const chunk of chunks) {
    const content = chunk.content;
    const lower = content.toLowerCase();

    if (chunk.contentType === "paragraph" && lower.slice(0, 50).includes("abstract")) {
      abstract = content;
    }

    if (lower.includes("keywords") && content.includes(":")) {
      const afterColon = content.slice(content.indexOf(":") + 1);
      keywords = afterColon
        .split(",")
        .map((keyword) => keyword.trim())
        .filter(Boolean);
    }

    if (lower.includes("doi:")) {
      const match = content.match(/doi:\s*(\S+)/i);
      if (match) doi = match[1];
    }
  }

  return { title, authors, institutions, authorsText, abstract, keywords, doi };
}
