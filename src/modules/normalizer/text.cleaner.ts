const HTML_TAG_PATTERN = /<[^>]+>/g;
// Anything that is not a letter, digit, underscore or whitespace.
const PUNCTUATION_PATTERN = /[^\p{L}\p{N}_\s]/gu;

export function stripHtmlTags(input: string): string {
  return input.replace(HTML_TAG_PATTERN, "");
}

export function cleanupWhitespace(input: string): string {
  return input
    .replace(/\u00a0/g, " ")
    .replace(/\t/g, " ")
    .replace(/\r/g, "")
    .replace(/[ ]{2,}/g, " ")
    .trim();
}

/**
 * Word-ish token count used as a size metric for records. Deterministic for a
 * given input.
 */
export function countTokens(text: string): number {
  if (!text || text.trim().length === 0) return 0;

  const withoutTags = stripHtmlTags(text);
  const withoutPunctuation = withoutTags.replace(PUNCTUATION_PATTERN, " ");
  return withoutPunctuation.split(/\s+/).filter((token) => token.length > 0).length;
}
