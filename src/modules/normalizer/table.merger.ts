import { ContentChunk } from "../parser/content.types";

function mergeTableRun(run: ContentChunk[]): ContentChunk {
  const [first] = run;
  const content = run
    .map((chunk) => chunk.content.trim())
    .filter((text) => text.length > 0)
    .join(" | ");

  return {
    contentType: "table",
    content,
    tagName: first.tagName,
    attributes: first.attributes,
    position: first.position,
    tableInfo: {
      mergedChunks: run.length,
      originalPositions: run.map((chunk) => chunk.position),
    },
  };
}

/**
 * Collapses every run of two or more consecutive table chunks into one chunk.
 * Single table chunks and all other chunks pass through unchanged.
 */
export function mergeConsecutiveTableChunks(chunks: ContentChunk[]): ContentChunk[] {
  const merged: ContentChunk[] = [];
  let run: ContentChunk[] = [];
  let mergedRuns = 0;

  const flush = () => {
    if (run.length === 1) {
      merged.push(run[0]);
    } else if (run.length > 1) {
      merged.push(mergeTableRun(run));
      mergedRuns++;
    }
    run = [];
  };

  for (const chunk of chunks) {
    if (chunk.contentType === "table") {
      run.push(chunk);
      continue;
    }
    flush();
    merged.push(chunk);
  }
  flush();

  if (mergedRuns > 0) {
    const before = chunks.filter((chunk) => chunk.contentType === "table").length;
    const after = merged.filter((chunk) => chunk.contentType === "table").length;
    console.log(`Table merging: ${before} table chunks → ${after} table chunks`);
  }

  return merged;
}
