import { describe, it } from "node:test";
import assert from "assert/strict";
import { ContentChunk, ContentType } from "../modules/parser/content.types";
import { mergeConsecutiveTableChunks } from "../modules/normalizer/table.merger";

function chunk(contentType: ContentType, content: string, position: number): ContentChunk {
  return {
    contentType,
    content,
    tagName: contentType === "table" ? "tr" : "p",
    attributes: { "data-pos": String(position) },
    position,
  };
}

describe("mergeConsecutiveTableChunks", () => {
  it("merges a run of table chunks into one", () => {
    const paragraph = chunk("paragraph", "x", 2);
    const merged = mergeConsecutiveTableChunks([
      chunk("table", "a|b", 0),
      chunk("table", "c|d", 1),
      paragraph,
    ]);

    assert.equal(merged.length, 2);
    assert.deepEqual(merged[0], {
      contentType: "table",
      content: "a|b | c|d",
      tagName: "tr",
      attributes: { "data-pos": "0" },
      position: 0,
      tableInfo: { mergedChunks: 2, originalPositions: [0, 1] },
    });
    assert.equal(merged[1], paragraph);
  });

  it("leaves a single table chunk untouched", () => {
    const single = chunk("table", "a|b", 0);
    const merged = mergeConsecutiveTableChunks([single, chunk("paragraph", "x", 1)]);
    assert.equal(merged[0], single);
    assert.equal(merged[0].tableInfo, undefined);
  });

  it("does not merge across other chunks", () => {
    const input = [chunk("table", "a", 0), chunk("paragraph", "x", 1), chunk("table", "b", 2)];
    assert.deepEqual(mergeConsecutiveTableChunks(input), input);
  });

  it("drops blank cells from the merged text", () => {
    const [merged] = mergeConsecutiveTableChunks([
      chunk("table", " a ", 3),
      chunk("table", "  ", 4),
      chunk("table", "b", 5),
    ]);
    assert.equal(merged.content, "a | b");
    assert.deepEqual(merged.tableInfo, { mergedChunks: 3, originalPositions: [3, 4, 5] });
  });

  it("is idempotent", () => {
    const input = [
      chunk("heading", "T", 0),
      chunk("table", "a", 1),
      chunk("table", "b", 2),
      chunk("paragraph", "x", 3),
      chunk("table", "c", 4),
      chunk("table", "d", 5),
    ];
    const once = mergeConsecutiveTableChunks(input);
    assert.deepEqual(mergeConsecutiveTableChunks(once), once);
    assert.deepEqual(
      once.map((item) => item.content),
      ["T", "a | b", "x", "c | d"]
    );
  });

  it("keeps every non-table chunk", () => {
    const input = [chunk("heading", "T", 0), chunk("table", "a", 1), chunk("table", "b", 2)];
    const merged = mergeConsecutiveTableChunks(input);
    assert.equal(merged.filter((item) => item.contentType !== "table").length, 1);
  });

  it("handles an empty list", () => {
    assert.deepEqual(mergeConsecutiveTableChunks([]), []);
  });
});
