import { describe, it } from "node:test";
import assert from "assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { ContentChunk } from "../modules/parser/content.types";
import {
  chunkFromJson,
  chunksFromJson,
  chunkToJson,
  loadChunksFromJson,
  saveChunksToJson,
} from "../modules/parser/chunk.serializer";

const heading: ContentChunk = {
  contentType: "heading",
  content: "Intro",
  tagName: "h2",
  attributes: { id: "intro" },
  level: 2,
  position: 0,
};

const table: ContentChunk = {
  contentType: "table",
  content: "A | B",
  tagName: "table",
  attributes: {},
  tableInfo: { rows: 2, columns: 3, hasHeader: true },
  position: 1,
};

describe("chunkToJson", () => {
  it("writes snake_case keys and nulls for absent fields", () => {
    assert.deepEqual(chunkToJson(heading), {
      content_type: "heading",
      content: "Intro",
      tag_name: "h2",
      attributes: { id: "intro" },
      level: 2,
      list_type: null,
      table_info: null,
      position: 0,
    });
  });

  it("renames table info fields", () => {
    assert.deepEqual(chunkToJson(table).table_info, { rows: 2, columns: 3, has_header: true });
  });
});

describe("chunkFromJson", () => {
  it("reads back what chunkToJson wrote", () => {
    assert.deepEqual(chunkFromJson(chunkToJson(heading), 0), heading);
    assert.deepEqual(chunkFromJson(chunkToJson(table), 0), table);
  });

  it("rejects entries without a known content type", () => {
    assert.equal(chunkFromJson({ content_type: "bogus", content: "x" }, 0), null);
    assert.equal(chunkFromJson("paragraph", 0), null);
  });

  it("fills defaults and joins list-valued attributes", () => {
    assert.deepEqual(
      chunkFromJson({ content_type: "paragraph", content: "x", attributes: { class: ["a", "b"] } }, 4),
      {
        contentType: "paragraph",
        content: "x",
        tagName: "",
        attributes: { class: "a b" },
        position: 4,
      }
    );
  });
});

describe("chunksFromJson", () => {
  it("requires an array", () => {
    assert.throws(() => chunksFromJson({}), /JSON array/);
  });

  it("skips malformed entries", () => {
    const chunks = chunksFromJson([chunkToJson(heading), 42]);
    assert.equal(chunks.length, 1);
    assert.equal(chunks[0].content, "Intro");
  });
});

describe("chunk files", () => {
  it("saves pretty-printed JSON and loads it back", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chunks-"));
    const filePath = path.join(dir, "nested", "paper_chunks.json");

    saveChunksToJson([heading, table], filePath);

    assert.ok(fs.readFileSync(filePath, "utf-8").startsWith('[\n  {\n    "content_type": "heading"'));
    assert.deepEqual(loadChunksFromJson(filePath), [heading, table]);

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
