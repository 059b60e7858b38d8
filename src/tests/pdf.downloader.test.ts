import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { downloadPdfs, pdfFileNameFor } from "../modules/converter/pdf.downloader";

describe("pdfFileNameFor", () => {
  it("adds a .pdf extension to the last path segment", () => {
    assert.equal(pdfFileNameFor("https://example.org/pdf/1234.5678"), "1234.5678.pdf");
    assert.equal(pdfFileNameFor("https://example.org/pdf/1234.5678/"), "1234.5678.pdf");
  });

  it("keeps an existing extension", () => {
    assert.equal(pdfFileNameFor("https://example.org/papers/Graph.PDF?v=2"), "Graph.PDF");
  });

  it("rejects URLs without a path", () => {
    assert.throws(() => pdfFileNameFor("https://example.org/"), /Cannot derive a file name/);
  });
});

describe("downloadPdfs", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "downloads-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves each download and skips failures", async () => {
    const pdfDir = path.join(dir, "pdfs");
    const requested: string[] = [];

    const result = await downloadPdfs(
      [
        "https://example.org/pdf/1234.5678",
        "https://example.org/missing",
        "https://example.org/",
        "https://example.org/papers/b.pdf",
      ],
      pdfDir,
      async (url) => {
        requested.push(url);
        if (url.endsWith("missing")) throw new Error("HTTP 404 Not Found");
        return Buffer.from(`%PDF-1.4 ${url}`);
      }
    );

    assert.deepEqual(result, {
      downloaded: [path.join(pdfDir, "1234.5678.pdf"), path.join(pdfDir, "b.pdf")],
      failed: [
        { url: "https://example.org/missing", error: "HTTP 404 Not Found" },
        {
          url: "https://example.org/",
          error: "Cannot derive a file name from https://example.org/",
        },
      ],
    });
    assert.deepEqual(requested, [
      "https://example.org/pdf/1234.5678",
      "https://example.org/missing",
      "https://example.org/papers/b.pdf",
    ]);
    assert.equal(
      fs.readFileSync(path.join(pdfDir, "b.pdf"), "utf-8"),
      "%PDF-1.4 https://example.org/papers/b.pdf"
    );
    assert.deepEqual(fs.readdirSync(pdfDir).sort(), ["1234.5678.pdf", "b.pdf"]);
  });
});
