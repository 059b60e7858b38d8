import fs from "fs";
import path from "path";
import { generate, ollamaConfig } from "../llm/ollama.service";
import type { ParsedPdfDocument } from "./pdf.parser";

export interface HtmlGeneratorDeps {
  readPdf: (buffer: Buffer) => Promise<ParsedPdfDocument>;
  generate: (prompt: string, modelName?: string) => Promise<string>;
}

const defaultDeps: HtmlGeneratorDeps = {
  // pdf-parse pulls in pdf.js; load it only when a PDF is actually read.
  readPdf: async (buffer) => {
    const { extractPdfText } = await import("./pdf.parser");
    return extractPdfText(buffer);
  },
  generate,
};

export function buildConversionPrompt(document: ParsedPdfDocument): string {
  const titleLine = document.title ? `Document title: ${document.title}\n\n` : "";

  return `Convert the following text extracted from a PDF research paper into clean HTML.

Rules:
- Preserve the structure: headings, paragraphs, lists and tables.
- Use semantic HTML tags only: <h1>-<h6>, <p>, <ul>, <ol>, <li>, <table>, <thead>, <tbody>, <tr>, <th>, <td>, <blockquote>, <pre>, <hr>.
- Put the paper title in a single <h1>.
- Put the author names and affiliations in one <p class="authors">.
- Do not include any styling, CSS or scripts.
- Return only the HTML.

${titleLine}Extracted text:
${document.rawText}

HTML:`;
}

export function htmlPathFor(pdfPath: string, htmlDir: string): string {
  const baseName = path.basename(pdfPath, path.extname(pdfPath));
  return path.join(htmlDir, `${baseName}.html`);
}

/**
 * Converts one PDF to HTML with the configured Ollama model and writes
 * `<htmlDir>/<basename>.html`.
 * @returns Path of the written HTML file
 */
export async function generateHtmlFromPdf(
  pdfPath: string,
  htmlDir: string,
  deps: HtmlGeneratorDeps = defaultDeps
): Promise<string> {
  const document = await deps.readPdf(fs.readFileSync(pdfPath));
  if (!document.rawText.trim()) {
    throw new Error(`No text could be extracted from ${pdfPath}`);
  }

  const html = await deps.generate(
    buildConversionPrompt(document),
    ollamaConfig.conversionModel
  );

  fs.mkdirSync(htmlDir, { recursive: true });
  const htmlPath = htmlPathFor(pdfPath, htmlDir);
  fs.writeFileSync(htmlPath, html, "utf-8");

  console.log(`Generated HTML from ${pdfPath} -> ${htmlPath}`);
  return htmlPath;
}
