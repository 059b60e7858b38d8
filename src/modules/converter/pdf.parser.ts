import { PDFParse } from "pdf-parse";
import { cleanupWhitespace } from "../normalizer/text.cleaner";

export interface ParsedPdfDocument {
  title?: string;
  rawText: string;
  pageCount: number;
}

export async function extractPdfText(pdfBuffer: Buffer): Promise<ParsedPdfDocument> {
  const parser = new PDFParse({ data: new Uint8Array(pdfBuffer) });

  let rawText = "";
  let pageCount = 0;
  let title: string | undefined;
  try {
    const textResult = await parser.getText();
    rawText = textResult.text || textResult.pages.map((page) => page.text).join("\n");
    pageCount = textResult.pages.length;

    try {
      const infoResult = await parser.getInfo();
      const docTitle =
        typeof infoResult.info?.Title === "string"
          ? infoResult.info.Title
          : undefined;
      if (docTitle && docTitle.trim().length > 0) title = docTitle.trim();
    } catch (error) {
      // Title is optional.
      console.warn("PDF metadata unavailable:", error);
    }
  } finally {
    await parser.destroy();
  }

  return {
    title,
    rawText: cleanupWhitespace(rawText),
    pageCount,
  };
}
