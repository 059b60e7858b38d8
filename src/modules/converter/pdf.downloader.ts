import fs from "fs";
import path from "path";
import fetch from "node-fetch";
import { REQUEST_TIMEOUT_MS } from "../http/request.config";

export type PdfFetcher = (url: string) => Promise<Buffer>;

export interface DownloadFailure {
  url: string;
  error: string;
}

export interface DownloadResult {
  downloaded: string[];
  failed: DownloadFailure[];
}

async function fetchPdf(url: string): Promise<Buffer> {
  const response = await fetch(url, { timeout: REQUEST_TIMEOUT_MS });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }

  return response.buffer();
}

/**
 * `<last path segment>.pdf`, e.g. `https://host/pdf/1706.03762` → `1706.03762.pdf`.
 */
export function pdfFileNameFor(url: string): string {
  const segment = new URL(url).pathname.replace(/\/+$/, "").split("/").pop() ?? "";
  const name = decodeURIComponent(segment);
  if (!name) {
    throw new Error(`Cannot derive a file name from ${url}`);
  }
  return name.toLowerCase().endsWith(".pdf") ? name : `${name}.pdf`;
}

/**
 * Downloads every URL into `pdfDir`. A failed download is logged and skipped.
 */
export async function downloadPdfs(
  urls: string[],
  pdfDir: string,
  fetcher: PdfFetcher = fetchPdf
): Promise<DownloadResult> {
  fs.mkdirSync(pdfDir, { recursive: true });
  const result: DownloadResult = { downloaded: [], failed: [] };

  for (const url of urls) {
    try {
      const filePath = path.join(pdfDir, pdfFileNameFor(url));
      console.log(`Downloading ${path.basename(filePath)} from ${url}...`);

      fs.writeFileSync(filePath, await fetcher(url));
      result.downloaded.push(filePath);
      console.log(`✅ Downloaded ${path.basename(filePath)}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Failed to download ${url}: ${message}`);
      result.failed.push({ url, error: message });
    }
  }

  console.log(
    `Download complete: ${result.downloaded.length} saved, ${result.failed.length} failed (${pdfDir})`
  );
  return result;
}
