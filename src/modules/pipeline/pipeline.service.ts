import fs from "fs";
import path from "path";
import { generateHtmlFromPdf } from "../converter/html.generator";
import { parseHtmlContent } from "../parser/html.classifier";
import { loadChunksFromJson, saveChunksToJson } from "../parser/chunk.serializer";
import {
  convertChunksToRecords,
  saveRecordsToJson,
} from "../normalizer/record.converter";
import {
  getCollectionInfo,
  ingestPaper,
  listPaperCollections,
  PaperCollectionInfo,
} from "../vector/paper.indexer";
import {
  PaperFiles,
  PaperStatus,
  PipelineError,
  PipelinePaths,
  PipelineRunResult,
  ProcessedPaper,
  ProcessingStatus,
  StageName,
  StageResults,
} from "./pipeline.types";

/**
 * External collaborators of the pipeline: the generative converter and the
 * vector store.
 */
export interface PipelineDeps {
  generateHtml: (pdfPath: string, htmlDir: string) => Promise<string>;
  ingestPaper: (databaseJsonPath: string) => Promise<boolean>;
  listCollections: () => Promise<string[]>;
  getCollectionInfo: (name: string) => Promise<PaperCollectionInfo>;
}

export const defaultPipelineDeps: PipelineDeps = {
  generateHtml: (pdfPath, htmlDir) => generateHtmlFromPdf(pdfPath, htmlDir),
  ingestPaper: (databaseJsonPath) => ingestPaper(databaseJsonPath),
  listCollections: () => listPaperCollections(),
  getCollectionInfo: (name) => getCollectionInfo(name),
};

export function resolvePipelinePaths(
  root: string = process.env.PAPERS_ROOT ?? "documents"
): PipelinePaths {
  return {
    pdfDir: path.join(root, "pdfs"),
    htmlDir: path.join(root, "processed", "HTML"),
    jsonDir: path.join(root, "processed", "JSON"),
    databaseDir: path.join(root, "processed", "database"),
  };
}

export function ensurePipelineDirectories(paths: PipelinePaths): void {
  for (const dir of [paths.pdfDir, paths.htmlDir, paths.jsonDir, paths.databaseDir]) {
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
}

export function paperFiles(pdfPath: string, paths: PipelinePaths): PaperFiles {
  const baseName = path.basename(pdfPath, path.extname(pdfPath));
  return {
    baseName,
    pdf: pdfPath,
    html: path.join(paths.htmlDir, `${baseName}.html`),
    json: path.join(paths.jsonDir, `${baseName}_chunks.json`),
    database: path.join(paths.databaseDir, `${baseName}_database.json`),
  };
}

export function getPdfFiles(paths: PipelinePaths): string[] {
  if (!fs.existsSync(paths.pdfDir)) {
    console.warn(`PDF folder does not exist: ${paths.pdfDir}`);
    return [];
  }

  const files = fs
    .readdirSync(paths.pdfDir)
    .filter((file) => file.toLowerCase().endsWith(".pdf"))
    .sort()
    .map((file) => path.join(paths.pdfDir, file));
  console.log(`Found ${files.length} PDF files`);
  return files;
}

function isNewer(source: string, target: string): boolean {
  return fs.statSync(source).mtimeMs > fs.statSync(target).mtimeMs;
}

/**
 * A stage has work when its input exists and its output is missing or older
 * than the input.
 */
function needsStage(input: string, output: string, label: string, pdfName: string): boolean {
  if (!fs.existsSync(input)) {
    console.log(`No input for ${label}: ${pdfName}`);
    return false;
  }
  if (!fs.existsSync(output)) {
    console.log(`Needs ${label}: ${pdfName}`);
    return true;
  }
  if (isNewer(input, output)) {
    console.log(`Input is newer than output for ${label}: ${pdfName}`);
    return true;
  }
  return false;
}

export function needsHtmlProcessing(pdfPath: string, paths: PipelinePaths): boolean {
  const files = paperFiles(pdfPath, paths);
  return needsStage(files.pdf, files.html, "HTML conversion", path.basename(pdfPath));
}

export function needsJsonProcessing(pdfPath: string, paths: PipelinePaths): boolean {
  const files = paperFiles(pdfPath, paths);
  return needsStage(files.html, files.json, "chunk parsing", path.basename(pdfPath));
}

export function needsDatabaseProcessing(pdfPath: string, paths: PipelinePaths): boolean {
  const files = paperFiles(pdfPath, paths);
  return needsStage(files.json, files.database, "record conversion", path.basename(pdfPath));
}

/**
 * Vector ingestion upserts, so it runs whenever the records exist.
 */
export function needsVectorProcessing(pdfPath: string, paths: PipelinePaths): boolean {
  return fs.existsSync(paperFiles(pdfPath, paths).database);
}

export function processHtmlToJson(files: PaperFiles): void {
  const html = fs.readFileSync(files.html, "utf-8");
  const chunks = parseHtmlContent(html);
  saveChunksToJson(chunks, files.json);
  console.log(`Parsed ${chunks.length} chunks from ${files.html}`);
}

export function processJsonToDatabase(files: PaperFiles): void {
  const chunks = loadChunksFromJson(files.json);
  const records = convertChunksToRecords(chunks);
  saveRecordsToJson(records, files.database);
}

async function runStage(
  stage: StageName,
  pdfName: string,
  action: () => Promise<boolean> | boolean
): Promise<boolean> {
  try {
    const ok = await action();
    if (ok) {
      console.log(`✅ ${stage} succeeded for ${pdfName}`);
    } else {
      console.warn(`${stage} reported failure for ${pdfName}`);
    }
    return ok;
  } catch (error) {
    console.error(`${stage} failed for ${pdfName}:`, error);
    return false;
  }
}

/**
 * Runs every stale stage for one PDF. An already-current stage counts as a
 * success; a failed stage stops the stages after it.
 */
export async function processPaper(
  pdfPath: string,
  paths: PipelinePaths,
  deps: PipelineDeps = defaultPipelineDeps
): Promise<StageResults> {
  const pdfName = path.basename(pdfPath);
  const files = paperFiles(pdfPath, paths);
  console.log(`Processing PDF: ${pdfName}`);

  const results: StageResults = {
    pdfToHtml: false,
    htmlToJson: false,
    jsonToDatabase: false,
    databaseToVector: false,
  };

  results.pdfToHtml = needsHtmlProcessing(pdfPath, paths)
    ? await runStage("pdfToHtml", pdfName, async () => {
        await deps.generateHtml(pdfPath, paths.htmlDir);
        return true;
      })
    : true;
  if (!results.pdfToHtml) return results;

  results.htmlToJson = needsJsonProcessing(pdfPath, paths)
    ? await runStage("htmlToJson", pdfName, () => {
        processHtmlToJson(files);
        return true;
      })
    : true;
  if (!results.htmlToJson) return results;

  results.jsonToDatabase = needsDatabaseProcessing(pdfPath, paths)
    ? await runStage("jsonToDatabase", pdfName, () => {
        processJsonToDatabase(files);
        return true;
      })
    : true;
  if (!results.jsonToDatabase) return results;

  results.databaseToVector = needsVectorProcessing(pdfPath, paths)
    ? await runStage("databaseToVector", pdfName, () => deps.ingestPaper(files.database))
    : true;

  return results;
}

const STAGES: readonly StageName[] = [
  "pdfToHtml",
  "htmlToJson",
  "jsonToDatabase",
  "databaseToVector",
];

function failedStages(results: StageResults): StageName[] {
  return STAGES.filter((stage) => !results[stage]);
}

async function logSummary(result: PipelineRunResult, deps: PipelineDeps): Promise<void> {
  const successful = result.processed.filter((paper) => paper.success).length;

  console.log("=".repeat(50));
  console.log("PROCESSING PIPELINE SUMMARY");
  console.log("=".repeat(50));
  console.log(`Total PDFs: ${result.totalPdfs}`);
  console.log(`Successfully processed: ${successful}`);
  console.log(`Failed: ${result.totalPdfs - successful}`);

  for (const error of result.errors) {
    const detail = error.failedStages?.join(", ") ?? error.error ?? "Unknown error";
    console.log(`  - ${error.pdfName}: ${detail}`);
  }

  try {
    const collections = await deps.listCollections();
    console.log(`Vector collections: ${collections.length}`);
    for (const name of collections) {
      const info = await deps.getCollectionInfo(name);
      console.log(`  - ${name}: ${info.count} documents`);
    }
  } catch (error) {
    console.error("Could not read vector collections:", error);
  }
  console.log("=".repeat(50));
}

export async function runPipeline(
  paths: PipelinePaths = resolvePipelinePaths(),
  deps: PipelineDeps = defaultPipelineDeps
): Promise<PipelineRunResult> {
  console.log("Starting document processing pipeline");
  ensurePipelineDirectories(paths);

  const pdfFiles = getPdfFiles(paths);
  if (pdfFiles.length === 0) {
    console.warn("No PDF files found to process");
    return { status: "no_files", totalPdfs: 0, processed: [], errors: [] };
  }

  const processed: ProcessedPaper[] = [];
  const errors: PipelineError[] = [];

  for (const pdfPath of pdfFiles) {
    const pdfName = path.basename(pdfPath);
    try {
      const results = await processPaper(pdfPath, paths, deps);
      const failed = failedStages(results);
      processed.push({ pdfName, results, success: failed.length === 0 });
      if (failed.length > 0) errors.push({ pdfName, failedStages: failed });
    } catch (error) {
      console.error(`Unexpected error processing ${pdfName}:`, error);
      errors.push({
        pdfName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const result: PipelineRunResult = {
    status: "completed",
    totalPdfs: pdfFiles.length,
    processed,
    errors,
  };

  await logSummary(result, deps);
  return result;
}

export function getProcessingStatus(
  paths: PipelinePaths = resolvePipelinePaths()
): ProcessingStatus {
  const pdfs: PaperStatus[] = getPdfFiles(paths).map((pdfPath) => {
    const files = paperFiles(pdfPath, paths);
    return {
      name: path.basename(pdfPath),
      htmlExists: fs.existsSync(files.html),
      jsonExists: fs.existsSync(files.json),
      databaseExists: fs.existsSync(files.database),
      needsHtml: needsHtmlProcessing(pdfPath, paths),
      needsJson: needsJsonProcessing(pdfPath, paths),
      needsDatabase: needsDatabaseProcessing(pdfPath, paths),
      needsVector: needsVectorProcessing(pdfPath, paths),
    };
  });

  return { totalPdfs: pdfs.length, pdfs };
}
