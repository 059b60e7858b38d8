export interface PipelinePaths {
  pdfDir: string;
  htmlDir: string;
  jsonDir: string;
  databaseDir: string;
}

export interface PaperFiles {
  baseName: string;
  pdf: string;
  html: string;
  json: string;
  database: string;
}

export type StageName = "pdfToHtml" | "htmlToJson" | "jsonToDatabase" | "databaseToVector";

export type StageResults = Record<StageName, boolean>;

export interface ProcessedPaper {
  pdfName: string;
  results: StageResults;
  success: boolean;
}

export interface PipelineError {
  pdfName: string;
  failedStages?: StageName[];
  error?: string;
}

export interface PipelineRunResult {
  status: "no_files" | "completed";
  totalPdfs: number;
  processed: ProcessedPaper[];
  errors: PipelineError[];
}

export interface PaperStatus {
  name: string;
  htmlExists: boolean;
  jsonExists: boolean;
  databaseExists: boolean;
  needsHtml: boolean;
  needsJson: boolean;
  needsDatabase: boolean;
  needsVector: boolean;
}

export interface ProcessingStatus {
  totalPdfs: number;
  pdfs: PaperStatus[];
}
