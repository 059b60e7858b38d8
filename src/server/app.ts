import express, { Application, Request, Response } from "express";
import { defaultAgentDeps, runAgent } from "../modules/agent/agent.service";
import { parseHtmlContent, summarizeChunkTypes } from "../modules/parser/html.classifier";
import { chunksToJson } from "../modules/parser/chunk.serializer";
import {
  convertChunksToRecords,
  summarizeRecords,
} from "../modules/normalizer/record.converter";
import {
  chromaVectorStore,
  getCollectionInfo,
  listPaperCollections,
  VectorStore,
} from "../modules/vector/paper.indexer";

const CONNECTION_ERRORS = ["econnrefused", "enotfound", "fetch failed"];

export function toErrorMessage(error: unknown, fallback: string): string {
  if (!(error instanceof Error)) return fallback;
  const lower = error.message.toLowerCase();
  if (CONNECTION_ERRORS.some((marker) => lower.includes(marker))) {
    return "Ollama or ChromaDB is not running or not reachable.";
  }
  if (lower.includes("model") && lower.includes("not found")) {
    return "Requested Ollama model was not found.";
  }
  if (lower.includes("does not exist")) {
    return error.message;
  }
  return fallback;
}

function isMissingCollection(error: unknown): boolean {
  return error instanceof Error && error.message.includes("does not exist");
}

export function createApp(store: VectorStore = chromaVectorStore): Application {
  const app: Application = express();

  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.get("/papers", async (_req: Request, res: Response) => {
    try {
      const names = await listPaperCollections(store);
      const papers = [];
      for (const name of names) {
        papers.push(await getCollectionInfo(name, store));
      }
      res.json({ success: true, papers });
    } catch (error) {
      console.error("Error in /papers endpoint:", error);
      res.status(500).json({ success: false, error: toErrorMessage(error, "Internal server error.") });
    }
  });

  app.get("/papers/:name", async (req: Request, res: Response) => {
    try {
      const collection = await store.findCollection(req.params.name);
      if (!collection) {
        return res
          .status(404)
          .json({ success: false, error: `Collection '${req.params.name}' does not exist.` });
      }
      res.json({ success: true, ...(await getCollectionInfo(req.params.name, store)) });
    } catch (error) {
      console.error("Error in /papers/:name endpoint:", error);
      res.status(500).json({ success: false, error: toErrorMessage(error, "Internal server error.") });
    }
  });

  app.post("/papers/:name/query", async (req: Request, res: Response) => {
    const query = req.body?.query;
    const nResults = req.body?.nResults;

    if (typeof query !== "string" || !query.trim()) {
      return res.status(400).json({
        success: false,
        error: "Field 'query' is required and must be a string.",
      });
    }

    try {
      const collection = await store.findCollection(req.params.name);
      if (!collection) {
        return res
          .status(404)
          .json({ success: false, error: `Collection '${req.params.name}' does not exist.` });
      }
      const topK = typeof nResults === "number" && nResults > 0 ? nResults : 5;
      const results = await store.query(collection.id, [query], topK);
      res.json({ success: true, results });
    } catch (error) {
      console.error("Error in /papers/:name/query endpoint:", error);
      res.status(500).json({ success: false, error: toErrorMessage(error, "Error querying collection.") });
    }
  });

  app.delete("/papers/:name", async (req: Request, res: Response) => {
    try {
      const collection = await store.findCollection(req.params.name);
      if (!collection) {
        return res
          .status(404)
          .json({ success: false, error: `Collection '${req.params.name}' does not exist.` });
      }
      await store.deleteCollection(req.params.name);
      res.json({ success: true, deleted: req.params.name });
    } catch (error) {
      console.error("Error in DELETE /papers/:name endpoint:", error);
      res.status(500).json({ success: false, error: toErrorMessage(error, "Error deleting collection.") });
    }
  });

  app.post("/ask", async (req: Request, res: Response) => {
    const question = req.body?.question;

    if (typeof question !== "string" || !question.trim()) {
      return res
        .status(400)
        .json({ success: false, error: "Field 'question' is required and must be a string." });
    }

    try {
      const result = await runAgent(question, { ...defaultAgentDeps, store });
      res.json({ success: true, ...result });
    } catch (error) {
      console.error("Error in /ask endpoint:", error);
      const status = isMissingCollection(error) ? 404 : 500;
      res.status(status).json({ success: false, error: toErrorMessage(error, "Internal server error.") });
    }
  });

  // Preview of classifier + normalizer output; nothing is persisted.
  app.post("/parse", (req: Request, res: Response) => {
    const html = req.body?.html;

    if (typeof html !== "string") {
      return res
        .status(400)
        .json({ success: false, error: "Field 'html' is required and must be a string." });
    }

    const chunks = parseHtmlContent(html);
    const records = convertChunksToRecords(chunks);
    res.json({
      success: true,
      chunkTypes: summarizeChunkTypes(chunks),
      chunks: chunksToJson(chunks),
      records,
      summary: summarizeRecords(records),
    });
  });

  return app;
}

export default createApp();
