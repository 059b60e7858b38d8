import "dotenv/config";
import app from "./server/app";
import { chromaConfig } from "./modules/vector-db/chroma.service";
import { embeddingConfig } from "./modules/embeddings/embedding.service";
import { ollamaConfig } from "./modules/llm/ollama.service";

const PORT = parseInt(process.env.PORT ?? "4000", 10);

app.listen(PORT, () => {
  console.log(`Backend server is running on http://localhost:${PORT}`);
  console.log(`Chroma: ${chromaConfig.apiBase}`);
  console.log(`Ollama: ${ollamaConfig.baseUrl} (chat: ${ollamaConfig.model}, embeddings: ${embeddingConfig.model})`);
});
