import type { Embedder } from "./services/embedder.js";
import { OllamaEmbedder } from "./services/embedder.js";
import { HttpPageFetcher, type PageFetcher } from "./services/fetcher.js";
import { OllamaChatModel, type LanguageModel } from "./services/llm.js";
import { ChromaVectorStore, type VectorStore } from "./services/vectorstore.js";

/** External collaborators the MCP tools run against. */
export type Runtime = {
  fetcher: PageFetcher;
  embedder: Embedder;
  store: VectorStore;
  llm: LanguageModel;
  ensureModel?: () => Promise<boolean>;
};

export function createRuntime(): Runtime {
  const embedder = new OllamaEmbedder();
  return {
    fetcher: new HttpPageFetcher(),
    embedder,
    store: new ChromaVectorStore(),
    llm: new OllamaChatModel(),
    ensureModel: () => embedder.ensureModel(),
  };
}
