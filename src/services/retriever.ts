import type { AnswerResult, Prompt, RetrievedResult, VectorMatch } from "../types.js";
import { config } from "../config.js";
import { CollaboratorError, InvalidConfigurationError } from "../errors.js";
import { logger } from "../logger.js";
import type { Embedder } from "./embedder.js";
import type { LanguageModel } from "./llm.js";
import type { VectorStore } from "./vectorstore.js";

const { defaultTopK: DEFAULT_TOP_K } = config.search;

const log = logger.child("retriever");

export const NO_CONTEXT_ANSWER = "I couldn't find any relevant information in the knowledge base.";

export const SYSTEM_PROMPT = `You are a helpful assistant that answers questions based only on the provided context.

Rules:
1. Answer questions using ONLY the information provided in the context below
2. If the context doesn't contain information needed to answer the question, say "I don't have enough information to answer that."
3. Be concise and clear in your answers
4. When you use information from a source, cite it by its number, e.g. [1]
5. Do not make up information or use knowledge outside the provided context`;

export type RetrievalDeps = {
  embedder: Embedder;
  store: VectorStore;
};

export type AnswerDeps = RetrievalDeps & {
  llm: LanguageModel;
};

/**
 * Dedupe by chunk id (lowest distance wins) and order by ascending distance.
 * Array.prototype.sort is stable, so equal distances keep their input order.
 */
export function rankMatches(matches: VectorMatch[], topK: number): RetrievedResult[] {
  const best = new Map<string, { match: VectorMatch; position: number }>();
  matches.forEach((match, position) => {
    const existing = best.get(match.chunkId);
    if (!existing || match.distance < existing.match.distance) {
      best.set(match.chunkId, { match, position });
    }
  });

  return [...best.values()]
    .sort((a, b) => a.match.distance - b.match.distance || a.position - b.position)
    .slice(0, topK)
    .map(({ match }) => ({
      chunkId: match.chunkId,
      distance: match.distance,
      sourceUrl: match.metadata.source_url ?? "",
      title: match.metadata.title ?? "",
      text: match.text,
    }));
}

export async function retrieve(question: string, topK: number, deps: RetrievalDeps): Promise<RetrievedResult[]> {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidConfigurationError("topK must be a positive integer", { topK });
  }

  const query = question.trim();
  if (!query) {
    log.warn("Empty question provided");
    return [];
  }

  const [vector] = await deps.embedder.embed([query]);
  if (!vector) {
    throw new CollaboratorError("embedder", "permanent", "Embedder returned no vector for the question");
  }
  const matches = await deps.store.query(vector, topK);
  const results = rankMatches(matches, topK);

  log.info(`Retrieved ${results.length} chunks`, { topK, question: query.slice(0, 50) });
  return results;
}

export function buildPrompt(question: string, results: RetrievedResult[]): Prompt {
  const context = results
    .map((result, i) => `[${i + 1}] ${result.title || "Untitled"} (${result.sourceUrl})\n${result.text}`)
    .join("\n\n");

  return {
    system: SYSTEM_PROMPT,
    user: `Context:\n${context}\n\nQuestion: ${question}\n\nPlease answer the question based only on the context provided above.`,
  };
}

function uniqueSources(results: RetrievedResult[]): string[] {
  return [...new Set(results.map((r) => r.sourceUrl).filter((url) => url.length > 0))];
}

/**
 * Retrieval plus answer generation. Language model failures propagate so the
 * caller can tell transient from permanent ones.
 */
export async function answerQuestion(
  question: string,
  deps: AnswerDeps,
  options: { topK?: number; useLlm?: boolean } = {}
): Promise<AnswerResult> {
  const topK = options.topK ?? DEFAULT_TOP_K;
  const useLlm = options.useLlm ?? true;

  const chunks = await retrieve(question, topK, deps);
  if (chunks.length === 0) {
    return { question, answer: NO_CONTEXT_ANSWER, sources: [], chunks };
  }

  const answer = useLlm
    ? await deps.llm.generate(buildPrompt(question.trim(), chunks))
    : chunks.map((c) => c.text).join("\n\n");

  return { question, answer, sources: uniqueSources(chunks), chunks };
}
