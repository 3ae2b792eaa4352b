import { z } from "zod";
import { retrieve } from "../services/retriever.js";
import { config } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Runtime } from "../runtime.js";
import type { SearchDocsResult } from "../types.js";
import { parseArgs } from "./args.js";

const { defaultTopK: DEFAULT_TOP_K, maxTopK: MAX_TOP_K, maxQueryLength: MAX_QUERY_LENGTH } = config.search;

export const searchArgsSchema = z.object({
  query: z.string(),
  top_k: z.number().int().optional(),
});

export async function searchDocs(
  args: unknown,
  runtime: Pick<Runtime, "embedder" | "store">
): Promise<SearchDocsResult> {
  const parsed = parseArgs(searchArgsSchema, args);
  if (!parsed.ok) {
    return { query: "", results: [], totalResults: 0, error: parsed.error };
  }

  const query = parsed.data.query.trim();

  // Validate query length to prevent DoS
  if (query.length > MAX_QUERY_LENGTH) {
    return {
      query: query.slice(0, 100) + "...",
      results: [],
      totalResults: 0,
      error: `Query exceeds maximum length of ${MAX_QUERY_LENGTH} characters`,
    };
  }

  const topK = Math.min(parsed.data.top_k ?? DEFAULT_TOP_K, MAX_TOP_K);

  try {
    const results = await retrieve(query, topK, runtime);
    return {
      query,
      results: results.map((result, i) => ({ rank: i + 1, ...result })),
      totalResults: results.length,
    };
  } catch (error) {
    return { query, results: [], totalResults: 0, error: errorMessage(error) };
  }
}
