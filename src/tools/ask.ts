import { z } from "zod";
import { answerQuestion } from "../services/retriever.js";
import { config } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { Runtime } from "../runtime.js";
import type { AskQuestionResult } from "../types.js";
import { parseArgs } from "./args.js";

const { defaultTopK: DEFAULT_TOP_K, maxTopK: MAX_TOP_K, maxQueryLength: MAX_QUERY_LENGTH } = config.search;

export const askArgsSchema = z.object({
  question: z.string(),
  top_k: z.number().int().optional(),
  use_llm: z.boolean().optional(),
});

export async function askQuestion(args: unknown, runtime: Runtime): Promise<AskQuestionResult> {
  const parsed = parseArgs(askArgsSchema, args);
  const failure = (question: string, error: string): AskQuestionResult => ({
    success: false,
    question,
    answer: "",
    sources: [],
    numChunksUsed: 0,
    error,
  });

  if (!parsed.ok) {
    return failure("", parsed.error);
  }

  const question = parsed.data.question.trim();
  if (!question) {
    return failure("", "Please provide a valid question.");
  }
  if (question.length > MAX_QUERY_LENGTH) {
    return failure(question.slice(0, 100) + "...", `Question exceeds maximum length of ${MAX_QUERY_LENGTH} characters`);
  }

  try {
    const result = await answerQuestion(question, runtime, {
      topK: Math.min(parsed.data.top_k ?? DEFAULT_TOP_K, MAX_TOP_K),
      useLlm: parsed.data.use_llm ?? true,
    });
    return {
      success: true,
      question,
      answer: result.answer,
      sources: result.sources,
      numChunksUsed: result.chunks.length,
    };
  } catch (error) {
    logger.error("Answering question failed", error);
    return failure(question, errorMessage(error));
  }
}
