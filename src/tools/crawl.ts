import { z } from "zod";
import { ingestWebsite } from "../services/ingestion.js";
import { config } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { Runtime } from "../runtime.js";
import type { CrawlAndIndexResult, CrawlTask } from "../types.js";
import { parseArgs } from "./args.js";

const {
  defaultMaxPages: DEFAULT_MAX_PAGES,
  defaultMaxDepth: DEFAULT_MAX_DEPTH,
  maxPagesLimit: MAX_PAGES_LIMIT,
  maxDepthLimit: MAX_DEPTH_LIMIT,
} = config.crawler;
const { defaultMaxChars: DEFAULT_MAX_CHARS } = config.chunker;

export const crawlArgsSchema = z.object({
  url: z.string(),
  max_pages: z.number().int().optional(),
  max_depth: z.number().int().optional(),
});

export const crawlAndIndexArgsSchema = crawlArgsSchema.extend({
  max_chars_per_chunk: z.number().int().optional(),
});

export type CrawlAndIndexInput = z.infer<typeof crawlAndIndexArgsSchema>;

/**
 * Build a crawl task from tool arguments. Values above the server's limits
 * are capped; invalid values are left for the crawler to reject.
 */
export function toCrawlTask(input: CrawlAndIndexInput): CrawlTask {
  const maxPages = input.max_pages ?? DEFAULT_MAX_PAGES;
  const maxDepth = input.max_depth ?? DEFAULT_MAX_DEPTH;
  return {
    baseUrl: input.url,
    maxPages: Math.min(maxPages, MAX_PAGES_LIMIT),
    maxDepth: Math.min(maxDepth, MAX_DEPTH_LIMIT),
    maxCharsPerChunk: input.max_chars_per_chunk ?? DEFAULT_MAX_CHARS,
  };
}

export async function crawlAndIndex(args: unknown, runtime: Runtime): Promise<CrawlAndIndexResult> {
  const parsed = parseArgs(crawlAndIndexArgsSchema, args);
  const failure = (url: string, error: string): CrawlAndIndexResult => ({
    success: false,
    url,
    pagesIndexed: 0,
    chunksCreated: 0,
    crawledUrls: [],
    failedUrls: [],
    error,
  });

  if (!parsed.ok) {
    return failure("", parsed.error);
  }

  const task = toCrawlTask(parsed.data);

  try {
    if (runtime.ensureModel && !(await runtime.ensureModel())) {
      return failure(task.baseUrl, "Embedding model not available. Is Ollama running?");
    }

    logger.info(`Crawling ${task.baseUrl}`, { maxPages: task.maxPages, maxDepth: task.maxDepth });
    const result = await ingestWebsite(task, runtime);

    if (result.pagesCrawled === 0) {
      return {
        ...failure(task.baseUrl, "No pages with readable text found to index"),
        failedUrls: result.failedUrls,
      };
    }

    return {
      success: true,
      url: task.baseUrl,
      pagesIndexed: result.pagesCrawled,
      chunksCreated: result.chunksCreated,
      crawledUrls: result.crawledUrls,
      failedUrls: result.failedUrls,
      aborted: result.aborted || undefined,
    };
  } catch (error) {
    logger.error("Crawl and index failed", error, { url: task.baseUrl });
    return failure(task.baseUrl, errorMessage(error));
  }
}
