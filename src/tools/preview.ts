import { crawlWebsite } from "../services/crawler.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { Runtime } from "../runtime.js";
import type { CrawlPreviewResult } from "../types.js";
import { parseArgs } from "./args.js";
import { crawlArgsSchema, toCrawlTask } from "./crawl.js";

/** Crawl without indexing, to check which URLs a crawl would reach. */
export async function crawlPreview(args: unknown, runtime: Pick<Runtime, "fetcher">): Promise<CrawlPreviewResult> {
  const parsed = parseArgs(crawlArgsSchema, args);
  if (!parsed.ok) {
    return { success: false, url: "", totalPagesCrawled: 0, crawledUrls: [], failedUrls: [], error: parsed.error };
  }

  const task = toCrawlTask(parsed.data);

  try {
    const result = await crawlWebsite(task, { fetcher: runtime.fetcher });
    return {
      success: true,
      url: task.baseUrl,
      totalPagesCrawled: result.pages.length,
      crawledUrls: result.pages.map((p) => p.url),
      failedUrls: result.failed,
    };
  } catch (error) {
    logger.error("Crawl preview failed", error, { url: task.baseUrl });
    return {
      success: false,
      url: task.baseUrl,
      totalPagesCrawled: 0,
      crawledUrls: [],
      failedUrls: [],
      error: errorMessage(error),
    };
  }
}
