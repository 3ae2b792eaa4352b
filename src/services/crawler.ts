import * as cheerio from "cheerio";
import type { CrawledPage, CrawlResult, CrawlTask, FailedUrl, FrontierEntry } from "../types.js";
import { config } from "../config.js";
import {
  ExtractionEmptyError,
  FetchFailureError,
  InvalidConfigurationError,
  UnreachableRootError,
  errorMessage,
} from "../errors.js";
import { logger } from "../logger.js";
import { extractContent } from "./extractor.js";
import type { PageFetcher } from "./fetcher.js";
import { hostOf, isBlockedUrl, isSameHost, matchesSkipRule, normalizeUrl } from "./url.js";
import { sleep } from "./retry.js";

const {
  requestDelayMs: REQUEST_DELAY_MS,
  skipPaths: SKIP_PATHS,
  skipExtensions: SKIP_EXTENSIONS,
} = config.crawler;

const log = logger.child("crawler");

export type CrawlOptions = {
  fetcher: PageFetcher;
  signal?: AbortSignal;
  requestDelayMs?: number;
  skipPaths?: readonly string[];
  skipExtensions?: RegExp;
};

/**
 * Traversal state owned by a single crawl: the FIFO frontier, the set of
 * URLs already enqueued, the set already popped, and the outcome lists.
 */
export class CrawlState {
  readonly host: string;
  readonly pages: CrawledPage[] = [];
  readonly failed: FailedUrl[] = [];
  private readonly frontier: FrontierEntry[] = [];
  private readonly seen = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly visitOrder: string[] = [];

  constructor(
    readonly rootUrl: string,
    readonly maxPages: number,
    readonly maxDepth: number
  ) {
    this.host = hostOf(rootUrl);
    this.enqueue(rootUrl, 0);
  }

  /** Returns false when the URL is already known or too deep. */
  enqueue(url: string, depth: number): boolean {
    if (depth > this.maxDepth || this.seen.has(url)) {
      return false;
    }
    this.seen.add(url);
    this.frontier.push({ url, depth });
    return true;
  }

  /** Pops the next unvisited entry and marks it visited. */
  next(): FrontierEntry | undefined {
    for (let entry = this.frontier.shift(); entry; entry = this.frontier.shift()) {
      if (!this.visited.has(entry.url)) {
        this.markVisited(entry.url);
        return entry;
      }
    }
    return undefined;
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  /** Records a URL reached through a redirect so it is not fetched again. */
  markVisited(url: string): void {
    if (this.visited.has(url)) {
      return;
    }
    this.seen.add(url);
    this.visited.add(url);
    this.visitOrder.push(url);
  }

  get budgetExhausted(): boolean {
    return this.pages.length >= this.maxPages;
  }

  get pending(): number {
    return this.frontier.length;
  }

  get visitedUrls(): string[] {
    return [...this.visitOrder];
  }
}

export function validateCrawlTask(task: CrawlTask): string {
  if (!Number.isInteger(task.maxPages) || task.maxPages <= 0) {
    throw new InvalidConfigurationError("maxPages must be a positive integer", { maxPages: task.maxPages });
  }
  if (!Number.isInteger(task.maxDepth) || task.maxDepth < 0) {
    throw new InvalidConfigurationError("maxDepth must be a non-negative integer", { maxDepth: task.maxDepth });
  }

  const rootUrl = normalizeUrl(task.baseUrl);
  if (!rootUrl) {
    throw new InvalidConfigurationError("baseUrl must be an absolute http(s) URL", { baseUrl: task.baseUrl });
  }
  if (isBlockedUrl(rootUrl)) {
    throw new InvalidConfigurationError("URL is not allowed: internal or private network detected", {
      baseUrl: task.baseUrl,
    });
  }
  return rootUrl;
}

/**
 * Breadth-first crawl of one site. Pages are visited in order of distance
 * from the base URL, so a page budget keeps the pages closest to the root.
 *
 * Per-page failures are recorded in `failed` and never abort the crawl. Only
 * invalid task parameters and a failed fetch of the base URL throw.
 */
export async function crawlWebsite(task: CrawlTask, options: CrawlOptions): Promise<CrawlResult> {
  const rootUrl = validateCrawlTask(task);
  const { fetcher, signal } = options;
  const requestDelayMs = options.requestDelayMs ?? REQUEST_DELAY_MS;
  const skipPaths = options.skipPaths ?? SKIP_PATHS;
  const skipExtensions = options.skipExtensions ?? SKIP_EXTENSIONS;

  const state = new CrawlState(rootUrl, task.maxPages, task.maxDepth);
  let aborted = false;

  log.info(`Starting crawl of ${rootUrl}`, { maxPages: task.maxPages, maxDepth: task.maxDepth });

  while (!state.budgetExhausted) {
    if (signal?.aborted) {
      aborted = true;
      break;
    }

    const entry = state.next();
    if (!entry) {
      break;
    }

    const { url, depth } = entry;
    const isRoot = url === rootUrl;

    let html: string;
    let pageUrl: string;
    // Relative links resolve against the URL as served, trailing slash included
    let linkBase: string;
    try {
      const fetched = await fetcher.fetch(url, signal);
      const canonical = normalizeUrl(fetched.url);
      pageUrl = canonical ?? url;
      linkBase = canonical ? fetched.url : url;
      if (!isSameHost(pageUrl, state.host)) {
        throw new FetchFailureError(url, `Redirected outside ${state.host} to ${pageUrl}`, { transient: false });
      }
      html = fetched.html;
    } catch (error) {
      if (signal?.aborted) {
        aborted = true;
        break;
      }
      if (isRoot) {
        throw new UnreachableRootError(rootUrl, error);
      }
      log.warn(`Failed to fetch ${url}`, { depth, error: errorMessage(error) });
      state.failed.push({ url, depth, reason: "fetch_failed", message: errorMessage(error) });
      continue;
    }

    if (pageUrl !== url) {
      if (state.hasVisited(pageUrl)) {
        log.debug(`Skipping ${url}, redirects to already visited ${pageUrl}`);
        continue;
      }
      state.markVisited(pageUrl);
    }

    const { title, text } = extractContent(html);
    if (text) {
      const page: CrawledPage = { url: pageUrl, depth, title: title || pageUrl, rawHtml: html, extractedText: text };
      state.pages.push(page);
      log.debug(`Extracted [${state.pages.length}/${task.maxPages}] ${pageUrl}`, { depth, chars: text.length });
    } else {
      const empty = new ExtractionEmptyError(pageUrl);
      log.warn(empty.message, { depth });
      state.failed.push({ url: pageUrl, depth, reason: "extraction_empty", message: empty.message });
    }

    if (depth < task.maxDepth) {
      for (const link of discoverLinks(html, linkBase)) {
        if (isSameHost(link, state.host) && !matchesSkipRule(link, skipPaths, skipExtensions)) {
          state.enqueue(link, depth + 1);
        }
      }
    }

    // Rate limiting: delay between requests
    if (requestDelayMs > 0 && state.pending > 0 && !state.budgetExhausted) {
      await sleep(requestDelayMs);
    }
  }

  log.info(`Crawl complete for ${rootUrl}`, {
    pages: state.pages.length,
    failed: state.failed.length,
    visited: state.visitedUrls.length,
    aborted,
  });

  return {
    pages: state.pages,
    failed: state.failed,
    visited: state.visitedUrls,
    aborted,
  };
}

/** Canonical absolute http(s) targets of every anchor, in document order. */
export function discoverLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#")) {
      return;
    }
    const link = normalizeUrl(href, pageUrl);
    if (link) {
      links.add(link);
    }
  });

  return [...links];
}
