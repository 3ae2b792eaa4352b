import { describe, it, expect } from "vitest";
import { CrawlState, crawlWebsite, discoverLinks } from "../src/services/crawler.js";
import { InvalidConfigurationError, UnreachableRootError } from "../src/errors.js";
import type { CrawlTask } from "../src/types.js";
import { FakeSiteFetcher, links, page } from "./helpers/fakes.js";

const ROOT = "https://example.com/";

function task(overrides: Partial<CrawlTask> = {}): CrawlTask {
  return { baseUrl: "https://example.com", maxPages: 20, maxDepth: 3, maxCharsPerChunk: 800, ...overrides };
}

describe("crawlWebsite", () => {
  it("should return exactly one page for a site without links", async () => {
    const fetcher = new FakeSiteFetcher({ [ROOT]: page("Home", "<p>Welcome home</p>") });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(result.pages).toHaveLength(1);
    expect(result.pages[0]).toMatchObject({ url: ROOT, depth: 0, title: "Home", extractedText: "Welcome home" });
    expect(result.failed).toEqual([]);
    expect(result.visited).toEqual([ROOT]);
    expect(result.aborted).toBe(false);
  });

  it("should visit pages breadth-first and stop at max depth", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/a", "/b")),
      "https://example.com/a": page("A", links("/c")),
      "https://example.com/b": page("B", "<p>b</p>"),
      "https://example.com/c": page("C", links("/d")),
      "https://example.com/d": page("D", "<p>too deep</p>"),
    });

    const result = await crawlWebsite(task({ maxDepth: 2 }), { fetcher, requestDelayMs: 0 });

    expect(fetcher.requests).toEqual([
      ROOT,
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/c",
    ]);
    expect(result.pages.map((p) => p.depth)).toEqual([0, 1, 1, 2]);
    expect(result.pages.every((p) => p.depth <= 2)).toBe(true);
  });

  it("should only fetch the base URL when max depth is 0", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/a")),
      "https://example.com/a": page("A", "<p>a</p>"),
    });

    const result = await crawlWebsite(task({ maxDepth: 0 }), { fetcher, requestDelayMs: 0 });

    expect(fetcher.requests).toEqual([ROOT]);
    expect(result.pages).toHaveLength(1);
  });

  it("should collapse equivalent URLs and never fetch a page twice", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/a", "/a/", "/a#top", "https://EXAMPLE.com/a", "a?", "#intro")),
      "https://example.com/a": page("A", links("/", "https://example.com", "/a")),
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(fetcher.requests).toEqual([ROOT, "https://example.com/a"]);
    expect(result.visited).toEqual([ROOT, "https://example.com/a"]);
    expect(new Set(result.visited).size).toBe(result.visited.length);
  });

  it("should stop once max pages have been extracted", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/a", "/b", "/c")),
      "https://example.com/a": page("A", "<p>a</p>"),
      "https://example.com/b": page("B", "<p>b</p>"),
      "https://example.com/c": page("C", "<p>c</p>"),
    });

    const result = await crawlWebsite(task({ maxPages: 2 }), { fetcher, requestDelayMs: 0 });

    expect(result.pages.map((p) => p.url)).toEqual([ROOT, "https://example.com/a"]);
    expect(fetcher.requests).toHaveLength(2);
  });

  it("should record a failing page and keep crawling", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/broken", "/b")),
      "https://example.com/broken": { status: 500 },
      "https://example.com/b": page("B", "<p>b</p>"),
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(result.pages.map((p) => p.url)).toEqual([ROOT, "https://example.com/b"]);
    expect(result.failed).toEqual([
      {
        url: "https://example.com/broken",
        depth: 1,
        reason: "fetch_failed",
        message: "HTTP 500 from https://example.com/broken",
      },
    ]);
  });

  it("should treat an empty page as failed but still follow its links", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/empty")),
      "https://example.com/empty":
        '<html><head><title>Empty</title></head><body><nav><a href="/deep">Deep</a></nav><script>run()</script></body></html>',
      "https://example.com/deep": page("Deep", "<p>found it</p>"),
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(result.failed).toEqual([
      {
        url: "https://example.com/empty",
        depth: 1,
        reason: "extraction_empty",
        message: "No readable text extracted from https://example.com/empty",
      },
    ]);
    expect(result.pages.map((p) => p.url)).toEqual([ROOT, "https://example.com/deep"]);
    expect(result.pages[1].depth).toBe(2);
  });

  it("should ignore other hosts, non-http schemes and skipped paths", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page(
        "Home",
        links("https://other.com/x", "mailto:team@example.com", "javascript:void(0)", "/login", "/guide.pdf", "/about")
      ),
      "https://example.com/about": page("About", "<p>about</p>"),
    });

    await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(fetcher.requests).toEqual([ROOT, "https://example.com/about"]);
  });

  it("should honour custom skip paths", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/login", "/blog/post")),
      "https://example.com/login": page("Login", "<p>login</p>"),
      "https://example.com/blog/post": page("Post", "<p>post</p>"),
    });

    await crawlWebsite(task(), { fetcher, requestDelayMs: 0, skipPaths: ["/blog"] });

    expect(fetcher.requests).toEqual([ROOT, "https://example.com/login"]);
  });

  it("should follow a redirect and mark its target visited", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/old", "/new")),
      "https://example.com/old": { html: page("New", "<p>moved here</p>"), redirectTo: "https://example.com/new" },
      "https://example.com/new": page("New", "<p>moved here</p>"),
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(fetcher.requests).toEqual([ROOT, "https://example.com/old"]);
    expect(result.pages.map((p) => p.url)).toEqual([ROOT, "https://example.com/new"]);
  });

  it("should resolve relative links against the URL a directory page was served at", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/docs")),
      "https://example.com/docs": {
        html: page("Docs", links("guide", "../about")),
        servedAt: "https://example.com/docs/",
      },
      "https://example.com/docs/guide": page("Guide", "<p>guide</p>"),
      "https://example.com/about": page("About", "<p>about</p>"),
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(fetcher.requests).toEqual([
      ROOT,
      "https://example.com/docs",
      "https://example.com/docs/guide",
      "https://example.com/about",
    ]);
    expect(result.failed).toEqual([]);
    expect(result.pages.map((p) => p.url)).toEqual([
      ROOT,
      "https://example.com/docs",
      "https://example.com/docs/guide",
      "https://example.com/about",
    ]);
  });

  it("should reject a redirect to another host", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/away")),
      "https://example.com/away": { html: page("Away", "<p>x</p>"), redirectTo: "https://other.com/" },
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(result.pages).toHaveLength(1);
    expect(result.failed).toEqual([
      {
        url: "https://example.com/away",
        depth: 1,
        reason: "fetch_failed",
        message: "Redirected outside example.com to https://other.com/",
      },
    ]);
  });

  it("should fail the crawl when the base URL is unreachable", async () => {
    const fetcher = new FakeSiteFetcher({});

    await expect(crawlWebsite(task(), { fetcher, requestDelayMs: 0 })).rejects.toBeInstanceOf(UnreachableRootError);
  });

  it.each([
    [{ maxPages: 0 }, "maxPages must be a positive integer"],
    [{ maxDepth: -1 }, "maxDepth must be a non-negative integer"],
    [{ baseUrl: "ftp://example.com" }, "baseUrl must be an absolute http(s) URL"],
    [{ baseUrl: "http://localhost:3000" }, "URL is not allowed: internal or private network detected"],
  ])("should reject invalid task %o", async (overrides, message) => {
    const fetcher = new FakeSiteFetcher({});

    const crawl = crawlWebsite(task(overrides), { fetcher, requestDelayMs: 0 });

    await expect(crawl).rejects.toBeInstanceOf(InvalidConfigurationError);
    await expect(crawl).rejects.toThrow(message);
    expect(fetcher.requests).toEqual([]);
  });

  it("should stop between pages when the signal is aborted", async () => {
    const controller = new AbortController();
    const fetcher = new FakeSiteFetcher(
      {
        [ROOT]: page("Home", links("/a", "/b")),
        "https://example.com/a": page("A", "<p>a</p>"),
        "https://example.com/b": page("B", "<p>b</p>"),
      },
      () => controller.abort()
    );

    const result = await crawlWebsite(task(), { fetcher, signal: controller.signal, requestDelayMs: 0 });

    expect(result.aborted).toBe(true);
    expect(fetcher.requests).toEqual([ROOT]);
    expect(result.pages.map((p) => p.url)).toEqual([ROOT]);
  });

  it("should visit every enqueued URL exactly once on a cyclic site", async () => {
    const fetcher = new FakeSiteFetcher({
      [ROOT]: page("Home", links("/a", "/b")),
      "https://example.com/a": page("A", links("/b", "/c", "/")),
      "https://example.com/b": page("B", links("/a", "/c")),
      "https://example.com/c": page("C", links("/", "/a", "/b")),
    });

    const result = await crawlWebsite(task(), { fetcher, requestDelayMs: 0 });

    expect(result.visited).toEqual([
      ROOT,
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/c",
    ]);
    expect(fetcher.requests).toEqual(result.visited);
  });
});

describe("CrawlState", () => {
  it("should refuse duplicates and entries deeper than max depth", () => {
    const state = new CrawlState(ROOT, 10, 1);

    expect(state.enqueue(ROOT, 1)).toBe(false);
    expect(state.enqueue("https://example.com/a", 1)).toBe(true);
    expect(state.enqueue("https://example.com/a", 1)).toBe(false);
    expect(state.enqueue("https://example.com/b", 2)).toBe(false);
    expect(state.pending).toBe(2);
  });

  it("should mark entries visited on pop", () => {
    const state = new CrawlState(ROOT, 10, 1);
    state.enqueue("https://example.com/a", 1);

    expect(state.next()).toEqual({ url: ROOT, depth: 0 });
    expect(state.hasVisited(ROOT)).toBe(true);
    expect(state.next()).toEqual({ url: "https://example.com/a", depth: 1 });
    expect(state.next()).toBeUndefined();
    expect(state.visitedUrls).toEqual([ROOT, "https://example.com/a"]);
  });
});

describe("discoverLinks", () => {
  it("should resolve relative links against the page URL and drop fragments", () => {
    const html = links("intro", "../api/", "#top", "/guide#install", "tel:123", "https://example.com/guide");

    expect(discoverLinks(html, "https://example.com/docs/start")).toEqual([
      "https://example.com/docs/intro",
      "https://example.com/api",
      "https://example.com/guide",
    ]);
  });
});
