import { describe, it, expect } from "vitest";
import { config } from "../src/config.js";

describe("config", () => {
  it("should have ollama configuration", () => {
    expect(config.ollama.host).toBe("http://localhost:11434");
    expect(config.ollama.embeddingModel).toBe("nomic-embed-text");
    expect(config.ollama.chatModel).toBe("llama3.1");
    expect(config.ollama.batchSize).toBeGreaterThan(0);
  });

  it("should have chroma configuration", () => {
    expect(config.chroma.host).toBe("http://localhost:8000");
    expect(config.chroma.collectionName).toBe("site_qa_chunks");
  });

  it("should have crawler configuration", () => {
    expect(config.crawler.defaultMaxPages).toBe(50);
    expect(config.crawler.defaultMaxDepth).toBe(3);
    expect(config.crawler.defaultMaxPages).toBeLessThanOrEqual(config.crawler.maxPagesLimit);
    expect(config.crawler.defaultMaxDepth).toBeLessThanOrEqual(config.crawler.maxDepthLimit);
    expect(config.crawler.requestTimeoutMs).toBeGreaterThan(0);
    expect(config.crawler.userAgent).toContain("site-qa-mcp");
    expect(config.crawler.skipPaths).toContain("/login");
    expect(config.crawler.skipExtensions.test("/manual.PDF")).toBe(true);
  });

  it("should have chunker configuration", () => {
    expect(config.chunker.defaultMaxChars).toBe(800);
    expect(config.chunker.defaultOverlap).toBe(100);
    expect(config.chunker.defaultOverlap).toBeLessThan(config.chunker.defaultMaxChars);
  });

  it("should have search configuration", () => {
    expect(config.search.defaultTopK).toBe(5);
    expect(config.search.maxTopK).toBeGreaterThanOrEqual(config.search.defaultTopK);
  });
});
