import type { Chunk, ChunkMetadata, CrawlTask, IngestResult, VectorRecord } from "../types.js";
import { config } from "../config.js";
import { CollaboratorError, InvalidConfigurationError } from "../errors.js";
import { logger } from "../logger.js";
import { chunkText, validateChunkOptions } from "./chunker.js";
import { crawlWebsite, type CrawlOptions } from "./crawler.js";
import type { Embedder } from "./embedder.js";
import type { PageFetcher } from "./fetcher.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import { hostOf } from "./url.js";
import type { VectorStore } from "./vectorstore.js";

const { defaultOverlap: DEFAULT_OVERLAP } = config.chunker;
const { batchSize: EMBED_BATCH_SIZE } = config.ollama;

const log = logger.child("ingestion");

export type IngestionDeps = {
  fetcher: PageFetcher;
  embedder: Embedder;
  store: VectorStore;
};

export type IngestionOptions = Omit<CrawlOptions, "fetcher"> & {
  overlap?: number;
  batchSize?: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

/**
 * Crawl one site, chunk every extracted page, embed the chunks and write them
 * to the vector store. A page's new chunks are written first, then any of its
 * older chunks outside the new id set are removed, so a failed write leaves
 * the previous index of that page in place.
 */
export async function ingestWebsite(
  task: CrawlTask,
  deps: IngestionDeps,
  options: IngestionOptions = {}
): Promise<IngestResult> {
  const overlap = options.overlap ?? DEFAULT_OVERLAP;
  const batchSize = options.batchSize ?? EMBED_BATCH_SIZE;
  const retryPolicy = options.retry ?? config.retry;
  const now = options.now ?? (() => new Date());

  validateChunkOptions(task.maxCharsPerChunk, overlap);
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidConfigurationError("batchSize must be a positive integer", { batchSize });
  }

  const crawl = await crawlWebsite(task, { ...options, fetcher: deps.fetcher });

  const chunksByPage = new Map<string, Chunk[]>();
  for (const page of crawl.pages) {
    chunksByPage.set(page.url, chunkText(page.extractedText, task.maxCharsPerChunk, overlap, page.url, page.title));
  }
  const chunks = [...chunksByPage.values()].flat();
  log.info(`Chunked ${crawl.pages.length} pages`, { chunks: chunks.length });

  const retrying = <T>(label: string, operation: () => Promise<T>): Promise<T> =>
    withRetry(operation, { policy: retryPolicy, label, sleep: options.sleep, signal: options.signal });

  const vectors: number[][] = [];
  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize).map((c) => c.text);
    const embedded = await retrying("Embedding batch", () => deps.embedder.embed(batch));
    if (embedded.length !== batch.length) {
      throw new CollaboratorError(
        "embedder",
        "permanent",
        `Embedder returned ${embedded.length} vectors for ${batch.length} texts`
      );
    }
    vectors.push(...embedded);
  }

  const indexedAt = now().toISOString();
  let offset = 0;
  for (const [url, pageChunks] of chunksByPage) {
    const records = pageChunks.map((chunk, i) => toRecord(chunk, vectors[offset + i], indexedAt));
    offset += pageChunks.length;

    await retrying("Upserting chunks", () => deps.store.upsert(records));
    const keepIds = records.map((r) => r.id);
    const removed = await retrying("Removing stale chunks", () => deps.store.deleteStaleChunks(url, keepIds));
    log.debug(`Indexed ${url}`, { chunks: records.length, replaced: removed });
  }

  log.info("Ingestion complete", {
    baseUrl: task.baseUrl,
    pages: crawl.pages.length,
    chunks: chunks.length,
    failed: crawl.failed.length,
    aborted: crawl.aborted,
  });

  return {
    pagesCrawled: crawl.pages.length,
    chunksCreated: chunks.length,
    embeddingsCreated: vectors.length,
    crawledUrls: crawl.pages.map((p) => p.url),
    failedUrls: crawl.failed,
    aborted: crawl.aborted,
  };
}

function toRecord(chunk: Chunk, vector: number[], indexedAt: string): VectorRecord {
  const metadata: ChunkMetadata = {
    source_url: chunk.sourceUrl,
    source_host: hostOf(chunk.sourceUrl),
    title: chunk.title,
    chunk_index: chunk.chunkIndex,
    char_start: chunk.charStart,
    char_end: chunk.charEnd,
    indexed_at: indexedAt,
  };
  return { id: chunk.id, vector, text: chunk.text, metadata };
}
