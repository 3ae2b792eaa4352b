// Crawl types
export type CrawlTask = Readonly<{
  baseUrl: string;
  maxPages: number;
  maxDepth: number;
  maxCharsPerChunk: number;
}>;

export type FrontierEntry = {
  url: string;
  depth: number;
};

export type CrawledPage = {
  url: string;
  depth: number;
  title: string;
  rawHtml: string;
  extractedText: string;
};

export type FailureReason = "fetch_failed" | "extraction_empty";

export type FailedUrl = {
  url: string;
  depth: number;
  reason: FailureReason;
  message: string;
};

export type CrawlResult = {
  pages: CrawledPage[];
  failed: FailedUrl[];
  visited: string[]; // normalized, in fetch order
  aborted: boolean;
};

export type FetchedPage = {
  url: string; // final URL after redirects
  status: number;
  html: string;
};

export type ExtractedContent = {
  title: string;
  text: string;
};

// Chunker types
export type Chunk = {
  id: string;
  text: string;
  sourceUrl: string;
  title: string;
  chunkIndex: number;
  charStart: number;
  charEnd: number;
  overlapWithPrevious: number;
};

export type ChunkOptions = {
  maxChars: number;
  overlap: number;
};

// Vector store types
export type ChunkMetadata = {
  source_url: string;
  source_host: string;
  title: string;
  chunk_index: number;
  char_start: number;
  char_end: number;
  indexed_at: string;
};

export type VectorRecord = {
  id: string;
  vector: number[];
  text: string;
  metadata: ChunkMetadata;
};

export type VectorMatch = {
  chunkId: string;
  distance: number;
  text: string;
  metadata: Partial<ChunkMetadata>;
};

export type StoreStats = {
  collectionName: string;
  totalDocuments: number;
};

// Retrieval types
export type RetrievedResult = {
  chunkId: string;
  distance: number;
  sourceUrl: string;
  title: string;
  text: string;
};

export type Prompt = {
  system: string;
  user: string;
};

export type AnswerResult = {
  question: string;
  answer: string;
  sources: string[];
  chunks: RetrievedResult[];
};

// Ingestion types
export type IngestResult = {
  pagesCrawled: number;
  chunksCreated: number;
  embeddingsCreated: number;
  crawledUrls: string[];
  failedUrls: FailedUrl[];
  aborted: boolean;
};

// MCP Tool Response types
export type CrawlAndIndexResult = {
  success: boolean;
  url: string;
  pagesIndexed: number;
  chunksCreated: number;
  crawledUrls: string[];
  failedUrls: FailedUrl[];
  aborted?: boolean;
  error?: string;
};

export type CrawlPreviewResult = {
  success: boolean;
  url: string;
  totalPagesCrawled: number;
  crawledUrls: string[];
  failedUrls: FailedUrl[];
  error?: string;
};

export type SearchDocsResult = {
  query: string;
  results: Array<RetrievedResult & { rank: number }>;
  totalResults: number;
  error?: string;
};

export type AskQuestionResult = {
  success: boolean;
  question: string;
  answer: string;
  sources: string[];
  numChunksUsed: number;
  error?: string;
};

export type KnowledgeBaseStatsResult = StoreStats & {
  error?: string;
};

export type DeleteSourceResult = {
  success: boolean;
  deletedChunks: number;
  url: string;
  error?: string;
};
