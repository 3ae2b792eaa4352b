import { ChromaClient, type Collection } from "chromadb";
import type { ChunkMetadata, StoreStats, VectorMatch, VectorRecord } from "../types.js";
import { config } from "../config.js";
import { toCollaboratorError } from "../errors.js";
import { logger } from "../logger.js";

const { host: CHROMA_HOST, collectionName: COLLECTION_NAME } = config.chroma;

const log = logger.child("vectorstore");

export interface VectorStore {
  /** Insert or overwrite by record id. */
  upsert(records: VectorRecord[]): Promise<void>;
  /** Nearest records first; lower distance is closer. */
  query(vector: number[], topK: number): Promise<VectorMatch[]>;
  deleteBySourceUrl(url: string): Promise<number>;
  /** Remove a page's records whose ids are not in `keepIds`. */
  deleteStaleChunks(url: string, keepIds: string[]): Promise<number>;
  deleteByHost(host: string): Promise<number>;
  stats(): Promise<StoreStats>;
}

export function toChunkMetadata(raw: unknown): Partial<ChunkMetadata> {
  if (typeof raw !== "object" || raw === null) {
    return {};
  }
  const meta: Partial<ChunkMetadata> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "source_url":
      case "source_host":
      case "title":
      case "indexed_at":
        if (typeof value === "string") meta[key] = value;
        break;
      case "chunk_index":
      case "char_start":
      case "char_end":
        if (typeof value === "number") meta[key] = value;
        break;
    }
  }
  return meta;
}

export class ChromaVectorStore implements VectorStore {
  private readonly client: ChromaClient;
  private readonly collectionName: string;
  private collection: Collection | null = null;

  constructor(options: { host?: string; collectionName?: string } = {}) {
    this.client = new ChromaClient({ path: options.host ?? CHROMA_HOST });
    this.collectionName = options.collectionName ?? COLLECTION_NAME;
  }

  private async getCollection(): Promise<Collection> {
    if (this.collection) {
      return this.collection;
    }

    try {
      this.collection = await this.client.getOrCreateCollection({
        name: this.collectionName,
        metadata: { "hnsw:space": "cosine" },
      });
    } catch (error) {
      throw toCollaboratorError("vector_store", error, "Opening collection");
    }
    log.info(`Initialized Chroma collection: ${this.collectionName}`);
    return this.collection;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    const col = await this.getCollection();

    try {
      await col.upsert({
        ids: records.map((r) => r.id),
        embeddings: records.map((r) => r.vector),
        documents: records.map((r) => r.text),
        metadatas: records.map((r) => r.metadata),
      });
    } catch (error) {
      throw toCollaboratorError("vector_store", error, "Upsert");
    }
  }

  async query(vector: number[], topK: number): Promise<VectorMatch[]> {
    const col = await this.getCollection();

    let results: Awaited<ReturnType<Collection["query"]>>;
    try {
      results = await col.query({ queryEmbeddings: [vector], nResults: topK });
    } catch (error) {
      throw toCollaboratorError("vector_store", error, "Query");
    }

    const ids = results.ids?.[0] ?? [];
    const matches: VectorMatch[] = [];
    for (let i = 0; i < ids.length; i++) {
      const distance = results.distances?.[0]?.[i];
      matches.push({
        chunkId: ids[i],
        distance: typeof distance === "number" ? distance : Number.POSITIVE_INFINITY,
        text: results.documents?.[0]?.[i] ?? "",
        metadata: toChunkMetadata(results.metadatas?.[0]?.[i]),
      });
    }
    return matches;
  }

  deleteBySourceUrl(url: string): Promise<number> {
    return this.deleteWhere({ source_url: url });
  }

  deleteStaleChunks(url: string, keepIds: string[]): Promise<number> {
    const keep = new Set(keepIds);
    return this.deleteWhere({ source_url: url }, (id) => !keep.has(id));
  }

  deleteByHost(host: string): Promise<number> {
    return this.deleteWhere({ source_host: host });
  }

  private async deleteWhere(where: Record<string, string>, select: (id: string) => boolean = () => true): Promise<number> {
    const col = await this.getCollection();

    try {
      const ids = (await col.get({ where })).ids.filter(select);
      if (ids.length > 0) {
        await col.delete({ ids });
      }
      return ids.length;
    } catch (error) {
      throw toCollaboratorError("vector_store", error, "Delete");
    }
  }

  async stats(): Promise<StoreStats> {
    const col = await this.getCollection();
    try {
      return { collectionName: this.collectionName, totalDocuments: await col.count() };
    } catch (error) {
      throw toCollaboratorError("vector_store", error, "Count");
    }
  }
}

export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / Math.sqrt(normA * normB);
}

/**
 * Process-local store with the same contract as the Chroma collection.
 * Ties in distance keep insertion order.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly records = new Map<string, VectorRecord>();

  constructor(private readonly collectionName = "in_memory") {}

  async upsert(records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.id, { ...record, vector: [...record.vector] });
    }
  }

  async query(vector: number[], topK: number): Promise<VectorMatch[]> {
    return [...this.records.values()]
      .map((record) => ({
        chunkId: record.id,
        distance: cosineDistance(vector, record.vector),
        text: record.text,
        metadata: { ...record.metadata },
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK);
  }

  async deleteBySourceUrl(url: string): Promise<number> {
    return this.deleteMatching((record) => record.metadata.source_url === url);
  }

  async deleteStaleChunks(url: string, keepIds: string[]): Promise<number> {
    const keep = new Set(keepIds);
    return this.deleteMatching((record) => record.metadata.source_url === url && !keep.has(record.id));
  }

  async deleteByHost(host: string): Promise<number> {
    return this.deleteMatching((record) => record.metadata.source_host === host);
  }

  async stats(): Promise<StoreStats> {
    return { collectionName: this.collectionName, totalDocuments: this.records.size };
  }

  ids(): string[] {
    return [...this.records.keys()];
  }

  private deleteMatching(predicate: (record: VectorRecord) => boolean): number {
    let deleted = 0;
    for (const [id, record] of this.records) {
      if (predicate(record)) {
        this.records.delete(id);
        deleted++;
      }
    }
    return deleted;
  }
}
