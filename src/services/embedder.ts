import { config } from "../config.js";
import { CollaboratorError, isTransientStatus, toCollaboratorError } from "../errors.js";
import { logger } from "../logger.js";
import { readErrorDetails, readJson } from "./http.js";

const {
  host: OLLAMA_HOST,
  embeddingModel: EMBEDDING_MODEL,
  requestTimeoutMs: REQUEST_TIMEOUT_MS,
} = config.ollama;

const log = logger.child("embedder");

export interface Embedder {
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export type OllamaEmbedderOptions = {
  host?: string;
  model?: string;
  timeoutMs?: number;
};

function isEmbedResponse(data: unknown): data is { embeddings: number[][] } {
  if (typeof data !== "object" || data === null || !("embeddings" in data)) {
    return false;
  }
  const { embeddings } = data;
  return (
    Array.isArray(embeddings) &&
    embeddings.every((vector) => Array.isArray(vector) && vector.every((value) => typeof value === "number"))
  );
}

function isTagsResponse(data: unknown): data is { models: Array<{ name: string }> } {
  if (typeof data !== "object" || data === null || !("models" in data)) {
    return false;
  }
  const { models } = data;
  return (
    Array.isArray(models) &&
    models.every((m) => typeof m === "object" && m !== null && "name" in m && typeof m.name === "string")
  );
}

export class OllamaEmbedder implements Embedder {
  private readonly host: string;
  readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OllamaEmbedderOptions = {}) {
    this.host = options.host ?? OLLAMA_HOST;
    this.model = options.model ?? EMBEDDING_MODEL;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: Response;
    try {
      response = await fetch(`${this.host}/api/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw toCollaboratorError("embedder", error, "Embedding request");
    }

    if (!response.ok) {
      // Log detailed error internally but return sanitized message
      const details = await readErrorDetails(response);
      log.error("Ollama embedding failed", undefined, { status: response.status, details });
      throw new CollaboratorError(
        "embedder",
        isTransientStatus(response.status) ? "transient" : "permanent",
        `Embedding service returned HTTP ${response.status}`,
        { status: response.status }
      );
    }

    const data = await readJson(response, "embedder", "Reading embedding response");
    if (!isEmbedResponse(data) || data.embeddings.length !== texts.length) {
      log.error("Invalid embedding response from Ollama", undefined, { expected: texts.length });
      throw new CollaboratorError("embedder", "permanent", "Invalid response from embedding service");
    }

    log.debug(`Embedded ${texts.length} texts`, { model: this.model });
    return data.embeddings;
  }

  /** Pull the embedding model when the Ollama host does not have it yet. */
  async ensureModel(): Promise<boolean> {
    try {
      const response = await fetch(`${this.host}/api/tags`, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        return false;
      }

      const data: unknown = await response.json();
      const hasModel =
        isTagsResponse(data) &&
        data.models.some((m) => m.name === this.model || m.name.startsWith(`${this.model}:`));

      if (!hasModel) {
        log.info(`Pulling ${this.model} model...`);
        await this.pullModel();
      }

      return true;
    } catch (error) {
      log.error("Failed to check Ollama models", error);
      return false;
    }
  }

  private async pullModel(): Promise<void> {
    const response = await fetch(`${this.host}/api/pull`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name: this.model, stream: false }),
    });

    if (!response.ok) {
      log.error("Failed to pull embedding model", undefined, { status: response.status, model: this.model });
      throw new CollaboratorError("embedder", "permanent", "Failed to initialize embedding model");
    }

    await response.text();
  }
}
