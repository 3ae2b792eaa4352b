/**
 * Centralized configuration for the site Q&A MCP server
 * All environment variables and constants in one place
 */

import { logger } from "./logger.js";

/**
 * Validate service URL to prevent SSRF attacks via environment variables
 * Only allows localhost URLs for internal services (Ollama, ChromaDB)
 */
function validateServiceUrl(url: string, serviceName: string): string {
  try {
    const parsed = new URL(url);

    if (!["http:", "https:"].includes(parsed.protocol)) {
      throw new Error(`Invalid protocol for ${serviceName}: only http/https allowed`);
    }

    const allowedHosts = ["localhost", "127.0.0.1", "ollama", "chromadb", "chroma"];
    const hostname = parsed.hostname.toLowerCase();

    if (!allowedHosts.includes(hostname)) {
      // Docker/compose setups use other names; warn only
      logger.warn(`Non-standard host for ${serviceName}`, { host: hostname });
    }

    return url.replace(/\/+$/, "");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid URL";
    logger.error(`Invalid ${serviceName} URL configuration`, undefined, { url, error: message });
    throw new Error(`Invalid ${serviceName} URL: ${message}`);
  }
}

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    logger.warn(`Ignoring invalid ${name}`, { value: raw });
    return fallback;
  }
  return value;
}

export const config = {
  ollama: {
    host: validateServiceUrl(process.env.OLLAMA_HOST ?? "http://localhost:11434", "OLLAMA_HOST"),
    embeddingModel: process.env.OLLAMA_EMBED_MODEL ?? "nomic-embed-text",
    chatModel: process.env.OLLAMA_CHAT_MODEL ?? "llama3.1",
    temperature: 0.3,
    maxAnswerTokens: 1000,
    batchSize: 32,
    requestTimeoutMs: 60000,
  },

  chroma: {
    host: validateServiceUrl(process.env.CHROMA_HOST ?? "http://localhost:8000", "CHROMA_HOST"),
    collectionName: process.env.CHROMA_COLLECTION ?? "site_qa_chunks",
  },

  crawler: {
    defaultMaxPages: 50,
    defaultMaxDepth: 3,
    maxPagesLimit: 500,
    maxDepthLimit: 10,
    requestTimeoutMs: 10000,
    requestDelayMs: readIntEnv("CRAWL_REQUEST_DELAY_MS", 250),
    maxRedirects: 5,
    maxResponseSizeBytes: 10 * 1024 * 1024, // 10 MB limit per page
    userAgent: "site-qa-mcp/1.0 (+question-answering crawler)",
    skipPaths: [
      "/login",
      "/signin",
      "/sign-in",
      "/auth",
      "/signup",
      "/sign-up",
      "/register",
      "/registration",
      "/cart",
      "/checkout",
      "/shop",
      "/store",
      "/admin",
      "/dashboard",
      "/privacy",
      "/terms",
      "/legal",
      "/contact",
      "/support/contact",
      "/search",
    ],
    skipExtensions: /\.(pdf|zip|gz|tar|png|jpe?g|gif|svg|webp|ico|css|js|mp3|mp4|webm|woff2?)$/i,
  },

  chunker: {
    defaultMaxChars: 800,
    defaultOverlap: 100,
  },

  // Retry applies to embedder and vector store calls made during ingestion
  retry: {
    maxAttempts: 3,
    baseDelayMs: 250,
    maxDelayMs: 5000,
  },

  search: {
    defaultTopK: 5,
    maxTopK: 50,
    maxQueryLength: 10000,
  },
} as const;

export type Config = typeof config;
