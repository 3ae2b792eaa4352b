import { createHash } from "node:crypto";
import type { Chunk, ChunkOptions, CrawledPage } from "../types.js";
import { config } from "../config.js";
import { InvalidConfigurationError } from "../errors.js";

const { defaultMaxChars: DEFAULT_MAX_CHARS, defaultOverlap: DEFAULT_OVERLAP } = config.chunker;

export function validateChunkOptions(maxChars: number, overlap: number): void {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new InvalidConfigurationError("maxChars must be a positive integer", { maxChars });
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError("overlap must be a non-negative integer", { overlap });
  }
  if (overlap >= maxChars) {
    throw new InvalidConfigurationError("overlap must be smaller than maxChars", { maxChars, overlap });
  }
}

/**
 * Split one document into fixed-size character windows.
 *
 * Window i covers `[start, min(start + maxChars, text.length))` and the next
 * window starts `maxChars - overlap` characters later. Cuts are not snapped to
 * word or sentence boundaries. Splitting stops once a window reaches the end
 * of the text, so the last chunk may be short but is never wholly contained in
 * the one before it.
 */
export function chunkText(
  text: string,
  maxChars: number,
  overlap: number,
  sourceUrl: string,
  title: string
): Chunk[] {
  validateChunkOptions(maxChars, overlap);

  const chunks: Chunk[] = [];
  const step = maxChars - overlap;
  const urlHash = hashUrl(sourceUrl);

  let start = 0;
  while (start < text.length) {
    const end = Math.min(start + maxChars, text.length);
    const chunkIndex = chunks.length;

    chunks.push({
      id: `${urlHash}-${chunkIndex}`,
      text: text.slice(start, end),
      sourceUrl,
      title,
      chunkIndex,
      charStart: start,
      charEnd: end,
      overlapWithPrevious: chunkIndex === 0 ? 0 : overlap,
    });

    if (end === text.length) {
      break;
    }
    start += step;
  }

  return chunks;
}

export function chunkPages(pages: CrawledPage[], options?: Partial<ChunkOptions>): Chunk[] {
  const maxChars = options?.maxChars ?? DEFAULT_MAX_CHARS;
  const overlap = options?.overlap ?? DEFAULT_OVERLAP;
  validateChunkOptions(maxChars, overlap);

  return pages.flatMap((page) => chunkText(page.extractedText, maxChars, overlap, page.url, page.title));
}

/** Chunk ids depend only on the source URL and position. */
export function chunkId(sourceUrl: string, chunkIndex: number): string {
  return `${hashUrl(sourceUrl)}-${chunkIndex}`;
}

function hashUrl(url: string): string {
  return createHash("sha256").update(url).digest("hex").slice(0, 16);
}
