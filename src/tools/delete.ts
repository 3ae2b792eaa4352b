import { z } from "zod";
import { errorMessage } from "../errors.js";
import { hostOf, normalizeUrl } from "../services/url.js";
import type { Runtime } from "../runtime.js";
import type { DeleteSourceResult } from "../types.js";
import { parseArgs } from "./args.js";

export const deleteArgsSchema = z.object({
  url: z.string(),
});

/**
 * Delete indexed chunks. A bare origin ("https://example.com") removes the
 * whole host; any other URL removes that one page.
 */
export async function deleteSource(args: unknown, runtime: Pick<Runtime, "store">): Promise<DeleteSourceResult> {
  const parsed = parseArgs(deleteArgsSchema, args);
  if (!parsed.ok) {
    return { success: false, deletedChunks: 0, url: "", error: parsed.error };
  }

  const { url } = parsed.data;
  const normalized = normalizeUrl(url);
  if (!normalized) {
    return { success: false, deletedChunks: 0, url, error: "Invalid URL: must be an absolute http(s) URL" };
  }

  try {
    const { pathname, search } = new URL(normalized);
    const wholeHost = pathname === "/" && !search;
    const deletedCount = wholeHost
      ? await runtime.store.deleteByHost(hostOf(normalized))
      : await runtime.store.deleteBySourceUrl(normalized);

    if (deletedCount === 0) {
      return { success: false, deletedChunks: 0, url, error: "No documents found matching this URL" };
    }

    return { success: true, deletedChunks: deletedCount, url };
  } catch (error) {
    return { success: false, deletedChunks: 0, url, error: errorMessage(error) };
  }
}
