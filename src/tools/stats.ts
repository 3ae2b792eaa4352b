import { errorMessage } from "../errors.js";
import type { Runtime } from "../runtime.js";
import type { KnowledgeBaseStatsResult } from "../types.js";

export async function knowledgeBaseStats(runtime: Pick<Runtime, "store">): Promise<KnowledgeBaseStatsResult> {
  try {
    return await runtime.store.stats();
  } catch (error) {
    return { collectionName: "", totalDocuments: 0, error: errorMessage(error) };
  }
}
