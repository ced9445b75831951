import type { SupabaseClient } from "@supabase/supabase-js";
import {
  deleteVideoPassages,
  listVideoPassages,
  matchVideoPassages,
  toVideoPassageRow,
  upsertVideoPassages,
} from "@/lib/db/repositories/video-passages";
import type { Embedder } from "@/lib/llm/embeddings";
import { silentLogger, type Logger } from "@/lib/logger";
import type { RetryOptions } from "@/lib/utils/retry";
import type { DenseSimilarityProvider, Passage, PassageCatalog, PassageIndexer } from "@/types/retrieval";

type SupabasePassageStoreOptions = {
  embedBatchSize?: number;
  retry?: RetryOptions;
  logger?: Logger;
};

/**
 * Vector store for transcript passages: embeddings in `video_passages`,
 * nearest-neighbour lookups through `match_video_passages`, one namespace
 * per video id.
 */
export class SupabasePassageStore implements DenseSimilarityProvider, PassageCatalog, PassageIndexer {
  private readonly logger: Logger;

  constructor(
    private readonly client: SupabaseClient,
    private readonly embedder: Embedder,
    private readonly options: SupabasePassageStoreOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async similaritySearch(videoId: string, query: string, k: number): Promise<Passage[]> {
    if (k <= 0) {
      return [];
    }

    const embedding = await this.embedder.embed(query);
    return matchVideoPassages(this.client, videoId, embedding, k);
  }

  listPassages(videoId: string): Promise<Passage[]> {
    return listVideoPassages(this.client, videoId);
  }

  async indexPassages(videoId: string, passages: Passage[]): Promise<void> {
    const batchSize = Math.max(this.options.embedBatchSize ?? 64, 1);

    await deleteVideoPassages(this.client, videoId);

    for (let index = 0; index < passages.length; index += batchSize) {
      const batch = passages.slice(index, index + batchSize);
      const embeddings = await this.embedder.embedBatch(batch.map((passage) => passage.text));
      const rows = batch.map((passage, offset) => toVideoPassageRow(passage, embeddings[offset]));

      await upsertVideoPassages(this.client, rows, batchSize, this.options.retry);
      this.logger(`[passage-store] ${videoId}: indexed ${index + batch.length}/${passages.length}`);
    }
  }
}
