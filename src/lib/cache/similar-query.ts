import { isEntryValid } from "@/lib/cache/cache-key";
import type { QueryRecordScan } from "@/lib/cache/tiers/file-tier";
import { DEFAULT_CACHE_TTL_MS, DEFAULT_SIMILARITY_THRESHOLD } from "@/lib/config/settings";
import { describeError, StorageUnavailableError } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/logger";
import type { Clock } from "@/types/cache";

export type QueryHistory = {
  listQueryRecords(videoId: string): Promise<QueryRecordScan>;
};

export type SimilarMatchResult =
  | { status: "match"; response: string; similarity: number; queryText: string }
  | { status: "miss" }
  | { status: "error"; error: StorageUnavailableError };

export type ApproximateMatchOptions = {
  threshold?: number;
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Recovers answers for paraphrased questions by Jaccard token overlap against
 * the non-expired query history of one video. Linear in the number of
 * distinct questions asked about that video.
 */
export class ApproximateMatchFallback {
  private readonly threshold: number;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly history: QueryHistory,
    options: ApproximateMatchOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async findSimilar(videoId: string, normalizedQuery: string): Promise<SimilarMatchResult> {
    const queryTokens = tokenSet(normalizedQuery);

    if (queryTokens.size === 0) {
      return { status: "miss" };
    }

    let scan: QueryRecordScan;

    try {
      scan = await this.history.listQueryRecords(videoId);
    } catch (error) {
      return {
        status: "error",
        error:
          error instanceof StorageUnavailableError
            ? error
            : new StorageUnavailableError("file", `Failed to enumerate query history: ${describeError(error)}`, {
                cause: error,
              }),
      };
    }

    for (const skipped of scan.skipped) {
      this.logger(`[similar-query] skipped ${skipped.path}: ${skipped.reason}`);
    }

    const now = this.clock();
    const candidates = scan.records
      .filter((record) => isEntryValid(record, now, this.ttlMs))
      .sort((left, right) => right.createdAt - left.createdAt);

    let best: { response: string; similarity: number; queryText: string } | null = null;

    for (const candidate of candidates) {
      const candidateTokens = tokenSet(candidate.queryText);

      if (candidateTokens.size === 0) {
        continue;
      }

      const similarity = jaccardSimilarity(queryTokens, candidateTokens);

      if (best === null || similarity > best.similarity) {
        best = { response: candidate.response, similarity, queryText: candidate.queryText };
      }
    }

    if (!best || best.similarity <= this.threshold) {
      return { status: "miss" };
    }

    return { status: "match", ...best };
  }
}

export function tokenSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

export function jaccardSimilarity(left: Set<string>, right: Set<string>): number {
  let intersection = 0;

  for (const token of left) {
    if (right.has(token)) {
      intersection += 1;
    }
  }

  const union = left.size + right.size - intersection;
  return union === 0 ? 0 : intersection / union;
}
