import {
  isEntryValid,
  normalizeQuery,
  queryResponseKey,
  videoStatusKey,
} from "@/lib/cache/cache-key";
import type { ApproximateMatchFallback } from "@/lib/cache/similar-query";
import type { TierStore } from "@/lib/cache/tiers/tier-store";
import { DEFAULT_CACHE_TTL_MS } from "@/lib/config/settings";
import { describeError } from "@/lib/errors";
import { scopedLogger, silentLogger, type Logger } from "@/lib/logger";
import type { CacheEntry, CacheKey, Clock, ResponseLookup } from "@/types/cache";

export type TieredCacheOptions = {
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
  fallback?: ApproximateMatchFallback;
};

type TierHit = {
  entry: CacheEntry;
  tierIndex: number;
};

/**
 * Read-through / write-through cache over an ordered list of tiers, fastest
 * first. A valid hit in a slower tier is copied into every faster tier before
 * it is returned. Writes go to every tier at once; only a failure of a
 * durable tier is raised, the rest are logged.
 */
export class TieredCacheManager {
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly fallback: ApproximateMatchFallback | null;

  constructor(
    private readonly tiers: readonly TierStore[],
    options: TieredCacheOptions = {},
  ) {
    const ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;

    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of milliseconds, got ${ttlMs}`);
    }

    if (tiers.length === 0) {
      throw new Error("TieredCacheManager needs at least one tier");
    }

    this.ttlMs = ttlMs;
    this.clock = options.clock ?? Date.now;
    this.logger = scopedLogger(options.logger ?? silentLogger, "cache");
    this.fallback = options.fallback ?? null;
  }

  get tierNames(): string[] {
    return this.tiers.map((tier) => tier.name);
  }

  async hasProcessed(videoId: string): Promise<boolean> {
    const found = await this.readThrough(videoStatusKey(videoId));

    if (!found || found.entry.kind !== "video-status") {
      return false;
    }

    return found.entry.processed;
  }

  async markProcessed(videoId: string): Promise<void> {
    await this.writeThrough({
      kind: "video-status",
      videoId,
      processed: true,
      createdAt: this.clock(),
      tier: "memory",
    });
  }

  async getResponse(videoId: string, query: string): Promise<string | null> {
    const lookup = await this.lookupResponse(videoId, query);
    return lookup?.response ?? null;
  }

  async lookupResponse(videoId: string, query: string): Promise<ResponseLookup | null> {
    const key = queryResponseKey(videoId, query);
    const found = await this.readThrough(key);

    if (found && found.entry.kind === "query-response") {
      return { response: found.entry.response, source: this.tiers[found.tierIndex].name };
    }

    if (!this.fallback) {
      return null;
    }

    const similar = await this.fallback.findSimilar(videoId, normalizeQuery(query));

    if (similar.status === "error") {
      this.logger(`approximate lookup failed for ${videoId}: ${similar.error.message}`);
      return null;
    }

    if (similar.status === "miss") {
      return null;
    }

    this.logger(`approximate hit for ${videoId} (similarity ${similar.similarity.toFixed(3)})`);
    return { response: similar.response, source: "approximate" };
  }

  async putResponse(videoId: string, query: string, response: string): Promise<void> {
    const key = queryResponseKey(videoId, query);

    await this.writeThrough({
      kind: "query-response",
      videoId,
      fingerprint: key.fingerprint,
      queryText: normalizeQuery(query),
      response,
      createdAt: this.clock(),
      tier: "memory",
    });
  }

  private async readThrough(key: CacheKey): Promise<TierHit | null> {
    const now = this.clock();

    for (let tierIndex = 0; tierIndex < this.tiers.length; tierIndex += 1) {
      const tier = this.tiers[tierIndex];
      const result = await tier.get(key);

      if (result.status === "error") {
        this.logger(`${tier.name} tier read skipped: ${result.error.message}`);
        continue;
      }

      if (result.status === "miss" || !isEntryValid(result.entry, now, this.ttlMs)) {
        continue;
      }

      await this.promote(result.entry, tierIndex);
      return { entry: result.entry, tierIndex };
    }

    return null;
  }

  private async promote(entry: CacheEntry, hitIndex: number): Promise<void> {
    if (hitIndex === 0) {
      return;
    }

    const faster = this.tiers.slice(0, hitIndex);
    const results = await Promise.allSettled(faster.map((tier) => tier.set(entry)));

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger(`promotion into ${faster[index].name} tier failed: ${describeError(result.reason)}`);
      }
    });
  }

  private async writeThrough(entry: CacheEntry): Promise<void> {
    const results = await Promise.allSettled(this.tiers.map((tier) => tier.set(entry)));
    let durableFailure: unknown = null;

    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        return;
      }

      const tier = this.tiers[index];
      this.logger(`${tier.name} tier write failed: ${describeError(result.reason)}`);

      if (tier.durable && durableFailure === null) {
        durableFailure = result.reason;
      }
    });

    if (durableFailure !== null) {
      throw durableFailure instanceof Error ? durableFailure : new Error("Durable cache tier write failed");
    }
  }
}
