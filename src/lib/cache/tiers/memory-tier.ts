import { LRUCache } from "lru-cache";
import { encodeCacheKey, keyOfEntry } from "@/lib/cache/cache-key";
import { DEFAULT_CACHE_TTL_MS, DEFAULT_MEMORY_CACHE_MAX } from "@/lib/config/settings";
import { hit, MISS, type TierReadResult, type TierStore } from "@/lib/cache/tiers/tier-store";
import type { CacheEntry, CacheKey } from "@/types/cache";

export type MemoryTierOptions = {
  maxEntries?: number;
  ttlMs?: number;
};

/** Bounded in-process tier. Owned by whoever constructs it, never shared implicitly. */
export class MemoryTier implements TierStore {
  readonly name = "memory";
  readonly durable = false;
  private readonly entries: LRUCache<string, CacheEntry>;

  constructor(options: MemoryTierOptions = {}) {
    this.entries = new LRUCache<string, CacheEntry>({
      max: options.maxEntries ?? DEFAULT_MEMORY_CACHE_MAX,
      ttl: options.ttlMs ?? DEFAULT_CACHE_TTL_MS,
    });
  }

  async get(key: CacheKey): Promise<TierReadResult> {
    const entry = this.entries.get(encodeCacheKey(key));
    return entry ? hit(entry) : MISS;
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(encodeCacheKey(keyOfEntry(entry)), { ...entry, tier: this.name });
  }

  async exists(key: CacheKey): Promise<boolean> {
    return this.entries.has(encodeCacheKey(key));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
