import { encodeCacheKey, keyOfEntry } from "@/lib/cache/cache-key";
import { hit, MISS, type TierReadResult, type TierStore } from "@/lib/cache/tiers/tier-store";
import { StorageUnavailableError } from "@/lib/errors";
import type { CacheEntry, CacheKey, TierName } from "@/types/cache";

export class FakeTier implements TierStore {
  readonly entries = new Map<string, CacheEntry>();
  failWrites = false;
  failReads = false;
  writes = 0;

  constructor(
    readonly name: TierName,
    readonly durable: boolean,
  ) {}

  async get(key: CacheKey): Promise<TierReadResult> {
    if (this.failReads) {
      return { status: "error", error: new StorageUnavailableError(this.name, `${this.name} read down`) };
    }

    const entry = this.entries.get(encodeCacheKey(key));
    return entry ? hit(entry) : MISS;
  }

  async set(entry: CacheEntry): Promise<void> {
    if (this.failWrites) {
      throw new StorageUnavailableError(this.name, `${this.name} write down`);
    }

    this.writes += 1;
    this.entries.set(encodeCacheKey(keyOfEntry(entry)), { ...entry, tier: this.name });
  }

  async exists(key: CacheKey): Promise<boolean> {
    return this.entries.has(encodeCacheKey(key));
  }
}
