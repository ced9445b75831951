import type { MalformedRecordError, StorageUnavailableError } from "@/lib/errors";
import type { CacheEntry, CacheKey, TierName } from "@/types/cache";

export type TierReadResult =
  | { status: "hit"; entry: CacheEntry }
  | { status: "miss" }
  | { status: "error"; error: StorageUnavailableError | MalformedRecordError };

/**
 * One backing store of the cache hierarchy. Stores hold no cross-tier logic:
 * reads never throw (failures come back as an `error` result) while writes
 * throw `StorageUnavailableError`.
 */
export type TierStore = {
  readonly name: TierName;
  /** The durable tier is the source of truth; its write failures are raised. */
  readonly durable: boolean;
  get(key: CacheKey): Promise<TierReadResult>;
  set(entry: CacheEntry): Promise<void>;
  /** True exactly when `get` would hit. Age is judged by the manager, not the tier. */
  exists(key: CacheKey): Promise<boolean>;
};

export const MISS: TierReadResult = { status: "miss" };

export function hit(entry: CacheEntry): TierReadResult {
  return { status: "hit", entry };
}
