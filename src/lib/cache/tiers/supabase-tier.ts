import type { SupabaseClient } from "@supabase/supabase-js";
import { encodeCacheKey, entryMatchesKey, keyOfEntry } from "@/lib/cache/cache-key";
import { hit, MISS, type TierReadResult, type TierStore } from "@/lib/cache/tiers/tier-store";
import {
  selectCacheEntry,
  upsertCacheEntry,
  type CacheEntryRow,
} from "@/lib/db/repositories/cache-entries";
import { describeError, MalformedRecordError, StorageUnavailableError } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/logger";
import { retryWithBackoff, type RetryOptions } from "@/lib/utils/retry";
import type { CacheEntry, CacheKey } from "@/types/cache";

type SupabaseTierOptions = {
  retry?: RetryOptions;
  logger?: Logger;
};

/** Persistent key-value tier stored in a Supabase table keyed by the encoded cache key. */
export class SupabaseTier implements TierStore {
  readonly name = "persistent";
  readonly durable = false;
  private readonly logger: Logger;

  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseTierOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async get(key: CacheKey): Promise<TierReadResult> {
    const encoded = encodeCacheKey(key);
    let row: unknown;

    try {
      row = await selectCacheEntry(this.client, encoded);
    } catch (error) {
      return {
        status: "error",
        error: new StorageUnavailableError("persistent", describeError(error), { cause: error }),
      };
    }

    if (row === null || row === undefined) {
      return MISS;
    }

    const entry = parseCacheEntryRow(row);

    if (!entry || !entryMatchesKey(entry, key)) {
      return { status: "error", error: new MalformedRecordError(encoded, `Unreadable cache row ${encoded}`) };
    }

    return hit(entry);
  }

  async set(entry: CacheEntry): Promise<void> {
    const row = toCacheEntryRow(entry);

    try {
      await retryWithBackoff(() => upsertCacheEntry(this.client, row), {
        ...this.options.retry,
        onRetry: (attempt, error) => {
          this.logger(`[persistent-tier] retry ${attempt} for ${row.key}: ${describeError(error)}`);
        },
      });
    } catch (error) {
      throw new StorageUnavailableError("persistent", describeError(error), { cause: error });
    }
  }

  async exists(key: CacheKey): Promise<boolean> {
    const result = await this.get(key);

    if (result.status === "error") {
      this.logger(`[persistent-tier] exists check failed: ${result.error.message}`);
    }

    return result.status === "hit";
  }
}

export function toCacheEntryRow(entry: CacheEntry): CacheEntryRow {
  const key = encodeCacheKey(keyOfEntry(entry));

  if (entry.kind === "video-status") {
    return {
      key,
      kind: entry.kind,
      video_id: entry.videoId,
      fingerprint: null,
      query_text: null,
      payload: entry.processed,
      created_at: entry.createdAt,
    };
  }

  return {
    key,
    kind: entry.kind,
    video_id: entry.videoId,
    fingerprint: entry.fingerprint,
    query_text: entry.queryText,
    payload: entry.response,
    created_at: entry.createdAt,
  };
}

export function parseCacheEntryRow(row: unknown): CacheEntry | null {
  if (typeof row !== "object" || row === null) {
    return null;
  }

  const value: Record<string, unknown> = Object.fromEntries(Object.entries(row));
  const createdAt = typeof value.created_at === "string" ? Number(value.created_at) : value.created_at;

  if (typeof value.video_id !== "string" || typeof createdAt !== "number" || !Number.isFinite(createdAt)) {
    return null;
  }

  if (value.kind === "video-status" && typeof value.payload === "boolean") {
    return {
      kind: "video-status",
      videoId: value.video_id,
      processed: value.payload,
      createdAt,
      tier: "persistent",
    };
  }

  if (
    value.kind === "query-response" &&
    typeof value.payload === "string" &&
    typeof value.fingerprint === "string" &&
    typeof value.query_text === "string"
  ) {
    return {
      kind: "query-response",
      videoId: value.video_id,
      fingerprint: value.fingerprint,
      queryText: value.query_text,
      response: value.payload,
      createdAt,
      tier: "persistent",
    };
  }

  return null;
}
