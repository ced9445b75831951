import type { SupabaseClient } from "@supabase/supabase-js";
import type { CacheEntityKind } from "@/types/cache";

export const CACHE_ENTRIES_TABLE = "video_qa_cache_entries";

export type CacheEntryRow = {
  key: string;
  kind: CacheEntityKind;
  video_id: string;
  fingerprint: string | null;
  query_text: string | null;
  payload: string | boolean;
  created_at: number;
};

export async function selectCacheEntry(client: SupabaseClient, key: string): Promise<unknown> {
  const { data, error } = await client
    .from(CACHE_ENTRIES_TABLE)
    .select("key, kind, video_id, fingerprint, query_text, payload, created_at")
    .eq("key", key)
    .maybeSingle();

  if (error) {
    throw new Error(`Failed to load cache entry: ${error.message}`);
  }

  return data;
}

export async function upsertCacheEntry(client: SupabaseClient, row: CacheEntryRow): Promise<void> {
  const { error } = await client.from(CACHE_ENTRIES_TABLE).upsert(row, { onConflict: "key" });

  if (error) {
    throw new Error(`Failed to upsert cache entry: ${error.message}`);
  }
}

