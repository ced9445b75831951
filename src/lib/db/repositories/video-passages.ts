import type { SupabaseClient } from "@supabase/supabase-js";
import { retryWithBackoff, type RetryOptions } from "@/lib/utils/retry";
import type { Passage } from "@/types/retrieval";

export const VIDEO_PASSAGES_TABLE = "video_passages";

export type VideoPassageRow = {
  id: string;
  video_id: string;
  chunk_index: number;
  start_sec: number;
  end_sec: number;
  content: string;
  embedding: number[];
};

export async function upsertVideoPassages(
  client: SupabaseClient,
  rows: VideoPassageRow[],
  batchSize = 100,
  retryOptions: RetryOptions = {},
): Promise<void> {
  for (let index = 0; index < rows.length; index += batchSize) {
    const batch = rows.slice(index, index + batchSize);

    await retryWithBackoff(async () => {
      const { error } = await client.from(VIDEO_PASSAGES_TABLE).upsert(batch, { onConflict: "id" });

      if (error) {
        throw new Error(`Failed to upsert video passages: ${error.message}`);
      }
    }, retryOptions);
  }
}

export async function deleteVideoPassages(client: SupabaseClient, videoId: string): Promise<void> {
  const { error } = await client.from(VIDEO_PASSAGES_TABLE).delete().eq("video_id", videoId);

  if (error) {
    throw new Error(`Failed to delete video passages: ${error.message}`);
  }
}

export async function matchVideoPassages(
  client: SupabaseClient,
  videoId: string,
  embedding: number[],
  limit: number,
): Promise<Passage[]> {
  const { data, error } = await client.rpc("match_video_passages", {
    p_video_id: videoId,
    p_query_embedding: embedding,
    p_match_count: limit,
  });

  if (error) {
    throw new Error(`match_video_passages rpc failed: ${error.message}`);
  }

  return parsePassageRows(data);
}

export const PASSAGE_PAGE_SIZE = 1000;

export async function listVideoPassages(
  client: SupabaseClient,
  videoId: string,
  pageSize = PASSAGE_PAGE_SIZE,
): Promise<Passage[]> {
  const rows = await fetchAllPages(async (from, to) => {
    const { data, error } = await client
      .from(VIDEO_PASSAGES_TABLE)
      .select("id, video_id, chunk_index, start_sec, end_sec, content")
      .eq("video_id", videoId)
      .order("chunk_index", { ascending: true })
      .range(from, to);

    if (error) {
      throw new Error(`Failed to load video passages: ${error.message}`);
    }

    return data ?? [];
  }, pageSize);

  return parsePassageRows(rows);
}

/** Reads inclusive `[from, to]` pages until one comes back short. */
export async function fetchAllPages<T>(
  fetchPage: (from: number, to: number) => Promise<T[]>,
  pageSize: number,
): Promise<T[]> {
  if (pageSize <= 0) {
    throw new RangeError(`Page size must be positive, got ${pageSize}`);
  }

  const rows: T[] = [];

  for (let from = 0; ; from += pageSize) {
    const page = await fetchPage(from, from + pageSize - 1);
    rows.push(...page);

    if (page.length < pageSize) {
      return rows;
    }
  }
}

export function toVideoPassageRow(passage: Passage, embedding: number[]): VideoPassageRow {
  return {
    id: passage.id,
    video_id: passage.metadata.videoId,
    chunk_index: passage.metadata.chunkIndex,
    start_sec: passage.metadata.startSec,
    end_sec: passage.metadata.endSec,
    content: passage.text,
    embedding,
  };
}

/** Rows that do not carry the passage columns are dropped. */
export function parsePassageRows(value: unknown): Passage[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const passages: Passage[] = [];

  for (const item of value) {
    if (typeof item !== "object" || item === null) {
      continue;
    }

    const row: Record<string, unknown> = Object.fromEntries(Object.entries(item));

    if (
      typeof row.id !== "string" ||
      typeof row.video_id !== "string" ||
      typeof row.content !== "string" ||
      typeof row.chunk_index !== "number"
    ) {
      continue;
    }

    passages.push({
      id: row.id,
      text: row.content,
      metadata: {
        videoId: row.video_id,
        chunkIndex: row.chunk_index,
        startSec: toNumber(row.start_sec),
        endSec: toNumber(row.end_sec),
        source: "transcript",
      },
    });
  }

  return passages;
}

function toNumber(value: unknown): number {
  const parsed = typeof value === "string" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : 0;
}
