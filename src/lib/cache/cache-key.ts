import { createHash } from "node:crypto";
import type { CacheEntry, CacheKey, QueryResponseKey, VideoStatusKey } from "@/types/cache";

export function normalizeQuery(query: string): string {
  return query.toLowerCase().split(/\s+/).filter(Boolean).join(" ");
}

export function fingerprintQuery(normalizedQuery: string): string {
  return createHash("md5").update(normalizedQuery).digest("hex");
}

export function videoStatusKey(videoId: string): VideoStatusKey {
  return { kind: "video-status", videoId };
}

export function queryResponseKey(videoId: string, query: string): QueryResponseKey {
  return {
    kind: "query-response",
    videoId,
    fingerprint: fingerprintQuery(normalizeQuery(query)),
  };
}

export function encodeCacheKey(key: CacheKey): string {
  if (key.kind === "video-status") {
    return `video_processed:${key.videoId}`;
  }

  return `query:${key.videoId}:${key.fingerprint}`;
}

export function keyOfEntry(entry: CacheEntry): CacheKey {
  if (entry.kind === "video-status") {
    return videoStatusKey(entry.videoId);
  }

  return { kind: "query-response", videoId: entry.videoId, fingerprint: entry.fingerprint };
}

export function entryMatchesKey(entry: CacheEntry, key: CacheKey): boolean {
  if (entry.kind !== key.kind || entry.videoId !== key.videoId) {
    return false;
  }

  return key.kind === "video-status" || (entry.kind === "query-response" && entry.fingerprint === key.fingerprint);
}

export function isEntryValid(entry: CacheEntry, now: number, ttlMs: number): boolean {
  return now - entry.createdAt < ttlMs;
}
