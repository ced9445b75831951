export type CacheEntityKind = "video-status" | "query-response";

export type TierName = "memory" | "persistent" | "file";

export type VideoStatusKey = {
  readonly kind: "video-status";
  readonly videoId: string;
};

export type QueryResponseKey = {
  readonly kind: "query-response";
  readonly videoId: string;
  readonly fingerprint: string;
};

export type CacheKey = VideoStatusKey | QueryResponseKey;

type CacheEntryBase = {
  videoId: string;
  createdAt: number;
  tier: TierName;
};

export type VideoStatusEntry = CacheEntryBase & {
  kind: "video-status";
  processed: boolean;
};

export type QueryResponseEntry = CacheEntryBase & {
  kind: "query-response";
  fingerprint: string;
  queryText: string;
  response: string;
};

export type CacheEntry = VideoStatusEntry | QueryResponseEntry;

/**
 * Self-describing flat-file form of a cached answer. Field names follow the
 * on-disk JSON layout so a directory listing is enough to rebuild history.
 */
export type QueryRecordFile = {
  video_id: string;
  fingerprint: string;
  query: string;
  response: string;
  timestamp: number;
};

export type VideoStatusFile = {
  video_id: string;
  processed: boolean;
  timestamp: number;
};

export type ResponseSource = TierName | "approximate";

export type ResponseLookup = {
  response: string;
  source: ResponseSource;
};

export type Clock = () => number;
