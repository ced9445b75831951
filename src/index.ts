export { normalizeQuery, fingerprintQuery, encodeCacheKey } from "@/lib/cache/cache-key";
export { TieredCacheManager, type TieredCacheOptions } from "@/lib/cache/tiered-cache";
export { ApproximateMatchFallback, jaccardSimilarity } from "@/lib/cache/similar-query";
export { MemoryTier } from "@/lib/cache/tiers/memory-tier";
export { FileTier } from "@/lib/cache/tiers/file-tier";
export { SupabaseTier } from "@/lib/cache/tiers/supabase-tier";
export type { TierStore, TierReadResult } from "@/lib/cache/tiers/tier-store";
export { loadSettings, type Settings } from "@/lib/config/settings";
export { createCacheManager, createVideoQaEngine } from "@/lib/engine/create-engine";
export { VideoQaEngine, type QueryVideoResult, type StreamedQueryVideoResult } from "@/lib/engine/query-engine";
export {
  MalformedRecordError,
  RetrievalUnavailableError,
  StorageUnavailableError,
  UpstreamUnavailableError,
} from "@/lib/errors";
export type { Logger } from "@/lib/logger";
export { extractVideoId, resolveVideoId } from "@/lib/pipeline/video-id";
export { TranscriptUnavailableError } from "@/lib/pipeline/transcript/fetch-transcript";
export { fuseRankedLists } from "@/lib/retrieval/fusion";
export { HybridRetrievalEngine } from "@/lib/retrieval/hybrid-search";
export { LexicalIndexBuilder } from "@/lib/retrieval/lexical-index";
export type * from "@/types/cache";
export type * from "@/types/retrieval";
