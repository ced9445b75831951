import { ApproximateMatchFallback } from "@/lib/cache/similar-query";
import { TieredCacheManager } from "@/lib/cache/tiered-cache";
import { FileTier } from "@/lib/cache/tiers/file-tier";
import { MemoryTier } from "@/lib/cache/tiers/memory-tier";
import { SupabaseTier } from "@/lib/cache/tiers/supabase-tier";
import type { TierStore } from "@/lib/cache/tiers/tier-store";
import type { Settings } from "@/lib/config/settings";
import { createSupabaseAdminClient } from "@/lib/db/supabase-admin";
import { VideoQaEngine } from "@/lib/engine/query-engine";
import { requireEnv } from "@/lib/config/load-env";
import { OpenAiAnswerGenerator } from "@/lib/llm/answer-generator";
import { OpenAiEmbedder } from "@/lib/llm/embeddings";
import { createOpenAiClient } from "@/lib/llm/openai-client";
import { silentLogger, type Logger } from "@/lib/logger";
import { YoutubeTranscriptPassageSource } from "@/lib/pipeline/passage-source";
import { HybridRetrievalEngine } from "@/lib/retrieval/hybrid-search";
import { LexicalIndexBuilder } from "@/lib/retrieval/lexical-index";
import { SupabasePassageStore } from "@/lib/retrieval/supabase-passage-store";

/**
 * Cache tiers in lookup order: memory, Supabase when configured, then the
 * durable file tier. The file tier also serves as query history for the
 * approximate match fallback.
 */
export function createCacheManager(settings: Settings, logger: Logger = silentLogger): TieredCacheManager {
  const tiers: TierStore[] = [new MemoryTier({ maxEntries: settings.memoryCacheMax, ttlMs: settings.cacheTtlMs })];

  if (settings.supabaseUrl && settings.supabaseServiceRoleKey) {
    tiers.push(
      new SupabaseTier(createSupabaseAdminClient(settings.supabaseUrl, settings.supabaseServiceRoleKey), { logger }),
    );
  }

  const fileTier = new FileTier(settings.cacheDir);
  tiers.push(fileTier);

  return new TieredCacheManager(tiers, {
    ttlMs: settings.cacheTtlMs,
    logger,
    fallback: new ApproximateMatchFallback(fileTier, {
      threshold: settings.similarityThreshold,
      ttlMs: settings.cacheTtlMs,
      logger,
    }),
  });
}

export function createVideoQaEngine(settings: Settings, logger: Logger = silentLogger): VideoQaEngine {
  const openai = createOpenAiClient(settings.openaiApiKey ?? requireEnv("OPENAI_API_KEY"));
  const supabase = createSupabaseAdminClient(
    settings.supabaseUrl ?? requireEnv("SUPABASE_URL"),
    settings.supabaseServiceRoleKey ?? requireEnv("SUPABASE_SERVICE_ROLE_KEY"),
  );

  const passageStore = new SupabasePassageStore(supabase, new OpenAiEmbedder(openai, settings.embeddingsModel), {
    logger,
  });
  const lexicalIndex = new LexicalIndexBuilder({ logger });

  return new VideoQaEngine({
    cache: createCacheManager(settings, logger),
    retrieval: new HybridRetrievalEngine({
      dense: passageStore,
      lexicalIndex,
      catalog: passageStore,
      timeoutMs: settings.denseTimeoutMs,
      failurePolicy: settings.denseFailurePolicy,
      logger,
    }),
    lexicalIndex,
    passageSource: new YoutubeTranscriptPassageSource({
      windowSeconds: settings.chunkWindowSeconds,
      overlapSeconds: settings.chunkOverlapSeconds,
      logger,
    }),
    indexer: passageStore,
    generator: new OpenAiAnswerGenerator(openai, {
      model: settings.defaultModel,
      summaryModel: settings.summaryModel,
    }),
    topK: settings.topK,
    summaryTopK: settings.summaryTopK,
    vectorWeight: settings.vectorWeight,
    logger,
  });
}
