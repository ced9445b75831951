import { ensureEnvLoaded, readNumberEnv } from "@/lib/config/load-env";
import type { DenseFailurePolicy } from "@/types/retrieval";

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_MEMORY_CACHE_MAX = 1000;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;
export const DEFAULT_VECTOR_WEIGHT = 0.7;
export const DEFAULT_TOP_K = 4;
export const DEFAULT_SUMMARY_TOP_K = 20;

export type Settings = {
  cacheDir: string;
  cacheTtlMs: number;
  memoryCacheMax: number;
  similarityThreshold: number;
  denseTimeoutMs: number;
  denseFailurePolicy: DenseFailurePolicy;
  vectorWeight: number;
  topK: number;
  summaryTopK: number;
  chunkWindowSeconds: number;
  chunkOverlapSeconds: number;
  openaiApiKey: string | null;
  embeddingsModel: string;
  defaultModel: string;
  summaryModel: string;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  if (env === process.env) {
    ensureEnvLoaded();
  }

  const defaultModel = env.DEFAULT_MODEL || "gpt-4o-mini";

  return {
    cacheDir: env.VIDEO_QA_CACHE_DIR || ".cache/video-qa",
    cacheTtlMs: positive(readNumberEnv("VIDEO_QA_CACHE_TTL_MS", DEFAULT_CACHE_TTL_MS, env), DEFAULT_CACHE_TTL_MS),
    memoryCacheMax: Math.floor(
      positive(readNumberEnv("VIDEO_QA_MEMORY_CACHE_MAX", DEFAULT_MEMORY_CACHE_MAX, env), DEFAULT_MEMORY_CACHE_MAX),
    ),
    similarityThreshold: unitInterval(
      readNumberEnv("VIDEO_QA_SIMILARITY_THRESHOLD", DEFAULT_SIMILARITY_THRESHOLD, env),
      DEFAULT_SIMILARITY_THRESHOLD,
    ),
    denseTimeoutMs: positive(readNumberEnv("VIDEO_QA_DENSE_TIMEOUT_MS", 10_000, env), 10_000),
    denseFailurePolicy: env.VIDEO_QA_DENSE_FAILURE_POLICY === "fail" ? "fail" : "lexical-only",
    vectorWeight: unitInterval(readNumberEnv("VIDEO_QA_VECTOR_WEIGHT", DEFAULT_VECTOR_WEIGHT, env), DEFAULT_VECTOR_WEIGHT),
    topK: Math.floor(positive(readNumberEnv("VIDEO_QA_TOP_K", DEFAULT_TOP_K, env), DEFAULT_TOP_K)),
    summaryTopK: Math.floor(
      positive(readNumberEnv("VIDEO_QA_SUMMARY_TOP_K", DEFAULT_SUMMARY_TOP_K, env), DEFAULT_SUMMARY_TOP_K),
    ),
    chunkWindowSeconds: positive(readNumberEnv("VIDEO_QA_CHUNK_WINDOW_SECONDS", 60, env), 60),
    chunkOverlapSeconds: Math.max(readNumberEnv("VIDEO_QA_CHUNK_OVERLAP_SECONDS", 10, env), 0),
    openaiApiKey: env.OPENAI_API_KEY || null,
    embeddingsModel: env.EMBEDDINGS_MODEL || "text-embedding-3-small",
    defaultModel,
    summaryModel: env.SUMMARY_MODEL || defaultModel,
    supabaseUrl: env.SUPABASE_URL || null,
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || null,
  };
}

function positive(value: number, fallback: number): number {
  return value > 0 ? value : fallback;
}

function unitInterval(value: number, fallback: number): number {
  return value >= 0 && value <= 1 ? value : fallback;
}
