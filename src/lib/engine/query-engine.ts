import type { TieredCacheManager } from "@/lib/cache/tiered-cache";
import { DEFAULT_SUMMARY_TOP_K, DEFAULT_TOP_K, DEFAULT_VECTOR_WEIGHT } from "@/lib/config/settings";
import { scopedLogger, silentLogger, type Logger } from "@/lib/logger";
import { resolveVideoId } from "@/lib/pipeline/video-id";
import type { HybridRetrievalEngine } from "@/lib/retrieval/hybrid-search";
import type { LexicalIndexBuilder } from "@/lib/retrieval/lexical-index";
import type { ResponseSource } from "@/types/cache";
import type {
  AnswerGenerator,
  PassageIndexer,
  PassageSource,
  SearchMethod,
  SummaryLength,
} from "@/types/retrieval";

export const NO_CONTEXT_ANSWER = "I could not find anything in this video's transcript that answers the question.";
export const SUMMARY_QUERY = "full transcript";

export type VideoQaEngineDeps = {
  cache: TieredCacheManager;
  retrieval: HybridRetrievalEngine;
  lexicalIndex: LexicalIndexBuilder;
  passageSource: PassageSource;
  indexer: PassageIndexer;
  generator: AnswerGenerator;
  topK?: number;
  summaryTopK?: number;
  vectorWeight?: number;
  logger?: Logger;
};

export type ProcessVideoResult = {
  videoId: string;
  status: "already-processed" | "processed";
  passageCount: number;
};

export type QueryVideoOptions = {
  searchMethod?: SearchMethod;
  k?: number;
  stream?: boolean;
};

export type QueryVideoResult = {
  answer: string;
  source: ResponseSource | "generated" | "no-context";
  context: string[];
};

/** Cached and fixed answers arrive as a single token. */
export type StreamedQueryVideoResult = Omit<QueryVideoResult, "answer"> & {
  tokens: AsyncIterable<string>;
};

export function vectorWeightFor(method: SearchMethod, hybridWeight: number): number {
  if (method === "vector") {
    return 1;
  }

  if (method === "keyword") {
    return 0;
  }

  return hybridWeight;
}

export function summaryCacheQuery(length: SummaryLength): string {
  return `summarize ${length}`;
}

/** Ties the cache, retrieval and generation together for one video at a time. */
export class VideoQaEngine {
  private readonly logger: Logger;
  private readonly topK: number;
  private readonly summaryTopK: number;
  private readonly vectorWeight: number;

  constructor(private readonly deps: VideoQaEngineDeps) {
    this.logger = scopedLogger(deps.logger ?? silentLogger, "engine");
    this.topK = deps.topK ?? DEFAULT_TOP_K;
    this.summaryTopK = deps.summaryTopK ?? DEFAULT_SUMMARY_TOP_K;
    this.vectorWeight = deps.vectorWeight ?? DEFAULT_VECTOR_WEIGHT;
  }

  async processVideo(url: string): Promise<ProcessVideoResult> {
    const videoId = resolveVideoId(url);

    if (await this.deps.cache.hasProcessed(videoId)) {
      this.logger(`${videoId} already processed`);
      return { videoId, status: "already-processed", passageCount: 0 };
    }

    const passages = await this.deps.passageSource.loadPassages(videoId);
    await this.deps.indexer.indexPassages(videoId, passages);
    await this.deps.lexicalIndex.ensureIndex(videoId, passages);
    await this.deps.cache.markProcessed(videoId);

    this.logger(`${videoId} processed with ${passages.length} passages`);
    return { videoId, status: "processed", passageCount: passages.length };
  }

  queryVideo(
    videoId: string,
    query: string,
    options: QueryVideoOptions & { stream: true },
  ): Promise<StreamedQueryVideoResult>;
  queryVideo(videoId: string, query: string, options?: QueryVideoOptions & { stream?: false }): Promise<QueryVideoResult>;
  async queryVideo(
    videoId: string,
    query: string,
    options: QueryVideoOptions = {},
  ): Promise<QueryVideoResult | StreamedQueryVideoResult> {
    const cached = await this.deps.cache.lookupResponse(videoId, query);

    if (cached) {
      return settled({ answer: cached.response, source: cached.source, context: [] }, options.stream);
    }

    const weight = vectorWeightFor(options.searchMethod ?? "hybrid", this.vectorWeight);
    const context = await this.deps.retrieval.hybridSearch(videoId, query, options.k ?? this.topK, weight);

    if (context.length === 0) {
      this.logger(`no context for ${videoId}; answer not cached`);
      return settled({ answer: NO_CONTEXT_ANSWER, source: "no-context", context }, options.stream);
    }

    if (options.stream) {
      return { source: "generated", context, tokens: this.streamAndCache(videoId, query, context) };
    }

    const answer = await this.deps.generator.answer(query, context);
    await this.deps.cache.putResponse(videoId, query, answer);

    return { answer, source: "generated", context };
  }

  async summarizeVideo(videoId: string, length: SummaryLength = "medium"): Promise<string> {
    const cacheQuery = summaryCacheQuery(length);
    const cached = await this.deps.cache.getResponse(videoId, cacheQuery);

    if (cached !== null) {
      return cached;
    }

    const context = await this.deps.retrieval.hybridSearch(videoId, SUMMARY_QUERY, this.summaryTopK, this.vectorWeight);

    if (context.join("").trim() === "") {
      this.logger(`transcript for ${videoId} is empty, skipping summary`);
      return "";
    }

    const summary = await this.deps.generator.summarize(context, length);
    await this.deps.cache.putResponse(videoId, cacheQuery, summary);

    return summary;
  }

  // The answer is cached only once the stream has been read to the end.
  private async *streamAndCache(videoId: string, query: string, context: string[]): AsyncGenerator<string> {
    let answer = "";

    for await (const token of this.deps.generator.answerStream(query, context)) {
      answer += token;
      yield token;
    }

    await this.deps.cache.putResponse(videoId, query, answer.trim());
  }
}

function settled(result: QueryVideoResult, stream?: boolean): QueryVideoResult | StreamedQueryVideoResult {
  if (!stream) {
    return result;
  }

  return { source: result.source, context: result.context, tokens: singleToken(result.answer) };
}

async function* singleToken(text: string): AsyncGenerator<string> {
  yield text;
}
