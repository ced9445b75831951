import { DEFAULT_VECTOR_WEIGHT } from "@/lib/config/settings";
import { describeError, RetrievalUnavailableError, UpstreamUnavailableError } from "@/lib/errors";
import { scopedLogger, silentLogger, type Logger } from "@/lib/logger";
import { clampVectorWeight, fuseRankedLists, type FusedPassage } from "@/lib/retrieval/fusion";
import type { LexicalIndexBuilder } from "@/lib/retrieval/lexical-index";
import type {
  DenseFailurePolicy,
  DenseSimilarityProvider,
  Passage,
  PassageCatalog,
} from "@/types/retrieval";

export type HybridRetrievalOptions = {
  dense: DenseSimilarityProvider;
  lexicalIndex: LexicalIndexBuilder;
  catalog?: PassageCatalog;
  timeoutMs?: number;
  failurePolicy?: DenseFailurePolicy;
  logger?: Logger;
};

type SignalResult = { ok: true; passages: Passage[] } | { ok: false; error: unknown };

export class HybridRetrievalEngine {
  private readonly dense: DenseSimilarityProvider;
  private readonly lexicalIndex: LexicalIndexBuilder;
  private readonly catalog: PassageCatalog | null;
  private readonly timeoutMs: number;
  private readonly failurePolicy: DenseFailurePolicy;
  private readonly logger: Logger;

  constructor(options: HybridRetrievalOptions) {
    this.dense = options.dense;
    this.lexicalIndex = options.lexicalIndex;
    this.catalog = options.catalog ?? null;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.failurePolicy = options.failurePolicy ?? "lexical-only";
    this.logger = scopedLogger(options.logger ?? silentLogger, "hybrid-search");
  }

  async hybridSearch(
    videoId: string,
    query: string,
    k: number,
    vectorWeight: number = DEFAULT_VECTOR_WEIGHT,
  ): Promise<string[]> {
    const fused = await this.searchPassages(videoId, query, k, vectorWeight);
    return fused.map((item) => item.passage.text);
  }

  async searchPassages(
    videoId: string,
    query: string,
    k: number,
    vectorWeight: number = DEFAULT_VECTOR_WEIGHT,
  ): Promise<FusedPassage[]> {
    if (k <= 0) {
      return [];
    }

    const weight = clampVectorWeight(vectorWeight, DEFAULT_VECTOR_WEIGHT);
    const dense = await this.runDense(videoId, query, k);

    if (!dense.ok) {
      if (this.failurePolicy === "fail") {
        throw new UpstreamUnavailableError(`Failed to query dense index for ${videoId}: ${describeError(dense.error)}`, {
          cause: dense.error,
        });
      }

      this.logger(`dense search failed for ${videoId}, using lexical results only: ${describeError(dense.error)}`);
    }

    const densePassages = dense.ok ? dense.passages : [];
    const lexical = await this.runLexical(videoId, query, k, densePassages);

    if (!lexical.ok) {
      if (!dense.ok) {
        throw new RetrievalUnavailableError(`Failed to retrieve passages for ${videoId}: both signals unavailable`, {
          cause: lexical.error,
        });
      }

      this.logger(`lexical search failed for ${videoId}: ${describeError(lexical.error)}`);
    }

    const lexicalPassages = lexical.ok ? lexical.passages : [];

    if (densePassages.length === 0 && lexicalPassages.length === 0) {
      return [];
    }

    return fuseRankedLists(densePassages, lexicalPassages, weight).slice(0, k);
  }

  private async runDense(videoId: string, query: string, k: number): Promise<SignalResult> {
    try {
      const passages = await withTimeout(
        this.dense.similaritySearch(videoId, query, k),
        this.timeoutMs,
        `Dense search timed out after ${this.timeoutMs}ms`,
      );
      return { ok: true, passages: passages.slice(0, k) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private async runLexical(videoId: string, query: string, k: number, densePassages: Passage[]): Promise<SignalResult> {
    try {
      const ranked = await this.lexicalIndex.search(videoId, query, k, () =>
        this.passagesForLazyBuild(videoId, densePassages),
      );
      return { ok: true, passages: ranked.map((candidate) => candidate.passage) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private async passagesForLazyBuild(videoId: string, densePassages: Passage[]): Promise<Passage[]> {
    if (!this.catalog) {
      return densePassages;
    }

    try {
      const passages = await this.catalog.listPassages(videoId);
      return passages.length > 0 ? passages : densePassages;
    } catch (error) {
      this.logger(`passage catalog unavailable for ${videoId}: ${describeError(error)}`);
      return densePassages;
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new UpstreamUnavailableError(message)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
