import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { silentLogger, type Logger } from "@/lib/logger";
import type { Passage, RankedCandidate } from "@/types/retrieval";

export type Bm25Parameters = {
  k1: number;
  b: number;
  epsilon: number;
};

export const DEFAULT_BM25_PARAMETERS: Bm25Parameters = {
  k1: 1.5,
  b: 0.75,
  epsilon: 0.25,
};

/** Immutable BM25 statistics over one build of a video's passages. */
export type LexicalIndexSnapshot = {
  readonly videoId: string;
  readonly generation: number;
  readonly passages: readonly Passage[];
  readonly termFrequencies: ReadonlyArray<ReadonlyMap<string, number>>;
  readonly documentLengths: readonly number[];
  readonly averageDocumentLength: number;
  readonly idf: ReadonlyMap<string, number>;
};

export type PassageSupplier = readonly Passage[] | (() => Promise<Passage[]>);

type LexicalIndexOptions = Partial<Bm25Parameters> & {
  batchSize?: number;
  logger?: Logger;
};

/**
 * Per-video lexical index registry. A build happens off to the side and is
 * published by a single map assignment, so readers always hold either the
 * previous or the new complete snapshot. Overlapping builds for one video
 * publish only the most recently started one.
 */
export class LexicalIndexBuilder {
  private readonly snapshots = new Map<string, LexicalIndexSnapshot>();
  private readonly latestGeneration = new Map<string, number>();
  private readonly inFlight = new Map<string, Promise<LexicalIndexSnapshot>>();
  private generationCounter = 0;
  private readonly parameters: Bm25Parameters;
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(options: LexicalIndexOptions = {}) {
    this.parameters = {
      k1: options.k1 ?? DEFAULT_BM25_PARAMETERS.k1,
      b: options.b ?? DEFAULT_BM25_PARAMETERS.b,
      epsilon: options.epsilon ?? DEFAULT_BM25_PARAMETERS.epsilon,
    };
    this.batchSize = Math.max(options.batchSize ?? 256, 1);
    this.logger = options.logger ?? silentLogger;
  }

  ensureIndex(videoId: string, passages: readonly Passage[]): Promise<LexicalIndexSnapshot> {
    return this.build(videoId, [...passages], this.claimGeneration(videoId));
  }

  hasIndex(videoId: string): boolean {
    return this.snapshots.has(videoId);
  }

  getSnapshot(videoId: string): LexicalIndexSnapshot | null {
    return this.snapshots.get(videoId) ?? null;
  }

  invalidate(videoId: string): void {
    this.claimGeneration(videoId);
    this.snapshots.delete(videoId);
    this.inFlight.delete(videoId);
  }

  /**
   * Ranks against the published snapshot. Without one, waits for a build
   * already in flight, or builds from `available`. A lazy build claims its
   * generation before the passages are read, so a build started while they
   * load wins the publish.
   */
  async search(
    videoId: string,
    query: string,
    k: number,
    available?: PassageSupplier,
  ): Promise<RankedCandidate[]> {
    if (k <= 0) {
      return [];
    }

    const snapshot =
      this.snapshots.get(videoId) ?? (await this.inFlight.get(videoId)) ?? (await this.buildLazily(videoId, available));

    return snapshot ? rankSnapshot(snapshot, query, k, this.parameters) : [];
  }

  private async buildLazily(videoId: string, available?: PassageSupplier): Promise<LexicalIndexSnapshot | null> {
    const generation = this.claimGeneration(videoId);
    const passages = typeof available === "function" ? await available() : [...(available ?? [])];

    if (passages.length === 0) {
      return this.snapshots.get(videoId) ?? null;
    }

    const built = await this.build(videoId, passages, generation);
    return this.snapshots.get(videoId) ?? built;
  }

  private claimGeneration(videoId: string): number {
    this.generationCounter += 1;
    this.latestGeneration.set(videoId, this.generationCounter);
    return this.generationCounter;
  }

  private async build(videoId: string, passages: Passage[], generation: number): Promise<LexicalIndexSnapshot> {
    const pending = buildSnapshot(videoId, generation, passages, this.parameters.epsilon, this.batchSize).then(
      (snapshot) => {
        if (this.latestGeneration.get(videoId) === generation) {
          this.snapshots.set(videoId, snapshot);
          this.logger(`[lexical-index] published ${videoId} generation=${generation} passages=${passages.length}`);
        }

        return snapshot;
      },
    );

    this.inFlight.set(videoId, pending);

    try {
      return await pending;
    } finally {
      if (this.inFlight.get(videoId) === pending) {
        this.inFlight.delete(videoId);
      }
    }
  }
}

export function tokenizeForLexicalIndex(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

export function scoreSnapshot(
  snapshot: LexicalIndexSnapshot,
  query: string,
  parameters: Bm25Parameters = DEFAULT_BM25_PARAMETERS,
): number[] {
  const queryTokens = tokenizeForLexicalIndex(query);
  const { k1, b } = parameters;
  const averageLength = snapshot.averageDocumentLength > 0 ? snapshot.averageDocumentLength : 1;

  return snapshot.termFrequencies.map((frequencies, index) => {
    const lengthNorm = 1 - b + (b * snapshot.documentLengths[index]) / averageLength;
    let score = 0;

    for (const token of queryTokens) {
      const tf = frequencies.get(token) ?? 0;

      if (tf === 0) {
        continue;
      }

      score += ((snapshot.idf.get(token) ?? 0) * (tf * (k1 + 1))) / (tf + k1 * lengthNorm);
    }

    return score;
  });
}

export function rankSnapshot(
  snapshot: LexicalIndexSnapshot,
  query: string,
  k: number,
  parameters: Bm25Parameters = DEFAULT_BM25_PARAMETERS,
): RankedCandidate[] {
  const scores = scoreSnapshot(snapshot, query, parameters);

  return scores
    .map((score, index) => ({ score, index }))
    .sort((left, right) => right.score - left.score || left.index - right.index)
    .slice(0, Math.max(k, 0))
    .map((row, rank) => ({
      passage: snapshot.passages[row.index],
      sourceScore: row.score,
      sourceRank: rank,
    }));
}

async function buildSnapshot(
  videoId: string,
  generation: number,
  passages: Passage[],
  epsilon: number,
  batchSize: number,
): Promise<LexicalIndexSnapshot> {
  const termFrequencies: Array<Map<string, number>> = [];
  const documentLengths: number[] = [];
  const documentFrequency = new Map<string, number>();

  for (let index = 0; index < passages.length; index += 1) {
    if (index > 0 && index % batchSize === 0) {
      await yieldToEventLoop();
    }

    const tokens = tokenizeForLexicalIndex(passages[index].text);
    const frequencies = new Map<string, number>();

    for (const token of tokens) {
      frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
    }

    for (const token of frequencies.keys()) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }

    termFrequencies.push(frequencies);
    documentLengths.push(tokens.length);
  }

  const totalLength = documentLengths.reduce((sum, length) => sum + length, 0);

  return {
    videoId,
    generation,
    passages,
    termFrequencies,
    documentLengths,
    averageDocumentLength: passages.length > 0 ? totalLength / passages.length : 0,
    idf: computeIdf(documentFrequency, passages.length, epsilon),
  };
}

// Okapi IDF; terms present in more than half the corpus go negative and are
// floored to epsilon times the average IDF.
function computeIdf(documentFrequency: Map<string, number>, corpusSize: number, epsilon: number): Map<string, number> {
  const idf = new Map<string, number>();
  const negative: string[] = [];
  let idfSum = 0;

  for (const [term, frequency] of documentFrequency) {
    const value = Math.log(corpusSize - frequency + 0.5) - Math.log(frequency + 0.5);
    idf.set(term, value);
    idfSum += value;

    if (value < 0) {
      negative.push(term);
    }
  }

  const averageIdf = idf.size > 0 ? idfSum / idf.size : 0;
  const floor = epsilon * averageIdf;

  for (const term of negative) {
    idf.set(term, floor);
  }

  return idf;
}
