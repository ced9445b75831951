export type PassageMetadata = {
  videoId: string;
  chunkIndex: number;
  startSec: number;
  endSec: number;
  source: "transcript";
};

export type Passage = {
  id: string;
  text: string;
  metadata: PassageMetadata;
};

export type RankedCandidate = {
  passage: Passage;
  sourceScore: number;
  sourceRank: number;
};

export type SearchMethod = "hybrid" | "vector" | "keyword";

export type DenseFailurePolicy = "lexical-only" | "fail";

export type SummaryLength = "short" | "medium" | "detailed";

/** Vector-index collaborator, namespaced per video. Results are best-first. */
export type DenseSimilarityProvider = {
  similaritySearch(videoId: string, query: string, k: number): Promise<Passage[]>;
};

/** Source of the passages already indexed for a video. */
export type PassageCatalog = {
  listPassages(videoId: string): Promise<Passage[]>;
};

export type PassageIndexer = {
  indexPassages(videoId: string, passages: Passage[]): Promise<void>;
};

export type PassageSource = {
  loadPassages(videoId: string): Promise<Passage[]>;
};

export type AnswerGenerator = {
  answer(question: string, context: string[]): Promise<string>;
  /** Yields answer tokens as the model produces them. */
  answerStream(question: string, context: string[]): AsyncIterable<string>;
  summarize(context: string[], length: SummaryLength): Promise<string>;
};
