import { describe, expect, it } from "vitest";
import { RetrievalUnavailableError, UpstreamUnavailableError } from "@/lib/errors";
import { HybridRetrievalEngine, withTimeout } from "@/lib/retrieval/hybrid-search";
import { LexicalIndexBuilder } from "@/lib/retrieval/lexical-index";
import type { DenseSimilarityProvider, Passage, PassageCatalog, RankedCandidate } from "@/types/retrieval";
import { passage } from "@/tests/support/passages";

const apples = passage("v1", 0, "alpha apples orchard");
const bread = passage("v1", 1, "banana bread recipe");
const cherry = passage("v1", 2, "cherry pie filling");
const smoothie = passage("v1", 3, "banana smoothie recipe");
const catalogPassages = [apples, bread, cherry, smoothie];

function denseReturning(passages: Passage[]): DenseSimilarityProvider {
  return { similaritySearch: async (_videoId, _query, k) => passages.slice(0, k) };
}

const failingDense: DenseSimilarityProvider = {
  similaritySearch: async () => {
    throw new Error("vector store offline");
  },
};

function catalogOf(passages: Passage[]): PassageCatalog {
  return { listPassages: async () => passages };
}

class BrokenLexicalIndex extends LexicalIndexBuilder {
  override async search(): Promise<RankedCandidate[]> {
    throw new Error("index corrupted");
  }
}

describe("HybridRetrievalEngine", () => {
  it("fuses dense and lexical rankings", async () => {
    const engine = new HybridRetrievalEngine({
      dense: denseReturning([apples, bread, cherry]),
      lexicalIndex: new LexicalIndexBuilder(),
      catalog: catalogOf(catalogPassages),
    });

    expect(await engine.hybridSearch("v1", "bread smoothie", 2, 0.7)).toEqual([
      "alpha apples orchard",
      "banana bread recipe",
    ]);
    expect(await engine.hybridSearch("v1", "bread smoothie", 2, 0)).toEqual([
      "banana bread recipe",
      "banana smoothie recipe",
    ]);
    expect(await engine.hybridSearch("v1", "bread smoothie", 0, 0.7)).toEqual([]);
  });

  it("degrades to lexical results when the dense side fails", async () => {
    const logs: string[] = [];
    const engine = new HybridRetrievalEngine({
      dense: failingDense,
      lexicalIndex: new LexicalIndexBuilder(),
      catalog: catalogOf(catalogPassages),
      logger: (line) => logs.push(line),
    });

    expect(await engine.hybridSearch("v1", "bread smoothie", 2, 0.7)).toEqual([
      "banana bread recipe",
      "banana smoothie recipe",
    ]);
    expect(logs).toEqual([
      "[hybrid-search] dense search failed for v1, using lexical results only: vector store offline",
    ]);
  });

  it("treats a slow dense side as a failure", async () => {
    const engine = new HybridRetrievalEngine({
      dense: { similaritySearch: () => new Promise<Passage[]>(() => undefined) },
      lexicalIndex: new LexicalIndexBuilder(),
      catalog: catalogOf(catalogPassages),
      timeoutMs: 20,
    });

    expect(await engine.hybridSearch("v1", "bread smoothie", 2, 0.7)).toEqual([
      "banana bread recipe",
      "banana smoothie recipe",
    ]);
  });

  it("raises on dense failure under the fail policy", async () => {
    const engine = new HybridRetrievalEngine({
      dense: failingDense,
      lexicalIndex: new LexicalIndexBuilder(),
      catalog: catalogOf(catalogPassages),
      failurePolicy: "fail",
    });

    await expect(engine.hybridSearch("v1", "bread", 2, 0.7)).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it("raises when both signals fail", async () => {
    const engine = new HybridRetrievalEngine({ dense: failingDense, lexicalIndex: new BrokenLexicalIndex() });

    await expect(engine.hybridSearch("v1", "bread", 2, 0.7)).rejects.toBeInstanceOf(RetrievalUnavailableError);
  });

  it("keeps dense results when only the lexical side fails", async () => {
    const engine = new HybridRetrievalEngine({
      dense: denseReturning([cherry, apples]),
      lexicalIndex: new BrokenLexicalIndex(),
    });

    expect(await engine.hybridSearch("v1", "pie", 2, 0.7)).toEqual(["cherry pie filling", "alpha apples orchard"]);
  });

  it("returns no context for an empty namespace", async () => {
    const engine = new HybridRetrievalEngine({
      dense: denseReturning([]),
      lexicalIndex: new LexicalIndexBuilder(),
      catalog: catalogOf([]),
    });

    expect(await engine.hybridSearch("v1", "anything", 4, 0.7)).toEqual([]);
  });

  it("builds the lexical index from dense candidates when the catalog is empty", async () => {
    const lexicalIndex = new LexicalIndexBuilder();
    const engine = new HybridRetrievalEngine({
      dense: denseReturning([bread, cherry]),
      lexicalIndex,
      catalog: catalogOf([]),
    });

    await engine.hybridSearch("v1", "pie", 2, 0.7);

    expect(lexicalIndex.getSnapshot("v1")?.passages).toEqual([bread, cherry]);
  });
});

describe("withTimeout", () => {
  it("rejects with UpstreamUnavailableError once the deadline passes", async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 5, "too slow")).rejects.toThrow("too slow");
    await expect(withTimeout(Promise.resolve(3), 5, "too slow")).resolves.toBe(3);
  });
});
