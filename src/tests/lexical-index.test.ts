import { setImmediate as nextTick } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { LexicalIndexBuilder } from "@/lib/retrieval/lexical-index";
import type { Passage } from "@/types/retrieval";
import { passage } from "@/tests/support/passages";

const corpus = [
  passage("v1", 0, "the cat sat on the mat"),
  passage("v1", 1, "dogs chase cats"),
  passage("v1", 2, "the quick brown fox"),
];

describe("LexicalIndexBuilder", () => {
  it("ranks by BM25 and keeps insertion order for ties", async () => {
    const index = new LexicalIndexBuilder();
    await index.ensureIndex("v1", corpus);

    const cat = await index.search("v1", "cat", 3);
    expect(cat.map((candidate) => candidate.passage.id)).toEqual(["v1:0", "v1:1", "v1:2"]);
    expect(cat[0].sourceScore).toBeGreaterThan(0);
    expect(cat[1].sourceScore).toBe(0);
    expect(cat.map((candidate) => candidate.sourceRank)).toEqual([0, 1, 2]);

    const common = await index.search("v1", "THE", 3);
    expect(common.map((candidate) => candidate.passage.id)).toEqual(["v1:0", "v1:2", "v1:1"]);
    expect(common[1].sourceScore).toBeGreaterThan(0);
  });

  it("returns at most k candidates and nothing for k <= 0", async () => {
    const index = new LexicalIndexBuilder();
    await index.ensureIndex("v1", corpus);

    expect(await index.search("v1", "cat", 1)).toHaveLength(1);
    expect(await index.search("v1", "cat", 0)).toEqual([]);
  });

  it("builds lazily from the passages on hand", async () => {
    const index = new LexicalIndexBuilder();

    expect(await index.search("v1", "cat", 3)).toEqual([]);
    expect(await index.search("v1", "cat", 3, [])).toEqual([]);
    expect(index.hasIndex("v1")).toBe(false);

    const results = await index.search("v1", "fox", 1, async () => corpus);
    expect(results[0].passage.text).toBe("the quick brown fox");
    expect(index.hasIndex("v1")).toBe(true);
    expect(index.hasIndex("v2")).toBe(false);
  });

  it("serves the previous snapshot while a rebuild is in flight", async () => {
    const index = new LexicalIndexBuilder({ batchSize: 16 });
    await index.ensureIndex("v1", corpus);

    const larger = Array.from({ length: 200 }, (_, chunkIndex) => passage("v1", chunkIndex, `segment ${chunkIndex} cat`));
    const rebuild = index.ensureIndex("v1", larger);

    const during = await index.search("v1", "cat", 10);
    expect(during).toHaveLength(3);

    await rebuild;
    expect(await index.search("v1", "cat", 10)).toHaveLength(10);
    expect(index.getSnapshot("v1")?.passages).toHaveLength(200);
  });

  it("publishes only the most recently started build", async () => {
    const index = new LexicalIndexBuilder({ batchSize: 8 });
    const slow = Array.from({ length: 100 }, (_, chunkIndex) => passage("v1", chunkIndex, `old ${chunkIndex}`));

    const first = index.ensureIndex("v1", slow);
    const second = index.ensureIndex("v1", [passage("v1", 0, "new content")]);
    await Promise.all([first, second]);

    expect(index.getSnapshot("v1")?.passages.map((item) => item.text)).toEqual(["new content"]);
  });

  it("drops the snapshot and any in-flight build on invalidate", async () => {
    const index = new LexicalIndexBuilder({ batchSize: 8 });
    const pending = index.ensureIndex(
      "v1",
      Array.from({ length: 50 }, (_, chunkIndex) => passage("v1", chunkIndex, `text ${chunkIndex}`)),
    );

    index.invalidate("v1");
    await pending;

    expect(index.hasIndex("v1")).toBe(false);
  });

  it("returns nothing for a video indexed with zero passages", async () => {
    const index = new LexicalIndexBuilder();
    await index.ensureIndex("v1", []);

    expect(index.hasIndex("v1")).toBe(true);
    expect(await index.search("v1", "anything", 5)).toEqual([]);
  });

  it("does not let a lazy build that read passages earlier replace a newer explicit build", async () => {
    const index = new LexicalIndexBuilder();
    let release: (passages: Passage[]) => void = () => undefined;
    const partial = new Promise<Passage[]>((resolve) => {
      release = resolve;
    });

    const lazy = index.search("v1", "cat", 10, () => partial);
    const full = Array.from({ length: 10 }, (_, chunkIndex) => passage("v1", chunkIndex, `cat ${chunkIndex}`));
    await index.ensureIndex("v1", full);

    release([passage("v1", 0, "cat 0")]);

    expect(await lazy).toHaveLength(10);
    expect(index.getSnapshot("v1")?.passages).toHaveLength(10);
    expect(await index.search("v1", "cat", 10)).toHaveLength(10);
  });

  it("waits for a build already in flight instead of starting a lazy one", async () => {
    const index = new LexicalIndexBuilder({ batchSize: 4 });
    const full = Array.from({ length: 40 }, (_, chunkIndex) => passage("v1", chunkIndex, `cat ${chunkIndex}`));
    let catalogReads = 0;

    const building = index.ensureIndex("v1", full);
    const results = await index.search("v1", "cat", 50, async () => {
      catalogReads += 1;
      return [];
    });
    await building;

    expect(results).toHaveLength(40);
    expect(catalogReads).toBe(0);
  });

  it("answers every concurrent search from one complete snapshot while rebuilds run", async () => {
    const size = 20;
    const generationOf = (round: number) =>
      Array.from({ length: size }, (_, chunkIndex) => passage("v1", chunkIndex, `cat round-${round} ${chunkIndex}`));
    const index = new LexicalIndexBuilder({ batchSize: 4 });
    await index.ensureIndex("v1", generationOf(0));

    const rebuilds: Array<Promise<unknown>> = [];
    const searches: Array<Promise<string[]>> = [];

    for (let round = 1; round <= 10; round += 1) {
      rebuilds.push(index.ensureIndex("v1", generationOf(round)));

      for (let reader = 0; reader < 5; reader += 1) {
        searches.push(
          nextTick().then(async () =>
            (await index.search("v1", "cat", size)).map((candidate) => candidate.passage.text.split(" ")[1]),
          ),
        );
      }

      await nextTick();
    }

    const rounds = await Promise.all(searches);
    await Promise.all(rebuilds);

    for (const labels of rounds) {
      expect(labels).toHaveLength(size);
      expect(new Set(labels).size).toBe(1);
    }

    expect(index.getSnapshot("v1")?.passages[0].text).toBe("cat round-10 0");
  });
});
