import { describe, expect, it } from "vitest";
import { clampVectorWeight, fuseRankedLists, normalizeByPosition } from "@/lib/retrieval/fusion";
import { passage } from "@/tests/support/passages";

const a = passage("v1", 0, "A");
const b = passage("v1", 1, "B");
const c = passage("v1", 2, "C");
const d = passage("v1", 3, "D");

function texts(weight: number): string[] {
  return fuseRankedLists([a, b, c], [b, d], weight).map((item) => item.passage.text);
}

describe("normalizeByPosition", () => {
  it("scores 1 - i/n and keeps the first position of repeated text", () => {
    const scores = normalizeByPosition([a, b, passage("v1", 9, "A"), c]);

    expect([...scores.keys()]).toEqual(["A", "B", "C"]);
    expect(scores.get("A")?.score).toBe(1);
    expect(scores.get("B")?.score).toBe(0.75);
    expect(scores.get("C")?.score).toBe(0.25);
    expect(scores.get("A")?.passage.id).toBe("v1:0");
  });
});

describe("fuseRankedLists", () => {
  it("blends both lists with the vector weight", () => {
    const fused = fuseRankedLists([a, b, c], [b, d], 0.7);

    expect(fused.map((item) => item.passage.text)).toEqual(["B", "A", "C", "D"]);
    expect(fused[0].score).toBeCloseTo(0.7667, 4);
    expect(fused[1].score).toBeCloseTo(0.7, 10);
    expect(fused[3]).toMatchObject({ denseScore: 0, lexicalScore: 0.5 });
    expect(fused[3].score).toBeCloseTo(0.15, 10);
  });

  it("reduces to one signal at the weight extremes", () => {
    expect(texts(1)).toEqual(["A", "B", "C", "D"]);
    expect(texts(0)).toEqual(["B", "D", "A", "C"]);
  });

  it("clamps out-of-range weights", () => {
    expect(texts(5)).toEqual(texts(1));
    expect(texts(-2)).toEqual(texts(0));
    expect(clampVectorWeight(Number.NaN)).toBe(0.7);
  });

  it("returns an empty list when both inputs are empty", () => {
    expect(fuseRankedLists([], [], 0.7)).toEqual([]);
  });
});
