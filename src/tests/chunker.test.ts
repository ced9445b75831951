import { describe, expect, it } from "vitest";
import { buildSlidingWindowPassages } from "@/lib/pipeline/chunker";
import type { CanonicalTranscriptSegment } from "@/lib/pipeline/types";

function segment(seq: number, startTime: number, endTime: number, text: string): CanonicalTranscriptSegment {
  return {
    videoId: "video-a",
    seq,
    startTime,
    endTime,
    duration: endTime - startTime,
    text,
  };
}

describe("buildSlidingWindowPassages", () => {
  it("creates overlapping windows and includes the final partial window", () => {
    const segments = [
      segment(0, 0, 3, "alpha line"),
      segment(1, 4, 8, "beta line"),
      segment(2, 10, 14, "gamma line"),
      segment(3, 16, 20, "delta line"),
    ];

    const passages = buildSlidingWindowPassages("video-a", segments, {
      windowSeconds: 15,
      overlapSeconds: 5,
    });

    expect(passages).toHaveLength(2);
    expect(passages[0]).toEqual({
      id: "video-a:0",
      text: "alpha line beta line gamma line",
      metadata: { videoId: "video-a", chunkIndex: 0, startSec: 0, endSec: 14, source: "transcript" },
    });
    expect(passages[1]).toMatchObject({
      id: "video-a:1",
      text: "gamma line delta line",
      metadata: { chunkIndex: 1, startSec: 10, endSec: 20 },
    });
  });

  it("drops a window that covers the same segments as the previous one", () => {
    const passages = buildSlidingWindowPassages("video-a", [segment(0, 0, 100, "one long caption")]);

    expect(passages.map((passage) => passage.text)).toEqual(["one long caption"]);
  });

  it("returns nothing for an empty transcript and rejects a window no larger than its overlap", () => {
    expect(buildSlidingWindowPassages("video-a", [])).toEqual([]);
    expect(() =>
      buildSlidingWindowPassages("video-a", [segment(0, 0, 1, "x")], { windowSeconds: 10, overlapSeconds: 10 }),
    ).toThrow("Invalid chunking window/overlap settings");
  });
});
