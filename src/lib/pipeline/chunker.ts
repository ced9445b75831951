import type { CanonicalTranscriptSegment } from "@/lib/pipeline/types";
import type { Passage } from "@/types/retrieval";

export type ChunkingOptions = {
  windowSeconds?: number;
  overlapSeconds?: number;
};

export function passageId(videoId: string, chunkIndex: number): string {
  return `${videoId}:${chunkIndex}`;
}

/**
 * Groups ordered caption segments into overlapping time windows. A window
 * covering exactly the same segment range as the previous one is dropped.
 */
export function buildSlidingWindowPassages(
  videoId: string,
  segments: CanonicalTranscriptSegment[],
  options: ChunkingOptions = {},
): Passage[] {
  if (segments.length === 0) {
    return [];
  }

  const windowSeconds = options.windowSeconds ?? 60;
  const overlapSeconds = options.overlapSeconds ?? 10;
  const stepSeconds = windowSeconds - overlapSeconds;

  if (windowSeconds <= 0 || stepSeconds <= 0) {
    throw new Error("Invalid chunking window/overlap settings");
  }

  const ordered = [...segments].sort((left, right) => left.startTime - right.startTime || left.seq - right.seq);
  const minStart = ordered[0].startTime;
  const maxEnd = ordered.reduce((max, segment) => Math.max(max, segment.endTime), minStart);

  const passages: Passage[] = [];
  const seen = new Set<string>();

  for (let windowStart = minStart; windowStart < maxEnd; windowStart += stepSeconds) {
    const windowEnd = windowStart + windowSeconds;
    const inWindow = ordered.filter((segment) => segment.endTime > windowStart && segment.startTime < windowEnd);

    if (inWindow.length === 0) {
      continue;
    }

    const dedupeKey = `${inWindow[0].seq}:${inWindow[inWindow.length - 1].seq}`;

    if (seen.has(dedupeKey)) {
      continue;
    }

    seen.add(dedupeKey);

    const text = inWindow.map((segment) => segment.text.trim()).filter(Boolean).join(" ");

    if (!text) {
      continue;
    }

    const chunkIndex = passages.length;

    passages.push({
      id: passageId(videoId, chunkIndex),
      text,
      metadata: {
        videoId,
        chunkIndex,
        startSec: inWindow[0].startTime,
        endSec: Math.max(...inWindow.map((segment) => segment.endTime)),
        source: "transcript",
      },
    });
  }

  return passages;
}
