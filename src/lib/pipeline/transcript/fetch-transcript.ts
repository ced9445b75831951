import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptVideoUnavailableError,
  type TranscriptResponse,
} from "youtube-transcript";
import type { CanonicalTranscriptSegment, RawTranscriptSegment } from "@/lib/pipeline/types";

export class TranscriptUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranscriptUnavailableError";
  }
}

export type TranscriptFetcher = (videoId: string) => Promise<Array<RawTranscriptSegment | TranscriptResponse>>;

const fetchFromYoutube: TranscriptFetcher = (videoId) => YoutubeTranscript.fetchTranscript(videoId);

export async function fetchCanonicalTranscriptSegments(
  videoId: string,
  fetcher: TranscriptFetcher = fetchFromYoutube,
): Promise<CanonicalTranscriptSegment[]> {
  let rows: Array<RawTranscriptSegment | TranscriptResponse>;

  try {
    rows = await fetcher(videoId);
  } catch (error) {
    throw toTranscriptUnavailableError(error);
  }

  const segments = normalizeTranscriptSegments(videoId, rows);

  if (segments.length === 0) {
    throw new TranscriptUnavailableError(`No usable transcript rows for video ${videoId}`);
  }

  return segments;
}

function toTranscriptUnavailableError(error: unknown): TranscriptUnavailableError {
  if (
    error instanceof YoutubeTranscriptDisabledError ||
    error instanceof YoutubeTranscriptNotAvailableError ||
    error instanceof YoutubeTranscriptVideoUnavailableError
  ) {
    return new TranscriptUnavailableError(error.message, { cause: error });
  }

  if (error instanceof TranscriptUnavailableError) {
    return error;
  }

  const message = error instanceof Error ? error.message : "Unknown transcript fetch error";
  return new TranscriptUnavailableError(`Failed to fetch transcript: ${message}`, { cause: error });
}

export function normalizeTranscriptSegments(
  videoId: string,
  rawSegments: Array<RawTranscriptSegment | TranscriptResponse>,
): CanonicalTranscriptSegment[] {
  const ordered = [...rawSegments]
    .map((row) => ({
      offset: sanitizeNumber(row.offset),
      duration: sanitizeNumber(row.duration),
      text: typeof row.text === "string" ? decodeCaptionText(row.text) : "",
    }))
    .sort((left, right) => left.offset - right.offset);

  const normalized: CanonicalTranscriptSegment[] = [];

  for (const row of ordered) {
    if (!row.text || row.duration <= 0) {
      continue;
    }

    normalized.push({
      videoId,
      seq: normalized.length,
      startTime: row.offset,
      endTime: row.offset + row.duration,
      duration: row.duration,
      text: row.text,
    });
  }

  return normalized;
}

// Caption payloads arrive HTML-escaped, sometimes twice.
export function decodeCaptionText(text: string): string {
  return text
    .replace(/&amp;/g, "&")
    .replace(/&#39;/g, "'")
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/\s+/g, " ")
    .trim();
}

function sanitizeNumber(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return 0;
  }

  return value;
}
