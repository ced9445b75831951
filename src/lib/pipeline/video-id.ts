import { createHash } from "node:crypto";

const VIDEO_URL_PATTERN = /(youtu\.be\/|youtube\.com\/(watch\?(.*&)?v=|embed\/|v\/|shorts\/))([^?&"'>]+)/;

/**
 * Pulls the video id out of the common URL shapes. Anything else is keyed by
 * the MD5 of the raw input so that it still gets a stable cache namespace.
 */
export function extractVideoId(url: string): string {
  const match = VIDEO_URL_PATTERN.exec(url);

  if (match?.[4]) {
    return match[4];
  }

  return createHash("md5").update(url, "utf8").digest("hex");
}

const BARE_VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

/** Accepts either a bare 11-character id or anything `extractVideoId` takes. */
export function resolveVideoId(input: string): string {
  const trimmed = input.trim();
  return BARE_VIDEO_ID.test(trimmed) ? trimmed : extractVideoId(trimmed);
}
