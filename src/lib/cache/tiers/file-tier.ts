import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { entryMatchesKey, keyOfEntry } from "@/lib/cache/cache-key";
import { hit, MISS, type TierReadResult, type TierStore } from "@/lib/cache/tiers/tier-store";
import { describeError, MalformedRecordError, StorageUnavailableError } from "@/lib/errors";
import type {
  CacheEntry,
  CacheKey,
  QueryRecordFile,
  QueryResponseEntry,
  VideoStatusEntry,
  VideoStatusFile,
} from "@/types/cache";

export const DEFAULT_CACHE_DIR = ".cache/video-qa";

export type QueryRecordScan = {
  records: QueryResponseEntry[];
  skipped: Array<{ path: string; reason: string }>;
};

/**
 * Durable tier: one JSON document per entity.
 *
 *   <baseDir>/videos/<videoId>.json
 *   <baseDir>/queries/<videoId>/<fingerprint>.json
 *
 * Query records carry their own video id, query text and timestamp, so the
 * per-video directory doubles as the query history used for approximate
 * matching.
 */
export class FileTier implements TierStore {
  readonly name = "file";
  readonly durable = true;

  constructor(private readonly baseDir: string = DEFAULT_CACHE_DIR) {}

  async get(key: CacheKey): Promise<TierReadResult> {
    const path = this.pathFor(key);
    let raw: string;

    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return MISS;
      }

      return {
        status: "error",
        error: new StorageUnavailableError("file", `Failed to read ${path}: ${describeError(error)}`, {
          cause: error,
        }),
      };
    }

    const entry = key.kind === "video-status" ? parseVideoStatus(raw) : parseQueryRecord(raw);

    if (!entry || !entryMatchesKey(entry, key)) {
      return { status: "error", error: new MalformedRecordError(path, `Unreadable cache record at ${path}`) };
    }

    return hit(entry);
  }

  async set(entry: CacheEntry): Promise<void> {
    const path = this.pathFor(keyOfEntry(entry));
    const payload: VideoStatusFile | QueryRecordFile =
      entry.kind === "video-status"
        ? { video_id: entry.videoId, processed: entry.processed, timestamp: entry.createdAt }
        : {
            video_id: entry.videoId,
            fingerprint: entry.fingerprint,
            query: entry.queryText,
            response: entry.response,
            timestamp: entry.createdAt,
          };

    const tempPath = `${path}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, JSON.stringify(payload, null, 2), "utf8");
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw new StorageUnavailableError("file", `Failed to write ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  async exists(key: CacheKey): Promise<boolean> {
    const result = await this.get(key);
    return result.status === "hit";
  }

  async listQueryRecords(videoId: string): Promise<QueryRecordScan> {
    const directory = join(this.baseDir, "queries", encodeSegment(videoId));
    let names: string[];

    try {
      names = await readdir(directory);
    } catch (error) {
      if (isNotFound(error)) {
        return { records: [], skipped: [] };
      }

      throw new StorageUnavailableError("file", `Failed to list ${directory}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const records: QueryResponseEntry[] = [];
    const skipped: QueryRecordScan["skipped"] = [];

    for (const name of names.filter((value) => value.endsWith(".json")).sort()) {
      const path = join(directory, name);

      try {
        const record = parseQueryRecord(await readFile(path, "utf8"));

        if (!record || record.videoId !== videoId) {
          skipped.push({ path, reason: "malformed record" });
          continue;
        }

        records.push(record);
      } catch (error) {
        skipped.push({ path, reason: describeError(error) });
      }
    }

    return { records, skipped };
  }

  private pathFor(key: CacheKey): string {
    if (key.kind === "video-status") {
      return join(this.baseDir, "videos", `${encodeSegment(key.videoId)}.json`);
    }

    return join(this.baseDir, "queries", encodeSegment(key.videoId), `${key.fingerprint}.json`);
  }
}

export function parseVideoStatus(raw: string): VideoStatusEntry | null {
  const value = parseJsonObject(raw);

  if (!value || typeof value.video_id !== "string" || typeof value.timestamp !== "number") {
    return null;
  }

  return {
    kind: "video-status",
    videoId: value.video_id,
    processed: value.processed === true,
    createdAt: value.timestamp,
    tier: "file",
  };
}

export function parseQueryRecord(raw: string): QueryResponseEntry | null {
  const value = parseJsonObject(raw);

  if (
    !value ||
    typeof value.video_id !== "string" ||
    typeof value.fingerprint !== "string" ||
    typeof value.query !== "string" ||
    typeof value.response !== "string" ||
    typeof value.timestamp !== "number" ||
    !Number.isFinite(value.timestamp)
  ) {
    return null;
  }

  return {
    kind: "query-response",
    videoId: value.video_id,
    fingerprint: value.fingerprint,
    queryText: value.query,
    response: value.response,
    createdAt: value.timestamp,
    tier: "file",
  };
}

function parseJsonObject(raw: string): Record<string, unknown> | null {
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  return Object.fromEntries(Object.entries(parsed));
}

function encodeSegment(videoId: string): string {
  return encodeURIComponent(videoId).replace(/\./g, "%2E");
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
