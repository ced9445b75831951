import type { TierName } from "@/types/cache";

export class StorageUnavailableError extends Error {
  readonly tier: TierName;

  constructor(tier: TierName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageUnavailableError";
    this.tier = tier;
  }
}

export class MalformedRecordError extends Error {
  readonly location: string;

  constructor(location: string, message: string) {
    super(message);
    this.name = "MalformedRecordError";
    this.location = location;
  }
}

export class UpstreamUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamUnavailableError";
  }
}

export class RetrievalUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalUnavailableError";
  }
}

export function describeError(error: unknown, fallback = "Unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
