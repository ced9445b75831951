import { describe, expect, it } from "vitest";
import { videoStatusKey } from "@/lib/cache/cache-key";
import { MemoryTier } from "@/lib/cache/tiers/memory-tier";
import type { VideoStatusEntry } from "@/types/cache";

function status(videoId: string): VideoStatusEntry {
  return { kind: "video-status", videoId, processed: true, createdAt: Date.now(), tier: "file" };
}

describe("MemoryTier", () => {
  it("stores entries under the memory tier name", async () => {
    const tier = new MemoryTier();
    await tier.set(status("v1"));

    const result = await tier.get(videoStatusKey("v1"));

    expect(result.status).toBe("hit");
    expect(result.status === "hit" && result.entry.tier).toBe("memory");
    expect(await tier.exists(videoStatusKey("v1"))).toBe(true);
    expect(await tier.get(videoStatusKey("v2"))).toEqual({ status: "miss" });
  });

  it("evicts the least recently used entry past capacity", async () => {
    const tier = new MemoryTier({ maxEntries: 2 });

    await tier.set(status("a"));
    await tier.set(status("b"));
    await tier.get(videoStatusKey("a"));
    await tier.set(status("c"));

    expect(tier.size).toBe(2);
    expect(await tier.exists(videoStatusKey("a"))).toBe(true);
    expect(await tier.exists(videoStatusKey("b"))).toBe(false);
    expect(await tier.exists(videoStatusKey("c"))).toBe(true);
  });
});
