import { describe, expect, it } from "vitest";
import { extractVideoId, resolveVideoId } from "@/lib/pipeline/video-id";

describe("extractVideoId", () => {
  it("reads ids from the common URL shapes", () => {
    expect(extractVideoId("https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=10")).toBe("dQw4w9WgXcQ");
    expect(extractVideoId("https://www.youtube.com/watch?feature=share&v=abc123")).toBe("abc123");
    expect(extractVideoId("https://youtu.be/abc123?si=xyz")).toBe("abc123");
    expect(extractVideoId("https://www.youtube.com/embed/abc123")).toBe("abc123");
    expect(extractVideoId("https://www.youtube.com/v/abc123")).toBe("abc123");
    expect(extractVideoId("https://www.youtube.com/shorts/abc123")).toBe("abc123");
  });

  it("falls back to the MD5 of the input", () => {
    expect(extractVideoId("hello")).toBe("5d41402abc4b2a76b9719d911017c592");
  });
});

describe("resolveVideoId", () => {
  it("passes bare ids through and extracts everything else", () => {
    expect(resolveVideoId(" dQw4w9WgXcQ ")).toBe("dQw4w9WgXcQ");
    expect(resolveVideoId("https://youtu.be/dQw4w9WgXcQ")).toBe("dQw4w9WgXcQ");
  });
});
