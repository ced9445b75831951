import { describe, expect, it } from "vitest";
import {
  buildUserMessage,
  detectTranscriptLanguage,
  LANGUAGE_PROMPTS,
  SUMMARY_PRESETS,
} from "@/lib/llm/answer-generator";

describe("answer prompts", () => {
  it("appends the transcript context after the prompt", () => {
    expect(buildUserMessage("What is X?", ["first passage", "second passage"])).toBe(
      "What is X?\n\nTranscript:\nfirst passage\n\nsecond passage",
    );
  });

  it("caps summary length per preset", () => {
    expect(SUMMARY_PRESETS.short.maxTokens).toBe(100);
    expect(SUMMARY_PRESETS.short.instructions.en).toBe("Summarize the video briefly in 2-3 sentences.");
    expect(SUMMARY_PRESETS.medium.maxTokens).toBe(250);
    expect(SUMMARY_PRESETS.detailed.maxTokens).toBe(500);
  });

  it("has an answer prompt and every summary instruction for each language", () => {
    const languages = Object.keys(LANGUAGE_PROMPTS).sort();

    expect(languages).toEqual(["ar", "en", "es", "it", "sv"]);

    for (const preset of Object.values(SUMMARY_PRESETS)) {
      expect(Object.keys(preset.instructions).sort()).toEqual(languages);
    }
  });
});

describe("detectTranscriptLanguage", () => {
  it("picks the language from marker words in the transcript", () => {
    expect(detectTranscriptLanguage(["مرحبا بكم في الفيديو"])).toBe("ar");
    expect(detectTranscriptLanguage(["hoy vemos el horno"])).toBe("es");
    expect(detectTranscriptLanguage(["oggi il forno"])).toBe("it");
    expect(detectTranscriptLanguage(["brödet är varmt och gott"])).toBe("sv");
  });

  it("defaults to English", () => {
    expect(detectTranscriptLanguage(["today we bake bread"])).toBe("en");
    expect(detectTranscriptLanguage([])).toBe("en");
  });

  it("checks languages in a fixed order", () => {
    expect(detectTranscriptLanguage(["und il gatto", "och el perro"])).toBe("es");
  });
});
