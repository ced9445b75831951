#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { FileTier } from "@/lib/cache/tiers/file-tier";
import { loadSettings } from "@/lib/config/settings";
import { createCacheManager, createVideoQaEngine } from "@/lib/engine/create-engine";
import { describeError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { buildSlidingWindowPassages } from "@/lib/pipeline/chunker";
import {
  TranscriptUnavailableError,
  fetchCanonicalTranscriptSegments,
} from "@/lib/pipeline/transcript/fetch-transcript";
import { resolveVideoId } from "@/lib/pipeline/video-id";
import type { SearchMethod, SummaryLength } from "@/types/retrieval";

const SEARCH_METHODS: readonly SearchMethod[] = ["hybrid", "vector", "keyword"];
const SUMMARY_LENGTHS: readonly SummaryLength[] = ["short", "medium", "detailed"];

type AskOptions = {
  video: string;
  query: string;
  searchMethod: SearchMethod;
  k?: number;
  stream: boolean;
};

const program = new Command();

program
  .name("video-qa")
  .description("Ask questions about video transcripts with a tiered answer cache")
  .version("0.1.0")
  .option("--verbose", "Print component logs", false);

function cliLogger(): Logger {
  const { verbose } = program.opts<{ verbose: boolean }>();
  return verbose ? (line) => console.log(line) : () => undefined;
}

const video = program.command("video").description("Video operations");

video
  .command("process")
  .argument("[urls...]", "Video URLs or ids")
  .option("--urls-file <path>", "Path to newline-delimited video URLs")
  .action(async (urls: string[], options: { urlsFile?: string }) => {
    try {
      const fromFile = options.urlsFile ? await readLines(options.urlsFile) : [];
      const targets = Array.from(new Set([...urls, ...fromFile].map((value) => value.trim()).filter(Boolean)));

      if (targets.length === 0) {
        console.error("No videos provided. Pass URLs or --urls-file.");
        process.exitCode = 1;
        return;
      }

      const engine = createVideoQaEngine(loadSettings(), cliLogger());
      const failed: Array<{ url: string; reason: string }> = [];

      for (const url of targets) {
        try {
          const result = await engine.processVideo(url);
          console.log(`${result.videoId}: ${result.status} (passages=${result.passageCount})`);
        } catch (error) {
          failed.push({ url, reason: describeError(error) });
        }
      }

      if (failed.length > 0) {
        for (const item of failed) {
          console.error(`- ${item.url}: ${item.reason}`);
        }

        process.exitCode = 1;
      }
    } catch (error) {
      console.error(`Processing failed: ${describeError(error, "Unknown processing error")}`);
      process.exitCode = 1;
    }
  });

video
  .command("ask")
  .requiredOption("--video <urlOrId>", "Video URL or id")
  .requiredOption("--query <text>", "Question to ask")
  .option("--search-method <method>", "hybrid, vector or keyword", parseSearchMethod, "hybrid")
  .option("--k <count>", "Number of passages to retrieve", parseInteger)
  .option("--stream", "Print the answer as it is generated", false)
  .action(async (options: AskOptions) => {
    try {
      const engine = createVideoQaEngine(loadSettings(), cliLogger());
      const videoId = resolveVideoId(options.video);
      const query = { searchMethod: options.searchMethod, k: options.k };

      if (options.stream) {
        const result = await engine.queryVideo(videoId, options.query, { ...query, stream: true });

        for await (const token of result.tokens) {
          process.stdout.write(token);
        }

        process.stdout.write("\n");
        console.error(`(source: ${result.source})`);
        return;
      }

      const result = await engine.queryVideo(videoId, options.query, query);

      console.log(result.answer);
      console.error(`(source: ${result.source})`);
    } catch (error) {
      console.error(`Query failed: ${describeError(error, "Unknown query error")}`);
      process.exitCode = 1;
    }
  });

video
  .command("summarize")
  .requiredOption("--video <urlOrId>", "Video URL or id")
  .option("--length <length>", "short, medium or detailed", parseSummaryLength, "medium")
  .action(async (options: { video: string; length: SummaryLength }) => {
    try {
      const engine = createVideoQaEngine(loadSettings(), cliLogger());
      const summary = await engine.summarizeVideo(resolveVideoId(options.video), options.length);

      if (!summary) {
        console.error("Transcript is empty; nothing to summarize.");
        process.exitCode = 1;
        return;
      }

      console.log(summary);
    } catch (error) {
      console.error(`Summary failed: ${describeError(error, "Unknown summary error")}`);
      process.exitCode = 1;
    }
  });

const transcript = program.command("transcript").description("Transcript operations");

transcript
  .command("passages")
  .requiredOption("--video <urlOrId>", "Video URL or id")
  .option("--out <path>", "Output file path (JSON)")
  .action(async (options: { video: string; out?: string }) => {
    try {
      const settings = loadSettings();
      const videoId = resolveVideoId(options.video);
      const segments = await fetchCanonicalTranscriptSegments(videoId);
      const passages = buildSlidingWindowPassages(videoId, segments, {
        windowSeconds: settings.chunkWindowSeconds,
        overlapSeconds: settings.chunkOverlapSeconds,
      });
      const payload = JSON.stringify(passages, null, 2);

      if (options.out) {
        await writeFile(options.out, payload, "utf8");
        console.log(`Saved ${passages.length} passages to ${options.out}`);
        return;
      }

      console.log(payload);
    } catch (error) {
      const message = describeError(error, "Unknown transcript error");

      if (error instanceof TranscriptUnavailableError) {
        console.error(`Transcript unavailable: ${message}`);
      } else {
        console.error(`Transcript fetch failed: ${message}`);
      }

      process.exitCode = 1;
    }
  });

const cache = program.command("cache").description("Answer cache inspection");

cache
  .command("status")
  .requiredOption("--video <urlOrId>", "Video URL or id")
  .action(async (options: { video: string }) => {
    try {
      const settings = loadSettings();
      const manager = createCacheManager(settings, cliLogger());
      const videoId = resolveVideoId(options.video);
      const processed = await manager.hasProcessed(videoId);
      const history = await new FileTier(settings.cacheDir).listQueryRecords(videoId);

      console.log(`video: ${videoId}`);
      console.log(`- tiers: ${manager.tierNames.join(" -> ")}`);
      console.log(`- processed: ${processed ? "yes" : "no"}`);
      console.log(`- stored answers: ${history.records.length}`);

      if (history.skipped.length > 0) {
        console.log(`- unreadable records: ${history.skipped.length}`);
      }
    } catch (error) {
      console.error(`Cache status failed: ${describeError(error, "Unknown cache error")}`);
      process.exitCode = 1;
    }
  });

cache
  .command("lookup")
  .requiredOption("--video <urlOrId>", "Video URL or id")
  .requiredOption("--query <text>", "Question to look up")
  .action(async (options: { video: string; query: string }) => {
    try {
      const manager = createCacheManager(loadSettings(), cliLogger());
      const lookup = await manager.lookupResponse(resolveVideoId(options.video), options.query);

      if (!lookup) {
        console.log("miss");
        return;
      }

      console.log(`hit (${lookup.source})`);
      console.log(lookup.response);
    } catch (error) {
      console.error(`Cache lookup failed: ${describeError(error, "Unknown cache error")}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(describeError(error, "Unknown CLI error"));
  process.exitCode = 1;
});

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Invalid integer value: ${value}`);
  }

  return parsed;
}

function parseSearchMethod(value: string): SearchMethod {
  const match = SEARCH_METHODS.find((method) => method === value);

  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${SEARCH_METHODS.join(", ")}`);
  }

  return match;
}

function parseSummaryLength(value: string): SummaryLength {
  const match = SUMMARY_LENGTHS.find((length) => length === value);

  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${SUMMARY_LENGTHS.join(", ")}`);
  }

  return match;
}

async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, "utf8");

  return content
    .split(/\r?\n/g)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
