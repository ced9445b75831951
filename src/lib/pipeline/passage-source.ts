import { buildSlidingWindowPassages, type ChunkingOptions } from "@/lib/pipeline/chunker";
import {
  fetchCanonicalTranscriptSegments,
  type TranscriptFetcher,
} from "@/lib/pipeline/transcript/fetch-transcript";
import { silentLogger, type Logger } from "@/lib/logger";
import type { Passage, PassageSource } from "@/types/retrieval";

type TranscriptPassageSourceOptions = ChunkingOptions & {
  fetcher?: TranscriptFetcher;
  logger?: Logger;
};

export class YoutubeTranscriptPassageSource implements PassageSource {
  private readonly logger: Logger;

  constructor(private readonly options: TranscriptPassageSourceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async loadPassages(videoId: string): Promise<Passage[]> {
    const segments = await fetchCanonicalTranscriptSegments(videoId, this.options.fetcher);
    const passages = buildSlidingWindowPassages(videoId, segments, this.options);

    this.logger(`[transcript] ${videoId}: ${segments.length} segments -> ${passages.length} passages`);
    return passages;
  }
}
