import type OpenAI from "openai";
import { describeError, UpstreamUnavailableError } from "@/lib/errors";

export const DEFAULT_EMBEDDINGS_MODEL = "text-embedding-3-small";

export type Embedder = {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
};

export class OpenAiEmbedder implements Embedder {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string = DEFAULT_EMBEDDINGS_MODEL,
  ) {}

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        encoding_format: "float",
      });

      return [...response.data].sort((left, right) => left.index - right.index).map((row) => row.embedding);
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to create embeddings: ${describeError(error)}`, { cause: error });
    }
  }
}
