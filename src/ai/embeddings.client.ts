import fetch from "node-fetch";
import { EMBEDDING_INPUT_CHAR_LIMIT } from "../shared/constants";

interface EmbeddingsResponse {
  data: Array<{
    index?: number;
    embedding: number[];
  }>;
}

export interface EmbeddingBackend {
  createEmbedding(text: string): Promise<number[]>;
  createEmbeddings(texts: ReadonlyArray<string>): Promise<number[][]>;
}

export class EmbeddingsClient implements EmbeddingBackend {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
  ) {}

  getModelName(): string {
    return this.model;
  }

  async createEmbedding(text: string): Promise<number[]> {
    const [vector] = await this.requestEmbeddings([text]);
    if (!vector) {
      throw new Error("Embeddings API returned empty vector.");
    }
    return vector;
  }

  async createEmbeddings(texts: ReadonlyArray<string>): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return this.requestEmbeddings(texts);
  }

  private async requestEmbeddings(texts: ReadonlyArray<string>): Promise<number[][]> {
    const response = await fetch("https://api.openai.com/v1/embeddings", {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        input: texts.map((text) => text.slice(0, EMBEDDING_INPUT_CHAR_LIMIT)),
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Embeddings API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as EmbeddingsResponse;
    const ordered = [...body.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    const vectors = ordered.map((item) => item.embedding);
    if (vectors.length !== texts.length) {
      throw new Error(
        `Embeddings API returned ${vectors.length} vectors for ${texts.length} inputs.`,
      );
    }
    for (const vector of vectors) {
      if (!Array.isArray(vector) || vector.length === 0) {
        throw new Error("Embeddings API returned empty vector.");
      }
    }

    return vectors;
  }
}
