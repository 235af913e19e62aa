import { EmbeddingBackend } from "../ai/embeddings.client";
import { errorMessage, Logger } from "../config/logger";
import {
  EmbeddingBackendError,
  EmbeddingDimensionError,
  EmptyJobBatchError,
} from "../shared/errors";
import { chunk, dot, l2Normalize } from "./vector-math";

const DEFAULT_BATCH_SIZE = 64;

/**
 * Scores every job text against the candidate text by cosine similarity of their
 * embeddings. Output is parallel to `jobTexts`; ordering is left to the caller.
 */
export class SimilarityRanker {
  constructor(
    private readonly embeddings: EmbeddingBackend,
    private readonly logger: Logger,
    private readonly batchSize = DEFAULT_BATCH_SIZE,
  ) {}

  async rank(candidateText: string, jobTexts: ReadonlyArray<string>): Promise<number[]> {
    if (jobTexts.length === 0) {
      throw new EmptyJobBatchError();
    }

    const startedAt = Date.now();
    const candidateVector = await this.embedCandidate(candidateText);
    const jobVectors = await this.embedJobs(jobTexts);

    const dimension = candidateVector.length;
    jobVectors.forEach((vector, index) => {
      if (vector.length !== dimension) {
        throw new EmbeddingDimensionError(dimension, vector.length, index);
      }
    });

    // Raw cosine values are kept unclamped.
    const query = l2Normalize(candidateVector);
    const scores = jobVectors.map((vector) => dot(query, l2Normalize(vector)));

    this.logger.debug("matching.similarity.scored", {
      jobs: jobTexts.length,
      dimension,
      latencyMs: Date.now() - startedAt,
    });
    return scores;
  }

  private async embedCandidate(candidateText: string): Promise<number[]> {
    try {
      return await this.embeddings.createEmbedding(candidateText);
    } catch (error) {
      throw new EmbeddingBackendError(`Candidate embedding failed: ${errorMessage(error)}`);
    }
  }

  private async embedJobs(jobTexts: ReadonlyArray<string>): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const batch of chunk(jobTexts, this.batchSize)) {
      let batchVectors: number[][];
      try {
        batchVectors = await this.embeddings.createEmbeddings(batch);
      } catch (error) {
        throw new EmbeddingBackendError(`Job embeddings failed: ${errorMessage(error)}`);
      }
      if (batchVectors.length !== batch.length) {
        throw new EmbeddingBackendError(
          `Embedding backend returned ${batchVectors.length} vectors for ${batch.length} jobs.`,
        );
      }
      vectors.push(...batchVectors);
    }
    return vectors;
  }
}
