import assert from "node:assert/strict";
import test from "node:test";
import { EmbeddingBackend } from "../../ai/embeddings.client";
import { SimilarityRanker } from "../../matching/similarity.ranker";
import {
  EmbeddingBackendError,
  EmbeddingDimensionError,
  EmptyJobBatchError,
} from "../../shared/errors";
import { KeywordEmbeddings, silentLogger, TableEmbeddings } from "../support/fakes";

function approx(actual: number | undefined, expected: number): void {
  assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

test("scores are cosine similarities parallel to the job texts", async () => {
  const embeddings = new TableEmbeddings(
    new Map([
      ["candidate", [1, 0]],
      ["same", [2, 0]],
      ["orthogonal", [0, 5]],
      ["diagonal", [1, 1]],
      ["opposite", [-3, 0]],
    ]),
  );
  const ranker = new SimilarityRanker(embeddings, silentLogger);

  const scores = await ranker.rank("candidate", ["orthogonal", "same", "diagonal", "opposite"]);

  assert.equal(scores.length, 4);
  approx(scores[0], 0);
  approx(scores[1], 1);
  approx(scores[2], Math.SQRT1_2);
  approx(scores[3], -1);
});

test("job texts are embedded in batches of the configured size", async () => {
  const embeddings = new KeywordEmbeddings(["sql"]);
  const ranker = new SimilarityRanker(embeddings, silentLogger, 2);

  const scores = await ranker.rank("sql", ["sql", "sql", "none", "sql", "none"]);

  assert.deepEqual(embeddings.batchCalls, [2, 2, 1]);
  assert.deepEqual(scores, [1, 1, 0, 1, 0]);
});

test("an empty batch is rejected before any embedding call", async () => {
  const embeddings = new KeywordEmbeddings(["sql"]);
  const ranker = new SimilarityRanker(embeddings, silentLogger);

  await assert.rejects(ranker.rank("sql", []), EmptyJobBatchError);
  assert.deepEqual(embeddings.batchCalls, []);
});

test("a job vector of another dimension fails the whole batch", async () => {
  const embeddings = new TableEmbeddings(
    new Map([
      ["candidate", [1, 0]],
      ["ok", [1, 0]],
      ["wide", [1, 0, 0]],
    ]),
  );
  const ranker = new SimilarityRanker(embeddings, silentLogger);

  await assert.rejects(ranker.rank("candidate", ["ok", "wide"]), (error: unknown) => {
    assert.ok(error instanceof EmbeddingDimensionError);
    assert.equal(error.code, "embedding_dimension_mismatch");
    assert.equal(error.expected, 2);
    assert.equal(error.actual, 3);
    assert.equal(error.index, 1);
    return true;
  });
});

test("backend failures surface as embedding backend errors", async () => {
  const failing: EmbeddingBackend = {
    async createEmbedding(): Promise<number[]> {
      return [1, 0];
    },
    async createEmbeddings(): Promise<number[][]> {
      throw new Error("connection refused");
    },
  };
  const ranker = new SimilarityRanker(failing, silentLogger);

  await assert.rejects(ranker.rank("candidate", ["job"]), (error: unknown) => {
    assert.ok(error instanceof EmbeddingBackendError);
    assert.equal(error.code, "embedding_backend_unavailable");
    assert.equal(error.message, "Job embeddings failed: connection refused");
    return true;
  });
});

test("a backend returning too few vectors is rejected", async () => {
  const short: EmbeddingBackend = {
    async createEmbedding(): Promise<number[]> {
      return [1, 0];
    },
    async createEmbeddings(): Promise<number[][]> {
      return [[1, 0]];
    },
  };
  const ranker = new SimilarityRanker(short, silentLogger);

  await assert.rejects(
    ranker.rank("candidate", ["a", "b"]),
    /Embedding backend returned 1 vectors for 2 jobs\./,
  );
});
