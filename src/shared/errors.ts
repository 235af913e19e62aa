export type MatchingErrorCode =
  | "empty_job_batch"
  | "embedding_backend_unavailable"
  | "embedding_dimension_mismatch";

export class MatchingError extends Error {
  constructor(
    readonly code: MatchingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyJobBatchError extends MatchingError {
  constructor() {
    super("empty_job_batch", "Job batch is empty, nothing to rank.");
  }
}

export class EmbeddingBackendError extends MatchingError {
  constructor(message: string) {
    super("embedding_backend_unavailable", message);
  }
}

export class EmbeddingDimensionError extends MatchingError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    readonly index: number,
  ) {
    super(
      "embedding_dimension_mismatch",
      `Embedding dimension mismatch at job ${index}: expected ${expected}, got ${actual}.`,
    );
  }
}

export function isMatchingError(error: unknown): error is MatchingError {
  return error instanceof MatchingError;
}
