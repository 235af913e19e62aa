import { JobRecord } from "./job.types";

export type MatchingStage =
  | "INIT"
  | "SIMILARITY_SCORED"
  | "RESCORED"
  | "SKIPPED_RESCORE"
  | "FINAL_SORTED"
  | "DONE";

export interface MatchingConfig {
  topK: number;
  rescoreEnabled: boolean;
  rescoreConcurrency: number;
  rescoreTimeoutMs: number;
  embeddingBatchSize: number;
  descriptionCharBudget: number;
}

export interface MatchOptions {
  topK?: number;
  rescoreEnabled?: boolean;
}

export type ParsedFitResponse =
  | {
      kind: "ok";
      score: number;
      explanation: string;
    }
  | {
      kind: "fallback";
      reason: "missing_score" | "invalid_score" | "missing_explanation";
    };

export type RescoreOutcome =
  | {
      status: "scored";
      score: number;
      explanation: string;
    }
  | {
      status: "degraded";
      reason: "parse_failed" | "llm_failure";
      score: 0;
      explanation: string;
    };

export interface StageTrace {
  stage: MatchingStage;
  latencyMs: number;
}

export interface MatchingRunResult {
  jobs: JobRecord[];
  stages: StageTrace[];
  rescoredCount: number;
  degradedCount: number;
}
