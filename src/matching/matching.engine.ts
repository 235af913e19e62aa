import { randomUUID } from "node:crypto";
import { EmbeddingBackend } from "../ai/embeddings.client";
import { TextGenerationBackend } from "../ai/llm.client";
import { errorMessage, logContext, Logger } from "../config/logger";
import { buildCandidateQueryText } from "../profiles/candidate-profile.text";
import { MAX_TOP_K, MIN_TOP_K } from "../shared/constants";
import { EmptyJobBatchError, isMatchingError } from "../shared/errors";
import { createUnscoredJob, JobPosting, JobRecord } from "../shared/types/job.types";
import {
  MatchingConfig,
  MatchingRunResult,
  MatchingStage,
  MatchOptions,
  RescoreOutcome,
  StageTrace,
} from "../shared/types/matching.types";
import { CandidateResume } from "../shared/types/resume.types";
import { mapWithConcurrency } from "../shared/utils/concurrency";
import { JobFitRescorer } from "./job-fit.rescorer";
import { applyRescoreOutcomes, applySimilarityScores, sortByFinalScore } from "./rank-fusion";
import { SimilarityRanker } from "./similarity.ranker";

export class MatchingEngine {
  constructor(
    private readonly ranker: SimilarityRanker,
    private readonly rescorer: JobFitRescorer,
    private readonly config: MatchingConfig,
    private readonly logger: Logger,
  ) {}

  async match(
    resume: CandidateResume,
    postings: ReadonlyArray<JobPosting>,
    options?: MatchOptions,
  ): Promise<MatchingRunResult> {
    const runId = randomUUID();
    const stages: StageTrace[] = [];
    let stageStartedAt = Date.now();
    const enter = (stage: MatchingStage, fields?: Record<string, unknown>): void => {
      const now = Date.now();
      stages.push({ stage, latencyMs: now - stageStartedAt });
      stageStartedAt = now;
      logContext(this.logger, "info", "matching.stage.completed", { run_id: runId, stage }, fields);
    };

    try {
      if (postings.length === 0) {
        throw new EmptyJobBatchError();
      }
      const candidateText = buildCandidateQueryText(resume);
      const jobs = postings.map(createUnscoredJob);
      enter("INIT", { jobs: jobs.length, candidateTextChars: candidateText.length });

      const similarityScores = await this.ranker.rank(
        candidateText,
        jobs.map((job) => job.description),
      );
      let ranked = applySimilarityScores(jobs, similarityScores);
      enter("SIMILARITY_SCORED", {
        topSimilarity: ranked.slice(0, 3).map((job) => job.match.finalScore),
      });

      const rescoreEnabled = options?.rescoreEnabled ?? this.config.rescoreEnabled;
      let rescoredCount = 0;
      let degradedCount = 0;
      if (rescoreEnabled) {
        const topK = resolveTopK(options?.topK ?? this.config.topK);
        const subset = ranked.slice(0, topK);
        const outcomes = await this.rescoreSubset(runId, resume, subset);
        ranked = applyRescoreOutcomes(ranked, outcomes);
        rescoredCount = outcomes.length;
        degradedCount = outcomes.filter((outcome) => outcome.status === "degraded").length;
        enter("RESCORED", { topK, rescored: rescoredCount, degraded: degradedCount });
      } else {
        enter("SKIPPED_RESCORE");
      }

      const finalJobs = sortByFinalScore(ranked);
      enter("FINAL_SORTED", {
        topJob: finalJobs[0]?.title,
        topScore: finalJobs[0]?.match.finalScore,
      });
      enter("DONE");

      return {
        jobs: finalJobs,
        stages,
        rescoredCount,
        degradedCount,
      };
    } catch (error) {
      logContext(
        this.logger,
        "error",
        "matching.run.failed",
        {
          run_id: runId,
          ok: false,
          error_code: isMatchingError(error) ? error.code : "unexpected_error",
        },
        { error: errorMessage(error), completedStages: stages.map((item) => item.stage) },
      );
      throw error;
    }
  }

  private async rescoreSubset(
    runId: string,
    resume: CandidateResume,
    subset: ReadonlyArray<JobRecord>,
  ): Promise<RescoreOutcome[]> {
    return mapWithConcurrency(subset, this.config.rescoreConcurrency, async (job, index) => {
      logContext(
        this.logger,
        "debug",
        "matching.rescore.started",
        { run_id: runId, job_id: job.id, job_title: job.title },
        { position: index + 1, of: subset.length },
      );
      return this.rescorer.score(resume, job);
    });
  }
}

export function createMatchingEngine(deps: {
  embeddings: EmbeddingBackend;
  llm: TextGenerationBackend;
  config: MatchingConfig;
  logger: Logger;
}): MatchingEngine {
  const ranker = new SimilarityRanker(deps.embeddings, deps.logger, deps.config.embeddingBatchSize);
  const rescorer = new JobFitRescorer(deps.llm, deps.logger, {
    timeoutMs: deps.config.rescoreTimeoutMs,
    descriptionCharBudget: deps.config.descriptionCharBudget,
  });
  return new MatchingEngine(ranker, rescorer, deps.config, deps.logger);
}

function resolveTopK(value: number): number {
  if (!Number.isFinite(value)) {
    return MIN_TOP_K;
  }
  return Math.min(MAX_TOP_K, Math.max(MIN_TOP_K, Math.floor(value)));
}
