import { JobRecord, MatchResult } from "../shared/types/job.types";
import { RescoreOutcome } from "../shared/types/matching.types";

export function toSimilarityPercent(similarityScore: number): number {
  return roundTo(similarityScore * 100, 2);
}

/**
 * Attaches similarity scores and returns a new batch sorted by similarity, highest
 * first. Ties keep input order. `finalScore` starts as the similarity percentage,
 * floored at 0 since raw cosine can be negative.
 */
export function applySimilarityScores(
  jobs: ReadonlyArray<JobRecord>,
  scores: ReadonlyArray<number>,
): JobRecord[] {
  if (jobs.length !== scores.length) {
    throw new Error(`Similarity scores do not match job batch: ${scores.length} vs ${jobs.length}`);
  }
  const scored = jobs.map((job, index) => {
    const similarityScore = scores[index];
    return withMatch(job, {
      similarityScore,
      finalScore: Math.max(0, toSimilarityPercent(similarityScore)),
      explanation: null,
    });
  });
  return stableSortDescending(scored, (job) => job.match.similarityScore ?? 0);
}

/**
 * Overwrites score and explanation for the leading `outcomes.length` jobs of a
 * similarity-ordered batch. The explanation is prefixed with both scores.
 */
export function applyRescoreOutcomes(
  jobs: ReadonlyArray<JobRecord>,
  outcomes: ReadonlyArray<RescoreOutcome>,
): JobRecord[] {
  if (outcomes.length > jobs.length) {
    throw new Error(`More rescore outcomes than jobs: ${outcomes.length} vs ${jobs.length}`);
  }
  return jobs.map((job, index) => {
    if (index >= outcomes.length) {
      return job;
    }
    const outcome = outcomes[index];
    const similarityPercent = toSimilarityPercent(job.match.similarityScore ?? 0);
    return withMatch(job, {
      similarityScore: job.match.similarityScore,
      finalScore: outcome.score,
      explanation: formatFusedExplanation(similarityPercent, outcome.score, outcome.explanation),
    });
  });
}

export function sortByFinalScore(jobs: ReadonlyArray<JobRecord>): JobRecord[] {
  return stableSortDescending(jobs, (job) => job.match.finalScore ?? 0);
}

export function formatFusedExplanation(
  similarityPercent: number,
  llmScore: number,
  explanation: string,
): string {
  return `[Similarity: ${formatPercent(similarityPercent)}% | LLM Score: ${formatPercent(llmScore)}%]\n\n${explanation}`;
}

function stableSortDescending<T>(items: ReadonlyArray<T>, key: (item: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index, value: key(item) }))
    .sort((a, b) => b.value - a.value || a.index - b.index)
    .map((entry) => entry.item);
}

function withMatch(job: JobRecord, match: MatchResult): JobRecord {
  return {
    ...job,
    match,
  };
}

function formatPercent(value: number): string {
  return String(roundTo(value, 2));
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
