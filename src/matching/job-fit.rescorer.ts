import { TextGenerationBackend } from "../ai/llm.client";
import { callTextPromptSafe } from "../ai/llm.safe";
import { buildJobFitScoreV1Prompt, JobFitCandidateInput } from "../ai/prompts/job-fit-score.v1.prompt";
import { logContext, Logger } from "../config/logger";
import { DESCRIPTION_CHAR_BUDGET } from "../shared/constants";
import { JobPosting } from "../shared/types/job.types";
import { ParsedFitResponse, RescoreOutcome } from "../shared/types/matching.types";
import { CandidateResume } from "../shared/types/resume.types";

export const PARSE_FALLBACK_EXPLANATION = "Could not parse scoring response";
export const SCORING_FAILED_EXPLANATION = "Scoring failed";

const PROMPT_NAME = "job_fit_score_v1";
const MAX_RESPONSE_TOKENS = 300;
const WORK_HISTORY_ENTRIES = 3;

const SCORE_LINE = /^[*_#>\s-]*score[*_\s]*:[*_\s]*(.*)$/i;
const EXPLANATION_LINE = /^[*_#>\s-]*explanation[*_\s]*:[*_\s]*(.*)$/i;
const SCORE_VALUE = /^([+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)\s*(?:%|\/\s*100)?$/;

export interface JobFitRescorerOptions {
  timeoutMs?: number;
  descriptionCharBudget?: number;
}

export class JobFitRescorer {
  private readonly descriptionCharBudget: number;

  constructor(
    private readonly llmClient: TextGenerationBackend,
    private readonly logger: Logger,
    private readonly options: JobFitRescorerOptions = {},
  ) {
    this.descriptionCharBudget = options.descriptionCharBudget ?? DESCRIPTION_CHAR_BUDGET;
  }

  async score(resume: CandidateResume, job: JobPosting): Promise<RescoreOutcome> {
    const prompt = buildJobFitScoreV1Prompt(toCandidateInput(resume), {
      title: job.title,
      company: job.companyName,
      location: job.location,
      description: job.description.slice(0, this.descriptionCharBudget),
    });

    const result = await callTextPromptSafe({
      llmClient: this.llmClient,
      prompt,
      maxTokens: MAX_RESPONSE_TOKENS,
      promptName: PROMPT_NAME,
      logger: this.logger,
      timeoutMs: this.options.timeoutMs,
    });
    if (!result.ok) {
      logContext(
        this.logger,
        "error",
        "matching.rescore.failed",
        {
          job_id: job.id,
          job_title: job.title,
          prompt_name: PROMPT_NAME,
          ok: false,
          error_code: result.error_code,
        },
        { error: result.error_message },
      );
      return {
        status: "degraded",
        reason: "llm_failure",
        score: 0,
        explanation: SCORING_FAILED_EXPLANATION,
      };
    }

    const parsed = parseJobFitResponse(result.text);
    if (parsed.kind === "fallback") {
      logContext(this.logger, "warn", "matching.rescore.unparsable", {
        job_id: job.id,
        job_title: job.title,
        prompt_name: PROMPT_NAME,
        ok: false,
        error_code: parsed.reason,
      });
      return {
        status: "degraded",
        reason: "parse_failed",
        score: 0,
        explanation: PARSE_FALLBACK_EXPLANATION,
      };
    }

    logContext(
      this.logger,
      "debug",
      "matching.rescore.completed",
      { job_id: job.id, job_title: job.title, prompt_name: PROMPT_NAME, ok: true },
      { score: parsed.score },
    );
    return {
      status: "scored",
      score: parsed.score,
      explanation: parsed.explanation,
    };
  }
}

/**
 * Reads the `SCORE:` / `EXPLANATION:` contract. The first line of each kind wins;
 * the score is clamped into [0, 100].
 */
export function parseJobFitResponse(raw: string): ParsedFitResponse {
  let scoreText: string | null = null;
  let explanation: string | null = null;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (scoreText === null) {
      const scoreMatch = SCORE_LINE.exec(line);
      if (scoreMatch) {
        scoreText = (scoreMatch[1] ?? "").replace(/[*_]+$/, "").trim();
        continue;
      }
    }
    if (explanation === null) {
      const explanationMatch = EXPLANATION_LINE.exec(line);
      if (explanationMatch) {
        explanation = (explanationMatch[1] ?? "").trim();
      }
    }
  }

  if (scoreText === null) {
    return { kind: "fallback", reason: "missing_score" };
  }
  const valueMatch = SCORE_VALUE.exec(scoreText);
  if (!valueMatch) {
    return { kind: "fallback", reason: "invalid_score" };
  }
  const score = Number(valueMatch[1]);
  if (!Number.isFinite(score)) {
    return { kind: "fallback", reason: "invalid_score" };
  }
  if (!explanation) {
    return { kind: "fallback", reason: "missing_explanation" };
  }

  return {
    kind: "ok",
    score: clamp(score, 0, 100),
    explanation,
  };
}

function toCandidateInput(resume: CandidateResume): JobFitCandidateInput {
  return {
    name: resume.name || "Unknown",
    targetRoles: resume.targetJobTitles.length > 0 ? resume.targetJobTitles.join(", ") : "Not specified",
    careerLevel: resume.careerLevel || "Not specified",
    yearsOfExperience: resume.yearsOfExperience ? String(resume.yearsOfExperience) : "Not specified",
    technicalSkills: resume.technicalSkills.length > 0 ? resume.technicalSkills.join(", ") : "None listed",
    softSkills: resume.softSkills.length > 0 ? resume.softSkills.join(", ") : "None listed",
    workExperience:
      resume.workExperience.length > 0
        ? resume.workExperience
            .slice(0, WORK_HISTORY_ENTRIES)
            .map((item) => `- ${item.jobTitle} at ${item.companyName} (${item.duration})`)
            .join("\n")
        : "No work experience listed",
  };
}

function clamp(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
