import { StructuredJsonBackend } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildResumeStructuringV1Prompt } from "../ai/prompts/resume-structuring.v1.prompt";
import { Logger } from "../config/logger";
import { CandidateResume } from "../shared/types/resume.types";
import { createEmptyResume, normalizeCandidateResume } from "./resume.schemas";

const MAX_RESUME_CHARS = 12_000;

export class ResumeStructuringService {
  constructor(
    private readonly llmClient: StructuredJsonBackend,
    private readonly logger: Logger,
  ) {}

  async structure(resumeText: string): Promise<CandidateResume> {
    const text = resumeText.trim();
    if (!text) {
      return createEmptyResume();
    }

    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      prompt: buildResumeStructuringV1Prompt(text.slice(0, MAX_RESUME_CHARS)),
      maxTokens: 2000,
      promptName: "resume_structuring_v1",
      schemaHint: "Resume JSON with name, target_job_titles[], work_experience[], technical_skills[], soft_skills[].",
      validate: isJsonObject,
      logger: this.logger,
    });
    if (!safe.ok) {
      this.logger.warn("Resume structuring failed, continuing with raw text only", {
        errorCode: safe.error_code,
        chars: text.length,
      });
      return createEmptyResume(text);
    }

    const resume = normalizeCandidateResume({ ...safe.data, raw_text: text });
    this.logger.info("Resume structured", {
      targetRoles: resume.targetJobTitles.length,
      technicalSkills: resume.technicalSkills.length,
      workExperience: resume.workExperience.length,
    });
    return resume;
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
