import { EMBEDDING_INPUT_CHAR_LIMIT } from "../shared/constants";
import { CandidateResume, WorkExperience } from "../shared/types/resume.types";

const RESPONSIBILITIES_PER_ROLE = 2;

export const EMPTY_PROFILE_PLACEHOLDER = "Candidate profile";

/**
 * Text projection of a resume used as the embedding query: target roles, skills,
 * work history, career level and years of experience. Empty sections are omitted.
 */
export function buildCandidateProfileText(resume: CandidateResume): string {
  const parts: string[] = [];

  if (resume.targetJobTitles.length > 0) {
    parts.push(`Target roles: ${resume.targetJobTitles.join(", ")}`);
  }
  if (resume.technicalSkills.length > 0) {
    parts.push(`Technical skills: ${resume.technicalSkills.join(", ")}`);
  }
  if (resume.softSkills.length > 0) {
    parts.push(`Soft skills: ${resume.softSkills.join(", ")}`);
  }
  if (resume.workExperience.length > 0) {
    const summaries = resume.workExperience.map(summarizeExperience);
    parts.push(`Work experience:\n${summaries.join("\n")}`);
  }
  if (resume.careerLevel) {
    parts.push(`Career level: ${resume.careerLevel}`);
  }
  if (resume.yearsOfExperience) {
    parts.push(`Years of experience: ${resume.yearsOfExperience}`);
  }

  return parts.join("\n\n");
}

/**
 * Embedding query for a resume. Falls back to the raw resume text, then to a fixed
 * placeholder, so the embedding backend never receives an empty input.
 */
export function buildCandidateQueryText(resume: CandidateResume): string {
  const projected = buildCandidateProfileText(resume);
  if (projected) {
    return projected;
  }
  const rawText = (resume.rawText ?? "").trim();
  if (rawText) {
    return rawText.slice(0, EMBEDDING_INPUT_CHAR_LIMIT);
  }
  return EMPTY_PROFILE_PLACEHOLDER;
}

function summarizeExperience(experience: WorkExperience): string {
  const headline = `${experience.jobTitle} at ${experience.companyName} (${experience.duration}) in ${experience.industry}`;
  const responsibilities = experience.responsibilities.slice(0, RESPONSIBILITIES_PER_ROLE);
  if (responsibilities.length === 0) {
    return headline;
  }
  return `${headline}. ${responsibilities.join(". ")}`;
}
