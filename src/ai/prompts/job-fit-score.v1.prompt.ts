export const JOB_FIT_SCORE_V1_PROMPT = `Task: evaluate how well the candidate matches the job posting.

1. Analyze how well the candidate's profile matches the job requirements.
2. Provide a match score from 0-100 where:
   - 90-100: Excellent match, highly qualified
   - 70-89: Good match, meets most requirements
   - 50-69: Moderate match, meets some requirements
   - 30-49: Weak match, missing key requirements
   - 0-29: Poor match, not qualified
3. Provide a concise explanation (2-3 sentences) covering:
   - Key strengths and alignments
   - Any gaps or mismatches
   - Overall recommendation

Respond in this exact format:
SCORE: [number 0-100]
EXPLANATION: [your 2-3 sentence explanation on one line]`;

export interface JobFitCandidateInput {
  name: string;
  targetRoles: string;
  careerLevel: string;
  yearsOfExperience: string;
  technicalSkills: string;
  softSkills: string;
  workExperience: string;
}

export interface JobFitJobInput {
  title: string;
  company: string;
  location: string;
  description: string;
}

export function buildJobFitScoreV1Prompt(
  candidate: JobFitCandidateInput,
  job: JobFitJobInput,
): string {
  return [
    JOB_FIT_SCORE_V1_PROMPT,
    "",
    "Candidate Profile:",
    `Name: ${candidate.name}`,
    `Target Roles: ${candidate.targetRoles}`,
    `Career Level: ${candidate.careerLevel}`,
    `Years of Experience: ${candidate.yearsOfExperience}`,
    `Technical Skills: ${candidate.technicalSkills}`,
    `Soft Skills: ${candidate.softSkills}`,
    `Work Experience:\n${candidate.workExperience}`,
    "",
    "Job Posting:",
    `Title: ${job.title}`,
    `Company: ${job.company}`,
    `Location: ${job.location}`,
    `Description: ${job.description}`,
    "",
    "Evaluate this match.",
  ].join("\n");
}
