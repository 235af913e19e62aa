export const RESUME_STRUCTURING_V1_PROMPT = `You extract structured resume data from raw resume text.

INPUT:
Raw resume text extracted from PDF or DOCX.

RULES:
- Extract only facts present in the text.
- Do NOT invent missing information. Use null for unknown scalar fields and [] for unknown lists.
- Infer target_job_titles from the most recent roles and any stated objective.
- career_level must be one of: "Intern", "Junior", "Mid-Level", "Senior", "Lead", "Principal", "Executive", or null.
- remote_preference must be one of: "On-site", "Hybrid", "Remote", "Flexible", or null.
- education level must be one of: "High School", "Associate Degree", "Bachelor's Degree", "Master's Degree", "PhD", "Other".
- years_of_experience is a non-negative integer or null.

OUTPUT JSON:
{
  "name": "string or null",
  "email": "string or null",
  "target_job_titles": ["string"],
  "current_location": "string or null",
  "desired_job_location": "string or null",
  "remote_preference": "string or null",
  "career_level": "string or null",
  "years_of_experience": number or null,
  "work_experience": [
    {
      "company_name": "string",
      "job_title": "string",
      "duration": "string",
      "industry": "string",
      "responsibilities": ["string"]
    }
  ],
  "past_industries": ["string"],
  "education": [
    {
      "level": "string",
      "field_of_study": "string or null",
      "institution": "string or null",
      "graduation_year": number or null
    }
  ],
  "technical_skills": ["string"],
  "soft_skills": ["string"],
  "languages": ["string"],
  "certifications": [
    {
      "name": "string",
      "issuing_organization": "string or null",
      "issue_date": "string or null"
    }
  ]
}

Return STRICT JSON only.`;

export function buildResumeStructuringV1Prompt(resumeText: string): string {
  return [RESUME_STRUCTURING_V1_PROMPT, "", "Resume text:", resumeText].join("\n");
}
