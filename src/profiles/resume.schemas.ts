import {
  CandidateResume,
  CareerLevel,
  Certification,
  Education,
  EducationLevel,
  RemotePreference,
  WorkExperience,
} from "../shared/types/resume.types";

const MAX_LIST_ITEMS = 40;
const MAX_TEXT = 400;

const CAREER_LEVELS: ReadonlyArray<CareerLevel> = [
  "Intern",
  "Junior",
  "Mid-Level",
  "Senior",
  "Lead",
  "Principal",
  "Executive",
];

const REMOTE_PREFERENCES: ReadonlyArray<RemotePreference> = ["On-site", "Hybrid", "Remote", "Flexible"];

const EDUCATION_LEVELS: ReadonlyArray<EducationLevel> = [
  "High School",
  "Associate Degree",
  "Bachelor's Degree",
  "Master's Degree",
  "PhD",
  "Other",
];

export function createEmptyResume(rawText?: string): CandidateResume {
  return {
    targetJobTitles: [],
    workExperience: [],
    pastIndustries: [],
    education: [],
    technicalSkills: [],
    softSkills: [],
    languages: [],
    certifications: [],
    ...(rawText ? { rawText } : {}),
  };
}

/**
 * Coerces an untrusted resume object (model output in snake_case or API input in
 * camelCase) into a CandidateResume. Missing lists become empty, unknown enum
 * values and negative years are dropped.
 */
export function normalizeCandidateResume(raw: unknown): CandidateResume {
  const source = isRecord(raw) ? raw : {};

  const resume: CandidateResume = {
    ...createEmptyResume(),
    targetJobTitles: toStringArray(pick(source, "targetJobTitles", "target_job_titles")),
    workExperience: toList(pick(source, "workExperience", "work_experience"), toWorkExperience),
    pastIndustries: toStringArray(pick(source, "pastIndustries", "past_industries")),
    education: toList(source.education, toEducation),
    technicalSkills: toStringArray(pick(source, "technicalSkills", "technical_skills")),
    softSkills: toStringArray(pick(source, "softSkills", "soft_skills")),
    languages: toStringArray(source.languages),
    certifications: toList(source.certifications, toCertification),
  };

  assignText(resume, "name", source.name);
  assignText(resume, "email", source.email);
  assignText(resume, "currentLocation", pick(source, "currentLocation", "current_location"));
  assignText(resume, "desiredJobLocation", pick(source, "desiredJobLocation", "desired_job_location"));

  const remotePreference = toEnum(pick(source, "remotePreference", "remote_preference"), REMOTE_PREFERENCES);
  if (remotePreference) {
    resume.remotePreference = remotePreference;
  }
  const careerLevel = toEnum(pick(source, "careerLevel", "career_level"), CAREER_LEVELS);
  if (careerLevel) {
    resume.careerLevel = careerLevel;
  }
  const years = toNonNegativeInteger(pick(source, "yearsOfExperience", "years_of_experience"));
  if (years !== undefined) {
    resume.yearsOfExperience = years;
  }
  const rawText = pick(source, "rawText", "raw_text");
  if (typeof rawText === "string" && rawText.trim()) {
    resume.rawText = rawText;
  }

  return resume;
}

function toWorkExperience(value: unknown): WorkExperience | null {
  if (!isRecord(value)) {
    return null;
  }
  const jobTitle = toText(pick(value, "jobTitle", "job_title"));
  const companyName = toText(pick(value, "companyName", "company_name"));
  if (!jobTitle && !companyName) {
    return null;
  }
  return {
    companyName,
    jobTitle,
    duration: toText(value.duration),
    industry: toText(value.industry),
    responsibilities: toStringArray(value.responsibilities),
  };
}

function toEducation(value: unknown): Education | null {
  if (!isRecord(value)) {
    return null;
  }
  const level = toEnum(value.level, EDUCATION_LEVELS) ?? "Other";
  const education: Education = { level };
  const fieldOfStudy = toText(pick(value, "fieldOfStudy", "field_of_study"));
  if (fieldOfStudy) {
    education.fieldOfStudy = fieldOfStudy;
  }
  const institution = toText(value.institution);
  if (institution) {
    education.institution = institution;
  }
  const graduationYear = toNonNegativeInteger(pick(value, "graduationYear", "graduation_year"));
  if (graduationYear !== undefined) {
    education.graduationYear = graduationYear;
  }
  return education;
}

function toCertification(value: unknown): Certification | null {
  if (typeof value === "string") {
    const name = toText(value);
    return name ? { name } : null;
  }
  if (!isRecord(value)) {
    return null;
  }
  const name = toText(value.name);
  if (!name) {
    return null;
  }
  const certification: Certification = { name };
  const issuingOrganization = toText(pick(value, "issuingOrganization", "issuing_organization"));
  if (issuingOrganization) {
    certification.issuingOrganization = issuingOrganization;
  }
  const issueDate = toText(pick(value, "issueDate", "issue_date"));
  if (issueDate) {
    certification.issueDate = issueDate;
  }
  return certification;
}

type TextField = "name" | "email" | "currentLocation" | "desiredJobLocation";

function assignText(resume: CandidateResume, field: TextField, value: unknown): void {
  const text = toText(value);
  if (text) {
    resume[field] = text;
  }
}

function pick(source: Record<string, unknown>, camelKey: string, snakeKey: string): unknown {
  return source[camelKey] ?? source[snakeKey];
}

function toList<T>(value: unknown, mapItem: (item: unknown) => T | null): T[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: T[] = [];
  for (const item of value.slice(0, MAX_LIST_ITEMS)) {
    const mapped = mapItem(item);
    if (mapped !== null) {
      items.push(mapped);
    }
  }
  return items;
}

function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const seen = new Set<string>();
  const items: string[] = [];
  for (const item of value) {
    const text = toText(item);
    if (!text || seen.has(text.toLowerCase())) {
      continue;
    }
    seen.add(text.toLowerCase());
    items.push(text);
    if (items.length >= MAX_LIST_ITEMS) {
      break;
    }
  }
  return items;
}

function toEnum<T extends string>(value: unknown, allowed: ReadonlyArray<T>): T | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return allowed.find((item) => item.toLowerCase() === normalized);
}

function toNonNegativeInteger(value: unknown): number | undefined {
  if (typeof value === "string" && !value.trim()) {
    return undefined;
  }
  const numeric = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric) || numeric < 0) {
    return undefined;
  }
  return Math.floor(numeric);
}

function toText(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return "";
  }
  return value.trim().slice(0, MAX_TEXT);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
