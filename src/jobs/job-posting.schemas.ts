import { ContractType, JobPosting } from "../shared/types/job.types";

const CONTRACT_TYPES: ReadonlyArray<ContractType> = [
  "Full-time",
  "Part-time",
  "Contract",
  "Temporary",
  "Internship",
  "Freelance",
  "Other",
];

export type JobPostingValidation =
  | { ok: true; job: JobPosting }
  | { ok: false; error: string };

/**
 * Accepts job postings from callers in camelCase or in the snake_case shape used by
 * job boards (`job_title`, `company_name`). A description is required since it is
 * the embedded text.
 */
export function normalizeJobPosting(raw: unknown, index: number): JobPostingValidation {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, error: `jobs[${index}] must be an object` };
  }
  const source: Record<string, unknown> = { ...raw };
  const title = toText(source.title ?? source.jobTitle ?? source.job_title);
  const description = toText(source.description);
  if (!title) {
    return { ok: false, error: `jobs[${index}].title is required` };
  }
  if (!description) {
    return { ok: false, error: `jobs[${index}].description is required` };
  }

  const job: JobPosting = {
    id: toText(source.id ?? source.adzuna_job_id) || `job-${index + 1}`,
    title,
    companyName: toText(source.companyName ?? source.company_name ?? source.company) || "Unknown Company",
    description,
    location: toText(source.location) || "Unknown Location",
  };

  const url = toText(source.url ?? source.job_url);
  if (url) {
    job.url = url;
  }
  const redirectUrl = toText(source.redirectUrl ?? source.redirect_url);
  if (redirectUrl) {
    job.redirectUrl = redirectUrl;
  }
  const postedDate = toText(source.postedDate ?? source.posted_date);
  if (postedDate) {
    job.postedDate = postedDate;
  }
  const contractType = CONTRACT_TYPES.find(
    (item) => item.toLowerCase() === toText(source.contractType ?? source.contract_type).toLowerCase(),
  );
  if (contractType) {
    job.contractType = contractType;
  }
  const category = toText(source.category);
  if (category) {
    job.category = category;
  }
  const salaryMin = toAmount(source.salaryMin ?? source.salary_min);
  if (salaryMin !== undefined) {
    job.salaryMin = salaryMin;
  }
  const salaryMax = toAmount(source.salaryMax ?? source.salary_max);
  if (salaryMax !== undefined) {
    job.salaryMax = salaryMax;
  }
  const salaryCurrency = toText(source.salaryCurrency ?? source.salary_currency);
  if (salaryCurrency) {
    job.salaryCurrency = salaryCurrency;
  }

  return { ok: true, job };
}

function toText(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return typeof value === "string" ? value.trim() : "";
}

function toAmount(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : undefined;
}
