import { ContractType, JobPosting } from "../../shared/types/job.types";

export interface AdzunaJobResult {
  id?: string | number;
  title?: string;
  description?: string;
  created?: string;
  redirect_url?: string;
  contract_time?: string;
  contract_type?: string;
  salary_min?: number;
  salary_max?: number;
  company?: {
    display_name?: string;
  };
  location?: {
    display_name?: string;
    area?: string[];
  };
  category?: {
    label?: string;
  };
}

const EURO_AREAS = ["Belgium", "France", "Germany"];

export function parseAdzunaJob(raw: AdzunaJobResult, fallbackId: string): JobPosting {
  const title = stripMarkup(raw.title ?? "") || "Unknown Title";
  const location = formatLocation(raw.location?.display_name) || "Unknown Location";
  const salaryMin = toSalary(raw.salary_min);
  const salaryMax = toSalary(raw.salary_max);

  const job: JobPosting = {
    id: raw.id !== undefined && String(raw.id).trim() ? String(raw.id) : fallbackId,
    title,
    companyName: raw.company?.display_name?.trim() || "Unknown Company",
    description: stripMarkup(raw.description ?? ""),
    location,
    url: raw.redirect_url ?? "",
  };

  if (raw.redirect_url) {
    job.redirectUrl = raw.redirect_url;
  }
  const postedDate = parsePostedDate(raw.created);
  if (postedDate) {
    job.postedDate = postedDate;
  }
  const contractType = parseContractType(raw.contract_time);
  if (contractType) {
    job.contractType = contractType;
  }
  if (raw.category?.label) {
    job.category = raw.category.label;
  }
  if (salaryMin !== undefined) {
    job.salaryMin = salaryMin;
  }
  if (salaryMax !== undefined) {
    job.salaryMax = salaryMax;
  }
  if (salaryMin !== undefined || salaryMax !== undefined) {
    job.salaryCurrency = inferSalaryCurrency(raw.location?.area ?? []);
  }
  return job;
}

export function parseContractType(contractTime?: string): ContractType | undefined {
  if (!contractTime) {
    return undefined;
  }
  const value = contractTime.toLowerCase();
  if (value.includes("full")) {
    return "Full-time";
  }
  if (value.includes("part")) {
    return "Part-time";
  }
  if (value.includes("contract")) {
    return "Contract";
  }
  if (value.includes("temp")) {
    return "Temporary";
  }
  if (value.includes("intern")) {
    return "Internship";
  }
  if (value.includes("freelance")) {
    return "Freelance";
  }
  return "Other";
}

/** ISO timestamp to `YYYY-MM-DD`, or undefined when unparsable. */
export function parsePostedDate(created?: string): string | undefined {
  if (!created) {
    return undefined;
  }
  const timestamp = Date.parse(created);
  if (Number.isNaN(timestamp)) {
    return undefined;
  }
  return new Date(timestamp).toISOString().slice(0, 10);
}

export function inferSalaryCurrency(area: ReadonlyArray<string>): string {
  const joined = area.join(" ");
  if (joined.includes("US")) {
    return "USD";
  }
  if (EURO_AREAS.some((country) => joined.includes(country))) {
    return "EUR";
  }
  if (joined.includes("UK")) {
    return "GBP";
  }
  return "EUR";
}

function formatLocation(displayName?: string): string {
  return (displayName ?? "")
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .join(", ");
}

function toSalary(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return value;
}

function stripMarkup(text: string): string {
  return text.replace(/<\/?strong>/gi, "").trim();
}
