export type ContractType =
  | "Full-time"
  | "Part-time"
  | "Contract"
  | "Temporary"
  | "Internship"
  | "Freelance"
  | "Other";

export interface MatchResult {
  similarityScore: number | null;
  finalScore: number | null;
  explanation: string | null;
}

export interface JobPosting {
  id: string;
  title: string;
  companyName: string;
  description: string;
  location: string;
  url?: string;
  redirectUrl?: string;
  postedDate?: string;
  contractType?: ContractType;
  category?: string;
  salaryMin?: number;
  salaryMax?: number;
  salaryCurrency?: string;
}

export interface JobRecord extends JobPosting {
  match: MatchResult;
}

export function createUnscoredJob(posting: JobPosting): JobRecord {
  return {
    ...posting,
    match: {
      similarityScore: null,
      finalScore: null,
      explanation: null,
    },
  };
}
