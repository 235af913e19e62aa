export type CareerLevel =
  | "Intern"
  | "Junior"
  | "Mid-Level"
  | "Senior"
  | "Lead"
  | "Principal"
  | "Executive";

export type RemotePreference = "On-site" | "Hybrid" | "Remote" | "Flexible";

export type EducationLevel =
  | "High School"
  | "Associate Degree"
  | "Bachelor's Degree"
  | "Master's Degree"
  | "PhD"
  | "Other";

export interface WorkExperience {
  companyName: string;
  jobTitle: string;
  duration: string;
  industry: string;
  responsibilities: string[];
}

export interface Education {
  level: EducationLevel;
  fieldOfStudy?: string;
  institution?: string;
  graduationYear?: number;
}

export interface Certification {
  name: string;
  issuingOrganization?: string;
  issueDate?: string;
}

export interface CandidateResume {
  name?: string;
  email?: string;
  targetJobTitles: string[];
  currentLocation?: string;
  desiredJobLocation?: string;
  remotePreference?: RemotePreference;
  careerLevel?: CareerLevel;
  yearsOfExperience?: number;
  workExperience: WorkExperience[];
  pastIndustries: string[];
  education: Education[];
  technicalSkills: string[];
  softSkills: string[];
  languages: string[];
  certifications: Certification[];
  rawText?: string;
}
