import { readFile } from "node:fs/promises";
import path from "node:path";
import { buildJobSource } from "../src/app";
import { EmbeddingsClient } from "../src/ai/embeddings.client";
import { LlmClient } from "../src/ai/llm.client";
import { EnvConfig, loadEnv, toMatchingConfig } from "../src/config/env";
import { createLogger, Logger } from "../src/config/logger";
import { DocumentService } from "../src/documents/document.service";
import { normalizeJobPosting } from "../src/jobs/job-posting.schemas";
import { createMatchingEngine } from "../src/matching/matching.engine";
import { ResumeStructuringService } from "../src/profiles/resume-structuring.service";
import { normalizeCandidateResume } from "../src/profiles/resume.schemas";
import { JobPosting } from "../src/shared/types/job.types";
import { CandidateResume } from "../src/shared/types/resume.types";

const USAGE = [
  "Usage: match-jobs <resume.json|resume.pdf|resume.docx> [jobs.json] [topK]",
  "",
  "Without jobs.json the first target role of the resume is searched on Adzuna.",
].join("\n");

async function main(): Promise<void> {
  const [resumePath, jobsPath, topKRaw] = process.argv.slice(2);
  if (!resumePath) {
    throw new Error(USAGE);
  }

  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel, writer: process.stderr });
  const llmClient = new LlmClient(env.openaiApiKey, logger, env.openaiChatModel, env.llmTemperature);
  const embeddingsClient = new EmbeddingsClient(env.openaiApiKey, env.openaiEmbeddingModel);

  const resume = await loadResume(resumePath, llmClient, logger);
  const jobs = jobsPath ? await loadJobs(jobsPath) : await searchJobs(resume, env, logger);
  if (jobs.length === 0) {
    throw new Error("No jobs to rank.");
  }

  const engine = createMatchingEngine({
    embeddings: embeddingsClient,
    llm: llmClient,
    config: toMatchingConfig(env),
    logger,
  });
  const topK = topKRaw ? Number(topKRaw) : undefined;
  if (topK !== undefined && !Number.isInteger(topK)) {
    throw new Error(`Invalid topK: ${topKRaw}`);
  }
  const result = await engine.match(resume, jobs, { topK });

  const lines: string[] = [];
  for (const [index, job] of result.jobs.entries()) {
    lines.push(
      `${index + 1}) ${job.title} at ${job.companyName} (${job.location}) | score ${job.match.finalScore}%`,
    );
    if (job.match.explanation) {
      lines.push(`   ${job.match.explanation.replace(/\n+/g, " ")}`);
    }
  }
  process.stdout.write(`${lines.join("\n")}\n`);
}

async function loadResume(
  filePath: string,
  llmClient: LlmClient,
  logger: Logger,
): Promise<CandidateResume> {
  if (path.extname(filePath).toLowerCase() === ".json") {
    const raw: unknown = JSON.parse(await readFile(filePath, "utf8"));
    return normalizeCandidateResume(raw);
  }
  const documentService = new DocumentService(logger);
  const text = await documentService.extractText(await readFile(filePath), path.basename(filePath));
  return new ResumeStructuringService(llmClient, logger).structure(text);
}

async function loadJobs(filePath: string): Promise<JobPosting[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, "utf8"));
  if (!Array.isArray(raw)) {
    throw new Error(`${filePath} must contain a JSON array of jobs.`);
  }
  const jobs: JobPosting[] = [];
  for (const [index, item] of raw.entries()) {
    const validation = normalizeJobPosting(item, index);
    if (!validation.ok) {
      throw new Error(validation.error);
    }
    jobs.push(validation.job);
  }
  return jobs;
}

async function searchJobs(
  resume: CandidateResume,
  env: EnvConfig,
  logger: Logger,
): Promise<JobPosting[]> {
  const query = resume.targetJobTitles[0];
  if (!query) {
    throw new Error("No jobs file given and the resume has no target roles to search for.");
  }
  const jobSource = buildJobSource(env, logger);
  if (!jobSource) {
    throw new Error("ADZUNA_APP_ID and ADZUNA_API_KEY are required to search jobs.");
  }
  return jobSource.searchJobs({
    query,
    location: resume.desiredJobLocation ?? resume.currentLocation ?? "",
  });
}

void main().catch((error) => {
  process.stderr.write(`[match-jobs] failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
