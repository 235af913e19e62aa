import { Request, Response, Router } from "express";
import { errorMessage, Logger } from "../config/logger";
import { AdzunaJobSource } from "../jobs/adzuna.client";
import { normalizeJobPosting } from "../jobs/job-posting.schemas";
import { MatchingEngine } from "../matching/matching.engine";
import { normalizeCandidateResume } from "../profiles/resume.schemas";
import { MAX_TOP_K, MIN_TOP_K } from "../shared/constants";
import { isMatchingError } from "../shared/errors";
import { JobPosting } from "../shared/types/job.types";
import { MatchOptions } from "../shared/types/matching.types";

export interface HttpResult {
  status: number;
  body: Record<string, unknown>;
}

interface MatchControllerDeps {
  matchingEngine: MatchingEngine;
  logger: Logger;
  jobSource?: AdzunaJobSource;
}

export class MatchController {
  constructor(private readonly deps: MatchControllerDeps) {}

  async handleMatch(body: unknown): Promise<HttpResult> {
    if (!isRecord(body)) {
      return badRequest("Invalid body");
    }
    if (!isRecord(body.resume)) {
      return badRequest("resume must be an object");
    }
    if (!Array.isArray(body.jobs)) {
      return badRequest("jobs must be an array");
    }

    const jobs: JobPosting[] = [];
    for (const [index, raw] of body.jobs.entries()) {
      const validation = normalizeJobPosting(raw, index);
      if (!validation.ok) {
        return badRequest(validation.error);
      }
      jobs.push(validation.job);
    }

    const options: MatchOptions = {};
    if (body.topK !== undefined) {
      if (!isIntegerInRange(body.topK, MIN_TOP_K, MAX_TOP_K)) {
        return badRequest(`topK must be an integer between ${MIN_TOP_K} and ${MAX_TOP_K}`);
      }
      options.topK = body.topK;
    }
    if (body.rescore !== undefined) {
      if (typeof body.rescore !== "boolean") {
        return badRequest("rescore must be a boolean");
      }
      options.rescoreEnabled = body.rescore;
    }

    try {
      const result = await this.deps.matchingEngine.match(
        normalizeCandidateResume(body.resume),
        jobs,
        options,
      );
      return {
        status: 200,
        body: {
          ok: true,
          jobs: result.jobs,
          stages: result.stages,
          rescored: result.rescoredCount,
          degraded: result.degradedCount,
        },
      };
    } catch (error) {
      if (isMatchingError(error)) {
        const status = error.code === "empty_job_batch" ? 400 : 502;
        return { status, body: { ok: false, error: error.code, message: error.message } };
      }
      this.deps.logger.error("Matching request failed", { error: errorMessage(error) });
      return { status: 500, body: { ok: false, error: "internal_error" } };
    }
  }

  async handleJobSearch(body: unknown): Promise<HttpResult> {
    if (!this.deps.jobSource) {
      return { status: 503, body: { ok: false, error: "Job search is not configured" } };
    }
    if (!isRecord(body) || typeof body.query !== "string" || !body.query.trim()) {
      return badRequest("query is required");
    }
    const resultsPerPage = body.resultsPerPage;
    if (resultsPerPage !== undefined && !isIntegerInRange(resultsPerPage, 1, 1000)) {
      return badRequest("resultsPerPage must be a positive integer");
    }

    try {
      const jobs = await this.deps.jobSource.searchJobs({
        query: body.query.trim(),
        location: typeof body.location === "string" ? body.location.trim() : "",
        resultsPerPage,
      });
      return { status: 200, body: { ok: true, jobs } };
    } catch (error) {
      this.deps.logger.error("Job search request failed", { error: errorMessage(error) });
      return { status: 502, body: { ok: false, error: "job_search_failed" } };
    }
  }
}

export function buildMatchRouter(controller: MatchController): Router {
  const router = Router();

  router.post("/match", async (request: Request, response: Response) => {
    const result = await controller.handleMatch(request.body);
    response.status(result.status).json(result.body);
  });

  router.post("/jobs/search", async (request: Request, response: Response) => {
    const result = await controller.handleJobSearch(request.body);
    response.status(result.status).json(result.body);
  });

  return router;
}

function badRequest(error: string): HttpResult {
  return { status: 400, body: { ok: false, error } };
}

function isIntegerInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
