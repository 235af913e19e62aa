import { createHash } from "node:crypto";
import fetch, { RequestInit, Response } from "node-fetch";
import { errorMessage, Logger } from "../config/logger";
import { ADZUNA_MAX_RESULTS_PER_PAGE } from "../shared/constants";
import { JobPosting } from "../shared/types/job.types";
import { TtlCache } from "../shared/utils/ttl-cache";
import { AdzunaJobResult, parseAdzunaJob } from "./parsers/adzuna-job.parser";

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface AdzunaClientConfig {
  appId: string;
  apiKey: string;
  country: string;
  baseUrl: string;
  requestTimeoutMs?: number;
}

export interface JobSearchInput {
  query: string;
  location?: string;
  resultsPerPage?: number;
  page?: number;
  sortBy?: "relevance" | "date" | "salary";
}

interface AdzunaSearchResponse {
  count?: number;
  results?: AdzunaJobResult[];
}

interface AdzunaCategoriesResponse {
  results?: Array<{
    label?: string;
    tag?: string;
  }>;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export class AdzunaJobSource {
  constructor(
    private readonly config: AdzunaClientConfig,
    private readonly logger: Logger,
    private readonly cache?: TtlCache<JobPosting[]>,
    private readonly fetchImpl: HttpFetch = fetch,
  ) {}

  async searchJobs(input: JobSearchInput): Promise<JobPosting[]> {
    let resultsPerPage = input.resultsPerPage ?? ADZUNA_MAX_RESULTS_PER_PAGE;
    if (resultsPerPage > ADZUNA_MAX_RESULTS_PER_PAGE) {
      this.logger.warn("results_per_page capped", {
        requested: resultsPerPage,
        cap: ADZUNA_MAX_RESULTS_PER_PAGE,
      });
      resultsPerPage = ADZUNA_MAX_RESULTS_PER_PAGE;
    }
    const page = input.page ?? 1;
    const params: Record<string, string> = {
      results_per_page: String(resultsPerPage),
      what: input.query,
      where: input.location ?? "",
      sort_by: input.sortBy ?? "relevance",
    };

    const cacheKey = this.buildCacheKey(page, params);
    const cached = this.cache?.get(cacheKey);
    if (cached) {
      this.logger.info("Job search cache hit", { cacheKey, jobs: cached.length });
      return [...cached];
    }

    const body = await this.request<AdzunaSearchResponse>(
      `jobs/${this.config.country}/search/${page}`,
      params,
    );
    const results = Array.isArray(body.results) ? body.results : [];
    const jobs: JobPosting[] = [];
    results.forEach((result, index) => {
      try {
        jobs.push(parseAdzunaJob(result, `adzuna-${page}-${index}`));
      } catch (error) {
        this.logger.warn("Failed to parse job search result", {
          index,
          error: errorMessage(error),
        });
      }
    });

    this.cache?.set(cacheKey, [...jobs]);
    this.logger.info("Job search completed", {
      query: input.query,
      location: input.location ?? "",
      total: body.count ?? jobs.length,
      returned: jobs.length,
    });
    return jobs;
  }

  async listCategories(): Promise<string[]> {
    try {
      const body = await this.request<AdzunaCategoriesResponse>(
        `jobs/${this.config.country}/categories`,
        {},
      );
      const categories = Array.isArray(body.results) ? body.results : [];
      return categories
        .map((category) => category.label?.trim() ?? "")
        .filter((label) => label.length > 0);
    } catch (error) {
      this.logger.error("Failed to fetch job categories", { error: errorMessage(error) });
      return [];
    }
  }

  buildCacheKey(page: number, params: Record<string, string>): string {
    const payload: Record<string, string | number> = {
      ...params,
      country: this.config.country,
      page,
    };
    const sorted = Object.keys(payload)
      .sort()
      .map((key) => [key, payload[key]]);
    const digest = createHash("md5").update(JSON.stringify(sorted)).digest("hex");
    return `jobs:${digest}`;
  }

  private async request<T>(endpoint: string, params: Record<string, string>): Promise<T> {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, "")}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("app_id", this.config.appId);
    url.searchParams.set("app_key", this.config.apiKey);

    const response = await this.fetchImpl(url.toString(), {
      method: "GET",
      headers: {
        accept: "application/json",
      },
      timeout: this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Adzuna API error: HTTP ${response.status} - ${body.slice(0, 300)}`);
    }
    return (await response.json()) as T;
  }
}
