import express, { Express, Request, Response } from "express";
import { EmbeddingsClient } from "./ai/embeddings.client";
import { LlmClient } from "./ai/llm.client";
import { EnvConfig, toMatchingConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { buildMatchRouter, MatchController } from "./http/match.controller";
import { AdzunaJobSource } from "./jobs/adzuna.client";
import { createMatchingEngine, MatchingEngine } from "./matching/matching.engine";
import { JobPosting } from "./shared/types/job.types";
import { TtlCache } from "./shared/utils/ttl-cache";

export interface AppContext {
  app: Express;
  logger: Logger;
  matchingEngine: MatchingEngine;
  jobSource?: AdzunaJobSource;
}

export function createApp(env: EnvConfig): AppContext {
  const logger = createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "5mb" }));

  const embeddingsClient = new EmbeddingsClient(env.openaiApiKey, env.openaiEmbeddingModel);
  const llmClient = new LlmClient(env.openaiApiKey, logger, env.openaiChatModel, env.llmTemperature);
  const matchingEngine = createMatchingEngine({
    embeddings: embeddingsClient,
    llm: llmClient,
    config: toMatchingConfig(env),
    logger,
  });
  const jobSource = buildJobSource(env, logger);
  logger.info("Job search source", {
    enabled: Boolean(jobSource),
    country: env.adzunaCountry,
    cacheEnabled: env.jobCacheEnabled,
  });

  const controller = new MatchController({ matchingEngine, logger, jobSource });

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      ok: true,
      chatModel: llmClient.getModelName(),
      embeddingModel: embeddingsClient.getModelName(),
      jobSearch: Boolean(jobSource),
    });
  });

  app.use("/api", buildMatchRouter(controller));

  return { app, logger, matchingEngine, jobSource };
}

export function buildJobSource(env: EnvConfig, logger: Logger): AdzunaJobSource | undefined {
  if (!env.adzunaAppId || !env.adzunaApiKey) {
    return undefined;
  }
  const cache = env.jobCacheEnabled ? new TtlCache<JobPosting[]>(env.jobCacheTtlSec * 1000) : undefined;
  return new AdzunaJobSource(
    {
      appId: env.adzunaAppId,
      apiKey: env.adzunaApiKey,
      country: env.adzunaCountry,
      baseUrl: env.adzunaBaseUrl,
    },
    logger,
    cache,
  );
}
