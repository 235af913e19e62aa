import dotenv from "dotenv";
import { LogLevel } from "./logger";
import { DEFAULT_TOP_K, DESCRIPTION_CHAR_BUDGET, MAX_TOP_K, MIN_TOP_K } from "../shared/constants";
import { MatchingConfig } from "../shared/types/matching.types";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiEmbeddingModel: string;
  llmTemperature: number;
  matchTopK: number;
  matchRescoreEnabled: boolean;
  matchRescoreConcurrency: number;
  matchRescoreTimeoutMs: number;
  embeddingsBatchSize: number;
  adzunaAppId?: string;
  adzunaApiKey?: string;
  adzunaCountry: string;
  adzunaBaseUrl: string;
  jobCacheEnabled: boolean;
  jobCacheTtlSec: number;
}

type EnvSource = Record<string, string | undefined>;

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const temperatureRaw = source.LLM_TEMPERATURE ?? "0.3";
  const llmTemperature = Number(temperatureRaw);
  const topKRaw = source.MATCH_TOP_K ?? String(DEFAULT_TOP_K);
  const matchTopK = Number(topKRaw);
  const rescoreEnabledRaw = source.MATCH_RESCORE_ENABLED ?? "true";
  const concurrencyRaw = source.MATCH_RESCORE_CONCURRENCY ?? "4";
  const matchRescoreConcurrency = Number(concurrencyRaw);
  const timeoutRaw = source.MATCH_RESCORE_TIMEOUT_MS ?? "25000";
  const matchRescoreTimeoutMs = Number(timeoutRaw);
  const batchSizeRaw = source.EMBEDDINGS_BATCH_SIZE ?? "64";
  const embeddingsBatchSize = Number(batchSizeRaw);
  const jobCacheEnabledRaw = source.JOB_CACHE_ENABLED ?? "true";
  const jobCacheTtlRaw = source.JOB_CACHE_TTL_SEC ?? "3600";
  const jobCacheTtlSec = Number(jobCacheTtlRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(llmTemperature) || llmTemperature < 0 || llmTemperature > 2) {
    throw new Error(`Invalid LLM_TEMPERATURE value: ${temperatureRaw}. Expected number between 0 and 2.`);
  }
  if (!Number.isInteger(matchTopK) || matchTopK < MIN_TOP_K || matchTopK > MAX_TOP_K) {
    throw new Error(
      `Invalid MATCH_TOP_K value: ${topKRaw}. Expected integer between ${MIN_TOP_K} and ${MAX_TOP_K}.`,
    );
  }
  if (!Number.isInteger(matchRescoreConcurrency) || matchRescoreConcurrency < 1) {
    throw new Error(`Invalid MATCH_RESCORE_CONCURRENCY value: ${concurrencyRaw}`);
  }
  if (!Number.isFinite(matchRescoreTimeoutMs) || matchRescoreTimeoutMs < 1000) {
    throw new Error(`Invalid MATCH_RESCORE_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(embeddingsBatchSize) || embeddingsBatchSize < 1 || embeddingsBatchSize > 2048) {
    throw new Error(`Invalid EMBEDDINGS_BATCH_SIZE value: ${batchSizeRaw}`);
  }
  if (!Number.isInteger(jobCacheTtlSec) || jobCacheTtlSec < 1) {
    throw new Error(`Invalid JOB_CACHE_TTL_SEC value: ${jobCacheTtlRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiEmbeddingModel:
      getOptionalTrimmed(source, "OPENAI_EMBEDDINGS_MODEL") ??
      getOptionalTrimmed(source, "OPENAI_EMBEDDING_MODEL") ??
      "text-embedding-3-small",
    llmTemperature,
    matchTopK,
    matchRescoreEnabled: parseBoolean(rescoreEnabledRaw),
    matchRescoreConcurrency,
    matchRescoreTimeoutMs,
    embeddingsBatchSize,
    adzunaAppId: getOptionalTrimmed(source, "ADZUNA_APP_ID"),
    adzunaApiKey: getOptionalTrimmed(source, "ADZUNA_API_KEY"),
    adzunaCountry: (getOptionalTrimmed(source, "ADZUNA_COUNTRY") ?? "us").toLowerCase(),
    adzunaBaseUrl: getOptionalTrimmed(source, "ADZUNA_BASE_URL") ?? "https://api.adzuna.com/v1/api",
    jobCacheEnabled: parseBoolean(jobCacheEnabledRaw),
    jobCacheTtlSec,
  };
}

export function toMatchingConfig(env: EnvConfig): MatchingConfig {
  return {
    topK: env.matchTopK,
    rescoreEnabled: env.matchRescoreEnabled,
    rescoreConcurrency: env.matchRescoreConcurrency,
    rescoreTimeoutMs: env.matchRescoreTimeoutMs,
    embeddingBatchSize: env.embeddingsBatchSize,
    descriptionCharBudget: DESCRIPTION_CHAR_BUDGET,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
