import { Logger } from "../config/logger";
import { LlmCallOptions } from "./llm.client";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

interface ModelNamed {
  getModelName?(): string;
}

export interface JsonSafeCallArgs<T> {
  llmClient: ModelNamed & {
    generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  };
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  validate: (value: unknown) => value is T;
  logger?: Logger;
  timeoutMs?: number;
}

export interface TextSafeCallArgs {
  llmClient: ModelNamed & {
    generateText(prompt: string, maxTokens?: number, options?: LlmCallOptions): Promise<string>;
  };
  prompt: string;
  maxTokens?: number;
  promptName: string;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeFailureCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeJsonResult<T> =
  | { ok: true; data: T }
  | {
      ok: false;
      error_code: SafeFailureCode | "json_parse_failed" | "schema_invalid";
      raw?: string;
    };

export type SafeTextResult =
  | { ok: true; text: string }
  | { ok: false; error_code: SafeFailureCode; error_message: string };

type AttemptResult = { ok: true; raw: string } | { ok: false; error_code: SafeFailureCode; error_message: string };

const DEFAULT_TIMEOUT_MS = 25_000;
const REPAIR_MIN_TOKENS = 240;
const REPAIR_MAX_TOKENS = 2400;

/**
 * Structured-output call with one retry on transient errors and one repair round
 * trip when the reply is not a parsable JSON object.
 */
export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const ask = (prompt: string, maxTokens: number, promptName: string): Promise<AttemptResult> =>
    callWithOneRetry(
      () => args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }),
      timeoutMs,
      () => logRetry(args.logger, promptName, args.llmClient),
    );

  const initial = await ask(args.prompt, args.maxTokens, args.promptName);
  if (!initial.ok) {
    return { ok: false, error_code: initial.error_code };
  }
  const parsed = tryParseJsonObject(initial.raw);
  if (parsed.ok) {
    return validateParsed(args.validate, parsed.data, initial.raw);
  }

  const repaired = await ask(
    buildJsonRepairV1Prompt({ schemaHint: args.schemaHint, raw: initial.raw }),
    Math.max(REPAIR_MIN_TOKENS, Math.min(REPAIR_MAX_TOKENS, args.maxTokens)),
    `${args.promptName}_json_repair`,
  );
  if (!repaired.ok) {
    return { ok: false, error_code: repaired.error_code };
  }
  const repairedParsed = tryParseJsonObject(repaired.raw);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.raw };
  }
  return validateParsed(args.validate, repairedParsed.data, repaired.raw);
}

export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const result = await callWithOneRetry(
    () => args.llmClient.generateText(args.prompt, args.maxTokens ?? 300, { promptName: args.promptName }),
    normalizeTimeout(args.timeoutMs),
    () => logRetry(args.logger, args.promptName, args.llmClient),
  );
  if (!result.ok) {
    return result;
  }
  return { ok: true, text: result.raw.trim() };
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

// Timeouts are not retried: a second attempt would double the wait.
async function callWithOneRetry(
  call: () => Promise<string>,
  timeoutMs: number,
  onRetry: () => void,
): Promise<AttemptResult> {
  try {
    return { ok: true, raw: await withTimeout(call(), timeoutMs) };
  } catch (error) {
    if (classifyFailure(error) !== "transient_failure") {
      return toFailure(error);
    }
  }

  onRetry();
  try {
    return { ok: true, raw: await withTimeout(call(), timeoutMs) };
  } catch (error) {
    return toFailure(error);
  }
}

function validateParsed<T>(
  validate: (value: unknown) => value is T,
  data: unknown,
  raw: string,
): SafeJsonResult<T> {
  if (!validate(data)) {
    return { ok: false, error_code: "schema_invalid", raw };
  }
  return { ok: true, data };
}

function logRetry(logger: Logger | undefined, promptName: string, client: ModelNamed): void {
  logger?.warn("llm.safe.retry.once", {
    promptName,
    modelName: client.getModelName?.(),
  });
}

function toFailure(error: unknown): { ok: false; error_code: SafeFailureCode; error_message: string } {
  return {
    ok: false,
    error_code: classifyFailure(error),
    error_message: error instanceof Error ? error.message : "Unknown error",
  };
}

function classifyFailure(error: unknown): SafeFailureCode {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  if (message.includes("timeout")) {
    return "timeout";
  }
  const transient =
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    /http 50[0234]/.test(message);
  return transient ? "transient_failure" : "llm_failure";
}

function tryParseJsonObject(raw: string): { ok: true; data: unknown } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}
