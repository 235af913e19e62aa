import assert from "node:assert/strict";
import test from "node:test";
import { callJsonPromptSafe, callTextPromptSafe } from "../../ai/llm.safe";
import { LlmCallOptions } from "../../ai/llm.client";
import { ScriptedLlm, silentLogger } from "../support/fakes";

function scriptedJson(replies: Array<string | Error>) {
  const calls: Array<{ prompt: string; promptName?: string }> = [];
  return {
    calls,
    client: {
      async generateStructuredJson(
        prompt: string,
        _maxTokens: number,
        options?: LlmCallOptions,
      ): Promise<string> {
        calls.push({ prompt, promptName: options?.promptName });
        const reply = replies[calls.length - 1];
        if (reply === undefined) {
          throw new Error("no scripted reply left");
        }
        if (reply instanceof Error) {
          throw reply;
        }
        return reply;
      },
    },
  };
}

function isNamed(value: unknown): value is { name: string } {
  return typeof value === "object" && value !== null && "name" in value && typeof value.name === "string";
}

test("json replies wrapped in prose are extracted", async () => {
  const llm = scriptedJson(['Here you go: {"name": "Ada"} hope it helps']);

  const result = await callJsonPromptSafe({
    llmClient: llm.client,
    prompt: "extract",
    maxTokens: 100,
    promptName: "resume_structuring_v1",
    schemaHint: "{ name }",
    validate: isNamed,
  });

  assert.deepEqual(result, { ok: true, data: { name: "Ada" } });
  assert.equal(llm.calls.length, 1);
});

test("broken json goes through one repair call", async () => {
  const llm = scriptedJson(["{name: Ada", '{"name": "Ada"}']);

  const result = await callJsonPromptSafe({
    llmClient: llm.client,
    prompt: "extract",
    maxTokens: 100,
    promptName: "resume_structuring_v1",
    schemaHint: "{ name }",
    validate: isNamed,
    logger: silentLogger,
  });

  assert.deepEqual(result, { ok: true, data: { name: "Ada" } });
  assert.equal(llm.calls[1]?.promptName, "resume_structuring_v1_json_repair");
  assert.ok(llm.calls[1]?.prompt.includes("Broken answer:\n{name: Ada"));
});

test("a value failing validation is reported as schema_invalid", async () => {
  const llm = scriptedJson(['{"title": "x"}']);

  const result = await callJsonPromptSafe({
    llmClient: llm.client,
    prompt: "extract",
    maxTokens: 100,
    promptName: "p",
    schemaHint: "{ name }",
    validate: isNamed,
  });

  assert.deepEqual(result, { ok: false, error_code: "schema_invalid", raw: '{"title": "x"}' });
});

test("json calls retry once on rate limiting", async () => {
  const llm = scriptedJson([new Error("OpenAI API error: HTTP 429 - slow down"), '{"name": "Ada"}']);

  const result = await callJsonPromptSafe({
    llmClient: llm.client,
    prompt: "extract",
    maxTokens: 100,
    promptName: "p",
    schemaHint: "{ name }",
    validate: isNamed,
  });

  assert.deepEqual(result, { ok: true, data: { name: "Ada" } });
  assert.equal(llm.calls.length, 2);
});

test("text calls classify permanent failures", async () => {
  const llm = new ScriptedLlm(() => {
    throw new Error("OpenAI API error: HTTP 400 - bad request");
  });

  const result = await callTextPromptSafe({ llmClient: llm, prompt: "x", promptName: "p" });

  assert.deepEqual(result, {
    ok: false,
    error_code: "llm_failure",
    error_message: "OpenAI API error: HTTP 400 - bad request",
  });
  assert.equal(llm.prompts.length, 1);
});

test("timeouts are reported without a retry", async () => {
  const llm = new ScriptedLlm(() => new Promise<string>(() => {}));

  const result = await callTextPromptSafe({ llmClient: llm, prompt: "x", promptName: "p", timeoutMs: 10 });

  assert.deepEqual(result, { ok: false, error_code: "timeout", error_message: "timeout" });
  assert.equal(llm.prompts.length, 1);
});

test("text calls give up after one retry", async () => {
  const llm = new ScriptedLlm(() => {
    throw new Error("socket hang up: ECONNRESET");
  });

  const result = await callTextPromptSafe({ llmClient: llm, prompt: "x", promptName: "p" });

  assert.equal(result.ok, false);
  assert.equal(result.ok ? "" : result.error_code, "transient_failure");
  assert.equal(llm.prompts.length, 2);
});
