import fetch from "node-fetch";
import { errorMessage, Logger } from "../config/logger";
import { RECRUITER_SYSTEM_PROMPT } from "./system/recruiter.system";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
  response_format?: {
    type: "json_object";
  };
}

interface ChatCompletionsResponse {
  choices: Array<{
    message: {
      content?: string | null;
    };
  }>;
}

export interface LlmCallOptions {
  promptName?: string;
}

export interface TextGenerationBackend {
  generateText(prompt: string, maxTokens?: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export interface StructuredJsonBackend {
  generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export class LlmClient implements TextGenerationBackend, StructuredJsonBackend {
  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    private readonly chatModel: string,
    private readonly temperature = 0.3,
  ) {}

  getModelName(): string {
    return this.chatModel;
  }

  async generateText(prompt: string, maxTokens = 300, options?: LlmCallOptions): Promise<string> {
    const content = await this.complete(
      this.buildRequestBody(prompt, maxTokens, this.temperature),
      prompt,
      options?.promptName ?? "text",
    );
    return content.trim();
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const body = this.buildRequestBody(prompt, maxTokens, 0.1);
    body.response_format = { type: "json_object" };
    return this.complete(body, prompt, options?.promptName ?? "structured_json");
  }

  private buildRequestBody(
    prompt: string,
    maxTokens: number,
    temperature: number,
  ): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature,
      messages: [
        {
          role: "system",
          content: RECRUITER_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }

  private async complete(
    requestBody: ChatCompletionsRequestBody,
    prompt: string,
    promptName: string,
  ): Promise<string> {
    const startedAt = Date.now();
    const maxTokens = requestBody.max_completion_tokens ?? requestBody.max_tokens;
    try {
      const response = await fetch("https://api.openai.com/v1/chat/completions", {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = body.choices[0]?.message?.content;
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }

      this.logger.debug("llm.call.completed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || normalized.startsWith("o1") || normalized.startsWith("o3");
}
