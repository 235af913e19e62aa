import { EmbeddingBackend } from "../../ai/embeddings.client";
import { LlmCallOptions, TextGenerationBackend } from "../../ai/llm.client";
import { Logger } from "../../config/logger";
import { JobPosting } from "../../shared/types/job.types";
import { CandidateResume } from "../../shared/types/resume.types";

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface RecordedLog {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): { logger: Logger; entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    logger: {
      debug(message, meta) {
        entries.push({ level: "debug", message, meta });
      },
      info(message, meta) {
        entries.push({ level: "info", message, meta });
      },
      warn(message, meta) {
        entries.push({ level: "warn", message, meta });
      },
      error(message, meta) {
        entries.push({ level: "error", message, meta });
      },
    },
  };
}

/**
 * Bag-of-words embeddings over a fixed vocabulary: one dimension per term.
 * Blank input is rejected the way the hosted embeddings API rejects it.
 */
export class KeywordEmbeddings implements EmbeddingBackend {
  public batchCalls: number[] = [];

  constructor(private readonly vocabulary: ReadonlyArray<string>) {}

  async createEmbedding(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async createEmbeddings(texts: ReadonlyArray<string>): Promise<number[][]> {
    this.batchCalls.push(texts.length);
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    if (!text.trim()) {
      throw new Error("Embeddings API error: HTTP 400 - '$.input' is invalid");
    }
    const tokens = text.toLowerCase().split(/[^a-z0-9+#]+/);
    return this.vocabulary.map((term) => tokens.filter((token) => token === term).length);
  }
}

/** Returns a fixed vector per exact text; unknown texts fail the test loudly. */
export class TableEmbeddings implements EmbeddingBackend {
  constructor(private readonly table: ReadonlyMap<string, number[]>) {}

  async createEmbedding(text: string): Promise<number[]> {
    return this.lookup(text);
  }

  async createEmbeddings(texts: ReadonlyArray<string>): Promise<number[][]> {
    return texts.map((text) => this.lookup(text));
  }

  private lookup(text: string): number[] {
    const vector = this.table.get(text);
    if (!vector) {
      throw new Error(`No test vector for text: ${text.slice(0, 40)}`);
    }
    return vector;
  }
}

export class ScriptedLlm implements TextGenerationBackend {
  public prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => string | Promise<string>) {}

  getModelName(): string {
    return "test-model";
  }

  async generateText(prompt: string, _maxTokens?: number, _options?: LlmCallOptions): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export function buildResume(overrides: Partial<CandidateResume> = {}): CandidateResume {
  return {
    targetJobTitles: [],
    workExperience: [],
    pastIndustries: [],
    education: [],
    technicalSkills: [],
    softSkills: [],
    languages: [],
    certifications: [],
    ...overrides,
  };
}

export function buildJob(id: string, title: string, description: string): JobPosting {
  return {
    id,
    title,
    companyName: `${title} Co`,
    description,
    location: "Sydney",
  };
}

export function titleFromPrompt(prompt: string): string {
  const match = /^Title: (.*)$/m.exec(prompt);
  return match?.[1] ?? "";
}
