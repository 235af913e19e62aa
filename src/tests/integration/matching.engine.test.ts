import assert from "node:assert/strict";
import test from "node:test";
import { EmbeddingBackend } from "../../ai/embeddings.client";
import { createMatchingEngine } from "../../matching/matching.engine";
import { toSimilarityPercent } from "../../matching/rank-fusion";
import { createEmptyResume, normalizeCandidateResume } from "../../profiles/resume.schemas";
import { EmbeddingBackendError, EmptyJobBatchError } from "../../shared/errors";
import { JobPosting } from "../../shared/types/job.types";
import { MatchingConfig } from "../../shared/types/matching.types";
import {
  buildJob,
  buildResume,
  createRecordingLogger,
  KeywordEmbeddings,
  ScriptedLlm,
  silentLogger,
  titleFromPrompt,
} from "../support/fakes";

const VOCABULARY = ["python", "sql", "data", "truck", "driving", "cdl", "license", "analyst"];

const config: MatchingConfig = {
  topK: 10,
  rescoreEnabled: true,
  rescoreConcurrency: 2,
  rescoreTimeoutMs: 1000,
  embeddingBatchSize: 2,
  descriptionCharBudget: 1000,
};

const analystResume = buildResume({
  name: "Ada",
  targetJobTitles: ["Data Analyst"],
  technicalSkills: ["Python", "SQL"],
});

const postings = (): JobPosting[] => [
  buildJob("truck", "Truck Driver", "CDL license required for long haul truck driving."),
  buildJob("analyst", "Data Analyst", "Analyze data with Python and SQL."),
  buildJob("engineer", "Data Engineer", "Build data pipelines in Python."),
];

const verdicts: Record<string, string> = {
  "Data Analyst": "SCORE: 92\nEXPLANATION: Strong SQL and Python match.",
  "Data Engineer": "SCORE: 70\nEXPLANATION: Good Python overlap.",
  "Truck Driver": "SCORE: 5\nEXPLANATION: Unrelated field.",
};

function verdictLlm(overrides: Record<string, () => string> = {}): ScriptedLlm {
  return new ScriptedLlm((prompt) => {
    const title = titleFromPrompt(prompt);
    const override = overrides[title];
    if (override) {
      return override();
    }
    return verdicts[title] ?? "SCORE: 0\nEXPLANATION: Unknown job.";
  });
}

function engine(llm: ScriptedLlm, overrides: Partial<MatchingConfig> = {}, embeddings?: EmbeddingBackend) {
  return createMatchingEngine({
    embeddings: embeddings ?? new KeywordEmbeddings(VOCABULARY),
    llm,
    config: { ...config, ...overrides },
    logger: silentLogger,
  });
}

test("analyst resume ranks the analyst job first and the truck job last", async () => {
  const result = await engine(verdictLlm()).match(analystResume, postings());

  assert.deepEqual(
    result.jobs.map((job) => [job.id, job.match.finalScore]),
    [
      ["analyst", 92],
      ["engineer", 70],
      ["truck", 5],
    ],
  );
  assert.equal(result.rescoredCount, 3);
  assert.equal(result.degradedCount, 0);
  assert.equal(
    result.jobs[0]?.match.explanation,
    "[Similarity: 86.6% | LLM Score: 92%]\n\nStrong SQL and Python match.",
  );
  assert.equal(result.jobs[2]?.match.similarityScore, 0);
  assert.deepEqual(
    result.stages.map((trace) => trace.stage),
    ["INIT", "SIMILARITY_SCORED", "RESCORED", "FINAL_SORTED", "DONE"],
  );
});

test("output is a permutation of the input with scores in range", async () => {
  const input = postings();
  const result = await engine(verdictLlm()).match(analystResume, input, { topK: 2 });

  assert.deepEqual(result.jobs.map((job) => job.id).sort(), input.map((job) => job.id).sort());
  for (const job of result.jobs) {
    const score = job.match.finalScore;
    assert.ok(score !== null && score >= 0 && score <= 100, `${job.id} scored ${score}`);
  }
});

test("inputs are left untouched", async () => {
  const input = postings();
  const snapshot = structuredClone(input);
  const resumeSnapshot = structuredClone(analystResume);

  await engine(verdictLlm()).match(analystResume, input);

  assert.deepEqual(input, snapshot);
  assert.deepEqual(analystResume, resumeSnapshot);
});

test("with rescoring disabled the order and scores come from similarity alone", async () => {
  const llm = verdictLlm();
  const result = await engine(llm, { rescoreEnabled: false }).match(analystResume, postings());

  assert.deepEqual(
    result.jobs.map((job) => job.id),
    ["analyst", "engineer", "truck"],
  );
  for (const job of result.jobs) {
    assert.equal(job.match.finalScore, toSimilarityPercent(job.match.similarityScore ?? Number.NaN));
    assert.equal(job.match.explanation, null);
  }
  assert.equal(result.jobs[0]?.match.finalScore, 86.6);
  assert.equal(result.jobs[1]?.match.finalScore, 70.71);
  assert.equal(result.jobs[2]?.match.finalScore, 0);
  assert.equal(llm.prompts.length, 0);
  assert.equal(result.rescoredCount, 0);
  assert.equal(result.stages[2]?.stage, "SKIPPED_RESCORE");
});

test("a per-call option overrides the configured rescore switch", async () => {
  const llm = verdictLlm();
  const result = await engine(llm).match(analystResume, postings(), { rescoreEnabled: false });

  assert.equal(llm.prompts.length, 0);
  assert.equal(result.jobs[0]?.match.finalScore, 86.6);
});

test("only the top K by similarity are rescored", async () => {
  const llm = verdictLlm({ "Data Analyst": () => "SCORE: 30\nEXPLANATION: Too junior." });
  const result = await engine(llm).match(analystResume, postings(), { topK: 1 });

  assert.equal(llm.prompts.length, 1);
  assert.equal(titleFromPrompt(llm.prompts[0] ?? ""), "Data Analyst");
  assert.deepEqual(
    result.jobs.map((job) => [job.id, job.match.finalScore]),
    [
      ["engineer", 70.71],
      ["analyst", 30],
      ["truck", 0],
    ],
  );
  assert.equal(result.jobs[0]?.match.explanation, null);
  assert.equal(result.rescoredCount, 1);
});

test("top K is clamped into the supported range", async () => {
  const low = verdictLlm();
  await engine(low).match(analystResume, postings(), { topK: 0 });
  assert.equal(low.prompts.length, 1);

  const high = verdictLlm();
  await engine(high).match(analystResume, postings(), { topK: 500 });
  assert.equal(high.prompts.length, 3);
});

test("an unparsable reply degrades one job and leaves the others scored", async () => {
  const llm = verdictLlm({ "Data Engineer": () => "Looks like a reasonable fit to me." });
  const result = await engine(llm).match(analystResume, postings());

  assert.deepEqual(
    result.jobs.map((job) => [job.id, job.match.finalScore]),
    [
      ["analyst", 92],
      ["truck", 5],
      ["engineer", 0],
    ],
  );
  assert.equal(
    result.jobs[2]?.match.explanation,
    "[Similarity: 70.71% | LLM Score: 0%]\n\nCould not parse scoring response",
  );
  assert.equal(result.degradedCount, 1);
  assert.equal(result.rescoredCount, 3);
});

test("a failing model call degrades one job and leaves the others scored", async () => {
  const llm = verdictLlm({
    "Data Analyst": () => {
      throw new Error("OpenAI API error: HTTP 400 - context length exceeded");
    },
  });
  const result = await engine(llm).match(analystResume, postings());

  assert.deepEqual(
    result.jobs.map((job) => [job.id, job.match.finalScore]),
    [
      ["engineer", 70],
      ["truck", 5],
      ["analyst", 0],
    ],
  );
  assert.equal(result.jobs[2]?.match.explanation, "[Similarity: 86.6% | LLM Score: 0%]\n\nScoring failed");
  assert.equal(result.degradedCount, 1);
});

test("a single job is scored on its own", async () => {
  const result = await engine(verdictLlm()).match(analystResume, [
    buildJob("only", "Truck Driver", "Truck driving with a CDL license."),
  ]);

  assert.equal(result.jobs.length, 1);
  assert.equal(result.jobs[0]?.match.finalScore, 5);
  assert.equal(result.jobs[0]?.match.similarityScore, 0);
});

test("a resume with no profile fields is still ranked", async () => {
  const llm = verdictLlm();
  const result = await engine(llm).match(normalizeCandidateResume({}), postings());

  assert.deepEqual(
    result.jobs.map((job) => [job.id, job.match.similarityScore, job.match.finalScore]),
    [
      ["analyst", 0, 92],
      ["engineer", 0, 70],
      ["truck", 0, 5],
    ],
  );
  assert.equal(llm.prompts.length, 3);
});

test("a resume whose structuring failed is embedded from its raw text", async () => {
  const result = await engine(verdictLlm(), { rescoreEnabled: false }).match(
    createEmptyResume("Truck driving with a CDL license"),
    postings(),
  );

  assert.deepEqual(
    result.jobs.map((job) => [job.id, job.match.finalScore]),
    [
      ["truck", 100],
      ["analyst", 0],
      ["engineer", 0],
    ],
  );
});

test("an empty batch fails and the failure is logged", async () => {
  const { logger, entries } = createRecordingLogger();
  const matcher = createMatchingEngine({
    embeddings: new KeywordEmbeddings(VOCABULARY),
    llm: verdictLlm(),
    config,
    logger,
  });

  await assert.rejects(matcher.match(analystResume, []), EmptyJobBatchError);
  const failure = entries.find((entry) => entry.message === "matching.run.failed");
  assert.equal(failure?.level, "error");
  assert.equal(failure?.meta?.error_code, "empty_job_batch");
});

test("embedding outages abort the run", async () => {
  const down: EmbeddingBackend = {
    async createEmbedding(): Promise<number[]> {
      throw new Error("OpenAI embeddings API error: HTTP 503 - unavailable");
    },
    async createEmbeddings(): Promise<number[][]> {
      return [];
    },
  };
  const llm = verdictLlm();

  await assert.rejects(engine(llm, {}, down).match(analystResume, postings()), EmbeddingBackendError);
  assert.equal(llm.prompts.length, 0);
});
