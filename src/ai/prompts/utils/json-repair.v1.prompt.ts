export const JSON_REPAIR_V1_PROMPT = `The previous answer was supposed to be a single JSON object but could not be parsed.

Rewrite it as one valid JSON object that follows the expected shape.
- Keep every value that can be recovered from the broken answer.
- Use null, [] or {} for anything missing.
- No markdown fences, no commentary.`;

export function buildJsonRepairV1Prompt(input: { schemaHint: string; raw: string }): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    `Expected shape: ${input.schemaHint}`,
    "",
    "Broken answer:",
    input.raw.slice(0, 8000),
  ].join("\n");
}
