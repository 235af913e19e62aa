import mammoth from "mammoth";
import { ExtractedDocument } from "./extracted-document";

export async function extractDocxText(buffer: Buffer): Promise<ExtractedDocument> {
  const result = await mammoth.extractRawText({ buffer });
  return {
    text: result.value,
    warnings: result.messages.length,
  };
}
