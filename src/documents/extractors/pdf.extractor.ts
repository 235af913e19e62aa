import pdfParse from "pdf-parse";
import { ExtractedDocument } from "./extracted-document";

export async function extractPdfText(buffer: Buffer): Promise<ExtractedDocument> {
  const result = await pdfParse(buffer);
  return {
    text: result.text,
    pages: result.numpages,
    warnings: 0,
  };
}
