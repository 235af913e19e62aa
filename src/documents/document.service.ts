import { Logger } from "../config/logger";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";

export type ResumeDocumentType = "pdf" | "docx" | "unknown";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  detectDocumentType(fileName?: string, mimeType?: string): ResumeDocumentType {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }
    if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }
    return "unknown";
  }

  async extractText(buffer: Buffer, fileName?: string, mimeType?: string): Promise<string> {
    const type = this.detectDocumentType(fileName, mimeType);
    if (type === "unknown") {
      throw new Error("Unsupported document type. Please provide a PDF or DOCX resume.");
    }

    const extracted = type === "pdf" ? await extractPdfText(buffer) : await extractDocxText(buffer);
    const compactText = compactWhitespace(extracted.text);

    this.logger.info("Resume text extracted", {
      type,
      fileName,
      pages: extracted.pages,
      warnings: extracted.warnings,
      chars: compactText.length,
    });

    if (!compactText) {
      throw new Error("Could not extract text from resume document.");
    }
    return compactText;
  }
}

export function compactWhitespace(text: string): string {
  return text.replace(/\u0000/g, "").replace(/\s+/g, " ").trim();
}
