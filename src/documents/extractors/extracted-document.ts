export interface ExtractedDocument {
  text: string;
  pages?: number;
  warnings: number;
}
