import type { DocumentInput, ExtractionResult } from '../types/document.types';

export interface DocumentReader {
  /**
   * Check if this reader can handle the given file type
   */
  canHandle(input: Pick<DocumentInput, 'filename' | 'mimeType'>): boolean;

  /**
   * Supported file extensions (e.g., ['.docx', '.DOCX'])
   */
  getSupportedExtensions(): string[];

  /**
   * Extract fragments, merged text and segments from the file.
   * @throws DocumentParseError when the document cannot be opened.
   */
  extract(input: DocumentInput): Promise<ExtractionResult>;

  /**
   * Reader name for logging/debugging
   */
  getName(): string;
}
