import type { DocumentReader } from '@/lib/core/interfaces';
import type { DocumentInput, DocumentKind } from '@/lib/core/types';
import { UnsupportedFileError } from '@/lib/utils/errors';
import { DocxReader } from './docx-reader';
import { PptxReader } from './pptx-reader';

type FileRef = Pick<DocumentInput, 'filename' | 'mimeType'>;

/**
 * Factory for document readers.
 * Selects the reader by file extension / MIME type, or by the document's role
 * in the comparison (reference = DOCX, presentation = PPTX).
 */
class ReaderFactory {
  private readers: DocumentReader[] = [];
  private kindReaders: Map<DocumentKind, DocumentReader> = new Map();

  constructor() {
    const docx = new DocxReader();
    const pptx = new PptxReader();

    this.readers = [docx, pptx];

    this.kindReaders.set('reference', docx);
    this.kindReaders.set('presentation', pptx);
  }

  /**
   * Get the appropriate reader for a file.
   * @throws UnsupportedFileError if no reader can handle the file type.
   */
  getReader(file: FileRef): DocumentReader {
    const reader = this.readers.find((r) => r.canHandle(file));

    if (!reader) {
      throw new UnsupportedFileError(file.filename);
    }

    return reader;
  }

  /**
   * Reader for a role in the comparison; the file must match that role's format.
   * @throws UnsupportedFileError if the file is not of the expected format.
   */
  getReaderFor(kind: DocumentKind, file: FileRef): DocumentReader {
    const reader = this.kindReaders.get(kind);
    if (!reader || !reader.canHandle(file)) {
      throw new UnsupportedFileError(file.filename);
    }
    return reader;
  }

  /**
   * Check if a file type is supported.
   */
  isSupported(file: FileRef): boolean {
    return this.readers.some((r) => r.canHandle(file));
  }

  /**
   * Get all supported file extensions.
   */
  getSupportedExtensions(): string[] {
    return this.readers.flatMap((r) => r.getSupportedExtensions());
  }
}

// Singleton instance
export const readerFactory = new ReaderFactory();

// Also export the class for testing
export { ReaderFactory };
