/**
 * Byte stream supplied by the caller (CLI argument, upload, test fixture).
 */
export interface DocumentInput {
  filename: string;
  buffer: Uint8Array;
  mimeType?: string;
}

export type DocumentKind = 'reference' | 'presentation';

/**
 * Deduplicated comparison units, iterated in first-seen order.
 */
export type SegmentSet = ReadonlySet<string>;

export interface DocxDiagnostics {
  format: 'docx';
  paragraphCount: number;
  tableCount: number;
  /** Rows read through the raw-markup path after the grid model failed */
  recoveredRows: number;
  skippedRows: number;
  skippedTables: number;
}

export interface PptxDiagnostics {
  format: 'pptx';
  slideCount: number;
  shapeCount: number;
  tableCount: number;
}

export type ExtractionDiagnostics = DocxDiagnostics | PptxDiagnostics;

export interface ExtractionResult {
  filename: string;
  /** Text per content unit, in extraction order */
  fragments: string[];
  /** Fragments joined by line boundaries; used as review context */
  mergedText: string;
  segments: SegmentSet;
  diagnostics?: ExtractionDiagnostics;
}
