// COMPARISON SERVICE
//
// Reference (.docx) and presentation (.pptx) → segments → ghost list.
// A document that cannot be read is compared as empty and reported in
// parseErrors; the run itself never aborts on document content.

import type { DocumentReader } from '@/lib/core/interfaces';
import type {
  ComparisonReport,
  DocumentInput,
  DocumentKind,
  ExtractionResult,
} from '@/lib/core/types';
import { DocumentParseError } from '@/lib/utils/errors';
import { compareLogger } from './compare-logger';
import { findGhostSegments } from './diff/ghost-diff';
import { readerFactory } from './readers/reader-factory';

export function emptyExtraction(filename: string): ExtractionResult {
  return {
    filename,
    fragments: [],
    mergedText: '',
    segments: new Set<string>(),
  };
}

async function extractOrEmpty(
  kind: DocumentKind,
  reader: DocumentReader,
  input: DocumentInput,
  parseErrors: DocumentParseError[]
): Promise<ExtractionResult> {
  try {
    const result = await reader.extract(input);
    compareLogger.extract(kind, result.fragments.length, result.segments.size);
    return result;
  } catch (error) {
    if (!(error instanceof DocumentParseError)) throw error;
    parseErrors.push(error);
    compareLogger.warn('PARSE', { kind, file: input.filename, decision: 'compared as empty', reason: error.message });
    return emptyExtraction(input.filename);
  }
}

/**
 * Compare a reference document with a presentation derived from it.
 * @throws UnsupportedFileError when either file is not of its expected format.
 */
export async function compareDocuments(
  reference: DocumentInput,
  presentation: DocumentInput
): Promise<ComparisonReport> {
  const referenceReader = readerFactory.getReaderFor('reference', reference);
  const presentationReader = readerFactory.getReaderFor('presentation', presentation);

  compareLogger.startTrace(reference.filename, presentation.filename);
  const parseErrors: DocumentParseError[] = [];

  const referenceResult = await extractOrEmpty('reference', referenceReader, reference, parseErrors);
  const presentationResult = await extractOrEmpty('presentation', presentationReader, presentation, parseErrors);

  const ghostSegments = findGhostSegments(referenceResult.segments, presentationResult.segments);
  compareLogger.diff(referenceResult.segments.size, presentationResult.segments.size, ghostSegments.length);
  if (ghostSegments.length > 0) {
    compareLogger.debug('DIFF', { decision: 'ghost sample', sample: ghostSegments.slice(0, 3).join(' | ') });
  }

  return {
    reference: referenceResult,
    presentation: presentationResult,
    ghostSegments,
    status: ghostSegments.length === 0 ? 'match' : 'ghosts',
    parseErrors,
  };
}
