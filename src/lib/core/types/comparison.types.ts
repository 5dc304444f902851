import type { DocumentParseError } from '@/lib/utils/errors';
import type { ExtractionResult } from './document.types';

export type ComparisonStatus = 'match' | 'ghosts';

export interface ComparisonReport {
  reference: ExtractionResult;
  presentation: ExtractionResult;
  /** Presentation segments with no exact counterpart in the reference */
  ghostSegments: string[];
  status: ComparisonStatus;
  /** Documents that could not be read and were compared as empty */
  parseErrors: DocumentParseError[];
}

export interface ReviewRequest {
  apiKey: string;
  referenceText: string;
  ghostSegments: string[];
}

export type ReviewOutcome =
  | {
      ok: true;
      text: string;
      /** Candidates actually sent to the model */
      reviewedCount: number;
      totalCount: number;
      truncated: boolean;
      notice?: string;
    }
  | {
      ok: false;
      message: string;
    };
