import { describe, it, expect } from 'vitest';
import type { ComparisonReport } from '@/lib/core/types';
import { DocumentParseError } from '@/lib/utils/errors';
import { emptyExtraction } from './comparison-service';
import { MATCH_MESSAGE, formatComparison, formatGhostList, formatReview, ghostCountMessage } from './report-formatter';

function report(overrides: Partial<ComparisonReport>): ComparisonReport {
  return {
    reference: emptyExtraction('report.docx'),
    presentation: emptyExtraction('deck.pptx'),
    ghostSegments: [],
    status: 'match',
    parseErrors: [],
    ...overrides,
  };
}

describe('formatComparison', () => {
  it('prints the match message', () => {
    expect(formatComparison(report({}))).toEqual([MATCH_MESSAGE]);
  });

  it('prints parse errors before the ghost count', () => {
    const lines = formatComparison(
      report({
        status: 'ghosts',
        ghostSegments: ['Profitdoubled', 'Newmarkets'],
        parseErrors: [new DocumentParseError('report.docx', 'Part word/document.xml not found in package')],
      })
    );

    expect(lines).toEqual([
      '❌ Could not read report.docx: Part word/document.xml not found in package',
      '⚠️ Found 2 segments with no direct match in the reference.',
    ]);
  });
});

describe('ghostCountMessage', () => {
  it('uses the singular for one segment', () => {
    expect(ghostCountMessage(1)).toBe('⚠️ Found 1 segment with no direct match in the reference.');
  });
});

describe('formatReview', () => {
  it('prints the notice before the model answer', () => {
    expect(
      formatReview({
        ok: true,
        text: 'All items pass.',
        reviewedCount: 50,
        totalCount: 60,
        truncated: true,
        notice: 'Too many differences: only the first 50 of 60 are reviewed.',
      })
    ).toEqual([
      '⚠️ Too many differences: only the first 50 of 60 are reviewed.',
      '📋 Review result',
      'All items pass.',
    ]);
  });

  it('prints a failed review as one error line', () => {
    expect(formatReview({ ok: false, message: 'Review request failed: 401 - Invalid API-key provided.' })).toEqual([
      '❌ Review request failed: 401 - Invalid API-key provided.',
    ]);
  });
});

describe('formatGhostList', () => {
  it('numbers the segments from one', () => {
    expect(formatGhostList(['Profitdoubled', 'Newmarkets'])).toEqual([
      '🔍 Unmatched segments',
      '1. Profitdoubled',
      '2. Newmarkets',
    ]);
  });
});
