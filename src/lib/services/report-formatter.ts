/**
 * Plain-text rendering of a comparison run for the terminal.
 */

import type { ComparisonReport, ReviewOutcome } from '@/lib/core/types';

export const MATCH_MESSAGE = '🎉 Perfect: the presentation matches the reference document character for character.';

export function ghostCountMessage(count: number): string {
  return `⚠️ Found ${count} segment${count === 1 ? '' : 's'} with no direct match in the reference.`;
}

export function formatComparison(report: ComparisonReport): string[] {
  const lines: string[] = [];

  for (const error of report.parseErrors) {
    lines.push(`❌ ${error.message}`);
  }

  lines.push(report.status === 'match' ? MATCH_MESSAGE : ghostCountMessage(report.ghostSegments.length));
  return lines;
}

export function formatReview(outcome: ReviewOutcome): string[] {
  if (!outcome.ok) {
    return [`❌ ${outcome.message}`];
  }

  const lines: string[] = [];
  if (outcome.notice) {
    lines.push(`⚠️ ${outcome.notice}`);
  }
  lines.push('📋 Review result', outcome.text);
  return lines;
}

export function formatGhostList(ghostSegments: string[]): string[] {
  return ['🔍 Unmatched segments', ...ghostSegments.map((segment, i) => `${i + 1}. ${segment}`)];
}
