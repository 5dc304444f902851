/**
 * Prompt for the ghost-segment review.
 * The model gets the (truncated) reference text and the candidates as a bulleted list,
 * and labels each candidate as supported or not.
 */

export const PASS_LABEL = '✅ Pass';
export const SUSPECT_LABEL = '❌ Suspect';

export function formatCandidateList(candidates: string[]): string {
  return candidates.map(item => `- ${item}`).join('\n');
}

export function buildReviewPrompt(referenceText: string, candidates: string[]): string {
  return [
    'You are a strict reviewer of industry research reports.',
    '',
    '[Task]',
    'Decide whether each item under [Content to review] is supported by [Reference facts].',
    '',
    '[Reference facts (source)]:',
    referenceText,
    '',
    '[Content to review (target, possibly template leftovers or errors)]:',
    formatCandidateList(candidates),
    '',
    '[Rules]',
    `1. If an item is a reasonable summary or paraphrase of the reference facts, mark it 【${PASS_LABEL}】.`,
    `2. If the reference facts do not mention it at all, mark it 【${SUSPECT_LABEL}】.`,
    'Output the analysis directly.',
  ].join('\n');
}
