// REVIEW SERVICE
//
// Asks the review model whether each ghost segment is a paraphrase of the
// reference or unsupported content. One request, no retry.
// Every failure comes back as a message string; nothing is thrown to the caller.

import type { LLMProvider } from '@/lib/core/interfaces';
import type { ReviewOutcome, ReviewRequest } from '@/lib/core/types';
import { REVIEW_SYSTEM_PROMPT } from '@/config/models';
import { ExternalServiceError, errorMessage } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';
import { compareLogger } from '../compare-logger';
import { configService } from '../config';
import { ModelFactory } from '../modelFactory';
import { buildReviewPrompt } from './review-prompt';

export const MISSING_API_KEY_MESSAGE = 'An API key is required to run the review.';
export const NOTHING_TO_REVIEW_MESSAGE = 'No ghost segments to review.';

export interface ReviewOptions {
  /** Overrides the provider built from configuration */
  provider?: LLMProvider;
  maxCandidates?: number;
  maxContextChars?: number;
}

export function truncationNotice(reviewed: number, total: number): string {
  return `Too many differences: only the first ${reviewed} of ${total} are reviewed.`;
}

export function failureMessage(error: unknown): string {
  if (error instanceof ExternalServiceError && error.status !== undefined) {
    return `Review request failed: ${error.status} - ${error.providerMessage ?? error.message}`;
  }
  return `Review error: ${errorMessage(error)}`;
}

export async function reviewGhostSegments(
  request: ReviewRequest,
  options: ReviewOptions = {}
): Promise<ReviewOutcome> {
  if (!request.apiKey.trim()) {
    return { ok: false, message: MISSING_API_KEY_MESSAGE };
  }
  if (request.ghostSegments.length === 0) {
    return { ok: false, message: NOTHING_TO_REVIEW_MESSAGE };
  }

  const reviewConfig = configService.getReviewConfig();
  const maxCandidates = options.maxCandidates ?? reviewConfig.maxCandidates;
  const maxContextChars = options.maxContextChars ?? reviewConfig.maxContextChars;

  const totalCount = request.ghostSegments.length;
  const candidates = request.ghostSegments.slice(0, maxCandidates);
  const truncated = candidates.length < totalCount;
  // Code points, not UTF-16 units
  const context = Array.from(request.referenceText).slice(0, maxContextChars).join('');

  const provider = options.provider ?? ModelFactory.getReviewProvider(request.apiKey);
  const prompt = buildReviewPrompt(context, candidates);
  debug.review.log('Prompt built', { candidates: candidates.length, contextChars: context.length, truncated });

  const startTime = Date.now();
  try {
    const result = await provider.generate(prompt, {
      systemPrompt: REVIEW_SYSTEM_PROMPT,
      temperature: reviewConfig.temperature,
      maxTokens: reviewConfig.maxTokens,
    });
    compareLogger.review(provider.getModel(), Date.now() - startTime, true);

    return {
      ok: true,
      text: result.content,
      reviewedCount: candidates.length,
      totalCount,
      truncated,
      ...(truncated && { notice: truncationNotice(candidates.length, totalCount) }),
    };
  } catch (error) {
    compareLogger.review(provider.getModel(), Date.now() - startTime, false);
    return { ok: false, message: failureMessage(error) };
  }
}
