/**
 * Segmenter service.
 * Splits extracted text into the short, whitespace-free sentence units
 * that the diff compares by exact string equality.
 */

import { normalizeSegment, normalizeLineEndings } from '@/lib/utils/normalize';
import type { SegmentSet } from '@/lib/core/types';
import { debug } from '@/lib/utils/debug';
import { configService } from '../config';

/**
 * Runs of terminators form one split point:
 * full-width 。；！？, newlines, and an ASCII full stop that ends a sentence
 * (followed by whitespace or the end of the text, so "3.5" stays whole).
 * ASCII ; ! ? do not split.
 */
export const SEGMENT_TERMINATORS = /(?:[。；！？\n]|\.+(?=\s|$))+/u;

/** Pieces of this length or shorter after normalization are labels, bullets or numbers. */
export const DEFAULT_MIN_SEGMENT_LENGTH = 3;

export interface Segmenter {
  split(text: string): Set<string>;
  getName(): string;
}

export interface SegmenterOptions {
  minLength?: number;
  terminators?: RegExp;
}

export class PunctuationSegmenter implements Segmenter {
  private readonly minLength: number;
  private readonly terminators: RegExp;

  constructor(options: SegmenterOptions = {}) {
    this.minLength = options.minLength ?? DEFAULT_MIN_SEGMENT_LENGTH;
    this.terminators = options.terminators ?? SEGMENT_TERMINATORS;
  }

  split(text: string): Set<string> {
    const segments = new Set<string>();
    if (!text) return segments;

    let dropped = 0;
    for (const piece of normalizeLineEndings(text).split(this.terminators)) {
      const cleaned = normalizeSegment(piece);
      if (cleaned.length >= this.minLength) {
        segments.add(cleaned);
      } else if (cleaned) {
        dropped++;
      }
    }

    debug.segment.log('Split', { kept: segments.size, dropped });

    return segments;
  }

  getName(): string {
    return 'PunctuationSegmenter';
  }
}

// Singleton instance
let segmenterInstance: PunctuationSegmenter | null = null;

export function getSegmenter(): Segmenter {
  if (!segmenterInstance) {
    segmenterInstance = new PunctuationSegmenter({
      minLength: configService.getSegmentConfig().minLength,
    });
  }
  return segmenterInstance;
}

/**
 * Split text into a segment set with the default segmenter.
 */
export function splitIntoSegments(text: string): SegmentSet {
  return getSegmenter().split(text);
}
