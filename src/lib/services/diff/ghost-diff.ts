import type { SegmentSet } from '@/lib/core/types';

/**
 * Segments of the presentation with no exact counterpart in the reference
 * (presentation − reference), in the presentation's iteration order.
 * An empty result means every presentation segment appears in the reference.
 */
export function findGhostSegments(reference: SegmentSet, presentation: SegmentSet): string[] {
  const ghosts: string[] = [];
  for (const segment of presentation) {
    if (!reference.has(segment)) {
      ghosts.push(segment);
    }
  }
  return ghosts;
}
