/**
 * Range Analyzer
 *
 * Decides whether a set of clips tiles a run of frame numbers exactly.
 */

import type { Clip } from '../types';

export type FrameRange = Pick<Clip, 'firstFrame' | 'lastFrame'>;

export interface FrameBounds {
  start: number;
  end: number;
}

/**
 * True when the ranges, sorted by first frame, abut with no gap and no
 * overlap. Empty and single-range input is a cover.
 */
export function isContiguousCover(ranges: readonly FrameRange[]): boolean {
  const sorted = [...ranges].sort((a, b) => a.firstFrame - b.firstFrame);

  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const curr = sorted[i];

    // Overlap
    if (curr.firstFrame <= prev.lastFrame) {
      return false;
    }
    // Gap
    if (curr.firstFrame !== prev.lastFrame + 1) {
      return false;
    }
  }

  return true;
}

/**
 * Lowest first frame and highest last frame of the ranges, or null when
 * there are none
 */
export function getFrameBounds(ranges: readonly FrameRange[]): FrameBounds | null {
  if (ranges.length === 0) {
    return null;
  }

  let start = Infinity;
  let end = -Infinity;
  for (const range of ranges) {
    start = Math.min(start, range.firstFrame);
    end = Math.max(end, range.lastFrame);
  }
  return { start, end };
}

export function getFrameSpan(range: FrameRange): number {
  return range.lastFrame - range.firstFrame;
}

export function formatFrameRange(range: FrameRange): string {
  return `${range.firstFrame}-${range.lastFrame}`;
}
