/**
 * Combination Selector
 *
 * Picks, for one source track, the clips to rebuild it from. Strategies are
 * tried in order and the first one that returns a selection wins. A selection
 * that does not reach both ends of the observed frame range is replaced by
 * the whole clip set.
 */

import type { Clip, SelectionResult } from '../types';
import { SelectionReason } from '../types';
import { ANIMATION } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import { AnimErrorFactory } from '../errors';
import { Logger, LoggerFactory } from '../utils';
import { formatFrameRange, getFrameBounds, getFrameSpan, isContiguousCover } from './range-analyzer';

/**
 * One step of the selection chain
 */
export interface SelectionStrategy {
  readonly reason: SelectionReason;

  /**
   * Returns the clips to use, or null to hand over to the next strategy
   */
  select(clips: readonly Clip[]): readonly Clip[] | null;
}

export interface CombinationSelectorOptions {
  referenceFps?: number;
  logger?: Logger;
  strategies?: readonly SelectionStrategy[];
}

/**
 * Yields every subset of the given size, keeping the items' relative order.
 * Subsets come in lexicographic order of their indices.
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  const n = items.length;
  if (size < 0 || size > n) {
    return;
  }

  const indices = Array.from({ length: size }, (_, i) => i);
  while (true) {
    yield indices.map(i => items[i]);

    let i = size - 1;
    while (i >= 0 && indices[i] === i + n - size) {
      i--;
    }
    if (i < 0) {
      return;
    }

    indices[i]++;
    for (let j = i + 1; j < size; j++) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}

/**
 * A lone clip is used as is
 */
export class TrivialStrategy implements SelectionStrategy {
  readonly reason = SelectionReason.TRIVIAL;

  select(clips: readonly Clip[]): readonly Clip[] | null {
    return clips.length === 1 ? [clips[0]] : null;
  }
}

/**
 * Largest subset (two clips or more) whose ranges tile without gap or
 * overlap. Among subsets of that size the first in enumeration order wins.
 */
export class ExactCoverStrategy implements SelectionStrategy {
  readonly reason = SelectionReason.BEST_COMBINATION;

  select(clips: readonly Clip[]): readonly Clip[] | null {
    // Walking sizes downward, the first hit is the first subset of maximum
    // size an upward search would keep.
    for (let size = clips.length; size >= 2; size--) {
      for (const combo of combinations(clips, size)) {
        if (isContiguousCover(combo)) {
          return combo;
        }
      }
    }
    return null;
  }
}

/**
 * Single clip with the widest frame span. Ties go to the first clip played
 * back unmodified, then to the first tied clip.
 */
export class LargestSpanStrategy implements SelectionStrategy {
  readonly reason = SelectionReason.LARGEST_SPAN;

  constructor(private readonly referenceFps: number = ANIMATION.REFERENCE_FPS) { }

  select(clips: readonly Clip[]): readonly Clip[] | null {
    if (clips.length === 0) {
      return null;
    }

    const maxSpan = Math.max(...clips.map(getFrameSpan));
    const widest = clips.filter(clip => getFrameSpan(clip) === maxSpan);
    if (widest.length === 1) {
      return widest;
    }

    const unmodified = widest.filter(clip =>
      clip.fps === this.referenceFps && clip.speedModifier === ANIMATION.UNMODIFIED_SPEED
    );
    return [unmodified.length > 0 ? unmodified[0] : widest[0]];
  }
}

export function createDefaultStrategies(referenceFps: number = ANIMATION.REFERENCE_FPS): SelectionStrategy[] {
  return [
    new TrivialStrategy(),
    new ExactCoverStrategy(),
    new LargestSpanStrategy(referenceFps)
  ];
}

export class CombinationSelector {
  private readonly strategies: readonly SelectionStrategy[];
  private readonly logger: Logger;

  constructor(options: CombinationSelectorOptions = {}) {
    this.strategies = options.strategies ?? createDefaultStrategies(options.referenceFps);
    this.logger = options.logger ?? LoggerFactory.forSelection();
  }

  /**
   * Choose the clips a source track is rebuilt from
   */
  select(sourceTrack: string, clips: readonly Clip[]): SelectionResult {
    const fullRange = getFrameBounds(clips);
    if (!fullRange) {
      throw AnimErrorFactory.emptyInput(ERROR_MESSAGES.NO_CLIPS, sourceTrack);
    }

    let chosen: readonly Clip[] = clips;
    let reason = SelectionReason.NO_FULL_COVER;

    for (const strategy of this.strategies) {
      const selection = strategy.select(clips);
      if (selection && selection.length > 0) {
        chosen = selection;
        reason = strategy.reason;
        break;
      }
    }

    const chosenRange = getFrameBounds(chosen);
    if (!chosenRange || chosenRange.start !== fullRange.start || chosenRange.end !== fullRange.end) {
      chosen = clips;
      reason = SelectionReason.NO_FULL_COVER;
    }

    const chosenSet = new Set(chosen);
    const result: SelectionResult = {
      sourceTrack,
      chosen: [...chosen],
      dropped: clips.filter(clip => !chosenSet.has(clip)),
      reason
    };

    this.report(result);
    return result;
  }

  private report(result: SelectionResult): void {
    const describe = (clip: Clip): string => `${clip.name} (${formatFrameRange(clip)})`;

    this.logger.info(`Reconstruct: ${result.sourceTrack}`, {
      sourceTrack: result.sourceTrack,
      reason: result.reason,
      picked: result.chosen.map(describe)
    });

    if (result.dropped.length > 0) {
      this.logger.info(`Dropped ${result.dropped.length} clip(s) for ${result.sourceTrack}`, {
        sourceTrack: result.sourceTrack,
        dropped: result.dropped.map(describe)
      });
    }
  }
}

/**
 * Choose the clips a source track is rebuilt from, with the default strategy chain
 */
export function selectBestCombination(
  sourceTrack: string,
  clips: readonly Clip[],
  options: CombinationSelectorOptions = {}
): SelectionResult {
  return new CombinationSelector(options).select(sourceTrack, clips);
}
