/**
 * Clip Grouper
 *
 * Partitions a script's clips by the source track they animate.
 */

import type { Clip } from '../types';
import { DEFAULT_CONFIG } from '../constants/config';
import { Logger } from '../utils';

export interface ClipGroupingOptions {
  /**
   * Source-track suffixes to keep (case-insensitive). Empty keeps every clip.
   */
  sourceTrackExtensions?: readonly string[];
  logger?: Logger;
}

export function matchesSourceTrackExtension(sourceTrack: string, extensions: readonly string[]): boolean {
  if (extensions.length === 0) {
    return true;
  }
  const lower = sourceTrack.toLowerCase();
  return extensions.some(extension => lower.endsWith(extension.toLowerCase()));
}

/**
 * Groups clips by source track. Groups keep the clips' declaration order and
 * appear in the order their source track is first referenced.
 */
export function groupClipsBySourceTrack(
  clips: readonly Clip[],
  options: ClipGroupingOptions = {}
): Map<string, Clip[]> {
  const extensions = options.sourceTrackExtensions ?? DEFAULT_CONFIG.SOURCE_TRACK_EXTENSIONS;
  const groups = new Map<string, Clip[]>();

  for (const clip of clips) {
    if (!matchesSourceTrackExtension(clip.sourceTrack, extensions)) {
      options.logger?.debug('Ignoring clip without a matching source track', {
        clip: clip.name,
        sourceTrack: clip.sourceTrack
      });
      continue;
    }

    if (clip.firstFrame > clip.lastFrame) {
      options.logger?.warn('Ignoring clip with an inverted frame range', {
        clip: clip.name,
        sourceTrack: clip.sourceTrack,
        firstFrame: clip.firstFrame,
        lastFrame: clip.lastFrame
      });
      continue;
    }

    const group = groups.get(clip.sourceTrack);
    if (group) {
      group.push(clip);
    } else {
      groups.set(clip.sourceTrack, [clip]);
    }
  }

  return groups;
}
