/**
 * Track Merger
 *
 * Folds the decoded samples of a source track's chosen clips into one
 * per-bone timeline.
 */

import type {
  Clip,
  ClipSampleStream,
  MergedTrack,
  PerBoneTrack,
  SampleStreamLoader,
  SkeletonIndex,
  SkeletonRecord
} from '../types';
import { ANIMATION } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import { AnimErrorFactory } from '../errors';
import { Logger, LoggerFactory } from '../utils';
import { validateSkeleton } from './checksum-validator';
import { createBoneTrack, decodeSamples } from './sample-decoder';

export interface TrackMergerContext {
  skeletons: SkeletonIndex;
  loadSampleStream: SampleStreamLoader;
  samplePrecision?: number;
  logger?: Logger;
}

export interface MergeOutcome {
  track: MergedTrack;
  skeleton: SkeletonRecord;
  /**
   * Clips whose samples went into the track, in merge order
   */
  mergedClips: Clip[];
}

/**
 * Copy every entry of `source` into `target`. An entry already present at
 * the same bone, track and sample index is overwritten.
 */
export function foldDecodedTrack(target: PerBoneTrack, source: PerBoneTrack): void {
  for (const [boneName, boneTrack] of source) {
    let merged = target.get(boneName);
    if (!merged) {
      merged = createBoneTrack();
      target.set(boneName, merged);
    }

    for (const [sampleIndex, value] of boneTrack.translation) {
      merged.translation.set(sampleIndex, value);
    }
    for (const [sampleIndex, value] of boneTrack.rotation) {
      merged.rotation.set(sampleIndex, value);
    }
  }
}

export class TrackMerger {
  private readonly logger: Logger;
  private readonly precision: number;

  constructor(private readonly context: TrackMergerContext) {
    this.logger = context.logger ?? LoggerFactory.forPipeline();
    this.precision = context.samplePrecision ?? ANIMATION.SAMPLE_PRECISION;
  }

  /**
   * Merge the chosen clips of a source track.
   *
   * Header fields other than the checksum come from the last stream decoded,
   * so they depend on clip order.
   */
  merge(sourceTrack: string, clips: readonly Clip[]): MergeOutcome {
    const loaded: Array<{ clip: Clip; stream: ClipSampleStream }> = [];

    for (const clip of clips) {
      const stream = this.context.loadSampleStream(clip);
      if (!stream) {
        this.logger.warn(`No sample stream for clip ${clip.name}, skipping it`, { sourceTrack, clip: clip.name });
        continue;
      }
      loaded.push({ clip, stream });
    }

    if (loaded.length === 0) {
      throw AnimErrorFactory.emptyInput(ERROR_MESSAGES.NO_STREAMS, sourceTrack, {
        clips: clips.map(clip => clip.name)
      });
    }

    const skeleton = validateSkeleton(loaded.map(entry => entry.stream), this.context.skeletons, sourceTrack);

    const bones: PerBoneTrack = new Map();
    let header = loaded[0].stream;

    for (const { clip, stream } of loaded) {
      header = stream;
      const decoded = decodeSamples(stream, skeleton, this.precision);
      foldDecodedTrack(bones, decoded);
      this.logger.debug(`Merged clip ${clip.name}`, {
        sourceTrack,
        clip: clip.name,
        samples: stream.samples.length,
        bones: decoded.size
      });
    }

    return {
      track: {
        sourceTrack,
        checksum: skeleton.checksum,
        frameCount: header.frameCount,
        fps: header.fps,
        fpsSource: header.fpsSource,
        layer: header.layer,
        bones
      },
      skeleton,
      mergedClips: loaded.map(entry => entry.clip)
    };
  }
}
